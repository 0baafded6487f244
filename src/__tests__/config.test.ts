import { describe, it, expect } from "vitest";
import { loadConfig, ENV_BASE_URL, ENV_TIMEOUT } from "../config";
import { ConfigError } from "../errors";
import { DEFAULT_BASE_URL } from "../schemas";

describe("loadConfig", () => {
  it("returns defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: 10_000,
    });
  });

  it("reads the base URL and timeout overrides", () => {
    const config = loadConfig({
      [ENV_BASE_URL]: "http://localhost:8080",
      [ENV_TIMEOUT]: "3",
    });

    expect(config).toEqual({ baseUrl: "http://localhost:8080", timeoutMs: 3000 });
  });

  it("accepts fractional timeouts", () => {
    expect(loadConfig({ [ENV_TIMEOUT]: "2.5" }).timeoutMs).toBe(2500);
  });

  it("strips trailing slashes from the base URL", () => {
    expect(loadConfig({ [ENV_BASE_URL]: "http://localhost:8080/api//" }).baseUrl).toBe(
      "http://localhost:8080/api",
    );
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ [ENV_BASE_URL]: "  ", [ENV_TIMEOUT]: "" })).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: 10_000,
    });
  });

  it("rejects a base URL that is not a URL", () => {
    expect(() => loadConfig({ [ENV_BASE_URL]: "not a url" })).toThrow(ConfigError);
    expect(() => loadConfig({ [ENV_BASE_URL]: "not a url" })).toThrow(
      /CHUCK_API_BASE_URL/,
    );
  });

  it("rejects timeouts that are not positive numbers", () => {
    for (const value of ["abc", "0", "-5"]) {
      expect(() => loadConfig({ [ENV_TIMEOUT]: value })).toThrow(ConfigError);
      expect(() => loadConfig({ [ENV_TIMEOUT]: value })).toThrow(
        /^Invalid environment configuration: CHUCK_CLI_TIMEOUT: /,
      );
    }
  });

  it("accepts the longest timeout a timer can hold", () => {
    expect(loadConfig({ [ENV_TIMEOUT]: "2147483" }).timeoutMs).toBe(2_147_483_000);
  });

  it("rejects timeouts longer than a timer can hold", () => {
    for (const value of ["2147484", "3000000", "Infinity"]) {
      expect(() => loadConfig({ [ENV_TIMEOUT]: value })).toThrow(ConfigError);
      expect(() => loadConfig({ [ENV_TIMEOUT]: value })).toThrow(
        /^Invalid environment configuration: CHUCK_CLI_TIMEOUT: /,
      );
    }
  });
});
