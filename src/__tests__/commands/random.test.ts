import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { randomCommand, formatJoke, jokeText } from "../../commands/random";
import { failure, success } from "../../api/result";
import { NetworkError, RequestTimeoutError } from "../../errors";
import { toJoke } from "../../domain/jokes";
import { consoleLines, createFakeClient, createMockLogger } from "../test-utils";

describe("formatJoke", () => {
  it("prints only the value by default", () => {
    const joke = toJoke({ id: "1", value: "a funny joke", categories: ["dev"] });

    expect(formatJoke(joke, false)).toEqual(["a funny joke"]);
  });

  it("prints id, url and categories before the value when verbose", () => {
    const joke = toJoke({
      id: "1",
      value: "a funny joke",
      url: "https://api.chucknorris.io/jokes/1",
      categories: ["dev", "movie"],
    });

    expect(formatJoke(joke, true)).toEqual([
      "ID: 1",
      "URL: https://api.chucknorris.io/jokes/1",
      "Categories: dev, movie",
      "",
      "a funny joke",
    ]);
  });

  it("skips url and categories when the joke has none", () => {
    const joke = toJoke({ id: "1", value: "a funny joke" });

    expect(formatJoke(joke, true)).toEqual(["ID: 1", "", "a funny joke"]);
  });
});

describe("jokeText", () => {
  it("returns strings unchanged", () => {
    expect(jokeText("a funny joke")).toBe("a funny joke");
  });

  it("prints other values as JSON", () => {
    expect(jokeText(42)).toBe("42");
    expect(jokeText(null)).toBe("null");
    expect(jokeText(["x"])).toBe('["x"]');
  });
});

describe("randomCommand", () => {
  let consoleSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("prints the joke and returns 0", async () => {
    const client = createFakeClient();
    client.fetchRandom.mockResolvedValue(success({ id: "1", value: "a funny joke" }));
    const logger = createMockLogger();

    const code = await randomCommand({}, client, logger);

    expect(code).toBe(0);
    expect(consoleLines(consoleSpy)).toEqual(["a funny joke"]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("prints a non-string value as received", async () => {
    const client = createFakeClient();
    client.fetchRandom.mockResolvedValue(success({ id: "1", value: 42 }));

    const code = await randomCommand({ verbose: true }, client, createMockLogger());

    expect(code).toBe(0);
    expect(consoleLines(consoleSpy)).toEqual(["ID: 1", "", "42"]);
  });

  it("passes the category to the client", async () => {
    const client = createFakeClient();
    client.fetchRandom.mockResolvedValue(success({ value: "dev joke" }));

    await randomCommand({ category: "dev" }, client, createMockLogger());

    expect(client.fetchRandom).toHaveBeenCalledTimes(1);
    expect(client.fetchRandom).toHaveBeenCalledWith({ category: "dev" });
  });

  it("prints verbose details", async () => {
    const client = createFakeClient();
    client.fetchRandom.mockResolvedValue(
      success({ id: "1", value: "a funny joke", categories: ["dev"] }),
    );

    await randomCommand({ verbose: true }, client, createMockLogger());

    expect(consoleLines(consoleSpy)).toEqual([
      "ID: 1",
      "Categories: dev",
      "",
      "a funny joke",
    ]);
  });

  it("emits the decoded body as JSON with --json", async () => {
    const body = { id: "1", value: "a funny joke", icon_url: "https://example.test/i.png" };
    const client = createFakeClient();
    client.fetchRandom.mockResolvedValue(success(body));
    const logger = createMockLogger();

    const code = await randomCommand({ json: true }, client, logger);

    expect(code).toBe(0);
    expect(logger.json).toHaveBeenCalledWith(body);
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("logs a timeout and returns 2", async () => {
    const client = createFakeClient();
    client.fetchRandom.mockResolvedValue(
      failure(new RequestTimeoutError("/jokes/random", 10000)),
    );
    const logger = createMockLogger();

    const code = await randomCommand({}, client, logger);

    expect(code).toBe(2);
    expect(logger.error).toHaveBeenCalledWith(
      "[TIMEOUT] failed to fetch random joke: Request timed out after 10000ms during GET /jokes/random",
    );
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("logs a network failure and returns 2", async () => {
    const client = createFakeClient();
    client.fetchRandom.mockResolvedValue(
      failure(new NetworkError("/jokes/random", new Error("getaddrinfo ENOTFOUND"))),
    );
    const logger = createMockLogger();

    const code = await randomCommand({ json: true }, client, logger);

    expect(code).toBe(2);
    expect(logger.error).toHaveBeenCalledWith(
      "[NETWORK_ERROR] failed to fetch random joke: Network error during GET /jokes/random: getaddrinfo ENOTFOUND",
    );
    expect(logger.json).not.toHaveBeenCalled();
  });
});
