import { EnvConfigSchema } from "./schemas";
import { ConfigError } from "./errors";

export const ENV_BASE_URL = "CHUCK_API_BASE_URL";
export const ENV_TIMEOUT = "CHUCK_CLI_TIMEOUT";

export interface ApiConfig {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Reads the API configuration from the environment. Called once per
 * invocation; the result is handed to the client explicitly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = EnvConfigSchema.safeParse({
    baseUrl: env[ENV_BASE_URL],
    timeoutSeconds: env[ENV_TIMEOUT],
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${describeField(issue.path)}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  return {
    baseUrl: result.data.baseUrl.replace(/\/+$/, ""),
    timeoutMs: Math.round(result.data.timeoutSeconds * 1000),
  };
}

function describeField(path: (string | number)[]): string {
  const key = path[0];
  if (key === "baseUrl") return ENV_BASE_URL;
  if (key === "timeoutSeconds") return ENV_TIMEOUT;
  return path.join(".");
}
