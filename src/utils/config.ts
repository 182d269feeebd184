import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const DEFAULT_HERITAGE_API_URL = "http://www.cha.go.kr/cha/";
export const DEFAULT_PALACE_API_URL = "https://www.heritage.go.kr/";
export const DEFAULT_TIMEOUT_MS = 15_000;

/** Base URLs must end in "/" so endpoint paths resolve beneath them. */
export function normalizeBaseUrl(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

const baseUrl = (fallback: string) => z.string().url().default(fallback).transform(normalizeBaseUrl);

const EnvSchema = z.object({
  HERITAGE_API_URL: baseUrl(DEFAULT_HERITAGE_API_URL),
  PALACE_API_URL: baseUrl(DEFAULT_PALACE_API_URL),
  HERITAGE_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  HERITAGE_LOG_REQUESTS: z
    .enum(["true", "false"])
    .default("false")
    .transform((flag) => flag === "true"),
});

export interface ClientConfig {
  heritageApiUrl: string;
  palaceApiUrl: string;
  timeoutMs: number;
  logRequests: boolean;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

/** Read client settings from the environment. Unset variables take their defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }

  const parsed = result.data;
  return {
    heritageApiUrl: parsed.HERITAGE_API_URL,
    palaceApiUrl: parsed.PALACE_API_URL,
    timeoutMs: parsed.HERITAGE_HTTP_TIMEOUT_MS,
    logRequests: parsed.HERITAGE_LOG_REQUESTS,
  };
}

const ConfigSchema = z.object({
  heritageApiUrl: z.string().url().transform(normalizeBaseUrl),
  palaceApiUrl: z.string().url().transform(normalizeBaseUrl),
  timeoutMs: z.number().int().positive(),
  logRequests: z.boolean(),
});

const ENV_VARS = {
  heritageApiUrl: "HERITAGE_API_URL",
  palaceApiUrl: "PALACE_API_URL",
  timeoutMs: "HERITAGE_HTTP_TIMEOUT_MS",
  logRequests: "HERITAGE_LOG_REQUESTS",
} as const satisfies Record<keyof ClientConfig, string>;

/**
 * Caller overrides on top of the environment. Undefined overrides are
 * ignored, and only variables for fields the caller left out are read.
 */
export function resolveConfig(
  overrides: Partial<ClientConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const supplied = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const unset: NodeJS.ProcessEnv = {};
  for (const [field, name] of Object.entries(ENV_VARS)) {
    if (!(field in supplied)) unset[name] = env[name];
  }

  const result = ConfigSchema.safeParse({ ...loadConfig(unset), ...supplied });
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}
