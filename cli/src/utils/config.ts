import { z } from "zod";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  KEYCHECK_OUTPUT_DIR: z.string().min(1).default("output"),
  KEYCHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  KEYCHECK_RETRIES: z.coerce.number().int().min(0).default(2),
  KEYCHECK_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  KEYCHECK_PROXY_URL: z.string().url().optional(),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

/** LOG_LEVEL is validated here but read by the logger itself. */
export interface KeycheckConfig {
  outputRoot: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  proxyUrl: string | undefined;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** Empty strings count as unset, so `FOO=` in a .env file falls back to the default. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[name] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): KeycheckConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    outputRoot: e.KEYCHECK_OUTPUT_DIR,
    timeoutMs: e.KEYCHECK_TIMEOUT_MS,
    retries: e.KEYCHECK_RETRIES,
    backoffMs: e.KEYCHECK_BACKOFF_MS,
    proxyUrl: e.KEYCHECK_PROXY_URL,
  };
}
