/**
 * Structured logger for the key check.
 *
 * Writes to stderr so stdout carries only the report. Pretty output through
 * pino-pretty when LOG_PRETTY=true, or by default when stderr is a TTY.
 * The API key is redacted wherever it appears under a known field name.
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { LOG_LEVELS, type LogLevel } from "./config";

export interface LoggingOptions {
  level: LogLevel;
  pretty: boolean;
}

const REDACT_PATHS = ["apiKey", "key", "params.key", "*.apiKey", "*.key"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLoggingOptions(env: NodeJS.ProcessEnv = process.env): LoggingOptions {
  const level = env.LOG_LEVEL?.trim();
  const pretty = env.LOG_PRETTY?.trim();
  return {
    level: isLogLevel(level) ? level : "warn",
    pretty: pretty ? pretty === "true" : Boolean(process.stderr.isTTY),
  };
}

export function createLogger(options: LoggingOptions) {
  return pino(
    {
      level: options.level,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.pretty
      ? pinoPretty({
          colorize: true,
          destination: 2,
          sync: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        })
      : pino.destination(2)
  );
}

export const logger = createLogger(resolveLoggingOptions());

export type Logger = typeof logger;
