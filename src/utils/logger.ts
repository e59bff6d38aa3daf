/**
 * Logger Module
 * Structured logging using pino, written to stderr so stdout stays free for command output
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export interface LoggerOptions {
  level?: LogLevel;
  /** Force pretty printing on or off (default: stderr is a TTY outside production and tests) */
  pretty?: boolean;
}

const STDERR_FD = 2;

/**
 * Loggers created so far, so a CLI flag parsed after import time can still adjust them
 */
const registry = new Set<PinoLogger>();

let overrideLevel: LogLevel | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from override, environment or default
 */
function getLogLevel(): LogLevel {
  if (overrideLevel) return overrideLevel;
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "warn";
}

function shouldPrettyPrint(): boolean {
  const env = process.env.NODE_ENV;
  return env !== "production" && env !== "test" && process.stderr.isTTY === true;
}

/**
 * Create a logger instance for a specific component
 *
 * @example
 * ```typescript
 * const logger = createLogger("section-codec");
 * logger.debug({ bytes: payload.length }, "Encoded package-docs payload");
 * logger.error({ err }, "Failed to rewrite component");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel(), pretty = shouldPrettyPrint() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  let logger: PinoLogger;
  if (pretty) {
    logger = pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: STDERR_FD,
        },
      },
    });
  } else {
    logger = pino(baseOptions, pino.destination({ dest: STDERR_FD, sync: true }));
  }

  registry.add(logger);
  return logger;
}

/**
 * Set the level of every logger created so far and of those created later
 */
export function setLogLevel(level: LogLevel): void {
  overrideLevel = level;
  for (const logger of registry) {
    logger.level = level;
  }
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
