import pino, { type Logger } from "pino";

export type LoggerOption = boolean | Logger;

/**
 * Resolves the `logger` option the same way across the package: `true` builds
 * a pino logger at `LOG_LEVEL`, `false` a disabled one, and a pino instance is
 * used as given.
 */
export function createLogger(option: LoggerOption = true): Logger {
  if (typeof option !== "boolean") {
    return option;
  }
  if (!option) {
    return pino({ enabled: false });
  }
  return pino({ name: "s3-handler", level: process.env.LOG_LEVEL ?? "info" });
}
