/**
 * Structured logging
 *
 * One root tslog logger per process; modules take a named sub-logger via createLogger().
 * LOG_LEVEL (silly|trace|debug|info|warn|error|fatal) and LOG_FORMAT (pretty|json)
 * are read once when this module loads.
 */

import { type ILogObj, Logger } from "tslog";

const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

type LogLevelName = keyof typeof LOG_LEVELS;

function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LOG_LEVELS, value);
}

function resolveMinLevel(raw: string | undefined): number {
  const name = raw?.trim().toLowerCase();
  if (name && isLogLevelName(name)) {
    return LOG_LEVELS[name];
  }
  return LOG_LEVELS.info;
}

export type AppLogger = Logger<ILogObj>;

const rootLogger: AppLogger = new Logger<ILogObj>({
  name: "tiered-search",
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  type: process.env.LOG_FORMAT === "json" ? "json" : "pretty",
  prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
});

/**
 * Create a named logger for a module
 *
 * @example
 * ```typescript
 * const log = createLogger("TieredRetrieval");
 * log.info("tier accepted", { tier: "free", confidence: 0.91 });
 * ```
 */
export function createLogger(name: string): AppLogger {
  return rootLogger.getSubLogger({ name });
}
