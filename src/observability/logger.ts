/**
 * Logger powered by consola.
 *
 * Verbosity comes from LOG_LEVEL (debug | info | warn | error | silent,
 * default warn) or setLogLevel(). Output goes to stderr so CLI output on
 * stdout stays parseable.
 */

import { LogLevels, createConsola } from "consola";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  debug: LogLevels.debug,
  info: LogLevels.info,
  warn: LogLevels.warn,
  error: LogLevels.error,
  silent: LogLevels.silent,
};

export const isLogLevelName = (value: unknown): value is LogLevelName =>
  typeof value === "string" && Object.hasOwn(LOG_LEVEL_MAP, value);

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

const base = createConsola({
  level: LOG_LEVEL_MAP[isLogLevelName(envLevel) ? envLevel : "warn"],
  stderr: process.stderr,
});
base.options.stdout = process.stderr;

export function setLogLevel(name: LogLevelName): void {
  base.level = LOG_LEVEL_MAP[name];
}

const MODULE_TAGS: Record<string, string> = {
  coordinator: "COORD",
  protocols: "PROTO",
  workers: "WORK",
  cli: "CLI",
  config: "CONFIG",
};

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** Tagged logger that always delegates to the base instance. */
export function createLogger(module: string): Logger {
  const tag = MODULE_TAGS[module] ?? module.toUpperCase();
  return {
    debug: (...args) => base.debug(`[${tag}]`, ...args),
    info: (...args) => base.info(`[${tag}]`, ...args),
    warn: (...args) => base.warn(`[${tag}]`, ...args),
    error: (...args) => base.error(`[${tag}]`, ...args),
  };
}

/** Prefix every line with the mission's trace id. */
export function withTrace(logger: Logger, traceId: string): Logger {
  const prefix = `trace=${traceId}`;
  return {
    debug: (...args) => logger.debug(prefix, ...args),
    info: (...args) => logger.info(prefix, ...args),
    warn: (...args) => logger.warn(prefix, ...args),
    error: (...args) => logger.error(prefix, ...args),
  };
}

export const logger = {
  coordinator: createLogger("coordinator"),
  protocols: createLogger("protocols"),
  workers: createLogger("workers"),
  cli: createLogger("cli"),
  config: createLogger("config"),
};
