import {LogLevel, Logger} from "@prestake/utils";
import {getEmptyLogger} from "./empty.js";
import {LogFormat} from "./interface.js";
import {getNodeLogger} from "./node.js";

function isLogLevel(value: string): value is LogLevel {
  return (Object.values(LogLevel) as string[]).includes(value);
}

function isLogFormat(value: string): value is LogFormat {
  return value === "human" || value === "json";
}

export function getEnvLogLevel(): LogLevel | null {
  if (process == null) return null;
  const logLevel = process.env.LOG_LEVEL;
  if (logLevel && isLogLevel(logLevel)) return logLevel;
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

/**
 * Logger configured from `LOG_LEVEL` / `DEBUG` / `VERBOSE` and `LOG_FORMAT`, silent if none is set
 */
export function getEnvLogger(opts?: {module?: string}): Logger {
  const level = getEnvLogLevel();
  const format = process.env.LOG_FORMAT;

  if (level != null) {
    return getNodeLogger({
      level,
      module: opts?.module,
      format: format && isLogFormat(format) ? format : undefined,
    });
  }

  return getEmptyLogger();
}
