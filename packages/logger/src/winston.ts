import winston from "winston";
import type {Logger as Winston} from "winston";
import {Logger, LoggerOptions, LoggerChildOpts, LogLevel, LogData, logLevelNum} from "./interface.js";
import {getFormat} from "./utils/format.js";

// Log level is configured by transport only, the winston instance forwards every entry.
// Child loggers share transports with their parent and only differ by `defaultMeta.module`.

interface DefaultMeta {
  module: string;
}

export type LoggerWithChild = Logger & {
  child(options: LoggerChildOpts): LoggerWithChild;
};

export class WinstonLogger implements LoggerWithChild {
  constructor(protected readonly winston: Winston) {}

  protected static createWinstonInstance(options: Partial<LoggerOptions>, transports?: winston.transport[]): Winston {
    const defaultMeta: DefaultMeta = {module: options.module || ""};
    return winston.createLogger({
      level: options.level,
      defaultMeta,
      format: getFormat(options),
      transports,
      exitOnError: false,
      levels: logLevelNum,
    });
  }

  error(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.debug, message, context, error);
  }

  child(options: LoggerChildOpts): WinstonLogger {
    return new WinstonLogger(this.createChildWinston(this.getChildModule(options)));
  }

  protected getChildModule(options: LoggerChildOpts): string {
    const parentMeta = this.winston.defaultMeta as DefaultMeta | undefined;
    return [parentMeta?.module, options.module].filter(Boolean).join("/");
  }

  protected createChildWinston(childModule: string): Winston {
    const defaultMeta: DefaultMeta = {module: childModule};

    // winston's own child() merges meta with parent precedence, so 'module' could not be overwritten.
    // Clone the instance through its prototype and replace defaultMeta instead.
    const childWinston = Object.create(this.winston) as typeof this.winston;
    childWinston.defaultMeta = defaultMeta;
    return childWinston;
  }

  private createLogEntry(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // Calling `winston.info(message, context, error)` would trigger the "splat" path,
    // pass a single info object so the formatter receives context and error untouched
    this.winston.log(level, {message, context, error});
  }
}
