import winston from "winston";
import type {Logger as Winston} from "winston";
import {LoggerChildOpts, LogLevel, TimestampFormat} from "./interface.js";
import {LoggerWithChild, WinstonLogger} from "./winston.js";

export type LoggerNodeOpts = {
  level: LogLevel;
  /**
   * Enable file output transport if set
   */
  file?: {
    filepath: string;
    /**
     * Log level for file output transport
     */
    level: LogLevel;
  };
  /**
   * Module prefix for all logs
   */
  module?: string;
  /**
   * Rendering format for logs, defaults to "human"
   */
  format?: "human" | "json";
  timestampFormat?: TimestampFormat;
};

export type LoggerNode = Omit<LoggerWithChild, "child"> & {
  toOpts(): LoggerNodeOpts;
  child(opts: LoggerChildOpts): LoggerNode;
};

/**
 * Setup a logger writing to stdout and, if configured, to a file
 */
export function getNodeLogger(opts: LoggerNodeOpts): LoggerNode {
  return WinstonLoggerNode.fromNewTransports(opts);
}

function getNodeLoggerTransports(opts: LoggerNodeOpts): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: opts.level,
      handleExceptions: true,
    }),
  ];

  if (opts.file) {
    transports.push(
      new winston.transports.File({
        level: opts.file.level,
        filename: opts.file.filepath,
        handleExceptions: true,
      })
    );
  }

  return transports;
}

export class WinstonLoggerNode extends WinstonLogger implements LoggerNode {
  constructor(
    winston: Winston,
    private readonly opts: LoggerNodeOpts
  ) {
    super(winston);
  }

  static fromNewTransports(opts: LoggerNodeOpts): WinstonLoggerNode {
    const transports = getNodeLoggerTransports(opts);
    return new WinstonLoggerNode(WinstonLoggerNode.createWinstonInstance(opts, transports), opts);
  }

  override child(opts: LoggerChildOpts): WinstonLoggerNode {
    const childModule = this.getChildModule(opts);
    return new WinstonLoggerNode(this.createChildWinston(childModule), {...this.opts, module: childModule});
  }

  toOpts(): LoggerNodeOpts {
    return this.opts;
  }
}
