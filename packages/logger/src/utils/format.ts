import winston from "winston";
import {PrestakeError, isEmptyObject} from "@prestake/utils";
import {LoggerOptions, TimestampFormatCode} from "../interface.js";
import {logCtxToJson, logCtxToString} from "./json.js";

const {format} = winston;

type Format = ReturnType<typeof winston.format.combine>;
type TransformableInfo = Parameters<Parameters<typeof winston.format.printf>[0]>[0];

export function getFormat(opts: LoggerOptions): Format {
  switch (opts.format) {
    case "json":
      return jsonLogFormat(opts);
    case "human":
    default:
      return humanReadableLogFormat(opts);
  }
}

function humanReadableLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden
      ? []
      : [format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})]),
    format.colorize(),
    format.printf(humanReadableTemplateFn)
  );
}

function jsonLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden ? [] : [format.timestamp()]),
    format((info) => {
      info.context = logCtxToJson(info.context);
      info.error = logCtxToJson(info.error);
      return info;
    })(),
    format.json()
  );
}

/**
 * Winston template function print a human readable string given a log object
 */
function humanReadableTemplateFn(info: TransformableInfo): string {
  const paddingBetweenInfo = 30;

  const infoString = typeof info.module === "string" ? info.module : "";
  const infoPad = paddingBetweenInfo - infoString.length;

  let str = "";

  if (typeof info.timestamp === "string") str += info.timestamp;

  str += `[${infoString}] ${info.level.padStart(infoPad)}: ${String(info.message)}`;

  const {context, error} = info;
  if (context !== undefined && !isEmptyObject(context)) str += " " + logCtxToString(context);
  if (error !== undefined) {
    str +=
      // PrestakeError renders like context, any other error is separated from the message
      (error instanceof PrestakeError ? (isEmptyObject(context) || context === undefined ? " " : ", ") : " - ") +
      logCtxToString(error);
  }

  return str;
}
