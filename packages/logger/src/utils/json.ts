import {PrestakeError, mapValues, toHex} from "@prestake/utils";

export type Json = string | number | boolean | null | undefined | Json[] | {[key: string]: Json};

/**
 * Renders any log Context to JSON up to one level of depth.
 *
 * Nested objects render as `[object]`, consumers should send pre-formatted data if they require nesting.
 */
export function logCtxToJson(arg: unknown, recursive = false): Json {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return "null";

      if (arg instanceof Uint8Array) {
        return toHex(arg);
      }

      if (recursive) {
        return "[object]";
      }

      if (arg instanceof Error) {
        const metadata: {[key: string]: Json} =
          arg instanceof PrestakeError ? mapValues(arg.getMetadata(), (value): Json => value) : {message: arg.message};
        if (arg.stack) metadata.stack = arg.stack;
        return metadata;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToJson(item, true));
      }

      return Object.fromEntries(Object.entries(arg).map(([key, item]) => [key, logCtxToJson(item, true)]));
    }

    case "number":
    case "string":
    case "boolean":
    case "undefined":
      return arg;
  }
}

/**
 * Renders any log Context to a string up to one level of depth.
 */
export function logCtxToString(arg: unknown, recursive = false): string {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return "null";

      if (arg instanceof Uint8Array) {
        return toHex(arg);
      }

      if (recursive) {
        return "[object]";
      }

      if (arg instanceof Error) {
        const metadata = arg instanceof PrestakeError ? logCtxToString(arg.getMetadata()) : arg.message;
        return `${metadata}\n${arg.stack || ""}`;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToString(item, true)).join(", ");
      }

      return Object.entries(arg)
        .map(([key, value]) => `${key}=${logCtxToString(value, true)}`)
        .join(", ");
    }

    case "number":
    case "string":
    case "boolean":
    case "undefined":
    default:
      return String(arg);
  }
}
