export type PrestakeErrorMetaData = Record<string, string | number | null>;
export type PrestakeErrorObject = PrestakeErrorMetaData & {stack: string};

/**
 * Generic error with attached metadata. `type.code` doubles as the message when none is given.
 */
export class PrestakeError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): PrestakeErrorMetaData {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): PrestakeErrorObject {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}

/**
 * Extend an existing error by appending a string to its `e.message`
 */
export function extendError(e: Error, appendMessage: string): Error {
  e.message = `${e.message} - ${appendMessage}`;
  return e;
}
