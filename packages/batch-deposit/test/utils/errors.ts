import {expect} from "vitest";
import {PrestakeError} from "@prestake/utils";

type AnyPrestakeError = PrestakeError<{code: string}>;

export function expectThrowsPrestakeError(fn: () => unknown, expectedErr: AnyPrestakeError | string): void {
  let value: unknown;
  try {
    value = fn();
  } catch (e) {
    expectPrestakeErrorMatches(e, expectedErr);
    return;
  }
  throw Error(`Expected fn to throw but returned value: \n\n\t${JSON.stringify(value, jsonReplacer, 2)}`);
}

export async function expectRejectedWithPrestakeError(
  promise: Promise<unknown>,
  expectedErr: AnyPrestakeError | string
): Promise<void> {
  let value: unknown;
  try {
    value = await promise;
  } catch (e) {
    expectPrestakeErrorMatches(e, expectedErr);
    return;
  }
  throw Error(`Expected promise to reject but returned value: \n\n\t${JSON.stringify(value, jsonReplacer, 2)}`);
}

/**
 * Compare the error code only when given a string, else the whole metadata
 */
function expectPrestakeErrorMatches(err: unknown, expectedErr: AnyPrestakeError | string): void {
  if (!(err instanceof PrestakeError)) {
    throw Error(`err not instanceof PrestakeError: ${err instanceof Error ? err.stack : String(err)}`);
  }
  if (typeof expectedErr === "string") {
    expect(err.type.code).toBe(expectedErr);
  } else {
    expect(err.getMetadata()).toEqual(expectedErr.getMetadata());
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
