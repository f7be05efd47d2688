import {
  DEPOSIT_COLLATERAL_GWEI,
  DEPOSIT_DATA_ROOT_LENGTH,
  PUBKEY_LENGTH,
  SIGNATURE_LENGTH,
  WITHDRAWAL_CREDENTIALS_LENGTH,
} from "@prestake/params";
import {DepositRecord, StakerData, computeDepositDataRoot, recordsToStakerData} from "@prestake/types";
import {FileFormat, PrestakeError, byteArrayEquals, fromHex, isPlainObject, readFile, toHex} from "@prestake/utils";

export enum DepositDataFileErrorCode {
  /** Document is neither a list of deposit entries nor an object of parallel lists */
  INVALID_FORMAT = "DEPOSIT_DATA_FILE_ERROR_INVALID_FORMAT",
  INVALID_HEX = "DEPOSIT_DATA_FILE_ERROR_INVALID_HEX",
  INVALID_FIELD_LENGTH = "DEPOSIT_DATA_FILE_ERROR_INVALID_FIELD_LENGTH",
  /** Entry deposits an amount other than the collateral */
  AMOUNT_MISMATCH = "DEPOSIT_DATA_FILE_ERROR_AMOUNT_MISMATCH",
  /** Entry's deposit_data_root is not the root of its fields */
  ROOT_MISMATCH = "DEPOSIT_DATA_FILE_ERROR_ROOT_MISMATCH",
}

export type DepositDataFileErrorType =
  | {code: DepositDataFileErrorCode.INVALID_FORMAT; reason: string}
  | {code: DepositDataFileErrorCode.INVALID_HEX; field: string; index: number}
  | {
      code: DepositDataFileErrorCode.INVALID_FIELD_LENGTH;
      field: string;
      index: number;
      length: number;
      expected: number;
    }
  | {code: DepositDataFileErrorCode.AMOUNT_MISMATCH; index: number; amount: string; expected: number}
  | {code: DepositDataFileErrorCode.ROOT_MISMATCH; index: number; expected: string; actual: string};

export class DepositDataFileError extends PrestakeError<DepositDataFileErrorType> {}

export type DepositDataFileOpts = {
  /** Amount every entry must deposit, in gwei */
  collateralGwei?: number;
};

/**
 * Load deposit data for one beneficiary from a JSON file
 */
export function readDepositDataFile(filepath: string, opts: DepositDataFileOpts = {}): StakerData {
  return parseDepositDataJson(readFile(filepath, [FileFormat.json]), opts);
}

/**
 * Parse deposit data in either shape:
 * - a list of entries as written by validator deposit tooling
 *   (`pubkey`, `withdrawal_credentials`, `amount`, `signature`, `deposit_data_root`, other keys ignored)
 * - an object of parallel lists (`pubkey`, `withdrawal_credentials`, `signatures`, `deposit_data_roots`)
 *
 * Every root is checked against the `DepositData` root of its entry at the collateral amount.
 */
export function parseDepositDataJson(json: unknown, opts: DepositDataFileOpts = {}): StakerData {
  const collateralGwei = opts.collateralGwei ?? DEPOSIT_COLLATERAL_GWEI;
  const records = Array.isArray(json)
    ? json.map((entry, i) => parseDepositDataEntry(entry, i, collateralGwei))
    : parseParallelLists(json);

  records.forEach((record, i) => assertDepositDataRoot(record, i, collateralGwei));
  return recordsToStakerData(records);
}

function parseDepositDataEntry(entry: unknown, index: number, collateralGwei: number): DepositRecord {
  if (!isPlainObject(entry)) {
    throw new DepositDataFileError({
      code: DepositDataFileErrorCode.INVALID_FORMAT,
      reason: `entry ${index} is not an object`,
    });
  }
  const amount = String(entry.amount);
  if (amount !== String(collateralGwei)) {
    throw new DepositDataFileError({
      code: DepositDataFileErrorCode.AMOUNT_MISMATCH,
      index,
      amount,
      expected: collateralGwei,
    });
  }
  return {
    pubkey: parseBytes(entry.pubkey, "pubkey", index, PUBKEY_LENGTH),
    withdrawalCredentials: parseBytes(
      entry.withdrawal_credentials,
      "withdrawal_credentials",
      index,
      WITHDRAWAL_CREDENTIALS_LENGTH
    ),
    signature: parseBytes(entry.signature, "signature", index, SIGNATURE_LENGTH),
    depositDataRoot: parseBytes(entry.deposit_data_root, "deposit_data_root", index, DEPOSIT_DATA_ROOT_LENGTH),
  };
}

function parseParallelLists(json: unknown): DepositRecord[] {
  if (!isPlainObject(json)) {
    throw new DepositDataFileError({
      code: DepositDataFileErrorCode.INVALID_FORMAT,
      reason: "expected a list or an object",
    });
  }
  const pubkeys = getList(json, "pubkey");
  const withdrawalCredentials = getList(json, "withdrawal_credentials");
  const signatures = getList(json, "signatures");
  const depositDataRoots = getList(json, "deposit_data_roots");
  if (
    withdrawalCredentials.length !== pubkeys.length ||
    signatures.length !== pubkeys.length ||
    depositDataRoots.length !== pubkeys.length
  ) {
    throw new DepositDataFileError({code: DepositDataFileErrorCode.INVALID_FORMAT, reason: "lists differ in length"});
  }
  return pubkeys.map((pubkey, i) => ({
    pubkey: parseBytes(pubkey, "pubkey", i, PUBKEY_LENGTH),
    withdrawalCredentials: parseBytes(
      withdrawalCredentials[i],
      "withdrawal_credentials",
      i,
      WITHDRAWAL_CREDENTIALS_LENGTH
    ),
    signature: parseBytes(signatures[i], "signatures", i, SIGNATURE_LENGTH),
    depositDataRoot: parseBytes(depositDataRoots[i], "deposit_data_roots", i, DEPOSIT_DATA_ROOT_LENGTH),
  }));
}

function getList(json: Record<string, unknown>, key: string): unknown[] {
  const value = json[key];
  if (!Array.isArray(value)) {
    throw new DepositDataFileError({code: DepositDataFileErrorCode.INVALID_FORMAT, reason: `${key} is not a list`});
  }
  return value;
}

function parseBytes(value: unknown, field: string, index: number, expected: number): Uint8Array {
  if (typeof value !== "string") {
    throw new DepositDataFileError(
      {code: DepositDataFileErrorCode.INVALID_HEX, field, index},
      `${field} is not a string`
    );
  }
  let bytes: Uint8Array;
  try {
    bytes = fromHex(value);
  } catch (e) {
    throw new DepositDataFileError(
      {code: DepositDataFileErrorCode.INVALID_HEX, field, index},
      e instanceof Error ? e.message : undefined
    );
  }
  if (bytes.length !== expected) {
    throw new DepositDataFileError({
      code: DepositDataFileErrorCode.INVALID_FIELD_LENGTH,
      field,
      index,
      length: bytes.length,
      expected,
    });
  }
  return bytes;
}

function assertDepositDataRoot(record: DepositRecord, index: number, collateralGwei: number): void {
  const {pubkey, withdrawalCredentials, signature, depositDataRoot} = record;
  const expected = computeDepositDataRoot({pubkey, withdrawalCredentials, amount: collateralGwei, signature});
  if (!byteArrayEquals(expected, depositDataRoot)) {
    throw new DepositDataFileError({
      code: DepositDataFileErrorCode.ROOT_MISMATCH,
      index,
      expected: toHex(expected),
      actual: toHex(depositDataRoot),
    });
  }
}
