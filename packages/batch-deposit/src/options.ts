import {
  DEPOSIT_COLLATERAL_GWEI,
  MAX_DEPOSIT_DATA_PER_ADD,
  MAX_DEPOSITS_PER_TRIGGER,
} from "@prestake/params";
import {
  Address,
  FileFormat,
  gweiToWei,
  isPlainObject,
  isValidAddress,
  isZeroAddress,
  normalizeAddress,
  readFile,
} from "@prestake/utils";

export type BatchDepositOpts = {
  /** Account allowed to edit queues and toggle the pause switch */
  owner: Address;
  /** Value, in wei, forwarded with every record */
  collateral: bigint;
  /** Records accepted by a single add */
  maxDepositDataPerAdd: number;
  /** Records consumed by a single value transfer */
  maxDepositsPerTrigger: number;
  /** Check pubkey, credentials and signature lengths when records are added, not only when edited */
  validateRecordsOnAdd: boolean;
  /** Calls waiting for their turn, beyond which new calls are rejected */
  maxQueuedCalls: number;
};

export const defaultBatchDepositOpts: Omit<BatchDepositOpts, "owner"> = {
  collateral: gweiToWei(BigInt(DEPOSIT_COLLATERAL_GWEI)),
  maxDepositDataPerAdd: MAX_DEPOSIT_DATA_PER_ADD,
  maxDepositsPerTrigger: MAX_DEPOSITS_PER_TRIGGER,
  validateRecordsOnAdd: false,
  maxQueuedCalls: 1024,
};

const optionKeys = new Set<string>([
  "owner",
  "collateral",
  "maxDepositDataPerAdd",
  "maxDepositsPerTrigger",
  "validateRecordsOnAdd",
  "maxQueuedCalls",
]);

/**
 * Parse options from a JSON or YAML document. Scalars may be strings, as YAML's failsafe schema reads them,
 * or the JSON number / boolean. Unset options take their default.
 */
export function batchDepositOptsFromJson(json: unknown): BatchDepositOpts {
  if (!isPlainObject(json)) {
    throw Error("Batch deposit options must be an object");
  }
  for (const key of Object.keys(json)) {
    if (!optionKeys.has(key)) throw Error(`Unknown batch deposit option: ${key}`);
  }

  return {
    owner: parseOwner(json.owner),
    collateral:
      json.collateral === undefined ? defaultBatchDepositOpts.collateral : parseWei("collateral", json.collateral),
    maxDepositDataPerAdd:
      json.maxDepositDataPerAdd === undefined
        ? defaultBatchDepositOpts.maxDepositDataPerAdd
        : parsePositiveInteger("maxDepositDataPerAdd", json.maxDepositDataPerAdd),
    maxDepositsPerTrigger:
      json.maxDepositsPerTrigger === undefined
        ? defaultBatchDepositOpts.maxDepositsPerTrigger
        : parsePositiveInteger("maxDepositsPerTrigger", json.maxDepositsPerTrigger),
    validateRecordsOnAdd:
      json.validateRecordsOnAdd === undefined
        ? defaultBatchDepositOpts.validateRecordsOnAdd
        : parseBoolean("validateRecordsOnAdd", json.validateRecordsOnAdd),
    maxQueuedCalls:
      json.maxQueuedCalls === undefined
        ? defaultBatchDepositOpts.maxQueuedCalls
        : parsePositiveInteger("maxQueuedCalls", json.maxQueuedCalls),
  };
}

export function readBatchDepositOptsFile(filepath: string): BatchDepositOpts {
  return batchDepositOptsFromJson(readFile(filepath, [FileFormat.json, FileFormat.yaml, FileFormat.yml]));
}

function parseOwner(value: unknown): Address {
  if (typeof value !== "string" || !isValidAddress(value) || isZeroAddress(value)) {
    throw Error(`Invalid owner address: ${String(value)}`);
  }
  return normalizeAddress(value);
}

function parseWei(key: string, value: unknown): bigint {
  if (
    (typeof value === "string" && /^[0-9]+$/.test(value)) ||
    (typeof value === "number" && Number.isSafeInteger(value))
  ) {
    const wei = BigInt(value);
    if (wei > BigInt(0)) return wei;
  }
  throw Error(`Invalid ${key}, expected a positive integer amount of wei: ${String(value)}`);
}

function parsePositiveInteger(key: string, value: unknown): number {
  const num = typeof value === "string" && /^[0-9]+$/.test(value) ? Number(value) : value;
  if (typeof num === "number" && Number.isSafeInteger(num) && num > 0) {
    return num;
  }
  throw Error(`Invalid ${key}, expected a positive integer: ${String(value)}`);
}

function parseBoolean(key: string, value: unknown): boolean {
  if (value === true || value === "true") return true;
  if (value === false || value === "false") return false;
  throw Error(`Invalid ${key}, expected true or false: ${String(value)}`);
}
