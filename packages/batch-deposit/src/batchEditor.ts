import {
  DEPOSIT_DATA_ROOT_LENGTH,
  PUBKEY_LENGTH,
  SIGNATURE_LENGTH,
  WITHDRAWAL_CREDENTIALS_LENGTH,
} from "@prestake/params";
import {DepositRecord, StakerData} from "@prestake/types";
import {Address} from "@prestake/utils";
import {AccessGate} from "./accessGate.js";
import {
  BatchDepositError,
  BatchDepositErrorCode,
  DepositRecordField,
  InvalidArgumentReason,
} from "./errors.js";
import {BatchDepositEvent, BatchDepositEventEmitter} from "./events.js";
import {BatchDepositOpts} from "./options.js";
import {RecordStore} from "./recordStore.js";
import {parseAddress} from "./util/address.js";

export type BatchEditorModules = {
  store: RecordStore;
  gate: AccessGate;
  emitter: BatchDepositEventEmitter;
};

export type BatchEditorOpts = Pick<BatchDepositOpts, "maxDepositDataPerAdd" | "validateRecordsOnAdd">;

const fieldLengths: Record<DepositRecordField, number> = {
  pubkey: PUBKEY_LENGTH,
  withdrawalCredentials: WITHDRAWAL_CREDENTIALS_LENGTH,
  signature: SIGNATURE_LENGTH,
  depositDataRoot: DEPOSIT_DATA_ROOT_LENGTH,
};

/**
 * Owner-only edits of the beneficiary queues. Every check runs before the store is touched.
 */
export class BatchEditor {
  private readonly store: RecordStore;
  private readonly gate: AccessGate;
  private readonly emitter: BatchDepositEventEmitter;

  constructor(
    modules: BatchEditorModules,
    private readonly opts: BatchEditorOpts
  ) {
    this.store = modules.store;
    this.gate = modules.gate;
    this.emitter = modules.emitter;
  }

  /**
   * Append `data` to the beneficiary's queue in input order. Returns the number of records added.
   */
  addDepositData(caller: string, beneficiary: string, data: StakerData): number {
    this.gate.requireOwner(caller);
    const account = parseAddress(beneficiary);

    const {pubkeys, withdrawalCredentials, signatures, depositDataRoots} = data;
    const count = pubkeys.length;
    if (
      withdrawalCredentials.length !== count ||
      signatures.length !== count ||
      depositDataRoots.length !== count
    ) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.LENGTH_MISMATCH,
        pubkeys: count,
        withdrawalCredentials: withdrawalCredentials.length,
        signatures: signatures.length,
        depositDataRoots: depositDataRoots.length,
      });
    }
    if (count === 0) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.EMPTY_BATCH,
      });
    }
    if (count > this.opts.maxDepositDataPerAdd) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.BATCH_TOO_LARGE,
        count,
        limit: this.opts.maxDepositDataPerAdd,
      });
    }

    const records: DepositRecord[] = pubkeys.map((pubkey, i) => ({
      pubkey,
      withdrawalCredentials: withdrawalCredentials[i],
      signature: signatures[i],
      depositDataRoot: depositDataRoots[i],
    }));
    records.forEach((record, i) => {
      if (this.opts.validateRecordsOnAdd) {
        assertRecordFieldLengths(record, i);
      } else {
        assertFieldLength(record, "depositDataRoot", i);
      }
    });

    for (const record of records) {
      this.store.append(account, record);
    }
    this.emitter.notify(BatchDepositEvent.added, account, count);
    return count;
  }

  /**
   * Overwrite the record at `index` of the beneficiary's queue
   */
  editDepositData(caller: string, beneficiary: string, record: DepositRecord, index: number): void {
    this.gate.requireOwner(caller);
    const account = parseAddress(beneficiary);

    const length = this.store.length(account);
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new BatchDepositError({code: BatchDepositErrorCode.INDEX_OUT_OF_RANGE, index, length});
    }
    assertRecordFieldLengths(record, index);

    this.store.setAt(account, index, record);
    this.emitter.notify(BatchDepositEvent.edited, account, index);
  }

  /**
   * Remove the `n` most recent records of the beneficiary's queue
   */
  deleteLastNDepositEntries(caller: string, beneficiary: string, n: number): void {
    this.gate.requireOwner(caller);
    const account = parseAddress(beneficiary);

    const length = this.store.length(account);
    if (!Number.isInteger(n) || n <= 0 || n > length) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.INVALID_DELETE_COUNT,
        count: n,
        length,
      });
    }

    this.store.popLastN(account, n);
    this.emitter.notify(BatchDepositEvent.deleted, account, n);
  }

  /**
   * Empty the beneficiary's queue, an empty queue included. Returns the number of records removed.
   */
  deleteAllEntries(caller: string, beneficiary: string): number {
    this.gate.requireOwner(caller);
    const account: Address = parseAddress(beneficiary);

    const count = this.store.clear(account);
    this.emitter.notify(BatchDepositEvent.deleted, account, count);
    return count;
  }
}

function assertRecordFieldLengths(record: DepositRecord, index: number): void {
  assertFieldLength(record, "pubkey", index);
  assertFieldLength(record, "withdrawalCredentials", index);
  assertFieldLength(record, "signature", index);
  assertFieldLength(record, "depositDataRoot", index);
}

function assertFieldLength(record: DepositRecord, field: DepositRecordField, index: number): void {
  const length = record[field].length;
  const expected = fieldLengths[field];
  if (length !== expected) {
    throw new BatchDepositError({
      code: BatchDepositErrorCode.INVALID_ARGUMENT,
      reason: InvalidArgumentReason.INVALID_FIELD_LENGTH,
      field,
      index,
      length,
      expected,
    });
  }
}
