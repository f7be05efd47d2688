import {DepositRecord, StakerData, getEmptyStakerData} from "@prestake/types";
import {Address} from "@prestake/utils";
import {BatchDepositError, BatchDepositErrorCode} from "./errors.js";

/**
 * Owns every beneficiary's queue. Records are copied in on write and out on read,
 * so nothing outside the store aliases queued bytes.
 *
 * Addresses must be normalized by the caller.
 */
export class RecordStore {
  private readonly queues = new Map<Address, StakerData>();
  private total = 0;

  /** Copy of the beneficiary's queue, empty if it has none */
  get(beneficiary: Address): StakerData {
    const queue = this.queues.get(beneficiary);
    if (!queue) return getEmptyStakerData();
    return {
      pubkeys: queue.pubkeys.map(copy),
      withdrawalCredentials: queue.withdrawalCredentials.map(copy),
      signatures: queue.signatures.map(copy),
      depositDataRoots: queue.depositDataRoots.map(copy),
    };
  }

  length(beneficiary: Address): number {
    return this.queues.get(beneficiary)?.pubkeys.length ?? 0;
  }

  /** Records queued across all beneficiaries */
  totalLength(): number {
    return this.total;
  }

  /** Copies of the beneficiary's records, in queue order */
  records(beneficiary: Address): DepositRecord[] {
    const queue = this.queues.get(beneficiary);
    if (!queue) return [];
    return queue.pubkeys.map((pubkey, i) => ({
      pubkey: copy(pubkey),
      withdrawalCredentials: copy(queue.withdrawalCredentials[i]),
      signature: copy(queue.signatures[i]),
      depositDataRoot: copy(queue.depositDataRoots[i]),
    }));
  }

  append(beneficiary: Address, record: DepositRecord): void {
    let queue = this.queues.get(beneficiary);
    if (!queue) {
      queue = getEmptyStakerData();
      this.queues.set(beneficiary, queue);
    }
    queue.pubkeys.push(copy(record.pubkey));
    queue.withdrawalCredentials.push(copy(record.withdrawalCredentials));
    queue.signatures.push(copy(record.signature));
    queue.depositDataRoots.push(copy(record.depositDataRoot));
    this.total++;
  }

  setAt(beneficiary: Address, index: number, record: DepositRecord): void {
    const queue = this.queues.get(beneficiary);
    const length = queue?.pubkeys.length ?? 0;
    if (!queue || !Number.isInteger(index) || index < 0 || index >= length) {
      throw new BatchDepositError({code: BatchDepositErrorCode.INDEX_OUT_OF_RANGE, index, length});
    }
    queue.pubkeys[index] = copy(record.pubkey);
    queue.withdrawalCredentials[index] = copy(record.withdrawalCredentials);
    queue.signatures[index] = copy(record.signature);
    queue.depositDataRoots[index] = copy(record.depositDataRoot);
  }

  /** Remove the `n` most recent records */
  popLastN(beneficiary: Address, n: number): void {
    const queue = this.queues.get(beneficiary);
    const length = queue?.pubkeys.length ?? 0;
    if (!queue || n > length) {
      throw new BatchDepositError({code: BatchDepositErrorCode.INDEX_OUT_OF_RANGE, index: length - n, length});
    }
    const newLength = length - n;
    queue.pubkeys.length = newLength;
    queue.withdrawalCredentials.length = newLength;
    queue.signatures.length = newLength;
    queue.depositDataRoots.length = newLength;
    this.total -= n;
    if (newLength === 0) this.queues.delete(beneficiary);
  }

  /** Drop the beneficiary's queue, returns the number of records removed */
  clear(beneficiary: Address): number {
    const length = this.length(beneficiary);
    this.queues.delete(beneficiary);
    this.total -= length;
    return length;
  }
}

function copy(bytes: Uint8Array): Uint8Array {
  return bytes.slice();
}
