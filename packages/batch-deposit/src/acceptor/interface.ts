import {DepositRecord} from "@prestake/types";
import {Address} from "@prestake/utils";

/**
 * External service that registers validators from deposit records
 */
export interface DepositAcceptor {
  readonly address: Address;
  /** Start staging submissions. Nothing is registered until the batch is committed. */
  openBatch(): DepositAcceptorBatch;
}

export interface DepositAcceptorBatch {
  /** Stage one deposit of `value` wei. Rejects on any malformed input. */
  submit(record: DepositRecord, value: bigint): Promise<void>;
  /** Register every staged submission, in submission order */
  commit(): Promise<void>;
  /** Discard every staged submission */
  abort(): Promise<void>;
}
