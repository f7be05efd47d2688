import {Address, Logger} from "@prestake/utils";
import {AccessGate} from "./accessGate.js";
import {DepositAcceptor, DepositAcceptorBatch} from "./acceptor/interface.js";
import {
  BatchDepositError,
  BatchDepositErrorCode,
  InvalidArgumentReason,
  UnauthorizedReason,
} from "./errors.js";
import {BatchDepositEvent, BatchDepositEventEmitter} from "./events.js";
import {BatchDepositMetrics, TriggerOutcome} from "./metrics.js";
import {BatchDepositOpts} from "./options.js";
import {RecordStore} from "./recordStore.js";
import {parseAddress} from "./util/address.js";

export type DepositTriggerModules = {
  store: RecordStore;
  gate: AccessGate;
  acceptor: DepositAcceptor;
  emitter: BatchDepositEventEmitter;
  logger: Logger;
  metrics: BatchDepositMetrics | null;
};

export type DepositTriggerOpts = Pick<BatchDepositOpts, "collateral" | "maxDepositsPerTrigger">;

export type DepositReceipt = {
  sender: Address;
  /** Records forwarded to the acceptor */
  count: number;
  /** Total value forwarded, in wei */
  value: bigint;
};

/**
 * Turns a beneficiary's value transfer into one forwarded deposit per queued record
 */
export class DepositTrigger {
  private readonly store: RecordStore;
  private readonly gate: AccessGate;
  private readonly acceptor: DepositAcceptor;
  private readonly emitter: BatchDepositEventEmitter;
  private readonly logger: Logger;
  private readonly metrics: BatchDepositMetrics | null;

  constructor(
    modules: DepositTriggerModules,
    private readonly opts: DepositTriggerOpts
  ) {
    this.store = modules.store;
    this.gate = modules.gate;
    this.acceptor = modules.acceptor;
    this.emitter = modules.emitter;
    this.logger = modules.logger;
    this.metrics = modules.metrics;
  }

  async receive(sender: string, value: bigint): Promise<DepositReceipt> {
    let transfer: {account: Address; count: number};
    try {
      transfer = this.validateTransfer(sender, value);
    } catch (e) {
      this.metrics?.triggers.inc({outcome: TriggerOutcome.rejected});
      throw e;
    }
    const {account, count} = transfer;

    const records = this.store.records(account);
    const timer = this.metrics?.acceptorBatchTime.startTimer();
    const batch = this.acceptor.openBatch();
    try {
      for (const record of records) {
        await batch.submit(record, this.opts.collateral);
      }
      await batch.commit();
    } catch (e) {
      this.metrics?.triggers.inc({outcome: TriggerOutcome.acceptorError});
      this.logger.error("Acceptor rejected deposit batch", {sender: account, count}, toError(e));
      await this.abortBatch(batch, account);
      throw e;
    } finally {
      timer?.();
    }

    this.store.clear(account);
    this.metrics?.triggers.inc({outcome: TriggerOutcome.success});
    this.metrics?.validatorsDeposited.inc(count);
    this.emitter.notify(BatchDepositEvent.deposited, account, count);
    return {sender: account, count, value};
  }

  private validateTransfer(sender: string, value: bigint): {account: Address; count: number} {
    this.gate.whenNotPaused();
    const account = parseAddress(sender);

    const count = this.store.length(account);
    if (count === 0) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.UNAUTHORIZED,
        reason: UnauthorizedReason.NOT_WHITELISTED,
        caller: account,
      });
    }
    const expected = BigInt(count) * this.opts.collateral;
    if (value !== expected) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.VALUE_MISMATCH,
        value: value.toString(),
        expected: expected.toString(),
      });
    }
    if (count > this.opts.maxDepositsPerTrigger) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.TOO_MANY_DEPOSITS,
        count,
        limit: this.opts.maxDepositsPerTrigger,
      });
    }
    return {account, count};
  }

  private async abortBatch(batch: DepositAcceptorBatch, sender: Address): Promise<void> {
    try {
      await batch.abort();
    } catch (e) {
      this.logger.error("Error aborting deposit batch", {sender}, toError(e));
    }
  }
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
