import {Registry} from "prom-client";
import {DepositRecord, StakerData} from "@prestake/types";
import {Address, Logger, formatWeiToEth} from "@prestake/utils";
import {AccessGate} from "./accessGate.js";
import {DepositAcceptor} from "./acceptor/interface.js";
import {BatchDepositError} from "./errors.js";
import {BatchDepositEvent, BatchDepositEventEmitter} from "./events.js";
import {BatchEditor} from "./batchEditor.js";
import {DepositReceipt, DepositTrigger} from "./depositTrigger.js";
import {BatchDepositMetrics, createBatchDepositMetrics} from "./metrics.js";
import {BatchDepositOpts, defaultBatchDepositOpts} from "./options.js";
import {RecordStore} from "./recordStore.js";
import {JobQueue} from "./util/queue.js";
import {parseAddress} from "./util/address.js";

export interface BatchDepositModules {
  acceptor: DepositAcceptor;
  logger: Logger;
  /** Listen on it before construction to observe `acceptorBound` */
  emitter?: BatchDepositEventEmitter;
  metricsRegister: Registry | null;
}

export type BatchDepositInitOpts = Partial<BatchDepositOpts> & Pick<BatchDepositOpts, "owner">;

/**
 * Pre-staged validator deposits. The owner queues deposit records per beneficiary,
 * each beneficiary then deposits its whole queue by transferring exactly `count * collateral`.
 *
 * Every call that changes state runs as one job of a FIFO queue, in call order.
 */
export class BatchDeposit {
  readonly emitter: BatchDepositEventEmitter;

  private readonly logger: Logger;
  private readonly metrics: BatchDepositMetrics | null;
  private readonly acceptor: DepositAcceptor;
  private readonly store = new RecordStore();
  private readonly gate: AccessGate;
  private readonly editor: BatchEditor;
  private readonly trigger: DepositTrigger;
  private readonly jobQueue: JobQueue;
  private readonly controller = new AbortController();
  private readonly opts: BatchDepositOpts;

  constructor(modules: BatchDepositModules, opts: BatchDepositInitOpts) {
    this.opts = {...defaultBatchDepositOpts, ...opts};
    this.logger = modules.logger;
    this.acceptor = modules.acceptor;
    this.emitter = modules.emitter ?? new BatchDepositEventEmitter();
    this.emitter.onListenerError ??= (event, e) => {
      this.logger.error("Batch deposit event listener failed", {event}, e);
    };
    this.metrics = modules.metricsRegister ? createBatchDepositMetrics(modules.metricsRegister) : null;

    this.gate = new AccessGate(this.emitter, this.opts.owner);
    this.editor = new BatchEditor({store: this.store, gate: this.gate, emitter: this.emitter}, this.opts);
    this.trigger = new DepositTrigger(
      {
        store: this.store,
        gate: this.gate,
        acceptor: this.acceptor,
        emitter: this.emitter,
        logger: this.logger,
        metrics: this.metrics,
      },
      this.opts
    );
    this.jobQueue = new JobQueue({queueSize: this.opts.maxQueuedCalls, signal: this.controller.signal});

    this.emitter.notify(BatchDepositEvent.acceptorBound, this.acceptor.address);
    this.logger.info("Batch deposit ready", {
      owner: this.gate.owner,
      acceptor: this.acceptor.address,
      collateralEth: formatWeiToEth(this.opts.collateral),
    });
  }

  get owner(): Address {
    return this.gate.owner;
  }

  get paused(): boolean {
    return this.gate.paused;
  }

  get acceptorAddress(): Address {
    return this.acceptor.address;
  }

  /** Copy of the beneficiary's queue as four parallel sequences */
  getStakerData(beneficiary: string): StakerData {
    return this.store.get(parseAddress(beneficiary));
  }

  async addDepositData(caller: string, beneficiary: string, data: StakerData): Promise<void> {
    return this.jobQueue.enqueueJob(async () => {
      const count = this.editor.addDepositData(caller, beneficiary, data);
      this.metrics?.recordsAdded.inc(count);
      this.onQueuesChanged();
      this.logger.verbose("Added deposit data", {beneficiary, count});
    });
  }

  async editDepositData(caller: string, beneficiary: string, record: DepositRecord, index: number): Promise<void> {
    return this.jobQueue.enqueueJob(async () => {
      this.editor.editDepositData(caller, beneficiary, record, index);
      this.logger.verbose("Edited deposit data", {beneficiary, index});
    });
  }

  async deleteLastNDepositEntries(caller: string, beneficiary: string, n: number): Promise<void> {
    return this.jobQueue.enqueueJob(async () => {
      this.editor.deleteLastNDepositEntries(caller, beneficiary, n);
      this.metrics?.recordsDeleted.inc(n);
      this.onQueuesChanged();
      this.logger.verbose("Deleted last deposit entries", {beneficiary, count: n});
    });
  }

  async deleteAllEntries(caller: string, beneficiary: string): Promise<void> {
    return this.jobQueue.enqueueJob(async () => {
      const count = this.editor.deleteAllEntries(caller, beneficiary);
      this.metrics?.recordsDeleted.inc(count);
      this.onQueuesChanged();
      this.logger.verbose("Deleted all deposit entries", {beneficiary, count});
    });
  }

  async pause(caller: string): Promise<void> {
    return this.jobQueue.enqueueJob(async () => {
      this.gate.pause(caller);
      this.logger.verbose("Paused deposits", {account: caller});
    });
  }

  async unpause(caller: string): Promise<void> {
    return this.jobQueue.enqueueJob(async () => {
      this.gate.unpause(caller);
      this.logger.verbose("Unpaused deposits", {account: caller});
    });
  }

  async transferOwnership(caller: string, newOwner: string): Promise<void> {
    return this.jobQueue.enqueueJob(async () => {
      this.gate.transferOwnership(caller, newOwner);
      this.logger.verbose("Transferred ownership", {previousOwner: caller, newOwner});
    });
  }

  /**
   * Value transfer of `value` wei from `sender`, depositing its whole queue
   */
  async receive(sender: string, value: bigint): Promise<DepositReceipt> {
    return this.jobQueue.enqueueJob(async () => {
      try {
        const receipt = await this.trigger.receive(sender, value);
        this.onQueuesChanged();
        this.logger.info("Deposited validators", {
          sender: receipt.sender,
          count: receipt.count,
          valueEth: formatWeiToEth(receipt.value),
        });
        return receipt;
      } catch (e) {
        if (e instanceof BatchDepositError) {
          this.logger.warn("Rejected value transfer", {sender, value}, e);
        }
        throw e;
      }
    });
  }

  /**
   * Reject every queued and future call. Calls already running complete.
   */
  close(): void {
    this.controller.abort();
  }

  private onQueuesChanged(): void {
    this.metrics?.recordsQueued.set(this.store.totalLength());
  }
}
