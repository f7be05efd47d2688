import {EventEmitter} from "node:events";
import type {StrictEventEmitter} from "strict-event-emitter-types";
import {Address} from "@prestake/utils";

/**
 * Signals for off-system observers. Every signal is emitted after the state change it reports.
 */
export enum BatchDepositEvent {
  /** Deposit data appended to a beneficiary's queue */
  added = "depositData:added",
  /** A queued record overwritten in place */
  edited = "depositData:edited",
  /** Records removed from a queue by the owner */
  deleted = "depositData:deleted",
  /** A beneficiary's queue consumed by its value transfer */
  deposited = "deposited",
  /** The acceptor deposits are forwarded to, emitted once at construction */
  acceptorBound = "acceptorBound",
  paused = "paused",
  unpaused = "unpaused",
  ownershipTransferred = "ownershipTransferred",
}

export type BatchDepositEvents = {
  [BatchDepositEvent.added]: (beneficiary: Address, count: number) => void;
  [BatchDepositEvent.edited]: (beneficiary: Address, index: number) => void;
  [BatchDepositEvent.deleted]: (beneficiary: Address, count: number) => void;
  [BatchDepositEvent.deposited]: (sender: Address, count: number) => void;
  [BatchDepositEvent.acceptorBound]: (acceptorAddress: Address) => void;
  [BatchDepositEvent.paused]: (account: Address) => void;
  [BatchDepositEvent.unpaused]: (account: Address) => void;
  [BatchDepositEvent.ownershipTransferred]: (previousOwner: Address, newOwner: Address) => void;
};

export type ListenerErrorHandler = (event: BatchDepositEvent, error: Error) => void;

export class BatchDepositEventEmitter extends (EventEmitter as {
  new (): StrictEventEmitter<EventEmitter, BatchDepositEvents>;
}) {
  /** Receives errors thrown by listeners during `notify` */
  onListenerError: ListenerErrorHandler | null = null;

  /**
   * Emit a signal for a state change that already happened. Every listener runs even if an earlier one throws.
   * Listener errors go to `onListenerError`; without a handler the first one is rethrown after all listeners ran.
   */
  notify<E extends BatchDepositEvent>(event: E, ...args: Parameters<BatchDepositEvents[E]>): void {
    let firstError: Error | null = null;
    for (const listener of this.rawListeners(event)) {
      try {
        listener.apply(this, args);
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e));
        if (this.onListenerError) {
          this.onListenerError(event, error);
        } else {
          firstError ??= error;
        }
      }
    }
    if (firstError) {
      throw firstError;
    }
  }
}
