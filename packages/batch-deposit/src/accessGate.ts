import {Address, isZeroAddress} from "@prestake/utils";
import {
  BatchDepositError,
  BatchDepositErrorCode,
  InvalidArgumentReason,
  InvalidStateReason,
  UnauthorizedReason,
} from "./errors.js";
import {BatchDepositEvent, BatchDepositEventEmitter} from "./events.js";
import {parseAddress} from "./util/address.js";

/**
 * Single owner capability plus a pause switch that only guards the deposit trigger
 */
export class AccessGate {
  private _owner: Address;
  private _paused = false;

  constructor(
    private readonly emitter: BatchDepositEventEmitter,
    owner: Address
  ) {
    this._owner = parseAddress(owner);
  }

  get owner(): Address {
    return this._owner;
  }

  get paused(): boolean {
    return this._paused;
  }

  /**
   * Returns the normalized caller
   */
  requireOwner(caller: string): Address {
    const account = parseAddress(caller);
    if (account !== this._owner) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.UNAUTHORIZED,
        reason: UnauthorizedReason.NOT_OWNER,
        caller: account,
      });
    }
    return account;
  }

  whenNotPaused(): void {
    if (this._paused) {
      throw new BatchDepositError({code: BatchDepositErrorCode.INVALID_STATE, reason: InvalidStateReason.PAUSED});
    }
  }

  pause(caller: string): void {
    const account = this.requireOwner(caller);
    this.whenNotPaused();
    this._paused = true;
    this.emitter.notify(BatchDepositEvent.paused, account);
  }

  unpause(caller: string): void {
    const account = this.requireOwner(caller);
    if (!this._paused) {
      throw new BatchDepositError({code: BatchDepositErrorCode.INVALID_STATE, reason: InvalidStateReason.NOT_PAUSED});
    }
    this._paused = false;
    this.emitter.notify(BatchDepositEvent.unpaused, account);
  }

  transferOwnership(caller: string, newOwner: string): void {
    const previousOwner = this.requireOwner(caller);
    const account = parseAddress(newOwner);
    if (isZeroAddress(account)) {
      throw new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.INVALID_ADDRESS,
        address: account,
      });
    }
    this._owner = account;
    this.emitter.notify(BatchDepositEvent.ownershipTransferred, previousOwner, account);
  }
}
