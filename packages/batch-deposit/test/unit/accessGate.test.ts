import {describe, it, expect, beforeEach, vi} from "vitest";
import {
  AccessGate,
  BatchDepositError,
  BatchDepositErrorCode,
  BatchDepositEvent,
  BatchDepositEventEmitter,
  InvalidArgumentReason,
  InvalidStateReason,
  UnauthorizedReason,
} from "../../src/index.js";
import {expectThrowsPrestakeError} from "../utils/errors.js";

describe("AccessGate", () => {
  const owner = "0x00000000000000000000000000000000000000AA";
  const ownerLower = "0x00000000000000000000000000000000000000aa";
  const other = "0x00000000000000000000000000000000000000bb";
  let emitter: BatchDepositEventEmitter;
  let gate: AccessGate;

  beforeEach(() => {
    emitter = new BatchDepositEventEmitter();
    gate = new AccessGate(emitter, owner);
  });

  it("normalizes the owner address", () => {
    expect(gate.owner).toBe(ownerLower);
    expect(gate.requireOwner(ownerLower)).toBe(ownerLower);
  });

  it("rejects a caller other than the owner", () => {
    expectThrowsPrestakeError(
      () => gate.requireOwner(other),
      new BatchDepositError({
        code: BatchDepositErrorCode.UNAUTHORIZED,
        reason: UnauthorizedReason.NOT_OWNER,
        caller: other,
      })
    );
  });

  it("rejects a malformed caller", () => {
    expectThrowsPrestakeError(
      () => gate.requireOwner("0x1234"),
      new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.INVALID_ADDRESS,
        address: "0x1234",
      })
    );
  });

  it("pauses and unpauses, emitting both", () => {
    const onPaused = vi.fn();
    const onUnpaused = vi.fn();
    emitter.on(BatchDepositEvent.paused, onPaused);
    emitter.on(BatchDepositEvent.unpaused, onUnpaused);

    gate.pause(owner);
    expect(gate.paused).toBe(true);
    gate.unpause(owner);
    expect(gate.paused).toBe(false);

    expect(onPaused).toHaveBeenCalledWith(ownerLower);
    expect(onUnpaused).toHaveBeenCalledWith(ownerLower);
  });

  it("fails toggling into the current state", () => {
    expectThrowsPrestakeError(
      () => gate.unpause(owner),
      new BatchDepositError({code: BatchDepositErrorCode.INVALID_STATE, reason: InvalidStateReason.NOT_PAUSED})
    );
    gate.pause(owner);
    expectThrowsPrestakeError(
      () => gate.pause(owner),
      new BatchDepositError({code: BatchDepositErrorCode.INVALID_STATE, reason: InvalidStateReason.PAUSED})
    );
    expect(gate.paused).toBe(true);
  });

  it("only the owner pauses", () => {
    expectThrowsPrestakeError(() => gate.pause(other), BatchDepositErrorCode.UNAUTHORIZED);
    expect(gate.paused).toBe(false);
  });

  it("whenNotPaused fails while paused", () => {
    gate.whenNotPaused();
    gate.pause(owner);
    expectThrowsPrestakeError(() => gate.whenNotPaused(), BatchDepositErrorCode.INVALID_STATE);
  });

  it("transfers ownership", () => {
    const onTransferred = vi.fn();
    emitter.on(BatchDepositEvent.ownershipTransferred, onTransferred);

    gate.transferOwnership(owner, other);

    expect(gate.owner).toBe(other);
    expect(onTransferred).toHaveBeenCalledWith(ownerLower, other);
    expectThrowsPrestakeError(() => gate.requireOwner(owner), BatchDepositErrorCode.UNAUTHORIZED);
  });

  it("refuses to transfer ownership to the zero address", () => {
    expectThrowsPrestakeError(
      () => gate.transferOwnership(owner, "0x0000000000000000000000000000000000000000"),
      new BatchDepositError({
        code: BatchDepositErrorCode.INVALID_ARGUMENT,
        reason: InvalidArgumentReason.INVALID_ADDRESS,
        address: "0x0000000000000000000000000000000000000000",
      })
    );
    expect(gate.owner).toBe(ownerLower);
  });
});
