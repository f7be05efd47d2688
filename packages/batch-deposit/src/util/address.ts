import {Address, isValidAddress, normalizeAddress} from "@prestake/utils";
import {BatchDepositError, BatchDepositErrorCode, InvalidArgumentReason} from "../errors.js";

/**
 * Normalize an account address, failing with `InvalidArgument` if malformed
 */
export function parseAddress(address: string): Address {
  if (!isValidAddress(address)) {
    throw new BatchDepositError({
      code: BatchDepositErrorCode.INVALID_ARGUMENT,
      reason: InvalidArgumentReason.INVALID_ADDRESS,
      address: String(address),
    });
  }
  return normalizeAddress(address);
}
