import {PrestakeError} from "@prestake/utils";

export enum BatchDepositErrorCode {
  /** Caller is not the owner, or the sender has no queued deposit data */
  UNAUTHORIZED = "BATCH_DEPOSIT_ERROR_UNAUTHORIZED",
  /** Pause toggled into its current state, or trigger while paused */
  INVALID_STATE = "BATCH_DEPOSIT_ERROR_INVALID_STATE",
  /** Edit index past the end of the queue */
  INDEX_OUT_OF_RANGE = "BATCH_DEPOSIT_ERROR_INDEX_OUT_OF_RANGE",
  /** Malformed or out of limit arguments, or a value that does not match the queue */
  INVALID_ARGUMENT = "BATCH_DEPOSIT_ERROR_INVALID_ARGUMENT",
}

export enum UnauthorizedReason {
  NOT_OWNER = "NOT_OWNER",
  NOT_WHITELISTED = "NOT_WHITELISTED",
}

export enum InvalidStateReason {
  PAUSED = "PAUSED",
  NOT_PAUSED = "NOT_PAUSED",
}

export enum InvalidArgumentReason {
  INVALID_ADDRESS = "INVALID_ADDRESS",
  EMPTY_BATCH = "EMPTY_BATCH",
  LENGTH_MISMATCH = "LENGTH_MISMATCH",
  BATCH_TOO_LARGE = "BATCH_TOO_LARGE",
  INVALID_FIELD_LENGTH = "INVALID_FIELD_LENGTH",
  INVALID_DELETE_COUNT = "INVALID_DELETE_COUNT",
  VALUE_MISMATCH = "VALUE_MISMATCH",
  TOO_MANY_DEPOSITS = "TOO_MANY_DEPOSITS",
}

export type DepositRecordField = "pubkey" | "withdrawalCredentials" | "signature" | "depositDataRoot";

export type BatchDepositErrorType =
  | {code: BatchDepositErrorCode.UNAUTHORIZED; reason: UnauthorizedReason; caller: string}
  | {code: BatchDepositErrorCode.INVALID_STATE; reason: InvalidStateReason}
  | {code: BatchDepositErrorCode.INDEX_OUT_OF_RANGE; index: number; length: number}
  | {code: BatchDepositErrorCode.INVALID_ARGUMENT; reason: InvalidArgumentReason.INVALID_ADDRESS; address: string}
  | {code: BatchDepositErrorCode.INVALID_ARGUMENT; reason: InvalidArgumentReason.EMPTY_BATCH}
  | {
      code: BatchDepositErrorCode.INVALID_ARGUMENT;
      reason: InvalidArgumentReason.LENGTH_MISMATCH;
      pubkeys: number;
      withdrawalCredentials: number;
      signatures: number;
      depositDataRoots: number;
    }
  | {
      code: BatchDepositErrorCode.INVALID_ARGUMENT;
      reason: InvalidArgumentReason.BATCH_TOO_LARGE;
      count: number;
      limit: number;
    }
  | {
      code: BatchDepositErrorCode.INVALID_ARGUMENT;
      reason: InvalidArgumentReason.INVALID_FIELD_LENGTH;
      field: DepositRecordField;
      index: number;
      length: number;
      expected: number;
    }
  | {
      code: BatchDepositErrorCode.INVALID_ARGUMENT;
      reason: InvalidArgumentReason.INVALID_DELETE_COUNT;
      count: number;
      length: number;
    }
  | {
      code: BatchDepositErrorCode.INVALID_ARGUMENT;
      reason: InvalidArgumentReason.VALUE_MISMATCH;
      value: string;
      expected: string;
    }
  | {
      code: BatchDepositErrorCode.INVALID_ARGUMENT;
      reason: InvalidArgumentReason.TOO_MANY_DEPOSITS;
      count: number;
      limit: number;
    };

export class BatchDepositError extends PrestakeError<BatchDepositErrorType> {}
