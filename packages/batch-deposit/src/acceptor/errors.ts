import {PrestakeError} from "@prestake/utils";

export enum DepositContractErrorCode {
  /** Deposit value below the minimum deposit amount */
  VALUE_TOO_LOW = "DEPOSIT_CONTRACT_ERROR_VALUE_TOO_LOW",
  /** Deposit value not a multiple of gwei */
  VALUE_NOT_MULTIPLE_OF_GWEI = "DEPOSIT_CONTRACT_ERROR_VALUE_NOT_MULTIPLE_OF_GWEI",
  /** Deposit value in gwei does not fit the amount field */
  VALUE_TOO_HIGH = "DEPOSIT_CONTRACT_ERROR_VALUE_TOO_HIGH",
  INVALID_PUBKEY_LENGTH = "DEPOSIT_CONTRACT_ERROR_INVALID_PUBKEY_LENGTH",
  INVALID_WITHDRAWAL_CREDENTIALS_LENGTH = "DEPOSIT_CONTRACT_ERROR_INVALID_WITHDRAWAL_CREDENTIALS_LENGTH",
  INVALID_SIGNATURE_LENGTH = "DEPOSIT_CONTRACT_ERROR_INVALID_SIGNATURE_LENGTH",
  INVALID_DEPOSIT_DATA_ROOT_LENGTH = "DEPOSIT_CONTRACT_ERROR_INVALID_DEPOSIT_DATA_ROOT_LENGTH",
  /** Supplied root differs from the root of the reconstructed DepositData */
  DEPOSIT_DATA_ROOT_MISMATCH = "DEPOSIT_CONTRACT_ERROR_DEPOSIT_DATA_ROOT_MISMATCH",
  /** Deposit tree has no room left */
  MERKLE_TREE_FULL = "DEPOSIT_CONTRACT_ERROR_MERKLE_TREE_FULL",
  /** Batch already committed or aborted */
  BATCH_CLOSED = "DEPOSIT_CONTRACT_ERROR_BATCH_CLOSED",
}

export type DepositContractErrorType =
  | {code: DepositContractErrorCode.VALUE_TOO_LOW; value: string; minimum: string}
  | {code: DepositContractErrorCode.VALUE_NOT_MULTIPLE_OF_GWEI; value: string}
  | {code: DepositContractErrorCode.VALUE_TOO_HIGH; value: string}
  | {code: DepositContractErrorCode.INVALID_PUBKEY_LENGTH; length: number}
  | {code: DepositContractErrorCode.INVALID_WITHDRAWAL_CREDENTIALS_LENGTH; length: number}
  | {code: DepositContractErrorCode.INVALID_SIGNATURE_LENGTH; length: number}
  | {code: DepositContractErrorCode.INVALID_DEPOSIT_DATA_ROOT_LENGTH; length: number}
  | {code: DepositContractErrorCode.DEPOSIT_DATA_ROOT_MISMATCH; expected: string; actual: string}
  | {code: DepositContractErrorCode.MERKLE_TREE_FULL; depositCount: number}
  | {code: DepositContractErrorCode.BATCH_CLOSED};

export class DepositContractError extends PrestakeError<DepositContractErrorType> {}
