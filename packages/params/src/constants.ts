// Deposit data field lengths

export const PUBKEY_LENGTH = 48;
export const WITHDRAWAL_CREDENTIALS_LENGTH = 32;
export const SIGNATURE_LENGTH = 96;
export const DEPOSIT_DATA_ROOT_LENGTH = 32;

// Deposit contract

export const DEPOSIT_CONTRACT_TREE_DEPTH = 2 ** 5; // 32
export const MAX_DEPOSIT_COUNT = 2 ** DEPOSIT_CONTRACT_TREE_DEPTH - 1;
