export type DepositPreset = {
  /** Stake forwarded with every deposit record, in gwei */
  DEPOSIT_COLLATERAL_GWEI: number;
  /** Smallest deposit the acceptor takes, in gwei */
  MIN_DEPOSIT_AMOUNT_GWEI: number;
  /** Records a single add call may append */
  MAX_DEPOSIT_DATA_PER_ADD: number;
  /** Records a single value transfer may consume */
  MAX_DEPOSITS_PER_TRIGGER: number;
};
