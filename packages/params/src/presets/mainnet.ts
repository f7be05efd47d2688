import {DepositPreset} from "../types.js";

export const mainnetPreset: DepositPreset = {
  DEPOSIT_COLLATERAL_GWEI: 32_000_000_000,
  MIN_DEPOSIT_AMOUNT_GWEI: 1_000_000_000,
  MAX_DEPOSIT_DATA_PER_ADD: 100,
  MAX_DEPOSITS_PER_TRIGGER: 150,
};
