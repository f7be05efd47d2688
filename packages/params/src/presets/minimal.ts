import {DepositPreset} from "../types.js";
import {mainnetPreset} from "./mainnet.js";

// Small batches for local networks
export const minimalPreset: DepositPreset = {
  ...mainnetPreset,

  /// NOTE: Only add diff values

  MAX_DEPOSIT_DATA_PER_ADD: 4,
  MAX_DEPOSITS_PER_TRIGGER: 6,
};
