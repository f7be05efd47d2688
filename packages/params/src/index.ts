import {PresetName} from "./presetName.js";
import {mainnetPreset} from "./presets/mainnet.js";
import {minimalPreset} from "./presets/minimal.js";
import {DepositPreset} from "./types.js";

export type {DepositPreset} from "./types.js";
export * from "./constants.js";
export {PresetName};

const presets = {
  [PresetName.mainnet]: mainnetPreset,
  [PresetName.minimal]: minimalPreset,
};

function isPresetName(name: string | undefined): name is PresetName {
  return name !== undefined && (Object.values(PresetName) as string[]).includes(name);
}

const envPreset = process?.env?.PRESTAKE_PRESET;

/**
 * The preset name currently exported by this library
 *
 * The `PRESTAKE_PRESET` environment variable is used to select the active preset
 * If `PRESTAKE_PRESET` is not set, the default is `mainnet`.
 */
export const ACTIVE_PRESET: PresetName = isPresetName(envPreset) ? envPreset : PresetName.mainnet;
export const activePreset = presets[ACTIVE_PRESET];

export function getPreset(name: PresetName): DepositPreset {
  return presets[name];
}

// These variables must be exported individually and explicitly
// in order to be accessible as top-level exports
export const {
  DEPOSIT_COLLATERAL_GWEI,
  MIN_DEPOSIT_AMOUNT_GWEI,
  MAX_DEPOSIT_DATA_PER_ADD,
  MAX_DEPOSITS_PER_TRIGGER,
} = activePreset;
