import {describe, it, expect} from "vitest";
import {mainnetPreset} from "../../src/presets/mainnet.js";
import {minimalPreset} from "../../src/presets/minimal.js";
import * as params from "../../src/index.js";
import {ACTIVE_PRESET, PresetName, getPreset} from "../../src/index.js";

describe("active preset", () => {
  const presets = {
    [PresetName.mainnet]: mainnetPreset,
    [PresetName.minimal]: minimalPreset,
  };

  it("Active preset should be set to the correct value", () => {
    if (process.env.PRESTAKE_PRESET) {
      expect(ACTIVE_PRESET).toBe(process.env.PRESTAKE_PRESET);
    } else {
      expect(ACTIVE_PRESET).toBe(PresetName.mainnet);
    }
  });

  it("Constants should be set to the correct value", () => {
    const exports: Record<string, unknown> = {...params};
    for (const [k, v] of Object.entries(presets[ACTIVE_PRESET])) {
      expect(exports[k]).toEqual(v);
    }
  });

  it("mainnet limits", () => {
    expect(getPreset(PresetName.mainnet)).toEqual({
      DEPOSIT_COLLATERAL_GWEI: 32_000_000_000,
      MIN_DEPOSIT_AMOUNT_GWEI: 1_000_000_000,
      MAX_DEPOSIT_DATA_PER_ADD: 100,
      MAX_DEPOSITS_PER_TRIGGER: 150,
    });
  });

  it("minimal only overrides batch limits", () => {
    expect(minimalPreset.DEPOSIT_COLLATERAL_GWEI).toBe(mainnetPreset.DEPOSIT_COLLATERAL_GWEI);
    expect(minimalPreset.MAX_DEPOSIT_DATA_PER_ADD).toBe(4);
    expect(minimalPreset.MAX_DEPOSITS_PER_TRIGGER).toBe(6);
  });
});
