import {describe, it, expect} from "vitest";
import {ETH_TO_WEI, formatWeiToEth, gweiToWei, weiToGwei} from "../../src/ethConversion.js";

describe("ethConversion", () => {
  it("gweiToWei / weiToGwei", () => {
    expect(gweiToWei(BigInt(32_000_000_000))).toBe(BigInt(32) * ETH_TO_WEI);
    expect(weiToGwei(BigInt(32) * ETH_TO_WEI)).toBe(BigInt(32_000_000_000));
    expect(weiToGwei(BigInt(1_999_999_999))).toBe(BigInt(1));
  });

  it("formatWeiToEth", () => {
    expect(formatWeiToEth(BigInt(32) * ETH_TO_WEI)).toBe("32");
    expect(formatWeiToEth(ETH_TO_WEI / BigInt(2))).toBe("0.5");
    expect(formatWeiToEth(BigInt(1))).toBe("0.000000000000000001");
    expect(formatWeiToEth(BigInt(0))).toBe("0");
  });
});
