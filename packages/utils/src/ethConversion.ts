export const ETH_TO_GWEI = BigInt(10 ** 9);
export const GWEI_TO_WEI = BigInt(10 ** 9);
export const ETH_TO_WEI = ETH_TO_GWEI * GWEI_TO_WEI;

type EthNumeric = bigint;

/**
 * Convert gwei to wei.
 */
export function gweiToWei(gwei: EthNumeric): EthNumeric {
  return gwei * GWEI_TO_WEI;
}

/**
 * Convert wei to gwei, truncating any sub-gwei remainder.
 */
export function weiToGwei(wei: EthNumeric): EthNumeric {
  return wei / GWEI_TO_WEI;
}

/**
 * Format a wei amount as decimal ETH, without trailing zeros. `32000000000000000000n` -> `"32"`
 */
export function formatWeiToEth(wei: EthNumeric): string {
  const sign = wei < BigInt(0) ? "-" : "";
  const abs = wei < BigInt(0) ? -wei : wei;
  const whole = abs / ETH_TO_WEI;
  const fraction = (abs % ETH_TO_WEI).toString().padStart(18, "0").replace(/0+$/, "");
  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}
