import {fromHexString, toHexString} from "@chainsafe/ssz";

export {byteArrayEquals} from "@chainsafe/ssz";

/**
 * Lowercase `0x`-prefixed hex of `bytes`
 */
export function toHex(bytes: Uint8Array): string {
  return toHexString(bytes);
}

/**
 * Parse a hex string, with or without `0x` prefix. Throws on odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  const body = hex.startsWith("0x") ? hex.slice(2) : hex;
  if (body.length % 2 !== 0) {
    throw new Error(`hex string length must be even, got ${body.length}`);
  }
  if (!/^[0-9a-fA-F]*$/.test(body)) {
    throw new Error(`hex string contains non-hex characters: ${hex}`);
  }
  return fromHexString(body);
}

/**
 * Format bytes as `0x1234…1234`
 */
export function prettyBytes(bytes: Uint8Array | string): string {
  const str = typeof bytes === "string" ? bytes : toHex(bytes);
  return `${str.slice(0, 6)}…${str.slice(-4)}`;
}
