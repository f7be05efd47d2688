export type Address = string;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

const ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;

export function isValidAddress(address: string): boolean {
  return !!address && ADDRESS_REGEX.test(address);
}

/**
 * Addresses are compared case-insensitively, mixed-case checksums are not enforced
 */
export function normalizeAddress(address: string): Address {
  return address.toLowerCase();
}

export function isZeroAddress(address: string): boolean {
  return normalizeAddress(address) === ZERO_ADDRESS;
}
