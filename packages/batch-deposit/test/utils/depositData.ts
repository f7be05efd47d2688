import {DEPOSIT_COLLATERAL_GWEI} from "@prestake/params";
import {DepositRecord, StakerData, computeDepositDataRoot, recordsToStakerData} from "@prestake/types";
import {toHex} from "@prestake/utils";

/**
 * Deposit record with placeholder keys unique per `seed` and a correct deposit data root
 */
export function generateRecord(seed: number, amountGwei = DEPOSIT_COLLATERAL_GWEI): DepositRecord {
  const pubkey = seededBytes(48, seed, 0xaa);
  const withdrawalCredentials = seededBytes(32, seed, 0xbb);
  const signature = seededBytes(96, seed, 0xcc);
  const depositDataRoot = computeDepositDataRoot({pubkey, withdrawalCredentials, amount: amountGwei, signature});
  return {pubkey, withdrawalCredentials, signature, depositDataRoot};
}

export function generateRecords(count: number, firstSeed = 0, amountGwei = DEPOSIT_COLLATERAL_GWEI): DepositRecord[] {
  return Array.from({length: count}, (_, i) => generateRecord(firstSeed + i, amountGwei));
}

export function generateStakerData(count: number, firstSeed = 0, amountGwei = DEPOSIT_COLLATERAL_GWEI): StakerData {
  return recordsToStakerData(generateRecords(count, firstSeed, amountGwei));
}

/**
 * Deposit tooling JSON entry for a record
 */
export function toDepositDataJson(
  record: DepositRecord,
  amountGwei = DEPOSIT_COLLATERAL_GWEI
): Record<string, string | number> {
  return {
    pubkey: toHex(record.pubkey).slice(2),
    withdrawal_credentials: toHex(record.withdrawalCredentials).slice(2),
    amount: amountGwei,
    signature: toHex(record.signature).slice(2),
    deposit_message_root: "00".repeat(32),
    deposit_data_root: toHex(record.depositDataRoot).slice(2),
    fork_version: "00000000",
    network_name: "mainnet",
  };
}

function seededBytes(length: number, seed: number, fill: number): Uint8Array {
  const bytes = new Uint8Array(length).fill(fill);
  bytes[0] = seed & 0xff;
  bytes[1] = (seed >> 8) & 0xff;
  return bytes;
}
