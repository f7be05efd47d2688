import * as ssz from "../sszTypes.js";
import {DepositData, DepositRecord, Root, StakerData} from "../types.js";

export function getDepositData(record: Omit<DepositRecord, "depositDataRoot">, amountGwei: number): DepositData {
  return {
    pubkey: record.pubkey,
    withdrawalCredentials: record.withdrawalCredentials,
    amount: amountGwei,
    signature: record.signature,
  };
}

export function computeDepositDataRoot(depositData: DepositData): Root {
  return ssz.DepositData.hashTreeRoot(depositData);
}

export function getEmptyStakerData(): StakerData {
  return {pubkeys: [], withdrawalCredentials: [], signatures: [], depositDataRoots: []};
}

/**
 * Split records into parallel sequences, in order
 */
export function recordsToStakerData(records: DepositRecord[]): StakerData {
  const stakerData = getEmptyStakerData();
  for (const record of records) {
    stakerData.pubkeys.push(record.pubkey);
    stakerData.withdrawalCredentials.push(record.withdrawalCredentials);
    stakerData.signatures.push(record.signature);
    stakerData.depositDataRoots.push(record.depositDataRoot);
  }
  return stakerData;
}
