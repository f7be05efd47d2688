import {ValueOf} from "@chainsafe/ssz";
import * as ssz from "./sszTypes.js";

export type Bytes32 = ValueOf<typeof ssz.Bytes32>;
export type Root = ValueOf<typeof ssz.Root>;
export type BLSPubkey = ValueOf<typeof ssz.BLSPubkey>;
export type BLSSignature = ValueOf<typeof ssz.BLSSignature>;
export type UintNum64 = ValueOf<typeof ssz.UintNum64>;

export type DepositData = ValueOf<typeof ssz.DepositData>;

/**
 * One validator's deposit parameters, as queued for a beneficiary.
 * The amount is not part of the record, every record is deposited with the configured collateral.
 */
export interface DepositRecord {
  pubkey: BLSPubkey;
  withdrawalCredentials: Bytes32;
  signature: BLSSignature;
  /** `hash_tree_root` of the `DepositData` this record deposits */
  depositDataRoot: Root;
}

/**
 * A beneficiary's queue, as four parallel sequences of equal length
 */
export interface StakerData {
  pubkeys: BLSPubkey[];
  withdrawalCredentials: Bytes32[];
  signatures: BLSSignature[];
  depositDataRoots: Root[];
}
