import {ByteVectorType, ContainerType, ListCompositeType, UintNumberType} from "@chainsafe/ssz";
import {DEPOSIT_CONTRACT_TREE_DEPTH, PUBKEY_LENGTH, SIGNATURE_LENGTH} from "@prestake/params";

// Primitive types

export const Bytes32 = new ByteVectorType(32);
export const Root = new ByteVectorType(32);
export const BLSPubkey = new ByteVectorType(PUBKEY_LENGTH);
export const BLSSignature = new ByteVectorType(SIGNATURE_LENGTH);
export const UintNum64 = new UintNumberType(8);

// Deposit types

export const DepositData = new ContainerType(
  {
    pubkey: BLSPubkey,
    withdrawalCredentials: Bytes32,
    amount: UintNum64,
    signature: BLSSignature,
  },
  {typeName: "DepositData", jsonCase: "eth2"}
);

// Root of this list is the deposit contract's `get_deposit_root()`
export const DepositDataRootList = new ListCompositeType(Root, 2 ** DEPOSIT_CONTRACT_TREE_DEPTH);
