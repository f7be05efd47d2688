import {
  DEPOSIT_DATA_ROOT_LENGTH,
  MAX_DEPOSIT_COUNT,
  MIN_DEPOSIT_AMOUNT_GWEI,
  PUBKEY_LENGTH,
  SIGNATURE_LENGTH,
  WITHDRAWAL_CREDENTIALS_LENGTH,
} from "@prestake/params";
import {BLSPubkey, BLSSignature, Bytes32, DepositRecord, Root, computeDepositDataRoot, ssz} from "@prestake/types";
import {Address, GWEI_TO_WEI, byteArrayEquals, gweiToWei, normalizeAddress, toHex, weiToGwei} from "@prestake/utils";
import {DepositAcceptor, DepositAcceptorBatch} from "./interface.js";
import {DepositContractError, DepositContractErrorCode} from "./errors.js";

/**
 * One registered deposit, as logged by the deposit contract
 */
export type DepositEvent = {
  pubkey: BLSPubkey;
  withdrawalCredentials: Bytes32;
  /** Deposit amount in gwei */
  amount: number;
  signature: BLSSignature;
  index: number;
};

type StagedDeposit = {event: Omit<DepositEvent, "index">; depositDataRoot: Root; value: bigint};

/**
 * In-process deposit acceptor following the beacon chain deposit contract rules.
 *
 * Each deposit must carry at least the minimum deposit amount, in whole gwei, and a deposit data root
 * matching the `hash_tree_root` of the `DepositData` rebuilt from its fields and the deposited amount.
 */
export class MemoryDepositContract implements DepositAcceptor {
  readonly address: Address;
  private readonly depositDataRoots: Root[] = [];
  private readonly depositEvents: DepositEvent[] = [];
  private balance = BigInt(0);

  constructor(address: Address) {
    this.address = normalizeAddress(address);
  }

  openBatch(): DepositAcceptorBatch {
    return new MemoryDepositBatch(this);
  }

  getDepositCount(): number {
    return this.depositDataRoots.length;
  }

  /** SSZ root of the list of deposit data roots, with its length mixed in */
  getDepositRoot(): Root {
    return ssz.DepositDataRootList.hashTreeRoot(this.depositDataRoots);
  }

  getDepositEvents(): DepositEvent[] {
    return this.depositEvents.map((event) => ({...event}));
  }

  /** Total value held, in wei */
  getBalance(): bigint {
    return this.balance;
  }

  /**
   * Check one deposit and return it ready to be registered. Throws on the first violated rule.
   */
  validateDeposit(record: DepositRecord, value: bigint): StagedDeposit {
    const minimum = gweiToWei(BigInt(MIN_DEPOSIT_AMOUNT_GWEI));
    if (value < minimum) {
      throw new DepositContractError({
        code: DepositContractErrorCode.VALUE_TOO_LOW,
        value: value.toString(),
        minimum: minimum.toString(),
      });
    }
    if (value % GWEI_TO_WEI !== BigInt(0)) {
      throw new DepositContractError({
        code: DepositContractErrorCode.VALUE_NOT_MULTIPLE_OF_GWEI,
        value: value.toString(),
      });
    }
    // Amounts are uint64 on chain, also bounded here by what a number holds exactly
    const amountGwei = weiToGwei(value);
    if (amountGwei > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DepositContractError({code: DepositContractErrorCode.VALUE_TOO_HIGH, value: value.toString()});
    }

    const {pubkey, withdrawalCredentials, signature, depositDataRoot} = record;
    if (pubkey.length !== PUBKEY_LENGTH) {
      throw new DepositContractError({code: DepositContractErrorCode.INVALID_PUBKEY_LENGTH, length: pubkey.length});
    }
    if (withdrawalCredentials.length !== WITHDRAWAL_CREDENTIALS_LENGTH) {
      throw new DepositContractError({
        code: DepositContractErrorCode.INVALID_WITHDRAWAL_CREDENTIALS_LENGTH,
        length: withdrawalCredentials.length,
      });
    }
    if (signature.length !== SIGNATURE_LENGTH) {
      throw new DepositContractError({
        code: DepositContractErrorCode.INVALID_SIGNATURE_LENGTH,
        length: signature.length,
      });
    }
    if (depositDataRoot.length !== DEPOSIT_DATA_ROOT_LENGTH) {
      throw new DepositContractError({
        code: DepositContractErrorCode.INVALID_DEPOSIT_DATA_ROOT_LENGTH,
        length: depositDataRoot.length,
      });
    }

    const amount = Number(amountGwei);
    const expectedRoot = computeDepositDataRoot({pubkey, withdrawalCredentials, amount, signature});
    if (!byteArrayEquals(expectedRoot, depositDataRoot)) {
      throw new DepositContractError({
        code: DepositContractErrorCode.DEPOSIT_DATA_ROOT_MISMATCH,
        expected: toHex(expectedRoot),
        actual: toHex(depositDataRoot),
      });
    }

    return {
      event: {
        pubkey: pubkey.slice(),
        withdrawalCredentials: withdrawalCredentials.slice(),
        amount,
        signature: signature.slice(),
      },
      depositDataRoot: depositDataRoot.slice(),
      value,
    };
  }

  /**
   * Register staged deposits in order. Checks room for all of them before registering any.
   */
  registerDeposits(deposits: StagedDeposit[]): void {
    const depositCount = this.depositDataRoots.length;
    if (depositCount + deposits.length > MAX_DEPOSIT_COUNT) {
      throw new DepositContractError({code: DepositContractErrorCode.MERKLE_TREE_FULL, depositCount});
    }
    for (const {event, depositDataRoot, value} of deposits) {
      this.depositEvents.push({...event, index: this.depositDataRoots.length});
      this.depositDataRoots.push(depositDataRoot);
      this.balance += value;
    }
  }
}

class MemoryDepositBatch implements DepositAcceptorBatch {
  private readonly staged: StagedDeposit[] = [];
  private closed = false;

  constructor(private readonly contract: MemoryDepositContract) {}

  async submit(record: DepositRecord, value: bigint): Promise<void> {
    this.assertOpen();
    this.staged.push(this.contract.validateDeposit(record, value));
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.closed = true;
    this.contract.registerDeposits(this.staged);
  }

  async abort(): Promise<void> {
    this.closed = true;
    this.staged.length = 0;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new DepositContractError({code: DepositContractErrorCode.BATCH_CLOSED});
    }
  }
}
