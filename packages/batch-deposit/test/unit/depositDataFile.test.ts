import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {describe, it, expect, beforeAll, afterAll} from "vitest";
import {recordsToStakerData} from "@prestake/types";
import {toHex} from "@prestake/utils";
import {
  DepositDataFileError,
  DepositDataFileErrorCode,
  parseDepositDataJson,
  readDepositDataFile,
} from "../../src/index.js";
import {generateRecord, generateRecords, toDepositDataJson} from "../utils/depositData.js";
import {expectThrowsPrestakeError} from "../utils/errors.js";

describe("deposit data file", () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "deposit-data-"));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, {recursive: true, force: true});
  });

  it("reads a deposit tooling file", () => {
    const records = generateRecords(2);
    const filepath = path.join(tmpDir, "deposit_data.json");
    fs.writeFileSync(filepath, JSON.stringify(records.map((record) => toDepositDataJson(record))));

    expect(readDepositDataFile(filepath)).toEqual(recordsToStakerData(records));
  });

  it("parses parallel lists", () => {
    const records = generateRecords(2, 5);
    const json = {
      pubkey: records.map((record) => toHex(record.pubkey)),
      withdrawal_credentials: records.map((record) => toHex(record.withdrawalCredentials)),
      signatures: records.map((record) => toHex(record.signature)),
      deposit_data_roots: records.map((record) => toHex(record.depositDataRoot)),
    };
    expect(parseDepositDataJson(json)).toEqual(recordsToStakerData(records));
  });

  it("checks entries against another collateral", () => {
    const record = generateRecord(0, 1_000_000_000);
    expect(parseDepositDataJson([toDepositDataJson(record, 1_000_000_000)], {collateralGwei: 1_000_000_000})).toEqual(
      recordsToStakerData([record])
    );
  });

  it("rejects an amount other than the collateral", () => {
    const record = generateRecord(0, 1_000_000_000);
    expectThrowsPrestakeError(
      () => parseDepositDataJson([toDepositDataJson(record, 1_000_000_000)]),
      new DepositDataFileError({
        code: DepositDataFileErrorCode.AMOUNT_MISMATCH,
        index: 0,
        amount: "1000000000",
        expected: 32_000_000_000,
      })
    );
  });

  it("rejects a root that does not match the entry", () => {
    const records = generateRecords(2);
    const entries = records.map((record) => toDepositDataJson(record));
    entries[1].deposit_data_root = toHex(records[0].depositDataRoot).slice(2);

    expectThrowsPrestakeError(
      () => parseDepositDataJson(entries),
      new DepositDataFileError({
        code: DepositDataFileErrorCode.ROOT_MISMATCH,
        index: 1,
        expected: toHex(records[1].depositDataRoot),
        actual: toHex(records[0].depositDataRoot),
      })
    );
  });

  it("rejects malformed hex and wrong lengths", () => {
    const entry = toDepositDataJson(generateRecord(0));
    expectThrowsPrestakeError(
      () => parseDepositDataJson([{...entry, signature: "zz"}]),
      new DepositDataFileError({code: DepositDataFileErrorCode.INVALID_HEX, field: "signature", index: 0})
    );
    expectThrowsPrestakeError(
      () => parseDepositDataJson([{...entry, pubkey: "abcd"}]),
      new DepositDataFileError({
        code: DepositDataFileErrorCode.INVALID_FIELD_LENGTH,
        field: "pubkey",
        index: 0,
        length: 2,
        expected: 48,
      })
    );
  });

  it("rejects documents of another shape", () => {
    expectThrowsPrestakeError(() => parseDepositDataJson("deposits"), DepositDataFileErrorCode.INVALID_FORMAT);
    expectThrowsPrestakeError(() => parseDepositDataJson([1]), DepositDataFileErrorCode.INVALID_FORMAT);
    expectThrowsPrestakeError(
      () => parseDepositDataJson({pubkey: [], withdrawal_credentials: [], signatures: ["00"], deposit_data_roots: []}),
      new DepositDataFileError({code: DepositDataFileErrorCode.INVALID_FORMAT, reason: "lists differ in length"})
    );
  });

  it("only reads json files", () => {
    expect(() => readDepositDataFile(path.join(tmpDir, "deposit_data.yaml"))).toThrow(
      `UnsupportedFileFormat: ${path.join(tmpDir, "deposit_data.yaml")}`
    );
  });
});
