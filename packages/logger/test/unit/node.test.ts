import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {describe, it, expect, vi, afterEach, beforeAll, afterAll, Mock} from "vitest";
import {LogLevel, PrestakeError} from "@prestake/utils";
import {TimestampFormatCode} from "../../src/index.js";
import {getNodeLogger} from "../../src/node.js";
import {readFileWhenWritten} from "../utils/files.js";

// Node.js maps `process.stdout` to `console._stdout`.
// spy does not work on `process.stdout` directly.
type TestConsole = typeof console & {_stdout: {write: Mock}};

enum SampleErrorCode {
  SAMPLE = "SAMPLE_ERROR_SAMPLE",
}
class SampleError extends PrestakeError<{code: SampleErrorCode; count: number}> {}

describe("node logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("json format", () => {
    it("renders message, context and module", () => {
      vi.spyOn((console as TestConsole)._stdout, "write");

      const logger = getNodeLogger({
        level: LogLevel.info,
        format: "json",
        module: "test",
        timestampFormat: {format: TimestampFormatCode.Hidden},
      });
      logger.warn("foo bar", {meta: "data"});

      expect((console as TestConsole)._stdout.write).toHaveBeenNthCalledWith(
        1,
        '{"context":{"meta":"data"},"level":"warn","message":"foo bar","module":"test"}\n'
      );
    });

    it("renders bigint and bytes context as strings", () => {
      vi.spyOn((console as TestConsole)._stdout, "write");

      const logger = getNodeLogger({
        level: LogLevel.info,
        format: "json",
        module: "test",
        timestampFormat: {format: TimestampFormatCode.Hidden},
      });
      logger.info("values", {value: BigInt(32), root: new Uint8Array([0xab, 0xcd])});

      expect((console as TestConsole)._stdout.write).toHaveBeenNthCalledWith(
        1,
        '{"context":{"root":"0xabcd","value":"32"},"level":"info","message":"values","module":"test"}\n'
      );
    });

    it("renders a plain error as message and stack", () => {
      vi.spyOn((console as TestConsole)._stdout, "write");

      const error = new Error("err message");
      error.stack = "$STACK";
      const logger = getNodeLogger({
        level: LogLevel.info,
        format: "json",
        module: "test",
        timestampFormat: {format: TimestampFormatCode.Hidden},
      });
      logger.error("foo bar", {}, error);

      expect((console as TestConsole)._stdout.write).toHaveBeenNthCalledWith(
        1,
        '{"context":{},"error":{"message":"err message","stack":"$STACK"},"level":"error","message":"foo bar","module":"test"}\n'
      );
    });

    it("renders a typed error as its metadata", () => {
      vi.spyOn((console as TestConsole)._stdout, "write");

      const error = new SampleError({code: SampleErrorCode.SAMPLE, count: 3});
      error.stack = "$STACK";
      const logger = getNodeLogger({
        level: LogLevel.info,
        format: "json",
        module: "test",
        timestampFormat: {format: TimestampFormatCode.Hidden},
      });
      logger.warn("rejected", undefined, error);

      expect((console as TestConsole)._stdout.write).toHaveBeenNthCalledWith(
        1,
        '{"error":{"code":"SAMPLE_ERROR_SAMPLE","count":3,"stack":"$STACK"},"level":"warn","message":"rejected","module":"test"}\n'
      );
    });
  });

  describe("level", () => {
    it("skips entries below the configured level", () => {
      vi.spyOn((console as TestConsole)._stdout, "write");

      const logger = getNodeLogger({
        level: LogLevel.info,
        format: "json",
        module: "test",
        timestampFormat: {format: TimestampFormatCode.Hidden},
      });
      logger.debug("hidden");
      logger.verbose("hidden");
      logger.info("shown");

      expect((console as TestConsole)._stdout.write).toHaveBeenCalledTimes(1);
      expect((console as TestConsole)._stdout.write).toHaveBeenNthCalledWith(
        1,
        '{"level":"info","message":"shown","module":"test"}\n'
      );
    });
  });

  describe("child logger", () => {
    it("should join child modules", () => {
      vi.spyOn((console as TestConsole)._stdout, "write");

      const loggerA = getNodeLogger({
        level: LogLevel.info,
        format: "json",
        module: "a",
        timestampFormat: {format: TimestampFormatCode.Hidden},
      });
      const loggerAB = loggerA.child({module: "b"});
      const loggerABC = loggerAB.child({module: "c"});

      loggerA.warn("test a");
      loggerAB.warn("test a/b");
      loggerABC.warn("test a/b/c");

      const write = (console as TestConsole)._stdout.write;
      expect(write).toHaveBeenNthCalledWith(1, '{"level":"warn","message":"test a","module":"a"}\n');
      expect(write).toHaveBeenNthCalledWith(2, '{"level":"warn","message":"test a/b","module":"a/b"}\n');
      expect(write).toHaveBeenNthCalledWith(3, '{"level":"warn","message":"test a/b/c","module":"a/b/c"}\n');
      expect(loggerABC.toOpts().module).toBe("a/b/c");
    });
  });

  describe("file transport", () => {
    let tmpDir: string;

    beforeAll(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "prestake-logger-test-"));
    });

    afterAll(() => {
      fs.rmSync(tmpDir, {recursive: true, force: true});
    });

    it("should log to file", async () => {
      const filepath = path.join(tmpDir, "file-logger-test.log");

      const logger = getNodeLogger({
        module: "a",
        level: LogLevel.info,
        format: "json",
        timestampFormat: {format: TimestampFormatCode.Hidden},
        file: {
          filepath,
          level: LogLevel.info,
        },
      });

      logger.warn("test");

      expect(await readFileWhenWritten(filepath)).toBe('{"level":"warn","message":"test","module":"a"}');
    });
  });
});
