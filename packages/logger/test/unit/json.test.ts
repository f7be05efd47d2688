import {describe, it, expect} from "vitest";
import {logCtxToJson, logCtxToString} from "../../src/utils/json.js";

describe("log context rendering", () => {
  it("logCtxToString renders flat objects", () => {
    expect(logCtxToString({count: 3, value: BigInt(64), root: new Uint8Array([1, 2])})).toBe(
      "count=3, value=64, root=0x0102"
    );
  });

  it("logCtxToString does not recurse into nested objects", () => {
    expect(logCtxToString({nested: {a: 1}, list: [1, 2]})).toBe("nested=[object], list=[object]");
  });

  it("logCtxToString renders arrays", () => {
    expect(logCtxToString(["a", 1, null])).toBe("a, 1, null");
  });

  it("logCtxToJson renders nested objects as placeholders", () => {
    expect(logCtxToJson({nested: {a: 1}, value: BigInt(1), flag: true})).toEqual({
      nested: "[object]",
      value: "1",
      flag: true,
    });
  });

  it("logCtxToJson keeps undefined as undefined", () => {
    expect(logCtxToJson(undefined)).toBeUndefined();
  });
});
