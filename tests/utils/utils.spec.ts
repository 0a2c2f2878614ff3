import { base64ToBytes, bytesToBase64 } from "../../src/utils/base64";
import { lengthPrefixed, secretToBytes, u32be, wipe } from "../../src/utils/bytes";
import { safeParseJson } from "../../src/utils/json";
import { err, ok, unwrap } from "../../src/utils/result";
import { ValidationError } from "../../src/errors";

describe("base64", () => {
  it("encodes and decodes", () => {
    expect(bytesToBase64(new Uint8Array([1, 2, 3]))).toBe("AQID");
    expect(bytesToBase64(new Uint8Array())).toBe("");
    expect(Array.from(base64ToBytes("AQID"))).toEqual([1, 2, 3]);
  });

  it("normalizes URL-safe alphabet, whitespace and missing padding", () => {
    expect(Array.from(base64ToBytes("-_8"))).toEqual([0xfb, 0xff]);
    expect(Array.from(base64ToBytes(" AQ\nID "))).toEqual([1, 2, 3]);
  });

  it("rejects empty, invalid and oversized input", () => {
    expect(() => base64ToBytes("  ")).toThrow(ValidationError);
    expect(() => base64ToBytes("***")).toThrow("Invalid base64 input");
    expect(() => base64ToBytes("A".repeat(64 * 1024 + 4))).toThrow("Base64 input too large");
  });
});

describe("bytes", () => {
  it("encodes strings as UTF-8 and copies byte secrets", () => {
    expect(Array.from(secretToBytes("é"))).toEqual([0xc3, 0xa9]);
    const owned = new Uint8Array([9, 9]);
    const copy = secretToBytes(owned);
    wipe(copy);
    expect(Array.from(owned)).toEqual([9, 9]);
    expect(Array.from(copy)).toEqual([0, 0]);
  });

  it("writes big-endian integers and length prefixes", () => {
    expect(Array.from(u32be(0x01020304))).toEqual([1, 2, 3, 4]);
    expect(Array.from(lengthPrefixed(new Uint8Array([7])))).toEqual([0, 0, 0, 1, 7]);
  });
});

describe("safeParseJson", () => {
  it("parses valid JSON and wraps failures", () => {
    expect(safeParseJson('{"a":1}')).toEqual({ a: 1 });
    expect(() => safeParseJson("{")).toThrow(ValidationError);
  });
});

describe("Result", () => {
  it("unwraps values and throws carried errors", () => {
    expect(unwrap(ok(5))).toBe(5);
    const error = new ValidationError("bad");
    expect(() => unwrap(err(error))).toThrow(error);
  });
});
