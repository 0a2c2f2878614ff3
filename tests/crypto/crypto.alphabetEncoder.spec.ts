import "../setup";
import { sha256 } from "@noble/hashes/sha2";
import { concatBytes } from "@noble/hashes/utils";
import { ALGORITHMS, CHAR_CLASSES } from "../../src/constants";
import { ByteCursor, acceptedIndices, canonicalClasses, encodePassword } from "../../src/crypto/AlphabetEncoder";
import { DerivationError, FramingError } from "../../src/errors";
import type { Alphabets, CharClass } from "../../src/types";
import { unwrap } from "../../src/utils/result";

const { alphabets } = ALGORITHMS[1];
const bytes = (...values: number[]) => Uint8Array.from(values);

function expectExhausted(result: ReturnType<typeof encodePassword>) {
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error).toBeInstanceOf(DerivationError);
    expect(result.error).toMatchObject({ code: "BufferExhausted" });
  }
}

/** 32 * blocks pseudorandom bytes, fixed per seed. */
function stream(seed: number, blocks = 8): Uint8Array {
  const parts: Uint8Array[] = [];
  for (let i = 0; i < blocks; i++) parts.push(sha256(Uint8Array.of(seed >> 8, seed & 0xff, i)));
  return concatBytes(...parts);
}

describe("acceptedIndices", () => {
  it("discards words at or above the largest multiple of the modulus", () => {
    const cursor = new ByteCursor(bytes(249, 250, 255, 7));
    expect(Array.from(acceptedIndices(cursor, 10))).toEqual([9, 7]);
  });

  it("reads lazily from the shared cursor", () => {
    const cursor = new ByteCursor(bytes(3, 4, 5));
    const first = acceptedIndices(cursor, 4).next();
    expect(first).toEqual({ value: 3, done: false });
    expect(cursor.consumed).toBe(1);
  });

  it("uses 16-bit words for moduli above 256", () => {
    const cursor = new ByteCursor(bytes(0x01, 0x2b, 0xff, 0x78, 0x01, 0x2c, 0x00));
    // limit for 300 is 65400 (0xff78): 0xff78 is rejected, the dangling byte ends the sequence
    expect(Array.from(acceptedIndices(cursor, 300))).toEqual([299, 0]);
  });

  it("rejects unusable moduli", () => {
    expect(() => acceptedIndices(new ByteCursor(bytes(1)), 0).next()).toThrow(RangeError);
    expect(() => acceptedIndices(new ByteCursor(bytes(1)), 0x10001).next()).toThrow(RangeError);
  });
});

describe("encodePassword", () => {
  it("maps accepted bytes straight onto the alphabet", () => {
    expect(unwrap(encodePassword(bytes(0, 1, 2, 3), 4, ["digit"]))).toBe("0123");
    expect(unwrap(encodePassword(bytes(255, 250, 0, 1, 2, 3), 4, ["digit"]))).toBe("0123");
  });

  it("fails with BufferExhausted one byte short of the boundary", () => {
    expect(unwrap(encodePassword(bytes(9, 8, 7, 6), 4, ["digit"]))).toBe("9876");
    expectExhausted(encodePassword(bytes(9, 8, 7), 4, ["digit"]));
    expectExhausted(encodePassword(bytes(255, 9, 8, 7), 4, ["digit"]));
  });

  it("repairs a missing class from the same buffer", () => {
    // "abcd" has no digit: byte 6 picks donor 6 % 4 = 2, byte 13 picks "3"
    expect(unwrap(encodePassword(bytes(0, 1, 2, 3, 6, 13), 4, ["lower", "digit"]))).toBe("ab3d");
    expectExhausted(encodePassword(bytes(0, 1, 2, 3, 6), 4, ["lower", "digit"]));
  });

  it("only takes donors from classes that occur more than once", () => {
    // "abA0" lacks a symbol; donors are positions 0 and 1 only
    const out = unwrap(encodePassword(bytes(200, 0, 1, 26, 52, 3, 0), 4, CHAR_CLASSES));
    expect(out).toBe("a!A0");
  });

  it("repairs several missing classes in canonical order", () => {
    // abcd -> aCcd (upper) -> aC7d (digit) -> aC7" (symbol)
    const out = unwrap(encodePassword(bytes(0, 1, 2, 3, 5, 2, 4, 7, 1, 1), 4, ["symbol", "digit", "upper", "lower"]));
    expect(out).toBe('aC7"');
  });

  it("is unbiased over the full byte space where modulo would not be", () => {
    const everyByte = Uint8Array.from({ length: 256 }, (_, i) => i);
    const out = unwrap(encodePassword(everyByte, 250, ["digit"]));

    const counts = new Map<string, number>();
    for (const c of out) counts.set(c, (counts.get(c) ?? 0) + 1);
    expect([...counts.values()]).toEqual(Array(10).fill(25));

    const naive = new Array<number>(10).fill(0);
    for (const b of everyByte) naive[b % 10] = (naive[b % 10] ?? 0) + 1;
    expect(naive).toEqual([26, 26, 26, 26, 26, 26, 25, 25, 25, 25]);
  });

  it("supports alphabets wider than a byte", () => {
    const wide = Array.from({ length: 300 }, (_, i) => String.fromCharCode(0x4e00 + i)).join("");
    const custom: Alphabets = { ...alphabets, lower: wide };
    const out = unwrap(encodePassword(bytes(0, 5, 1, 43, 255, 255, 1, 44, 0, 1), 4, ["lower"], custom));
    expect(out).toBe(String.fromCharCode(0x4e05, 0x4e00 + 299, 0x4e00, 0x4e01));
  });

  it("always yields exact length, allowed characters and full class coverage", () => {
    const combos: CharClass[][] = [
      ["lower"],
      ["digit", "symbol"],
      ["lower", "upper", "digit"],
      ["lower", "upper", "digit", "symbol"]
    ];
    let seed = 0;
    for (const classes of combos) {
      const allowed = new Set(classes.flatMap((c) => Array.from(alphabets[c])));
      for (const length of [classes.length, 4, 16, 33, 64]) {
        if (length < classes.length) continue;
        const out = unwrap(encodePassword(stream(seed++), length, classes));
        expect(out).toHaveLength(length);
        for (const c of out) expect(allowed.has(c)).toBe(true);
        for (const cls of classes) {
          expect(Array.from(out).some((c) => alphabets[cls].includes(c))).toBe(true);
        }
      }
    }
  });

  it("is a pure function of its inputs", () => {
    const buffer = stream(42);
    const a = unwrap(encodePassword(buffer, 20, CHAR_CLASSES));
    const b = unwrap(encodePassword(buffer, 20, CHAR_CLASSES));
    expect(a).toBe(b);
  });

  it("rejects impossible policies", () => {
    const none = encodePassword(stream(1), 8, []);
    expect(!none.ok && none.error).toBeInstanceOf(FramingError);
    const short = encodePassword(stream(1), 3, CHAR_CLASSES);
    expect(!short.ok && short.error).toBeInstanceOf(FramingError);
  });

  it("canonicalizes class sets", () => {
    expect(canonicalClasses(["symbol", "lower", "symbol"])).toEqual(["lower", "symbol"]);
  });
});
