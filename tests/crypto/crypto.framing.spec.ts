import "../setup";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { classSignature, frame } from "../../src/crypto/Framing";
import { FramingError } from "../../src/errors";
import { unwrap } from "../../src/utils/result";

const secret = utf8ToBytes("pw");
const base = { siteLabel: "ab", length: 8, classes: ["lower", "digit"], counter: 1 };

describe("Framing", () => {
  it("produces the pinned version-1 layout", () => {
    const framed = unwrap(frame(secret, base));
    expect(bytesToHex(framed)).toBe(
      "0e" + "73697465706173732d6672616d65" + // tag "sitepass-frame"
        "01" + // algorithm version
        "00000002" + "7077" + // secret "pw"
        "00000002" + "6162" + // label "ab"
        "00000001" + // counter
        "08" + // length
        "05" // lower | digit
    );
  });

  it("is independent of class order and duplicates", () => {
    const a = unwrap(frame(secret, base));
    const b = unwrap(frame(secret, { ...base, classes: ["digit", "lower", "digit"] }));
    expect(bytesToHex(b)).toBe(bytesToHex(a));
  });

  it("keeps label and counter boundaries apart", () => {
    const ab1 = unwrap(frame(secret, { ...base, siteLabel: "ab", counter: 1 }));
    const a = unwrap(frame(secret, { ...base, siteLabel: "a", counter: 0x62 }));
    expect(bytesToHex(ab1)).not.toBe(bytesToHex(a));
  });

  it("changes when any field changes", () => {
    const reference = bytesToHex(unwrap(frame(secret, base)));
    const variants = [
      frame(utf8ToBytes("pX"), base),
      frame(secret, { ...base, siteLabel: "ac" }),
      frame(secret, { ...base, counter: 2 }),
      frame(secret, { ...base, length: 9 }),
      frame(secret, { ...base, classes: ["lower", "upper", "digit"] })
    ].map((r) => bytesToHex(unwrap(r)));

    for (const v of variants) expect(v).not.toBe(reference);
    expect(new Set(variants).size).toBe(variants.length);
  });

  it("rejects malformed profiles and empty secrets with FramingError", () => {
    const cases: unknown[] = [
      { ...base, classes: [] },
      { ...base, length: 2, classes: ["lower", "upper", "digit"] },
      { ...base, length: 3 },
      { ...base, length: 65 },
      { ...base, siteLabel: "" },
      { ...base, counter: -1 },
      { ...base, counter: 1.5 },
      { ...base, version: 2 },
      null
    ];
    for (const profile of cases) {
      const result = frame(secret, profile);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(FramingError);
    }

    const empty = frame(new Uint8Array(0), base);
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error).toBeInstanceOf(FramingError);
  });

  it("computes class bitmasks", () => {
    expect(classSignature(["lower", "upper", "digit", "symbol"])).toBe(0x0f);
    expect(classSignature(["symbol"])).toBe(0x08);
  });
});
