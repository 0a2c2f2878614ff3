// No setup import: this pins version 1 against the real Argon2id
// (t=3, m=64 MiB, p=1, v0x13, 256-byte output). Each call takes minutes.
import { derivePassword, derivePasswordAsync } from "../../src/api/derive";
import { unwrap } from "../../src/utils/result";

const secret = "correct horse battery staple";
const salt = new Uint8Array(32);
const profile = {
  siteLabel: "example.com",
  length: 16,
  classes: ["lower", "upper", "digit", "symbol"],
  counter: 0
};
const expected = '/iF"Q$M)0H\\@}@y^';

describe("derivePassword with real Argon2id", () => {
  it("reproduces the pinned example.com password", () => {
    expect(unwrap(derivePassword(secret, profile, salt))).toBe(expected);
  }, 600_000);

  it("async variant yields the same password", async () => {
    expect(unwrap(await derivePasswordAsync(secret, profile, salt))).toBe(expected);
  }, 600_000);
});
