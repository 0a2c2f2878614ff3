import { ALGORITHMS, CHAR_CLASSES, SP_CONSTANTS } from "../constants";
import { DerivationError, FramingError } from "../errors";
import type { Alphabets, CharClass } from "../types";
import { err, ok, type Result } from "../utils/result";

const DEFAULT_ALPHABETS = ALGORITHMS[SP_CONSTANTS.CURRENT_ALGORITHM_VERSION].alphabets;

/** Single forward-only read position over the KDF output. */
export class ByteCursor {
  private offset = 0;

  constructor(private readonly buffer: Uint8Array) {}

  get consumed(): number {
    return this.offset;
  }

  /** Next unsigned big-endian word of `width` bytes, or `undefined` once the buffer runs out. */
  read(width: 1 | 2): number | undefined {
    if (this.offset + width > this.buffer.length) {
      this.offset = this.buffer.length;
      return undefined;
    }
    let value = 0;
    for (let i = 0; i < width; i++) {
      value = (value << 8) | (this.buffer[this.offset + i] ?? 0);
    }
    this.offset += width;
    return value;
  }
}

/**
 * Lazily yields unbiased indices in `[0, modulus)` drawn from `cursor`.
 *
 * A word is accepted only below the largest multiple of `modulus` that fits
 * its range; anything above is discarded and the next word read. Moduli up to
 * 256 read single bytes, larger ones (up to 65536) read 16-bit words. The
 * sequence ends when the cursor is exhausted.
 */
export function* acceptedIndices(cursor: ByteCursor, modulus: number): Generator<number, void, undefined> {
  if (!Number.isInteger(modulus) || modulus < 1 || modulus > 0x10000) {
    throw new RangeError(`modulus must be an integer in [1, 65536], got ${modulus}`);
  }
  const width = modulus > 0x100 ? 2 : 1;
  const space = width === 1 ? 0x100 : 0x10000;
  const limit = space - (space % modulus);

  for (;;) {
    const word = cursor.read(width);
    if (word === undefined) return;
    if (word < limit) yield word % modulus;
  }
}

function exhausted(cursor: ByteCursor): DerivationError {
  return new DerivationError(
    "BufferExhausted",
    `Entropy buffer exhausted after ${cursor.consumed} bytes`
  );
}

function sample(cursor: ByteCursor, modulus: number): Result<number, DerivationError> {
  const next = acceptedIndices(cursor, modulus).next();
  return next.done ? err(exhausted(cursor)) : ok(next.value);
}

function pick<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`index ${index} outside [0, ${items.length})`);
  }
  return item;
}

/** Requested classes, deduplicated, in canonical order. */
export function canonicalClasses(classes: Iterable<CharClass>): CharClass[] {
  const chosen = new Set(classes);
  return CHAR_CLASSES.filter((c) => chosen.has(c));
}

interface Glyph {
  char: string;
  cls: CharClass;
}

/**
 * Renders `length` characters from the requested classes out of `buffer`.
 *
 * 1. Every position is rejection-sampled from the full alphabet (the class
 *    sub-alphabets concatenated in canonical order).
 * 2. Repair: each class still missing, in canonical order, takes one donor
 *    position. Donors are the positions whose class occurs more than once,
 *    ascending; one draw picks the donor, a second picks the character from
 *    the missing class. Both draws continue from the same cursor.
 *
 * Pure function of its arguments. Fails with `BufferExhausted` rather than
 * return a short password.
 */
export function encodePassword(
  buffer: Uint8Array,
  length: number,
  classes: Iterable<CharClass>,
  alphabets: Alphabets = DEFAULT_ALPHABETS
): Result<string, DerivationError | FramingError> {
  if (!(buffer instanceof Uint8Array)) {
    return err(new DerivationError("ParameterInvalid", "Entropy buffer must be a Uint8Array"));
  }
  const wanted = canonicalClasses(classes);
  if (wanted.length === 0) {
    return err(new FramingError("At least one character class is required"));
  }
  if (!Number.isInteger(length) || length < wanted.length) {
    return err(new FramingError(`length must be an integer of at least ${wanted.length}`));
  }

  const pool: Glyph[] = wanted.flatMap((cls) => Array.from(alphabets[cls], (char) => ({ char, cls })));
  const cursor = new ByteCursor(buffer);
  const picks = acceptedIndices(cursor, pool.length);

  const out: Glyph[] = [];
  for (let i = 0; i < length; i++) {
    const next = picks.next();
    if (next.done) return err(exhausted(cursor));
    out.push(pick(pool, next.value));
  }

  const counts = new Map<CharClass, number>();
  for (const { cls } of out) counts.set(cls, (counts.get(cls) ?? 0) + 1);

  for (const missing of wanted) {
    if (counts.has(missing)) continue;

    const donors: number[] = [];
    out.forEach(({ cls }, i) => {
      if ((counts.get(cls) ?? 0) > 1) donors.push(i);
    });

    const donorIndex = sample(cursor, donors.length);
    if (!donorIndex.ok) return donorIndex;
    const sub = Array.from(alphabets[missing]);
    const charIndex = sample(cursor, sub.length);
    if (!charIndex.ok) return charIndex;

    const position = pick(donors, donorIndex.value);
    const donorClass = pick(out, position).cls;
    counts.set(donorClass, (counts.get(donorClass) ?? 0) - 1);
    counts.set(missing, 1);
    out[position] = { char: pick(sub, charIndex.value), cls: missing };
  }

  return ok(out.map((s) => s.char).join(""));
}
