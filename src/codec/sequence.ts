/**
 * Whole-sequence conversions between encoded bytes and code points.
 */

import type { CodeUnitKind, DecodeOptions } from '../types/config.ts';
import { LengthError } from '../types/errors.ts';
import { decodeUnits, encodeUnitsInto, forEachChar } from './unit-codec.ts';
import { widthFromCodepoint } from './width.ts';
import { checkCodesFit, createCodeArray, type CodeArray, type CodeArrayOf } from './code-units.ts';

/**
 * Writable array-like target for decoded code points.
 */
export interface CodeSink {
  readonly length: number;
  [index: number]: number;
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode an encoded sequence to a list of code points.
 */
export function decode(bytes: Uint8Array, options?: DecodeOptions): number[] {
  const codepoints: number[] = [];
  forEachChar(
    bytes,
    (offset, w) => {
      codepoints.push(decodeUnits(bytes, w, offset));
    },
    options
  );
  return codepoints;
}

/**
 * Decode into a caller-provided array and terminate it with a 0 sentinel.
 * `dest` needs one slot per character plus the sentinel.
 *
 * @returns the number of characters written
 * @throws LengthError when `dest` is too small (nothing is written)
 * @throws CodePointOverflowError when `dest` is a Uint16Array and a
 *   character does not fit (nothing is written)
 */
export function decodeInto(bytes: Uint8Array, dest: CodeSink, options?: DecodeOptions): number {
  const codepoints = decode(bytes, options);
  if (dest.length < codepoints.length + 1) {
    throw new LengthError('decodeInto', codepoints.length + 1);
  }
  if (dest instanceof Uint16Array) checkCodesFit('u16', codepoints);
  for (let i = 0; i < codepoints.length; i++) {
    dest[i] = codepoints[i];
  }
  dest[codepoints.length] = 0;
  return codepoints.length;
}

/**
 * Decode into a typed array of the given storage kind.
 * @throws CodePointOverflowError when a character does not fit `kind`
 */
export function toCodeArray<K extends CodeUnitKind>(
  bytes: Uint8Array,
  kind: K,
  options?: DecodeOptions
): CodeArrayOf<K>;
export function toCodeArray(bytes: Uint8Array, kind: CodeUnitKind, options?: DecodeOptions): CodeArray {
  const codepoints = decode(bytes, options);
  checkCodesFit(kind, codepoints);
  const out = createCodeArray(kind, codepoints.length);
  out.set(codepoints);
  return out;
}

/**
 * Code point of the character at `index`, or 0 when there is none.
 */
export function decodeAt(bytes: Uint8Array, index: number, options?: DecodeOptions): number {
  let found = 0;
  forEachChar(
    bytes,
    (offset, w, i) => {
      if (i !== index) return true;
      found = decodeUnits(bytes, w, offset);
      return false;
    },
    options
  );
  return found;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Total encoded size of the first `count` code points.
 */
export function encodedLength(codepoints: ArrayLike<number>, count: number = codepoints.length): number {
  let total = 0;
  for (let i = 0; i < count; i++) {
    total += widthFromCodepoint(codepoints[i]);
  }
  return total;
}

/**
 * Encode the first `count` code points, each in its shortest form.
 * The output is sized in a first pass and filled in a second.
 */
export function encode(codepoints: ArrayLike<number>, count: number = codepoints.length): Uint8Array {
  const out = new Uint8Array(encodedLength(codepoints, count));
  let offset = 0;
  for (let i = 0; i < count; i++) {
    const cp = codepoints[i];
    const w = widthFromCodepoint(cp);
    encodeUnitsInto(cp, w, out, offset);
    offset += w;
  }
  return out;
}

// =============================================================================
// Inspection
// =============================================================================

/**
 * Byte offset of the first character that needs more than three units,
 * i.e. the first one a 16-bit buffer cannot hold. `bytes.length` when every
 * character fits.
 */
export function checkUtf16IsValid(bytes: Uint8Array): number {
  let firstWide = bytes.length;
  forEachChar(
    bytes,
    (offset, w) => {
      if (w <= 3) return true;
      firstWide = offset;
      return false;
    },
    { warnOnMalformed: false }
  );
  return firstWide;
}

const CJK_BROAD_RANGES: readonly (readonly [number, number])[] = Object.freeze([
  [0x4e00, 0x9fff],
  [0x3400, 0x4dbf],
  [0x20000, 0x2a6df],
  [0x2a700, 0x2b73f],
  [0x2b740, 0x2b81f],
  [0x2b820, 0x2ceaf],
  [0xf900, 0xfaff],
  [0x2f800, 0x2fa1f],
] as const);

/**
 * Whether the first character is a CJK ideograph.
 *
 * The narrow test covers the unified block as first published
 * (U+4E00..U+9FA5). The broad one takes the whole unified block, extensions
 * A to E and both compatibility blocks.
 */
export function isChinese(bytes: Uint8Array, broad: boolean = false): boolean {
  if (bytes.length === 0) return false;
  const cp = decodeAt(bytes, 0, { warnOnMalformed: false });
  if (!broad) return cp >= 0x4e00 && cp <= 0x9fa5;
  return CJK_BROAD_RANGES.some(([lo, hi]) => cp >= lo && cp <= hi);
}

