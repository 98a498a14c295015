/**
 * Width inference for the variable-width encoding.
 *
 * A character occupies 1 to 7 units. The lead byte announces the width with
 * a run of leading one-bits (`110xxxxx` → 2, ..., `11111110` → 7); a clear
 * high bit is a single-unit character. Continuation bytes look like
 * `10xxxxxx` and carry six payload bits each.
 *
 * Both directions come in two flavours that must agree on every input:
 * a mask cascade and a leading-zero-count lookup. The lookup tables are
 * frozen module constants.
 */

import { width, MAX_WIDTH, type Width } from '../types/branded.ts';
import { CodePointRangeError } from '../types/errors.ts';

// =============================================================================
// Lookup Tables
// =============================================================================

/** WIDTH_OF[n] is the Width n; slot 0 maps to 1. */
const WIDTH_OF: readonly Width[] = Object.freeze([1, 1, 2, 3, 4, 5, 6, 7].map(width));

/**
 * Width by number of leading one-bits in the lead byte.
 * One leading bit is a continuation byte, eight is 0xFF: neither starts
 * a character, so both read as a single unit.
 */
const WIDTH_BY_LEADING_ONES: readonly Width[] = Object.freeze(
  [1, 1, 2, 3, 4, 5, 6, 7, 1].map(width)
);

/**
 * Width by index of the highest set bit of a code point.
 */
const WIDTH_BY_HIGH_BIT: readonly Width[] = Object.freeze(
  [
    1, 1, 1, 1, 1, 1, 1, 2, 2, 2, 2, 3, 3, 3, 3, 3,
    4, 4, 4, 4, 4, 5, 5, 5, 5, 5, 6, 6, 6, 6, 6, 7,
  ].map(width)
);

const MAX_CODEPOINT = 0xffffffff;

// =============================================================================
// Lead Byte → Width
// =============================================================================

/**
 * Width signalled by a lead byte, by mask cascade.
 *
 * The signalled width is returned even when it runs past `bytesRemaining`;
 * bounds are the caller's business. With nothing left to read
 * (`bytesRemaining <= 0`) the answer is 1 and the byte is not inspected.
 */
export function widthFromLeadByteCascade(leadByte: number, bytesRemaining: number = Infinity): Width {
  if (bytesRemaining <= 0) return WIDTH_OF[1];
  const b = leadByte & 0xff;
  if ((b & 0x80) === 0) return WIDTH_OF[1];
  if ((b & 0xe0) === 0xc0) return WIDTH_OF[2];
  if ((b & 0xf0) === 0xe0) return WIDTH_OF[3];
  if ((b & 0xf8) === 0xf0) return WIDTH_OF[4];
  if ((b & 0xfc) === 0xf8) return WIDTH_OF[5];
  if ((b & 0xfe) === 0xfc) return WIDTH_OF[6];
  if (b === 0xfe) return WIDTH_OF[7];
  return WIDTH_OF[1];
}

/**
 * Width signalled by a lead byte, by counting leading ones with clz32.
 * Same contract as widthFromLeadByteCascade.
 */
export function widthFromLeadByteClz(leadByte: number, bytesRemaining: number = Infinity): Width {
  if (bytesRemaining <= 0) return WIDTH_OF[1];
  const leadingOnes = Math.clz32(~((leadByte & 0xff) << 24));
  return WIDTH_BY_LEADING_ONES[leadingOnes];
}

/**
 * Width signalled by a lead byte.
 */
export const widthFromLeadByte = widthFromLeadByteCascade;

// =============================================================================
// Code Point → Width
// =============================================================================

function assertCodepoint(cp: number): void {
  if (!Number.isInteger(cp) || cp < 0 || cp > MAX_CODEPOINT) {
    throw new CodePointRangeError(cp);
  }
}

/**
 * Smallest width whose coding range contains `cp`, by breakpoint cascade.
 * @throws CodePointRangeError when `cp` is not an unsigned 32-bit integer
 */
export function widthFromCodepointCascade(cp: number): Width {
  assertCodepoint(cp);
  if (cp <= 0x7f) return WIDTH_OF[1];
  if (cp <= 0x7ff) return WIDTH_OF[2];
  if (cp <= 0xffff) return WIDTH_OF[3];
  if (cp <= 0x1fffff) return WIDTH_OF[4];
  if (cp <= 0x3ffffff) return WIDTH_OF[5];
  if (cp <= 0x7fffffff) return WIDTH_OF[6];
  return WIDTH_OF[7];
}

/**
 * Smallest width whose coding range contains `cp`, by highest-bit lookup.
 * @throws CodePointRangeError when `cp` is not an unsigned 32-bit integer
 */
export function widthFromCodepointClz(cp: number): Width {
  assertCodepoint(cp);
  if (cp === 0) return WIDTH_OF[1];
  return WIDTH_BY_HIGH_BIT[31 - Math.clz32(cp)];
}

/**
 * Smallest width whose coding range contains `cp`.
 */
export const widthFromCodepoint = widthFromCodepointCascade;

// =============================================================================
// Sequence Scanning
// =============================================================================

/**
 * True for `10xxxxxx`.
 */
export function isContinuationByte(b: number): boolean {
  return (b & 0xc0) === 0x80;
}

/**
 * Width of the character at `offset`, measured by the continuation bytes
 * that actually follow the lead (at most MAX_WIDTH units in total).
 *
 * Never looks past the end of `bytes`, and never disagrees with the lead
 * byte on well-formed input. On malformed input it is the best-effort width.
 */
export function scanCharWidth(bytes: Uint8Array, offset: number): Width {
  const end = Math.min(bytes.length, offset + MAX_WIDTH);
  let cur = offset + 1;
  while (cur < end && isContinuationByte(bytes[cur])) cur++;
  return WIDTH_OF[Math.max(1, cur - offset)];
}
