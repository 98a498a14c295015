/**
 * Unit codec: one character at a time.
 *
 * Arithmetic is done with `* 64` / `% 64` rather than bit shifts so that
 * 7-unit values above 0x7FFFFFFF stay unsigned.
 */

import { type Width } from '../types/branded.ts';
import { DecodeError } from '../types/errors.ts';
import {
  resolveDecodeOptions,
  type DecodeOptions,
  type ResolvedDecodeOptions,
} from '../types/config.ts';
import {
  isContinuationByte,
  scanCharWidth,
  widthFromCodepoint,
  widthFromLeadByte,
} from './width.ts';

// =============================================================================
// Single Character
// =============================================================================

/**
 * Decode `w` units starting at `offset` into a code point.
 *
 * The lead contributes its low `7 - w` bits, each continuation byte six.
 * Continuation markers are not re-validated here. Reading at or past the
 * end of `bytes` yields 0 for the missing units.
 */
export function decodeUnits(bytes: Uint8Array, w: Width, offset: number = 0): number {
  const lead = offset < bytes.length ? bytes[offset] : 0;
  if (w === 1) return lead;

  let cp = lead & (0x7f >> w);
  for (let i = 1; i < w; i++) {
    const index = offset + i;
    const unit = index < bytes.length ? bytes[index] : 0;
    cp = cp * 64 + (unit & 0x3f);
  }
  return cp;
}

/**
 * Write `cp` as `w` units into `dest` at `offset`.
 * Continuation bytes are filled right to left, then the lead byte takes the
 * width marker and whatever high bits remain.
 */
export function encodeUnitsInto(cp: number, w: Width, dest: Uint8Array, offset: number = 0): void {
  if (w === 1) {
    dest[offset] = cp;
    return;
  }
  let rest = cp;
  for (let i = w - 1; i > 0; i--) {
    dest[offset + i] = 0x80 | rest % 64;
    rest = Math.floor(rest / 64);
  }
  dest[offset] = ((0xff00 >> w) & 0xff) | rest;
}

/**
 * Encode `cp` as exactly `w` units.
 */
export function encodeUnits(cp: number, w: Width): Uint8Array {
  const out = new Uint8Array(w);
  encodeUnitsInto(cp, w, out, 0);
  return out;
}

/**
 * Encode `cp` in its shortest form.
 */
export function encodeCodepoint(cp: number): Uint8Array {
  return encodeUnits(cp, widthFromCodepoint(cp));
}

// =============================================================================
// Reading Characters From a Sequence
// =============================================================================

/**
 * One decoded character.
 */
export interface CharStep {
  /** Decoded value */
  codepoint: number;
  /** Units consumed */
  width: Width;
  /** Lead byte and actual continuation run disagree (best-effort only) */
  malformed: boolean;
}

function hexByte(b: number): string {
  return `0x${b.toString(16).toUpperCase().padStart(2, '0')}`;
}

/**
 * Width of the character at `offset` under strict rules.
 * @throws DecodeError on a stray continuation byte, 0xFF, a truncated tail
 *   or a missing continuation byte
 */
function strictWidthAt(bytes: Uint8Array, offset: number): Width {
  const lead = bytes[offset];
  if (isContinuationByte(lead) || lead === 0xff) {
    throw new DecodeError(`Unexpected lead byte ${hexByte(lead)}`, offset);
  }
  const remaining = bytes.length - offset;
  const w = widthFromLeadByte(lead, remaining);
  if (w > remaining) {
    throw new DecodeError(`Truncated ${w}-unit character`, offset);
  }
  for (let i = 1; i < w; i++) {
    if (!isContinuationByte(bytes[offset + i])) {
      throw new DecodeError(`Missing continuation byte in ${w}-unit character`, offset + i);
    }
  }
  return w;
}

/**
 * Width of the character at `offset` under the given options.
 */
export function charWidthAt(
  bytes: Uint8Array,
  offset: number,
  options: ResolvedDecodeOptions
): { width: Width; malformed: boolean } {
  if (options.mode === 'strict') {
    return { width: strictWidthAt(bytes, offset), malformed: false };
  }
  const w = scanCharWidth(bytes, offset);
  const lead = bytes[offset];
  const malformed =
    isContinuationByte(lead) || lead === 0xff || w !== widthFromLeadByte(lead);
  return { width: w, malformed };
}

/**
 * Decode the character starting at `offset`.
 */
export function decodeFirst(
  bytes: Uint8Array,
  offset: number = 0,
  options?: DecodeOptions
): CharStep {
  const { width: w, malformed } = charWidthAt(bytes, offset, resolveDecodeOptions(options));
  return { codepoint: decodeUnits(bytes, w, offset), width: w, malformed };
}

/**
 * Visitor for forEachChar. Return `false` to stop the walk.
 */
export type CharVisitor = (offset: number, w: Width, index: number) => boolean | void;

/**
 * Walk the characters of `bytes` front to back.
 * Returns the number of characters visited.
 *
 * In best-effort mode the first malformed character of the walk is
 * reported with console.warn unless `warnOnMalformed` is off.
 */
export function forEachChar(
  bytes: Uint8Array,
  visit: CharVisitor,
  options?: DecodeOptions
): number {
  const resolved = resolveDecodeOptions(options);
  let warned = !resolved.warnOnMalformed;
  let offset = 0;
  let index = 0;

  while (offset < bytes.length) {
    const { width: w, malformed } = charWidthAt(bytes, offset, resolved);
    if (malformed && !warned) {
      console.warn(`Malformed sequence at byte ${offset}, decoding best-effort`);
      warned = true;
    }
    const keepGoing = visit(offset, w, index);
    offset += w;
    index++;
    if (keepGoing === false) break;
  }
  return index;
}
