/**
 * Byte offset ↔ code-point index mapping over an encoded sequence.
 *
 * Per-call lookups walk the sequence from the start and cost O(n) each.
 * Callers that need more than a handful of lookups should build the bulk
 * maps once and index into them.
 *
 * Cost typing: lookups return `LinearCost`/`ConstCost` brands so that the
 * two families are not mixed up in hot loops.
 */

import {
  NPOS,
  constCost,
  linearCost,
  type ConstCost,
  type LinearCost,
} from '../types/branded.ts';
import type { DecodeOptions } from '../types/config.ts';
import { decodeUnits, forEachChar } from '../codec/unit-codec.ts';

/** Entry of a byte→index map at a continuation byte. */
export const NO_INDEX = -1;

// =============================================================================
// Types
// =============================================================================

/**
 * Code points plus both position maps, built in one pass.
 */
export interface DecodedWithMaps {
  /** Decoded code points */
  codepoints: number[];
  /** indexToByte[i] is the byte offset where character i starts */
  indexToByte: Uint32Array;
  /** byteToIndex[o] is the character starting at o, or NO_INDEX */
  byteToIndex: Int32Array;
}

// =============================================================================
// Per-call Lookups
// =============================================================================

/**
 * Number of characters in the sequence.
 */
export function countCharacters(bytes: Uint8Array, options?: DecodeOptions): LinearCost<number> {
  return linearCost(forEachChar(bytes, () => true, options));
}

/**
 * Index of the character whose first byte is at `offset`.
 * NPOS when `offset` falls inside a character or at/after the end.
 */
export function byteToIndex(bytes: Uint8Array, offset: number, options?: DecodeOptions): LinearCost<number> {
  let found = NPOS;
  forEachChar(
    bytes,
    (start, _w, index) => {
      if (start === offset) found = index;
      return start < offset;
    },
    options
  );
  return linearCost(found);
}

/**
 * Byte offset where character `index` starts. NPOS past the last character.
 */
export function indexToByte(bytes: Uint8Array, index: number, options?: DecodeOptions): LinearCost<number> {
  let found = NPOS;
  forEachChar(
    bytes,
    (start, _w, i) => {
      if (i !== index) return true;
      found = start;
      return false;
    },
    options
  );
  return linearCost(found);
}

// =============================================================================
// Bulk Maps
// =============================================================================

/**
 * Map from every byte offset to a character index (NO_INDEX at
 * continuation bytes).
 */
export function buildByteToIndexMap(bytes: Uint8Array, options?: DecodeOptions): Int32Array {
  const map = new Int32Array(bytes.length).fill(NO_INDEX);
  forEachChar(
    bytes,
    (start, _w, index) => {
      map[start] = index;
    },
    options
  );
  return map;
}

/**
 * Map from every character index to its starting byte offset.
 */
export function buildIndexToByteMap(bytes: Uint8Array, options?: DecodeOptions): Uint32Array {
  const starts: number[] = [];
  forEachChar(
    bytes,
    (start) => {
      starts.push(start);
    },
    options
  );
  return Uint32Array.from(starts);
}

/**
 * Decode and build both maps in a single pass.
 */
export function decodeAndBuildMaps(bytes: Uint8Array, options?: DecodeOptions): DecodedWithMaps {
  const codepoints: number[] = [];
  const starts: number[] = [];
  const byteMap = new Int32Array(bytes.length).fill(NO_INDEX);

  forEachChar(
    bytes,
    (start, w, index) => {
      codepoints.push(decodeUnits(bytes, w, start));
      starts.push(start);
      byteMap[start] = index;
    },
    options
  );

  return { codepoints, indexToByte: Uint32Array.from(starts), byteToIndex: byteMap };
}

/**
 * Character index for `offset` from a prebuilt byte→index map.
 */
export function lookupIndex(map: Int32Array, offset: number): ConstCost<number> {
  if (!Number.isInteger(offset) || offset < 0 || offset >= map.length) return constCost(NPOS);
  return constCost(map[offset]);
}

/**
 * Byte offset for `index` from a prebuilt index→byte map.
 */
export function lookupByte(map: Uint32Array, index: number): ConstCost<number> {
  if (!Number.isInteger(index) || index < 0 || index >= map.length) return constCost(NPOS);
  return constCost(map[index]);
}

// =============================================================================
// Character-indexed Slicing
// =============================================================================

/**
 * Bytes of the character at `index`, as a view into `bytes`.
 * Empty when `index` is past the last character.
 */
export function characterAt(bytes: Uint8Array, index: number, options?: DecodeOptions): Uint8Array {
  let start = 0;
  let end = 0;
  forEachChar(
    bytes,
    (offset, w, i) => {
      if (i !== index) return true;
      start = offset;
      end = offset + w;
      return false;
    },
    options
  );
  return bytes.subarray(start, end);
}

/**
 * Bytes of up to `count` characters starting at character `index`, as a
 * view into `bytes`. A count that runs past the end is clipped; an index at
 * or past the end gives an empty view.
 */
export function substring(
  bytes: Uint8Array,
  index: number,
  count: number,
  options?: DecodeOptions
): Uint8Array {
  if (count <= 0) return bytes.subarray(0, 0);

  let start = -1;
  let end = bytes.length;
  forEachChar(
    bytes,
    (offset, _w, i) => {
      if (i === index) start = offset;
      if (i > index && i - index === count) {
        end = offset;
        return false;
      }
      return true;
    },
    options
  );

  if (start < 0) return bytes.subarray(0, 0);
  return bytes.subarray(start, end);
}
