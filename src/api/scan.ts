/**
 * Scan namespace — O(n) operations.
 * Every function here walks the sequence from its first byte.
 * Build the maps once and use `query.lookup*` when positions are looked up
 * repeatedly.
 */

import { forEachChar } from '../codec/unit-codec.ts';
import {
  decode,
  decodeInto,
  decodeAt,
  toCodeArray,
  encode,
  encodedLength,
  checkUtf16IsValid,
  isChinese,
} from '../codec/sequence.ts';
import {
  countCharacters,
  byteToIndex,
  indexToByte,
  buildByteToIndexMap,
  buildIndexToByteMap,
  decodeAndBuildMaps,
  characterAt,
  substring,
} from '../mapping/position-map.ts';

export const scan = {
  /** @complexity O(n) — visitor walk, stoppable */
  forEachChar,
  /** @complexity O(n) */
  countCharacters,
  /** @complexity O(n) — walks up to the offset */
  byteToIndex,
  /** @complexity O(n) — walks up to the index */
  indexToByte,
  /** @complexity O(n) — one pass, one slot per byte */
  buildByteToIndexMap,
  /** @complexity O(n) — one pass, one slot per character */
  buildIndexToByteMap,
  /** @complexity O(n) — code points and both maps in one pass */
  decodeAndBuildMaps,
  /** @complexity O(n) — walks up to the character */
  characterAt,
  /** @complexity O(n) — walks up to the end of the slice */
  substring,
  /** @complexity O(n) */
  decode,
  /** @complexity O(n) */
  decodeInto,
  /** @complexity O(n) — walks up to the index */
  decodeAt,
  /** @complexity O(n) */
  toCodeArray,
  /** @complexity O(n) — sizing pass then writing pass */
  encode,
  /** @complexity O(n) */
  encodedLength,
  /** @complexity O(n) — stops at the first wide character */
  checkUtf16IsValid,
  /** @complexity O(1) after decoding the first character */
  isChinese,
} as const;
