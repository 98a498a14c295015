/**
 * Query namespace — O(1) and bounded per-character operations.
 * Nothing here walks a whole sequence.
 */

import {
  widthFromLeadByte,
  widthFromLeadByteClz,
  widthFromCodepoint,
  widthFromCodepointClz,
  isContinuationByte,
  scanCharWidth,
} from '../codec/width.ts';
import {
  decodeUnits,
  decodeFirst,
  encodeUnits,
  encodeCodepoint,
} from '../codec/unit-codec.ts';
import { lookupIndex, lookupByte } from '../mapping/position-map.ts';

export const query = {
  /** @complexity O(1) — mask cascade over the lead byte */
  widthFromLeadByte,
  /** @complexity O(1) — clz32 + table lookup */
  widthFromLeadByteClz,
  /** @complexity O(1) — breakpoint cascade */
  widthFromCodepoint,
  /** @complexity O(1) — clz32 + table lookup */
  widthFromCodepointClz,
  /** @complexity O(1) */
  isContinuationByte,
  /** @complexity O(1) — looks at no more than 7 bytes */
  scanCharWidth,
  /** @complexity O(w) — w ≤ 7 units */
  decodeUnits,
  /** @complexity O(w) — width inference plus one decode */
  decodeFirst,
  /** @complexity O(w) */
  encodeUnits,
  /** @complexity O(w) */
  encodeCodepoint,
  /** @complexity O(1) — prebuilt byte→index map */
  lookupIndex,
  /** @complexity O(1) — prebuilt index→byte map */
  lookupByte,
} as const;
