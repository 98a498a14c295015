/**
 * codeweave - variable-width code-point codec and string container
 *
 * Main entry point exporting core types, codec, position mapping, the
 * UString container and the string helpers.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Width,
  CostLevel,
  Costed,
  ConstCost,
  LinearCost,
  DecodeMode,
  CodeUnitKind,
  DecodeOptions,
  UStringOptions,
  ResolvedDecodeOptions,
} from './types/index.ts';

export {
  width,
  isValidWidth,
  MAX_WIDTH,
  NPOS,
  constCost,
  linearCost,
  DEFAULT_DECODE_OPTIONS,
  DEFAULT_CODE_UNIT_KIND,
  resolveDecodeOptions,
} from './types/index.ts';

// =============================================================================
// Errors
// =============================================================================

export {
  UStringRangeError,
  LengthError,
  AllocationError,
  CodePointRangeError,
  CodePointOverflowError,
  DecodeError,
} from './types/index.ts';

// =============================================================================
// Width Inference
// =============================================================================

export {
  widthFromLeadByte,
  widthFromLeadByteCascade,
  widthFromLeadByteClz,
  widthFromCodepoint,
  widthFromCodepointCascade,
  widthFromCodepointClz,
  isContinuationByte,
  scanCharWidth,
} from './codec/width.ts';

// =============================================================================
// Unit Codec
// =============================================================================

export type { CharStep, CharVisitor } from './codec/unit-codec.ts';

export {
  decodeUnits,
  encodeUnits,
  encodeUnitsInto,
  encodeCodepoint,
  decodeFirst,
  forEachChar,
} from './codec/unit-codec.ts';

// =============================================================================
// Sequence Codec
// =============================================================================

export type { CodeSink } from './codec/sequence.ts';
export type { CodeArray, CodeArrayOf } from './codec/code-units.ts';

export {
  decode,
  decodeInto,
  decodeAt,
  toCodeArray,
  encode,
  encodedLength,
  checkUtf16IsValid,
  isChinese,
} from './codec/sequence.ts';

export { maxCodeOf } from './codec/code-units.ts';

// =============================================================================
// Position Mapping
// =============================================================================

export type { DecodedWithMaps } from './mapping/position-map.ts';

export {
  NO_INDEX,
  countCharacters,
  byteToIndex,
  indexToByte,
  buildByteToIndexMap,
  buildIndexToByteMap,
  decodeAndBuildMaps,
  lookupIndex,
  lookupByte,
  characterAt,
  substring,
} from './mapping/position-map.ts';

// =============================================================================
// UString
// =============================================================================

export type { CodeSource, CodeNeedle } from './ustring/ustring.ts';

export { UString } from './ustring/ustring.ts';
export { MAX_SIZE, nextCapacity } from './ustring/code-buffer.ts';

// =============================================================================
// String Helpers
// =============================================================================

export {
  split,
  rsplit,
  splitlines,
  strip,
  lstrip,
  rstrip,
  join,
  startsWith,
  endsWith,
  isAlnum,
  isAlpha,
  isDigit,
  isLower,
  isUpper,
  isSpace,
  toLower,
  toUpper,
  count,
  replace,
  mul,
} from './text/text-ops.ts';

// =============================================================================
// Complexity-Stratified API
// =============================================================================

export { query, scan } from './api/index.ts';
