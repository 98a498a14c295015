/**
 * Type exports for codeweave.
 */

// Width
export type { Width } from './branded.ts';

export { width, isValidWidth, MAX_WIDTH, NPOS } from './branded.ts';

// Cost brands
export type {
  CostLevel,
  Costed,
  ConstCost,
  LinearCost,
} from './branded.ts';

export { constCost, linearCost } from './branded.ts';

// Configuration
export type {
  DecodeMode,
  CodeUnitKind,
  DecodeOptions,
  UStringOptions,
  ResolvedDecodeOptions,
} from './config.ts';

export {
  DEFAULT_DECODE_OPTIONS,
  DEFAULT_CODE_UNIT_KIND,
  resolveDecodeOptions,
} from './config.ts';

// Errors
export {
  UStringRangeError,
  LengthError,
  AllocationError,
  CodePointRangeError,
  CodePointOverflowError,
  DecodeError,
} from './errors.ts';
