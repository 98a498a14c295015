/**
 * Options accepted by the decoding entry points and the code-point buffer.
 */

/**
 * How malformed input is treated.
 *
 * - `best-effort`: a character spans its lead byte plus however many
 *   continuation bytes actually follow it. Never throws.
 * - `strict`: a character spans the width its lead byte signals; anything
 *   that does not match throws a DecodeError.
 */
export type DecodeMode = 'best-effort' | 'strict';

/**
 * Storage width of a code-point buffer.
 */
export type CodeUnitKind = 'u16' | 'u32';

export interface DecodeOptions {
  /** Malformed input handling (default: 'best-effort') */
  mode?: DecodeMode;
  /** Report the first malformed character of a best-effort call (default: true) */
  warnOnMalformed?: boolean;
}

export interface UStringOptions extends DecodeOptions {
  /** Code point storage width (default: 'u32') */
  kind?: CodeUnitKind;
}

export interface ResolvedDecodeOptions {
  readonly mode: DecodeMode;
  readonly warnOnMalformed: boolean;
}

export const DEFAULT_DECODE_OPTIONS: ResolvedDecodeOptions = Object.freeze({
  mode: 'best-effort',
  warnOnMalformed: true,
});

export const DEFAULT_CODE_UNIT_KIND: CodeUnitKind = 'u32';

/**
 * Fill in defaults for a partial options object.
 */
export function resolveDecodeOptions(options?: DecodeOptions): ResolvedDecodeOptions {
  if (options === undefined) return DEFAULT_DECODE_OPTIONS;
  return {
    mode: options.mode ?? DEFAULT_DECODE_OPTIONS.mode,
    warnOnMalformed: options.warnOnMalformed ?? DEFAULT_DECODE_OPTIONS.warnOnMalformed,
  };
}
