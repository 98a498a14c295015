/**
 * Storage kinds for decoded code points.
 */

import type { CodeUnitKind } from '../types/config.ts';
import { CodePointOverflowError } from '../types/errors.ts';

/**
 * Typed array backing a buffer of the given kind.
 */
export type CodeArrayOf<K extends CodeUnitKind> = K extends 'u16' ? Uint16Array : Uint32Array;

export type CodeArray = Uint16Array | Uint32Array;

interface CodeUnitSpec {
  readonly bits: number;
  readonly max: number;
}

const SPECS: Readonly<Record<CodeUnitKind, CodeUnitSpec>> = Object.freeze({
  u16: Object.freeze({ bits: 16, max: 0xffff }),
  u32: Object.freeze({ bits: 32, max: 0xffffffff }),
});

/**
 * Largest code point a kind can hold.
 */
export function maxCodeOf(kind: CodeUnitKind): number {
  return SPECS[kind].max;
}

/**
 * Allocate a zeroed typed array of the given kind.
 * Allocation failures surface as the engine's RangeError.
 */
export function createCodeArray<K extends CodeUnitKind>(kind: K, slots: number): CodeArrayOf<K>;
export function createCodeArray(kind: CodeUnitKind, slots: number): CodeArray {
  return kind === 'u16' ? new Uint16Array(slots) : new Uint32Array(slots);
}

/**
 * Reject a value the kind cannot store. Values are never truncated.
 * @throws CodePointOverflowError
 */
export function checkCodeFits(kind: CodeUnitKind, cp: number): void {
  const spec = SPECS[kind];
  if (!Number.isInteger(cp) || cp < 0 || cp > spec.max) {
    throw new CodePointOverflowError(cp, spec.bits);
  }
}

/**
 * checkCodeFits over `count` values of `source` starting at `start`.
 */
export function checkCodesFit(
  kind: CodeUnitKind,
  source: ArrayLike<number>,
  start: number = 0,
  count: number = source.length - start
): void {
  const max = SPECS[kind].max;
  for (let i = start; i < start + count; i++) {
    const cp = source[i];
    if (cp > max || cp < 0 || !Number.isInteger(cp)) {
      throw new CodePointOverflowError(cp, SPECS[kind].bits);
    }
  }
}
