/**
 * Branded types for widths and algorithmic cost.
 *
 * A Width is a plain number at runtime; the brand keeps an unchecked count
 * from reaching code that indexes by it. Cost brands mark which results
 * came from a constant-time lookup and which from a walk over the input.
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * Never exists at runtime.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Width
// =============================================================================

/**
 * Number of encoded units one character occupies, in [1, 7].
 */
export type Width = Branded<1 | 2 | 3 | 4 | 5 | 6 | 7, 'Width'>;

/** Widest encoded form: a lone 0 bit after six leading ones. */
export const MAX_WIDTH = 7;

/**
 * Check if a value is a representable width.
 */
export function isValidWidth(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= MAX_WIDTH;
}

/**
 * Narrow a raw unit count to a Width.
 * Counts outside [1, 7] are a programming error, not bad input.
 */
export function width(value: number): Width {
  if (!isValidWidth(value)) {
    throw new RangeError(`Invalid width: ${value}`);
  }
  return value as Width;
}

/** Returned by lookups when no position matches. */
export const NPOS = -1;

// =============================================================================
// Algorithmic Cost Brands
// =============================================================================

/**
 * Phantom symbol for cost-level branding.
 * Never exists at runtime — zero overhead.
 */
declare const costLevel: unique symbol;

/**
 * Cost labels used throughout public APIs.
 */
export type CostLevel = 'const' | 'linear';

/**
 * All labels less-than-or-equal to L.
 * A cheaper result widens naturally into a more expensive slot.
 */
type LevelsUpTo<L extends CostLevel> = L extends 'const' ? 'const' : 'const' | 'linear';

type CostBrand<Level extends CostLevel> = { readonly [costLevel]: Level };

/**
 * Branded value by declared cost level.
 */
export type Costed<Level extends CostLevel, T> = T & CostBrand<LevelsUpTo<Level>>;

/** Value from an O(1) operation. */
export type ConstCost<T> = Costed<'const', T>;
/** Value from an O(n) operation. */
export type LinearCost<T> = Costed<'linear', T>;

/** Tag a value as O(1). Zero runtime cost — cast only. */
export function constCost<T>(value: T): ConstCost<T> {
  return value as ConstCost<T>;
}

/** Tag a value as O(n). Zero runtime cost — cast only. */
export function linearCost<T>(value: T): LinearCost<T> {
  return value as LinearCost<T>;
}
