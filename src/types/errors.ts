/**
 * Error taxonomy for the codec and the code-point buffer.
 *
 * Every failure is raised synchronously before the target is touched, so a
 * caller that catches one of these still holds the value it had before the
 * call.
 */

/**
 * A position argument lies past the end of the sequence.
 */
export class UStringRangeError extends RangeError {
  readonly operation: string;
  readonly position: number;
  readonly size: number;

  constructor(operation: string, position: number, size: number, inclusive = false) {
    const relation = inclusive ? '>=' : '>';
    super(`${operation}: pos (which is ${position}) ${relation} this.size() (which is ${size})`);
    this.name = 'UStringRangeError';
    this.operation = operation;
    this.position = position;
    this.size = size;
  }
}

/**
 * A requested size is not a count (negative, fractional, NaN) or exceeds
 * what the buffer can represent.
 */
export class LengthError extends Error {
  readonly requested: number;

  constructor(operation: string, requested: number) {
    const reason = Number.isInteger(requested) && requested >= 0 ? 'exceeds the maximum size' : 'is not a valid size';
    super(`${operation}: requested size ${requested} ${reason}`);
    this.name = 'LengthError';
    this.requested = requested;
  }
}

/**
 * Backing storage could not be allocated. Not retried.
 */
export class AllocationError extends Error {
  readonly slots: number;

  constructor(slots: number, cause: unknown) {
    super(`Failed to allocate ${slots} code point slots`, { cause });
    this.name = 'AllocationError';
    this.slots = slots;
  }
}

/**
 * A value handed to width inference is not an unsigned 32-bit integer.
 */
export class CodePointRangeError extends RangeError {
  readonly codepoint: number;

  constructor(codepoint: number) {
    super(`Code point ${codepoint} is not an unsigned 32-bit integer`);
    this.name = 'CodePointRangeError';
    this.codepoint = codepoint;
  }
}

/**
 * Hex for unsigned integers; anything else (NaN, a hole read as undefined)
 * as String() prints it.
 */
function formatCodepoint(value: number): string {
  if (Number.isInteger(value) && value >= 0) return `0x${value.toString(16).toUpperCase()}`;
  return String(value);
}

/**
 * A code point does not fit the storage width of the target buffer.
 */
export class CodePointOverflowError extends RangeError {
  readonly codepoint: number;
  readonly bits: number;

  constructor(codepoint: number, bits: number) {
    super(`Code point ${formatCodepoint(codepoint)} does not fit in ${bits} bits`);
    this.name = 'CodePointOverflowError';
    this.codepoint = codepoint;
    this.bits = bits;
  }
}

/**
 * Strict decoding met a byte sequence that is not a well-formed character.
 */
export class DecodeError extends Error {
  readonly byteOffset: number;

  constructor(message: string, byteOffset: number) {
    super(`${message} at byte ${byteOffset}`);
    this.name = 'DecodeError';
    this.byteOffset = byteOffset;
  }
}
