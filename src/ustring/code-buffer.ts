/**
 * Owning storage for decoded code points.
 *
 * Encapsulates the allocation lifecycle of a UString:
 * Unallocated (no backing array) → Allocated → Released (back to
 * Unallocated). Every allocation, growth and release goes through this
 * class; nothing else touches the backing array's identity.
 *
 * The backing array always has one slot more than `capacity`. The slot at
 * `length` holds 0 whenever the buffer is allocated.
 *
 * Growth doubles when a request falls between the current capacity and
 * twice that, so a run of single-element appends reallocates O(log n)
 * times. A reallocation builds the new array completely before swapping it
 * in; if allocation throws, the old array and length are untouched.
 */

import type { CodeUnitKind } from '../types/config.ts';
import { AllocationError, LengthError } from '../types/errors.ts';
import { createCodeArray, type CodeArray } from '../codec/code-units.ts';

/**
 * Largest length a buffer may reach: the maximum typed-array length
 * shifted right by two, which keeps length and byte-size arithmetic well
 * inside safe integers.
 */
export const MAX_SIZE = 0xffffffff >>> 2;

// =============================================================================
// Growth Policy
// =============================================================================

/**
 * Reject anything that is not an integer in [0, MAX_SIZE].
 * @throws LengthError
 */
export function checkMaxSize(requested: number, operation: string): void {
  if (!Number.isInteger(requested) || requested < 0 || requested > MAX_SIZE) {
    throw new LengthError(operation, requested);
  }
}

/**
 * Capacity to allocate when `requested` slots are needed and `oldCapacity`
 * are available: at least double when growing by less than that, clamped
 * to MAX_SIZE.
 * @throws LengthError when `requested` exceeds MAX_SIZE
 */
export function nextCapacity(requested: number, oldCapacity: number): number {
  checkMaxSize(requested, 'ustring.create');
  if (requested > oldCapacity && requested < 2 * oldCapacity) {
    return Math.min(2 * oldCapacity, MAX_SIZE);
  }
  return requested;
}

/**
 * Allocate `capacity` usable slots plus the sentinel slot.
 * @throws AllocationError when the engine refuses the allocation
 */
export function allocateCodes(kind: CodeUnitKind, capacity: number): CodeArray {
  try {
    return createCodeArray(kind, capacity + 1);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new AllocationError(capacity + 1, error);
    }
    throw error;
  }
}

function isCodeArray(value: ArrayLike<number>): value is CodeArray {
  return value instanceof Uint16Array || value instanceof Uint32Array;
}

// =============================================================================
// CodeBuffer
// =============================================================================

export class CodeBuffer {
  readonly kind: CodeUnitKind;
  private slots: CodeArray | null = null;
  private len = 0;
  private cap = 0;

  constructor(kind: CodeUnitKind) {
    this.kind = kind;
  }

  /**
   * Allocated buffer with exactly `capacity` usable slots and length 0.
   */
  static withCapacity(kind: CodeUnitKind, capacity: number): CodeBuffer {
    checkMaxSize(capacity, 'ustring.create');
    const buffer = new CodeBuffer(kind);
    buffer.slots = allocateCodes(kind, capacity);
    buffer.cap = capacity;
    return buffer;
  }

  /**
   * Take ownership of `array` without copying. `length` code points are in
   * use; the last slot of `array` is reserved for the sentinel.
   */
  static adopt(array: CodeArray, length: number): CodeBuffer {
    if (!Number.isInteger(length) || length < 0 || length >= array.length) {
      throw new LengthError('ustring.adopt', length + 1);
    }
    checkMaxSize(array.length - 1, 'ustring.adopt');
    const buffer = new CodeBuffer(array instanceof Uint16Array ? 'u16' : 'u32');
    buffer.slots = array;
    buffer.cap = array.length - 1;
    buffer.setLength(length);
    return buffer;
  }

  get length(): number {
    return this.len;
  }

  get capacity(): number {
    return this.cap;
  }

  get isAllocated(): boolean {
    return this.slots !== null;
  }

  /**
   * Zero-copy view of `[start, end)`. Invalidated by the next reallocation.
   */
  view(start: number = 0, end: number = this.len): CodeArray {
    if (this.slots === null) return createCodeArray(this.kind, 0);
    return this.slots.subarray(start, end);
  }

  /**
   * Whether `array` shares backing memory with this buffer.
   */
  aliases(array: ArrayLike<number>): array is CodeArray {
    return this.slots !== null && isCodeArray(array) && array.buffer === this.slots.buffer;
  }

  get(index: number): number {
    if (this.slots === null || index < 0 || index >= this.slots.length) return 0;
    return this.slots[index];
  }

  set(index: number, cp: number): void {
    if (this.slots !== null) this.slots[index] = cp;
  }

  /**
   * Set the in-use length and write the sentinel after it.
   */
  setLength(length: number): void {
    this.len = length;
    if (this.slots !== null) this.slots[length] = 0;
  }

  /**
   * Request room for `requested` code points. Never shrinks below the
   * current length; shrinks toward `requested` when it is below capacity.
   */
  reserve(requested: number): void {
    checkMaxSize(requested, 'ustring.reserve');
    const target = Math.max(requested, this.len);
    if (target === this.cap) return;
    this.reallocate(nextCapacity(target, this.cap));
  }

  /**
   * Grow if `required` code points do not fit.
   */
  ensure(required: number): void {
    if (required > this.cap) this.reserve(required);
  }

  /**
   * Reallocate to exactly `capacity` slots, truncating the content if it
   * does not fit.
   */
  reallocate(capacity: number): void {
    const next = allocateCodes(this.kind, capacity);
    const kept = Math.min(this.len, capacity);
    if (this.slots !== null) next.set(this.slots.subarray(0, kept));
    this.slots = next;
    this.cap = capacity;
    this.setLength(kept);
  }

  /**
   * Move `[start, end)` so that it begins at `target`. Overlap-safe.
   */
  shift(target: number, start: number, end: number): void {
    if (this.slots !== null && start !== end) this.slots.copyWithin(target, start, end);
  }

  fill(cp: number, start: number, count: number): void {
    if (this.slots !== null && count > 0) this.slots.fill(cp, start, start + count);
  }

  /**
   * Copy `count` values of `source` starting at `sourceStart` to `at`.
   */
  write(source: ArrayLike<number>, sourceStart: number, count: number, at: number): void {
    if (this.slots === null || count <= 0) return;
    if (isCodeArray(source)) {
      this.slots.set(source.subarray(sourceStart, sourceStart + count), at);
      return;
    }
    for (let i = 0; i < count; i++) {
      this.slots[at + i] = source[sourceStart + i];
    }
  }

  /**
   * Drop the backing array. The buffer behaves as freshly constructed.
   */
  release(): void {
    this.slots = null;
    this.len = 0;
    this.cap = 0;
  }

  /**
   * Hand the backing array to `target` and leave this buffer Unallocated.
   */
  moveTo(target: CodeBuffer): void {
    target.slots = this.slots;
    target.len = this.len;
    target.cap = this.cap;
    this.release();
  }

  swap(other: CodeBuffer): void {
    const { slots, len, cap } = other;
    other.slots = this.slots;
    other.len = this.len;
    other.cap = this.cap;
    this.slots = slots;
    this.len = len;
    this.cap = cap;
  }
}
