/**
 * UString: a growable, owning sequence of decoded code points.
 *
 * Storage is a typed array picked by `kind` ('u16' or 'u32') with one slot
 * past the last code point that always reads 0. Positions are code-point
 * indices. Every range, length and overflow check runs before the first
 * write, so a throwing call leaves the string exactly as it was.
 *
 * Sources for append/assign/insert/replace/compare can be another UString,
 * any array-like of code points, or (for the `*Fill` forms) a repeated
 * value. A source that shares storage with the target is copied first.
 */

import { NPOS } from '../types/branded.ts';
import { DEFAULT_CODE_UNIT_KIND, type CodeUnitKind, type DecodeOptions, type UStringOptions } from '../types/config.ts';
import { LengthError, UStringRangeError } from '../types/errors.ts';
import { checkCodeFits, checkCodesFit, type CodeArray } from '../codec/code-units.ts';
import { textDecoder, textEncoder } from '../codec/encoding.ts';
import { decode, encode, encodedLength, type CodeSink } from '../codec/sequence.ts';
import { widthFromCodepoint } from '../codec/width.ts';
import { CodeBuffer, MAX_SIZE, checkMaxSize } from './code-buffer.ts';

/** Code points to read from: another UString or any array-like. */
export type CodeSource = UString<CodeUnitKind> | ArrayLike<number>;

/** What the search operations look for: a sequence or a single code point. */
export type CodeNeedle = CodeSource | number;

interface SourceRange {
  codes: ArrayLike<number>;
  start: number;
  count: number;
}

const EMPTY_CODES: readonly number[] = Object.freeze([]);

function compareCodes(
  a: ArrayLike<number>,
  aStart: number,
  aCount: number,
  b: ArrayLike<number>,
  bStart: number,
  bCount: number
): -1 | 0 | 1 {
  const n = Math.min(aCount, bCount);
  for (let i = 0; i < n; i++) {
    const x = a[aStart + i];
    const y = b[bStart + i];
    if (x !== y) return x < y ? -1 : 1;
  }
  if (aCount === bCount) return 0;
  return aCount < bCount ? -1 : 1;
}

/**
 * `count` clipped to `rest`; all of it when omitted or larger (Infinity
 * included), none when negative.
 * @throws LengthError when `count` is NaN or fractional
 */
function clipCount(rest: number, count: number | undefined, operation: string): number {
  if (count === undefined || count > rest) return rest;
  if (!Number.isInteger(count)) throw new LengthError(operation, count);
  return Math.max(0, count);
}

function containsCode(set: ArrayLike<number>, cp: number): boolean {
  for (let i = 0; i < set.length; i++) {
    if (set[i] === cp) return true;
  }
  return false;
}

export class UString<K extends CodeUnitKind = 'u32'> implements Iterable<number> {
  /** Largest length any UString can reach. */
  static readonly MAX_SIZE = MAX_SIZE;

  readonly kind: K;
  private readonly buf: CodeBuffer;

  /**
   * Empty, Unallocated string. Nothing is allocated until the first write.
   */
  constructor(kind: K) {
    this.kind = kind;
    this.buf = new CodeBuffer(kind);
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Copy `count` codes of `codes` from `start` into a new string with
   * capacity for twice that many.
   */
  private static build<K extends CodeUnitKind>(
    kind: K,
    codes: ArrayLike<number>,
    start: number,
    count: number,
    operation: string
  ): UString<K> {
    checkMaxSize(count, operation);
    checkCodesFit(kind, codes, start, count);
    const s = new UString(kind);
    s.buf.reallocate(Math.min(count * 2, MAX_SIZE));
    s.buf.write(codes, start, count, 0);
    s.buf.setLength(count);
    return s;
  }

  static empty(): UString<'u32'>;
  static empty<K extends CodeUnitKind>(kind: K): UString<K>;
  static empty(kind: CodeUnitKind = DEFAULT_CODE_UNIT_KIND): UString<CodeUnitKind> {
    return new UString(kind);
  }

  /**
   * Decode an encoded byte sequence.
   * @throws DecodeError in strict mode
   * @throws CodePointOverflowError when a character does not fit `kind`
   */
  static fromBytes(bytes: Uint8Array, options?: DecodeOptions): UString<'u32'>;
  static fromBytes<K extends CodeUnitKind>(bytes: Uint8Array, options: UStringOptions & { kind: K }): UString<K>;
  static fromBytes(bytes: Uint8Array, options?: UStringOptions): UString<CodeUnitKind> {
    const codes = decode(bytes, options);
    return UString.build(options?.kind ?? DEFAULT_CODE_UNIT_KIND, codes, 0, codes.length, 'ustring.ustring');
  }

  /**
   * Build from a JS string by way of its encoded form.
   */
  static fromString(text: string): UString<'u32'>;
  static fromString<K extends CodeUnitKind>(text: string, kind: K): UString<K>;
  static fromString(text: string, kind: CodeUnitKind = DEFAULT_CODE_UNIT_KIND): UString<CodeUnitKind> {
    return UString.fromBytes(textEncoder.encode(text), { kind });
  }

  static fromCodePoints(codepoints: ArrayLike<number>): UString<'u32'>;
  static fromCodePoints<K extends CodeUnitKind>(codepoints: ArrayLike<number>, kind: K): UString<K>;
  static fromCodePoints(
    codepoints: ArrayLike<number>,
    kind: CodeUnitKind = DEFAULT_CODE_UNIT_KIND
  ): UString<CodeUnitKind> {
    return UString.build(kind, codepoints, 0, codepoints.length, 'ustring.ustring');
  }

  /**
   * `count` copies of `cp`.
   */
  static filled(count: number, cp: number): UString<'u32'>;
  static filled<K extends CodeUnitKind>(count: number, cp: number, kind: K): UString<K>;
  static filled(count: number, cp: number, kind: CodeUnitKind = DEFAULT_CODE_UNIT_KIND): UString<CodeUnitKind> {
    const s = new UString(kind);
    s.appendFill(count, cp);
    return s;
  }

  /**
   * Take ownership of `array` without copying it. The first `length` slots
   * are the content; capacity is every slot but the last, which becomes the
   * sentinel. The caller must not touch `array` afterwards.
   * @throws LengthError when `array` has no room for the sentinel
   */
  static adopt(array: Uint16Array, length?: number): UString<'u16'>;
  static adopt(array: Uint32Array, length?: number): UString<'u32'>;
  static adopt(array: CodeArray, length: number = array.length - 1): UString<CodeUnitKind> {
    const adopted = CodeBuffer.adopt(array, length);
    const s = new UString(adopted.kind);
    adopted.moveTo(s.buf);
    return s;
  }

  /**
   * Independent copy of `other`, or of up to `count` code points of it
   * starting at `pos`.
   * @throws UStringRangeError when `pos` > other.length
   */
  static copyOf<K extends CodeUnitKind>(other: UString<K>, pos: number = 0, count?: number): UString<K> {
    other.checkPosition(pos, 'ustring.ustring');
    const taken = other.limit(pos, count, 'ustring.ustring');
    return UString.build(other.kind, other.buf.view(), pos, taken, 'ustring.ustring');
  }

  /**
   * New string holding `left` followed by `right`, sized exactly.
   */
  static concat<K extends CodeUnitKind>(left: UString<K>, right: CodeSource): UString<K> {
    const result = new UString(left.kind);
    result.reserve(left.length + right.length);
    result.append(left);
    result.append(right);
    return result;
  }

  // ===========================================================================
  // Observers
  // ===========================================================================

  get length(): number {
    return this.buf.length;
  }

  size(): number {
    return this.buf.length;
  }

  get capacity(): number {
    return this.buf.capacity;
  }

  get isAllocated(): boolean {
    return this.buf.isAllocated;
  }

  isEmpty(): boolean {
    return this.buf.length === 0;
  }

  /**
   * Bytes the content takes once encoded.
   */
  sizeBytes(): number {
    return encodedLength(this.buf.view());
  }

  /**
   * Zero-copy view of the content. Invalidated by any call that grows,
   * shrinks or releases the storage.
   */
  data(): CodeArray {
    return this.buf.view();
  }

  /**
   * Unchecked read. `get(length)` is the 0 sentinel.
   */
  get(pos: number): number {
    return this.buf.get(pos);
  }

  /**
   * @throws UStringRangeError when `pos` >= length
   */
  at(pos: number): number {
    if (!Number.isInteger(pos) || pos < 0 || pos >= this.length) {
      throw new UStringRangeError('ustring.at', pos, this.length, true);
    }
    return this.buf.get(pos);
  }

  /** First code point; the sentinel 0 when empty. */
  front(): number {
    return this.buf.get(0);
  }

  /**
   * @throws UStringRangeError when empty
   */
  back(): number {
    if (this.length === 0) throw new UStringRangeError('ustring.back', 0, 0, true);
    return this.buf.get(this.length - 1);
  }

  *[Symbol.iterator](): Generator<number, void, undefined> {
    for (let i = 0; i < this.length; i++) {
      yield this.buf.get(i);
    }
  }

  *reversed(): Generator<number, void, undefined> {
    for (let i = this.length - 1; i >= 0; i--) {
      yield this.buf.get(i);
    }
  }

  // ===========================================================================
  // Capacity
  // ===========================================================================

  /**
   * Request capacity for `requested` code points. Never drops content; a
   * request below the current length shrinks to the length.
   * @throws LengthError when `requested` > MAX_SIZE
   */
  reserve(requested: number = 0): void {
    this.buf.reserve(requested);
  }

  /**
   * Truncate, or extend with copies of `cp`.
   */
  resize(length: number, cp: number = 0): this {
    checkMaxSize(length, 'ustring.resize');
    if (length > this.length) return this.appendFill(length - this.length, cp);
    if (length < this.length) this.buf.setLength(length);
    return this;
  }

  /** Length 0; capacity is kept. */
  clear(): void {
    this.buf.setLength(0);
  }

  shrinkToFit(): void {
    if (this.capacity > this.length) this.reserve(0);
  }

  /**
   * Drop the storage. The string is Unallocated and empty afterwards.
   */
  release(): void {
    this.buf.release();
  }

  /**
   * Move the storage into a new string; this one is left Unallocated.
   */
  take(): UString<K> {
    const moved = new UString(this.kind);
    this.buf.moveTo(moved.buf);
    return moved;
  }

  swap(other: UString<K>): void {
    if (other.kind !== this.kind) {
      throw new TypeError(`Cannot swap a ${this.kind} string with a ${other.kind} string`);
    }
    this.buf.swap(other.buf);
  }

  // ===========================================================================
  // Element Edits
  // ===========================================================================

  /**
   * @throws CodePointOverflowError when `cp` does not fit `kind`
   */
  pushBack(cp: number): this {
    return this.fillSplice(this.length, 0, 1, cp, 'ustring.pushBack');
  }

  /**
   * Remove and return the last code point.
   * @throws UStringRangeError when empty
   */
  popBack(): number {
    if (this.length === 0) throw new UStringRangeError('ustring.popBack', 0, 0, true);
    const last = this.buf.get(this.length - 1);
    this.buf.setLength(this.length - 1);
    return last;
  }

  // ===========================================================================
  // Assign
  // ===========================================================================

  /**
   * Replace the whole content with `src` (or its `[pos, pos + count)` part).
   * Capacity shrinks to twice the new length when it exceeds that.
   */
  assign(src: CodeSource, pos: number = 0, count?: number): this {
    const range = this.resolveSource(src, pos, count, 'ustring.assign');
    return this.assignCodes(range, 'ustring.assign');
  }

  assignBytes(bytes: Uint8Array, options?: DecodeOptions): this {
    const codes = decode(bytes, options);
    return this.assignCodes({ codes, start: 0, count: codes.length }, 'ustring.assign');
  }

  assignString(text: string): this {
    return this.assignBytes(textEncoder.encode(text));
  }

  assignFill(count: number, cp: number): this {
    return this.fillSplice(0, this.length, count, cp, 'ustring.assign');
  }

  // ===========================================================================
  // Append
  // ===========================================================================

  append(src: CodeSource, pos: number = 0, count?: number): this {
    const range = this.resolveSource(src, pos, count, 'ustring.append');
    return this.splice(this.length, 0, range, 'ustring.append');
  }

  appendBytes(bytes: Uint8Array, options?: DecodeOptions): this {
    const codes = decode(bytes, options);
    return this.splice(this.length, 0, { codes, start: 0, count: codes.length }, 'ustring.append');
  }

  appendString(text: string): this {
    return this.appendBytes(textEncoder.encode(text));
  }

  appendFill(count: number, cp: number): this {
    return this.fillSplice(this.length, 0, count, cp, 'ustring.append');
  }

  // ===========================================================================
  // Insert / Replace / Erase
  // ===========================================================================

  /**
   * Insert `src` (or its `[srcPos, srcPos + count)` part) before `pos`.
   * @throws UStringRangeError when `pos` > length or `srcPos` > source length
   */
  insert(pos: number, src: CodeSource, srcPos: number = 0, count?: number): this {
    this.checkPosition(pos, 'ustring.insert');
    const range = this.resolveSource(src, srcPos, count, 'ustring.insert');
    return this.splice(pos, 0, range, 'ustring.insert');
  }

  insertFill(pos: number, count: number, cp: number): this {
    this.checkPosition(pos, 'ustring.insert');
    return this.fillSplice(pos, 0, count, cp, 'ustring.insert');
  }

  insertBytes(pos: number, bytes: Uint8Array, options?: DecodeOptions): this {
    this.checkPosition(pos, 'ustring.insert');
    const codes = decode(bytes, options);
    return this.splice(pos, 0, { codes, start: 0, count: codes.length }, 'ustring.insert');
  }

  insertString(pos: number, text: string): this {
    return this.insertBytes(pos, textEncoder.encode(text));
  }

  /**
   * Replace up to `n1` code points at `pos` with `src` (or its
   * `[srcPos, srcPos + n2)` part). `n1` is clipped to the end.
   */
  replace(pos: number, n1: number, src: CodeSource, srcPos: number = 0, n2?: number): this {
    this.checkPosition(pos, 'ustring.replace');
    const removed = this.limit(pos, n1, 'ustring.replace');
    const range = this.resolveSource(src, srcPos, n2, 'ustring.replace');
    return this.splice(pos, removed, range, 'ustring.replace');
  }

  /**
   * Replace up to `n1` code points at `pos` with `n2` copies of `cp`.
   */
  replaceFill(pos: number, n1: number, n2: number, cp: number): this {
    this.checkPosition(pos, 'ustring.replace');
    return this.fillSplice(pos, this.limit(pos, n1, 'ustring.replace'), n2, cp, 'ustring.replace');
  }

  /**
   * Remove up to `count` code points at `pos`; everything from `pos` when
   * `count` is omitted.
   */
  erase(pos: number = 0, count?: number): this {
    this.checkPosition(pos, 'ustring.erase');
    if (count === undefined) {
      this.buf.setLength(pos);
      return this;
    }
    const removed = this.limit(pos, count, 'ustring.erase');
    if (removed === 0) return this;
    return this.splice(pos, removed, { codes: EMPTY_CODES, start: 0, count: 0 }, 'ustring.erase');
  }

  /**
   * Copy up to `count` code points from `pos` into `dest`. No sentinel is
   * written.
   * @returns the number of code points copied
   * @throws CodePointOverflowError when `dest` is a Uint16Array and a value
   *   does not fit (nothing is written)
   */
  copyTo(dest: CodeSink, count: number, pos: number = 0): number {
    this.checkPosition(pos, 'ustring.copy');
    const copied = this.limit(pos, count, 'ustring.copy');
    if (dest instanceof Uint16Array) checkCodesFit('u16', this.buf.view(), pos, copied);
    for (let i = 0; i < copied; i++) {
      dest[i] = this.buf.get(pos + i);
    }
    return copied;
  }

  // ===========================================================================
  // Comparison
  // ===========================================================================

  /**
   * Lexicographic order by code-point value; a proper prefix sorts first.
   */
  compare(src: CodeSource): -1 | 0 | 1 {
    const other = src instanceof UString ? src.buf.view() : src;
    return compareCodes(this.buf.view(), 0, this.length, other, 0, other.length);
  }

  /**
   * Compare `[pos1, pos1 + n1)` of this string with `[pos2, pos2 + n2)` of
   * `src`. Both counts are clipped to their ends.
   */
  compareRange(pos1: number, n1: number, src: CodeSource, pos2: number = 0, n2?: number): -1 | 0 | 1 {
    this.checkPosition(pos1, 'ustring.compare');
    const own = this.limit(pos1, n1, 'ustring.compare');
    const { codes, start, count } = this.sourceRange(src, pos2, n2, 'ustring.compare');
    return compareCodes(this.buf.view(), pos1, own, codes, start, count);
  }

  /**
   * Compare with the decoded form of an encoded byte sequence.
   */
  compareBytes(bytes: Uint8Array, options?: DecodeOptions): -1 | 0 | 1 {
    return this.compare(decode(bytes, options));
  }

  equals(src: CodeSource): boolean {
    return this.compare(src) === 0;
  }

  /**
   * New string holding up to `count` code points from `pos`.
   * @throws UStringRangeError when `pos` > length
   */
  substr(pos: number = 0, count?: number): UString<K> {
    this.checkPosition(pos, 'ustring.substr');
    const taken = this.limit(pos, count, 'ustring.substr');
    return UString.build(this.kind, this.buf.view(), pos, taken, 'ustring.substr');
  }

  // ===========================================================================
  // Search
  // ===========================================================================
  //
  // Forward searches start at `pos` (default 0). Backward searches consider
  // matches starting at or before `pos`; an omitted or negative `pos` means
  // the end. Every search returns NPOS when nothing matches.

  /**
   * First occurrence of `needle` at or after `pos`. An empty needle matches
   * at `pos` itself when `pos` <= length.
   */
  find(needle: CodeNeedle, pos: number = 0): number {
    const codes = this.needleCodes(needle);
    const n = codes.length;
    const from = Math.max(0, pos);
    if (n === 0) return from <= this.length ? from : NPOS;
    const view = this.buf.view();
    for (let p = from; p + n <= this.length; p++) {
      if (compareCodes(view, p, n, codes, 0, n) === 0) return p;
    }
    return NPOS;
  }

  /**
   * Last occurrence of `needle` starting at or before `pos`.
   */
  rfind(needle: CodeNeedle, pos: number = NPOS): number {
    const codes = this.needleCodes(needle);
    const n = codes.length;
    if (n > this.length) return NPOS;
    const view = this.buf.view();
    for (let p = Math.min(this.length - n, this.backwardStart(pos)); p >= 0; p--) {
      if (compareCodes(view, p, n, codes, 0, n) === 0) return p;
    }
    return NPOS;
  }

  /** First position at or after `pos` holding any code point of `set`. */
  findFirstOf(set: CodeNeedle, pos: number = 0): number {
    const codes = this.needleCodes(set);
    if (codes.length === 0) return NPOS;
    for (let p = Math.max(0, pos); p < this.length; p++) {
      if (containsCode(codes, this.buf.get(p))) return p;
    }
    return NPOS;
  }

  /** Last position at or before `pos` holding any code point of `set`. */
  findLastOf(set: CodeNeedle, pos: number = NPOS): number {
    const codes = this.needleCodes(set);
    if (codes.length === 0 || this.length === 0) return NPOS;
    for (let p = Math.min(this.length - 1, this.backwardStart(pos)); p >= 0; p--) {
      if (containsCode(codes, this.buf.get(p))) return p;
    }
    return NPOS;
  }

  /** First position at or after `pos` holding no code point of `set`. */
  findFirstNotOf(set: CodeNeedle, pos: number = 0): number {
    const codes = this.needleCodes(set);
    for (let p = Math.max(0, pos); p < this.length; p++) {
      if (!containsCode(codes, this.buf.get(p))) return p;
    }
    return NPOS;
  }

  /** Last position at or before `pos` holding no code point of `set`. */
  findLastNotOf(set: CodeNeedle, pos: number = NPOS): number {
    const codes = this.needleCodes(set);
    if (this.length === 0) return NPOS;
    for (let p = Math.min(this.length - 1, this.backwardStart(pos)); p >= 0; p--) {
      if (!containsCode(codes, this.buf.get(p))) return p;
    }
    return NPOS;
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  /**
   * Encode every code point in its shortest form.
   */
  toBytes(): Uint8Array {
    return encode(this.buf.view());
  }

  /**
   * The encoded content read back as UTF-8. Values beyond U+10FFFF come out
   * as U+FFFD.
   */
  toString(): string {
    return textDecoder.decode(this.toBytes());
  }

  /**
   * Encoded width of the code point at `pos`.
   * @throws UStringRangeError when `pos` >= length
   */
  unitBytes(pos: number): number {
    return widthFromCodepoint(this.at(pos));
  }

  /**
   * Code-point index of the character that starts at `byteOffset` of the
   * encoded form. NPOS for an offset inside a character or past the end.
   */
  indexOfByte(byteOffset: number): number {
    let offset = 0;
    for (let i = 0; i < this.length; i++) {
      if (offset === byteOffset) return i;
      if (offset > byteOffset) return NPOS;
      offset += widthFromCodepoint(this.buf.get(i));
    }
    return NPOS;
  }

  /**
   * Offset in the encoded form where code point `pos` starts. NPOS when
   * `pos` >= length.
   */
  byteOffsetOf(pos: number): number {
    if (!Number.isInteger(pos) || pos < 0 || pos >= this.length) return NPOS;
    return encodedLength(this.buf.view(), pos);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private checkPosition(pos: number, operation: string): void {
    if (!Number.isInteger(pos) || pos < 0 || pos > this.length) {
      throw new UStringRangeError(operation, pos, this.length);
    }
  }

  /** `count` clipped to what remains after `pos`; all of it when omitted. */
  private limit(pos: number, count: number | undefined, operation: string): number {
    return clipCount(this.length - pos, count, operation);
  }

  private backwardStart(pos: number): number {
    return pos < 0 ? this.length : pos;
  }

  private needleCodes(needle: CodeNeedle): ArrayLike<number> {
    if (typeof needle === 'number') return [needle];
    return needle instanceof UString ? needle.buf.view() : needle;
  }

  private sourceRange(src: CodeSource, pos: number, count: number | undefined, operation: string): SourceRange {
    const codes = src instanceof UString ? src.buf.view() : src;
    if (!Number.isInteger(pos) || pos < 0 || pos > codes.length) {
      throw new UStringRangeError(operation, pos, codes.length);
    }
    return { codes, start: pos, count: clipCount(codes.length - pos, count, operation) };
  }

  /**
   * sourceRange, snapshotted when it reads from this string's own storage.
   */
  private resolveSource(src: CodeSource, pos: number, count: number | undefined, operation: string): SourceRange {
    const range = this.sourceRange(src, pos, count, operation);
    const { codes, start } = range;
    if (!this.buf.aliases(codes)) return range;
    return { codes: codes.slice(start, start + range.count), start: 0, count: range.count };
  }

  /**
   * Replace `removed` code points at `pos` with `range`. All checks run
   * before the storage is touched.
   */
  private splice(pos: number, removed: number, range: SourceRange, operation: string): this {
    const { codes, start, count } = range;
    const oldLength = this.length;
    checkMaxSize(oldLength - removed + count, operation);
    checkCodesFit(this.kind, codes, start, count);

    const newLength = oldLength - removed + count;
    this.buf.ensure(newLength);
    if (removed !== count) this.buf.shift(pos + count, pos + removed, oldLength);
    this.buf.write(codes, start, count, pos);
    this.buf.setLength(newLength);
    return this;
  }

  private fillSplice(pos: number, removed: number, count: number, cp: number, operation: string): this {
    checkMaxSize(count, operation);
    const inserted = count;
    const oldLength = this.length;
    checkMaxSize(oldLength - removed + inserted, operation);
    if (inserted > 0) checkCodeFits(this.kind, cp);

    const newLength = oldLength - removed + inserted;
    this.buf.ensure(newLength);
    if (removed !== inserted) this.buf.shift(pos + inserted, pos + removed, oldLength);
    this.buf.fill(cp, pos, inserted);
    this.buf.setLength(newLength);
    return this;
  }

  private assignCodes(range: SourceRange, operation: string): this {
    const { codes, start, count } = range;
    checkMaxSize(count, operation);
    checkCodesFit(this.kind, codes, start, count);

    if (count > this.capacity) {
      this.buf.reserve(count);
    } else if (count * 2 < this.capacity) {
      this.buf.reallocate(count * 2);
    }
    this.buf.write(codes, start, count, 0);
    this.buf.setLength(count);
    return this;
  }
}
