/**
 * String helpers in the style of the Python `str` methods.
 *
 * Character classes are ASCII only and tested by char code; anything
 * outside ASCII is neither space, letter nor digit. Positions and lengths
 * are UTF-16 code units, as everywhere on JS strings.
 */

// =============================================================================
// Character Classes
// =============================================================================

function isSpaceCode(c: number): boolean {
  return c === 32 || (c >= 9 && c <= 13);
}

function isDigitCode(c: number): boolean {
  return c >= 48 && c <= 57;
}

function isUpperCode(c: number): boolean {
  return c >= 65 && c <= 90;
}

function isLowerCode(c: number): boolean {
  return c >= 97 && c <= 122;
}

function isAlphaCode(c: number): boolean {
  return isUpperCode(c) || isLowerCode(c);
}

function isAlnumCode(c: number): boolean {
  return isAlphaCode(c) || isDigitCode(c);
}

function every(str: string, test: (c: number) => boolean): boolean {
  if (str.length === 0) return false;
  for (let i = 0; i < str.length; i++) {
    if (!test(str.charCodeAt(i))) return false;
  }
  return true;
}

/** Nonempty and every character is an ASCII letter or digit. */
export function isAlnum(str: string): boolean {
  return every(str, isAlnumCode);
}

/** Nonempty and every character is an ASCII letter. */
export function isAlpha(str: string): boolean {
  return every(str, isAlphaCode);
}

/** Nonempty and every character is an ASCII digit. */
export function isDigit(str: string): boolean {
  return every(str, isDigitCode);
}

/** Nonempty and every character is an ASCII lowercase letter. */
export function isLower(str: string): boolean {
  return every(str, isLowerCode);
}

/** Nonempty and every character is an ASCII uppercase letter. */
export function isUpper(str: string): boolean {
  return every(str, isUpperCode);
}

/** Nonempty and every character is ASCII whitespace (space, \t \n \v \f \r). */
export function isSpace(str: string): boolean {
  return every(str, isSpaceCode);
}

/** ASCII letters lowered; everything else unchanged. */
export function toLower(str: string): string {
  let out = '';
  for (let i = 0; i < str.length; i++) {
    const c = str.charCodeAt(i);
    out += isUpperCode(c) ? String.fromCharCode(c + 32) : str[i];
  }
  return out;
}

/** ASCII letters raised; everything else unchanged. */
export function toUpper(str: string): string {
  let out = '';
  for (let i = 0; i < str.length; i++) {
    const c = str.charCodeAt(i);
    out += isLowerCode(c) ? String.fromCharCode(c - 32) : str[i];
  }
  return out;
}

// =============================================================================
// Splitting
// =============================================================================

function splitWhitespace(str: string, maxsplit: number): string[] {
  const result: string[] = [];
  const len = str.length;
  let left = maxsplit;
  let i = 0;
  let j = 0;

  while (i < len) {
    while (i < len && isSpaceCode(str.charCodeAt(i))) i++;
    j = i;
    while (i < len && !isSpaceCode(str.charCodeAt(i))) i++;
    if (j < i) {
      if (left-- <= 0) break;
      result.push(str.slice(j, i));
      j = i;
    }
  }
  if (j < len) result.push(str.slice(j));
  return result;
}

function rsplitWhitespace(str: string, maxsplit: number): string[] {
  const result: string[] = [];
  let left = maxsplit;
  let i = str.length;
  let j = str.length;

  while (i > 0) {
    while (i > 0 && isSpaceCode(str.charCodeAt(i - 1))) i--;
    j = i;
    while (i > 0 && !isSpaceCode(str.charCodeAt(i - 1))) i--;
    if (i < j) {
      if (left-- <= 0) break;
      result.push(str.slice(i, j));
      j = i;
    }
  }
  if (j > 0) result.push(str.slice(0, j));
  return result.reverse();
}

/**
 * Split on `sep`, dropping empty pieces. An empty `sep` splits on runs of
 * whitespace. At most `maxsplit` pieces are cut off the front (negative:
 * no limit); whatever is left becomes the last piece.
 *
 * @example
 * split('a,b,,c', ',')      // ['a', 'b', 'c']
 * split('a b c', '', 1)     // ['a', 'b c']
 */
export function split(str: string, sep: string = '', maxsplit: number = -1): string[] {
  const limit = maxsplit < 0 ? Number.MAX_SAFE_INTEGER : maxsplit;
  if (sep.length === 0) return splitWhitespace(str, limit);

  const result: string[] = [];
  let left = limit;
  let start = 0;
  for (let end = str.indexOf(sep); end !== -1; end = str.indexOf(sep, start)) {
    if (start < end) {
      if (left-- <= 0) break;
      result.push(str.slice(start, end));
    }
    start = end + sep.length;
  }
  if (start < str.length) result.push(str.slice(start));
  return result;
}

/**
 * split, but cutting from the back. With a negative `maxsplit` the result
 * equals split's.
 *
 * @example
 * rsplit('a,b,c', ',', 1)   // ['a,b', 'c']
 */
export function rsplit(str: string, sep: string = '', maxsplit: number = -1): string[] {
  if (maxsplit < 0) return split(str, sep, maxsplit);
  if (sep.length === 0) return rsplitWhitespace(str, maxsplit);

  const result: string[] = [];
  const n = sep.length;
  let left = maxsplit;
  let end = str.length;
  let start = end > 0 ? str.lastIndexOf(sep, end - 1) : -1;
  while (start !== -1) {
    if (start + n < end) {
      if (left-- <= 0) break;
      result.push(str.slice(start + n, end));
    }
    end = start;
    start = end > 0 ? str.lastIndexOf(sep, end - 1) : -1;
  }
  if (end > 0) result.push(str.slice(0, end));
  return result.reverse();
}

/**
 * Split at line boundaries (\n, \r, \r\n). Line breaks are dropped unless
 * `keepends` is set. A trailing break does not start another line.
 */
export function splitlines(str: string, keepends: boolean = false): string[] {
  const result: string[] = [];
  const len = str.length;
  let i = 0;

  while (i < len) {
    const j = i;
    while (i < len && str[i] !== '\n' && str[i] !== '\r') i++;
    let end = i;
    if (i < len) {
      i += str[i] === '\r' && str[i + 1] === '\n' ? 2 : 1;
      if (keepends) end = i;
    }
    result.push(str.slice(j, end));
  }
  return result;
}

// =============================================================================
// Stripping
// =============================================================================

function doStrip(str: string, left: boolean, right: boolean, chars: string): string {
  const strips = chars.length === 0 ? isSpaceCode : (c: number) => chars.includes(String.fromCharCode(c));
  let i = 0;
  let j = str.length;
  if (left) {
    while (i < j && strips(str.charCodeAt(i))) i++;
  }
  if (right) {
    while (j > i && strips(str.charCodeAt(j - 1))) j--;
  }
  return str.slice(i, j);
}

/**
 * Remove leading and trailing characters found in `chars`; whitespace when
 * `chars` is empty.
 */
export function strip(str: string, chars: string = ''): string {
  return doStrip(str, true, true, chars);
}

export function lstrip(str: string, chars: string = ''): string {
  return doStrip(str, true, false, chars);
}

export function rstrip(str: string, chars: string = ''): string {
  return doStrip(str, false, true, chars);
}

// =============================================================================
// Assembling / Testing
// =============================================================================

export function join(parts: readonly string[], sep: string = ''): string {
  return parts.join(sep);
}

/**
 * Whether `str` holds `prefix` at `start`. False when `start` is past the end.
 */
export function startsWith(str: string, prefix: string, start: number = 0): boolean {
  if (start > str.length) return false;
  return str.slice(start, start + prefix.length) === prefix;
}

/**
 * Whether `str` ends with `suffix`, counting only suffixes that begin at or
 * after `start`.
 */
export function endsWith(str: string, suffix: string, start: number = 0): boolean {
  if (str.length < start + suffix.length) return false;
  return str.slice(str.length - suffix.length) === suffix;
}

/**
 * Non-overlapping occurrences of `sub`. Zero for an empty `sub`.
 */
export function count(str: string, sub: string): number {
  if (sub.length === 0) return 0;
  let result = 0;
  for (let cur = str.indexOf(sub); cur !== -1; cur = str.indexOf(sub, cur + sub.length)) {
    result++;
  }
  return result;
}

/**
 * Replace occurrences of `oldSub` with `newSub`, left to right. At most
 * `maxCount` replacements when it is not negative. An empty `oldSub`
 * leaves `str` as is.
 */
export function replace(str: string, oldSub: string, newSub: string, maxCount: number = -1): string {
  if (oldSub.length === 0) return str;
  let out = '';
  let start = 0;
  let done = 0;
  for (let end = str.indexOf(oldSub); end !== -1; end = str.indexOf(oldSub, start)) {
    if (maxCount > -1 && done >= maxCount) break;
    out += str.slice(start, end) + newSub;
    start = end + oldSub.length;
    done++;
  }
  return out + str.slice(start);
}

/**
 * `str` repeated `n` times; empty when `n` <= 0.
 */
export function mul(str: string, n: number): string {
  if (n <= 0 || str.length === 0) return '';
  return str.repeat(n);
}
