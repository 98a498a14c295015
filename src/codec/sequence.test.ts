/**
 * Tests for whole-sequence conversions.
 */

import { describe, it, expect } from 'vitest';
import {
  decode,
  decodeInto,
  decodeAt,
  toCodeArray,
  encode,
  encodedLength,
  checkUtf16IsValid,
  isChinese,
} from './sequence.ts';
import { textEncoder } from './encoding.ts';
import { CodePointOverflowError, LengthError } from '../types/errors.ts';

// "中A"
const MIXED = new Uint8Array([0xe4, 0xb8, 0xad, 0x41]);

describe('Sequence Codec', () => {
  describe('decode', () => {
    it('should decode every character', () => {
      expect(decode(MIXED)).toEqual([0x4e2d, 0x41]);
    });

    it('should return an empty list for empty input', () => {
      expect(decode(new Uint8Array(0))).toEqual([]);
    });

    it('should agree with the platform decoder on valid text', () => {
      const text = 'añ中😀z';
      const expected = Array.from(text, (ch) => ch.codePointAt(0));
      expect(decode(textEncoder.encode(text))).toEqual(expected);
    });
  });

  describe('decodeInto', () => {
    it('should write the code points and a 0 sentinel', () => {
      const dest = new Uint32Array([7, 7, 7, 7]);
      expect(decodeInto(MIXED, dest)).toBe(2);
      expect(Array.from(dest)).toEqual([0x4e2d, 0x41, 0, 7]);
    });

    it('should refuse a destination without room for the sentinel', () => {
      const dest = new Uint32Array([7, 7]);
      expect(() => decodeInto(MIXED, dest)).toThrow(LengthError);
      expect(Array.from(dest)).toEqual([7, 7]);
    });

    it('should fill a 16-bit destination when every character fits', () => {
      const dest = new Uint16Array(3);
      expect(decodeInto(MIXED, dest)).toBe(2);
      expect(Array.from(dest)).toEqual([0x4e2d, 0x41, 0]);
    });

    it('should reject a character too wide for a 16-bit destination', () => {
      const dest = new Uint16Array([7, 7, 7]);
      expect(() => decodeInto(textEncoder.encode('a😀'), dest)).toThrow(
        'Code point 0x1F600 does not fit in 16 bits'
      );
      expect(Array.from(dest)).toEqual([7, 7, 7]);
    });

    it('should accept a plain array', () => {
      const dest: number[] = [0, 0, 0];
      decodeInto(MIXED, dest);
      expect(dest).toEqual([0x4e2d, 0x41, 0]);
    });
  });

  describe('toCodeArray', () => {
    it('should produce a 16-bit array', () => {
      const codes = toCodeArray(MIXED, 'u16');
      expect(codes).toBeInstanceOf(Uint16Array);
      expect(Array.from(codes)).toEqual([0x4e2d, 0x41]);
    });

    it('should produce a 32-bit array', () => {
      const codes = toCodeArray(textEncoder.encode('😀'), 'u32');
      expect(codes).toBeInstanceOf(Uint32Array);
      expect(Array.from(codes)).toEqual([0x1f600]);
    });

    it('should reject a character that does not fit 16 bits', () => {
      expect(() => toCodeArray(textEncoder.encode('a😀'), 'u16')).toThrow(CodePointOverflowError);
      expect(() => toCodeArray(textEncoder.encode('😀'), 'u16')).toThrow(
        'Code point 0x1F600 does not fit in 16 bits'
      );
    });
  });

  describe('decodeAt', () => {
    it('should return the code point at a character index', () => {
      expect(decodeAt(MIXED, 0)).toBe(0x4e2d);
      expect(decodeAt(MIXED, 1)).toBe(0x41);
    });

    it('should return 0 past the end', () => {
      expect(decodeAt(MIXED, 2)).toBe(0);
    });
  });

  describe('encode', () => {
    it('should encode every code point in its shortest form', () => {
      expect(Array.from(encode([0x4e2d, 0x41]))).toEqual([0xe4, 0xb8, 0xad, 0x41]);
    });

    it('should encode only the first count code points', () => {
      expect(Array.from(encode([0x4e2d, 0x41], 1))).toEqual([0xe4, 0xb8, 0xad]);
    });

    it('should size the output exactly', () => {
      expect(encodedLength([0x41, 0xe9, 0x4e2d, 0x1f600, 0xffffffff])).toBe(1 + 2 + 3 + 4 + 7);
      expect(encodedLength([0x41, 0xe9], 1)).toBe(1);
    });

    it('should round-trip through decode', () => {
      const codepoints = [0, 0x7f, 0x800, 0x10ffff, 0x3ffffff, 0x80000000, 0xffffffff];
      expect(decode(encode(codepoints))).toEqual(codepoints);
    });
  });

  describe('checkUtf16IsValid', () => {
    it('should return the offset of the first 4-unit character', () => {
      expect(checkUtf16IsValid(textEncoder.encode('a中😀b'))).toBe(4);
    });

    it('should return the length when everything fits', () => {
      const bytes = textEncoder.encode('a中b');
      expect(checkUtf16IsValid(bytes)).toBe(bytes.length);
    });
  });

  describe('isChinese', () => {
    it('should test the first character against the narrow range', () => {
      expect(isChinese(textEncoder.encode('中文'))).toBe(true);
      expect(isChinese(textEncoder.encode('a中'))).toBe(false);
      expect(isChinese(new Uint8Array(0))).toBe(false);
    });

    it('should include extension blocks in the broad range', () => {
      // U+3400, first of extension A
      const extA = encode([0x3400]);
      expect(isChinese(extA)).toBe(false);
      expect(isChinese(extA, true)).toBe(true);
      // U+9FFF lies past U+9FA5
      expect(isChinese(encode([0x9fff]))).toBe(false);
      expect(isChinese(encode([0x9fff]), true)).toBe(true);
    });
  });
});
