/**
 * Tests for width inference.
 */

import { describe, it, expect } from 'vitest';
import {
  widthFromLeadByte,
  widthFromLeadByteCascade,
  widthFromLeadByteClz,
  widthFromCodepoint,
  widthFromCodepointCascade,
  widthFromCodepointClz,
  isContinuationByte,
  scanCharWidth,
} from './width.ts';
import { encodeCodepoint } from './unit-codec.ts';
import { CodePointRangeError } from '../types/errors.ts';
import { countCharacters } from '../mapping/position-map.ts';

const BREAKPOINTS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [0x7f, 1],
  [0x80, 2],
  [0x7ff, 2],
  [0x800, 3],
  [0xffff, 3],
  [0x10000, 4],
  [0x1fffff, 4],
  [0x200000, 5],
  [0x3ffffff, 5],
  [0x4000000, 6],
  [0x7fffffff, 6],
  [0x80000000, 7],
  [0xffffffff, 7],
];

describe('Width Inference', () => {
  describe('widthFromLeadByte', () => {
    it('should read the width from the leading one-bits', () => {
      expect(widthFromLeadByte(0x41)).toBe(1);
      expect(widthFromLeadByte(0xc3)).toBe(2);
      expect(widthFromLeadByte(0xe4)).toBe(3);
      expect(widthFromLeadByte(0xf0)).toBe(4);
      expect(widthFromLeadByte(0xf8)).toBe(5);
      expect(widthFromLeadByte(0xfc)).toBe(6);
      expect(widthFromLeadByte(0xfe)).toBe(7);
    });

    it('should treat continuation bytes and 0xFF as single units', () => {
      expect(widthFromLeadByte(0x80)).toBe(1);
      expect(widthFromLeadByte(0xbf)).toBe(1);
      expect(widthFromLeadByte(0xff)).toBe(1);
    });

    it('should return the signalled width even when it runs past the end', () => {
      expect(widthFromLeadByte(0xe4, 1)).toBe(3);
      expect(widthFromLeadByte(0xfe, 2)).toBe(7);
    });

    it('should return 1 when nothing remains', () => {
      expect(widthFromLeadByte(0xe4, 0)).toBe(1);
      expect(widthFromLeadByteClz(0xe4, 0)).toBe(1);
    });

    it('should agree between cascade and clz on every byte', () => {
      for (let b = 0; b <= 0xff; b++) {
        expect(widthFromLeadByteClz(b)).toBe(widthFromLeadByteCascade(b));
      }
    });
  });

  describe('widthFromCodepoint', () => {
    it('should follow the breakpoints', () => {
      for (const [cp, w] of BREAKPOINTS) {
        expect(widthFromCodepoint(cp)).toBe(w);
      }
    });

    it('should agree between cascade and clz', () => {
      for (const [cp] of BREAKPOINTS) {
        expect(widthFromCodepointClz(cp)).toBe(widthFromCodepointCascade(cp));
      }
      for (let cp = 1; cp < 0x100000000; cp = cp * 3 + 1) {
        expect(widthFromCodepointClz(cp)).toBe(widthFromCodepointCascade(cp));
      }
    });

    it('should match the lead byte of the encoded form', () => {
      for (const [cp, w] of BREAKPOINTS) {
        expect(widthFromLeadByte(encodeCodepoint(cp)[0])).toBe(w);
      }
    });

    it('should reject values that are not unsigned 32-bit integers', () => {
      expect(() => widthFromCodepoint(-1)).toThrow(CodePointRangeError);
      expect(() => widthFromCodepoint(0x100000000)).toThrow(CodePointRangeError);
      expect(() => widthFromCodepointClz(1.5)).toThrow(CodePointRangeError);
    });
  });

  describe('isContinuationByte', () => {
    it('should match 10xxxxxx only', () => {
      expect(isContinuationByte(0x80)).toBe(true);
      expect(isContinuationByte(0xbf)).toBe(true);
      expect(isContinuationByte(0x7f)).toBe(false);
      expect(isContinuationByte(0xc0)).toBe(false);
    });
  });

  describe('scanCharWidth', () => {
    it('should count the continuation bytes that follow', () => {
      const bytes = new Uint8Array([0xe4, 0xb8, 0xad, 0x41]);
      expect(scanCharWidth(bytes, 0)).toBe(3);
      expect(scanCharWidth(bytes, 3)).toBe(1);
    });

    it('should stop at the end of the input', () => {
      const bytes = new Uint8Array([0xe4, 0xb8]);
      expect(scanCharWidth(bytes, 0)).toBe(2);
      expect(scanCharWidth(bytes, 2)).toBe(1);
    });

    it('should cap the width at 7', () => {
      const bytes = new Uint8Array([0xfe, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80]);
      expect(scanCharWidth(bytes, 0)).toBe(7);
    });

    it('should start a new character after seven units of continuation run', () => {
      const bytes = new Uint8Array([0xfe, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80]);
      expect(scanCharWidth(bytes, 7)).toBe(2);
      expect(countCharacters(bytes, { warnOnMalformed: false })).toBe(2);
    });
  });
});
