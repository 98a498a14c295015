/**
 * Tests for the unit codec and the character walk.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  decodeUnits,
  encodeUnits,
  encodeUnitsInto,
  encodeCodepoint,
  decodeFirst,
  forEachChar,
} from './unit-codec.ts';
import { widthFromCodepoint } from './width.ts';
import { width } from '../types/branded.ts';
import { DecodeError } from '../types/errors.ts';

const SAMPLES = [
  0, 0x41, 0x7f, 0x80, 0xe9, 0x7ff, 0x800, 0x4e2d, 0xffff, 0x10000, 0x1f600, 0x10ffff,
  0x1fffff, 0x200000, 0x3ffffff, 0x4000000, 0x7fffffff, 0x80000000, 0xfffffffe, 0xffffffff,
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Unit Codec', () => {
  describe('encode', () => {
    it('should encode a 3-unit character', () => {
      expect(Array.from(encodeCodepoint(0x4e2d))).toEqual([0xe4, 0xb8, 0xad]);
    });

    it('should encode standard forms up to 4 units', () => {
      expect(Array.from(encodeCodepoint(0x41))).toEqual([0x41]);
      expect(Array.from(encodeCodepoint(0xe9))).toEqual([0xc3, 0xa9]);
      expect(Array.from(encodeCodepoint(0x1f600))).toEqual([0xf0, 0x9f, 0x98, 0x80]);
    });

    it('should encode the extended 6- and 7-unit forms', () => {
      expect(Array.from(encodeCodepoint(0x7fffffff))).toEqual([0xfd, 0xbf, 0xbf, 0xbf, 0xbf, 0xbf]);
      expect(Array.from(encodeCodepoint(0xffffffff))).toEqual([0xfe, 0x83, 0xbf, 0xbf, 0xbf, 0xbf, 0xbf]);
    });

    it('should write at an offset', () => {
      const dest = new Uint8Array(5);
      encodeUnitsInto(0x4e2d, width(3), dest, 1);
      expect(Array.from(dest)).toEqual([0, 0xe4, 0xb8, 0xad, 0]);
    });
  });

  describe('decode', () => {
    it('should decode a 3-unit character', () => {
      expect(decodeUnits(new Uint8Array([0xe4, 0xb8, 0xad]), width(3))).toBe(0x4e2d);
    });

    it('should decode at an offset', () => {
      const bytes = new Uint8Array([0x61, 0xc3, 0xa9]);
      expect(decodeUnits(bytes, width(2), 1)).toBe(0xe9);
      expect(decodeUnits(bytes, width(1), 0)).toBe(0x61);
    });

    it('should keep 7-unit values unsigned', () => {
      const bytes = new Uint8Array([0xfe, 0x83, 0xbf, 0xbf, 0xbf, 0xbf, 0xbf]);
      expect(decodeUnits(bytes, width(7))).toBe(0xffffffff);
    });

    it('should invert encode for every width', () => {
      for (const cp of SAMPLES) {
        const w = widthFromCodepoint(cp);
        expect(decodeUnits(encodeUnits(cp, w), w)).toBe(cp);
      }
    });
  });

  describe('decodeFirst', () => {
    it('should report the code point and width', () => {
      const step = decodeFirst(new Uint8Array([0xe4, 0xb8, 0xad, 0x41]));
      expect(step).toEqual({ codepoint: 0x4e2d, width: 3, malformed: false });
    });

    it('should decode a truncated character as far as the bytes go', () => {
      const step = decodeFirst(new Uint8Array([0xe4, 0xb8]));
      expect(step).toEqual({ codepoint: 312, width: 2, malformed: true });
    });

    describe('strict mode', () => {
      it('should reject a continuation byte as lead', () => {
        expect(() => decodeFirst(new Uint8Array([0x80]), 0, { mode: 'strict' })).toThrow(
          'Unexpected lead byte 0x80 at byte 0'
        );
      });

      it('should reject 0xFF as lead', () => {
        expect(() => decodeFirst(new Uint8Array([0x41, 0xff]), 1, { mode: 'strict' })).toThrow(
          'Unexpected lead byte 0xFF at byte 1'
        );
      });

      it('should reject a truncated character', () => {
        expect(() => decodeFirst(new Uint8Array([0xe4, 0xb8]), 0, { mode: 'strict' })).toThrow(
          'Truncated 3-unit character at byte 0'
        );
      });

      it('should reject a missing continuation byte', () => {
        let caught: unknown;
        try {
          decodeFirst(new Uint8Array([0xe4, 0x41, 0x42]), 0, { mode: 'strict' });
        } catch (error) {
          caught = error;
        }
        expect(caught).toBeInstanceOf(DecodeError);
        expect(caught instanceof DecodeError && caught.byteOffset).toBe(1);
        expect(caught instanceof DecodeError && caught.message).toBe(
          'Missing continuation byte in 3-unit character at byte 1'
        );
      });
    });
  });
});

describe('forEachChar', () => {
  const text = new Uint8Array([0x61, 0xe4, 0xb8, 0xad, 0x62]);

  it('should visit every character with offset, width and index', () => {
    const seen: Array<[number, number, number]> = [];
    const total = forEachChar(text, (offset, w, index) => {
      seen.push([offset, w, index]);
    });
    expect(total).toBe(3);
    expect(seen).toEqual([
      [0, 1, 0],
      [1, 3, 1],
      [4, 1, 2],
    ]);
  });

  it('should stop when the visitor returns false', () => {
    const total = forEachChar(text, (_offset, _w, index) => index < 1);
    expect(total).toBe(2);
  });

  it('should return 0 for empty input', () => {
    expect(forEachChar(new Uint8Array(0), () => true)).toBe(0);
  });

  describe('malformed input', () => {
    const malformed = new Uint8Array([0x80, 0x41, 0xff, 0x42]);

    it('should warn once per walk in best-effort mode', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      expect(forEachChar(malformed, () => true)).toBe(4);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('Malformed sequence at byte 0, decoding best-effort');
    });

    it('should stay quiet when warnings are off', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      forEachChar(malformed, () => true, { warnOnMalformed: false });
      expect(warn).not.toHaveBeenCalled();
    });

    it('should not warn on well-formed input', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      forEachChar(text, () => true);
      expect(warn).not.toHaveBeenCalled();
    });

    it('should throw in strict mode', () => {
      expect(() => forEachChar(malformed, () => true, { mode: 'strict' })).toThrow(DecodeError);
    });
  });
});
