/**
 * Tests for the complexity-stratified namespaces.
 */

import { describe, it, expect } from 'vitest';
import { query, scan } from './index.ts';
import { textEncoder } from '../codec/encoding.ts';

describe('API namespaces', () => {
  const bytes = textEncoder.encode('a中b');

  it('should expose per-character operations under query', () => {
    expect(query.widthFromLeadByte(0xe4)).toBe(3);
    expect(query.widthFromCodepointClz(0x4e2d)).toBe(3);
    expect(query.decodeFirst(bytes, 1).codepoint).toBe(0x4e2d);
  });

  it('should expose walks under scan', () => {
    expect(scan.countCharacters(bytes)).toBe(3);
    expect(scan.decode(bytes)).toEqual([0x61, 0x4e2d, 0x62]);
  });

  it('should combine a scan-built map with a query lookup', () => {
    const map = scan.buildIndexToByteMap(bytes);
    expect(query.lookupByte(map, 2)).toBe(4);
  });
});
