import { describe, test, expect } from 'vitest';
import { concatBytes, indexOfByte, matchesAt, readU16LE, toHex, writeU16LE } from '../src/utils';

describe('Byte utilities', () => {

  test('Little-endian 16-bit values', () => {
    const data = new Uint8Array([0x01, 0x10, 0xFF]);
    expect(readU16LE(data, 0)).toBe(0x1001);
    expect(readU16LE(data, 1)).toBe(0xFF10);
    expect(Array.from(writeU16LE(0x0801))).toEqual([0x01, 0x08]);
  });

  test('Reading past the end throws', () => {
    expect(() => readU16LE(new Uint8Array(3), 2)).toThrow('Offset out of bounds: 2 (length 3)');
    expect(() => readU16LE(new Uint8Array(3), -1)).toThrow('Offset out of bounds');
  });

  test('Byte search within a window', () => {
    const data = new Uint8Array([5, 0, 5, 0, 5]);
    expect(indexOfByte(data, 0, 0)).toBe(1);
    expect(indexOfByte(data, 0, 2)).toBe(3);
    expect(indexOfByte(data, 0, 2, 3)).toBe(-1);
    expect(indexOfByte(data, 7, 0, 100)).toBe(-1);
  });

  test('Pattern match at offset', () => {
    const data = new Uint8Array([1, 2, 3, 4]);
    expect(matchesAt(data, [2, 3], 1)).toBe(true);
    expect(matchesAt(data, [2, 3], 2)).toBe(false);
    expect(matchesAt(data, [4, 5], 3)).toBe(false);
    expect(matchesAt(data, [1], -1)).toBe(false);
  });

  test('Concatenation', () => {
    expect(Array.from(concatBytes([new Uint8Array([1]), new Uint8Array(0), new Uint8Array([2, 3])]))).toEqual([1, 2, 3]);
  });

  test('Hex formatting', () => {
    expect(toHex(0x0A)).toBe('0A');
    expect(toHex(0x1001, 4)).toBe('1001');
    expect(toHex(0xC1)).toBe('C1');
  });
});
