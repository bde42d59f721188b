// ==============================================================================
// Byte Utilities
// ==============================================================================

/**
 * Read a little-endian 16-bit value
 * @throws when fewer than two bytes remain at offset
 */
export function readU16LE(data: Uint8Array, offset: number): number {
  if (offset < 0 || offset + 1 >= data.length) {
    throw new Error(`Offset out of bounds: ${offset} (length ${data.length})`);
  }
  return data[offset] | (data[offset + 1] << 8);
}

export function writeU16LE(value: number): Uint8Array {
  return new Uint8Array([value & 0xFF, (value >> 8) & 0xFF]);
}

/**
 * Find the first occurrence of a byte in data[start, end)
 * @returns index or -1
 */
export function indexOfByte(data: Uint8Array, value: number, start: number, end = data.length): number {
  const limit = Math.min(end, data.length);
  for (let i = Math.max(0, start); i < limit; i++) {
    if (data[i] === value) return i;
  }
  return -1;
}

/**
 * True when pattern occurs in data at exactly offset
 */
export function matchesAt(data: Uint8Array, pattern: ArrayLike<number>, offset: number): boolean {
  if (offset < 0 || offset + pattern.length > data.length) return false;
  for (let i = 0; i < pattern.length; i++) {
    if (data[offset + i] !== pattern[i]) return false;
  }
  return true;
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Format a number as uppercase hex, e.g. toHex(0x1001, 4) => "1001"
 */
export function toHex(value: number, width = 2): string {
  return value.toString(16).toUpperCase().padStart(width, '0');
}
