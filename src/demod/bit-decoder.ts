/**
 * Pulse category stream → bytes
 *
 * Grammar per byte:
 *   L, (S|M)            byte marker
 *   8 × pair            (M,S) = 1, (S,M) = 0, LSB first
 *
 * Best effort: a candidate that breaks the grammar is skipped one symbol at a
 * time rather than failing the decode, so the output may contain gaps and
 * misaligned garbage.
 */

import { PulseCategory, type Category } from '../core';

const MARKER_LENGTH = 2;
const BITS_PER_BYTE = 8;
const SYMBOLS_PER_BYTE = MARKER_LENGTH + BITS_PER_BYTE * 2;

export interface BitDecodeResult {
  bytes: Uint8Array;
  syncCandidates: number;  // L,(S|M) markers seen
  rejected: number;        // markers whose pairs broke the grammar
}

function isMarkerAt(categories: readonly Category[], i: number): boolean {
  const next = categories[i + 1];
  return categories[i] === PulseCategory.LONG && (next === PulseCategory.SHORT || next === PulseCategory.MEDIUM);
}

/**
 * Decode one byte whose pairs start at index j
 * @returns byte value or -1 when any pair is invalid
 */
function decodePairs(categories: readonly Category[], j: number): number {
  let value = 0;
  for (let bit = 0; bit < BITS_PER_BYTE; bit++) {
    const a = categories[j + bit * 2];
    const b = categories[j + bit * 2 + 1];
    if (a === PulseCategory.MEDIUM && b === PulseCategory.SHORT) {
      value |= 1 << bit;
    } else if (!(a === PulseCategory.SHORT && b === PulseCategory.MEDIUM)) {
      return -1;
    }
  }
  return value;
}

export function decodeBytes(categories: readonly Category[]): BitDecodeResult {
  const out: number[] = [];
  let syncCandidates = 0;
  let rejected = 0;

  let i = 0;
  while (i + SYMBOLS_PER_BYTE <= categories.length) {
    if (isMarkerAt(categories, i)) {
      syncCandidates++;
      const value = decodePairs(categories, i + MARKER_LENGTH);
      if (value >= 0) {
        out.push(value);
        i += SYMBOLS_PER_BYTE;
        continue;
      }
      rejected++;
    }
    i++;
  }

  return { bytes: new Uint8Array(out), syncCandidates, rejected };
}

/**
 * Build the category stream that decodeBytes reads back as the given bytes
 */
export function encodeBytesToCategories(bytes: Uint8Array): PulseCategory[] {
  const out: PulseCategory[] = [];
  for (const byte of bytes) {
    out.push(PulseCategory.LONG, PulseCategory.MEDIUM);
    for (let bit = 0; bit < BITS_PER_BYTE; bit++) {
      if ((byte >> bit) & 1) {
        out.push(PulseCategory.MEDIUM, PulseCategory.SHORT);
      } else {
        out.push(PulseCategory.SHORT, PulseCategory.MEDIUM);
      }
    }
  }
  return out;
}
