/**
 * Header block fields and plausibility scoring
 *
 * Payload layout: type(1) | start(2, LE) | end(2, LE) | filename(16) | ...
 */

import type { HeaderFields } from '../core';
import { readU16LE } from '../utils';

const FILENAME_OFFSET = 5;
const FILENAME_LENGTH = 16;
const SPACE = 0x20;

export interface HeaderScoreConfig {
  minStart: number;
  maxStart: number;
  minLength: number;
  maxLength: number;
  // Start addresses inside this window get a base bonus plus a proximity bonus
  canonicalWindow: [number, number];
  canonicalStart: number;
  windowBonus: number;
  proximityBonus: number;
  proximityDivisor: number;
  lengthDivisor: number;
  maxLengthBonus: number;
}

export const DEFAULT_HEADER_SCORE_CONFIG: HeaderScoreConfig = {
  minStart: 0x0200,
  maxStart: 0x8000,
  minLength: 512,
  maxLength: 32768,
  canonicalWindow: [0x0F00, 0x2000],
  canonicalStart: 0x1001,
  windowBonus: 20,
  proximityBonus: 20,
  proximityDivisor: 32,
  lengthDivisor: 512,
  maxLengthBonus: 40
};

export interface ScoredHeader {
  readonly header: HeaderFields;
  readonly length: number;
  readonly score: number;
}

export function parseHeader(payload: Uint8Array): HeaderFields {
  if (payload.length < FILENAME_OFFSET + FILENAME_LENGTH) {
    throw new Error(`Header payload too short: ${payload.length} bytes`);
  }
  return {
    fileType: payload[0],
    startAddress: readU16LE(payload, 1),
    endAddress: readU16LE(payload, 3),
    rawFilename: payload.slice(FILENAME_OFFSET, FILENAME_OFFSET + FILENAME_LENGTH)
  };
}

/**
 * Best-effort filename: Latin-1 bytes with trailing spaces removed
 */
export function decodeFilename(raw: Uint8Array): string {
  let end = raw.length;
  while (end > 0 && raw[end - 1] === SPACE) end--;
  return String.fromCharCode(...raw.subarray(0, end));
}

function isFilenameByte(c: number): boolean {
  return (c >= 0x20 && c <= 0x5A) || (c >= 0x61 && c <= 0x7A) || c === 0x2D || c === 0x2E || c === 0x5F;
}

/**
 * Decide how much a payload looks like a real header block
 * @returns null when the payload fails the broad sanity bounds
 */
export function scoreHeaderCandidate(
  payload: Uint8Array,
  config: Partial<HeaderScoreConfig> = {}
): ScoredHeader | null {
  const c = { ...DEFAULT_HEADER_SCORE_CONFIG, ...config };
  const header = parseHeader(payload);
  const start = header.startAddress;
  const length = header.endAddress - start;

  if (start < c.minStart || start > c.maxStart) return null;
  if (length < c.minLength || length > c.maxLength) return null;

  let printable = 0;
  let nonSpace = 0;
  for (const b of header.rawFilename) {
    if (b !== SPACE) nonSpace++;
    if (isFilenameByte(b)) printable++;
  }
  if (nonSpace === 0) return null;

  let score = 0;
  const [windowLow, windowHigh] = c.canonicalWindow;
  if (start >= windowLow && start <= windowHigh) {
    score += c.windowBonus;
    score += Math.max(0, c.proximityBonus - Math.floor(Math.abs(start - c.canonicalStart) / c.proximityDivisor));
  }
  score += printable;
  score += Math.min(c.maxLengthBonus, Math.floor(length / c.lengthDivisor));

  return { header, length, score };
}
