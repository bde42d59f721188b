/**
 * Heuristic BASIC program scanner
 *
 * Tries every offset of a decoded byte stream as the start of a
 * load-address-prefixed tokenized program and scores how well the line
 * record chain holds together. Traversal follows the observed 0x00
 * terminators; the next-pointers are only checked for consistency, since on
 * a damaged capture they are the first thing to go wrong.
 *
 * scoreBasicCandidate is a pure function of (buffer, offset, config), so the
 * offset range can be sharded freely and merged with reduceCandidates.
 */

import { DecodeExhaustionError } from '../errors';
import { indexOfByte, readU16LE } from '../utils';

export interface ScanConfig {
  minLoadAddress: number;
  maxLoadAddress: number;
  canonicalLoadAddress: number;
  closenessMax: number;          // closeness bonus at the canonical address
  closenessDivisor: number;      // bonus lost per this many bytes of distance
  lineWeight: number;
  minLines: number;
  maxLineNumber: number;
  maxRecords: number;
  eolSearchLimit: number;        // bytes searched for a line terminator
  decreasingLinePenalty: number;
  mismatchTolerance: number;     // pointer/terminator mismatch above this is flat-penalised
  largeMismatchPenalty: number;
  mismatchDivisor: number;       // smaller mismatches cost mismatch / divisor
  stalledPointerPenalty: number;
  abandonPenalty: number;
  tailReserve: number;           // trailing bytes never tried as a start offset
}

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  minLoadAddress: 0x0400,
  maxLoadAddress: 0x4000,
  canonicalLoadAddress: 0x1001,
  closenessMax: 40,
  closenessDivisor: 16,
  lineWeight: 50,
  minLines: 3,
  maxLineNumber: 63999,
  maxRecords: 5000,
  eolSearchLimit: 512,
  decreasingLinePenalty: 10,
  mismatchTolerance: 64,
  largeMismatchPenalty: 25,
  mismatchDivisor: 4,
  stalledPointerPenalty: 15,
  abandonPenalty: 400,
  tailReserve: 0
};

export interface BasicCandidate {
  readonly offset: number;
  readonly score: number;
  readonly loadAddress: number;
  readonly endOffset: number;   // exclusive, just past the terminating next-pointer pair
  readonly lineCount: number;
  readonly penalty: number;
}

/**
 * Evaluate a program candidate starting at offset
 * @returns null when no plausible program starts there
 */
export function scoreBasicCandidate(
  buf: Uint8Array,
  offset: number,
  config: ScanConfig = DEFAULT_SCAN_CONFIG
): BasicCandidate | null {
  if (offset < 0 || offset + 10 >= buf.length) return null;

  const load = readU16LE(buf, offset);
  if (load < config.minLoadAddress || load > config.maxLoadAddress) return null;

  let p = offset + 2;
  let lines = 0;
  let penalty = 0;
  let lastLine = -1;
  let lastNext = load;

  for (let record = 0; record < config.maxRecords; record++) {
    if (p + 4 >= buf.length) break;

    const next = readU16LE(buf, p);
    const lineNumber = readU16LE(buf, p + 2);

    if (next === 0) {
      if (lines < config.minLines) return null;
      const closeness = Math.max(
        0,
        config.closenessMax - Math.floor(Math.abs(load - config.canonicalLoadAddress) / config.closenessDivisor)
      );
      return {
        offset,
        score: lines * config.lineWeight + closeness - penalty,
        loadAddress: load,
        endOffset: p + 4,
        lineCount: lines,
        penalty
      };
    }

    if (lineNumber > config.maxLineNumber) return null;
    if (lines > 0 && lineNumber < lastLine) {
      penalty += config.decreasingLinePenalty;
    }

    const eol = indexOfByte(buf, 0x00, p + 4, p + 4 + config.eolSearchLimit);
    if (eol === -1) return null;

    const expectedNext = offset + 2 + (next - load);
    const actualNext = eol + 1;
    const mismatch = Math.abs(expectedNext - actualNext);
    if (mismatch > config.mismatchTolerance) {
      penalty += config.largeMismatchPenalty;
    } else if (mismatch > 0) {
      penalty += Math.floor(mismatch / config.mismatchDivisor);
    }

    if (next <= lastNext) {
      penalty += config.stalledPointerPenalty;
    }

    lastLine = lineNumber;
    lastNext = next;
    p = actualNext;
    lines++;

    if (penalty > config.abandonPenalty) return null;
  }

  return null;
}

/**
 * Total order for candidates: strictly greater score wins, ties keep the
 * lower offset. Independent of evaluation order.
 */
export function betterCandidate(a: BasicCandidate | null, b: BasicCandidate | null): BasicCandidate | null {
  if (!a) return b;
  if (!b) return a;
  if (b.score > a.score) return b;
  if (b.score === a.score && b.offset < a.offset) return b;
  return a;
}

export function reduceCandidates(candidates: Iterable<BasicCandidate | null>): BasicCandidate | null {
  let best: BasicCandidate | null = null;
  for (const candidate of candidates) {
    best = betterCandidate(best, candidate);
  }
  return best;
}

/**
 * Best candidate among offsets [from, to)
 */
export function scanRange(
  buf: Uint8Array,
  from: number,
  to: number,
  config: ScanConfig = DEFAULT_SCAN_CONFIG
): BasicCandidate | null {
  let best: BasicCandidate | null = null;
  for (let off = Math.max(0, from); off < to; off++) {
    best = betterCandidate(best, scoreBasicCandidate(buf, off, config));
  }
  return best;
}

/**
 * Scan every start offset for the best-scoring program
 * @throws DecodeExhaustionError when no offset yields a plausible program
 */
export function findBestBasic(buf: Uint8Array, config: Partial<ScanConfig> = {}): BasicCandidate {
  const c = { ...DEFAULT_SCAN_CONFIG, ...config };
  const best = scanRange(buf, 0, Math.max(0, buf.length - c.tailReserve), c);
  if (!best) {
    throw new DecodeExhaustionError(
      'Could not find a plausible BASIC program in the decoded bytes',
      'scan',
      'findBestBasic',
      'The byte decoder is too lossy for structural recovery; try another capture or inverted polarity'
    );
  }
  return best;
}
