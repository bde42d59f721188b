/**
 * Tokenized BASIC V2 program → listing
 *
 * Line record: next-pointer(2, LE) | line number(2, LE) | body | 0x00
 * The program ends at a zero next-pointer.
 *
 * Each line is a two-state machine (CODE / IN_STRING) starting in CODE.
 * A quote toggles the state and is always emitted. In CODE, bytes >= 0x80 are
 * keywords; inside strings every byte goes through the PETSCII mapping.
 */

import type { ListingLine, ProgramImage } from '../core';
import { indexOfByte, readU16LE, toHex } from '../utils';
import { petsciiToText, type PetsciiMode } from './petscii';
import tokenTable from './tokens.json';

const QUOTE = 0x22;
const TERMINATOR = 0x00;
const RECORD_HEADER_SIZE = 4;
const MAX_LINES = 20000;

// keyword by token byte
export const BASIC_TOKENS: ReadonlyMap<number, string> = new Map(
  tokenTable.keywords.map((keyword, i): [number, string] => [tokenTable.first + i, keyword])
);

enum LineState {
  CODE,
  IN_STRING
}

/**
 * terminator: next line starts after the observed 0x00 (survives bad pointers)
 * pointer:    next line is at next-pointer − load address
 */
export type Traversal = 'terminator' | 'pointer';

export interface DetokenizerConfig {
  traversal: Traversal;
  petscii: PetsciiMode;
  startSkip: number;       // body bytes skipped before the first record
}

export const DEFAULT_DETOKENIZER_CONFIG: DetokenizerConfig = {
  traversal: 'terminator',
  petscii: 'strict',
  startSkip: 0
};

/**
 * Detokenize one line body (without record header or terminator)
 */
export function detokenizeLine(body: Uint8Array, petscii: PetsciiMode = 'strict'): string {
  let state = LineState.CODE;
  let out = '';

  for (const b of body) {
    if (b === TERMINATOR) break;

    if (b === QUOTE) {
      state = state === LineState.CODE ? LineState.IN_STRING : LineState.CODE;
      out += '"';
      continue;
    }

    if (state === LineState.CODE && b >= 0x80) {
      const keyword = BASIC_TOKENS.get(b);
      out += keyword ?? `{${toHex(b)}}`;
      continue;
    }

    out += petsciiToText(b, petscii);
  }

  // layout mode keeps spacing as drawn
  return petscii === 'strict' ? out.split(/\s+/).filter(Boolean).join(' ') : out;
}

/**
 * Walk the line records of a program image
 * Line numbers are kept in traversal order, never sorted.
 */
export function listProgram(image: ProgramImage, config: Partial<DetokenizerConfig> = {}): ListingLine[] {
  const { traversal, petscii, startSkip } = { ...DEFAULT_DETOKENIZER_CONFIG, ...config };
  const { body, loadAddress } = image;
  const lines: ListingLine[] = [];

  let off = Math.max(0, startSkip);
  for (let n = 0; n < MAX_LINES; n++) {
    if (off + RECORD_HEADER_SIZE > body.length) break;

    const next = readU16LE(body, off);
    const lineNumber = readU16LE(body, off + 2);
    if (next === 0) break;

    const eol = indexOfByte(body, TERMINATOR, off + RECORD_HEADER_SIZE);
    if (eol === -1) break;

    lines.push({ lineNumber, text: detokenizeLine(body.subarray(off + RECORD_HEADER_SIZE, eol), petscii) });

    if (traversal === 'pointer') {
      const nextOff = next - loadAddress;
      if (nextOff <= off || nextOff > body.length) break;
      off = nextOff;
    } else {
      off = eol + 1;
    }
  }

  return lines;
}

/**
 * One "<line> <text>" per line, always newline-terminated
 */
export function formatListing(lines: readonly ListingLine[]): string {
  return lines.map(line => `${line.lineNumber} ${line.text}`).join('\n') + '\n';
}
