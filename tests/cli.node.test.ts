import { describe, test, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { main } from '../src/cli';
import {
  TOKEN,
  buildHeaderPayload,
  buildImage,
  captureFromBytes,
  frame,
  toPayload,
  tokens
} from './helpers/builders';

const dir = mkdtempSync(join(tmpdir(), 'tape-recover-'));
const path = (name: string) => join(dir, name);

const image = buildImage(0x1001, [
  { lineNumber: 10, body: tokens(TOKEN.PRINT, '"HELLO"') },
  { lineNumber: 20, body: tokens(TOKEN.END) }
]);
const LISTING = '10 PRINT"HELLO"\n20 END\n';

describe('Command line', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('Unknown command prints usage', () => {
    expect(main(['rewind'])).toBe(1);
    expect(main([])).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(2);
  });

  test('Recover writes the PRG and the listing', () => {
    writeFileSync(path('game.tap'), captureFromBytes([
      ...frame('A', buildHeaderPayload(0x1001, 0x1001 + image.body.length, 'GAME')),
      ...frame('A', toPayload(image.body))
    ]));

    const code = main([
      'recover', path('game.tap'),
      '--prg', path('game.prg'),
      '--bas', path('game.bas.txt'),
      '--decoded', path('game.bin'),
      '--quiet'
    ]);

    expect(code).toBe(0);
    expect(readFileSync(path('game.bas.txt'), 'utf-8')).toBe(LISTING);
    expect(new Uint8Array(readFileSync(path('game.prg')))).toEqual(image.bytes);
    expect(readFileSync(path('game.bin'))).toHaveLength(404);
    expect(console.log).toHaveBeenCalledWith(`Wrote: ${path('game.prg')}`);
  });

  test('Recover failure reports stage, operation and hint', () => {
    writeFileSync(path('blank.tap'), captureFromBytes([0x41, 0x42, 0x43]));

    const code = main(['recover', path('blank.tap'), '--mode', 'blocks', '--prg', path('x.prg'), '--bas', path('x.txt'), '--quiet']);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '[DecodeExhaustionError] blocks/findBlocks: No countdown blocks found in decoded byte stream'
    );
    expect(console.error).toHaveBeenCalledWith('Hint: Try rebuilding the capture with inverted polarity');
  });

  test('Invalid option value', () => {
    expect(() => main(['recover', path('game.tap'), '--mode', 'fast'])).toThrow(
      'Invalid --mode: fast (expected blocks, scan, auto)'
    );
  });

  test('Numeric options must be plain decimal', () => {
    writeFileSync(path('skip.prg'), image.bytes);
    expect(() => main(['list', path('skip.prg'), '--start-skip', '12abc'])).toThrow('Invalid --start-skip: 12abc');
    expect(() => main(['list', path('skip.prg'), '--start-skip=-1'])).toThrow('Invalid --start-skip: -1');
    expect(main(['list', path('skip.prg'), '--start-skip', '0', '-o', path('skip.txt')])).toBe(0);
    expect(readFileSync(path('skip.txt'), 'utf-8')).toBe(LISTING);
  });

  test('Missing input file argument', () => {
    expect(() => main(['list'])).toThrow('Missing PRG file');
  });

  test('List a PRG file', () => {
    writeFileSync(path('list.prg'), image.bytes);
    expect(main(['list', path('list.prg'), '-o', path('list.txt')])).toBe(0);
    expect(readFileSync(path('list.txt'), 'utf-8')).toBe(LISTING);
  });

  test('Dump strings, then group them', () => {
    writeFileSync(path('text.tap'), captureFromBytes(tokens(
      'INTRO', 0x00, 'YOU ARE IN A CAVE', 0x00, 'A LAMP', 0x00, 'INTRO', 0x00
    )));

    expect(main(['strings', path('text.tap'), '-o', path('strings.txt')])).toBe(0);
    expect(readFileSync(path('strings.txt'), 'utf-8')).toBe('INTRO\nYOU ARE IN A CAVE\nA LAMP\n');
    expect(console.log).toHaveBeenCalledWith('Strings written: 3');

    expect(main(['group', path('strings.txt'), '-o', path('grouped.txt')])).toBe(0);
    expect(readFileSync(path('grouped.txt'), 'utf-8')).toBe(
      'GLOBAL / SYSTEM TEXT\n  INTRO\n\nYOU ARE IN A CAVE\n  A LAMP\n\n'
    );
    expect(console.log).toHaveBeenCalledWith(`Groups written: 2 -> ${path('grouped.txt')}`);
  });
});
