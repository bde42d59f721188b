import { describe, test, expect } from 'vitest';
import {
  DEFAULT_SCAN_CONFIG,
  betterCandidate,
  findBestBasic,
  reduceCandidates,
  scanRange,
  scoreBasicCandidate,
  type BasicCandidate
} from '../../src/locator/basic-scanner';
import { DecodeExhaustionError } from '../../src/errors';
import { buildImage, printLines, tokens, TOKEN, type LineDef } from '../helpers/builders';

// program bytes (load address first) plus zero padding so the end pointer is readable
function programBuffer(loadAddress: number, lines: readonly LineDef[], prefix: number[] = []): Uint8Array {
  return new Uint8Array([...prefix, ...buildImage(loadAddress, lines).bytes, 0, 0, 0, 0]);
}

describe('BASIC candidate scanner', () => {

  describe('Candidate scoring', () => {
    test('Clean program at the canonical address', () => {
      const candidate = scoreBasicCandidate(programBuffer(0x1001, printLines(5)), 0);
      expect(candidate).toEqual({
        offset: 0,
        score: 5 * 50 + 40,
        loadAddress: 0x1001,
        endOffset: 56,
        lineCount: 5,
        penalty: 0
      });
    });

    test('Closeness bonus falls off with distance from the canonical address', () => {
      // 0x800 bytes away: no bonus left
      expect(scoreBasicCandidate(programBuffer(0x0801, printLines(3)), 0)?.score).toBe(150);
      // 0x100 bytes away: 40 - 16
      expect(scoreBasicCandidate(programBuffer(0x1101, printLines(3)), 0)?.score).toBe(174);
    });

    test('Decreasing line numbers are penalised, not rejected', () => {
      const body = tokens(TOKEN.PRINT, '"HI"');
      const candidate = scoreBasicCandidate(programBuffer(0x1001, [
        { lineNumber: 10, body },
        { lineNumber: 30, body },
        { lineNumber: 20, body }
      ]), 0);
      expect(candidate?.penalty).toBe(10);
      expect(candidate?.score).toBe(180);
    });

    test('Small pointer mismatch costs a quarter of the distance', () => {
      const buf = programBuffer(0x1001, printLines(5));
      buf[2] = 0x13; // first next-pointer 0x100B -> 0x1013
      const candidate = scoreBasicCandidate(buf, 0);
      expect(candidate?.penalty).toBe(2);
      expect(candidate?.score).toBe(288);
      expect(candidate?.lineCount).toBe(5);
    });

    test('Pointer that does not advance is penalised as stalled', () => {
      const buf = programBuffer(0x1001, printLines(5));
      buf[2] = 0x01; // first next-pointer equals the load address
      // mismatch 10 -> 2, stalled -> 15
      expect(scoreBasicCandidate(buf, 0)?.penalty).toBe(17);
    });

    test('Too few lines', () => {
      expect(scoreBasicCandidate(programBuffer(0x1001, printLines(2)), 0)).toBeNull();
      expect(scoreBasicCandidate(programBuffer(0x1001, printLines(2)), 0, { ...DEFAULT_SCAN_CONFIG, minLines: 2 })?.score)
        .toBe(140);
    });

    test('Load address outside the plausible range', () => {
      expect(scoreBasicCandidate(programBuffer(0x0300, printLines(5)), 0)).toBeNull();
      expect(scoreBasicCandidate(programBuffer(0x8001, printLines(5)), 0)).toBeNull();
    });

    test('Line number above the BASIC maximum', () => {
      const body = tokens(TOKEN.END);
      const lines = [{ lineNumber: 10, body }, { lineNumber: 64000, body }, { lineNumber: 30, body }];
      expect(scoreBasicCandidate(programBuffer(0x1001, lines), 0)).toBeNull();
    });

    test('Offsets too close to the end are not candidates', () => {
      const buf = programBuffer(0x1001, printLines(5));
      expect(scoreBasicCandidate(buf, buf.length - 10)).toBeNull();
      expect(scoreBasicCandidate(buf, -1)).toBeNull();
    });
  });

  describe('Candidate ordering', () => {
    const candidate = (offset: number, score: number): BasicCandidate => ({
      offset, score, loadAddress: 0x1001, endOffset: offset + 10, lineCount: 3, penalty: 0
    });

    test('Higher score wins, ties keep the lower offset', () => {
      expect(betterCandidate(candidate(10, 100), candidate(5, 90))?.offset).toBe(10);
      expect(betterCandidate(candidate(10, 100), candidate(20, 110))?.offset).toBe(20);
      expect(betterCandidate(candidate(10, 100), candidate(5, 100))?.offset).toBe(5);
      expect(betterCandidate(candidate(5, 100), candidate(10, 100))?.offset).toBe(5);
      expect(betterCandidate(null, null)).toBeNull();
    });

    test('Reduction is independent of evaluation order', () => {
      const all = [candidate(30, 100), null, candidate(7, 100), candidate(12, 90)];
      expect(reduceCandidates(all)?.offset).toBe(7);
      expect(reduceCandidates([...all].reverse())?.offset).toBe(7);
    });
  });

  describe('Full scan', () => {
    const buf = programBuffer(0x1001, printLines(10), [0xFF, 0xFF, 0xFF]);

    test('Finds the program behind leading garbage', () => {
      const best = findBestBasic(buf);
      expect(best.offset).toBe(3);
      expect(best.score).toBe(540);
      expect(best.lineCount).toBe(10);
      expect(best.loadAddress).toBe(0x1001);
      expect(best.endOffset).toBe(109);
    });

    test('Sharded ranges merge to the same result', () => {
      const whole = scanRange(buf, 0, buf.length);
      const shards = [scanRange(buf, 0, 40), scanRange(buf, 40, 80), scanRange(buf, 80, buf.length)];
      expect(reduceCandidates(shards)).toEqual(whole);
      expect(whole?.offset).toBe(3);
    });

    test('Start offsets inside the tail reserve are never tried', () => {
      expect(() => findBestBasic(buf, { tailReserve: 4096 })).toThrow(DecodeExhaustionError);
      expect(findBestBasic(buf, { tailReserve: buf.length - 4 }).offset).toBe(3);
      expect(() => findBestBasic(buf, { tailReserve: buf.length - 3 })).toThrow(DecodeExhaustionError);
    });

    test('Program near the end of a long stream', () => {
      const long = new Uint8Array(8000);
      long.set(buildImage(0x1001, printLines(10)).bytes, 6000);
      const best = findBestBasic(long);
      expect(best.offset).toBe(6000);
      expect(best.score).toBe(540);
    });

    test('More well-formed lines win over fewer', () => {
      const five = buildImage(0x1001, printLines(5)).bytes;
      const ten = buildImage(0x1001, printLines(10)).bytes;
      const twoPrograms = new Uint8Array([...five, 0, 0, 0, ...ten, 0, 0, 0, 0]);

      const shorter = scoreBasicCandidate(twoPrograms, 0);
      const best = findBestBasic(twoPrograms);

      expect(shorter?.lineCount).toBe(5);
      expect(shorter?.score).toBe(290);
      expect(best.offset).toBe(five.length + 3);
      expect(best.lineCount).toBe(10);
      expect(best.score).toBeGreaterThan(290);
    });

    test('No plausible program', () => {
      try {
        findBestBasic(new Uint8Array(64));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DecodeExhaustionError);
        expect(error).toMatchObject({ stage: 'scan', operation: 'findBestBasic' });
      }
    });
  });
});
