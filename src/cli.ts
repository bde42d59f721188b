/**
 * Command line front end
 *
 *   tape-recover recover <tap> [--mode blocks|scan|auto] [--copy A|B|AUTO]
 *                              [--header first|scored] [--prg f] [--bas f]
 *                              [--decoded f] [--start-skip n] [--quiet]
 *   tape-recover list <prg> [-o f] [--start-skip n] [--layout]
 *   tape-recover strings <tap> [-o f] [--min-length n]
 *   tape-recover group <strings.txt> [-o f]
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import type { CopySelection, RecoveryMode } from './core';
import { TapeRecoveryError, DecodeExhaustionError } from './errors';
import { TapeRecovery } from './recovery';
import { imageFromPrg } from './assembler/assembler';
import { formatListing, listProgram } from './basic/detokenizer';
import type { HeaderStrategy } from './locator/structural';
import { DEFAULT_MIN_STRING_LENGTH, dumpStrings } from './strings/extract';
import { formatGroups, groupByLocation, lightlyClean } from './strings/group';

const USAGE = `Usage: tape-recover <command> [options]

Commands:
  recover <tap>          Recover a BASIC listing from a TAP capture
  list <prg>             List a tokenized .prg file
  strings <tap>          Dump printable strings from a TAP capture
  group <strings.txt>    Group dumped strings by location header
`;

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T, flag: string): T {
  if (value === undefined) return fallback;
  const found = allowed.find(a => a === value);
  if (found === undefined) {
    throw new Error(`Invalid ${flag}: ${value} (expected ${allowed.join(', ')})`);
  }
  return found;
}

function toInt(value: string | undefined, fallback: number, flag: string): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid ${flag}: ${value}`);
  }
  return Number.parseInt(value, 10);
}

function requirePositional(positionals: string[], what: string): string {
  const value = positionals[0];
  if (value === undefined) {
    throw new Error(`Missing ${what}\n\n${USAGE}`);
  }
  return value;
}

function runRecover(args: string[]): void {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      mode: { type: 'string' },
      copy: { type: 'string' },
      header: { type: 'string' },
      prg: { type: 'string', default: 'recovered.prg' },
      bas: { type: 'string', default: 'recovered.bas.txt' },
      decoded: { type: 'string' },
      'start-skip': { type: 'string' },
      quiet: { type: 'boolean', default: false }
    }
  });
  const tapPath = requirePositional(positionals, 'TAP file');

  const recovery = new TapeRecovery({
    name: tapPath,
    mode: oneOf<RecoveryMode>(values.mode, ['blocks', 'scan', 'auto'], 'auto', '--mode'),
    copy: oneOf<CopySelection>(values.copy, ['A', 'B', 'AUTO'], 'AUTO', '--copy'),
    headerStrategy: oneOf<HeaderStrategy>(values.header, ['first', 'scored'], 'first', '--header'),
    quiet: values.quiet ?? false,
    detokenizer: { startSkip: toInt(values['start-skip'], 0, '--start-skip') }
  });

  const result = recovery.recover(readFileSync(tapPath));

  if (values.decoded) {
    writeFileSync(values.decoded, result.decoded);
    console.log(`Wrote: ${values.decoded}`);
  }
  if (values.prg) {
    writeFileSync(values.prg, result.image.bytes);
    console.log(`Wrote: ${values.prg}`);
  }
  if (values.bas) {
    writeFileSync(values.bas, result.listing, 'utf-8');
    console.log(`Wrote: ${values.bas}`);
  }
}

function runList(args: string[]): void {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      'start-skip': { type: 'string' },
      layout: { type: 'boolean', default: false }
    }
  });
  const prgPath = requirePositional(positionals, 'PRG file');

  const lines = listProgram(imageFromPrg(readFileSync(prgPath)), {
    startSkip: toInt(values['start-skip'], 0, '--start-skip'),
    petscii: values.layout ? 'layout' : 'strict'
  });
  const listing = formatListing(lines);

  if (values.out) {
    writeFileSync(values.out, listing, 'utf-8');
  } else {
    process.stdout.write(listing);
  }
}

function runStrings(args: string[]): void {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o', default: 'all_strings.txt' },
      'min-length': { type: 'string' }
    }
  });
  const tapPath = requirePositional(positionals, 'TAP file');

  const recovery = new TapeRecovery({ name: tapPath });
  const { decoded } = recovery.decode(readFileSync(tapPath));
  const strings = dumpStrings(decoded, toInt(values['min-length'], DEFAULT_MIN_STRING_LENGTH, '--min-length'));

  const out = values.out ?? 'all_strings.txt';
  writeFileSync(out, strings.map(s => s + '\n').join(''), 'utf-8');
  console.log(`Strings written: ${strings.length}`);
}

function runGroup(args: string[]): void {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o', default: 'grouped_by_location.txt' }
    }
  });
  const inPath = positionals[0] ?? 'all_strings.txt';

  const lines = readFileSync(inPath, 'utf-8')
    .split('\n')
    .filter(line => line.trim())
    .map(lightlyClean);
  const groups = groupByLocation(lines);

  const out = values.out ?? 'grouped_by_location.txt';
  writeFileSync(out, formatGroups(groups), 'utf-8');
  console.log(`Groups written: ${groups.length} -> ${out}`);
}

export function main(argv: string[]): number {
  const [command, ...rest] = argv;
  try {
    switch (command) {
      case 'recover':
        runRecover(rest);
        return 0;
      case 'list':
        runList(rest);
        return 0;
      case 'strings':
        runStrings(rest);
        return 0;
      case 'group':
        runGroup(rest);
        return 0;
      default:
        console.error(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof TapeRecoveryError) {
      console.error(`[${error.name}] ${error.stage}/${error.operation}: ${error.message}`);
      if (error instanceof DecodeExhaustionError && error.hint) {
        console.error(`Hint: ${error.hint}`);
      }
      return 1;
    }
    throw error;
  }
}

