/**
 * Tape → BASIC listing recovery pipeline
 *
 * Stages run synchronously, each consuming the previous stage's complete
 * output:
 *   pulses → categories → bytes → (blocks → header → assembly | scan) → listing
 *
 * Events:
 * - 'stage':   { stage, ...counters } after each stage
 * - 'log':     string message
 * - 'warning': string message (checksum quality, short assembly)
 */

import {
  EventEmitter,
  Event,
  type CopySelection,
  type ListingLine,
  type ProgramImage,
  type RecoveryDiagnostics,
  type RecoveryMode,
  type StructuralShortfall
} from './core';
import { DecodeExhaustionError } from './errors';
import { readTapPulses } from './tap/tap-reader';
import { classifyPulses, type PulseClassifierConfig } from './demod/pulse-classifier';
import { decodeBytes } from './demod/bit-decoder';
import { TapeBlockParser, checksumTally, partitionByCopy, selectBlocks } from './blocks/block-parser';
import { decodeFilename, type HeaderScoreConfig } from './blocks/header';
import { locateStructural, type HeaderStrategy } from './locator/structural';
import { findBestBasic, type ScanConfig } from './locator/basic-scanner';
import { assembleProgram, type AssemblerConfig } from './assembler/assembler';
import { formatListing, listProgram, type DetokenizerConfig } from './basic/detokenizer';
import { toHex } from './utils';

export interface TapeRecoveryConfig {
  name: string;             // instance name used in log lines
  mode: RecoveryMode;
  copy: CopySelection;
  headerStrategy: HeaderStrategy;
  quiet: boolean;           // suppress console output; events are still emitted
  classifier: Partial<PulseClassifierConfig>;
  headerScore: Partial<HeaderScoreConfig>;
  scan: Partial<ScanConfig>;
  assembler: Partial<AssemblerConfig>;
  detokenizer: Partial<DetokenizerConfig>;
}

export const DEFAULT_RECOVERY_CONFIG: TapeRecoveryConfig = {
  name: 'tape',
  mode: 'auto',
  copy: 'AUTO',
  headerStrategy: 'first',
  quiet: false,
  classifier: {},
  headerScore: {},
  scan: {},
  assembler: {},
  detokenizer: {}
};

export interface RecoveryResult {
  decoded: Uint8Array;
  image: ProgramImage;
  lines: ListingLine[];
  listing: string;
  diagnostics: RecoveryDiagnostics;
  shortfall: StructuralShortfall | null;
}

interface DecodeStageResult {
  decoded: Uint8Array;
  diagnostics: RecoveryDiagnostics;
}

export class TapeRecovery extends EventEmitter {
  private config: TapeRecoveryConfig;

  constructor(config: Partial<TapeRecoveryConfig> = {}) {
    super();
    this.config = { ...DEFAULT_RECOVERY_CONFIG, ...config };
  }

  configure(config: Partial<TapeRecoveryConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): TapeRecoveryConfig {
    return { ...this.config };
  }

  private log(message: string): void {
    if (!this.config.quiet) {
      console.log(`[TapeRecovery:${this.config.name}] ${message}`);
    }
    this.emit('log', new Event(message));
  }

  private warn(message: string): void {
    if (!this.config.quiet) {
      console.warn(`[TapeRecovery:${this.config.name}] WARNING: ${message}`);
    }
    this.emit('warning', new Event(message));
  }

  /**
   * Pulses → decoded byte stream
   * @throws FormatError, DecodeExhaustionError
   */
  decode(capture: Uint8Array): DecodeStageResult {
    const pulses = readTapPulses(capture);
    this.emit('stage', new Event({ stage: 'read', pulses: pulses.length }));

    const { categories, centers } = classifyPulses(pulses, this.config.classifier);
    this.log(`Pulse centers (S/M/L): ${centers.map(c => c.toFixed(2)).join(', ')}`);
    this.emit('stage', new Event({ stage: 'classify', centers }));

    const { bytes, syncCandidates, rejected } = decodeBytes(categories);
    this.log(`Decoded byte stream length: ${bytes.length}`);
    this.emit('stage', new Event({ stage: 'decode', length: bytes.length, syncCandidates, rejected }));

    return {
      decoded: bytes,
      diagnostics: {
        centers,
        pulseCount: pulses.length,
        decodedLength: bytes.length,
        strategy: 'blocks'
      }
    };
  }

  /**
   * Full recovery from a TAP capture
   * In 'auto' mode a block-level DecodeExhaustionError falls back to scanning.
   */
  recover(capture: Uint8Array): RecoveryResult {
    const { decoded, diagnostics } = this.decode(capture);

    switch (this.config.mode) {
      case 'blocks':
        return this.recoverFromBlocks(decoded, diagnostics);
      case 'scan':
        return this.recoverByScan(decoded, diagnostics);
      case 'auto':
        try {
          return this.recoverFromBlocks(decoded, diagnostics);
        } catch (error) {
          if (!(error instanceof DecodeExhaustionError)) throw error;
          this.warn(`Block recovery failed (${error.message}); scanning decoded bytes`);
          return this.recoverByScan(decoded, diagnostics);
        }
    }
  }

  recoverFromBlocks(decoded: Uint8Array, base: RecoveryDiagnostics): RecoveryResult {
    const blocks = TapeBlockParser.findBlocks(decoded);
    if (blocks.length === 0) {
      throw new DecodeExhaustionError(
        'No countdown blocks found in decoded byte stream',
        'blocks',
        'findBlocks',
        'Try rebuilding the capture with inverted polarity'
      );
    }

    const { A, B } = partitionByCopy(blocks);
    const selection = selectBlocks(blocks, this.config.copy);
    this.log(`Countdown blocks found (A/B/total): ${A.length} ${B.length} ${blocks.length}`);
    this.log(`Using copy: ${selection.copy} blocks: ${selection.blocks.length}`);

    const checksums = checksumTally(selection.blocks);
    this.log(`Checksum matches: ${checksums.matched} / ${checksums.sampled}`);
    if (checksums.matched < checksums.sampled) {
      this.warn(`${checksums.sampled - checksums.matched} of ${checksums.sampled} sampled blocks fail their checksum`);
    }
    this.emit('stage', new Event({ stage: 'blocks', copyA: A.length, copyB: B.length, checksums }));

    const location = locateStructural(selection.blocks, this.config.headerStrategy, this.config.headerScore);
    const { header } = location;
    const filename = decodeFilename(header.rawFilename);
    this.log(
      `Header: type=$${toHex(header.fileType)} start=$${toHex(header.startAddress, 4)} ` +
      `end=$${toHex(header.endAddress, 4)} name=${JSON.stringify(filename)}`
    );

    const { image, shortfall } = assembleProgram(header, location.payloads, this.config.assembler);
    if (shortfall) {
      this.warn(`Need ${shortfall.declared} bytes but only assembled ${shortfall.assembled} bytes from blocks`);
    }
    this.log(`Assembled payload bytes: ${image.body.length}`);

    const lines = listProgram(image, this.config.detokenizer);
    this.emit('stage', new Event({ stage: 'list', lines: lines.length }));

    return {
      decoded,
      image,
      lines,
      listing: formatListing(lines),
      shortfall,
      diagnostics: {
        ...base,
        strategy: 'blocks',
        blocks: {
          copyA: A.length,
          copyB: B.length,
          total: blocks.length,
          used: selection.copy,
          usedCount: selection.blocks.length,
          checksums,
          headerIndex: location.headerIndex,
          headerScore: location.score,
          header,
          filename,
          assembledLength: image.body.length
        }
      }
    };
  }

  recoverByScan(decoded: Uint8Array, base: RecoveryDiagnostics): RecoveryResult {
    const best = findBestBasic(decoded, this.config.scan);
    const bytes = decoded.slice(best.offset, best.endOffset);
    const image: ProgramImage = { loadAddress: best.loadAddress, body: bytes.subarray(2), bytes };

    this.log(`Best BASIC candidate at decoded offset: ${best.offset}`);
    this.log(`Candidate load address: $${toHex(best.loadAddress, 4)}`);
    this.log(`Candidate line count: ${best.lineCount} score: ${best.score}`);

    const lines = listProgram(image, this.config.detokenizer);
    this.emit('stage', new Event({ stage: 'list', lines: lines.length }));

    return {
      decoded,
      image,
      lines,
      listing: formatListing(lines),
      shortfall: null,
      diagnostics: {
        ...base,
        strategy: 'scan',
        scan: {
          offset: best.offset,
          score: best.score,
          loadAddress: best.loadAddress,
          lineCount: best.lineCount,
          endOffset: best.endOffset,
          imageLength: bytes.length
        }
      }
    };
  }
}
