/**
 * Tape block parser
 *
 * Scans a decoded byte stream for countdown preambles and frames the
 * following payload and checksum. Checksum mismatches are recorded on the
 * block, never rejected: corruption is expected on degraded captures.
 */

import type { ChecksumTally, CopySelection, TapeCopy } from '../core';
import { matchesAt } from '../utils';
import { XorChecksum } from '../utils/xor-checksum';
import { BlockConstants, COUNTDOWNS, type BlockParseResult, type TapeBlock } from './types';

const COPY_ORDER: readonly TapeCopy[] = ['A', 'B'];

export class TapeBlockParser {
  /**
   * Try to frame a block whose countdown starts at offset
   */
  static parseAt(data: Uint8Array, offset: number): BlockParseResult {
    for (const copy of COPY_ORDER) {
      if (!matchesAt(data, COUNTDOWNS[copy], offset)) continue;

      const payloadStart = offset + BlockConstants.COUNTDOWN_SIZE;
      const checksumIndex = payloadStart + BlockConstants.PAYLOAD_SIZE;
      if (checksumIndex + BlockConstants.CHECKSUM_SIZE > data.length) {
        // not enough trailing bytes: no block is constructed
        return { success: false, bytesConsumed: 0 };
      }

      const payload = data.slice(payloadStart, checksumIndex);
      const checksum = data[checksumIndex];
      return {
        success: true,
        block: {
          copy,
          offset: payloadStart,
          payload,
          checksum,
          checksumOk: XorChecksum.verify(payload, checksum)
        },
        bytesConsumed: BlockConstants.FRAME_SIZE
      };
    }
    return { success: false, bytesConsumed: 0 };
  }

  /**
   * Find all non-overlapping blocks in stream order
   */
  static findBlocks(data: Uint8Array): TapeBlock[] {
    const blocks: TapeBlock[] = [];
    let i = 0;
    while (i + BlockConstants.FRAME_SIZE <= data.length) {
      const result = TapeBlockParser.parseAt(data, i);
      if (result.success && result.block) {
        blocks.push(result.block);
        i += result.bytesConsumed;
      } else {
        i++;
      }
    }
    return blocks;
  }

  /**
   * Build a framed block (countdown + payload + checksum)
   */
  static serialize(copy: TapeCopy, payload: Uint8Array, checksum = XorChecksum.calculate(payload)): Uint8Array {
    if (payload.length !== BlockConstants.PAYLOAD_SIZE) {
      throw new Error(`Invalid payload size: ${payload.length}. Must be ${BlockConstants.PAYLOAD_SIZE} bytes.`);
    }
    const result = new Uint8Array(BlockConstants.FRAME_SIZE);
    result.set(COUNTDOWNS[copy], 0);
    result.set(payload, BlockConstants.COUNTDOWN_SIZE);
    result[BlockConstants.COUNTDOWN_SIZE + BlockConstants.PAYLOAD_SIZE] = checksum & 0xFF;
    return result;
  }
}

/**
 * Split blocks by copy tag, preserving stream order
 */
export function partitionByCopy(blocks: readonly TapeBlock[]): Record<TapeCopy, TapeBlock[]> {
  return {
    A: blocks.filter(b => b.copy === 'A'),
    B: blocks.filter(b => b.copy === 'B')
  };
}

export interface BlockSelection {
  readonly copy: TapeCopy;
  readonly blocks: TapeBlock[];
}

/**
 * Choose the copy stream to recover from.
 * AUTO prefers copy A and uses copy B only when no A block exists.
 */
export function selectBlocks(blocks: readonly TapeBlock[], selection: CopySelection = 'AUTO'): BlockSelection {
  const { A, B } = partitionByCopy(blocks);
  switch (selection) {
    case 'A':
      return { copy: 'A', blocks: A };
    case 'B':
      return { copy: 'B', blocks: B };
    case 'AUTO':
      return A.length > 0 ? { copy: 'A', blocks: A } : { copy: 'B', blocks: B };
  }
}

/**
 * Count checksum matches over the first sampleLimit blocks
 */
export function checksumTally(
  blocks: readonly TapeBlock[],
  sampleLimit: number = BlockConstants.CHECKSUM_SAMPLE_LIMIT
): ChecksumTally {
  const sample = blocks.slice(0, sampleLimit);
  return {
    matched: sample.filter(b => b.checksumOk).length,
    sampled: sample.length
  };
}
