/**
 * Structural program location over framed tape blocks
 *
 * Strategies:
 * - first:  the first selected block is the header (tape order)
 * - scored: the best-scoring header-like payload is the header, which copes
 *           with leading junk blocks and a lost header
 */

import type { HeaderFields } from '../core';
import { DecodeExhaustionError } from '../errors';
import { parseHeader, scoreHeaderCandidate, type HeaderScoreConfig } from '../blocks/header';
import type { TapeBlock } from '../blocks/types';

export type HeaderStrategy = 'first' | 'scored';

export interface StructuralLocation {
  readonly headerIndex: number;
  readonly header: HeaderFields;
  readonly score: number | null;   // null for the 'first' strategy
  readonly payloads: Uint8Array[]; // data block payloads after the header, in order
}

export function locateStructural(
  blocks: readonly TapeBlock[],
  strategy: HeaderStrategy = 'first',
  scoreConfig: Partial<HeaderScoreConfig> = {}
): StructuralLocation {
  if (blocks.length === 0) {
    throw new DecodeExhaustionError(
      'No blocks available for selected copy stream',
      'header',
      'locateStructural',
      'Try the other copy stream, or rebuild the capture with inverted polarity'
    );
  }

  if (strategy === 'first') {
    return {
      headerIndex: 0,
      header: parseHeader(blocks[0].payload),
      score: null,
      payloads: blocks.slice(1).map(b => b.payload)
    };
  }

  let best: { index: number; header: HeaderFields; score: number } | null = null;
  for (let index = 0; index < blocks.length; index++) {
    const candidate = scoreHeaderCandidate(blocks[index].payload, scoreConfig);
    // ties keep the earlier block
    if (candidate && (!best || candidate.score > best.score)) {
      best = { index, header: candidate.header, score: candidate.score };
    }
  }

  if (!best) {
    throw new DecodeExhaustionError(
      'No plausible header block found',
      'header',
      'locateStructural',
      'The capture polarity may be wrong or byte decoding is not stable enough'
    );
  }

  const { index, header, score } = best;
  return {
    headerIndex: index,
    header,
    score,
    payloads: blocks.slice(index + 1).map(b => b.payload)
  };
}
