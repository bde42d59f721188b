/**
 * Tape block structure definitions
 *
 * Format: COUNTDOWN(9) | PAYLOAD(192) | CHECKSUM(1)
 */

import type { TapeCopy } from '../core';

/**
 * A framed block found in the decoded byte stream
 */
export interface TapeBlock {
  readonly copy: TapeCopy;       // which countdown preceded the payload
  readonly offset: number;       // payload position in the decoded stream
  readonly payload: Uint8Array;  // always BlockConstants.PAYLOAD_SIZE bytes
  readonly checksum: number;     // checksum byte read from tape
  readonly checksumOk: boolean;  // XOR(payload) === checksum
}

/**
 * Block parsing result at a single stream position
 */
export interface BlockParseResult {
  readonly success: boolean;
  readonly block?: TapeBlock;
  readonly bytesConsumed: number;
}

export const BlockConstants = {
  COUNTDOWN_SIZE: 9,
  PAYLOAD_SIZE: 192,
  CHECKSUM_SIZE: 1,
  FRAME_SIZE: 202, // countdown + payload + checksum

  // Diagnostics
  CHECKSUM_SAMPLE_LIMIT: 200
} as const;

// Countdown preambles, one per redundant copy
export const COUNTDOWNS: Readonly<Record<TapeCopy, readonly number[]>> = {
  A: [0x89, 0x88, 0x87, 0x86, 0x85, 0x84, 0x83, 0x82, 0x81],
  B: [0x09, 0x08, 0x07, 0x06, 0x05, 0x04, 0x03, 0x02, 0x01]
};
