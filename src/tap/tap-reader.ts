/**
 * TAP capture container reader
 *
 * Layout:
 *   0..11   "C64-TAPE-RAW" signature
 *   12      version (only 1 is supported)
 *   13..15  reserved
 *   16..19  data length (LE u32)
 *   20..    pulse stream
 *
 * Pulse stream: a non-zero byte is a pulse of that duration. A zero byte is
 * followed by a 24-bit LE duration (leader tone, gaps).
 */

import { FormatError } from '../errors';

export const TAP_SIGNATURE = 'C64-TAPE-RAW';
export const TAP_HEADER_SIZE = 20;
export const TAP_SUPPORTED_VERSION = 1;

const SIGNATURE_BYTES = new Uint8Array(Array.from(TAP_SIGNATURE, c => c.charCodeAt(0)));
const VERSION_OFFSET = 12;
const LENGTH_OFFSET = 16;
const EXTENDED_RECORD_SIZE = 4;

export interface TapHeader {
  readonly version: number;
  readonly dataLength: number;
}

export function parseTapHeader(data: Uint8Array): TapHeader {
  if (data.length < TAP_HEADER_SIZE) {
    throw new FormatError(`Capture too short: ${data.length} bytes, need at least ${TAP_HEADER_SIZE}`, 'parseTapHeader');
  }
  for (let i = 0; i < SIGNATURE_BYTES.length; i++) {
    if (data[i] !== SIGNATURE_BYTES[i]) {
      throw new FormatError(`Not a TAP file with ${TAP_SIGNATURE} signature`, 'parseTapHeader');
    }
  }
  const version = data[VERSION_OFFSET];
  if (version !== TAP_SUPPORTED_VERSION) {
    throw new FormatError(`Unsupported TAP version ${version} (expect ${TAP_SUPPORTED_VERSION})`, 'parseTapHeader');
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return { version, dataLength: view.getUint32(LENGTH_OFFSET, true) };
}

/**
 * Decode the pulse stream of a TAP v1 capture
 * @returns pulse durations in capture order
 */
export function readTapPulses(data: Uint8Array): number[] {
  const { dataLength } = parseTapHeader(data);
  const stream = data.subarray(TAP_HEADER_SIZE, TAP_HEADER_SIZE + dataLength);

  const pulses: number[] = [];
  let i = 0;
  while (i < stream.length) {
    const x = stream[i];
    if (x !== 0) {
      pulses.push(x);
      i++;
      continue;
    }
    // truncated extended record at the end of the stream
    if (i + 3 >= stream.length) break;
    pulses.push(stream[i + 1] | (stream[i + 2] << 8) | (stream[i + 3] << 16));
    i += EXTENDED_RECORD_SIZE;
  }
  return pulses;
}

/**
 * Build a TAP v1 container from pulse durations
 * Durations of 0 or above 255 are written as extended records.
 */
export function encodeTapContainer(pulses: readonly number[]): Uint8Array {
  const stream: number[] = [];
  for (const pulse of pulses) {
    if (pulse < 0 || pulse > 0xFFFFFF) {
      throw new Error(`Pulse duration out of range: ${pulse}`);
    }
    if (pulse >= 1 && pulse <= 0xFF) {
      stream.push(pulse);
    } else {
      stream.push(0, pulse & 0xFF, (pulse >> 8) & 0xFF, (pulse >> 16) & 0xFF);
    }
  }

  const result = new Uint8Array(TAP_HEADER_SIZE + stream.length);
  result.set(SIGNATURE_BYTES, 0);
  result[VERSION_OFFSET] = TAP_SUPPORTED_VERSION;
  new DataView(result.buffer).setUint32(LENGTH_OFFSET, stream.length, true);
  result.set(stream, TAP_HEADER_SIZE);
  return result;
}
