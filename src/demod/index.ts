/**
 * Pulse demodulation: clustering and bit/byte decoding
 */

export * from './pulse-classifier';
export * from './bit-decoder';
