import type { HeaderFields, ProgramImage, StructuralShortfall } from '../core';
import { DecodeExhaustionError } from '../errors';
import { concatBytes, toHex, writeU16LE } from '../utils';

export interface AssemblerConfig {
  maxProgramLength: number;
}

export const DEFAULT_ASSEMBLER_CONFIG: AssemblerConfig = {
  maxProgramLength: 1_000_000
};

export interface AssemblyResult {
  image: ProgramImage;
  declaredLength: number;
  shortfall: StructuralShortfall | null;
}

/**
 * Build a program image from load address and body bytes
 */
export function createProgramImage(loadAddress: number, body: Uint8Array): ProgramImage {
  const bytes = concatBytes([writeU16LE(loadAddress), body]);
  return { loadAddress: loadAddress & 0xFFFF, body: bytes.subarray(2), bytes };
}

/**
 * Split a .prg file into its load address and body
 */
export function imageFromPrg(prg: Uint8Array): ProgramImage {
  if (prg.length < 2) {
    throw new Error(`PRG too small: ${prg.length} bytes`);
  }
  return { loadAddress: prg[0] | (prg[1] << 8), body: prg.subarray(2), bytes: prg };
}

/**
 * Concatenate payloads after the header and truncate to the declared length.
 * A short assembly is kept and reported as a shortfall.
 * @throws DecodeExhaustionError when the declared length is implausible
 */
export function assembleProgram(
  header: HeaderFields,
  payloads: readonly Uint8Array[],
  config: Partial<AssemblerConfig> = {}
): AssemblyResult {
  const { maxProgramLength } = { ...DEFAULT_ASSEMBLER_CONFIG, ...config };
  const { startAddress, endAddress } = header;
  const declaredLength = endAddress - startAddress;

  if (declaredLength <= 0 || declaredLength > maxProgramLength) {
    throw new DecodeExhaustionError(
      `Header looks wrong: start=$${toHex(startAddress, 4)} end=$${toHex(endAddress, 4)} length=${declaredLength}`,
      'assemble',
      'assembleProgram'
    );
  }

  const assembled = concatBytes(payloads);
  const body = assembled.subarray(0, declaredLength);
  const shortfall = body.length < declaredLength
    ? { declared: declaredLength, assembled: body.length, missing: declaredLength - body.length }
    : null;

  return { image: createProgramImage(startAddress, body), declaredLength, shortfall };
}
