/**
 * Recovery error taxonomy
 *
 * Only two failures halt the pipeline:
 * - FormatError: the capture container itself is not readable
 * - DecodeExhaustionError: decoding ran to completion but found nothing usable
 *
 * Checksum mismatches, bad bit pairs and pointer inconsistencies are absorbed
 * by the stages that meet them and never thrown.
 */

export type RecoveryStage = 'read' | 'classify' | 'decode' | 'blocks' | 'header' | 'assemble' | 'scan' | 'list';

export class TapeRecoveryError extends Error {
  constructor(
    message: string,
    public readonly stage: RecoveryStage,
    public readonly operation: string
  ) {
    super(message);
    this.name = 'TapeRecoveryError';
  }
}

export class FormatError extends TapeRecoveryError {
  constructor(message: string, operation: string) {
    super(message, 'read', operation);
    this.name = 'FormatError';
  }
}

export class DecodeExhaustionError extends TapeRecoveryError {
  constructor(
    message: string,
    stage: RecoveryStage,
    operation: string,
    public readonly hint?: string
  ) {
    super(message, stage, operation);
    this.name = 'DecodeExhaustionError';
  }
}
