/**
 * Tape BASIC recovery
 *
 * Recovers tokenized BASIC listings from degraded TAP captures.
 */

export * from './core';
export * from './errors';
export * from './tap/tap-reader';
export * from './demod';
export * from './blocks';
export * from './locator';
export * from './assembler/assembler';
export * from './basic';
export * from './strings/extract';
export * from './strings/group';
export * from './recovery';
