// Tape block framing and header fields
export * from './types';
export * from './block-parser';
export * from './header';
