// Detokenizer and PETSCII text mapping
export * from './petscii';
export * from './detokenizer';
