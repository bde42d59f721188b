// Core types and base classes for tape recovery

/**
 * Pulse duration bands produced by clustering.
 * Unknown pulses (outside the clusterable range) are represented as `null`.
 */
export enum PulseCategory {
  SHORT = 0,
  MEDIUM = 1,
  LONG = 2
}

export type Category = PulseCategory | null;

// Redundant tape copies: A is written first with the $89..$81 countdown
export type TapeCopy = 'A' | 'B';
export type CopySelection = TapeCopy | 'AUTO';

export type RecoveryMode = 'blocks' | 'scan' | 'auto';

/**
 * Load-address-prefixed program image, the input of the detokenizer
 */
export interface ProgramImage {
  readonly loadAddress: number;
  readonly body: Uint8Array;   // program bytes without the load address
  readonly bytes: Uint8Array;  // load address (LE) + body, as written to a .prg
}

export interface ListingLine {
  readonly lineNumber: number;
  readonly text: string;
}

/**
 * Assembled payload shorter than the header declared
 */
export interface StructuralShortfall {
  readonly declared: number;
  readonly assembled: number;
  readonly missing: number;
}

export interface HeaderFields {
  readonly fileType: number;
  readonly startAddress: number;
  readonly endAddress: number;
  readonly rawFilename: Uint8Array; // 16 bytes, space padded
}

export interface ChecksumTally {
  readonly matched: number;
  readonly sampled: number;
}

/**
 * Diagnostics surfaced to callers after a recovery attempt
 */
export interface RecoveryDiagnostics {
  centers: [number, number, number];
  pulseCount: number;
  decodedLength: number;
  strategy: 'blocks' | 'scan';
  blocks?: {
    copyA: number;
    copyB: number;
    total: number;
    used: TapeCopy;
    usedCount: number;
    checksums: ChecksumTally;
    headerIndex: number;
    headerScore: number | null;
    header: HeaderFields;
    filename: string;
    assembledLength: number;
  };
  scan?: {
    offset: number;
    score: number;
    loadAddress: number;
    lineCount: number;
    endOffset: number;
    imageLength: number;
  };
}

// Base event class
export class Event {
  constructor(public readonly data: unknown = null) {}
}

export type Listener = (_event: Event) => void;

// Event system base class
export abstract class EventEmitter {
  private listeners = new Map<string, Listener[]>();

  on(eventName: string, callback: Listener): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      eventListeners.push(callback);
    } else {
      this.listeners.set(eventName, [callback]);
    }
  }

  off(eventName: string, callback: Listener): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      const index = eventListeners.indexOf(callback);
      if (index !== -1) {
        eventListeners.splice(index, 1);
      }
    }
  }

  emit(eventName: string, event: Event = new Event()): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      eventListeners.forEach(callback => callback(event));
    }
  }

  removeAllListeners(eventName?: string): void {
    if (eventName) {
      this.listeners.delete(eventName);
    } else {
      this.listeners.clear();
    }
  }
}
