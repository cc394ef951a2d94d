/**
 * Channel, sink and output types shared by @msgstream/core and its consumers
 */

import type { Severity } from './severity.js';

// === OUTPUT ===

/**
 * Destination for formatted text.
 *
 * write() must hand the text over synchronously; flush() returns once
 * everything written so far has reached the underlying device.
 */
export interface OutputTarget {
  write(text: string): void;
  flush(): void;
}

/**
 * Handle returned by a channel for composing a message body.
 * Chaining is expressed as repeated calls: sink.write('a').write(1).end()
 */
export interface MessageSink {
  write(...parts: unknown[]): MessageSink;
  line(...parts: unknown[]): MessageSink;
  /** Finish the message. Later calls, and parts written afterwards, are no-ops. */
  end(): void;
  readonly ended: boolean;
}

// === IO CONTEXT ===

/**
 * Position-tracking state of an open input or output stream.
 * Both fields are best-effort.
 */
export interface StreamPosition {
  readonly name?: string;
  readonly lineNumber?: number;
}

/**
 * A block of a parsed input file spanning several lines
 * (for example one entry of a configuration file).
 */
export interface SourceRegion {
  readonly name?: string;
  readonly startLineNumber: number;
  readonly endLineNumber?: number;
}

/**
 * What a diagnostic about input data can point at: a file name,
 * an open stream, or a region of a parsed file.
 */
export type IoContext = string | StreamPosition | SourceRegion;

/**
 * Resolved io context written into a message header
 */
export interface IoLocation {
  fileName: string;
  startLine: number;
  endLine: number;
}

// === SOURCE LOCATION ===

export interface SourceLocation {
  functionName: string;
  fileName: string;
  lineNumber: number;
}

// === PROCESS CONTEXT ===

/**
 * Identity of this process within a multi-process run.
 * The channel trusts this information; it never coordinates with other ranks.
 */
export interface ProcessContext {
  readonly rank: number;
  readonly size: number;
  readonly parallel: boolean;
  readonly worldCommunicator: number;
  /** Communicator that masterStream() callers are expected to use, if any */
  readonly warnCommunicator?: number;
  isMaster(communicator: number): boolean;
}

// === TERMINATION ===

export type TerminationKind = 'fatal' | 'threshold';

export interface TerminationReason {
  kind: TerminationKind;
  channel: string;
  severity: Severity;
  errorCount: number;
  maxErrors: number;
}

/**
 * Called once a message requiring termination has been flushed.
 * The production handler never returns.
 */
export type TerminationHandler = (reason: TerminationReason) => void;

export type TerminationMode = 'exit' | 'throw';
