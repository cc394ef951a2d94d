/**
 * DiagnosticChannel - Named, severity-tagged diagnostic sink
 *
 * Each emit() writes a header naming the calling function and source
 * location, counts the message, and returns a MessageSink for the body.
 * When the body is ended (by end(), the next emit(), or at the latest
 * once the current tick finishes) the channel applies its termination policy:
 * - fatal channels always terminate
 * - any channel terminates once errorCount reaches maxErrors (0 = never)
 * Both happen after the message has been flushed.
 *
 * Usage:
 *   const warning = new DiagnosticChannel('Warning', 'warning', 100);
 *   warning.emit('readMesh', 'src/mesh.ts', 42).write('bad value ', value).end();
 *
 *   warning.emit('readMesh', 'src/mesh.ts', 42, 'constant/points', 10, 18)
 *     .line('negative volume')
 *     .end();
 */

import { COLLECTED_SEVERITIES } from '@msgstream/types';
import type {
  IoContext,
  MessageSink,
  OutputTarget,
  Severity,
  SourceRegion,
  StreamPosition,
  TerminationKind,
} from '@msgstream/types';
import { ConfigurationError } from '../errors/MessageStreamError.js';
import { NullSink, StreamSink } from '../output/StreamSink.js';
import { NullTarget } from '../output/targets.js';
import { parseChannelRecord } from '../config/channelConfig.js';
import { formatHeader, formatIoLine, resolveIoContext } from './header.js';
import { createEnvironment, type ChannelEnvironment } from './termination.js';

function validateMaxErrors(value: number, title: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      `Config error: maxErrors must be a non-negative integer, got ${value}`,
      'ERR_CONFIG_INVALID',
      { field: 'maxErrors', channel: title }
    );
  }
  return value;
}

export class DiagnosticChannel {
  readonly title: string;
  readonly severity: Severity;
  readonly environment: ChannelEnvironment;
  private maxErrorsValue: number;
  private count = 0;
  private pending: StreamSink | null = null;

  constructor(title: string, severity: Severity, maxErrors = 0, environment: ChannelEnvironment = createEnvironment()) {
    this.title = title;
    this.severity = severity;
    this.maxErrorsValue = validateMaxErrors(maxErrors, title);
    this.environment = environment;
  }

  /**
   * Build a channel from a configuration record with keys
   * title (required), severity (default fatal) and maxErrors (default 0).
   *
   * @throws ConfigurationError if a field is missing or malformed
   */
  static fromConfig(record: unknown, environment?: ChannelEnvironment): DiagnosticChannel {
    const settings = parseChannelRecord(record);
    return new DiagnosticChannel(settings.title, settings.severity, settings.maxErrors, environment);
  }

  /** Maximum number of messages before termination; 0 disables the limit */
  get maxErrors(): number {
    return this.maxErrorsValue;
  }

  setMaxErrors(maxErrors: number): void {
    this.maxErrorsValue = validateMaxErrors(maxErrors, this.title);
  }

  /** Messages emitted since construction */
  get errorCount(): number {
    return this.count;
  }

  /**
   * Write a message header and return the sink for its body.
   *
   * The io variants add a "reading file" line for diagnostics about
   * input data: a file name with an optional line range, an open stream's
   * position, or a region of a parsed file.
   */
  emit(functionName: string, sourceFile: string, sourceLine: number): MessageSink;
  emit(
    functionName: string,
    sourceFile: string,
    sourceLine: number,
    ioFile: string,
    ioStartLine?: number,
    ioEndLine?: number
  ): MessageSink;
  emit(functionName: string, sourceFile: string, sourceLine: number, io: StreamPosition | SourceRegion): MessageSink;
  emit(
    functionName: string,
    sourceFile: string,
    sourceLine: number,
    io?: IoContext,
    ioStartLine = -1,
    ioEndLine = -1
  ): MessageSink {
    // a new message closes the previous one
    this.pending?.end();

    this.count++;
    const target = this.resolveTarget();
    const sink: StreamSink = new StreamSink(target, {
      onEnd: () => this.finishMessage(sink, target),
    });

    sink.write(formatHeader(this.severity, this.title, functionName, sourceFile, sourceLine));
    if (io !== undefined) {
      sink.write(formatIoLine(resolveIoContext(io, ioStartLine, ioEndLine)));
    }

    this.pending = sink;
    // a message left open ends with the current tick
    queueMicrotask(() => sink.end());
    return sink;
  }

  /**
   * Headerless sink when enabled, a discarding sink otherwise.
   */
  emitConditional(enabled: boolean): MessageSink {
    return enabled ? this.asStream() : new NullSink();
  }

  /**
   * The channel's stream without header or counting.
   * Continues the open message, if there is one.
   */
  asStream(): MessageSink {
    if (this.pending && !this.pending.ended) {
      return this.pending;
    }
    return new StreamSink(this.resolveTarget());
  }

  /**
   * Stream that only the master of `communicator` writes to, straight
   * to the master output; every other rank gets a discarding sink.
   * Continues the open message, if there is one. Not counted, and never
   * rank-prefixed whatever the severity.
   */
  masterStream(communicator: number): MessageSink {
    const { context, logger, output } = this.environment;

    if (context.warnCommunicator !== undefined && communicator !== context.warnCommunicator) {
      logger.warn(`masterStream called with communicator ${communicator}`, {
        channel: this.title,
        expected: context.warnCommunicator,
      });
    }

    if (!context.isMaster(communicator)) {
      return new NullSink();
    }
    if (this.pending && !this.pending.ended) {
      return this.pending;
    }
    return new StreamSink(output);
  }

  /**
   * Info and warning messages come from the master only in a parallel run;
   * serious and fatal ones go to every rank's own output.
   */
  private resolveTarget(): OutputTarget {
    const { context, output, processOutput } = this.environment;

    if (!context.parallel) {
      return output;
    }
    if (COLLECTED_SEVERITIES.has(this.severity)) {
      return context.isMaster(context.worldCommunicator) ? output : new NullTarget();
    }
    return processOutput;
  }

  private finishMessage(sink: StreamSink, target: OutputTarget): void {
    if (this.pending === sink) {
      this.pending = null;
    }

    if (this.severity === 'fatal') {
      this.terminate('fatal');
      return;
    }

    if (this.maxErrorsValue > 0 && this.count >= this.maxErrorsValue) {
      target.write(`Too many errors (${this.count} of ${this.maxErrorsValue}) on channel "${this.title}"\n`);
      target.flush();
      this.terminate('threshold');
    }
  }

  private terminate(kind: TerminationKind): void {
    this.environment.logger.debug('Terminating on diagnostic', {
      kind,
      channel: this.title,
      errorCount: this.count,
      maxErrors: this.maxErrorsValue,
    });

    this.environment.terminate({
      kind,
      channel: this.title,
      severity: this.severity,
      errorCount: this.count,
      maxErrors: this.maxErrorsValue,
    });
  }
}
