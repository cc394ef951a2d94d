/**
 * Message sinks returned by diagnostic channels
 */

import type { MessageSink, OutputTarget } from '@msgstream/types';
import { formatValue } from './format.js';

export interface StreamSinkOptions {
  /** Runs once, after the message has been flushed by end() */
  onEnd?: () => void;
}

/**
 * Sink writing through an OutputTarget.
 *
 * Parts are written as they are appended; end() terminates the current
 * line, flushes the target and then runs the onEnd hook. Parts appended
 * after end() are dropped.
 */
export class StreamSink implements MessageSink {
  private readonly target: OutputTarget;
  private readonly onEnd?: () => void;
  private atLineStart = true;
  private finished = false;

  constructor(target: OutputTarget, options: StreamSinkOptions = {}) {
    this.target = target;
    this.onEnd = options.onEnd;
  }

  get ended(): boolean {
    return this.finished;
  }

  write(...parts: unknown[]): StreamSink {
    if (this.finished) return this;
    const text = parts.map(formatValue).join('');
    if (text.length > 0) {
      this.target.write(text);
      this.atLineStart = text.endsWith('\n');
    }
    return this;
  }

  line(...parts: unknown[]): StreamSink {
    return this.write(...parts, '\n');
  }

  end(): void {
    if (this.finished) return;
    this.finished = true;

    if (!this.atLineStart) {
      this.target.write('\n');
      this.atLineStart = true;
    }
    this.target.flush();
    this.onEnd?.();
  }
}

/**
 * Sink that discards everything appended to it.
 */
export class NullSink implements MessageSink {
  private finished = false;

  get ended(): boolean {
    return this.finished;
  }

  write(..._parts: unknown[]): NullSink {
    return this;
  }

  line(..._parts: unknown[]): NullSink {
    return this;
  }

  end(): void {
    this.finished = true;
  }
}
