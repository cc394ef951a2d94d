/**
 * Output targets - where formatted diagnostic text ends up
 *
 * - FileDescriptorTarget: synchronous writes to an fd (stdout, stderr)
 * - FileTarget: per-process redirect to a file
 * - BufferTarget: in-memory capture
 * - NullTarget: discards everything
 * - PrefixedTarget: prefixes every line written through it (per-rank output)
 *
 * Writes are synchronous so that a flushed message is on the device
 * before the process is terminated.
 */

import {
  writeSync,
  openSync,
  closeSync,
  fsyncSync,
  mkdirSync,
  accessSync,
  statSync,
  constants,
} from 'fs';
import { dirname, resolve } from 'path';
import type { OutputTarget } from '@msgstream/types';

function isWouldBlock(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EAGAIN';
}

/**
 * writeSync until every byte is out. A non-blocking pipe may take only
 * part of the buffer per call, or refuse with EAGAIN until drained.
 */
export function writeFully(fd: number, text: string): void {
  const bytes = Buffer.from(text, 'utf-8');
  let offset = 0;
  while (offset < bytes.length) {
    try {
      offset += writeSync(fd, bytes, offset, bytes.length - offset);
    } catch (err) {
      if (!isWouldBlock(err)) throw err;
    }
  }
}

/**
 * Writes straight to a file descriptor, synchronously and completely.
 */
export class FileDescriptorTarget implements OutputTarget {
  readonly fd: number;

  constructor(fd: number) {
    this.fd = fd;
  }

  write(text: string): void {
    writeFully(this.fd, text);
  }

  flush(): void {
    // writeSync has already handed the bytes to the OS
  }
}

export function stdoutTarget(): FileDescriptorTarget {
  return new FileDescriptorTarget(1);
}

export function stderrTarget(): FileDescriptorTarget {
  return new FileDescriptorTarget(2);
}

/**
 * File-backed target.
 *
 * The file is truncated on construction and parent directories are created.
 * Throws if the directory is not writable or the path is a directory.
 */
export class FileTarget implements OutputTarget {
  readonly filePath: string;
  private fd: number | null;

  constructor(filePath: string) {
    const resolvedPath = resolve(filePath);
    const dir = dirname(resolvedPath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write output file: directory '${dir}' is not writable`);
    }

    try {
      if (statSync(resolvedPath).isDirectory()) {
        throw new Error(`Cannot write output file: '${resolvedPath}' is a directory`);
      }
    } catch (e) {
      // stat fails for files that do not exist yet
      if (e instanceof Error && e.message.includes('is a directory')) throw e;
    }

    this.filePath = resolvedPath;
    this.fd = openSync(resolvedPath, 'w');
  }

  write(text: string): void {
    if (this.fd === null) {
      throw new Error(`Output file '${this.filePath}' is closed`);
    }
    writeFully(this.fd, text);
  }

  flush(): void {
    if (this.fd !== null) {
      fsyncSync(this.fd);
    }
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Collects everything written in memory.
 */
export class BufferTarget implements OutputTarget {
  private chunks: string[] = [];
  private flushes = 0;

  write(text: string): void {
    this.chunks.push(text);
  }

  flush(): void {
    this.flushes++;
  }

  contents(): string {
    return this.chunks.join('');
  }

  /** Number of flush() calls since construction or the last clear() */
  flushCount(): number {
    return this.flushes;
  }

  clear(): void {
    this.chunks = [];
    this.flushes = 0;
  }
}

/**
 * Discards all output.
 */
export class NullTarget implements OutputTarget {
  write(_text: string): void {}

  flush(): void {}
}

/**
 * Adds a prefix at the start of every line, e.g. "[3] " for rank 3.
 */
export class PrefixedTarget implements OutputTarget {
  private readonly inner: OutputTarget;
  private readonly prefix: string;
  private atLineStart = true;

  constructor(inner: OutputTarget, prefix: string) {
    this.inner = inner;
    this.prefix = prefix;
  }

  write(text: string): void {
    if (text.length === 0) return;

    let out = '';
    for (const segment of text.split(/(?<=\n)/)) {
      if (this.atLineStart) {
        out += this.prefix;
      }
      out += segment;
      this.atLineStart = segment.endsWith('\n');
    }
    this.inner.write(out);
  }

  flush(): void {
    this.inner.flush();
  }
}
