/**
 * Caller location capture through V8 structured stack traces
 */

import { isAbsolute, relative } from 'path';
import { fileURLToPath } from 'url';
import type { SourceLocation } from '@msgstream/types';

/**
 * Frames above (and including) this function are left out of the capture
 */
export type StackBoundary = (...args: never[]) => unknown;

export const ANONYMOUS_FUNCTION = '<anonymous>';

function displayPath(fileName: string | null | undefined): string {
  if (!fileName) {
    return 'unknown';
  }
  const path = fileName.startsWith('file://') ? fileURLToPath(fileName) : fileName;
  if (!isAbsolute(path)) {
    return path;
  }
  const fromCwd = relative(process.cwd(), path);
  return fromCwd.startsWith('..') || isAbsolute(fromCwd) ? path : fromCwd;
}

/**
 * Location of the code that called `boundary`.
 *
 * File names inside the working directory are reported relative to it.
 * Unknown parts come back as 'unknown', 0 and '<anonymous>'.
 */
export function captureCallSite(boundary: StackBoundary = captureCallSite): SourceLocation {
  let frames: NodeJS.CallSite[] = [];
  const original = Error.prepareStackTrace;
  const probe: { stack?: string } = {};

  try {
    Error.prepareStackTrace = (_error, callSites) => {
      frames = callSites;
      return '';
    };
    Error.captureStackTrace(probe, boundary);
    // reading the stack runs prepareStackTrace
    void probe.stack;
  } finally {
    Error.prepareStackTrace = original;
  }

  const frame = frames[0];
  if (!frame) {
    return { functionName: ANONYMOUS_FUNCTION, fileName: 'unknown', lineNumber: 0 };
  }

  return {
    functionName: frame.getFunctionName() || ANONYMOUS_FUNCTION,
    fileName: displayPath(frame.getFileName()),
    lineNumber: frame.getLineNumber() ?? 0,
  };
}
