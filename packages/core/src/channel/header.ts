/**
 * Message header formatting
 *
 *   [WARN] Warning in function "readMesh"
 *       in file src/mesh.ts at line 42
 *       reading file constant/polyMesh/points from line 10 to line 18
 */

import { SEVERITY_PREFIX } from '@msgstream/types';
import type { IoContext, IoLocation, Severity, SourceRegion, StreamPosition } from '@msgstream/types';

export const UNKNOWN_FILE = 'unknown';

export function formatHeader(
  severity: Severity,
  title: string,
  functionName: string,
  sourceFile: string,
  sourceLine: number
): string {
  const label = title ? `${SEVERITY_PREFIX[severity]} ${title}` : SEVERITY_PREFIX[severity];
  return `${label} in function "${functionName}"\n    in file ${sourceFile} at line ${sourceLine}\n`;
}

/**
 * Line range suffix: both lines → "from/to", start only → "at line", else nothing.
 */
export function formatLineRange(startLine: number, endLine: number): string {
  if (startLine >= 0 && endLine >= 0) {
    return ` from line ${startLine} to line ${endLine}`;
  }
  if (startLine >= 0) {
    return ` at line ${startLine}`;
  }
  return '';
}

export function formatIoLine(io: IoLocation): string {
  return `    reading file ${io.fileName}${formatLineRange(io.startLine, io.endLine)}\n`;
}

function isSourceRegion(io: StreamPosition | SourceRegion): io is SourceRegion {
  return 'startLineNumber' in io;
}

function lineOrUnset(value: number | undefined): number {
  return value !== undefined && Number.isInteger(value) ? value : -1;
}

/**
 * Resolve any io context to a file name and line range.
 */
export function resolveIoContext(io: IoContext, startLine = -1, endLine = -1): IoLocation {
  if (typeof io === 'string') {
    return { fileName: io || UNKNOWN_FILE, startLine, endLine };
  }
  if (isSourceRegion(io)) {
    return {
      fileName: io.name || UNKNOWN_FILE,
      startLine: lineOrUnset(io.startLineNumber),
      endLine: lineOrUnset(io.endLineNumber),
    };
  }
  return {
    fileName: io.name || UNKNOWN_FILE,
    startLine: lineOrUnset(io.lineNumber),
    endLine: -1,
  };
}
