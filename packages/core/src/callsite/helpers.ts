/**
 * Call-site helpers for the process-wide channels
 *
 * Each helper fills in the caller's file and line, and the caller's
 * function name unless one is given:
 *
 *   warningIn().write('mesh has ', count, ' negative cells').end();
 *   ioWarningIn({ name: 'points', lineNumber: 12 }, 'readPoints').line('missing value').end();
 *   debugValue('residual', residual);
 */

import type { IoContext, MessageSink, SourceLocation } from '@msgstream/types';
import { getRegistry } from '../channel/ChannelRegistry.js';
import type { DiagnosticChannel } from '../channel/DiagnosticChannel.js';
import { formatValue } from '../output/format.js';
import { captureCallSite } from './captureCallSite.js';

function emitAt(
  channel: DiagnosticChannel,
  site: SourceLocation,
  functionName: string | undefined,
  io?: IoContext
): MessageSink {
  const name = functionName ?? site.functionName;
  if (io === undefined) {
    return channel.emit(name, site.fileName, site.lineNumber);
  }
  if (typeof io === 'string') {
    return channel.emit(name, site.fileName, site.lineNumber, io);
  }
  return channel.emit(name, site.fileName, site.lineNumber, io);
}

export function infoIn(functionName?: string): MessageSink {
  return emitAt(getRegistry().info, captureCallSite(infoIn), functionName);
}

export function ioInfoIn(io: IoContext, functionName?: string): MessageSink {
  return emitAt(getRegistry().info, captureCallSite(ioInfoIn), functionName, io);
}

export function warningIn(functionName?: string): MessageSink {
  return emitAt(getRegistry().warning, captureCallSite(warningIn), functionName);
}

export function ioWarningIn(io: IoContext, functionName?: string): MessageSink {
  return emitAt(getRegistry().warning, captureCallSite(ioWarningIn), functionName, io);
}

export function seriousErrorIn(functionName?: string): MessageSink {
  return emitAt(getRegistry().seriousError, captureCallSite(seriousErrorIn), functionName);
}

export function seriousIOErrorIn(io: IoContext, functionName?: string): MessageSink {
  return emitAt(getRegistry().seriousError, captureCallSite(seriousIOErrorIn), functionName, io);
}

/**
 * Terminates the process once the returned sink is ended.
 */
export function fatalErrorIn(functionName?: string): MessageSink {
  return emitAt(getRegistry().fatalError, captureCallSite(fatalErrorIn), functionName);
}

export function fatalIOErrorIn(io: IoContext, functionName?: string): MessageSink {
  return emitAt(getRegistry().fatalError, captureCallSite(fatalIOErrorIn), functionName, io);
}

/**
 * Write "[file:line] name = value" to per-process output.
 * No-op while the registry's debug level is 0.
 */
export function debugValue(name: string, value: unknown): void {
  const registry = getRegistry();
  if (registry.debugLevel <= 0) {
    return;
  }

  const site = captureCallSite(debugValue);
  const target = registry.environment.processOutput;
  target.write(`[${site.fileName}:${site.lineNumber}] ${name} = ${formatValue(value)}\n`);
  target.flush();
}
