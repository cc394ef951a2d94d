/**
 * Severity types for diagnostic channels
 */

/**
 * Message severity.
 *
 * - info: informational output, never terminates
 * - warning: possible problem
 * - serious: likely data corruption, still does not terminate by itself
 * - fatal: terminates the process once the message is flushed
 */
export type Severity = 'info' | 'warning' | 'serious' | 'fatal';

/**
 * All severities, least to most severe
 */
export const SEVERITIES: readonly Severity[] = ['info', 'warning', 'serious', 'fatal'];

/**
 * Header prefix written before the channel title
 */
export const SEVERITY_PREFIX: Record<Severity, string> = {
  info: '[INFO]',
  warning: '[WARN]',
  serious: '[SERIOUS]',
  fatal: '[FATAL]',
};

/**
 * Severities that only the master rank reports in a parallel run.
 * The others are written by every rank to its own per-process output.
 */
export const COLLECTED_SEVERITIES: ReadonlySet<Severity> = new Set<Severity>(['info', 'warning']);

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

/**
 * Parse a severity name, ignoring case ("Warning", "WARNING" and "warning" all match).
 * Returns undefined for anything else.
 */
export function parseSeverity(value: unknown): Severity | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return isSeverity(normalized) ? normalized : undefined;
}
