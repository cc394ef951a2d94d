/**
 * Validation of channel configuration records.
 * THROWS ConfigurationError on error.
 */

import { parseSeverity, SEVERITIES } from '@msgstream/types';
import type { ChannelSettings, Severity } from '@msgstream/types';
import { ConfigurationError } from '../errors/MessageStreamError.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Validate a channel record.
 *
 * - title: required string (may be empty)
 * - severity: optional severity name, case-insensitive; defaults to `defaults.severity` or 'fatal'
 * - maxErrors: optional non-negative integer; defaults to `defaults.maxErrors` or 0
 *
 * @param record - Raw record from code or a parsed config file
 * @param where - Path used in error messages (e.g. "channels.solver")
 * @param defaults - Settings to fall back on; a default title makes title optional
 */
export function parseChannelRecord(
  record: unknown,
  where = 'channel',
  defaults: Partial<ChannelSettings> = {}
): ChannelSettings {
  if (!isRecord(record)) {
    throw new ConfigurationError(
      `Config error: ${where} must be an object, got ${describe(record)}`,
      'ERR_CONFIG_INVALID',
      { field: where }
    );
  }

  let title: string;
  if (record.title === undefined || record.title === null) {
    if (defaults.title === undefined) {
      throw new ConfigurationError(
        `Config error: ${where}.title is required`,
        'ERR_CONFIG_MISSING_FIELD',
        { field: `${where}.title` }
      );
    }
    title = defaults.title;
  } else if (typeof record.title === 'string') {
    title = record.title;
  } else {
    throw new ConfigurationError(
      `Config error: ${where}.title must be a string, got ${describe(record.title)}`,
      'ERR_CONFIG_INVALID',
      { field: `${where}.title` }
    );
  }

  let severity: Severity = defaults.severity ?? 'fatal';
  if (record.severity !== undefined && record.severity !== null) {
    const parsed = parseSeverity(record.severity);
    if (parsed === undefined) {
      throw new ConfigurationError(
        `Config error: ${where}.severity must be one of ${SEVERITIES.join(', ')}, got ${JSON.stringify(record.severity)}`,
        'ERR_CONFIG_INVALID',
        { field: `${where}.severity` }
      );
    }
    severity = parsed;
  }

  let maxErrors = defaults.maxErrors ?? 0;
  if (record.maxErrors !== undefined && record.maxErrors !== null) {
    const value = record.maxErrors;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new ConfigurationError(
        `Config error: ${where}.maxErrors must be a non-negative integer, got ${JSON.stringify(value)}`,
        'ERR_CONFIG_INVALID',
        { field: `${where}.maxErrors` }
      );
    }
    maxErrors = value;
  }

  return { title, severity, maxErrors };
}
