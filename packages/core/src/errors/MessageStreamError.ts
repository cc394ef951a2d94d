/**
 * MessageStreamError - Error hierarchy for msgstream
 *
 * Channels never raise errors during normal emission. The only failures
 * surfaced to callers are:
 * - ConfigurationError: malformed channel records or config files (fatal)
 * - TerminationError: raised by the throwing termination handler in place
 *   of exiting the process (fatal)
 */

import type { TerminationReason } from '@msgstream/types';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  field?: string;
  channel?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of MessageStreamError
 */
export interface MessageStreamErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all msgstream errors.
 */
export abstract class MessageStreamError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'fatal' | 'error' | 'warning';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): MessageStreamErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - malformed channel record, config file validation
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_MISSING_FIELD, ERR_CONFIG_VERSION
 */
export class ConfigurationError extends MessageStreamError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Raised instead of exiting when a registry runs with termination mode 'throw'.
 *
 * Severity: fatal (always)
 * Code: ERR_TERMINATED
 */
export class TerminationError extends MessageStreamError {
  readonly code = 'ERR_TERMINATED';
  readonly severity = 'fatal' as const;
  readonly reason: TerminationReason;

  constructor(reason: TerminationReason) {
    super(
      reason.kind === 'fatal'
        ? `Fatal message on channel "${reason.channel}"`
        : `Too many errors (${reason.errorCount} of ${reason.maxErrors}) on channel "${reason.channel}"`,
      { channel: reason.channel }
    );
    this.reason = reason;
  }
}
