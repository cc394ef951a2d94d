/**
 * Value formatting shared by message sinks and the logger
 */

/**
 * Safe JSON stringify that handles circular references
 */
export function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

/**
 * Render one part of a message body.
 *
 * Strings pass through unchanged, errors contribute their message,
 * plain objects and arrays are written as JSON.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null) {
    return 'null';
  }
  if (value === undefined) {
    return 'undefined';
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'object') {
    try {
      return safeStringify(value);
    } catch {
      return '[unserializable]';
    }
  }
  return String(value);
}
