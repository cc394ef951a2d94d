/**
 * Configuration record types
 */

import type { Severity } from './severity.js';

/**
 * Validated settings of a single channel
 */
export interface ChannelSettings {
  title: string;
  severity: Severity;
  maxErrors: number;
}

/**
 * Names of the channels every registry provides
 */
export type PredefinedChannelName = 'info' | 'warning' | 'seriousError' | 'fatalError';

export const PREDEFINED_CHANNEL_NAMES: readonly PredefinedChannelName[] = [
  'info',
  'warning',
  'seriousError',
  'fatalError',
];

export function isPredefinedChannelName(name: string): name is PredefinedChannelName {
  return PREDEFINED_CHANNEL_NAMES.some((predefined) => predefined === name);
}
