import { isPredefinedChannelName } from '@msgstream/types';
import type { ChannelSettings, PredefinedChannelName } from '@msgstream/types';
import { ChannelRegistry } from '../channel/ChannelRegistry.js';
import { terminationHandlerFor, type EnvironmentOptions } from '../channel/termination.js';
import { createLogger } from '../logging/Logger.js';
import type { MessageStreamConfig } from './ConfigLoader.js';

/**
 * Build a registry from a loaded config.
 *
 * Explicit options win over the config: a given logger replaces the one
 * built from logLevel/logFile, a given terminate handler replaces the
 * configured termination mode.
 */
export function createRegistryFromConfig(
  config: MessageStreamConfig,
  options: EnvironmentOptions = {}
): ChannelRegistry {
  const overrides: Partial<Record<PredefinedChannelName, ChannelSettings>> = {};
  const custom: Array<[string, ChannelSettings]> = [];

  for (const [name, settings] of Object.entries(config.channels)) {
    if (isPredefinedChannelName(name)) {
      overrides[name] = settings;
    } else {
      custom.push([name, settings]);
    }
  }

  const registry = new ChannelRegistry({
    ...options,
    logger: options.logger ?? createLogger(config.logLevel, { logFile: config.logFile }),
    terminate: options.terminate ?? terminationHandlerFor(config.termination),
    debugLevel: config.debugLevel,
    channels: overrides,
  });

  for (const [name, settings] of custom) {
    registry.register(name, settings);
  }

  return registry;
}
