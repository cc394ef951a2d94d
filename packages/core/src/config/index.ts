/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  buildConfig,
  DEFAULT_CONFIG,
  defaultConfig,
  validateVersion,
  validateDebugLevel,
  validateLogLevel,
  validateLogFile,
  validateTermination,
  validateChannels,
} from './ConfigLoader.js';
export type { MessageStreamConfig } from './ConfigLoader.js';

export { parseChannelRecord } from './channelConfig.js';
export { createRegistryFromConfig } from './createRegistryFromConfig.js';
