import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import { isPredefinedChannelName } from '@msgstream/types';
import type { ChannelSettings, TerminationMode } from '@msgstream/types';
import { ConfigurationError } from '../errors/MessageStreamError.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/Logger.js';
import { PREDEFINED_CHANNELS } from '../channel/ChannelRegistry.js';
import { MSGSTREAM_VERSION, getSchemaVersion } from '../version.js';
import { parseChannelRecord } from './channelConfig.js';

/**
 * msgstream configuration schema.
 *
 * YAML Location: .msgstream/config.yaml (preferred) or .msgstream/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * debugLevel: 1
 * logLevel: warnings
 * termination: exit
 *
 * channels:
 *   # predefined channels: every field optional
 *   warning:
 *     maxErrors: 50
 *   seriousError:
 *     maxErrors: 5
 *   # custom channels: title required, severity defaults to fatal
 *   meshCheck:
 *     title: "Mesh Check"
 *     severity: Warning
 *     maxErrors: 10
 * ```
 */
export interface MessageStreamConfig {
  /**
   * Config schema version (major.minor.patch). If omitted, no version check is performed.
   */
  version?: string;

  /** 0 disables debug helpers */
  debugLevel: number;

  /** Level of msgstream's own logger on stderr */
  logLevel: LogLevel;

  /** Optional file receiving msgstream's own log at debug level (absolute after loading) */
  logFile?: string;

  /** 'exit' ends the process on termination, 'throw' raises TerminationError */
  termination: TerminationMode;

  /** Validated channel settings by name, predefined overrides included */
  channels: Record<string, ChannelSettings>;
}

export const DEFAULT_CONFIG: MessageStreamConfig = {
  version: getSchemaVersion(MSGSTREAM_VERSION),
  debugLevel: 0,
  logLevel: 'warnings',
  termination: 'exit',
  channels: {},
};

/**
 * Fresh copy of DEFAULT_CONFIG; callers may mutate what they are given.
 */
export function defaultConfig(): MessageStreamConfig {
  return { ...DEFAULT_CONFIG, channels: {} };
}

const TERMINATION_MODES: readonly TerminationMode[] = ['exit', 'throw'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load msgstream config from project directory.
 *
 * Priority:
 * 1. config.yaml (preferred)
 * 2. config.json (deprecated, fallback)
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * Parse errors are logged and fall back to defaults.
 * Validation errors THROW ConfigurationError.
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Optional logger for warnings (defaults to console.warn)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): MessageStreamConfig {
  const configDir = join(projectPath, '.msgstream');
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  if (existsSync(yamlPath)) {
    let parsed: unknown;
    try {
      parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.yaml: ${error.message}`);
      logger.warn('Using default configuration');
      return defaultConfig();
    }
    return buildConfig(parsed, projectPath, yamlPath);
  }

  if (existsSync(jsonPath)) {
    logger.warn('config.json is deprecated. Move its settings to .msgstream/config.yaml');

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(jsonPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.json: ${error.message}`);
      logger.warn('Using default configuration');
      return defaultConfig();
    }
    return buildConfig(parsed, projectPath, jsonPath);
  }

  return defaultConfig();
}

/**
 * Validate a parsed config document and merge it with defaults.
 * An empty document (null, e.g. a comments-only YAML file) yields the defaults.
 */
export function buildConfig(parsed: unknown, projectPath: string, filePath?: string): MessageStreamConfig {
  if (parsed === null || parsed === undefined) {
    return defaultConfig();
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError('Config error: config must be a mapping', 'ERR_CONFIG_INVALID', { filePath });
  }

  validateVersion(parsed.version);

  return {
    version: typeof parsed.version === 'string' ? parsed.version : DEFAULT_CONFIG.version,
    debugLevel: validateDebugLevel(parsed.debugLevel),
    logLevel: validateLogLevel(parsed.logLevel),
    logFile: validateLogFile(parsed.logFile, projectPath),
    termination: validateTermination(parsed.termination),
    channels: validateChannels(parsed.channels),
  };
}

/**
 * Validate config version compatibility with the running msgstream version.
 * THROWS on error. No version field passes silently.
 *
 * @param currentVersion - Override for testing (defaults to MSGSTREAM_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigurationError(
      `Config error: version must be a string, got ${typeof configVersion}`,
      'ERR_CONFIG_INVALID',
      { field: 'version' }
    );
  }

  if (!configVersion.trim()) {
    throw new ConfigurationError('Config error: version cannot be empty', 'ERR_CONFIG_INVALID', { field: 'version' });
  }

  const current = currentVersion ?? MSGSTREAM_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigurationError(
      `Config error: config version "${configVersion}" is not compatible with msgstream ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_VERSION',
      { field: 'version' },
      `Set version: "${currentSchema}" in .msgstream/config.yaml`
    );
  }
}

export function validateDebugLevel(value: unknown): number {
  if (value === undefined || value === null) {
    return DEFAULT_CONFIG.debugLevel;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      `Config error: debugLevel must be a non-negative integer, got ${JSON.stringify(value)}`,
      'ERR_CONFIG_INVALID',
      { field: 'debugLevel' }
    );
  }
  return value;
}

export function validateLogLevel(value: unknown): LogLevel {
  if (value === undefined || value === null) {
    return DEFAULT_CONFIG.logLevel;
  }
  if (!isLogLevel(value)) {
    throw new ConfigurationError(
      `Config error: logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(value)}`,
      'ERR_CONFIG_INVALID',
      { field: 'logLevel' }
    );
  }
  return value;
}

/**
 * Relative log file paths are resolved against the project root.
 */
export function validateLogFile(value: unknown, projectPath: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigurationError(
      'Config error: logFile must be a non-empty string',
      'ERR_CONFIG_INVALID',
      { field: 'logFile' }
    );
  }
  return resolve(projectPath, value);
}

export function validateTermination(value: unknown): TerminationMode {
  if (value === undefined || value === null) {
    return DEFAULT_CONFIG.termination;
  }
  const mode = TERMINATION_MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new ConfigurationError(
      `Config error: termination must be one of ${TERMINATION_MODES.join(', ')}, got ${JSON.stringify(value)}`,
      'ERR_CONFIG_INVALID',
      { field: 'termination' }
    );
  }
  return mode;
}

/**
 * Validate the channels mapping.
 *
 * Predefined channel names (info, warning, seriousError, fatalError)
 * take their defaults for missing fields; any other name defines a new
 * channel and needs a title.
 */
export function validateChannels(value: unknown): Record<string, ChannelSettings> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(
      'Config error: channels must be a mapping of channel name to settings',
      'ERR_CONFIG_INVALID',
      { field: 'channels' }
    );
  }

  const channels: Record<string, ChannelSettings> = {};
  for (const [name, entry] of Object.entries(value)) {
    const defaults = isPredefinedChannelName(name) ? PREDEFINED_CHANNELS[name] : {};
    channels[name] = parseChannelRecord(entry ?? {}, `channels.${name}`, defaults);
  }
  return channels;
}
