/**
 * ChannelRegistry - Process-wide set of diagnostic channels
 *
 * Every registry provides four channels sharing one environment:
 * - info (Info): informational output
 * - warning (Warning)
 * - seriousError (Serious Error): terminates after 100 messages by default
 * - fatalError (FATAL ERROR): terminates on every message
 *
 * Initialization order: call initRegistry() (or createRegistryFromConfig()
 * followed by initRegistry()) before any other component emits. Otherwise
 * the first getRegistry() call builds a default registry writing to stdout
 * with the process context taken from launcher environment variables.
 * There is no teardown; channels live until the process exits.
 */

import type { ChannelSettings, PredefinedChannelName } from '@msgstream/types';
import { ConfigurationError } from '../errors/MessageStreamError.js';
import { contextFromEnv } from '../process/ProcessContext.js';
import { DiagnosticChannel } from './DiagnosticChannel.js';
import { createEnvironment, type ChannelEnvironment, type EnvironmentOptions } from './termination.js';

/**
 * Default settings of the predefined channels
 */
export const PREDEFINED_CHANNELS: Record<PredefinedChannelName, ChannelSettings> = {
  info: { title: 'Info', severity: 'info', maxErrors: 0 },
  warning: { title: 'Warning', severity: 'warning', maxErrors: 0 },
  seriousError: { title: 'Serious Error', severity: 'serious', maxErrors: 100 },
  fatalError: { title: 'FATAL ERROR', severity: 'fatal', maxErrors: 0 },
};

export interface RegistryOptions extends EnvironmentOptions {
  /** 0 disables debug helpers; higher values enable more output */
  debugLevel?: number;
  /** Overrides for the predefined channels */
  channels?: Partial<Record<PredefinedChannelName, Partial<ChannelSettings>>>;
}

function validateDebugLevel(level: number): number {
  if (!Number.isInteger(level) || level < 0) {
    throw new ConfigurationError(
      `Config error: debugLevel must be a non-negative integer, got ${level}`,
      'ERR_CONFIG_INVALID',
      { field: 'debugLevel' }
    );
  }
  return level;
}

export class ChannelRegistry {
  readonly environment: ChannelEnvironment;
  readonly info: DiagnosticChannel;
  readonly warning: DiagnosticChannel;
  readonly seriousError: DiagnosticChannel;
  readonly fatalError: DiagnosticChannel;
  private readonly channels = new Map<string, DiagnosticChannel>();
  private level: number;

  constructor(options: RegistryOptions = {}) {
    this.environment = createEnvironment(options);
    this.level = validateDebugLevel(options.debugLevel ?? 0);

    const build = (name: PredefinedChannelName): DiagnosticChannel => {
      const settings = { ...PREDEFINED_CHANNELS[name], ...options.channels?.[name] };
      const channel = new DiagnosticChannel(settings.title, settings.severity, settings.maxErrors, this.environment);
      this.channels.set(name, channel);
      return channel;
    };

    this.info = build('info');
    this.warning = build('warning');
    this.seriousError = build('seriousError');
    this.fatalError = build('fatalError');
  }

  get debugLevel(): number {
    return this.level;
  }

  setDebugLevel(level: number): void {
    this.level = validateDebugLevel(level);
  }

  get(name: string): DiagnosticChannel | undefined {
    return this.channels.get(name);
  }

  /**
   * Add a named channel sharing this registry's environment.
   *
   * @throws ConfigurationError if the name is taken
   */
  register(name: string, settings: ChannelSettings): DiagnosticChannel {
    if (this.channels.has(name)) {
      throw new ConfigurationError(
        `Config error: channel "${name}" is already registered`,
        'ERR_CONFIG_INVALID',
        { channel: name }
      );
    }
    const channel = new DiagnosticChannel(settings.title, settings.severity, settings.maxErrors, this.environment);
    this.channels.set(name, channel);
    return channel;
  }

  names(): string[] {
    return [...this.channels.keys()];
  }
}

let registry: ChannelRegistry | null = null;

/**
 * The process-wide registry, created with defaults on first use.
 */
export function getRegistry(): ChannelRegistry {
  if (!registry) {
    registry = new ChannelRegistry({ context: contextFromEnv() });
  }
  return registry;
}

/**
 * Install the process-wide registry. Pass options to build one, or a
 * registry built elsewhere (e.g. by createRegistryFromConfig()).
 */
export function initRegistry(init: RegistryOptions | ChannelRegistry = {}): ChannelRegistry {
  const next = init instanceof ChannelRegistry ? init : new ChannelRegistry(init);
  if (registry && registry !== next) {
    next.environment.logger.debug('Replacing process-wide channel registry');
  }
  registry = next;
  return next;
}

export function resetRegistryForTests(): void {
  registry = null;
}
