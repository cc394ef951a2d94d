/**
 * @msgstream/core - Severity-tagged diagnostic channels with source-location context
 */

// Error types
export { MessageStreamError, ConfigurationError, TerminationError } from './errors/MessageStreamError.js';
export type { ErrorContext, MessageStreamErrorJSON } from './errors/MessageStreamError.js';

// Logging
export { OutputLogger, MultiLogger, createLogger, isLogLevel, LOG_LEVELS } from './logging/Logger.js';
export type { Logger, LogLevel, OutputLoggerOptions } from './logging/Logger.js';

// Output
export {
  FileDescriptorTarget,
  FileTarget,
  BufferTarget,
  NullTarget,
  PrefixedTarget,
  stdoutTarget,
  stderrTarget,
  writeFully,
} from './output/targets.js';
export { StreamSink, NullSink } from './output/StreamSink.js';
export type { StreamSinkOptions } from './output/StreamSink.js';
export { formatValue, safeStringify } from './output/format.js';

// Process context
export { SerialContext, StaticProcessContext, contextFromEnv, WORLD_COMMUNICATOR } from './process/ProcessContext.js';
export type { StaticProcessContextOptions } from './process/ProcessContext.js';

// Channels
export { DiagnosticChannel } from './channel/DiagnosticChannel.js';
export {
  ChannelRegistry,
  PREDEFINED_CHANNELS,
  getRegistry,
  initRegistry,
  resetRegistryForTests,
} from './channel/ChannelRegistry.js';
export type { RegistryOptions } from './channel/ChannelRegistry.js';
export {
  createEnvironment,
  exitProcess,
  throwTermination,
  terminationHandlerFor,
  TERMINATION_EXIT_CODE,
} from './channel/termination.js';
export type { ChannelEnvironment, EnvironmentOptions } from './channel/termination.js';
export { formatHeader, formatIoLine, formatLineRange, resolveIoContext, UNKNOWN_FILE } from './channel/header.js';

// Call-site helpers
export { captureCallSite, ANONYMOUS_FUNCTION } from './callsite/captureCallSite.js';
export type { StackBoundary } from './callsite/captureCallSite.js';
export {
  infoIn,
  ioInfoIn,
  warningIn,
  ioWarningIn,
  seriousErrorIn,
  seriousIOErrorIn,
  fatalErrorIn,
  fatalIOErrorIn,
  debugValue,
} from './callsite/helpers.js';

// Config
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
  parseChannelRecord,
  createRegistryFromConfig,
} from './config/index.js';
export type { MessageStreamConfig } from './config/index.js';

// Version
export { MSGSTREAM_VERSION, getSchemaVersion } from './version.js';

// Shared types
export type {
  Severity,
  MessageSink,
  OutputTarget,
  IoContext,
  IoLocation,
  StreamPosition,
  SourceRegion,
  SourceLocation,
  ProcessContext,
  TerminationHandler,
  TerminationKind,
  TerminationMode,
  TerminationReason,
  ChannelSettings,
  PredefinedChannelName,
} from '@msgstream/types';
