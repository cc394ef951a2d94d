/**
 * Termination handlers and the environment channels emit into
 */

import type {
  OutputTarget,
  ProcessContext,
  TerminationHandler,
  TerminationMode,
  TerminationReason,
} from '@msgstream/types';
import { TerminationError } from '../errors/MessageStreamError.js';
import { createLogger, type Logger } from '../logging/Logger.js';
import { PrefixedTarget, stdoutTarget } from '../output/targets.js';
import { SerialContext } from '../process/ProcessContext.js';

/**
 * Exit code used for every diagnostic termination
 */
export const TERMINATION_EXIT_CODE = 1;

/**
 * Production handler: ends the process. Output is already flushed by the time it runs.
 */
export const exitProcess: TerminationHandler = (_reason: TerminationReason): never => {
  process.exit(TERMINATION_EXIT_CODE);
};

/**
 * Handler for embedding and tests: raises TerminationError instead of exiting.
 */
export const throwTermination: TerminationHandler = (reason: TerminationReason): never => {
  throw new TerminationError(reason);
};

export function terminationHandlerFor(mode: TerminationMode): TerminationHandler {
  return mode === 'throw' ? throwTermination : exitProcess;
}

/**
 * Everything a channel resolves at emission time
 */
export interface ChannelEnvironment {
  readonly context: ProcessContext;
  /** Master output (stdout on the master rank) */
  readonly output: OutputTarget;
  /** Per-process output; lines carry a "[rank] " prefix in parallel runs */
  readonly processOutput: OutputTarget;
  readonly terminate: TerminationHandler;
  readonly logger: Logger;
}

export interface EnvironmentOptions {
  context?: ProcessContext;
  output?: OutputTarget;
  processOutput?: OutputTarget;
  terminate?: TerminationHandler;
  logger?: Logger;
}

/**
 * Fill in an environment: serial context, stdout, exiting on termination,
 * warnings-level logger on stderr.
 *
 * Without an explicit processOutput, a parallel context gets the master
 * output prefixed with "[rank] ".
 */
export function createEnvironment(options: EnvironmentOptions = {}): ChannelEnvironment {
  const context = options.context ?? new SerialContext();
  const output = options.output ?? stdoutTarget();
  const processOutput =
    options.processOutput ?? (context.parallel ? new PrefixedTarget(output, `[${context.rank}] `) : output);

  return {
    context,
    output,
    processOutput,
    terminate: options.terminate ?? exitProcess,
    logger: options.logger ?? createLogger('warnings'),
  };
}
