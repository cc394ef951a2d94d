/**
 * Process contexts - who is master in a multi-process run
 *
 * msgstream never talks to other ranks. It only asks the context whether
 * this process is the master of a communicator; launching and numbering
 * the processes is the caller's business.
 */

import type { ProcessContext } from '@msgstream/types';

/** Communicator id spanning every rank of the run */
export const WORLD_COMMUNICATOR = 0;

/**
 * Single-process run: rank 0 of 1, master of every communicator.
 */
export class SerialContext implements ProcessContext {
  readonly rank = 0;
  readonly size = 1;
  readonly parallel = false;
  readonly worldCommunicator = WORLD_COMMUNICATOR;
  readonly warnCommunicator?: number;

  constructor(options: { warnCommunicator?: number } = {}) {
    this.warnCommunicator = options.warnCommunicator;
  }

  isMaster(_communicator: number): boolean {
    return true;
  }
}

export interface StaticProcessContextOptions {
  rank: number;
  size: number;
  /** Master rank of each communicator other than the world communicator */
  masters?: Record<number, number>;
  warnCommunicator?: number;
}

/**
 * Context with a fixed rank and a fixed master per communicator.
 *
 * The world communicator's master is rank 0. Communicators missing from
 * `masters` also default to rank 0.
 */
export class StaticProcessContext implements ProcessContext {
  readonly rank: number;
  readonly size: number;
  readonly parallel: boolean;
  readonly worldCommunicator = WORLD_COMMUNICATOR;
  readonly warnCommunicator?: number;
  private readonly masters: Map<number, number>;

  constructor(options: StaticProcessContextOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new Error(`Invalid process count ${options.size}`);
    }
    if (!Number.isInteger(options.rank) || options.rank < 0 || options.rank >= options.size) {
      throw new Error(`Invalid rank ${options.rank} for ${options.size} processes`);
    }

    this.rank = options.rank;
    this.size = options.size;
    this.parallel = options.size > 1;
    this.warnCommunicator = options.warnCommunicator;
    this.masters = new Map(
      Object.entries(options.masters ?? {}).map(([comm, master]) => [Number(comm), master])
    );
  }

  masterOf(communicator: number): number {
    if (communicator === this.worldCommunicator) {
      return 0;
    }
    return this.masters.get(communicator) ?? 0;
  }

  isMaster(communicator: number): boolean {
    return this.masterOf(communicator) === this.rank;
  }
}

/**
 * Environment variable pairs checked in order: our own, Open MPI, then
 * MPICH/Intel MPI (PMI).
 */
const RANK_VARIABLES: ReadonlyArray<readonly [rank: string, size: string]> = [
  ['MSGSTREAM_RANK', 'MSGSTREAM_SIZE'],
  ['OMPI_COMM_WORLD_RANK', 'OMPI_COMM_WORLD_SIZE'],
  ['PMI_RANK', 'PMI_SIZE'],
];

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number(value.trim());
}

/**
 * Detect rank and size from launcher environment variables.
 * Falls back to a serial context when no complete, valid pair is present.
 */
export function contextFromEnv(env: NodeJS.ProcessEnv = process.env): ProcessContext {
  for (const [rankVar, sizeVar] of RANK_VARIABLES) {
    const rank = parseCount(env[rankVar]);
    const size = parseCount(env[sizeVar]);
    if (rank !== undefined && size !== undefined && size >= 1 && rank < size) {
      return size > 1 ? new StaticProcessContext({ rank, size }) : new SerialContext();
    }
  }
  return new SerialContext();
}
