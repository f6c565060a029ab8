import { ConnectionError, ConnectionLostError } from '../lib/errors';

/**
 * @description Commands in execution order, frozen once loaded.
 */
export type CommandList = readonly string[];

export type CommandOutcome =
  | {
      kind: 'completed';
      exitStatus: number;
      stdout: Buffer;
      stderr: Buffer;
      duration: number;
    }
  | { kind: 'failed'; exitStatus: number; stderr: Buffer; duration: number }
  | { kind: 'fatal'; cause: ConnectionLostError };

export interface ExecutionResult {
  /**
   * @description The command text as it appeared in the command list.
   */
  readonly command: string;
  /**
   * @description 1-indexed position of the command in the list.
   */
  readonly position: number;
  readonly exitStatus: number;
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  /**
   * @description True iff the exit status is 0.
   */
  readonly succeeded: boolean;
  /**
   * @description Wall time of the command in milliseconds.
   */
  readonly duration: number;
}

export interface RunReport {
  results: readonly ExecutionResult[];
  /**
   * @description Number of commands in the list, attempted or not.
   */
  total: number;
  successCount: number;
  allSucceeded: boolean;
  /**
   * @description Set when the run was cut short by a connection-level failure.
   */
  fatal?: ConnectionError | ConnectionLostError;
}
