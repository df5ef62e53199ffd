import type {ResultAsync} from 'neverthrow';
import type {SubprocessError} from '../services/task-errors';
import type {RunnerOutput} from '../types/task';

/**
 * Receives every stdout/stderr line as it is produced.
 */
export type LineConsumer = (line: string, isStdErr: boolean) => void;

export type RunSpec = {
  // Shell commands, executed in order by one `/bin/sh -c` script
  commands: string[];
  env: Record<string, string>;
  timeoutMs?: number;
};

/**
 * Executes a command sequence somewhere (container, local shell, test fake).
 * Resolves with the exit code even when it is non-zero; only a process that
 * could not be run to completion is an error.
 */
export interface ProcessRunner {
  readonly name: string;
  run(spec: RunSpec, consumer: LineConsumer): ResultAsync<RunnerOutput, SubprocessError>;
}
