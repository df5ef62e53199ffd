import type {ResultAsync} from 'neverthrow';
import type {SubprocessError} from '../services/task-errors';
import type {RunnerOutput} from '../types/task';
import {buildScript, SHELL} from './script';
import {runStreaming} from './stream';
import type {LineConsumer, ProcessRunner, RunSpec} from './types';

/**
 * Runs the script with the local /bin/sh. Needs curl on the host.
 */
export class ShellRunner implements ProcessRunner {
  readonly name = 'process';

  run(job: RunSpec, consumer: LineConsumer): ResultAsync<RunnerOutput, SubprocessError> {
    return runStreaming(SHELL, ['-c', buildScript(job.commands)], {
      env: job.env,
      timeoutMs: job.timeoutMs,
    }, consumer);
  }
}
