import {errAsync, okAsync, type ResultAsync} from 'neverthrow';
import type {ProcessRunner} from '../runner/types';
import {log} from '../services/logger';
import {subprocessError, type SubprocessError} from '../services/task-errors';
import type {ConnectionConfig, RunnerConfig, RunnerOutput} from '../types/task';
import {buildCommandLine, buildEnvironment} from './command-builder';

export type TaskContext = {
  runner: ProcessRunner;
  runnerConfig: RunnerConfig;
};

export type Execution = {
  output: RunnerOutput;
  rawOutput: string;
};

/**
 * Accumulates stdout lines into one buffer; stderr goes to diagnostics only.
 */
export function createOutputCollector() {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    consumer: (line: string, isStdErr: boolean) => {
      if (isStdErr) {
        stderr.push(line);
        log.warn(line, 'argocd');
      } else {
        stdout.push(line);
      }
    },
    stdout: () => stdout.join('\n').trim(),
    stderr: () => stderr.join('\n'),
  };
}

/**
 * Runs install steps, the certificate staging step and `commands`, in that
 * order, as one script. A non-zero exit fails the task.
 */
export function executeCommands(
  ctx: TaskContext,
  conn: ConnectionConfig,
  commands: string[],
): ResultAsync<Execution, SubprocessError> {
  const collector = createOutputCollector();
  const job = {
    commands: buildCommandLine(conn, commands),
    env: buildEnvironment(conn, ctx.runnerConfig.env),
    timeoutMs: ctx.runnerConfig.timeoutMs,
  };

  log.debug(`Running ${job.commands.length} commands`, ctx.runner.name, {
    commands: commands.length,
    env: Object.keys(job.env),
  });

  return ctx.runner
    .run(job, collector.consumer)
    .mapErr(error => ({...error, rawOutput: collector.stdout(), stderr: collector.stderr()}))
    .andThen((output): ResultAsync<Execution, SubprocessError> => {
      const rawOutput = collector.stdout();
      if (output.exitCode !== 0) {
        return errAsync(subprocessError('ArgoCD command failed', {
          exitCode: output.exitCode,
          rawOutput,
          stderr: collector.stderr(),
        }));
      }
      return okAsync({output, rawOutput});
    });
}
