import {randomUUID} from 'node:crypto';
import execa from 'execa';
import type {ResultAsync} from 'neverthrow';
import {log} from '../services/logger';
import type {SubprocessError} from '../services/task-errors';
import type {RunnerOutput} from '../types/task';
import {buildScript, SHELL} from './script';
import {runStreaming} from './stream';
import type {LineConsumer, ProcessRunner, RunSpec} from './types';

export const DEFAULT_IMAGE = 'curlimages/curl:latest';

/**
 * `docker run` arguments. Variables are forwarded by name (`-e KEY`) so their
 * values come from the docker client's environment, not the argument list.
 * `--init` keeps /bin/sh off PID 1, where it would ignore SIGTERM.
 */
export function buildDockerArgs(image: string, containerName: string, job: RunSpec): string[] {
  return [
    'run',
    '--rm',
    '--init',
    '--name', containerName,
    '--entrypoint', '',
    ...Object.keys(job.env).flatMap(key => ['-e', key]),
    image,
    SHELL, '-c', buildScript(job.commands),
  ];
}

export class DockerRunner implements ProcessRunner {
  readonly name = 'docker';

  constructor(
    private readonly image: string = DEFAULT_IMAGE,
    private readonly binary: string = 'docker',
  ) {}

  run(job: RunSpec, consumer: LineConsumer): ResultAsync<RunnerOutput, SubprocessError> {
    const containerName = `argocd-tasks-${randomUUID()}`;

    return runStreaming(this.binary, buildDockerArgs(this.image, containerName, job), {
      env: job.env,
      timeoutMs: job.timeoutMs,
      // killing the client does not stop the container
      onTimeout: () => this.removeContainer(containerName),
    }, consumer);
  }

  private async removeContainer(containerName: string): Promise<void> {
    const removal = await execa(this.binary, ['rm', '-f', containerName], {reject: false, stdin: 'ignore'});
    if (removal.exitCode !== 0) {
      log.warn(`Failed to remove container ${containerName}`, 'docker', {stderr: removal.stderr});
    }
  }
}
