import type {RunnerConfig} from '../types/task';
import {DockerRunner} from './docker-runner';
import {ShellRunner} from './shell-runner';
import type {ProcessRunner} from './types';

export function createRunner(config: RunnerConfig): ProcessRunner {
  switch (config.kind) {
    case 'docker':
      return new DockerRunner(config.containerImage);
    case 'process':
      return new ShellRunner();
  }
}

export {DockerRunner, DEFAULT_IMAGE, buildDockerArgs} from './docker-runner';
export {ShellRunner} from './shell-runner';
export type {LineConsumer, ProcessRunner, RunSpec} from './types';
