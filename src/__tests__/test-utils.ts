// src/__tests__/test-utils.ts
/**
 * Test utilities and fakes shared by the task tests
 * This file contains only utilities and does not have its own tests
 */
import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import type { LineConsumer, ProcessRunner, RunSpec } from "../runner/types";
import type { SubprocessError } from "../services/task-errors";
import type { TaskContext } from "../tasks/execute";
import type { ConnectionConfig, RunnerConfig, RunnerOutput } from "../types/task";

export type FakeRunnerScript = {
  stdout?: string[];
  stderr?: string[];
  exitCode?: number;
  vars?: Record<string, unknown>;
  failure?: SubprocessError;
};

/**
 * In-process stand-in for the container: records what it was asked to run
 * and replays canned output lines.
 */
export class FakeRunner implements ProcessRunner {
  readonly name = "fake";
  readonly jobs: RunSpec[] = [];

  constructor(private readonly script: FakeRunnerScript = {}) {}

  run(job: RunSpec, consumer: LineConsumer): ResultAsync<RunnerOutput, SubprocessError> {
    this.jobs.push(job);
    const stdout = this.script.stdout ?? [];
    const stderr = this.script.stderr ?? [];
    stdout.forEach((line) => consumer(line, false));
    stderr.forEach((line) => consumer(line, true));

    if (this.script.failure) return errAsync(this.script.failure);

    return okAsync({
      exitCode: this.script.exitCode ?? 0,
      stdOutLineCount: stdout.length,
      stdErrLineCount: stderr.length,
      vars: this.script.vars ?? {},
    });
  }
}

export function createConnection(overrides: Partial<ConnectionConfig> = {}): ConnectionConfig {
  return {
    server: "argocd.example.com",
    token: "test-token",
    insecure: true,
    plaintext: false,
    grpcWeb: false,
    ...overrides,
  };
}

export function createRunnerConfig(overrides: Partial<RunnerConfig> = {}): RunnerConfig {
  return {
    kind: "docker",
    containerImage: "curlimages/curl:latest",
    env: {},
    ...overrides,
  };
}

export function createContext(runner: ProcessRunner, overrides: Partial<RunnerConfig> = {}): TaskContext {
  return { runner, runnerConfig: createRunnerConfig(overrides) };
}

export const SYNC_JSON =
  '{"status":{"sync":{"status":"Synced","revision":"723b86e"},"health":{"status":"Healthy"},"resources":[{"kind":"Deployment","name":"demo"}]}}';
