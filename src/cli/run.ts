import fs from 'node:fs/promises';
import {errAsync, okAsync, ResultAsync} from 'neverthrow';
import {readCLIConfig, type ArgoCLIConfig} from '../config/cli-config';
import {
  loadTaskFile,
  mergeConfig,
  resolveConnection,
  resolveRunnerConfig,
  resolveStatusRequest,
  resolveSyncRequest,
  type RawTaskConfig,
} from '../config/task-config';
import {createRunner} from '../runner';
import type {ProcessRunner} from '../runner/types';
import {configurationError, type TaskError} from '../services/task-errors';
import {runStatus} from '../tasks/status';
import {runSync} from '../tasks/sync';
import type {RunnerConfig, StatusOutput, SyncOutput} from '../types/task';
import type {CliArgs, CliCommand} from './args';

export type CliDependencies = {
  env: NodeJS.ProcessEnv;
  loadCLIConfig: () => Promise<ArgoCLIConfig | null>;
  createRunner: (config: RunnerConfig) => ProcessRunner;
};

export const defaultDependencies: CliDependencies = {
  env: process.env,
  loadCLIConfig: () => readCLIConfig(),
  createRunner,
};

export type CliResult = {
  command: CliCommand;
  application: string;
  output: SyncOutput | StatusOutput;
};

function readServerCert(file: string): ResultAsync<RawTaskConfig, TaskError> {
  return ResultAsync.fromPromise(
    fs.readFile(file, 'utf8'),
    (e) => configurationError(`Cannot read server certificate ${file}: ${e instanceof Error ? e.message : String(e)}`, 'serverCert'),
  ).map(serverCert => ({serverCert}));
}

/**
 * Task file, then --server-cert-file, then flags, merged into one definition.
 */
export function loadRawConfig(cli: CliArgs): ResultAsync<RawTaskConfig, TaskError> {
  const file: ResultAsync<RawTaskConfig, TaskError> = cli.configFile ? loadTaskFile(cli.configFile) : okAsync({});
  const cert: ResultAsync<RawTaskConfig, TaskError> = cli.serverCertFile ? readServerCert(cli.serverCertFile) : okAsync({});

  return file.andThen(fileConfig => cert.map(certConfig => mergeConfig(fileConfig, certConfig, cli.overrides)));
}

export function executeCli(
  command: CliCommand,
  raw: RawTaskConfig,
  deps: CliDependencies = defaultDependencies,
): ResultAsync<CliResult, TaskError> {
  const runnerConfig = resolveRunnerConfig(raw);
  if (runnerConfig.isErr()) return errAsync(runnerConfig.error);
  const rRunner = runnerConfig.value;

  return ResultAsync.fromSafePromise(deps.loadCLIConfig()).andThen((cliConfig): ResultAsync<CliResult, TaskError> => {
    const connection = resolveConnection(raw, {env: deps.env, cliConfig});
    if (connection.isErr()) return errAsync(connection.error);

    const ctx = {runner: deps.createRunner(rRunner), runnerConfig: rRunner};

    if (command === 'sync') {
      const request = resolveSyncRequest(raw);
      if (request.isErr()) return errAsync(request.error);
      return runSync({connection: connection.value, request: request.value}, ctx)
        .map((output): CliResult => ({command, application: request.value.application, output}));
    }

    const request = resolveStatusRequest(raw);
    if (request.isErr()) return errAsync(request.error);
    return runStatus({connection: connection.value, request: request.value}, ctx)
      .map((output): CliResult => ({command, application: request.value.application, output}));
  });
}
