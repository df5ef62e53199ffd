import fs from 'node:fs/promises';
import YAML from 'yaml';
import {err, ok, Result, ResultAsync} from 'neverthrow';
import {DEFAULT_IMAGE} from '../runner/docker-runner';
import {isLogLevel, type LoggerConfig, type LogLevel} from '../services/logger';
import {configurationError, missingField, type ConfigurationError} from '../services/task-errors';
import type {
  ConnectionConfig,
  RunnerConfig,
  RunnerKind,
  StatusRequest,
  SyncRequest,
} from '../types/task';
import {parseDurationSeconds} from '../utils/duration';
import {isEmpty, isRecord, isValidEnvName, isValidSemVer} from '../utils/validators';
import {getCurrentServer, getCurrentServerConfig, getCurrentToken, type ArgoCLIConfig} from './cli-config';
import {stripScheme} from './paths';

/**
 * Task definition as written in a YAML file or assembled from CLI flags,
 * before any validation.
 */
export type RawTaskConfig = Record<string, unknown>;

export type ResolutionSources = {
  env: NodeJS.ProcessEnv;
  cliConfig: ArgoCLIConfig | null;
};

type Resolved<T> = Result<T, ConfigurationError>;

const parseYaml = Result.fromThrowable(
  (text: string): unknown => YAML.parse(text),
  (e) => (e instanceof Error ? e.message : String(e)),
);

export function loadTaskFile(file: string): ResultAsync<RawTaskConfig, ConfigurationError> {
  return ResultAsync.fromPromise(
    fs.readFile(file, 'utf8'),
    (e) => configurationError(`Cannot read task file ${file}: ${e instanceof Error ? e.message : String(e)}`),
  ).andThen((text): Resolved<RawTaskConfig> => {
    const parsed = parseYaml(text);
    if (parsed.isErr()) {
      return err(configurationError(`Invalid YAML in ${file}: ${parsed.error}`));
    }
    if (parsed.value === null || parsed.value === undefined) return ok({});
    if (!isRecord(parsed.value)) return err(configurationError(`Task file ${file} must contain a mapping`));
    return ok(parsed.value);
  });
}

// Later layers win; undefined values never override, nested mappings (env) are merged
export function mergeConfig(...layers: RawTaskConfig[]): RawTaskConfig {
  const merged: RawTaskConfig = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const previous = merged[key];
      merged[key] = isRecord(previous) && isRecord(value) ? {...previous, ...value} : value;
    }
  }
  return merged;
}

export function readString(raw: RawTaskConfig, key: string): Resolved<string | undefined> {
  const value = raw[key];
  if (value === undefined || value === null) return ok(undefined);
  if (typeof value === 'string') return ok(value);
  // YAML turns short numeric revisions and versions into numbers
  if (typeof value === 'number') return ok(String(value));
  return err(configurationError(`Property '${key}' must be a string`, key));
}

export function readBoolean(raw: RawTaskConfig, key: string, fallback: boolean): Resolved<boolean> {
  const value = raw[key];
  if (value === undefined || value === null) return ok(fallback);
  if (typeof value === 'boolean') return ok(value);
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return ok(true);
    if (normalized === 'false') return ok(false);
  }
  return err(configurationError(`Property '${key}' must be a boolean`, key));
}

export function readDuration(raw: RawTaskConfig, key: string): Resolved<number | undefined> {
  const value = raw[key];
  if (value === undefined || value === null) return ok(undefined);
  if (typeof value !== 'number' && typeof value !== 'string') {
    return err(configurationError(`Property '${key}' must be a duration`, key));
  }
  const seconds = parseDurationSeconds(value);
  if (seconds === null) {
    return err(configurationError(`Property '${key}' is not a valid duration: ${String(value)}`, key));
  }
  return ok(seconds);
}

export function readEnvMap(raw: RawTaskConfig, key: string): Resolved<Record<string, string>> {
  const value = raw[key];
  if (value === undefined || value === null) return ok({});
  if (!isRecord(value)) return err(configurationError(`Property '${key}' must be a mapping`, key));

  const env: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (!isValidEnvName(name)) {
      return err(configurationError(`Invalid environment variable name '${name}'`, key));
    }
    if (typeof entry !== 'string' && typeof entry !== 'number' && typeof entry !== 'boolean') {
      return err(configurationError(`Environment variable '${name}' must be a scalar`, key));
    }
    env[name] = String(entry);
  }
  return ok(env);
}

function firstPresent(...values: Array<string | null | undefined>): string | undefined {
  return values.find((v): v is string => !isEmpty(v));
}

/**
 * Server and token fall back to ARGOCD_SERVER / ARGOCD_AUTH_TOKEN, then to the
 * current context of the argocd CLI config.
 */
export function resolveConnection(raw: RawTaskConfig, sources: ResolutionSources): Resolved<ConnectionConfig> {
  const server = readString(raw, 'server');
  if (server.isErr()) return err(server.error);
  const token = readString(raw, 'token');
  if (token.isErr()) return err(token.error);

  const explicitServer = firstPresent(server.value, sources.env.ARGOCD_SERVER);
  const rServer = explicitServer ?? firstPresent(getCurrentServer(sources.cliConfig));
  if (rServer === undefined || isEmpty(stripScheme(rServer.trim()))) return err(missingField('server'));
  const rToken = firstPresent(token.value, sources.env.ARGOCD_AUTH_TOKEN, getCurrentToken(sources.cliConfig));
  if (rToken === undefined) return err(missingField('token'));

  // A server taken from the CLI context brings the transport it was logged in with
  const context = explicitServer === undefined ? getCurrentServerConfig(sources.cliConfig) : null;

  const insecure = readBoolean(raw, 'insecure', context?.insecure ?? true);
  if (insecure.isErr()) return err(insecure.error);
  const plaintext = readBoolean(raw, 'plaintext', context?.['plain-text'] ?? false);
  if (plaintext.isErr()) return err(plaintext.error);
  const grpcWeb = readBoolean(raw, 'grpcWeb', context?.['grpc-web'] ?? false);
  if (grpcWeb.isErr()) return err(grpcWeb.error);

  const serverCert = readString(raw, 'serverCert');
  if (serverCert.isErr()) return err(serverCert.error);

  const version = readString(raw, 'argoCDVersion');
  if (version.isErr()) return err(version.error);
  const argoCDVersion = isEmpty(version.value) ? undefined : version.value?.trim().replace(/^v/, '');
  if (argoCDVersion !== undefined && !isValidSemVer(argoCDVersion)) {
    return err(configurationError(`Property 'argoCDVersion' must be a version like 2.10.0`, 'argoCDVersion'));
  }

  return ok(Object.freeze({
    server: stripScheme(rServer.trim()),
    token: rToken,
    insecure: insecure.value,
    plaintext: plaintext.value,
    grpcWeb: grpcWeb.value,
    serverCert: isEmpty(serverCert.value) ? undefined : serverCert.value,
    argoCDVersion,
  }));
}

function resolveApplication(raw: RawTaskConfig): Resolved<string> {
  const application = readString(raw, 'application');
  if (application.isErr()) return err(application.error);
  if (application.value === undefined || isEmpty(application.value)) return err(missingField('application'));
  return ok(application.value.trim());
}

export function resolveSyncRequest(raw: RawTaskConfig): Resolved<SyncRequest> {
  const application = resolveApplication(raw);
  if (application.isErr()) return err(application.error);
  const revision = readString(raw, 'revision');
  if (revision.isErr()) return err(revision.error);
  const prune = readBoolean(raw, 'prune', false);
  if (prune.isErr()) return err(prune.error);
  const dryRun = readBoolean(raw, 'dryRun', false);
  if (dryRun.isErr()) return err(dryRun.error);
  const force = readBoolean(raw, 'force', false);
  if (force.isErr()) return err(force.error);
  const timeout = readDuration(raw, 'timeout');
  if (timeout.isErr()) return err(timeout.error);

  return ok(Object.freeze({
    application: application.value,
    revision: isEmpty(revision.value) ? undefined : revision.value,
    prune: prune.value,
    dryRun: dryRun.value,
    force: force.value,
    timeoutSeconds: timeout.value,
  }));
}

export function resolveStatusRequest(raw: RawTaskConfig): Resolved<StatusRequest> {
  const application = resolveApplication(raw);
  if (application.isErr()) return err(application.error);
  const refresh = readBoolean(raw, 'refresh', false);
  if (refresh.isErr()) return err(refresh.error);

  return ok(Object.freeze({application: application.value, refresh: refresh.value}));
}

function isRunnerKind(value: string): value is RunnerKind {
  return value === 'docker' || value === 'process';
}

export function resolveRunnerConfig(raw: RawTaskConfig): Resolved<RunnerConfig> {
  const runner = readString(raw, 'runner');
  if (runner.isErr()) return err(runner.error);
  const kind = runner.value ?? 'docker';
  if (!isRunnerKind(kind)) {
    return err(configurationError(`Property 'runner' must be 'docker' or 'process', got '${kind}'`, 'runner'));
  }

  const image = readString(raw, 'containerImage');
  if (image.isErr()) return err(image.error);
  const env = readEnvMap(raw, 'env');
  if (env.isErr()) return err(env.error);
  const executionTimeout = readDuration(raw, 'executionTimeout');
  if (executionTimeout.isErr()) return err(executionTimeout.error);

  return ok(Object.freeze({
    kind,
    containerImage: isEmpty(image.value) || image.value === undefined ? DEFAULT_IMAGE : image.value,
    env: Object.freeze(env.value),
    timeoutMs: executionTimeout.value === undefined ? undefined : executionTimeout.value * 1000,
  }));
}

export function resolveLoggerConfig(raw: RawTaskConfig): Resolved<LoggerConfig> {
  const level = readString(raw, 'logLevel');
  if (level.isErr()) return err(level.error);
  const file = readString(raw, 'logFile');
  if (file.isErr()) return err(file.error);

  let logLevel: LogLevel | undefined;
  if (level.value !== undefined) {
    const candidate = level.value.trim().toLowerCase();
    if (!isLogLevel(candidate)) {
      return err(configurationError(`Property 'logLevel' must be one of debug, info, warn, error`, 'logLevel'));
    }
    logLevel = candidate;
  }

  return ok({
    level: logLevel,
    destination: isEmpty(file.value) ? undefined : file.value,
  });
}
