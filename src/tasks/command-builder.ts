import {err, type Result} from 'neverthrow';
import {missingField, type ConfigurationError} from '../services/task-errors';
import type {ConnectionConfig, StatusRequest, SyncRequest} from '../types/task';
import {isEmpty} from '../utils/validators';
import {buildConnectionArgs, SERVER_CERT_PATH} from './connection-args';

export const ARGOCD_BINARY = 'argocd';
export const SERVER_CERT_ENV = 'ARGOCD_SERVER_CERT';

// Maps `uname -m` to the architecture suffix of the release assets
const ARCH_EXPR = "$(uname -m | sed 's/x86_64/amd64/;s/aarch64/arm64/')";

/**
 * Commands that download the CLI into /tmp and put it on PATH.
 */
export function buildInstallCommands(version?: string): string[] {
  const downloadUrl = version
    ? `https://github.com/argoproj/argo-cd/releases/download/v${version}/argocd-linux-${ARCH_EXPR}`
    : `https://github.com/argoproj/argo-cd/releases/latest/download/argocd-linux-${ARCH_EXPR}`;

  return [
    `curl -sSL -o /tmp/argocd ${downloadUrl}`,
    'chmod +x /tmp/argocd',
    'export PATH=$PATH:/tmp',
  ];
}

/**
 * The PEM travels through the environment and is written out by the shell,
 * so the certificate body never appears on a command line.
 */
export function buildCertCommands(conn: ConnectionConfig): string[] {
  if (conn.serverCert === undefined) return [];
  return [`printf '%s' "$${SERVER_CERT_ENV}" > ${SERVER_CERT_PATH}`];
}

function appCommand(
  verb: 'sync' | 'get',
  application: string,
  conn: ConnectionConfig,
  operationArgs: string[],
): Result<string, ConfigurationError> {
  if (isEmpty(application)) return err(missingField('application'));

  return buildConnectionArgs(conn).map(connectionArgs =>
    [ARGOCD_BINARY, 'app', verb, application, ...connectionArgs, ...operationArgs, '--output', 'json'].join(' '),
  );
}

export function buildSyncCommand(conn: ConnectionConfig, req: SyncRequest): Result<string, ConfigurationError> {
  const args: string[] = [];
  if (req.revision !== undefined && req.revision.trim() !== '') args.push('--revision', req.revision);
  if (req.prune) args.push('--prune');
  if (req.dryRun) args.push('--dry-run');
  if (req.force) args.push('--force');
  if (req.timeoutSeconds !== undefined) args.push('--timeout', String(Math.floor(req.timeoutSeconds)));

  return appCommand('sync', req.application, conn, args);
}

export function buildStatusCommand(conn: ConnectionConfig, req: StatusRequest): Result<string, ConfigurationError> {
  return appCommand('get', req.application, conn, req.refresh ? ['--refresh'] : []);
}

/**
 * Full sequence submitted to the runner: install → stage cert → domain command.
 */
export function buildCommandLine(conn: ConnectionConfig, domainCommands: string[]): string[] {
  return [
    ...buildInstallCommands(conn.argoCDVersion),
    ...buildCertCommands(conn),
    ...domainCommands,
  ];
}

export function buildEnvironment(conn: ConnectionConfig, extra: Readonly<Record<string, string>>): Record<string, string> {
  const env: Record<string, string> = {...extra};
  if (conn.serverCert !== undefined) env[SERVER_CERT_ENV] = conn.serverCert;
  return env;
}
