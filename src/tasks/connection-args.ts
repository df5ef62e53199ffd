import {err, ok, type Result} from 'neverthrow';
import {stripScheme} from '../config/paths';
import {missingField, type ConfigurationError} from '../services/task-errors';
import type {ConnectionConfig} from '../types/task';
import {isEmpty} from '../utils/validators';

// Where the certificate staging step writes the PEM inside the sandbox
export const SERVER_CERT_PATH = '/tmp/argocd-server.crt';

/**
 * Connection flags shared by every `argocd app` command, in the order the
 * CLI invocation is always rendered with.
 */
export function buildConnectionArgs(conn: ConnectionConfig): Result<string[], ConfigurationError> {
  const server = stripScheme(conn.server.trim());
  if (isEmpty(server)) return err(missingField('server'));
  if (isEmpty(conn.token)) return err(missingField('token'));

  const args = ['--server', server, '--auth-token', conn.token];
  if (conn.insecure) args.push('--insecure');
  if (conn.plaintext) args.push('--plaintext');
  if (conn.grpcWeb) args.push('--grpc-web');
  if (conn.serverCert !== undefined) args.push('--server-crt', SERVER_CERT_PATH);

  return ok(args);
}
