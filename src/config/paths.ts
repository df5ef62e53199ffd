import os from 'node:os';
import path from 'node:path';

export function cliConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.ARGOCD_CONFIG ??
    path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'argocd', 'config');
}

// The CLI's --server takes host[:port]; a scheme prefix must not reach it
export function stripScheme(server: string): string {
  if (server.startsWith('https://')) return server.slice('https://'.length);
  if (server.startsWith('http://')) return server.slice('http://'.length);
  return server;
}
