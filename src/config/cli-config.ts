import fs from 'node:fs/promises';
import YAML from 'yaml';
import {isRecord} from '../utils/validators';
import {cliConfigPath} from './paths';

// Subset of the argocd CLI's own config file (~/.config/argocd/config)
export type ArgoContext = {name: string; server: string; user: string};
export type ArgoServer  = {server: string; ['grpc-web']?: boolean; insecure?: boolean; ['plain-text']?: boolean};
export type ArgoUser    = {name: string; ['auth-token']?: string};
export type ArgoCLIConfig = {
  contexts?: ArgoContext[];
  servers?: ArgoServer[];
  users?: ArgoUser[];
  ['current-context']?: string;
};

export async function readCLIConfig(file: string = cliConfigPath()): Promise<ArgoCLIConfig | null> {
  try {
    const txt = await fs.readFile(file, 'utf8');
    return toCLIConfig(YAML.parse(txt));
  } catch {
    // absent or unreadable: fall back to explicit settings only
    return null;
  }
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

// Keeps only the well-formed entries we know how to use
export function toCLIConfig(parsed: unknown): ArgoCLIConfig | null {
  if (!isRecord(parsed)) return null;
  return {
    contexts: records(parsed.contexts).flatMap(c => {
      const name = str(c.name), server = str(c.server), user = str(c.user);
      return name !== undefined && server !== undefined && user !== undefined ? [{name, server, user}] : [];
    }),
    servers: records(parsed.servers).flatMap(s => {
      const server = str(s.server);
      if (server === undefined) return [];
      return [{
        server,
        insecure: bool(s.insecure),
        ['grpc-web']: bool(s['grpc-web']),
        ['plain-text']: bool(s['plain-text']),
      }];
    }),
    users: records(parsed.users).flatMap(u => {
      const name = str(u.name);
      return name === undefined ? [] : [{name, ['auth-token']: str(u['auth-token'])}];
    }),
    ['current-context']: str(parsed['current-context']),
  };
}

function currentContext(cfg: ArgoCLIConfig): ArgoContext | undefined {
  const name = cfg['current-context'];
  return (cfg.contexts ?? []).find(c => c.name === (name ?? ''));
}

export function getCurrentServer(cfg: ArgoCLIConfig | null): string | null {
  if (!cfg) return null;
  return currentContext(cfg)?.server ?? null;
}

export function getCurrentServerConfig(cfg: ArgoCLIConfig | null): ArgoServer | null {
  if (!cfg) return null;
  const serverUrl = getCurrentServer(cfg);
  if (!serverUrl) return null;
  return (cfg.servers ?? []).find(s => s.server === serverUrl) ?? null;
}

export function getCurrentToken(cfg: ArgoCLIConfig | null): string | null {
  if (!cfg) return null;
  const userName = currentContext(cfg)?.user;
  const user = (cfg.users ?? []).find(u => u.name === (userName ?? ''));
  return user?.['auth-token'] ?? null;
}
