import {err, ok, type Result} from 'neverthrow';
import type {RawTaskConfig} from '../config/task-config';
import {configurationError, type ConfigurationError} from '../services/task-errors';

export type CliCommand = 'sync' | 'status';
export type OutputFormat = 'json' | 'text';

export type CliArgs = {
  command?: CliCommand;
  help: boolean;
  version: boolean;
  configFile?: string;
  serverCertFile?: string;
  format: OutputFormat;
  // Task properties given on the command line; they override the task file
  overrides: RawTaskConfig;
};

// --flag <value> → task property
const VALUE_FLAGS: Record<string, string> = {
  '--server': 'server',
  '--token': 'token',
  '--auth-token': 'token',
  '--application': 'application',
  '--app': 'application',
  '--server-cert': 'serverCert',
  '--argocd-version': 'argoCDVersion',
  '--revision': 'revision',
  '--timeout': 'timeout',
  '--runner': 'runner',
  '--image': 'containerImage',
  '--execution-timeout': 'executionTimeout',
  '--log-file': 'logFile',
  '--log-level': 'logLevel',
};

// --flag / --no-flag → boolean task property
const BOOLEAN_FLAGS: Record<string, string> = {
  '--insecure': 'insecure',
  '--plaintext': 'plaintext',
  '--grpc-web': 'grpcWeb',
  '--prune': 'prune',
  '--dry-run': 'dryRun',
  '--force': 'force',
  '--refresh': 'refresh',
};

const OTHER_VALUE_FLAGS = ['--config', '--server-cert-file', '--format', '--env'];

function toCommand(name: string): CliCommand | undefined {
  switch (name) {
    case 'sync':
      return 'sync';
    case 'status':
    case 'get':
      return 'status';
    default:
      return undefined;
  }
}

export const USAGE = `Usage: argocd-tasks <sync|status> [application] [options]

Connection:
  --server <host>             ArgoCD API server (env ARGOCD_SERVER)
  --token <token>             auth token (env ARGOCD_AUTH_TOKEN)
  --[no-]insecure             skip TLS verification (default: on)
  --[no-]plaintext            use HTTP instead of HTTPS
  --[no-]grpc-web             use the gRPC-web transport
  --server-cert <pem>         server certificate (PEM text)
  --server-cert-file <path>   server certificate read from a file
  --argocd-version <ver>      CLI version to install (default: latest)

Sync:
  --revision <rev>            git revision to sync to
  --prune | --dry-run | --force
  --timeout <duration>        e.g. 300, 5m, PT5M

Status:
  --refresh                   refresh from the cluster before reading

Execution:
  --config <file>             YAML task definition
  --runner <docker|process>   where commands run (default: docker)
  --image <image>             container image (default: curlimages/curl:latest)
  --env KEY=VALUE             extra environment variable (repeatable)
  --execution-timeout <dur>   kill the run after this long
  --format <json|text>        result format (default: json)
  --log-level <level>         debug, info, warn or error
  --log-file <path>           write logs to a file instead of stderr
  -h, --help | -v, --version`;

function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

export function parseCliArgs(argv: string[]): Result<CliArgs, ConfigurationError> {
  const parsed: CliArgs = {help: false, version: false, format: 'json', overrides: {}};
  const env: Record<string, string> = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }
    if (arg === '-h' || arg === '--help') { parsed.help = true; continue; }
    if (arg === '-v' || arg === '--version') { parsed.version = true; continue; }

    const [flag, inline] = splitFlag(arg);
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      // taken verbatim: a PEM value starts with dashes
      const next = argv[i + 1];
      if (next === undefined) return undefined;
      i++;
      return next;
    };

    if (flag in BOOLEAN_FLAGS || (flag.startsWith('--no-') && `--${flag.slice(5)}` in BOOLEAN_FLAGS)) {
      const negated = !(flag in BOOLEAN_FLAGS);
      const key = BOOLEAN_FLAGS[negated ? `--${flag.slice(5)}` : flag];
      parsed.overrides[key] = inline === undefined ? !negated : inline;
      continue;
    }

    if (!(flag in VALUE_FLAGS) && !OTHER_VALUE_FLAGS.includes(flag)) {
      return err(configurationError(`Unknown option ${flag}`));
    }

    const value = takeValue();
    if (value === undefined) return err(configurationError(`Option ${flag} requires a value`));

    if (flag in VALUE_FLAGS) {
      parsed.overrides[VALUE_FLAGS[flag]] = value;
    } else if (flag === '--config') {
      parsed.configFile = value;
    } else if (flag === '--server-cert-file') {
      parsed.serverCertFile = value;
    } else if (flag === '--format') {
      if (value !== 'json' && value !== 'text') {
        return err(configurationError(`Option --format must be json or text, got '${value}'`));
      }
      parsed.format = value;
    } else if (flag === '--env') {
      const eq = value.indexOf('=');
      if (eq <= 0) return err(configurationError(`Option --env expects KEY=VALUE, got '${value}'`));
      env[value.slice(0, eq)] = value.slice(eq + 1);
    }
  }

  if (Object.keys(env).length > 0) parsed.overrides.env = env;

  const [commandName, application, ...rest] = positionals;
  if (rest.length > 0) return err(configurationError(`Unexpected argument '${rest[0]}'`));
  if (commandName !== undefined) {
    const command = toCommand(commandName);
    if (!command) return err(configurationError(`Unknown command '${commandName}'`));
    parsed.command = command;
  }
  if (application !== undefined) parsed.overrides.application = application;

  return ok(parsed);
}
