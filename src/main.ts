#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import {parseCliArgs, USAGE} from './cli/args';
import {executeCli, loadRawConfig} from './cli/run';
import {resolveLoggerConfig} from './config/task-config';
import {initializeLogger, log} from './services/logger';
import {exitCodeFor, getDisplayMessage, type TaskError} from './services/task-errors';
import {formatSummary} from './utils/formatters';
import {isRecord} from './utils/validators';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
    return isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

function fail(error: TaskError): number {
  console.error(`❌ ${getDisplayMessage(error)}`);
  if (error.type === 'subprocess' && error.rawOutput) console.error(error.rawOutput);
  return exitCodeFor(error);
}

async function main(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.isErr()) {
    console.error(`❌ ${getDisplayMessage(parsed.error)}\n\n${USAGE}`);
    return 2;
  }

  const cli = parsed.value;
  if (cli.version) {
    console.log(readVersion());
    return 0;
  }
  if (cli.help || !cli.command) {
    console.log(USAGE);
    return cli.help ? 0 : 2;
  }
  const command = cli.command;

  const raw = await loadRawConfig(cli);
  if (raw.isErr()) return fail(raw.error);

  const loggerConfig = resolveLoggerConfig(raw.value);
  if (loggerConfig.isErr()) return fail(loggerConfig.error);

  const loggerResult = await initializeLogger(loggerConfig.value);
  if (loggerResult.isErr()) {
    console.error(`❌ Failed to initialize logger: ${loggerResult.error.message}`);
    return 1;
  }
  const logger = loggerResult.value;

  log.debug('argocd-tasks started', 'main', {command, version: readVersion()});

  const result = await executeCli(command, raw.value);

  const code = result.match(
    ({application, output}) => {
      console.log(cli.format === 'text' ? formatSummary(application, output) : JSON.stringify(output, null, 2));
      return 0;
    },
    (error) => {
      log.error(getDisplayMessage(error), 'main', {type: error.type});
      return fail(error);
    },
  );

  const closed = await logger.close();
  if (closed.isErr()) console.error(`Failed to flush logs: ${closed.error.message}`);
  return code;
}

main(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
