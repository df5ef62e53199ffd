import readline from 'node:readline';
import type {Readable} from 'node:stream';
import execa from 'execa';
import {err, ok, ResultAsync, type Result} from 'neverthrow';
import {subprocessError, type SubprocessError} from '../services/task-errors';
import type {RunnerOutput} from '../types/task';
import {parseOutputVars} from './script';
import type {LineConsumer} from './types';

// SIGKILL follows SIGTERM after this long
const KILL_GRACE_MS = 2000;

export type StreamOptions = {
  env: Record<string, string>;
  timeoutMs?: number;
  // Awaited after a timeout, before the error is returned
  onTimeout?: () => Promise<void>;
};

// Resolves on `close` as well as `end`: a pipe torn down by a failed spawn never ends
function forEachLine(stream: Readable, onLine: (line: string) => void): Promise<void> {
  return new Promise(resolve => {
    const rl = readline.createInterface({input: stream, crlfDelay: Infinity});
    rl.on('line', onLine);
    rl.once('close', () => resolve());
    stream.once('close', () => rl.close());
    stream.once('error', () => rl.close());
  });
}

function startFailure(file: string, result: object): string {
  if ('shortMessage' in result && typeof result.shortMessage === 'string') {
    return `${file} could not be started: ${result.shortMessage}`;
  }
  return `${file} could not be started`;
}

async function spawnAndCollect(
  file: string,
  args: string[],
  options: StreamOptions,
  consumer: LineConsumer,
): Promise<Result<RunnerOutput, SubprocessError>> {
  const vars: Record<string, unknown> = {};
  let stdOutLineCount = 0;
  let stdErrLineCount = 0;

  const child = execa(file, args, {
    env: options.env,
    extendEnv: true,
    reject: false,
    buffer: false,
    stdin: 'ignore',
  });

  const readers: Promise<void>[] = [];
  if (child.stdout) {
    readers.push(forEachLine(child.stdout, line => {
      stdOutLineCount++;
      const outputs = parseOutputVars(line);
      if (outputs) Object.assign(vars, outputs);
      else consumer(line, false);
    }));
  }
  if (child.stderr) {
    readers.push(forEachLine(child.stderr, line => {
      stdErrLineCount++;
      consumer(line, true);
    }));
  }

  let deadlinePassed = false;
  const timer = options.timeoutMs === undefined ? undefined : setTimeout(() => {
    deadlinePassed = true;
    child.kill('SIGTERM', {forceKillAfterTimeout: KILL_GRACE_MS});
  }, options.timeoutMs);

  const result = await child;
  clearTimeout(timer);

  // Grandchildren may still hold the pipes open; stop reading once ours is gone
  const stopReading = async (): Promise<void> => {
    child.stdout?.destroy();
    child.stderr?.destroy();
    await Promise.all(readers);
  };

  if (deadlinePassed || result.timedOut || result.isCanceled) {
    await stopReading();
    if (options.onTimeout) await options.onTimeout();
    return err(subprocessError(`${file} timed out after ${options.timeoutMs}ms`));
  }
  if (typeof result.exitCode !== 'number') {
    await stopReading();
    return err(subprocessError(
      result.signal ? `${file} was terminated by ${result.signal}` : startFailure(file, result),
    ));
  }

  await Promise.all(readers);
  return ok({exitCode: result.exitCode, stdOutLineCount, stdErrLineCount, vars});
}

/**
 * Runs a process, feeding its output line by line to `consumer`.
 */
export function runStreaming(
  file: string,
  args: string[],
  options: StreamOptions,
  consumer: LineConsumer,
): ResultAsync<RunnerOutput, SubprocessError> {
  return ResultAsync.fromPromise(
    spawnAndCollect(file, args, options, consumer),
    (e) => subprocessError(`Failed to run ${file}: ${e instanceof Error ? e.message : String(e)}`),
  ).andThen(result => result);
}
