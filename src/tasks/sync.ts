import {errAsync, type ResultAsync} from 'neverthrow';
import {log} from '../services/logger';
import type {TaskError} from '../services/task-errors';
import type {ConnectionConfig, SyncOutput, SyncRequest} from '../types/task';
import {buildSyncCommand} from './command-builder';
import {executeCommands, type TaskContext} from './execute';
import {extractOutcome, SYNC_OUTCOME_FIELDS} from './result-extractor';

export type SyncTask = {
  connection: ConnectionConfig;
  request: SyncRequest;
};

/**
 * `argocd app sync`: one attempt, no retries.
 */
export function runSync(task: SyncTask, ctx: TaskContext): ResultAsync<SyncOutput, TaskError> {
  const command = buildSyncCommand(task.connection, task.request);
  if (command.isErr()) return errAsync(command.error);

  return executeCommands(ctx, task.connection, [command.value]).map(({output, rawOutput}) => {
    const {outcome, warning} = extractOutcome(rawOutput, SYNC_OUTCOME_FIELDS);
    if (warning) log.warn(warning.message, 'extract', {reason: warning.reason});

    log.info(
      `ArgoCD sync completed - Status: ${outcome.syncStatus ?? 'n/a'}, Health: ${outcome.healthStatus ?? 'n/a'}`,
      'sync',
      {application: task.request.application, revision: outcome.revision},
    );

    const result: SyncOutput = {...output, ...outcome};
    if (warning) result.parseWarning = warning;
    return result;
  });
}
