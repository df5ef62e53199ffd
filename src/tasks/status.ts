import {errAsync, type ResultAsync} from 'neverthrow';
import {log} from '../services/logger';
import type {TaskError} from '../services/task-errors';
import type {ConnectionConfig, StatusOutput, StatusRequest} from '../types/task';
import {buildStatusCommand} from './command-builder';
import {executeCommands, type TaskContext} from './execute';
import {extractOutcome, STATUS_OUTCOME_FIELDS} from './result-extractor';

export type StatusTask = {
  connection: ConnectionConfig;
  request: StatusRequest;
};

export function runStatus(task: StatusTask, ctx: TaskContext): ResultAsync<StatusOutput, TaskError> {
  const command = buildStatusCommand(task.connection, task.request);
  if (command.isErr()) return errAsync(command.error);

  return executeCommands(ctx, task.connection, [command.value]).map(({output, rawOutput}) => {
    const {outcome, warning} = extractOutcome(rawOutput, STATUS_OUTCOME_FIELDS);
    if (warning) log.warn(warning.message, 'extract', {reason: warning.reason});

    log.info(
      `ArgoCD status retrieved - Sync: ${outcome.syncStatus ?? 'n/a'}, Health: ${outcome.healthStatus ?? 'n/a'}`,
      'status',
      {application: task.request.application, conditions: outcome.conditions?.length ?? 0},
    );

    const result: StatusOutput = {...output, ...outcome};
    if (warning) result.parseWarning = warning;
    return result;
  });
}
