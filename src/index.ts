export {buildConnectionArgs, SERVER_CERT_PATH} from './tasks/connection-args';
export {
  ARGOCD_BINARY,
  buildCertCommands,
  buildCommandLine,
  buildEnvironment,
  buildInstallCommands,
  buildStatusCommand,
  buildSyncCommand,
  SERVER_CERT_ENV,
} from './tasks/command-builder';
export {
  ALL_OUTCOME_FIELDS,
  extractJson,
  extractOutcome,
  parseOutcome,
  STATUS_OUTCOME_FIELDS,
  SYNC_OUTCOME_FIELDS,
} from './tasks/result-extractor';
export {createOutputCollector, executeCommands, type Execution, type TaskContext} from './tasks/execute';
export {runSync, type SyncTask} from './tasks/sync';
export {runStatus, type StatusTask} from './tasks/status';
export {
  createRunner,
  DockerRunner,
  ShellRunner,
  type LineConsumer,
  type ProcessRunner,
  type RunSpec,
} from './runner';
export {
  loadTaskFile,
  mergeConfig,
  resolveConnection,
  resolveLoggerConfig,
  resolveRunnerConfig,
  resolveStatusRequest,
  resolveSyncRequest,
  type RawTaskConfig,
} from './config/task-config';
export {initializeLogger, log, type LogLevel} from './services/logger';
export * from './services/task-errors';
export type * from './types/task';
export type * from './types/argo';
