import type {ApplicationCondition, ResourceStatus} from './argo';

// Value records resolved once per task execution

export type ConnectionConfig = Readonly<{
  server: string; // host[:port], scheme stripped
  token: string;
  insecure: boolean;
  plaintext: boolean;
  grpcWeb: boolean;
  serverCert?: string; // PEM, staged to a file before use
  argoCDVersion?: string;
}>;

export type SyncRequest = Readonly<{
  application: string;
  revision?: string;
  prune: boolean;
  dryRun: boolean;
  force: boolean;
  timeoutSeconds?: number;
}>;

export type StatusRequest = Readonly<{
  application: string;
  refresh: boolean;
}>;

export type RunnerKind = 'docker' | 'process';

export type RunnerConfig = Readonly<{
  kind: RunnerKind;
  containerImage: string;
  env: Readonly<Record<string, string>>;
  timeoutMs?: number;
}>;

export type OutcomeField = 'syncStatus' | 'healthStatus' | 'revision' | 'resources' | 'conditions';

export type OutcomeFields = {
  syncStatus?: string;
  healthStatus?: string;
  revision?: string;
  resources?: ResourceStatus[];
  conditions?: ApplicationCondition[];
};

export type ParsedOutcome = OutcomeFields & {
  rawOutput: string;
};

export type ParseWarningReason = 'empty' | 'no-json' | 'decode';

export type ParseWarning = {
  reason: ParseWarningReason;
  message: string;
};

/**
 * Result of scraping CLI output. `warning` is set whenever the structured
 * fields could not be populated; `outcome.rawOutput` is always present.
 */
export type Extraction = {
  outcome: ParsedOutcome;
  warning?: ParseWarning;
};

export type RunnerOutput = {
  exitCode: number;
  stdOutLineCount: number;
  stdErrLineCount: number;
  vars: Record<string, unknown>;
};

export type TaskOutput = RunnerOutput & {
  rawOutput: string;
  parseWarning?: ParseWarning;
};

export type SyncOutput = TaskOutput & {
  syncStatus?: string;
  healthStatus?: string;
  revision?: string;
  resources?: ResourceStatus[];
};

export type StatusOutput = TaskOutput & {
  syncStatus?: string;
  healthStatus?: string;
  resources?: ResourceStatus[];
  conditions?: ApplicationCondition[];
};
