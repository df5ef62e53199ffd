import {err, ok, Result} from 'neverthrow';
import type {
  Extraction,
  OutcomeField,
  OutcomeFields,
  ParseWarning,
  ParseWarningReason,
} from '../types/task';
import {isRecord} from '../utils/validators';

export const SYNC_OUTCOME_FIELDS: readonly OutcomeField[] = ['syncStatus', 'healthStatus', 'revision', 'resources'];
export const STATUS_OUTCOME_FIELDS: readonly OutcomeField[] = ['syncStatus', 'healthStatus', 'resources', 'conditions'];
export const ALL_OUTCOME_FIELDS: readonly OutcomeField[] = [
  'syncStatus',
  'healthStatus',
  'revision',
  'resources',
  'conditions',
];

function parseWarning(reason: ParseWarningReason, message: string): ParseWarning {
  return {reason, message};
}

/**
 * Slice from the first `{` to the last `}` so banners and warnings the CLI
 * prints around the payload are dropped. Stray braces in that noise will
 * end up in the slice; the decode step then reports it.
 */
export function extractJson(rawText: string): string | null {
  const start = rawText.indexOf('{');
  const end = rawText.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return null;
  return rawText.slice(start, end + 1);
}

const decodeJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => parseWarning('decode', `Failed to parse ArgoCD output as JSON: ${e instanceof Error ? e.message : String(e)}`),
);

function stringAt(parent: unknown, key: string): string | undefined {
  if (!isRecord(parent)) return undefined;
  const value = parent[key];
  return typeof value === 'string' ? value : undefined;
}

function arrayAt(parent: Record<string, unknown>, key: string): unknown[] | undefined {
  const value: unknown = parent[key];
  return Array.isArray(value) ? value : undefined;
}

/**
 * Decode `argocd app … --output json` and pick the requested fields out of
 * its top-level `status` object. Missing fields are left out.
 */
export function parseOutcome(
  jsonText: string,
  fields: readonly OutcomeField[] = ALL_OUTCOME_FIELDS,
): Result<OutcomeFields, ParseWarning> {
  return decodeJson(jsonText).andThen(decoded => {
    if (!isRecord(decoded)) {
      return err(parseWarning('decode', 'Failed to parse ArgoCD output as JSON: expected an object'));
    }

    const outcome: OutcomeFields = {};
    const status = decoded.status;
    if (!isRecord(status)) return ok(outcome);

    const wanted = new Set(fields);
    const syncStatus = wanted.has('syncStatus') ? stringAt(status.sync, 'status') : undefined;
    const revision = wanted.has('revision') ? stringAt(status.sync, 'revision') : undefined;
    const healthStatus = wanted.has('healthStatus') ? stringAt(status.health, 'status') : undefined;
    const resources = wanted.has('resources') ? arrayAt(status, 'resources') : undefined;
    const conditions = wanted.has('conditions') ? arrayAt(status, 'conditions') : undefined;

    if (syncStatus !== undefined) outcome.syncStatus = syncStatus;
    if (healthStatus !== undefined) outcome.healthStatus = healthStatus;
    if (revision !== undefined) outcome.revision = revision;
    if (resources !== undefined) outcome.resources = resources;
    if (conditions !== undefined) outcome.conditions = conditions;

    return ok(outcome);
  });
}

/**
 * Never fails: when nothing can be decoded the outcome holds only the raw
 * text and a warning says why.
 */
export function extractOutcome(rawText: string, fields: readonly OutcomeField[]): Extraction {
  if (rawText.trim() === '') {
    return {outcome: {rawOutput: rawText}, warning: parseWarning('empty', 'ArgoCD produced no output to parse')};
  }

  const json = extractJson(rawText);
  if (json === null) {
    return {outcome: {rawOutput: rawText}, warning: parseWarning('no-json', 'No JSON object found in ArgoCD output')};
  }

  return parseOutcome(json, fields).match(
    (parsed): Extraction => ({outcome: {...parsed, rawOutput: rawText}}),
    (warning): Extraction => ({outcome: {rawOutput: rawText}, warning}),
  );
}
