import {Result} from 'neverthrow';
import {isRecord} from '../utils/validators';

export const SHELL = '/bin/sh';

export function buildScript(commands: string[]): string {
  return ['set -e', ...commands].join('\n');
}

// Scripts publish outputs by printing `::{"outputs":{...}}::` on stdout
const OUTPUT_VARS_LINE = /^::(\{.*\})::$/;

const decode = Result.fromThrowable((text: string): unknown => JSON.parse(text), () => null);

export function parseOutputVars(line: string): Record<string, unknown> | null {
  const match = OUTPUT_VARS_LINE.exec(line.trim());
  if (!match) return null;
  const decoded = decode(match[1]);
  if (decoded.isErr() || !isRecord(decoded.value)) return null;
  const outputs = decoded.value.outputs;
  return isRecord(outputs) ? outputs : null;
}
