/**
 * Failures surfaced to the caller of a task.
 * Parse problems are not here: they degrade the output instead (see ParseWarning).
 */
export type ConfigurationError = {
  type: 'configuration';
  message: string;
  field?: string;
};

export type SubprocessError = {
  type: 'subprocess';
  message: string;
  exitCode?: number;
  rawOutput: string;
  stderr: string;
};

export type TaskError = ConfigurationError | SubprocessError;

export function configurationError(message: string, field?: string): ConfigurationError {
  return field ? {type: 'configuration', message, field} : {type: 'configuration', message};
}

export function missingField(field: string): ConfigurationError {
  return configurationError(`Missing required property '${field}'`, field);
}

export function subprocessError(
  message: string,
  details: {exitCode?: number; rawOutput?: string; stderr?: string} = {},
): SubprocessError {
  return {
    type: 'subprocess',
    message,
    exitCode: details.exitCode,
    rawOutput: details.rawOutput ?? '',
    stderr: details.stderr ?? '',
  };
}

export function isConfigurationError(error: TaskError): error is ConfigurationError {
  return error.type === 'configuration';
}

export function getDisplayMessage(error: TaskError): string {
  switch (error.type) {
    case 'configuration':
      return `Configuration error: ${error.message}`;
    case 'subprocess': {
      const code = error.exitCode === undefined ? '' : ` (exit code ${error.exitCode})`;
      const detail = error.stderr.trim().split('\n').filter(Boolean).pop();
      return detail ? `${error.message}${code}: ${detail}` : `${error.message}${code}`;
    }
  }
}

/**
 * Process exit code the CLI should use for a failed task
 */
export function exitCodeFor(error: TaskError): number {
  if (error.type === 'configuration') return 2;
  return error.exitCode && error.exitCode > 0 ? error.exitCode : 1;
}
