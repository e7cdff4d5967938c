/**
 * A record that cannot be analyzed (missing body, bad counts, unparseable
 * timestamp). Callers skip the record and carry on with the batch.
 */
export class InputError extends Error {
  readonly recordId: string | undefined;

  constructor(message: string, recordId?: string) {
    super(message);
    this.name = 'InputError';
    this.recordId = recordId;
  }
}

/**
 * Invalid settings or environment. Raised at startup, before any analysis runs.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
