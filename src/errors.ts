/**
 * Run-level errors. Per-file extraction failures and resolution ambiguities
 * are recorded as data on the run result and never thrown.
 */

export type CrossdocErrorCode = 'CONFIGURATION' | 'CANCELLED';

export class CrossdocError extends Error {
  readonly code: CrossdocErrorCode;

  constructor(code: CrossdocErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Missing or invalid run configuration: unreadable root, no files, bad
 * parameters, malformed config file. Raised before any analysis starts.
 */
export class ConfigurationError extends CrossdocError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.issues = issues;
  }
}

/**
 * The run was aborted or timed out. Nothing from the run is returned.
 */
export class CancellationError extends CrossdocError {
  constructor(message = 'Analysis cancelled', options?: { cause?: unknown }) {
    super('CANCELLED', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
