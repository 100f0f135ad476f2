/**
 * Error types for the sync pipeline
 *
 * Only fatal conditions are thrown past the engine. Per-record problems
 * travel as RecordFailure data (see types.ts).
 */

/**
 * A precondition for the whole pass is missing: credentials, configuration,
 * the mirror item set or the workspace schema.
 */
export class FatalPreconditionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalPreconditionError';
  }
}

export class ConfigError extends FatalPreconditionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * A call to a remote system failed, either with a non-2xx response or at the
 * network level (status is undefined then).
 */
export class RemoteOperationError extends Error {
  readonly status?: number;
  readonly responseText?: string;
  readonly operation: string;

  constructor(details: { operation: string; message: string; status?: number; responseText?: string; cause?: unknown }) {
    super(details.message, { cause: details.cause });
    this.name = 'RemoteOperationError';
    this.operation = details.operation;
    this.status = details.status;
    this.responseText = details.responseText;
  }

  /**
   * Network errors, timeouts, 429 and 5xx responses
   */
  get isTransient(): boolean {
    return this.status === undefined || this.status === 429 || this.status >= 500;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof RemoteOperationError && error.responseText) {
    return `${error.message}: ${error.responseText}`;
  }
  return error instanceof Error ? error.message : String(error);
}
