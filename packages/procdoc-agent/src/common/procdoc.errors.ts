/**
 * Base class for known failures. During a run they become a Failed result;
 * before one they map to an exit code. Model service errors are not among them.
 */
export class ProcdocError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Documentation file missing, unreadable, or malformed. */
export class DocumentationLoadError extends ProcdocError {}

/** Graph database unreachable, query timed out, or the driver failed. */
export class GraphUnavailableError extends ProcdocError {}

/** The display layer could not perform an action or take a screenshot. */
export class ExecutionError extends ProcdocError {}

export class UnparseableResponseError extends ProcdocError {
  constructor(readonly detail: string) {
    super('unparseable model response');
  }
}

export class UsageError extends ProcdocError {}

export class CredentialLoadError extends ProcdocError {}

export class TaskLoadError extends ProcdocError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
