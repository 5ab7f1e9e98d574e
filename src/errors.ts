/** A finalize step ran without the scratch fields earlier steps should have filled. */
export class SessionStateLostError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Session scratch is missing: ${missing.join(', ')}`);
    this.name = 'SessionStateLostError';
    this.missing = missing;
  }
}

/** A storage backend call failed. */
export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(`Failed to ${operation}: ${message}`);
    this.name = 'StoreError';
    this.operation = operation;
  }
}
