/**
 * Fatal errors surfaced by an analysis run.
 * Per-file problems are never raised; see `SkippedFile`.
 */

/** The caller broke the request contract (both or neither source, bad fields). */
export class InvalidRequestError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

/** A remote source could not be fetched. Not retried. */
export class AcquisitionError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AcquisitionError';
  }
}
