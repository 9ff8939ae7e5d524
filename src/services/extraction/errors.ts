/**
 * Extraction errors
 *
 * @module services/extraction/errors
 */

/** ABORTED: the caller cancelled and the worker was killed */
export type ExtractionErrorKind = 'TIMEOUT' | 'WORKER_FAILURE' | 'ABORTED';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorKind,
    /** Tail of the worker's stderr, or the worker-reported error */
    public readonly detail: string = ''
  ) {
    super(message);
    this.name = 'ExtractionError';
    Error.captureStackTrace?.(this, ExtractionError);
  }

  get kind(): ExtractionErrorKind {
    return this.code;
  }
}
