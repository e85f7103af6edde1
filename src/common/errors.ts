/**
 * Error types raised along the query pipeline
 * Each carries a stable code so callers can branch without instanceof chains
 */
export type PipelineErrorCode =
  | 'LOOKUP_TIMEOUT'
  | 'PUBLISH_FAILED'
  | 'MALFORMED_BATCH'
  | 'STALE_MESSAGE'
  | 'INTEGRITY_VIOLATION'
  | 'BATCH_ABORTED'
  | 'CONNECTION_FAILURE'
  | 'RETRY_DEADLINE';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * No result appeared under the correlation key before the poll deadline
 */
export class LookupTimeoutError extends PipelineError {
  readonly code = 'LOOKUP_TIMEOUT';

  constructor(
    readonly correlationKey: string,
    readonly elapsedMs: number,
    options?: { cause?: unknown },
  ) {
    super(`Unable to find ${correlationKey} in the result store after ${elapsedMs}ms`, options);
  }
}

export class PublishFailedError extends PipelineError {
  readonly code = 'PUBLISH_FAILED';

  constructor(readonly correlationKey: string, options?: { cause?: unknown }) {
    super(`Failed to publish batch ${correlationKey}`, options);
  }
}

export class MalformedBatchError extends PipelineError {
  readonly code = 'MALFORMED_BATCH';
}

/**
 * The producer of this message has already given up waiting for it
 */
export class StaleMessageError extends PipelineError {
  readonly code = 'STALE_MESSAGE';

  constructor(
    readonly correlationKey: string,
    readonly ageSeconds: number,
  ) {
    super(`${correlationKey} is ${Math.floor(ageSeconds)} secs old`);
  }
}

export class IntegrityViolationError extends PipelineError {
  readonly code = 'INTEGRITY_VIOLATION';

  constructor(
    message: string,
    readonly sqlState: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class BatchAbortedError extends PipelineError {
  readonly code = 'BATCH_ABORTED';
}

export class ConnectionFailureError extends PipelineError {
  readonly code = 'CONNECTION_FAILURE';

  constructor(
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to connect to ${target}`, options);
  }
}

export class RetryDeadlineError extends PipelineError {
  readonly code = 'RETRY_DEADLINE';

  constructor(
    readonly attempts: number,
    readonly elapsedMs: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempts in ${elapsedMs}ms`, { cause: lastError });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
