// src/utils/errors.ts: typed engine errors; each carries the HTTP status it maps to

export abstract class EngineError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class QueryValidationError extends EngineError {
  readonly status = 400;
  readonly code = 'invalid_query';

  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
  }
}

export class ProjectNotFoundError extends EngineError {
  readonly status = 404;
  readonly code = 'project_not_found';

  constructor(public readonly projectId: string) {
    super(`Project ${projectId} not found`);
  }
}

export class CapabilityDeniedError extends EngineError {
  readonly status = 403;
  readonly code = 'capability_denied';
}

export class RateLimitExceededError extends EngineError {
  readonly status = 429;
  readonly code = 'rate_limited';

  constructor(
    public readonly limit: number,
    public readonly retryAfterSeconds: number,
  ) {
    super(`Rate limit exceeded: ${limit} requests per window`);
  }
}

/** Similarity-search collaborator failed; the query fails rather than re-scoring on the fly. */
export class RetrievalError extends EngineError {
  readonly status = 502;
  readonly code = 'retrieval_failed';
}

export class ModelUnavailableError extends EngineError {
  readonly status = 503;
  readonly code = 'model_unavailable';
}

export class InferenceQueueFullError extends EngineError {
  readonly status = 503;
  readonly code = 'inference_queue_full';

  constructor(limit: number) {
    super(`Inference queue is full (${limit} pending batches)`);
  }
}

export class DimensionMismatchError extends EngineError {
  readonly status = 500;
  readonly code = 'dimension_mismatch';

  constructor(expected: number, actual: number) {
    super(`Vector dimensionality mismatch: expected ${expected}, got ${actual}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
