/**
 * Search Pipeline Errors
 */

/**
 * Base class for all search pipeline errors
 */
export abstract class SearchPipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The search engine rejected, failed or timed out on a request.
 * Surfaced to the caller; never retried here.
 */
export class SearchEngineError extends SearchPipelineError {
  constructor(message: string) {
    super(message, 'SEARCH_ENGINE_FAILURE', false);
  }
}

/**
 * A cache backend operation failed. Always recovered at the cache
 * coordinator boundary as a miss or a no-op.
 */
export class CacheBackendError extends SearchPipelineError {
  constructor(operation: string, cause: unknown) {
    super(
      `Cache backend ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'CACHE_BACKEND_FAILURE',
      true,
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
