import type { CandidateDiagnostic } from '../../models/answer-result.js';

/**
 * Remote collaborators the pipeline talks to
 */
export type UpstreamService = 'embedding' | 'vector-store' | 'discovery' | 'generation';

/**
 * Base error class for failures reported by a remote service
 */
export abstract class UpstreamError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp: Date = new Date();

  constructor(message: string, public readonly service: UpstreamService, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    // Ensure prototype chain is correct for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Connection refused, DNS failure, reset socket, caller abort
 */
export class UpstreamNetworkError extends UpstreamError {
  readonly code = 'UPSTREAM_NETWORK_ERROR';
  readonly retryable = true;
}

/**
 * Request exceeded its deadline
 */
export class UpstreamTimeoutError extends UpstreamError {
  readonly code = 'UPSTREAM_TIMEOUT';
  readonly retryable = true;

  constructor(service: UpstreamService, public readonly timeoutMs: number) {
    super(`${service} request timed out after ${timeoutMs}ms`, service);
  }
}

/**
 * Non-2xx response
 */
export class UpstreamHttpError extends UpstreamError {
  readonly code = 'UPSTREAM_HTTP_ERROR';
  readonly retryable: boolean;

  constructor(
    message: string,
    service: UpstreamService,
    public readonly status: number,
    public readonly body?: string
  ) {
    super(message, service);
    this.retryable = status === 429;
  }
}

/**
 * 2xx response whose body does not have the expected shape
 */
export class UpstreamResponseError extends UpstreamError {
  readonly code = 'UPSTREAM_MALFORMED_RESPONSE';
  readonly retryable = false;
}

/**
 * Every model candidate failed; carries one diagnostic entry per candidate
 */
export class CascadeExhaustedError extends Error {
  readonly code = 'CASCADE_EXHAUSTED';

  constructor(public readonly diagnostics: CandidateDiagnostic[]) {
    super(
      diagnostics.length === 0
        ? 'No model candidates available'
        : `All ${diagnostics.length} model candidates failed: ` +
            diagnostics.map((d) => `${d.candidate}=${d.outcome}`).join(', ')
    );
    this.name = 'CascadeExhaustedError';
    Object.setPrototypeOf(this, CascadeExhaustedError.prototype);
  }
}

/**
 * Message of a thrown value, for logs and diagnostics
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
