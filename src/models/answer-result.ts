/**
 * Answer Result Model
 *
 * Outcome of one generation attempt and the cascade-level result built from
 * those outcomes.
 */

import type { Result } from '../lib/result-types.js';
import type { CascadeExhaustedError } from '../lib/errors/UpstreamErrors.js';
import type { ModelCandidate } from './model-candidate.js';

/**
 * Outcome of one generation request against one candidate
 */
export type AttemptOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'rate_limited'; status: number; message: string }
  | { kind: 'not_found'; status: number; message: string }
  | { kind: 'malformed_response'; message: string }
  | { kind: 'http_error'; status: number; message: string }
  | { kind: 'transport_error'; message: string };

export type FailedOutcome = Exclude<AttemptOutcome, { kind: 'success' }>;

/**
 * Final outcome recorded for a candidate that did not produce an answer
 */
export interface CandidateDiagnostic {
  /** `id@apiVersion` */
  candidate: string;
  outcome: FailedOutcome['kind'];
  attempts: number;
  status?: number;
  message: string;
}

/**
 * A successful answer
 */
export interface Answer {
  text: string;
  candidate: ModelCandidate;
  /** Candidates that failed before this one succeeded */
  diagnostics: CandidateDiagnostic[];
}

export type AnswerResult = Result<Answer, CascadeExhaustedError>;
