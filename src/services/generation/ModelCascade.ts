/**
 * Model Cascade
 *
 * Tries an ordered list of model candidates until one answers. A rate-limited
 * candidate is retried after a fixed backoff; every other failure moves on to
 * the next candidate. When the list runs out the caller gets one diagnostic
 * entry per failed candidate.
 */

import { retryWhile, sleep as defaultSleep, type SleepFn } from '../../lib/retry-utils.js';
import { ok, err } from '../../lib/result-types.js';
import { CascadeExhaustedError, errorMessage } from '../../lib/errors/UpstreamErrors.js';
import type {
  AnswerResult,
  AttemptOutcome,
  CandidateDiagnostic,
  FailedOutcome
} from '../../models/answer-result.js';
import { candidateLabel, type ModelCandidate } from '../../models/model-candidate.js';
import { Logger, logger as defaultLogger } from '../../cli/utils/logger.js';
import type { GenerationClient } from './GenerationClient.js';

/**
 * What the cascade does after an attempt
 */
export type CascadeDecision = 'succeed' | 'retry' | 'advance';

export function decide(outcome: AttemptOutcome): CascadeDecision {
  switch (outcome.kind) {
    case 'success':
      return 'succeed';
    case 'rate_limited':
      return 'retry';
    case 'not_found':
    case 'malformed_response':
    case 'http_error':
    case 'transport_error':
      return 'advance';
  }
}

export function toDiagnostic(
  candidate: ModelCandidate,
  outcome: FailedOutcome,
  attempts: number
): CandidateDiagnostic {
  return {
    candidate: candidateLabel(candidate),
    outcome: outcome.kind,
    attempts,
    ...('status' in outcome ? { status: outcome.status } : {}),
    message: outcome.message
  };
}

export interface ModelCascadeOptions {
  client: GenerationClient;
  /** Fixed wait before retrying a rate-limited candidate */
  backoffMs: number;
  sleep?: SleepFn;
  logger?: Logger;
}

export class ModelCascade {
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor(private readonly options: ModelCascadeOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Generate an answer from the first candidate that succeeds
   *
   * @param maxAttemptsPerCandidate - Total tries per candidate while rate-limited
   */
  async generate(
    prompt: string,
    candidates: readonly ModelCandidate[],
    maxAttemptsPerCandidate: number,
    signal?: AbortSignal
  ): Promise<AnswerResult> {
    const diagnostics: CandidateDiagnostic[] = [];

    for (const candidate of candidates) {
      const label = candidateLabel(candidate);
      const { value: outcome, attempts } = await retryWhile(
        (attempt) => this.attempt(candidate, prompt, attempt, signal),
        (value) => decide(value) === 'retry' && !signal?.aborted,
        { maxAttempts: maxAttemptsPerCandidate, backoffMs: this.options.backoffMs },
        {
          sleep: this.sleep,
          onRetry: (_value, attempt, delayMs) =>
            this.logger.info('Candidate rate-limited; backing off', {
              candidate: label,
              attempt,
              delay_ms: delayMs
            })
        }
      );

      if (outcome.kind === 'success') {
        this.logger.info('Candidate answered', {
          candidate: label,
          attempts,
          failed_before: diagnostics.length
        });
        return ok({ text: outcome.text, candidate, diagnostics });
      }

      const diagnostic = toDiagnostic(candidate, outcome, attempts);
      diagnostics.push(diagnostic);
      this.logger.warn('Candidate failed; advancing', { ...diagnostic });

      if (signal?.aborted) {
        this.logger.info('Generation cancelled by caller', { remaining: candidates.length - diagnostics.length });
        break;
      }
    }

    return err(new CascadeExhaustedError(diagnostics));
  }

  private async attempt(
    candidate: ModelCandidate,
    prompt: string,
    attempt: number,
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    this.logger.debug('Generation attempt', { candidate: candidateLabel(candidate), attempt });
    try {
      return await this.options.client.generate(candidate, prompt, signal);
    } catch (error) {
      return { kind: 'transport_error', message: errorMessage(error) };
    }
  }
}
