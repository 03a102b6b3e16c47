import type { CandidateMode, ModelCandidate } from '../../models/model-candidate.js';
import { Logger, logger as defaultLogger } from '../../cli/utils/logger.js';
import type { ModelDiscovery } from './ModelDiscovery.js';

/**
 * Where a resolved candidate list came from
 */
export type CandidateSource = 'static' | 'discovery' | 'static-fallback';

export interface ResolvedCandidates {
  candidates: ModelCandidate[];
  source: CandidateSource;
}

export interface CandidateResolverOptions {
  mode: CandidateMode;
  staticCandidates: readonly ModelCandidate[];
  /** Required in discovery mode; null falls back to the static list */
  discovery: ModelDiscovery | null;
  logger?: Logger;
}

/**
 * Produces the ordered candidate list for one query
 *
 * Discovery runs on every call; a failed or empty listing falls back to the
 * static list.
 */
export class CandidateResolver {
  private readonly logger: Logger;

  constructor(private readonly options: CandidateResolverOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  async resolve(signal?: AbortSignal): Promise<ResolvedCandidates> {
    const staticCandidates = [...this.options.staticCandidates];

    if (this.options.mode === 'static' || this.options.discovery === null) {
      return { candidates: staticCandidates, source: 'static' };
    }

    const discovered = await this.options.discovery.discover(signal);
    if (discovered.isErr()) {
      this.logger.warn('Model discovery failed; using static candidate list', {
        code: discovered.error.code,
        error: discovered.error.message,
        fallback_candidates: staticCandidates.length
      });
      return { candidates: staticCandidates, source: 'static-fallback' };
    }

    if (discovered.value.length === 0) {
      this.logger.warn('Model discovery returned no usable models; using static candidate list', {
        fallback_candidates: staticCandidates.length
      });
      return { candidates: staticCandidates, source: 'static-fallback' };
    }

    return { candidates: discovered.value, source: 'discovery' };
  }
}
