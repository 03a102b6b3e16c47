/**
 * Query Orchestrator
 *
 * Runs one question through the pipeline: embed, retrieve, assemble, resolve
 * candidates, generate. Every outcome (including internal faults) is turned
 * into a response string; nothing is thrown to the caller.
 */

import { RESPONSE_MESSAGES } from '../constants/pipeline-constants.js';
import type { CandidateDiagnostic } from '../models/answer-result.js';
import type { ChatResponse } from '../models/api-types.js';
import { candidateLabel } from '../models/model-candidate.js';
import type { RetrievedPassage } from '../models/passage.js';
import { tryAsync } from '../lib/result-types.js';
import { Logger, logger as defaultLogger } from '../cli/utils/logger.js';
import type { Embedder } from './embedding/GeminiEmbedder.js';
import type { VectorRetriever } from './retrieval/VectorRetriever.js';
import type { ContextAssembler } from './prompt/ContextAssembler.js';
import type { CandidateResolver, CandidateSource } from './generation/CandidateResolver.js';
import type { ModelCascade } from './generation/ModelCascade.js';

/**
 * Outcome of a query with the intermediate data exposed
 */
export interface DetailedAnswer extends ChatResponse {
  /** `id@apiVersion` of the answering candidate */
  model?: string;
  candidateSource?: CandidateSource;
  passages: RetrievedPassage[];
  diagnostics: CandidateDiagnostic[];
}

export interface QueryOrchestratorDeps {
  /** Absent key short-circuits every query */
  apiKey?: string;
  embedder: Embedder;
  retriever: VectorRetriever;
  assembler: ContextAssembler;
  resolver: CandidateResolver;
  cascade: ModelCascade;
  maxAttemptsPerCandidate: number;
  logger?: Logger;
}

export class QueryOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: QueryOrchestratorDeps) {
    this.logger = deps.logger ?? defaultLogger;
  }

  async answer(query: string, signal?: AbortSignal): Promise<ChatResponse> {
    const { response } = await this.answerDetailed(query, signal);
    return { response };
  }

  async answerDetailed(query: string, signal?: AbortSignal): Promise<DetailedAnswer> {
    if (!this.deps.apiKey) {
      this.logger.error('Query rejected: AI_API_KEY is not configured');
      return { response: RESPONSE_MESSAGES.MISSING_CREDENTIALS, passages: [], diagnostics: [] };
    }

    const startTime = Date.now();
    const outcome = await tryAsync(
      () => this.run(query.trim(), startTime, signal),
      (error) => error
    );

    return outcome.match(
      (detailed) => detailed,
      (error) => {
        this.logger.error('Query failed unexpectedly', error, { duration_ms: Date.now() - startTime });
        return { response: RESPONSE_MESSAGES.UNEXPECTED_ERROR, passages: [], diagnostics: [] };
      }
    );
  }

  private async run(query: string, startTime: number, signal?: AbortSignal): Promise<DetailedAnswer> {
    const { embedder, retriever, assembler, resolver, cascade } = this.deps;

    // Empty question: no embedding, empty context, generation still runs
    const vector = query ? await embedder.embed(query, signal) : null;
    const passages = await retriever.retrieve(vector, undefined, signal);
    const prompt = assembler.assemble(passages, query);
    const { candidates, source } = await resolver.resolve(signal);

    this.logger.debug('Prompt assembled', {
      passages: passages.length,
      prompt_chars: prompt.length,
      candidates: candidates.map(candidateLabel),
      candidate_source: source
    });

    const result = await cascade.generate(prompt, candidates, this.deps.maxAttemptsPerCandidate, signal);

    if (result.isErr()) {
      const error = result.error;
      this.logger.error('Model cascade exhausted', error, {
        diagnostics: error.diagnostics,
        candidate_source: source,
        duration_ms: Date.now() - startTime
      });
      return {
        response: RESPONSE_MESSAGES.CASCADE_EXHAUSTED,
        candidateSource: source,
        passages,
        diagnostics: error.diagnostics
      };
    }

    const answer = result.value;
    const model = candidateLabel(answer.candidate);
    this.logger.logQuery(query, {
      model,
      passages: passages.length,
      failed_candidates: answer.diagnostics.length
    }, startTime);

    return {
      response: answer.text,
      model,
      candidateSource: source,
      passages,
      diagnostics: answer.diagnostics
    };
  }
}
