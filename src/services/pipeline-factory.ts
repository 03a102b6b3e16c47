/**
 * Wires the configured components into a ready pipeline
 */

import type { TutorConfig } from '../lib/env-config.js';
import type { FetchFn } from '../lib/http-client.js';
import type { SleepFn } from '../lib/retry-utils.js';
import { Logger, logger as defaultLogger } from '../cli/utils/logger.js';
import { GeminiEmbedder } from './embedding/GeminiEmbedder.js';
import { createVectorStore, type VectorStore } from './retrieval/VectorStore.js';
import { VectorRetriever } from './retrieval/VectorRetriever.js';
import { ContextAssembler } from './prompt/ContextAssembler.js';
import { ModelDiscovery } from './generation/ModelDiscovery.js';
import { CandidateResolver } from './generation/CandidateResolver.js';
import {
  GeminiGenerationClient,
  createGeminiModelFactory,
  type GenerationClient
} from './generation/GenerationClient.js';
import { ModelCascade } from './generation/ModelCascade.js';
import { QueryOrchestrator } from './QueryOrchestrator.js';
import { HealthChecker } from './HealthChecker.js';

/**
 * Replaceable collaborators; production defaults are used for the rest
 */
export interface PipelineOverrides {
  fetchFn?: FetchFn;
  /** `null` disables retrieval regardless of configuration */
  vectorStore?: VectorStore | null;
  generationClient?: GenerationClient;
  sleep?: SleepFn;
  logger?: Logger;
}

export interface TutorPipeline {
  config: Readonly<TutorConfig>;
  orchestrator: QueryOrchestrator;
  resolver: CandidateResolver;
  healthChecker: HealthChecker;
}

export function createPipeline(
  config: Readonly<TutorConfig>,
  overrides: PipelineOverrides = {}
): TutorPipeline {
  const logger = overrides.logger ?? defaultLogger;
  const apiKey = config.apiKey ?? '';
  const vectorStore =
    overrides.vectorStore !== undefined ? overrides.vectorStore : createVectorStore(config.vectorStore);

  const embedder = new GeminiEmbedder({
    apiKey,
    apiBaseUrl: config.apiBaseUrl,
    settings: config.embedding,
    fetchFn: overrides.fetchFn,
    logger
  });

  const retriever = new VectorRetriever(vectorStore, {
    topK: config.vectorStore.topK,
    logger
  });

  const assembler = new ContextAssembler({
    policy: config.prompt.policy,
    maxPromptChars: config.prompt.maxPromptChars,
    logger
  });

  const discovery = config.apiKey
    ? new ModelDiscovery({
        apiKey: config.apiKey,
        apiBaseUrl: config.apiBaseUrl,
        apiVersion: config.generation.discoveryApiVersion,
        timeoutMs: config.generation.discoveryTimeoutMs,
        fetchFn: overrides.fetchFn,
        logger
      })
    : null;

  const resolver = new CandidateResolver({
    mode: config.generation.mode,
    staticCandidates: config.generation.staticCandidates,
    discovery,
    logger
  });

  const client =
    overrides.generationClient ??
    new GeminiGenerationClient({
      factory: createGeminiModelFactory(apiKey),
      timeoutMs: config.generation.timeoutMs
    });

  const cascade = new ModelCascade({
    client,
    backoffMs: config.generation.backoffMs,
    sleep: overrides.sleep,
    logger
  });

  const orchestrator = new QueryOrchestrator({
    apiKey: config.apiKey,
    embedder,
    retriever,
    assembler,
    resolver,
    cascade,
    maxAttemptsPerCandidate: config.generation.maxAttemptsPerCandidate,
    logger
  });

  const healthChecker = new HealthChecker({ config, vectorStore, discovery });

  return { config, orchestrator, resolver, healthChecker };
}
