/**
 * textbook-tutor
 *
 * Retrieval-augmented question answering over a textbook corpus.
 */

export { ConfigurationManager, ConfigError, loadConfig, maskApiKey } from './lib/env-config.js';
export type { TutorConfig } from './lib/env-config.js';
export { createPipeline } from './services/pipeline-factory.js';
export type { PipelineOverrides, TutorPipeline } from './services/pipeline-factory.js';
export { QueryOrchestrator } from './services/QueryOrchestrator.js';
export type { DetailedAnswer } from './services/QueryOrchestrator.js';
export { GeminiEmbedder } from './services/embedding/GeminiEmbedder.js';
export type { Embedder } from './services/embedding/GeminiEmbedder.js';
export { VectorRetriever } from './services/retrieval/VectorRetriever.js';
export { QdrantVectorStore, createVectorStore } from './services/retrieval/VectorStore.js';
export type { VectorStore, CollectionStatus } from './services/retrieval/VectorStore.js';
export { ContextAssembler, buildContext, formatPrompt } from './services/prompt/ContextAssembler.js';
export { ModelCascade, decide } from './services/generation/ModelCascade.js';
export { CandidateResolver } from './services/generation/CandidateResolver.js';
export { ModelDiscovery } from './services/generation/ModelDiscovery.js';
export { GeminiGenerationClient, createGeminiModelFactory } from './services/generation/GenerationClient.js';
export type { GenerationClient } from './services/generation/GenerationClient.js';
export { rankCandidates, preferenceOf } from './services/generation/candidate-ranking.js';
export { HealthChecker } from './services/HealthChecker.js';
export { createApp, startServer, stopServer } from './server/http-server.js';
export { fitDimensions } from './lib/embedding-utils.js';
export {
  UpstreamError,
  UpstreamHttpError,
  UpstreamNetworkError,
  UpstreamResponseError,
  UpstreamTimeoutError,
  CascadeExhaustedError
} from './lib/errors/UpstreamErrors.js';
export { parseCandidate, parseCandidateList, candidateLabel } from './models/model-candidate.js';
export type { ModelCandidate, CandidateMode } from './models/model-candidate.js';
export type { AttemptOutcome, AnswerResult, CandidateDiagnostic } from './models/answer-result.js';
export type { RetrievedPassage } from './models/passage.js';
export { Logger, LogLevel } from './cli/utils/logger.js';
