/**
 * Pipeline configuration constants
 *
 * Defaults for every tunable of the query pipeline. Each value can be
 * overridden through the environment (see lib/env-config.ts).
 */

/**
 * Embedding Configuration
 */
export const EMBEDDING_DEFAULTS = {
  /** Embedding model used to index the corpus */
  MODEL: 'text-embedding-004',

  /** API tier serving the embedding model */
  API_VERSION: 'v1beta',

  /** Dimensionality of the vector store index */
  DIMENSIONS: 1024,

  /** Query-side hint matching the corpus' RETRIEVAL_DOCUMENT indexing */
  TASK_TYPE: 'RETRIEVAL_QUERY',

  /** Request timeout (in ms) */
  TIMEOUT_MS: 8000
} as const;

/**
 * Retrieval Configuration
 */
export const RETRIEVAL_DEFAULTS = {
  COLLECTION: 'textbook',
  TOP_K: 3,
  TIMEOUT_MS: 8000,

  /** Payload fields holding passage text, in priority order */
  TEXT_FIELDS: ['page_content', 'text', 'content']
} as const;

/**
 * Generation Configuration
 */
export const GENERATION_DEFAULTS = {
  MODE: 'discovery',

  /** Hand-ordered fallback list, `id@apiVersion` */
  CANDIDATES:
    'gemini-2.0-flash@v1beta,gemini-1.5-flash@v1beta,gemini-1.5-flash@v1,gemini-1.5-pro@v1beta',

  /** Total tries per candidate when rate-limited */
  MAX_ATTEMPTS_PER_CANDIDATE: 2,

  /** Fixed wait before retrying a rate-limited candidate (in ms) */
  BACKOFF_MS: 1500,

  /** Generation request timeout (in ms) */
  TIMEOUT_MS: 30000,

  DISCOVERY_API_VERSION: 'v1beta',
  DISCOVERY_TIMEOUT_MS: 8000,
  DISCOVERY_PAGE_SIZE: 1000,

  /** Safety cap on followed discovery pages */
  DISCOVERY_MAX_PAGES: 5,

  /** Discovered models must belong to this family */
  DISCOVERY_MODEL_PREFIX: 'gemini-',

  /** Name tokens of discovered variants that do not answer in text */
  DISCOVERY_EXCLUDED_TOKENS: ['tts', 'image', 'audio', 'live', 'vision', 'embedding']
} as const;

/**
 * Name tokens placing a model in the light (fast, high-quota) tier
 */
export const LIGHT_MODEL_TOKENS = ['flash', 'lite', '8b', 'nano'] as const;

/**
 * Name tokens placing a model in the heavy (slow, low-quota) tier
 */
export const HEAVY_MODEL_TOKENS = ['pro', 'ultra'] as const;

/**
 * Gemini REST endpoint
 */
export const GEMINI_API_BASE_URL = 'https://generativelanguage.googleapis.com';

/**
 * HTTP status codes driving cascade decisions
 */
export const HTTP_STATUS = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429
} as const;

/**
 * Server Configuration
 */
export const SERVER_DEFAULTS = {
  PORT: 8000,
  CORS_ORIGIN: '*'
} as const;

/**
 * User-visible responses for the failures that reach the end user
 */
export const RESPONSE_MESSAGES = {
  MISSING_CREDENTIALS: 'Error: AI_API_KEY is missing in the server environment.',
  CASCADE_EXHAUSTED:
    'The tutor could not reach any language model right now. Please try again in a moment.',
  UNEXPECTED_ERROR: 'The tutor ran into an unexpected problem while answering. Please try again.'
} as const;

/**
 * Instruction set prepended to every prompt
 */
export const DEFAULT_TUTOR_POLICY = [
  'You are an AI tutor for the "Physical AI & Humanoid Robotics" textbook.',
  'Answer the student\'s question using ONLY the textbook context below.',
  'If the context does not contain the answer, reply exactly: "This topic is not covered in the textbook notes."',
  'If the student only greets you, greet them back in one short sentence.',
  'Keep answers brief; give a longer, step-by-step explanation only when the student explicitly asks for more detail.'
].join('\n');
