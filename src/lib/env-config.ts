/**
 * Configuration Management
 *
 * Builds the process-wide tutor configuration from environment variables
 * (optionally seeded from a .env file). The configuration is assembled once
 * at startup, frozen, and handed to each component by its constructor.
 */

import { readFileSync } from 'fs';
import { config as loadEnv } from 'dotenv';
import { Result, ok, err } from './result-types.js';
import {
	DEFAULT_TUTOR_POLICY,
	EMBEDDING_DEFAULTS,
	GEMINI_API_BASE_URL,
	GENERATION_DEFAULTS,
	RETRIEVAL_DEFAULTS,
	SERVER_DEFAULTS,
} from '../constants/pipeline-constants.js';
import {
	EMBEDDING_TASK_TYPES,
	type EmbeddingTaskType,
} from '../models/embedding-vector.js';
import {
	parseCandidateList,
	type CandidateMode,
	type ModelCandidate,
} from '../models/model-candidate.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

export interface EmbeddingSettings {
	model: string;
	apiVersion: string;
	/** Target dimensionality D of the vector store index */
	dimensions: number;
	taskType: EmbeddingTaskType;
	timeoutMs: number;
}

export interface VectorStoreSettings {
	/** Unset disables retrieval (every query gets an empty context) */
	url?: string;
	apiKey?: string;
	collection: string;
	topK: number;
	timeoutMs: number;
}

export interface GenerationSettings {
	mode: CandidateMode;
	staticCandidates: ModelCandidate[];
	maxAttemptsPerCandidate: number;
	backoffMs: number;
	timeoutMs: number;
	discoveryApiVersion: string;
	discoveryTimeoutMs: number;
}

export interface PromptSettings {
	policy: string;
	/** 0 disables the prompt length guard */
	maxPromptChars: number;
}

export interface ServerSettings {
	port: number;
	corsOrigin: string;
}

export interface TutorConfig {
	/** Gemini API key; absence is reported per query, not at load time */
	apiKey?: string;
	apiBaseUrl: string;
	embedding: EmbeddingSettings;
	vectorStore: VectorStoreSettings;
	generation: GenerationSettings;
	prompt: PromptSettings;
	server: ServerSettings;
}

// ============================================================================
// Configuration Error
// ============================================================================

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Reads and validates configuration from an environment map
 */
export class ConfigurationManager {
	constructor(
		private readonly env: NodeJS.ProcessEnv = process.env,
		private readonly envPath?: string
	) {}

	/**
	 * Load variables from a .env file into process.env (missing file is fine)
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigError(
					`Failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
				)
			);
		}
	}

	/**
	 * Assemble the full configuration
	 *
	 * @returns Frozen configuration, or one error listing every invalid variable
	 */
	load(): Result<Readonly<TutorConfig>, ConfigError> {
		const problems: string[] = [];
		const take = <T>(result: Result<T, ConfigError>, fallback: T): T =>
			result.match(
				(value) => value,
				(error) => {
					problems.push(error.message);
					return fallback;
				}
			);

		const config: TutorConfig = {
			apiKey: this.getEnvVar('AI_API_KEY'),
			apiBaseUrl: (this.getEnvVar('GEMINI_API_BASE_URL') ?? GEMINI_API_BASE_URL).replace(/\/+$/, ''),
			embedding: {
				model: this.getEnvVar('EMBED_MODEL') ?? EMBEDDING_DEFAULTS.MODEL,
				apiVersion: this.getEnvVar('EMBED_API_VERSION') ?? EMBEDDING_DEFAULTS.API_VERSION,
				dimensions: take(this.getEnvInt('EMBED_DIMENSIONS', EMBEDDING_DEFAULTS.DIMENSIONS, 1), EMBEDDING_DEFAULTS.DIMENSIONS),
				taskType: take(this.getTaskType(), EMBEDDING_DEFAULTS.TASK_TYPE),
				timeoutMs: take(this.getEnvInt('EMBED_TIMEOUT_MS', EMBEDDING_DEFAULTS.TIMEOUT_MS, 1), EMBEDDING_DEFAULTS.TIMEOUT_MS),
			},
			vectorStore: {
				url: this.getEnvVar('QDRANT_URL'),
				apiKey: this.getEnvVar('QDRANT_API_KEY'),
				collection: this.getEnvVar('QDRANT_COLLECTION') ?? RETRIEVAL_DEFAULTS.COLLECTION,
				topK: take(this.getEnvInt('RETRIEVAL_TOP_K', RETRIEVAL_DEFAULTS.TOP_K, 1), RETRIEVAL_DEFAULTS.TOP_K),
				timeoutMs: take(this.getEnvInt('QDRANT_TIMEOUT_MS', RETRIEVAL_DEFAULTS.TIMEOUT_MS, 1), RETRIEVAL_DEFAULTS.TIMEOUT_MS),
			},
			generation: {
				mode: take(this.getMode(), GENERATION_DEFAULTS.MODE),
				// Set but empty means "no static fallback"
				staticCandidates: parseCandidateList(this.env.TUTOR_MODEL_CANDIDATES ?? GENERATION_DEFAULTS.CANDIDATES),
				maxAttemptsPerCandidate: take(
					this.getEnvInt('GENERATION_MAX_ATTEMPTS', GENERATION_DEFAULTS.MAX_ATTEMPTS_PER_CANDIDATE, 1),
					GENERATION_DEFAULTS.MAX_ATTEMPTS_PER_CANDIDATE
				),
				backoffMs: take(this.getEnvInt('GENERATION_BACKOFF_MS', GENERATION_DEFAULTS.BACKOFF_MS, 0), GENERATION_DEFAULTS.BACKOFF_MS),
				timeoutMs: take(this.getEnvInt('GENERATION_TIMEOUT_MS', GENERATION_DEFAULTS.TIMEOUT_MS, 1), GENERATION_DEFAULTS.TIMEOUT_MS),
				discoveryApiVersion: this.getEnvVar('DISCOVERY_API_VERSION') ?? GENERATION_DEFAULTS.DISCOVERY_API_VERSION,
				discoveryTimeoutMs: take(
					this.getEnvInt('DISCOVERY_TIMEOUT_MS', GENERATION_DEFAULTS.DISCOVERY_TIMEOUT_MS, 1),
					GENERATION_DEFAULTS.DISCOVERY_TIMEOUT_MS
				),
			},
			prompt: {
				policy: take(this.getPolicy(), DEFAULT_TUTOR_POLICY),
				maxPromptChars: take(this.getEnvInt('TUTOR_MAX_PROMPT_CHARS', 0, 0), 0),
			},
			server: {
				port: take(this.getEnvInt('PORT', SERVER_DEFAULTS.PORT, 0), SERVER_DEFAULTS.PORT),
				corsOrigin: this.getEnvVar('CORS_ORIGIN') ?? SERVER_DEFAULTS.CORS_ORIGIN,
			},
		};

		if (problems.length > 0) {
			return err(new ConfigError(problems.join('; ')));
		}
		return ok(deepFreeze(config));
	}

	/**
	 * Non-blank environment variable, trimmed
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key]?.trim();
		return value ? value : undefined;
	}

	/**
	 * Integer environment variable with a lower bound
	 */
	private getEnvInt(key: string, defaultValue: number, min: number): Result<number, ConfigError> {
		const raw = this.getEnvVar(key);
		if (raw === undefined) return ok(defaultValue);

		if (!/^-?\d+$/.test(raw)) {
			return err(new ConfigError(`Invalid ${key}: "${raw}" is not an integer`));
		}

		const value = parseInt(raw, 10);
		if (value < min) {
			return err(new ConfigError(`Invalid ${key}: must be >= ${min} (got ${value})`));
		}
		return ok(value);
	}

	private getTaskType(): Result<EmbeddingTaskType, ConfigError> {
		const raw = this.getEnvVar('EMBED_TASK_TYPE') ?? EMBEDDING_DEFAULTS.TASK_TYPE;
		const taskType = EMBEDDING_TASK_TYPES.find((candidate) => candidate === raw.toUpperCase());
		if (!taskType) {
			return err(
				new ConfigError(
					`Invalid EMBED_TASK_TYPE "${raw}". Valid types: ${EMBEDDING_TASK_TYPES.join(', ')}`
				)
			);
		}
		return ok(taskType);
	}

	private getMode(): Result<CandidateMode, ConfigError> {
		const raw = (this.getEnvVar('TUTOR_MODEL_MODE') ?? GENERATION_DEFAULTS.MODE).toLowerCase();
		if (raw === 'static' || raw === 'discovery') {
			return ok(raw);
		}
		return err(new ConfigError(`Invalid TUTOR_MODEL_MODE "${raw}". Valid modes: static, discovery`));
	}

	/**
	 * Inline policy wins over a policy file; both fall back to the built-in text
	 */
	private getPolicy(): Result<string, ConfigError> {
		const inline = this.getEnvVar('TUTOR_POLICY');
		if (inline) return ok(inline);

		const file = this.getEnvVar('TUTOR_POLICY_FILE');
		if (!file) return ok(DEFAULT_TUTOR_POLICY);

		try {
			const text = readFileSync(file, 'utf8').trim();
			if (!text) {
				return err(new ConfigError(`TUTOR_POLICY_FILE "${file}" is empty`));
			}
			return ok(text);
		} catch (error) {
			return err(
				new ConfigError(
					`Cannot read TUTOR_POLICY_FILE "${file}": ${error instanceof Error ? error.message : String(error)}`
				)
			);
		}
	}
}

/**
 * Mask API key for safe logging (show only last 4 characters)
 */
export function maskApiKey(apiKey: string): string {
	if (apiKey.length <= 4) {
		return '****';
	}
	return '****' + apiKey.slice(-4);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const nested of Object.values(value)) {
		if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
			deepFreeze(nested);
		}
	}
	return Object.freeze(value);
}

/**
 * Load .env (if present) into process.env and build the configuration
 *
 * @param envPath - Optional path to .env file
 */
export function loadConfig(envPath?: string): Result<Readonly<TutorConfig>, ConfigError> {
	const manager = new ConfigurationManager(process.env, envPath);
	return manager.loadEnv().andThen(() => manager.load());
}
