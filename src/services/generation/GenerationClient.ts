import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError
} from '@google/generative-ai';
import { HTTP_STATUS } from '../../constants/pipeline-constants.js';
import { errorMessage } from '../../lib/errors/UpstreamErrors.js';
import type { AttemptOutcome, FailedOutcome } from '../../models/answer-result.js';
import type { ModelCandidate } from '../../models/model-candidate.js';

/**
 * Issues one generation request against one candidate
 *
 * Implementations report every failure as an outcome value and never throw.
 */
export interface GenerationClient {
  generate(candidate: ModelCandidate, prompt: string, signal?: AbortSignal): Promise<AttemptOutcome>;
}

/**
 * The part of a generation response the cascade reads
 */
export interface GenerationResponseLike {
  response: {
    candidates?: Array<{
      finishReason?: string;
      content?: { parts?: Array<{ text?: string }> };
    }>;
    promptFeedback?: { blockReason?: string };
  };
}

/**
 * A model handle able to generate content (satisfied by the SDK's GenerativeModel)
 */
export interface ContentGenerator {
  generateContent(prompt: string, options?: { signal?: AbortSignal }): Promise<GenerationResponseLike>;
}

export type ContentGeneratorFactory = (candidate: ModelCandidate, timeoutMs: number) => ContentGenerator;

/**
 * Factory creating SDK model handles for each candidate
 */
export function createGeminiModelFactory(apiKey: string): ContentGeneratorFactory {
  const genAI = new GoogleGenerativeAI(apiKey);
  return (candidate, timeoutMs) =>
    genAI.getGenerativeModel(
      { model: candidate.id },
      { apiVersion: candidate.apiVersion, timeout: timeoutMs }
    );
}

/**
 * Concatenated text of the first answer candidate, or null when there is none
 */
export function extractAnswerText(result: GenerationResponseLike): string | null {
  const parts = result.response.candidates?.[0]?.content?.parts ?? [];
  const text = parts.map((part) => part.text ?? '').join('');
  return text.trim().length > 0 ? text.trim() : null;
}

/**
 * Map a thrown SDK error to a failed outcome
 */
export function classifyGenerationError(error: unknown): FailedOutcome {
  const message = errorMessage(error);

  if (error instanceof GoogleGenerativeAIFetchError) {
    const status = error.status;

    if (status === HTTP_STATUS.TOO_MANY_REQUESTS) {
      return { kind: 'rate_limited', status, message };
    }
    if (status === HTTP_STATUS.NOT_FOUND) {
      return { kind: 'not_found', status, message };
    }
    // Existing model that does not offer generateContent for this key
    if (status === HTTP_STATUS.BAD_REQUEST && /not supported|not found/i.test(message)) {
      return { kind: 'not_found', status, message };
    }
    if (status !== undefined) {
      return { kind: 'http_error', status, message };
    }
    return { kind: 'transport_error', message };
  }

  if (error instanceof GoogleGenerativeAIResponseError) {
    return { kind: 'malformed_response', message };
  }

  return { kind: 'transport_error', message };
}

export interface GeminiGenerationClientOptions {
  factory: ContentGeneratorFactory;
  timeoutMs: number;
}

/**
 * Generation client backed by the Gemini SDK
 */
export class GeminiGenerationClient implements GenerationClient {
  constructor(private readonly options: GeminiGenerationClientOptions) {}

  async generate(candidate: ModelCandidate, prompt: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const model = this.options.factory(candidate, timeoutMs);
      const result = await model.generateContent(prompt, { signal: controller.signal });
      const text = extractAnswerText(result);

      if (text === null) {
        const blockReason = result.response.promptFeedback?.blockReason;
        const finishReason = result.response.candidates?.[0]?.finishReason;
        return {
          kind: 'malformed_response',
          message: blockReason
            ? `Prompt blocked: ${blockReason}`
            : `Response carried no answer text${finishReason ? ` (finishReason ${finishReason})` : ''}`
        };
      }

      return { kind: 'success', text };
    } catch (error) {
      if (timedOut) {
        return { kind: 'transport_error', message: `Generation timed out after ${timeoutMs}ms` };
      }
      return classifyGenerationError(error);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
