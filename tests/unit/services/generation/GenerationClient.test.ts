import { describe, it, expect, vi } from 'vitest';
import { GoogleGenerativeAIFetchError, GoogleGenerativeAIResponseError } from '@google/generative-ai';
import {
  GeminiGenerationClient,
  classifyGenerationError,
  extractAnswerText,
  type ContentGenerator,
  type GenerationResponseLike
} from '../../../../src/services/generation/GenerationClient.js';

const CANDIDATE = { id: 'gemini-2.0-flash', apiVersion: 'v1beta' };

function textResponse(...texts: string[]): GenerationResponseLike {
  return { response: { candidates: [{ content: { parts: texts.map((text) => ({ text })) } }] } };
}

function clientFor(generator: ContentGenerator, timeoutMs: number = 1000) {
  const factory = vi.fn(() => generator);
  return { client: new GeminiGenerationClient({ factory, timeoutMs }), factory };
}

describe('extractAnswerText', () => {
  it('joins the parts of the first candidate', () => {
    expect(extractAnswerText(textResponse('Hello ', 'world'))).toBe('Hello world');
  });

  it('returns null for blank or missing text', () => {
    expect(extractAnswerText(textResponse('  '))).toBeNull();
    expect(extractAnswerText({ response: {} })).toBeNull();
    expect(extractAnswerText({ response: { candidates: [{}] } })).toBeNull();
  });
});

describe('classifyGenerationError', () => {
  it('maps 429 to rate_limited', () => {
    const outcome = classifyGenerationError(new GoogleGenerativeAIFetchError('quota', 429, 'Too Many Requests'));
    expect(outcome).toMatchObject({ kind: 'rate_limited', status: 429 });
  });

  it('maps 404 and unsupported-method 400 to not_found', () => {
    expect(classifyGenerationError(new GoogleGenerativeAIFetchError('gone', 404, 'Not Found'))).toMatchObject({
      kind: 'not_found',
      status: 404
    });
    expect(
      classifyGenerationError(
        new GoogleGenerativeAIFetchError('models/x is not supported for generateContent', 400, 'Bad Request')
      )
    ).toMatchObject({ kind: 'not_found', status: 400 });
  });

  it('maps other statuses to http_error', () => {
    expect(classifyGenerationError(new GoogleGenerativeAIFetchError('bad key', 400, 'Bad Request'))).toMatchObject({
      kind: 'http_error',
      status: 400
    });
    expect(classifyGenerationError(new GoogleGenerativeAIFetchError('down', 503, 'Unavailable'))).toMatchObject({
      kind: 'http_error',
      status: 503
    });
  });

  it('maps response errors to malformed_response', () => {
    expect(classifyGenerationError(new GoogleGenerativeAIResponseError('blocked')).kind).toBe('malformed_response');
  });

  it('maps anything else to transport_error', () => {
    expect(classifyGenerationError(new TypeError('fetch failed'))).toEqual({
      kind: 'transport_error',
      message: 'fetch failed'
    });
    expect(classifyGenerationError(new GoogleGenerativeAIFetchError('no status')).kind).toBe('transport_error');
  });
});

describe('GeminiGenerationClient', () => {
  it('returns the answer text and builds the model per candidate', async () => {
    const generateContent = vi.fn(async () => textResponse('Balance uses ZMP.'));
    const { client, factory } = clientFor({ generateContent }, 2500);

    const outcome = await client.generate(CANDIDATE, 'prompt text');

    expect(outcome).toEqual({ kind: 'success', text: 'Balance uses ZMP.' });
    expect(factory).toHaveBeenCalledWith(CANDIDATE, 2500);
    expect(generateContent).toHaveBeenCalledWith('prompt text', { signal: expect.any(AbortSignal) });
  });

  it('reports a blocked prompt as malformed', async () => {
    const { client } = clientFor({
      generateContent: async () => ({ response: { promptFeedback: { blockReason: 'SAFETY' } } })
    });

    expect(await client.generate(CANDIDATE, 'p')).toEqual({
      kind: 'malformed_response',
      message: 'Prompt blocked: SAFETY'
    });
  });

  it('reports an answer without text as malformed', async () => {
    const { client } = clientFor({
      generateContent: async () => ({ response: { candidates: [{ finishReason: 'MAX_TOKENS' }] } })
    });

    expect(await client.generate(CANDIDATE, 'p')).toEqual({
      kind: 'malformed_response',
      message: 'Response carried no answer text (finishReason MAX_TOKENS)'
    });
  });

  it('classifies thrown SDK errors', async () => {
    const { client } = clientFor({
      generateContent: async () => {
        throw new GoogleGenerativeAIFetchError('quota', 429, 'Too Many Requests');
      }
    });

    expect((await client.generate(CANDIDATE, 'p')).kind).toBe('rate_limited');
  });

  it('reports a request past its deadline as a transport error', async () => {
    const { client } = clientFor(
      {
        generateContent: (_prompt, options) =>
          new Promise((_resolve, reject) => {
            options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      },
      10
    );

    expect(await client.generate(CANDIDATE, 'p')).toEqual({
      kind: 'transport_error',
      message: 'Generation timed out after 10ms'
    });
  });
});
