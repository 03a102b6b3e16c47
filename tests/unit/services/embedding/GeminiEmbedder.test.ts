import { describe, it, expect } from 'vitest';
import { GeminiEmbedder } from '../../../../src/services/embedding/GeminiEmbedder.js';
import type { EmbeddingSettings } from '../../../../src/lib/env-config.js';
import type { FetchFn } from '../../../../src/lib/http-client.js';
import { UpstreamResponseError } from '../../../../src/lib/errors/UpstreamErrors.js';
import { RecordingLogger, jsonResponse, queuedFetch } from '../../../helpers/fakes.js';

const settings: EmbeddingSettings = {
  model: 'text-embedding-004',
  apiVersion: 'v1beta',
  dimensions: 4,
  taskType: 'RETRIEVAL_QUERY',
  timeoutMs: 1000
};

function createEmbedder(fetchFn: FetchFn, logger = new RecordingLogger()) {
  return new GeminiEmbedder({
    apiKey: 'test-secret',
    apiBaseUrl: 'http://gemini.test',
    settings,
    fetchFn,
    logger
  });
}

describe('GeminiEmbedder', () => {
  it('requests a query embedding at the index dimensionality', async () => {
    const fetchFn = queuedFetch(jsonResponse({ embedding: { values: [0.1, 0.2, 0.3, 0.4] } }));

    const vector = await createEmbedder(fetchFn).embed('What is a humanoid robot?');

    expect(vector).toEqual([0.1, 0.2, 0.3, 0.4]);
    const call = fetchFn.mock.calls[0];
    expect(call?.[0]).toBe('http://gemini.test/v1beta/models/text-embedding-004:embedContent');
    expect(call?.[1].method).toBe('POST');
    expect(call?.[1].headers).toEqual({
      'Content-Type': 'application/json',
      'x-goog-api-key': 'test-secret'
    });
    expect(JSON.parse(String(call?.[1].body))).toEqual({
      model: 'models/text-embedding-004',
      content: { parts: [{ text: 'What is a humanoid robot?' }] },
      taskType: 'RETRIEVAL_QUERY',
      outputDimensionality: 4
    });
  });

  it('pads short embeddings with zeros', async () => {
    const fetchFn = queuedFetch(jsonResponse({ embedding: { values: [0.5, 0.25] } }));

    expect(await createEmbedder(fetchFn).embed('q')).toEqual([0.5, 0.25, 0, 0]);
  });

  it('truncates long embeddings and logs a warning', async () => {
    const logger = new RecordingLogger();
    const fetchFn = queuedFetch(jsonResponse({ embedding: { values: [1, 2, 3, 4, 5, 6] } }));

    const vector = await createEmbedder(fetchFn, logger).embed('q');

    expect(vector).toEqual([1, 2, 3, 4]);
    expect(logger.entries).toContainEqual({
      level: 'warn',
      message: 'Embedding longer than index dimensionality; truncated',
      context: { returned: 6, dimensions: 4 }
    });
  });

  it('returns null and logs when the service fails', async () => {
    const logger = new RecordingLogger();
    const fetchFn = queuedFetch(new Response('boom', { status: 500, statusText: 'Internal Server Error' }));

    const vector = await createEmbedder(fetchFn, logger).embed('q');

    expect(vector).toBeNull();
    expect(logger.entries).toContainEqual({
      level: 'warn',
      message: 'Embedding failed; continuing without retrieval context',
      context: { code: 'UPSTREAM_HTTP_ERROR', status: 500, error: 'HTTP 500: Internal Server Error' }
    });
  });

  it('returns null when the transport fails', async () => {
    const fetchFn = queuedFetch(new TypeError('fetch failed'));

    expect(await createEmbedder(fetchFn).embed('q')).toBeNull();
  });

  it('reports a body without embedding values as malformed', async () => {
    const fetchFn = queuedFetch(jsonResponse({ error: 'nope' }));

    const result = await createEmbedder(fetchFn).tryEmbed('q');

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(UpstreamResponseError);
  });

  it('treats an empty vector as malformed', async () => {
    const fetchFn = queuedFetch(jsonResponse({ embedding: { values: [] } }));

    const result = await createEmbedder(fetchFn).tryEmbed('q');

    expect(result._unsafeUnwrapErr().message).toBe('Embedding response contained an empty or non-finite vector');
  });
});
