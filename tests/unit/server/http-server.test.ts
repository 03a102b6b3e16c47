import { describe, it, expect, vi } from 'vitest';
import {
  ROOT_MESSAGE,
  applyCors,
  createApp,
  clientErrorStatus,
  handleChat,
  handleHealth,
  handleRequestError,
  type CorsTarget,
  type JsonReply
} from '../../../src/server/http-server.js';
import type { ApiHealthPayload } from '../../../src/models/health-check.js';
import { RecordingLogger } from '../../helpers/fakes.js';

class FakeReply implements JsonReply {
  statusCode = 0;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }
}

class FakeCorsTarget implements CorsTarget {
  readonly headers: Record<string, string> = {};
  statusCode = 0;
  ended = false;

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  status(code: number) {
    this.statusCode = code;
    return {
      end: () => {
        this.ended = true;
      }
    };
  }
}

const HEALTH: ApiHealthPayload = {
  status: 'ok',
  backend: 'express',
  ai_status: 'Ready',
  vector_store: 'Disabled',
  models: 'discovery'
};

function fakeOrchestrator(response: string = 'Answer') {
  return { answer: vi.fn(async (_message: string) => ({ response })) };
}

describe('handleChat', () => {
  it('answers a valid request', async () => {
    const orchestrator = fakeOrchestrator('ZMP is the zero moment point.');
    const reply = new FakeReply();

    await handleChat(orchestrator, { message: 'What is ZMP?' }, reply);

    expect(orchestrator.answer).toHaveBeenCalledWith('What is ZMP?');
    expect(reply.statusCode).toBe(200);
    expect(reply.body).toEqual({ response: 'ZMP is the zero moment point.' });
  });

  it('passes an empty message through to the pipeline', async () => {
    const orchestrator = fakeOrchestrator();

    await handleChat(orchestrator, { message: '' }, new FakeReply());

    expect(orchestrator.answer).toHaveBeenCalledWith('');
  });

  it('rejects a body without a message', async () => {
    const orchestrator = fakeOrchestrator();
    const reply = new FakeReply();

    await handleChat(orchestrator, {}, reply);

    expect(reply.statusCode).toBe(422);
    expect(reply.body).toEqual({ detail: 'message: Required' });
    expect(orchestrator.answer).not.toHaveBeenCalled();
  });

  it('rejects a non-string message', async () => {
    const reply = new FakeReply();

    await handleChat(fakeOrchestrator(), { message: 42 }, reply);

    expect(reply.statusCode).toBe(422);
    expect(reply.body).toEqual({ detail: 'message: Expected string, received number' });
  });

  it('rejects a body that is not an object', async () => {
    const reply = new FakeReply();

    await handleChat(fakeOrchestrator(), null, reply);

    expect(reply.body).toEqual({ detail: 'body: Expected object, received null' });
  });
});

describe('handleHealth', () => {
  it('returns the static health payload', () => {
    const reply = new FakeReply();

    handleHealth({ apiStatus: () => HEALTH }, reply);

    expect(reply.statusCode).toBe(200);
    expect(reply.body).toEqual(HEALTH);
  });
});

function parserError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status, type: 'entity.too.large' });
}

describe('handleRequestError', () => {
  const request = { method: 'POST', path: '/api/chat' };

  it('maps malformed JSON to 422', () => {
    const reply = new FakeReply();
    const logger = new RecordingLogger();

    handleRequestError(new SyntaxError('Unexpected token } in JSON'), request, reply, logger);

    expect(reply.statusCode).toBe(422);
    expect(reply.body).toEqual({ detail: 'body: Malformed JSON' });
    expect(logger.entries).toEqual([]);
  });

  it('keeps the client error status of a body-parser failure', () => {
    const reply = new FakeReply();
    const logger = new RecordingLogger();

    handleRequestError(parserError('request entity too large', 413), request, reply, logger);

    expect(reply.statusCode).toBe(413);
    expect(reply.body).toEqual({ detail: 'request entity too large' });
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'Rejected request',
        context: { method: 'POST', path: '/api/chat', status: 413, error: 'request entity too large' }
      }
    ]);
  });

  it('answers 500 for anything else', () => {
    const reply = new FakeReply();
    const logger = new RecordingLogger();
    const failure = parserError('socket hang up', 503);

    handleRequestError(failure, request, reply, logger);

    expect(reply.statusCode).toBe(500);
    expect(reply.body).toEqual({ detail: 'Internal server error' });
    expect(logger.entries).toEqual([
      { level: 'error', message: 'Unhandled request error', error: failure, context: request }
    ]);
  });
});

describe('clientErrorStatus', () => {
  it('reads only numeric 4xx statuses', () => {
    expect(clientErrorStatus(parserError('unsupported charset "UTF-7"', 415))).toBe(415);
    expect(clientErrorStatus(parserError('boom', 500))).toBeUndefined();
    expect(clientErrorStatus({ status: '413' })).toBeUndefined();
    expect(clientErrorStatus('413')).toBeUndefined();
    expect(clientErrorStatus(null)).toBeUndefined();
  });
});

describe('applyCors', () => {
  it('sets permissive headers and lets the request continue', () => {
    const target = new FakeCorsTarget();

    expect(applyCors('*', 'POST', target)).toBe(false);
    expect(target.headers).toEqual({
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type, Authorization'
    });
    expect(target.ended).toBe(false);
  });

  it('answers preflight requests with 204', () => {
    const target = new FakeCorsTarget();

    expect(applyCors('https://tutor.example', 'OPTIONS', target)).toBe(true);
    expect(target.statusCode).toBe(204);
    expect(target.ended).toBe(true);
    expect(target.headers['Access-Control-Allow-Origin']).toBe('https://tutor.example');
  });
});

describe('createApp', () => {
  it('builds a request handler without binding a port', () => {
    const app = createApp({
      orchestrator: fakeOrchestrator(),
      healthChecker: { apiStatus: () => HEALTH },
      corsOrigin: '*',
      logger: new RecordingLogger()
    });

    expect(typeof app).toBe('function');
    expect(typeof app.listen).toBe('function');
  });

  it('exposes the liveness banner text', () => {
    expect(ROOT_MESSAGE).toBe('Textbook tutor backend active');
  });
});
