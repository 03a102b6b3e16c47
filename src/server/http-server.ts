/**
 * HTTP surface of the tutor
 *
 * Routes:
 *   POST /api/chat, POST /chat  { message } -> { response }
 *   GET  /api/health            static status
 *   GET  /                      liveness banner
 */

import express, { type ErrorRequestHandler, type Express } from 'express';
import type { Server } from 'http';
import type { ZodError } from 'zod';
import { ChatRequestSchema } from '../models/api-types.js';
import type { QueryOrchestrator } from '../services/QueryOrchestrator.js';
import type { HealthChecker } from '../services/HealthChecker.js';
import { errorMessage } from '../lib/errors/UpstreamErrors.js';
import { Logger, logger as defaultLogger } from '../cli/utils/logger.js';

export const ROOT_MESSAGE = 'Textbook tutor backend active';

/**
 * Minimal response surface the handlers write to (express.Response fits)
 */
export interface JsonReply {
  status(code: number): JsonReply;
  json(body: unknown): unknown;
}

export interface CorsTarget {
  setHeader(name: string, value: string): unknown;
  status(code: number): { end(): unknown };
}

export type ChatAnswerer = Pick<QueryOrchestrator, 'answer'>;
export type HealthReporter = Pick<HealthChecker, 'apiStatus'>;

export interface HttpServerDeps {
  orchestrator: ChatAnswerer;
  healthChecker: HealthReporter;
  corsOrigin: string;
  logger?: Logger;
}

/**
 * "message: Required; other: Expected string, received number"
 */
export function formatValidationIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}

/**
 * Set CORS headers; answers preflight requests
 *
 * @returns true when the request was fully handled
 */
export function applyCors(origin: string, method: string, res: CorsTarget): boolean {
  res.setHeader('Access-Control-Allow-Origin', origin);
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

  if (method === 'OPTIONS') {
    res.status(204).end();
    return true;
  }
  return false;
}

export async function handleChat(orchestrator: ChatAnswerer, body: unknown, reply: JsonReply): Promise<void> {
  const parsed = ChatRequestSchema.safeParse(body);
  if (!parsed.success) {
    reply.status(422).json({ detail: formatValidationIssues(parsed.error) });
    return;
  }

  const result = await orchestrator.answer(parsed.data.message);
  reply.status(200).json(result);
}

/**
 * 4xx status carried by a body-parser error (413 too large, 415 charset, ...)
 */
export function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function handleRequestError(
  error: unknown,
  request: { method: string; path: string },
  reply: JsonReply,
  logger: Logger
): void {
  if (error instanceof SyntaxError) {
    reply.status(422).json({ detail: 'body: Malformed JSON' });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    logger.warn('Rejected request', { ...request, status, error: errorMessage(error) });
    reply.status(status).json({ detail: errorMessage(error) });
    return;
  }

  logger.error('Unhandled request error', error, request);
  reply.status(500).json({ detail: 'Internal server error' });
}

export function handleHealth(healthChecker: HealthReporter, reply: JsonReply): void {
  reply.status(200).json(healthChecker.apiStatus());
}

/**
 * Build the express application
 */
export function createApp(deps: HttpServerDeps): Express {
  const logger = deps.logger ?? defaultLogger;
  const app = express();

  app.use((req, res, next) => {
    if (!applyCors(deps.corsOrigin, req.method, res)) {
      next();
    }
  });
  app.use(express.json());

  app.post(['/api/chat', '/chat'], (req, res, next) => {
    handleChat(deps.orchestrator, req.body, res).catch(next);
  });

  app.get('/api/health', (_req, res) => {
    handleHealth(deps.healthChecker, res);
  });

  app.get('/', (_req, res) => {
    res.json({ message: ROOT_MESSAGE });
  });

  // Body parser failures and anything a handler let escape
  const onError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    handleRequestError(error, { method: req.method, path: req.path }, res, logger);
  };
  app.use(onError);

  return app;
}

/**
 * Listen on the given port
 *
 * @returns The listening server once it accepts connections
 */
export function startServer(app: Express, port: number, logger: Logger = defaultLogger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      logger.info('HTTP server listening', { port });
      resolve(server);
    });
    server.once('error', reject);
  });
}

/**
 * Stop accepting connections and wait for open ones to finish
 */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
