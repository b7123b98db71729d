/**
 * Session Relay HTTP Server
 *
 * OpenAI-compatible front end for the relay.
 *
 * Features:
 * - `POST /v1/chat/completions` (batch JSON or server-sent events)
 * - `GET /v1/models`
 * - `GET /health` with request statistics
 * - Permissive CORS for browser clients
 * - Uniform `{ error: { message, type } }` envelopes
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import { once } from 'node:events';
import { NotFoundError, ValidationError, errorMessage, toErrorEnvelope } from './errors.js';
import { type Logger, defaultLogger } from './logger.js';
import type { ChatRelay, RecordWriter } from './relay.js';
import type { StatsCollector } from './stats.js';
import { SSE_DONE, encodeSseRecord } from './synthesizer.js';

export interface RelayServerOptions {
  logger?: Logger;
  /** Reported by the health endpoint when given */
  stats?: StatsCollector;
}

export interface ListenOptions {
  port?: number;
  host?: string;
}

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
};

const MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB max request body

const startTime = Date.now();

// Decode once at the end: a chunk may end inside a multi-byte character
async function readRequestBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_SIZE) {
      throw new ValidationError('Request body too large (max 10MB)');
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const body = await readRequestBody(req);
  try {
    return JSON.parse(body) as unknown;
  } catch {
    throw new ValidationError('Invalid JSON');
  }
}

function sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

function sendError(res: http.ServerResponse, err: unknown): void {
  const { status, body } = toErrorEnvelope(err);
  sendJson(res, status, body);
}

/**
 * Create (but do not start) the relay HTTP server.
 */
export function createRelayServer(relay: ChatRelay, opts: RelayServerOptions = {}): http.Server {
  const logger = opts.logger ?? defaultLogger;

  const handleChatCompletion = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    relay.authorize(req.headers['authorization']);
    const prepared = relay.prepare(await readJsonBody(req));

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    if (!prepared.stream) {
      const completion = await relay.complete(prepared, controller.signal);
      sendJson(res, 200, completion);
      return;
    }

    const write: RecordWriter = async (record) => {
      if (controller.signal.aborted) throw new Error('Client disconnected');
      if (!res.headersSent) res.writeHead(200, SSE_HEADERS);
      if (!res.write(record)) {
        await once(res, 'drain', { signal: controller.signal });
      }
    };

    try {
      await relay.stream(prepared, write, controller.signal);
      res.end();
    } catch (err) {
      if (controller.signal.aborted) {
        logger.info(`Client disconnected during ${prepared.model} stream`);
        return;
      }
      if (!res.headersSent) throw err;
      logger.error(`Stream failed for ${prepared.model}: ${errorMessage(err)}`);
      res.write(encodeSseRecord(toErrorEnvelope(err).body));
      res.end(SSE_DONE);
    }
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = (req.url ?? '').split('?')[0] ?? '';

    if (req.method === 'GET' && (pathname === '/health' || pathname === '/healthz')) {
      sendJson(res, 200, {
        status: 'ok',
        uptime: Math.floor((Date.now() - startTime) / 1000),
        models: relay.modelIds,
        stats: opts.stats?.getStats() ?? null,
      });
      return;
    }

    if (req.method === 'GET' && (pathname === '/v1/models' || pathname === '/models')) {
      relay.authorize(req.headers['authorization']);
      sendJson(res, 200, relay.listModels());
      return;
    }

    if (req.method === 'POST' && (pathname === '/v1/chat/completions' || pathname === '/chat/completions')) {
      await handleChatCompletion(req, res);
      return;
    }

    throw new NotFoundError(`No route for ${req.method ?? 'GET'} ${pathname}`);
  };

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      const { status } = toErrorEnvelope(err);
      if (status >= 500) logger.error(`Request failed: ${errorMessage(err)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      sendError(res, err);
    });
  });
}

/**
 * Create the server and wait until it is listening.
 */
export function startServer(relay: ChatRelay, opts: RelayServerOptions & ListenOptions = {}): Promise<http.Server> {
  const port = opts.port ?? 8000;
  const host = opts.host ?? '0.0.0.0';
  const logger = opts.logger ?? defaultLogger;
  const server = createRelayServer(relay, opts);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      logger.info(`Listening on http://${host}:${port} (models: ${relay.modelIds.join(', ')})`);
      resolve(server);
    });
  });
}
