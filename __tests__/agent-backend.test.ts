/**
 * Agent backend against an in-process stand-in for the upstream.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import type * as http from 'node:http';
import { AgentBackend } from '../src/backends/agent.js';
import { UpstreamUnavailableError } from '../src/errors.js';
import { type Logger, silentLogger } from '../src/logger.js';
import type { StreamEvent, UpstreamSession } from '../src/types.js';
import { type MockServer, closeServer, createMockServer, readBody, sendJson } from './helpers/mock-server.js';

interface SeenRequest {
  url: string;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

let upstream: MockServer;
let seen: SeenRequest[] = [];
let createStatus = 200;
/** Replaces the scripted event stream when set */
let queryReply: string | null = null;
let conversationList: unknown[] | null = [];
const undeletable = new Set<string>();

const STREAM_PIECES = [
  'data: {"event":"think_message","answer":"Thinking"}\n\ndata: {"event":"think_',
  'message","answer":" hard"}\n\n',
  'data: {"event":"message","answer":"Forty"}\n\ndata: {"event":"message","answer":"-two"}\n\n',
  'data: {"event":"message_end"}\n\n',
];

beforeAll(async () => {
  upstream = await createMockServer(async (req, res) => {
    const raw = await readBody(req);
    seen.push({ url: req.url ?? '', headers: req.headers, body: raw ? JSON.parse(raw) : null });

    switch (req.url) {
      case '/api/proxy/chat/v2/create_conversation':
        if (createStatus !== 200) {
          sendJson(res, createStatus, { message: 'unavailable' });
          return;
        }
        sendJson(res, 200, { Conversation: { AppConversationID: 'conv-42' } });
        return;
      case '/api/proxy/chat/v2/chat_query':
        if (queryReply !== null) {
          res.writeHead(200, { 'Content-Type': 'text/html' });
          res.end(queryReply);
          return;
        }
        res.writeHead(200, { 'Content-Type': 'text/event-stream' });
        for (const piece of STREAM_PIECES) res.write(piece);
        res.end();
        return;
      case '/api/proxy/chat/v2/delete_conversation': {
        const id: unknown = raw ? JSON.parse(raw).AppConversationID : undefined;
        sendJson(res, typeof id === 'string' && undeletable.has(id) ? 500 : 200, {});
        return;
      }
      case '/api/proxy/chat/v2/get_conversation_list':
        sendJson(res, 200, { ConversationList: conversationList });
        return;
      default:
        sendJson(res, 404, {});
    }
  });
});

afterAll(async () => {
  await closeServer(upstream.server);
});

beforeEach(() => {
  seen = [];
  createStatus = 200;
  queryReply = null;
  conversationList = [];
  undeletable.clear();
});

function backend(logger: Logger = silentLogger): AgentBackend {
  return new AgentBackend({ appKey: 'test-app-key', visitorKey: 'test-visitor', baseUrl: `${upstream.url}/`, logger });
}

const SESSION: UpstreamSession = { id: 'conv-42', backendKind: 'agent', createdAt: 0 };

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('AgentBackend', () => {
  it('creates a conversation with the application key', async () => {
    const session = await backend().create();

    expect(session).toEqual({ id: 'conv-42', backendKind: 'agent', createdAt: expect.any(Number) });
    expect(seen[0]?.body).toEqual({ AppKey: 'test-app-key', Inputs: {} });
    expect(seen[0]?.headers['app-visitor-key']).toBe('test-visitor');
    expect(seen[0]?.headers['cookie']).toBe('app-visitor-key=test-visitor');
  });

  it('refuses to create without keys', async () => {
    const unconfigured = new AgentBackend({ appKey: '', visitorKey: 'v', baseUrl: upstream.url });
    await expect(unconfigured.create()).rejects.toThrow('Agent backend credentials are not configured');
    expect(seen).toHaveLength(0);
  });

  it('reports a failed create as upstream unavailable', async () => {
    createStatus = 503;
    const err = await backend().create().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toHaveProperty('message', 'Upstream create_conversation failed with status 503');
  });

  it('streams events tagged by the record discriminator', async () => {
    const events = await collect(backend().queryStream(SESSION, 'what is six times seven?'));

    expect(events).toEqual([
      { channel: 'reasoning', text: 'Thinking' },
      { channel: 'reasoning', text: ' hard' },
      { channel: 'answer', text: 'Forty' },
      { channel: 'answer', text: '-two' },
    ]);
    expect(seen[0]?.body).toEqual({
      Query: 'what is six times seven?',
      AppConversationID: 'conv-42',
      AppKey: 'test-app-key',
      QueryExtends: { Files: [] },
    });
  });

  it('collects a batch answer', async () => {
    expect(await backend().queryBatch(SESSION, 'q')).toEqual({ answer: 'Forty-two', reasoning: 'Thinking hard' });
  });

  it('deletes the conversation', async () => {
    await backend().destroy(SESSION);
    expect(seen[0]?.url).toBe('/api/proxy/chat/v2/delete_conversation');
    expect(seen[0]?.body).toEqual({ AppKey: 'test-app-key', AppConversationID: 'conv-42' });
  });

  it('rethrows the abort when the caller cancels', async () => {
    const controller = new AbortController();
    controller.abort();
    const err = await backend().create(controller.signal).catch((e: unknown) => e);
    expect(err).not.toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toHaveProperty('name', 'AbortError');
  });
});

describe('AgentBackend unusable replies', () => {
  it('rejects a 200 reply that carries no event records', async () => {
    queryReply = '<html>gateway maintenance</html>';
    const err = await backend().queryBatch(SESSION, 'q').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toHaveProperty('message', 'Upstream returned no usable response');
  });
});

describe('AgentBackend startup sweep', () => {
  it('deletes every leftover conversation', async () => {
    conversationList = [{ AppConversationID: 'old-1' }, { AppConversationID: 'old-2' }, { Title: 'no id' }];

    expect(await backend().clearConversations()).toBe(2);

    expect(seen.map((r) => r.url)).toEqual([
      '/api/proxy/chat/v2/get_conversation_list',
      '/api/proxy/chat/v2/delete_conversation',
      '/api/proxy/chat/v2/delete_conversation',
    ]);
    expect(seen[0]?.body).toEqual({ AppKey: 'test-app-key' });
    expect(seen.slice(1).map((r) => r.body)).toEqual([
      { AppKey: 'test-app-key', AppConversationID: 'old-1' },
      { AppKey: 'test-app-key', AppConversationID: 'old-2' },
    ]);
  });

  it('keeps going past a conversation it cannot delete', async () => {
    conversationList = [{ AppConversationID: 'stuck' }, { AppConversationID: 'old-2' }];
    undeletable.add('stuck');
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await backend(logger).init();

    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to delete leftover conversation stuck: Upstream delete_conversation failed with status 500',
    );
    expect(logger.info).toHaveBeenCalledWith('Agent backend: cleared 1 leftover conversation(s)');
  });

  it('treats a null list as empty', async () => {
    conversationList = null;
    expect(await backend().clearConversations()).toBe(0);
    expect(seen).toHaveLength(1);
  });
});
