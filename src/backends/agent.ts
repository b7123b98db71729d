/**
 * Key-based agent backend.
 *
 * Authenticates every call with a static application key and visitor key;
 * there is no login step. Each capability maps to one upstream call.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { UpstreamUnavailableError, errorMessage } from '../errors.js';
import { type Logger, defaultLogger } from '../logger.js';
import { classifyAgentRecord, demultiplex, readBody } from '../stream/demux.js';
import type { BatchAnswer, StreamEvent, UpstreamSession } from '../types.js';
import { ensureOk, joinUrl, readJson, sendJson } from './http.js';
import { type ChatBackend, type FetchFn, collectAnswer } from './types.js';

export const DEFAULT_AGENT_BASE_URL = 'https://agent.bit.edu.cn';

export interface AgentBackendOptions {
  appKey: string;
  visitorKey: string;
  baseUrl?: string;
  fetch?: FetchFn;
  logger?: Logger;
}

const CreateConversationResponseSchema = z.object({
  Conversation: z.object({
    AppConversationID: z.string().min(1),
  }),
});

const ConversationListResponseSchema = z.object({
  ConversationList: z
    .array(z.object({ AppConversationID: z.string().optional() }).passthrough())
    .nullish()
    .transform((list) => list ?? []),
});

export class AgentBackend implements ChatBackend {
  readonly kind = 'agent' as const;

  private readonly appKey: string;
  private readonly visitorKey: string;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(opts: AgentBackendOptions) {
    this.appKey = opts.appKey;
    this.visitorKey = opts.visitorKey;
    this.baseUrl = opts.baseUrl ?? DEFAULT_AGENT_BASE_URL;
    this.fetchFn = opts.fetch ?? fetch;
    this.logger = opts.logger ?? defaultLogger;
  }

  /**
   * Delete conversations left over from earlier runs, such as sessions whose
   * teardown was abandoned at the deadline.
   */
  async init(signal?: AbortSignal): Promise<void> {
    const cleared = await this.clearConversations(signal);
    this.logger.info(`Agent backend: cleared ${cleared} leftover conversation(s)`);
  }

  /**
   * Delete every conversation the upstream lists for this key. Returns the
   * number deleted; individual failures are logged and skipped.
   */
  async clearConversations(signal?: AbortSignal): Promise<number> {
    const ids = await this.listConversations(signal);
    let cleared = 0;
    for (const id of ids) {
      try {
        await this.destroy({ id, backendKind: this.kind, createdAt: Date.now() });
        cleared++;
      } catch (err) {
        this.logger.warn(`Failed to delete leftover conversation ${id}: ${errorMessage(err)}`);
      }
    }
    return cleared;
  }

  async listConversations(signal?: AbortSignal): Promise<string[]> {
    const response = await sendJson(this.fetchFn, this.url('/api/proxy/chat/v2/get_conversation_list'), {
      method: 'POST',
      headers: this.headers(),
      body: { AppKey: this.appKey },
      signal,
    });
    await ensureOk(response, 'get_conversation_list');
    const data = await readJson(response, ConversationListResponseSchema, 'get_conversation_list');
    const ids: string[] = [];
    for (const conversation of data.ConversationList) {
      if (conversation.AppConversationID) ids.push(conversation.AppConversationID);
    }
    return ids;
  }

  async create(signal?: AbortSignal): Promise<UpstreamSession> {
    if (!this.appKey || !this.visitorKey) {
      throw new UpstreamUnavailableError('Agent backend credentials are not configured');
    }
    const response = await sendJson(this.fetchFn, this.url('/api/proxy/chat/v2/create_conversation'), {
      method: 'POST',
      headers: this.headers(),
      body: { AppKey: this.appKey, Inputs: {} },
      signal,
    });
    await ensureOk(response, 'create_conversation');
    const data = await readJson(response, CreateConversationResponseSchema, 'create_conversation');
    return { id: data.Conversation.AppConversationID, backendKind: this.kind, createdAt: Date.now() };
  }

  queryBatch(session: UpstreamSession, text: string, signal?: AbortSignal): Promise<BatchAnswer> {
    return collectAnswer(this.queryStream(session, text, signal));
  }

  async *queryStream(session: UpstreamSession, text: string, signal?: AbortSignal): AsyncGenerator<StreamEvent> {
    const response = await sendJson(this.fetchFn, this.url('/api/proxy/chat/v2/chat_query'), {
      method: 'POST',
      headers: this.headers(),
      body: {
        Query: text,
        AppConversationID: session.id,
        AppKey: this.appKey,
        QueryExtends: { Files: [] },
      },
      signal,
    });
    await ensureOk(response, 'chat_query');
    yield* demultiplex(readBody(response, signal), classifyAgentRecord);
  }

  async destroy(session: UpstreamSession): Promise<void> {
    const response = await sendJson(this.fetchFn, this.url('/api/proxy/chat/v2/delete_conversation'), {
      method: 'POST',
      headers: this.headers(),
      body: { AppKey: this.appKey, AppConversationID: session.id },
    });
    await ensureOk(response, 'delete_conversation');
  }

  private url(path: string): string {
    return joinUrl(this.baseUrl, path);
  }

  private headers(): Record<string, string> {
    return {
      'Accept': 'application/json, text/event-stream',
      'Content-Type': 'application/json; charset=utf-8',
      'Origin': this.baseUrl,
      'accept-language': 'zh',
      'app-visitor-key': this.visitorKey,
      'Cookie': `app-visitor-key=${this.visitorKey}`,
    };
  }
}
