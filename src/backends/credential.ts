/**
 * Credential-based backend.
 *
 * Every call carries a token obtained from an external login handshake. A
 * 401/403 from the backend means the token is no longer accepted: the
 * adapter refreshes it once through the shared TokenCache and retries once.
 * After `init`, a periodic create/delete round trip keeps the login warm.
 *
 * @packageDocumentation
 */

import { customAlphabet } from 'nanoid';
import { z } from 'zod';
import { UpstreamUnavailableError, errorMessage } from '../errors.js';
import { type Logger, defaultLogger } from '../logger.js';
import { createThinkTagClassifier, demultiplex, readBody } from '../stream/demux.js';
import type { Authenticator, BatchAnswer, StreamEvent, UpstreamSession } from '../types.js';
import { ensureOk, joinUrl, readJson, sendJson } from './http.js';
import { TokenCache } from './token-cache.js';
import { type ChatBackend, type FetchFn, collectAnswer } from './types.js';

export const DEFAULT_CREDENTIAL_BASE_URL = 'https://ibit.yanhekt.cn';
export const DEFAULT_ASSISTANT_ID = 43;
export const DEFAULT_KEEP_ALIVE_INTERVAL_MS = 60_000;

const titleSuffix = customAlphabet('0123456789abcdef', 4);

export interface CredentialBackendOptions {
  /** Used to build a private TokenCache when `tokenCache` is not given */
  authenticator?: Authenticator;
  /** Share one cache between backends talking to the same identity */
  tokenCache?: TokenCache;
  baseUrl?: string;
  assistantId?: number;
  fetch?: FetchFn;
  logger?: Logger;
  /** Interval of the login check started by `init`; 0 disables it */
  keepAliveIntervalMs?: number;
}

const CreateDialogueResponseSchema = z.object({
  data: z.object({
    id: z.union([z.number(), z.string().min(1)]),
  }),
});

const DeleteDialogueResponseSchema = z.object({
  data: z.object({
    success: z.boolean(),
  }),
});

/** Thrown when the backend refuses the token. */
class TokenRejectedError extends Error {
  constructor(readonly status: number) {
    super(`Credential token rejected with status ${status}`);
    this.name = 'TokenRejectedError';
  }
}

function isTokenRejection(response: Response): boolean {
  return response.status === 401 || response.status === 403;
}

/** Numeric dialogue ids go back upstream as numbers. */
function toWireId(id: string): string | number {
  return /^\d+$/.test(id) ? Number(id) : id;
}

export class CredentialBackend implements ChatBackend {
  readonly kind = 'credential' as const;

  private readonly tokens: TokenCache;
  private readonly baseUrl: string;
  private readonly assistantId: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly keepAliveIntervalMs: number;
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
  private checking = false;

  constructor(opts: CredentialBackendOptions) {
    this.logger = opts.logger ?? defaultLogger;
    if (opts.tokenCache) {
      this.tokens = opts.tokenCache;
    } else if (opts.authenticator) {
      this.tokens = new TokenCache(opts.authenticator, this.logger);
    } else {
      throw new Error('CredentialBackend requires an authenticator or a token cache');
    }
    this.baseUrl = opts.baseUrl ?? DEFAULT_CREDENTIAL_BASE_URL;
    this.assistantId = opts.assistantId ?? DEFAULT_ASSISTANT_ID;
    this.fetchFn = opts.fetch ?? fetch;
    this.keepAliveIntervalMs = opts.keepAliveIntervalMs ?? DEFAULT_KEEP_ALIVE_INTERVAL_MS;
  }

  /**
   * Log in and verify the token with one round trip, then start the
   * keep-alive. Fails when the backend cannot be used at all.
   */
  async init(signal?: AbortSignal): Promise<void> {
    await this.checkLogin(signal);
    this.startKeepAlive();
  }

  close(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  /**
   * Create and delete a throwaway dialogue. A rejected token is refreshed on
   * the way, so this also re-logs in when the session went stale.
   */
  async checkLogin(signal?: AbortSignal): Promise<void> {
    const session = await this.create(signal);
    await this.destroy(session);
  }

  private startKeepAlive(): void {
    if (this.keepAliveIntervalMs <= 0 || this.keepAliveTimer) return;
    this.keepAliveTimer = setInterval(() => {
      void this.keepAliveTick();
    }, this.keepAliveIntervalMs);
    this.keepAliveTimer.unref();
  }

  private async keepAliveTick(): Promise<void> {
    if (this.checking) return;
    this.checking = true;
    try {
      await this.checkLogin();
    } catch (err) {
      this.logger.warn(`Credential keep-alive failed: ${errorMessage(err)}`);
    } finally {
      this.checking = false;
    }
  }

  async create(signal?: AbortSignal): Promise<UpstreamSession> {
    const response = await this.withToken((token) =>
      this.send(token, 'POST', '/proxy/v1/dialogue', {
        assistant_id: this.assistantId,
        title: `[relay]${Date.now()}-${titleSuffix()}`,
      }, signal),
    );
    await ensureOk(response, 'create dialogue');
    const data = await readJson(response, CreateDialogueResponseSchema, 'create dialogue');
    return { id: String(data.data.id), backendKind: this.kind, createdAt: Date.now() };
  }

  queryBatch(session: UpstreamSession, text: string, signal?: AbortSignal): Promise<BatchAnswer> {
    return collectAnswer(this.queryStream(session, text, signal));
  }

  async *queryStream(session: UpstreamSession, text: string, signal?: AbortSignal): AsyncGenerator<StreamEvent> {
    const response = await this.withToken((token) =>
      this.send(token, 'POST', '/proxy/v1/chat/stream/private/kb', {
        query: text,
        dialogue_id: toWireId(session.id),
        stream: true,
        history: [],
        temperature: 0.7,
        top_k: 3,
        score_threshold: 0.5,
        prompt_name: '',
        knowledge_base_name: '',
      }, signal),
    );
    await ensureOk(response, 'chat query');
    yield* demultiplex(readBody(response, signal), createThinkTagClassifier());
  }

  async destroy(session: UpstreamSession): Promise<void> {
    const response = await this.withToken((token) =>
      this.send(token, 'DELETE', '/proxy/v1/dialogue', { ids: [toWireId(session.id)] }),
    );
    await ensureOk(response, 'delete dialogue');
    const data = await readJson(response, DeleteDialogueResponseSchema, 'delete dialogue');
    if (!data.data.success) {
      throw new UpstreamUnavailableError(`Backend refused to delete dialogue ${session.id}`);
    }
  }

  /**
   * Run `call` with the cached token; on rejection refresh once and retry.
   */
  private async withToken(call: (token: string) => Promise<Response>): Promise<Response> {
    const token = await this.tokens.get();
    try {
      return await this.attempt(call, token);
    } catch (err) {
      if (!(err instanceof TokenRejectedError)) throw err;
      this.logger.warn(`${err.message}, logging in again`);
    }

    const fresh = await this.tokens.refresh(token);
    try {
      return await this.attempt(call, fresh);
    } catch (err) {
      if (err instanceof TokenRejectedError) {
        throw new UpstreamUnavailableError(`Credential backend still rejects the token after re-login (status ${err.status})`);
      }
      throw err;
    }
  }

  private async attempt(call: (token: string) => Promise<Response>, token: string): Promise<Response> {
    const response = await call(token);
    if (isTokenRejection(response)) {
      await response.body?.cancel();
      throw new TokenRejectedError(response.status);
    }
    return response;
  }

  private send(
    token: string,
    method: 'POST' | 'DELETE',
    path: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<Response> {
    return sendJson(this.fetchFn, joinUrl(this.baseUrl, path), {
      method,
      headers: this.headers(token),
      body,
      signal,
    });
  }

  private headers(token: string): Record<string, string> {
    return {
      'Accept': '*/*',
      'Content-Type': 'application/json',
      'Origin': this.baseUrl,
      'badge': encodeURIComponent(token),
      'Cookie': `badge_2=${token}`,
      'Xdomain-Client': 'web_user',
      'x-assistant-id': String(this.assistantId),
    };
  }
}
