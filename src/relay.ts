/**
 * Relay Orchestrator
 *
 * Composes the relay per inbound request: bearer check, normalization, model
 * resolution, one scoped upstream session around a batch or streaming query,
 * and synthesis of the client-facing response.
 *
 * @example
 * ```typescript
 * const relay = new ChatRelay({
 *   models: [{ id: 'deepseek-r1', backend: new AgentBackend({ appKey, visitorKey }) }],
 * });
 * relay.authorize(req.headers.authorization);
 * const prepared = relay.prepare(body);
 * const completion = await relay.complete(prepared);
 * ```
 *
 * @packageDocumentation
 */

import { type ChatBackend, requireEvents } from './backends/types.js';
import { AuthError, ValidationError, errorMessage } from './errors.js';
import { composeQuery } from './history.js';
import { type Logger, defaultLogger } from './logger.js';
import { normalizeMessages } from './normalizer.js';
import { type RelayOptions, resolveRelayOptions } from './relay-config.js';
import { type SessionOptions, withSession } from './session.js';
import { estimateTokens } from './stats.js';
import { pipeThroughChannel } from './stream/channel.js';
import { buildCompletion, createCompletionMeta, renderSseStream } from './synthesizer.js';
import {
  ChatCompletionRequestSchema,
  type ChatCompletion,
  type ModelList,
  type NormalizedRequest,
  type StatsSink,
  type StreamEvent,
  type TokenCounter,
} from './types.js';

/**
 * A client-visible model name bound to the backend that serves it.
 */
export interface ModelBinding {
  id: string;
  backend: ChatBackend;
  ownedBy?: string;
}

export interface ChatRelayOptions {
  models: ModelBinding[];
  /** When set, requests must carry `Authorization: Bearer <apiKey>` */
  apiKey?: string;
  logger?: Logger;
  stats?: StatsSink;
  tokenCounter?: TokenCounter;
  /** Log every request and response */
  verbose?: boolean;
  options?: Partial<RelayOptions>;
}

export interface PreparedRequest {
  model: string;
  backend: ChatBackend;
  normalized: NormalizedRequest;
  /** The full single-shot upstream payload */
  prompt: string;
  stream: boolean;
}

/**
 * Receives outbound event-stream records. The returned promise resolves once
 * the client can take more, which is how backpressure reaches the upstream.
 */
export type RecordWriter = (record: string) => Promise<void>;

export class ChatRelay {
  private readonly models: Map<string, ModelBinding>;
  private readonly apiKey: string | undefined;
  private readonly logger: Logger;
  private readonly stats: StatsSink | undefined;
  private readonly countTokens: TokenCounter;
  private readonly verbose: boolean;
  private readonly options: RelayOptions;

  constructor(opts: ChatRelayOptions) {
    this.models = new Map(opts.models.map((binding) => [binding.id, binding]));
    this.apiKey = opts.apiKey || undefined;
    this.logger = opts.logger ?? defaultLogger;
    this.stats = opts.stats;
    this.countTokens = opts.tokenCounter ?? estimateTokens;
    this.verbose = opts.verbose ?? false;
    this.options = resolveRelayOptions(opts.options);
  }

  get modelIds(): string[] {
    return [...this.models.keys()];
  }

  /**
   * Run each backend's startup housekeeping once, before serving.
   */
  async init(signal?: AbortSignal): Promise<void> {
    for (const backend of this.backends()) {
      await backend.init?.(signal);
    }
  }

  /** Stop backend background work. */
  close(): void {
    for (const backend of this.backends()) {
      backend.close?.();
    }
  }

  authorize(header: string | undefined): void {
    if (!this.apiKey) return;
    if (header !== `Bearer ${this.apiKey}`) {
      throw new AuthError();
    }
  }

  listModels(now: number = Date.now()): ModelList {
    const created = Math.floor(now / 1000);
    return {
      object: 'list',
      data: [...this.models.values()].map((binding) => ({
        id: binding.id,
        object: 'model',
        created,
        owned_by: binding.ownedBy ?? this.options.ownedBy,
      })),
    };
  }

  /**
   * Validate and normalize a request body. Never touches the network.
   */
  prepare(body: unknown): PreparedRequest {
    const parsed = ChatCompletionRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ValidationError(`Invalid request${where}: ${issue?.message ?? 'malformed body'}`);
    }
    const request = parsed.data;

    const normalized = normalizeMessages(request.messages);

    const binding = this.models.get(request.model);
    if (!binding) {
      throw new ValidationError(
        `Model ${request.model} not supported, supported models: ${this.modelIds.join(', ')}`,
      );
    }

    return {
      model: binding.id,
      backend: binding.backend,
      normalized,
      prompt: composeQuery(normalized),
      stream: request.stream ?? false,
    };
  }

  async complete(req: PreparedRequest, signal?: AbortSignal): Promise<ChatCompletion> {
    const startTime = Date.now();
    this.logRequest(req);

    let produced = '';
    let success = false;
    try {
      const answer = await withSession(
        req.backend,
        (session) => req.backend.queryBatch(session, req.prompt, signal),
        this.sessionOptions(signal),
      );
      produced = answer.reasoning + answer.answer;
      success = true;
      if (this.verbose) this.logger.info(`Response (${req.model}): ${answer.answer.trim()}`);
      return buildCompletion(answer, createCompletionMeta(req.model));
    } finally {
      this.recordUsage(req, produced, startTime, success);
    }
  }

  /**
   * Stream the completion as event-stream records through `write`. The
   * upstream is read by a separate task into a bounded channel; the writer
   * side drains it at the client's pace.
   */
  async stream(req: PreparedRequest, write: RecordWriter, signal?: AbortSignal): Promise<void> {
    const startTime = Date.now();
    this.logRequest(req);

    let produced = '';
    let success = false;
    try {
      await withSession(
        req.backend,
        async (session) => {
          const events = pipeThroughChannel(
            requireEvents(req.backend.queryStream(session, req.prompt, signal)),
            this.options.channelCapacity,
          );
          const meta = createCompletionMeta(req.model);
          for await (const record of renderSseStream(tap(events, (e) => (produced += e.text)), meta)) {
            await write(record);
          }
        },
        this.sessionOptions(signal),
      );
      success = true;
    } finally {
      this.recordUsage(req, produced, startTime, success);
    }
  }

  private backends(): Set<ChatBackend> {
    return new Set([...this.models.values()].map((binding) => binding.backend));
  }

  private sessionOptions(signal?: AbortSignal): SessionOptions {
    return { logger: this.logger, teardownTimeoutMs: this.options.teardownTimeoutMs, signal };
  }

  private logRequest(req: PreparedRequest): void {
    if (!this.verbose) return;
    this.logger.info(
      `Query (${req.model}, stream=${req.stream}, history=${req.normalized.history.length}): ${req.normalized.query}`,
    );
  }

  private recordUsage(req: PreparedRequest, produced: string, startTime: number, success: boolean): void {
    if (!this.stats) return;
    try {
      this.stats.record({
        model: req.model,
        promptTokens: this.countTokens(req.prompt),
        completionTokens: this.countTokens(produced),
        latencyMs: Date.now() - startTime,
        stream: req.stream,
        success,
        timestamp: startTime,
      });
    } catch (err) {
      this.logger.warn(`Failed to record usage: ${errorMessage(err)}`);
    }
  }
}

async function* tap(
  events: AsyncIterable<StreamEvent>,
  observe: (event: StreamEvent) => void,
): AsyncGenerator<StreamEvent, void, undefined> {
  for await (const event of events) {
    observe(event);
    yield event;
  }
}
