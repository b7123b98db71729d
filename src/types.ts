/**
 * Session Relay Types
 *
 * Wire schemas for the client-facing chat-completion interface and the
 * internal shapes that flow between the relay components.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// Inbound Messages
// ============================================================================

/**
 * Roles accepted in an inbound message list.
 */
export const MessageRoles = ['system', 'user', 'assistant'] as const;

export type MessageRole = (typeof MessageRoles)[number];

/**
 * One part of a multi-part message. Only `text` parts carry content the
 * relay can forward; image parts are accepted and dropped.
 */
export const ContentPartSchema = z.object({
  type: z.enum(['text', 'image_url']),
  text: z.string().optional(),
  image_url: z.record(z.string(), z.unknown()).optional(),
});

export type ContentPart = z.infer<typeof ContentPartSchema>;

export const ChatMessageSchema = z.object({
  role: z.enum(MessageRoles),
  content: z.union([z.string(), z.array(ContentPartSchema)]),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/**
 * Body of `POST /v1/chat/completions`.
 *
 * Sampling parameters are accepted for client compatibility; neither
 * backend exposes them, so they are ignored.
 */
export const ChatCompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema),
  stream: z.boolean().optional(),
  temperature: z.number().optional(),
  top_p: z.number().optional(),
  max_tokens: z.number().int().optional(),
  max_length: z.number().int().optional(),
});

export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;

// ============================================================================
// Normalized Request
// ============================================================================

/**
 * One earlier exchange, always user first.
 */
export interface HistoryPair {
  user: string;
  assistant: string;
}

/**
 * The flattened form of an inbound message list.
 */
export interface NormalizedRequest {
  /** Final user text, with the system prompt merged in when present. */
  query: string;
  /** Aligned user/assistant pairs in their original order. */
  history: HistoryPair[];
}

// ============================================================================
// Upstream
// ============================================================================

export const BackendKinds = ['agent', 'credential'] as const;

export type BackendKind = (typeof BackendKinds)[number];

/**
 * An upstream conversation handle, valid for one relay request.
 */
export interface UpstreamSession {
  id: string;
  backendKind: BackendKind;
  createdAt: number;
}

export type StreamChannel = 'reasoning' | 'answer';

/**
 * One text fragment produced by a backend, tagged by channel.
 */
export interface StreamEvent {
  channel: StreamChannel;
  text: string;
}

/**
 * Result of a non-streaming query.
 */
export interface BatchAnswer {
  answer: string;
  reasoning: string;
}

// ============================================================================
// Outbound
// ============================================================================

export type ChunkDelta = { content: string } | { reasoningContent: string } | Record<string, never>;

/**
 * One outbound streaming unit before wire rendering.
 */
export interface OutboundChunk {
  delta: ChunkDelta;
  finishReason?: 'stop';
}

export interface ChatCompletion {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: 'assistant';
      content: string;
      reasoning_content: string;
    };
    finish_reason: 'stop';
  }>;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: {
      content?: string;
      reasoning_content?: string;
    };
    finish_reason: 'stop' | null;
  }>;
}

export interface ModelCard {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
}

export interface ModelList {
  object: 'list';
  data: ModelCard[];
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Counts tokens in finished text.
 */
export type TokenCounter = (text: string) => number;

/**
 * One finished request, as reported to a stats sink.
 */
export interface UsageRecord {
  model: string;
  promptTokens: number;
  completionTokens: number;
  latencyMs: number;
  stream: boolean;
  success: boolean;
  timestamp: number;
}

export interface StatsSink {
  record(record: UsageRecord): void;
}

/**
 * Identity collaborator used by the credential backend.
 */
export interface Authenticator {
  login(): Promise<string>;
  isExpired(token: string): boolean;
}
