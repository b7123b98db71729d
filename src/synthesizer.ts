/**
 * Response Synthesizer
 *
 * Turns demultiplexed fragments into OpenAI-style completion objects
 * (batch) or `chat.completion.chunk` event-stream records (streaming).
 *
 * @packageDocumentation
 */

import { nanoid } from 'nanoid';
import type {
  BatchAnswer,
  ChatCompletion,
  ChatCompletionChunk,
  OutboundChunk,
  StreamEvent,
} from './types.js';

export const SSE_DONE = 'data: [DONE]\n\n';

export interface CompletionMeta {
  id: string;
  model: string;
  created: number;
}

export function createCompletionMeta(model: string, now: number = Date.now()): CompletionMeta {
  return { id: `chatcmpl-${nanoid()}`, model, created: Math.floor(now / 1000) };
}

/**
 * Wrap a batch answer into one completion object. Usage counters are zero;
 * token accounting happens outside the wire response.
 */
export function buildCompletion(answer: BatchAnswer, meta: CompletionMeta): ChatCompletion {
  return {
    id: meta.id,
    object: 'chat.completion',
    created: meta.created,
    model: meta.model,
    choices: [{
      index: 0,
      message: {
        role: 'assistant',
        content: answer.answer,
        reasoning_content: answer.reasoning,
      },
      finish_reason: 'stop',
    }],
    usage: {
      prompt_tokens: 0,
      completion_tokens: 0,
      total_tokens: 0,
    },
  };
}

export function toChunk(event: StreamEvent): OutboundChunk {
  return event.channel === 'answer'
    ? { delta: { content: event.text } }
    : { delta: { reasoningContent: event.text } };
}

export const STOP_CHUNK: OutboundChunk = { delta: {}, finishReason: 'stop' };

/**
 * One chunk per event in arrival order, then the stop chunk.
 */
export async function* synthesizeStream(
  events: AsyncIterable<StreamEvent>,
): AsyncGenerator<OutboundChunk, void, undefined> {
  for await (const event of events) {
    yield toChunk(event);
  }
  yield STOP_CHUNK;
}

export function renderChunk(chunk: OutboundChunk, meta: CompletionMeta): ChatCompletionChunk {
  const delta: ChatCompletionChunk['choices'][number]['delta'] = {};
  if ('content' in chunk.delta) delta.content = chunk.delta.content;
  if ('reasoningContent' in chunk.delta) delta.reasoning_content = chunk.delta.reasoningContent;
  return {
    id: meta.id,
    object: 'chat.completion.chunk',
    created: meta.created,
    model: meta.model,
    choices: [{
      index: 0,
      delta,
      finish_reason: chunk.finishReason ?? null,
    }],
  };
}

export function encodeSseRecord(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/**
 * The full outbound event stream: one record per chunk, then `[DONE]`.
 */
export async function* renderSseStream(
  events: AsyncIterable<StreamEvent>,
  meta: CompletionMeta,
): AsyncGenerator<string, void, undefined> {
  for await (const chunk of synthesizeStream(events)) {
    yield encodeSseRecord(renderChunk(chunk, meta));
  }
  yield SSE_DONE;
}
