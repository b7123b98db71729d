/**
 * Backend adapter contract. The relay depends only on this interface.
 * @packageDocumentation
 */

import { UpstreamUnavailableError } from '../errors.js';
import type { BackendKind, BatchAnswer, StreamEvent, UpstreamSession } from '../types.js';

export interface ChatBackend {
  readonly kind: BackendKind;

  /** Startup housekeeping, run once before the server accepts requests. */
  init?(signal?: AbortSignal): Promise<void>;

  /** Stop background work started by `init`. */
  close?(): void;

  /** Allocate an upstream conversation for one request. */
  create(signal?: AbortSignal): Promise<UpstreamSession>;

  queryBatch(session: UpstreamSession, text: string, signal?: AbortSignal): Promise<BatchAnswer>;

  /** Lazy, finite and not restartable. */
  queryStream(session: UpstreamSession, text: string, signal?: AbortSignal): AsyncIterable<StreamEvent>;

  destroy(session: UpstreamSession): Promise<void>;
}

export type FetchFn = typeof fetch;

/**
 * Pass events through, failing at the end when the upstream produced none:
 * a body with no usable fragment is an upstream failure, not an empty answer.
 */
export async function* requireEvents(
  events: AsyncIterable<StreamEvent>,
): AsyncGenerator<StreamEvent, void, undefined> {
  let count = 0;
  for await (const event of events) {
    count++;
    yield event;
  }
  if (count === 0) {
    throw new UpstreamUnavailableError('Upstream returned no usable response');
  }
}

/**
 * Collect a stream of events into a batch answer.
 */
export async function collectAnswer(events: AsyncIterable<StreamEvent>): Promise<BatchAnswer> {
  let answer = '';
  let reasoning = '';
  for await (const event of requireEvents(events)) {
    if (event.channel === 'answer') answer += event.text;
    else reasoning += event.text;
  }
  return { answer, reasoning };
}
