/**
 * Stream Demultiplexer
 *
 * Parses a backend event-stream body into tagged text fragments. Network
 * chunks may split a record anywhere, including inside a multi-byte
 * character or a JSON payload, so a partial line is carried between reads.
 *
 * @packageDocumentation
 */

import { UpstreamUnavailableError, errorMessage } from '../errors.js';
import type { StreamEvent } from '../types.js';

const DATA_PREFIX = 'data:';
const THINK_OPEN = '<think>';
const THINK_CLOSE = '</think>';

/**
 * Maps one parsed `data:` payload to an event, or to nothing.
 */
export type RecordClassifier = (record: unknown) => StreamEvent | null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classifier for records that carry an explicit discriminator:
 * `{ event: 'think_message' | 'message', answer: string }`.
 */
export const classifyAgentRecord: RecordClassifier = (record) => {
  if (!isRecord(record)) return null;
  const { event, answer } = record;
  if (typeof answer !== 'string' || answer === '') return null;
  if (event === 'think_message') return { channel: 'reasoning', text: answer };
  if (event === 'message') return { channel: 'answer', text: answer };
  return null;
};

/**
 * Classifier for records shaped `{ answer: string }` where reasoning is
 * wrapped in standalone `<think>` / `</think>` fragments. Stateful: create
 * one per stream.
 */
export function createThinkTagClassifier(): RecordClassifier {
  let opened = false;
  let closed = false;
  return (record) => {
    if (!isRecord(record)) return null;
    const { answer } = record;
    if (typeof answer !== 'string' || answer === '') return null;
    if (answer.includes(THINK_OPEN)) opened = true;
    if (answer.includes(THINK_CLOSE)) closed = true;
    if (answer === THINK_OPEN || answer === THINK_CLOSE) return null;
    return { channel: opened && !closed ? 'reasoning' : 'answer', text: answer };
  };
}

/**
 * Parse one complete line. Blank lines, lines without the data prefix and
 * malformed JSON all yield nothing.
 */
export function parseLine(line: string, classify: RecordClassifier): StreamEvent | null {
  const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line;
  if (!trimmed.startsWith(DATA_PREFIX)) return null;
  const payload = trimmed.slice(DATA_PREFIX.length).trim();
  if (!payload) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return null;
  }
  const event = classify(parsed);
  return event && event.text ? event : null;
}

/**
 * Demultiplex a byte stream into StreamEvents. The sequence is lazy and
 * ends when the source ends.
 */
export async function* demultiplex(
  source: AsyncIterable<Uint8Array | string>,
  classify: RecordClassifier,
): AsyncGenerator<StreamEvent, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of source) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? ''; // Keep incomplete line in buffer

    for (const line of lines) {
      const event = parseLine(line, classify);
      if (event) yield event;
    }
  }

  buffer += decoder.decode();
  if (buffer) {
    const event = parseLine(buffer, classify);
    if (event) yield event;
  }
}

/**
 * Expose a fetch response body as an async byte sequence. A missing body or
 * a broken transfer is an upstream failure unless the caller aborted.
 */
export async function* readBody(response: Response, signal?: AbortSignal): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = response.body?.getReader();
  if (!reader) {
    throw new UpstreamUnavailableError('Upstream response has no body');
  }

  let finished = false;
  try {
    while (true) {
      const result = await reader.read().catch((err: unknown): never => {
        finished = true;
        if (signal?.aborted) throw err;
        throw new UpstreamUnavailableError(`Upstream stream interrupted: ${errorMessage(err)}`, { cause: err });
      });
      if (result.done) {
        finished = true;
        break;
      }
      yield result.value;
    }
  } finally {
    // Consumer stopped early: close the upstream connection
    if (!finished) await reader.cancel();
    reader.releaseLock();
  }
}
