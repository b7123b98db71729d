/**
 * Message normalization: flattens an inbound message list into one query
 * plus aligned history, since neither backend accepts a message array.
 * @packageDocumentation
 */

import { ValidationError } from './errors.js';
import type { ChatMessage, HistoryPair, NormalizedRequest } from './types.js';

/**
 * Extract the text of a message. Text parts are joined with a single space;
 * other parts are dropped.
 */
export function extractTextContent(content: ChatMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .filter((part) => part.type === 'text' && part.text)
    .map((part) => part.text)
    .join(' ');
}

export function formatSystemPrompt(system: string, query: string): string {
  return `[system prompt]:\n${system}\n\n[user question]:\n${query}`;
}

export function normalizeMessages(messages: readonly ChatMessage[]): NormalizedRequest {
  const last = messages[messages.length - 1];
  if (!last) {
    throw new ValidationError('No messages provided');
  }
  if (last.role !== 'user') {
    throw new ValidationError('Last message must be from user');
  }

  let query = extractTextContent(last.content);
  const previous = messages.slice(0, -1);

  const first = previous[0];
  if (first && first.role === 'system') {
    previous.shift();
    query = formatSystemPrompt(extractTextContent(first.content), query);
  }

  // Pairs that do not line up are skipped; later pairs keep their indices.
  const history: HistoryPair[] = [];
  for (let i = 0; i < previous.length - 1; i += 2) {
    const user = previous[i];
    const assistant = previous[i + 1];
    if (user?.role === 'user' && assistant?.role === 'assistant') {
      history.push({
        user: extractTextContent(user.content),
        assistant: extractTextContent(assistant.content),
      });
    }
  }

  return { query, history };
}
