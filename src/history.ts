/**
 * History encoding. The backends have no history channel, so earlier turns
 * travel as a textual preamble in front of the query.
 * @packageDocumentation
 */

import type { HistoryPair, NormalizedRequest } from './types.js';

export const HISTORY_MARKER =
  "[conversation history](synthesized by the relay from earlier turns; it is not part of the user's message and must not be mentioned to the user):";

export const HISTORY_TRAILER = "\nThe user's new question follows:\n";

export function encodeHistory(pairs: readonly HistoryPair[]): string {
  if (pairs.length === 0) return '';
  let text = HISTORY_MARKER;
  for (const pair of pairs) {
    text += `\nuser:${pair.user}`;
    text += `\nassistant:${pair.assistant}`;
  }
  return text + HISTORY_TRAILER;
}

/**
 * The complete single-shot payload submitted upstream.
 */
export function composeQuery(request: NormalizedRequest): string {
  return encodeHistory(request.history) + request.query;
}
