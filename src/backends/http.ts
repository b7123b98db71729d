/**
 * HTTP plumbing shared by the backend adapters.
 * @packageDocumentation
 */

import type { z } from 'zod';
import { UpstreamUnavailableError, errorMessage } from '../errors.js';
import type { FetchFn } from './types.js';

export interface UpstreamRequest {
  method: 'POST' | 'DELETE';
  headers: Record<string, string>;
  body: unknown;
  signal?: AbortSignal;
}

/**
 * Send a JSON request. Network failures surface as UpstreamUnavailableError;
 * HTTP status handling is left to the caller.
 */
export async function sendJson(fetchFn: FetchFn, url: string, req: UpstreamRequest): Promise<Response> {
  try {
    return await fetchFn(url, {
      method: req.method,
      headers: req.headers,
      body: JSON.stringify(req.body),
      signal: req.signal,
    });
  } catch (err) {
    if (req.signal?.aborted) throw err;
    throw new UpstreamUnavailableError(`Upstream request to ${url} failed: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Parse a JSON response body against a schema.
 */
export async function readJson<S extends z.ZodTypeAny>(response: Response, schema: S, what: string): Promise<z.infer<S>> {
  let data: unknown;
  try {
    data = await response.json();
  } catch (err) {
    throw new UpstreamUnavailableError(`Upstream returned invalid JSON for ${what}: ${errorMessage(err)}`);
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new UpstreamUnavailableError(`Unexpected upstream response for ${what}`);
  }
  return parsed.data;
}

/**
 * Reject a non-2xx response, releasing its body first.
 */
export async function ensureOk(response: Response, what: string): Promise<void> {
  if (!response.ok) {
    await response.body?.cancel();
    throw new UpstreamUnavailableError(`Upstream ${what} failed with status ${response.status}`);
  }
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}
