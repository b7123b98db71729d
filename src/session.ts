/**
 * Session Lifecycle Manager
 *
 * Scoped acquisition of one upstream session per request: create, use once,
 * destroy on every exit path. An orphaned upstream session is tolerated, so
 * teardown never fails the request.
 *
 * @packageDocumentation
 */

import type { ChatBackend } from './backends/types.js';
import { UpstreamUnavailableError, errorMessage } from './errors.js';
import { type Logger, defaultLogger } from './logger.js';
import type { UpstreamSession } from './types.js';

export interface SessionOptions {
  logger?: Logger;
  /** Give up waiting on a stalled destroy call after this long (default: 5000) */
  teardownTimeoutMs?: number;
  /** Passed to `create`; teardown ignores it */
  signal?: AbortSignal;
}

const DEFAULT_TEARDOWN_TIMEOUT_MS = 5_000;

export async function withSession<T>(
  backend: ChatBackend,
  body: (session: UpstreamSession) => Promise<T>,
  options: SessionOptions = {},
): Promise<T> {
  const logger = options.logger ?? defaultLogger;

  let session: UpstreamSession;
  try {
    session = await backend.create(options.signal);
  } catch (err) {
    if (err instanceof UpstreamUnavailableError) throw err;
    throw new UpstreamUnavailableError(`Failed to create ${backend.kind} session: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  try {
    return await body(session);
  } finally {
    await teardown(backend, session, logger, options.teardownTimeoutMs ?? DEFAULT_TEARDOWN_TIMEOUT_MS);
  }
}

function startDeadline(timeoutMs: number): { expired: Promise<'timeout'>; clear: () => void } {
  let clear = () => {};
  const expired = new Promise<'timeout'>((resolve) => {
    const timer = setTimeout(() => resolve('timeout'), timeoutMs);
    // Don't block process exit
    if (typeof timer === 'object' && 'unref' in timer) {
      timer.unref();
    }
    clear = () => clearTimeout(timer);
  });
  return { expired, clear };
}

async function teardown(
  backend: ChatBackend,
  session: UpstreamSession,
  logger: Logger,
  timeoutMs: number,
): Promise<void> {
  const deadline = startDeadline(timeoutMs);
  try {
    const outcome = await Promise.race([backend.destroy(session).then(() => 'done' as const), deadline.expired]);
    if (outcome === 'timeout') {
      logger.warn(`Abandoned teardown of ${session.backendKind} session ${session.id} after ${timeoutMs}ms`);
    }
  } catch (err) {
    logger.warn(`Failed to destroy ${session.backendKind} session ${session.id}: ${errorMessage(err)}`);
  } finally {
    deadline.clear();
  }
}
