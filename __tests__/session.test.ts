import { describe, it, expect, vi, afterEach } from 'vitest';
import type { ChatBackend } from '../src/backends/types.js';
import { UpstreamUnavailableError } from '../src/errors.js';
import { withSession } from '../src/session.js';
import type { UpstreamSession } from '../src/types.js';

const SESSION: UpstreamSession = { id: 'conv-1', backendKind: 'agent', createdAt: 0 };

function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function mockBackend(overrides: Partial<Pick<ChatBackend, 'create' | 'destroy'>> = {}) {
  const create = vi.fn<ChatBackend['create']>(overrides.create ?? (async () => SESSION));
  const destroy = vi.fn<ChatBackend['destroy']>(overrides.destroy ?? (async () => {}));
  const backend: ChatBackend = {
    kind: 'agent',
    create,
    destroy,
    queryBatch: async () => ({ answer: '', reasoning: '' }),
    queryStream: async function* () {},
  };
  return { backend, create, destroy };
}

describe('withSession', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the body result and destroys the session once', async () => {
    const { backend, destroy } = mockBackend();
    const result = await withSession(backend, async (session) => `used ${session.id}`, { logger: mockLogger() });
    expect(result).toBe('used conv-1');
    expect(destroy).toHaveBeenCalledTimes(1);
    expect(destroy).toHaveBeenCalledWith(SESSION);
  });

  it('destroys the session exactly once when the body throws', async () => {
    const { backend, destroy } = mockBackend();
    await expect(
      withSession(backend, async () => {
        throw new Error('query failed');
      }, { logger: mockLogger() }),
    ).rejects.toThrow('query failed');
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('wraps a create failure and never runs the body', async () => {
    const { backend, destroy } = mockBackend({
      create: async () => {
        throw new Error('connection refused');
      },
    });
    const body = vi.fn(async () => 'unreachable');

    const err = await withSession(backend, body, { logger: mockLogger() }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toHaveProperty('message', 'Failed to create agent session: connection refused');
    expect(body).not.toHaveBeenCalled();
    expect(destroy).not.toHaveBeenCalled();
  });

  it('passes an UpstreamUnavailableError from create through unchanged', async () => {
    const original = new UpstreamUnavailableError('keys missing');
    const { backend } = mockBackend({
      create: async () => {
        throw original;
      },
    });
    await expect(withSession(backend, async () => 'x', { logger: mockLogger() })).rejects.toBe(original);
  });

  it('passes the abort signal to create', async () => {
    const { backend, create } = mockBackend();
    const controller = new AbortController();
    await withSession(backend, async () => 'x', { logger: mockLogger(), signal: controller.signal });
    expect(create).toHaveBeenCalledWith(controller.signal);
  });

  it('logs a teardown failure without failing the request', async () => {
    const logger = mockLogger();
    const { backend } = mockBackend({
      destroy: async () => {
        throw new Error('delete refused');
      },
    });
    await expect(withSession(backend, async () => 'ok', { logger })).resolves.toBe('ok');
    expect(logger.warn).toHaveBeenCalledWith('Failed to destroy agent session conv-1: delete refused');
  });

  it('keeps the body error when teardown also fails', async () => {
    const logger = mockLogger();
    const { backend } = mockBackend({
      destroy: async () => {
        throw new Error('delete refused');
      },
    });
    await expect(
      withSession(backend, async () => {
        throw new Error('query failed');
      }, { logger }),
    ).rejects.toThrow('query failed');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('abandons a stalled teardown after the timeout', async () => {
    vi.useFakeTimers();
    const logger = mockLogger();
    let teardownStarted: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      teardownStarted = resolve;
    });
    const { backend } = mockBackend({
      destroy: () => {
        teardownStarted();
        return new Promise<void>(() => {});
      },
    });

    const pending = withSession(backend, async () => 'done', { logger, teardownTimeoutMs: 1_000 });
    await started;
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(pending).resolves.toBe('done');
    expect(logger.warn).toHaveBeenCalledWith('Abandoned teardown of agent session conv-1 after 1000ms');
  });
});
