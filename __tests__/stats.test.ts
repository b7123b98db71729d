import { describe, it, expect, beforeEach } from 'vitest';
import { StatsCollector, estimateTokens } from '../src/stats.js';
import type { UsageRecord } from '../src/types.js';

function usage(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    model: 'deepseek-r1',
    promptTokens: 10,
    completionTokens: 20,
    latencyMs: 100,
    stream: false,
    success: true,
    timestamp: Date.now(),
    ...overrides,
  };
}

describe('StatsCollector', () => {
  let stats: StatsCollector;

  beforeEach(() => {
    stats = new StatsCollector();
  });

  it('starts with empty stats', () => {
    const s = stats.getStats();
    expect(s.totalRequests).toBe(0);
    expect(s.successfulRequests).toBe(0);
    expect(s.failedRequests).toBe(0);
    expect(s.streamedRequests).toBe(0);
    expect(s.avgLatencyMs).toBe(0);
    expect(s.p50LatencyMs).toBe(0);
    expect(s.p95LatencyMs).toBe(0);
    expect(s.p99LatencyMs).toBe(0);
    expect(s.byModel).toEqual({});
  });

  it('tracks failures and streamed requests', () => {
    stats.record(usage());
    stats.record(usage({ stream: true }));
    stats.record(usage({ stream: true, success: false }));

    const s = stats.getStats();
    expect(s.totalRequests).toBe(3);
    expect(s.successfulRequests).toBe(2);
    expect(s.failedRequests).toBe(1);
    expect(s.streamedRequests).toBe(2);
  });

  it('calculates percentiles correctly', () => {
    // Add 100 requests with latencies 1..100
    for (let i = 1; i <= 100; i++) {
      stats.record(usage({ latencyMs: i }));
    }

    const s = stats.getStats();
    expect(s.p50LatencyMs).toBe(50);
    expect(s.p95LatencyMs).toBe(95);
    expect(s.p99LatencyMs).toBe(99);
    expect(s.avgLatencyMs).toBe(51); // Math.round(5050/100)
  });

  it('totals tokens per model', () => {
    stats.record(usage({ promptTokens: 5, completionTokens: 7 }));
    stats.record(usage({ promptTokens: 1, completionTokens: 2, success: false }));
    stats.record(usage({ model: 'ibit', promptTokens: 3, completionTokens: 4 }));

    expect(stats.getStats().byModel).toEqual({
      'deepseek-r1': { calls: 2, failures: 1, promptTokens: 6, completionTokens: 9 },
      ibit: { calls: 1, failures: 0, promptTokens: 3, completionTokens: 4 },
    });
  });

  it('prunes old records outside rolling window', () => {
    const oldTime = Date.now() - 2 * 60 * 60 * 1000; // 2 hours ago
    stats.record(usage({ timestamp: oldTime, latencyMs: 100 }));
    stats.record(usage({ latencyMs: 50 }));

    const s = stats.getStats();
    expect(s.totalRequests).toBe(1);
    expect(s.avgLatencyMs).toBe(50);
  });

  it('formats a per-model table', () => {
    stats.record(usage({ promptTokens: 5, completionTokens: 7 }));
    const lines = stats.formatStats().split('\n');

    expect(lines[0]).toBe('Relay Statistics (last hour)');
    expect(lines[3]).toBe('Requests:       1 (0 failed, 0 streamed)');
    expect(lines[lines.length - 1]).toBe(
      `${'deepseek-r1'.padEnd(24)}${'1'.padStart(8)}${'5'.padStart(12)}${'7'.padStart(12)}${'12'.padStart(12)}`,
    );
  });
});

describe('estimateTokens', () => {
  it('rounds four characters per token up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});
