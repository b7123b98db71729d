/**
 * Stats Collector for the session relay
 *
 * In-memory StatsSink with a rolling 1-hour window of usage records,
 * per-model totals, and latency percentiles.
 *
 * @packageDocumentation
 */

import type { StatsSink, UsageRecord } from './types.js';

export interface ModelStats {
  calls: number;
  failures: number;
  promptTokens: number;
  completionTokens: number;
}

export interface StatsSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  streamedRequests: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  byModel: Record<string, ModelStats>;
  uptimeMs: number;
}

const ROLLING_WINDOW_MS = 60 * 60 * 1000; // 1 hour

export class StatsCollector implements StatsSink {
  private records: UsageRecord[] = [];
  private readonly startedAt = Date.now();

  record(record: UsageRecord): void {
    this.records.push(record);
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();
    const records = this.records;
    const successful = records.filter(r => r.success);
    const latencies = records.map(r => r.latencyMs).sort((a, b) => a - b);

    const byModel: Record<string, ModelStats> = {};
    for (const r of records) {
      const entry = byModel[r.model] ?? { calls: 0, failures: 0, promptTokens: 0, completionTokens: 0 };
      entry.calls++;
      if (!r.success) entry.failures++;
      entry.promptTokens += r.promptTokens;
      entry.completionTokens += r.completionTokens;
      byModel[r.model] = entry;
    }

    return {
      totalRequests: records.length,
      successfulRequests: successful.length,
      failedRequests: records.length - successful.length,
      streamedRequests: records.filter(r => r.stream).length,
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
      byModel,
      uptimeMs: Date.now() - this.startedAt,
    };
  }

  formatStats(): string {
    const s = this.getStats();
    const lines = [
      `Relay Statistics (last hour)`,
      `════════════════════════════`,
      `Uptime:         ${Math.round(s.uptimeMs / 1000)}s`,
      `Requests:       ${s.totalRequests} (${s.failedRequests} failed, ${s.streamedRequests} streamed)`,
      `Latency:        avg ${s.avgLatencyMs}ms, p95 ${s.p95LatencyMs}ms, p99 ${s.p99LatencyMs}ms`,
      ``,
      `${'Model'.padEnd(24)}${'Calls'.padStart(8)}${'Prompt'.padStart(12)}${'Completion'.padStart(12)}${'Total'.padStart(12)}`,
    ];
    for (const [model, m] of Object.entries(s.byModel)) {
      lines.push(
        `${model.padEnd(24)}${String(m.calls).padStart(8)}${String(m.promptTokens).padStart(12)}` +
          `${String(m.completionTokens).padStart(12)}${String(m.promptTokens + m.completionTokens).padStart(12)}`,
      );
    }
    return lines.join('\n');
  }

  private prune(): void {
    const cutoff = Date.now() - ROLLING_WINDOW_MS;
    this.records = this.records.filter(r => r.timestamp >= cutoff);
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}

/**
 * Rough token estimate (~4 characters per token), used when no tokenizer is
 * injected.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
