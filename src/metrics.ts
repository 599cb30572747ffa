// src/metrics.ts
import type { ApiResponse } from "./types.js";

export interface MetricsSample {
  elapsedMs: number;
  status: number;
  isError: boolean;
  url: string;
  timestampMs: number;
}

export interface ErrorRecord {
  status: number;
  url: string;
  timestampMs: number;
}

export interface MetricsSummary {
  totalRequests: number;
  successRate: number;          // percent, 0 when nothing recorded
  avgResponseTimeMs: number;    // over every recorded attempt
  requestsPerSecond: number;    // since the collector was created
  errorCount: number;
  statusDistribution: Record<number, number>;
}

/**
 * Append-only record of every attempt that produced a response.
 * Samples live as long as the client; nothing is pruned.
 */
export class MetricsCollector {
  private readonly samples: MetricsSample[] = [];
  private readonly errors: ErrorRecord[] = [];
  private readonly startedAtMs: number;

  constructor(nowMs: number = Date.now()) {
    this.startedAtMs = nowMs;
  }

  record(response: ApiResponse, nowMs: number = Date.now()): void {
    this.samples.push({
      elapsedMs: response.elapsedMs,
      status: response.status,
      isError: !response.success,
      url: response.url,
      timestampMs: nowMs,
    });

    if (!response.success) {
      this.errors.push({ status: response.status, url: response.url, timestampMs: nowMs });
    }
  }

  summary(nowMs: number = Date.now()): MetricsSummary {
    const total = this.samples.length;
    const wallSec = (nowMs - this.startedAtMs) / 1000;

    let successful = 0;
    let elapsedSum = 0;
    const statusDistribution: Record<number, number> = {};
    for (const s of this.samples) {
      if (!s.isError) successful++;
      elapsedSum += s.elapsedMs;
      statusDistribution[s.status] = (statusDistribution[s.status] ?? 0) + 1;
    }

    return {
      totalRequests: total,
      successRate: total > 0 ? (successful / total) * 100 : 0,
      avgResponseTimeMs: total > 0 ? elapsedSum / total : 0,
      requestsPerSecond: wallSec > 0 ? total / wallSec : 0,
      errorCount: this.errors.length,
      statusDistribution,
    };
  }

  errorRecords(): readonly ErrorRecord[] {
    return this.errors;
  }
}

export function formatSummary(summary: MetricsSummary): string[] {
  return [
    "Performance metrics:",
    `  Total requests: ${summary.totalRequests}`,
    `  Successful: ${summary.totalRequests - summary.errorCount}`,
    `  Errors: ${summary.errorCount}`,
    `  Success rate: ${summary.successRate.toFixed(1)}%`,
    `  Average time: ${summary.avgResponseTimeMs.toFixed(1)}ms`,
    `  Throughput: ${summary.requestsPerSecond.toFixed(1)} req/s`,
  ];
}
