// src/loadgen.ts
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { httpMethodSchema, parseOptions, requestOptionsSchema } from "./config.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import { WorkerPool } from "./pool.js";
import type { ApiResponse, HttpMethod, RequestOptions } from "./types.js";

const TICK_MS = 1000;

const loadTestSchema = requestOptionsSchema.extend({
  method: httpMethodSchema.default("GET"),
  targetRps: z.number().int().positive(),
  durationSec: z.number().positive(),
});

export type LoadTestOptions = z.input<typeof loadTestSchema>;

/** Anything that runs a call through the full pipeline. */
export interface RequestExecutor {
  execute(method: HttpMethod, endpoint: string, options?: RequestOptions): Promise<ApiResponse>;
}

export interface LoadTestOutcome {
  status: number;     // 0 when the call rejected
  elapsedMs: number;
  success: boolean;
  error?: string;
  timestampMs: number;
}

export class LoadTestResult {
  constructor(
    readonly results: readonly LoadTestOutcome[],
    readonly durationSec: number,
    readonly totalRequests: number,
    readonly errors: number
  ) {}

  get successRate(): number {
    if (this.totalRequests === 0) return 0;
    return ((this.totalRequests - this.errors) / this.totalRequests) * 100;
  }

  /** Mean latency of successful attempts only. */
  get avgResponseTimeMs(): number {
    const ok = this.results.filter((r) => r.success);
    if (ok.length === 0) return 0;
    return ok.reduce((sum, r) => sum + r.elapsedMs, 0) / ok.length;
  }

  get requestsPerSecond(): number {
    return this.durationSec > 0 ? this.totalRequests / this.durationSec : 0;
  }

  summaryLines(): string[] {
    return [
      "Load test results:",
      `  Total requests: ${this.totalRequests}`,
      `  Duration: ${this.durationSec}s`,
      `  Successful: ${this.totalRequests - this.errors}`,
      `  Errors: ${this.errors}`,
      `  Success rate: ${this.successRate.toFixed(1)}%`,
      `  Average response time: ${this.avgResponseTimeMs.toFixed(1)}ms`,
      `  Throughput: ${this.requestsPerSecond.toFixed(1)} req/s`,
    ];
  }

  print(log: Logger = rootLogger): void {
    for (const line of this.summaryLines()) log.info(line);
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/**
 * Fires `targetRps` concurrent calls once per one-second tick until the
 * duration runs out. A tick that finishes early sleeps off the rest of its
 * second; a slow tick simply delays the next one.
 */
export class LoadGenerator {
  private readonly log: Logger;

  constructor(
    private readonly client: RequestExecutor,
    opts: { logger?: Logger } = {}
  ) {
    this.log = opts.logger ?? rootLogger;
  }

  async run(endpoint: string, options: LoadTestOptions): Promise<LoadTestResult> {
    const { method, targetRps, durationSec, ...request } = parseOptions(loadTestSchema, options, "load test options");
    this.log.info({ method, endpoint, targetRps, durationSec }, "starting load test");

    const pool = new WorkerPool(targetRps);
    const slots = Array.from({ length: targetRps }, (_, i) => i);
    const durationMs = durationSec * TICK_MS;
    const ticks = Math.ceil(durationSec);

    const outcomes: LoadTestOutcome[] = [];
    let errors = 0;
    const start = Date.now();

    for (let tick = 0; tick < ticks && Date.now() - start < durationMs; tick++) {
      const tickStart = Date.now();
      const settled = await pool.mapSettled(slots, () => this.client.execute(method, endpoint, request));

      for (const s of settled) {
        if (s.status === "fulfilled") {
          outcomes.push({
            status: s.value.status,
            elapsedMs: s.value.elapsedMs,
            success: s.value.success,
            timestampMs: Date.now(),
          });
          if (!s.value.success) errors++;
        } else {
          errors++;
          outcomes.push({ status: 0, elapsedMs: 0, success: false, error: describeError(s.reason), timestampMs: Date.now() });
        }
      }

      const tickMs = Date.now() - tickStart;
      if (tickMs < TICK_MS) await sleep(TICK_MS - tickMs);
    }

    const result = new LoadTestResult(outcomes, durationSec, outcomes.length, errors);
    this.log.info(
      { total: result.totalRequests, errors: result.errors, successRate: result.successRate },
      "load test finished"
    );
    return result;
  }
}
