// test/helpers/fakeTransport.ts
import type { Transport, TransportRequest, TransportResponse } from "../../src/types.js";

export type FakeStep = { status: number; body?: unknown; headers?: Record<string, string>; elapsedMs?: number } | Error;

type Handler = (req: TransportRequest, callIndex: number) => FakeStep | Promise<FakeStep>;

/** In-process stand-in for the HTTP transport. Records every request it sees. */
export class FakeTransport implements Transport {
  readonly calls: TransportRequest[] = [];
  closed = 0;

  constructor(private readonly handler: Handler) {}

  /** Plays `steps` in order, then keeps answering with `fallback`. */
  static scripted(steps: FakeStep[], fallback?: FakeStep): FakeTransport {
    const queue = [...steps];
    return new FakeTransport(() => {
      const next = queue.shift() ?? fallback;
      if (next === undefined) throw new Error("no scripted response left");
      return next;
    });
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    const index = this.calls.length;
    this.calls.push(req);

    const step = await this.handler(req, index);
    if (step instanceof Error) throw step;
    return {
      status: step.status,
      headers: step.headers ?? {},
      body: step.body ?? null,
      elapsedMs: step.elapsedMs ?? 5,
    };
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}
