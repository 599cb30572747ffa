// test/factory.test.ts
import { describe, expect, it } from "vitest";
import { createClient, withClient, withMocks, withRateLimit } from "../src/factory.js";
import { FakeTransport } from "./helpers/fakeTransport.js";

describe("createClient", () => {
  it("returns independent clients", async () => {
    const transport = FakeTransport.scripted([], { status: 500 });
    const a = createClient({ transport, retry: false, circuitBreaker: { failureThreshold: 1 } });
    const b = createClient({ transport, retry: false, circuitBreaker: { failureThreshold: 1 } });

    await a.get("/x");

    expect(a.circuitBreaker.state).toBe("OPEN");
    expect(b.circuitBreaker.state).toBe("CLOSED");
  });
});

describe("scoped clients", () => {
  it("withClient closes the client after the callback", async () => {
    const transport = FakeTransport.scripted([], { status: 200, body: "pong" });

    const body = await withClient({ transport }, async (client) => (await client.get("/ping")).body);

    expect(body).toBe("pong");
    expect(transport.closed).toBe(1);
  });

  it("withClient closes the client when the callback throws", async () => {
    const transport = FakeTransport.scripted([]);

    await expect(
      withClient({ transport }, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(transport.closed).toBe(1);
  });

  it("withMocks serves mocks and turns mock mode off afterwards", async () => {
    const transport = FakeTransport.scripted([]);

    const client = await withMocks({ transport }, async (c) => {
      c.addMock("/health", { body: { ok: true } });
      const res = await c.get("/health");
      expect(res.body).toEqual({ ok: true });
      expect(c.getMetrics()?.totalRequests).toBe(0);
      return c;
    });

    expect(client.mocks.enabled).toBe(false);
    expect(transport.calls).toHaveLength(0);
    expect(transport.closed).toBe(1);
  });

  it("withRateLimit runs the callback on a token-bucket client and closes it", async () => {
    const transport = FakeTransport.scripted([], { status: 200 });

    const limiter = await withRateLimit(
      2,
      async (c) => {
        expect((await c.get("/ping")).status).toBe(200);
        return c.snapshot().rateLimiter;
      },
      { transport }
    );

    expect(limiter).toMatchObject({ algorithm: "token_bucket", requestsPerSecond: 2 });
    expect(transport.calls).toHaveLength(1);
    expect(transport.closed).toBe(1);
  });
});
