// test/integration.test.ts
import { afterEach, describe, expect, it } from "vitest";
import http from "node:http";
import { ApiClient } from "../src/client.js";
import { RequestTimeoutError, TransportError } from "../src/errors.js";
import { appendQuery, UndiciTransport } from "../src/http.js";

function startServer(handler: (req: http.IncomingMessage, res: http.ServerResponse) => void) {
  return new Promise<{ server: http.Server; url: string }>((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (addr && typeof addr === "object") {
        resolve({ server, url: `http://127.0.0.1:${addr.port}` });
      }
    });
  });
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve) => {
    let data = "";
    req.on("data", (chunk: Buffer) => (data += chunk.toString()));
    req.on("end", () => resolve(data));
  });
}

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (cleanups.length > 0) {
    const next = cleanups.pop();
    if (next) await next();
  }
});

function track(server: http.Server, transport: UndiciTransport): void {
  cleanups.push(() => new Promise<void>((r) => server.close(() => r())));
  cleanups.push(() => transport.close());
}

describe("appendQuery", () => {
  it("encodes params and repeats array values", () => {
    expect(appendQuery("http://h/x", { q: "a b", tag: ["one", "two"], n: 1 })).toBe("http://h/x?q=a+b&tag=one&tag=two&n=1");
    expect(appendQuery("http://h/x?y=1", { z: true })).toBe("http://h/x?y=1&z=true");
    expect(appendQuery("http://h/x", {})).toBe("http://h/x");
    expect(appendQuery("http://h/x")).toBe("http://h/x");
  });
});

describe("UndiciTransport", () => {
  it("parses JSON bodies and lower-cases headers", async () => {
    const { server, url } = await startServer((req, res) => {
      res.statusCode = 200;
      res.setHeader("Content-Type", "application/json");
      res.setHeader("X-Request-Path", req.url ?? "");
      res.end(JSON.stringify({ ok: true }));
    });
    const transport = new UndiciTransport();
    track(server, transport);

    const res = await transport.send({
      method: "GET",
      url: `${url}/hello`,
      headers: {},
      params: { id: 5 },
      timeoutMs: 1000,
    });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(res.headers["x-request-path"]).toBe("/hello?id=5");
    expect(res.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it("falls back to text for non-JSON payloads", async () => {
    const { server, url } = await startServer((_req, res) => {
      res.statusCode = 503;
      res.setHeader("content-type", "text/plain");
      res.end("unavailable");
    });
    const transport = new UndiciTransport();
    track(server, transport);

    const res = await transport.send({ method: "GET", url, headers: {}, timeoutMs: 1000 });

    expect(res.status).toBe(503);
    expect(res.body).toBe("unavailable");
  });

  it("sends object bodies as JSON", async () => {
    const { server, url } = await startServer(async (req, res) => {
      const body = await readBody(req);
      res.statusCode = 201;
      res.setHeader("content-type", "application/json");
      res.end(JSON.stringify({ method: req.method, contentType: req.headers["content-type"], received: JSON.parse(body) }));
    });
    const transport = new UndiciTransport();
    track(server, transport);

    const res = await transport.send({ method: "POST", url, headers: {}, body: { name: "ada" }, timeoutMs: 1000 });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ method: "POST", contentType: "application/json", received: { name: "ada" } });
  });

  it("times out slow upstream requests", async () => {
    const { server, url } = await startServer((_req, res) => {
      // intentionally never responding quickly
      setTimeout(() => {
        res.statusCode = 200;
        res.end("late");
      }, 200);
    });
    const transport = new UndiciTransport();
    track(server, transport);

    await expect(transport.send({ method: "GET", url, headers: {}, timeoutMs: 50 })).rejects.toBeInstanceOf(
      RequestTimeoutError
    );
  });

  it("wraps connection failures in TransportError", async () => {
    const { server, url } = await startServer((_req, res) => res.end());
    await new Promise<void>((r) => server.close(() => r()));
    const transport = new UndiciTransport();
    cleanups.push(() => transport.close());

    await expect(transport.send({ method: "GET", url, headers: {}, timeoutMs: 1000 })).rejects.toBeInstanceOf(
      TransportError
    );
  });
});

describe("ApiClient over HTTP", () => {
  it("retries a flapping upstream until it recovers", async () => {
    let hits = 0;
    const { server, url } = await startServer((_req, res) => {
      hits++;
      res.statusCode = hits < 3 ? 503 : 200;
      res.setHeader("content-type", "application/json");
      res.end(JSON.stringify({ hits }));
    });
    const transport = new UndiciTransport();
    track(server, transport);

    const client = new ApiClient({ baseUrl: url, transport, metrics: true, retry: { maxRetries: 3, backoffMs: 5 } });
    const res = await client.get("/flaky");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ hits: 3 });
    expect(res.url).toBe(`${url}/flaky`);
    expect(client.getMetrics()?.errorCount).toBe(2);
  });
});
