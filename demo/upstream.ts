// demo/upstream.ts
import http from "node:http";
import { logger } from "../src/logger.js";

const PORT = Number(process.env.UPSTREAM_PORT ?? 3001);

// Behavior knobs
const FAIL_RATE = Number(process.env.FAIL_RATE ?? 0.2);    // 20% 503s
const THROTTLE_RATE = Number(process.env.THROTTLE_RATE ?? 0.05); // 5% 429s
const SLOW_RATE = Number(process.env.SLOW_RATE ?? 0.1);    // 10% slow responses
const SLOW_MS = Number(process.env.SLOW_MS ?? 300);

function json(res: http.ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

const server = http.createServer((req, res) => {
  if (!req.url) return json(res, 400, { error: "bad request" });
  if (req.url.startsWith("/health")) return json(res, 200, { ok: true });

  const r = Math.random();
  if (r < FAIL_RATE) return json(res, 503, { ok: false, kind: "fail", ts: Date.now() });
  if (r < FAIL_RATE + THROTTLE_RATE) return json(res, 429, { ok: false, kind: "throttled", ts: Date.now() });
  if (r < FAIL_RATE + THROTTLE_RATE + SLOW_RATE) {
    setTimeout(() => json(res, 200, { ok: true, kind: "slow", ts: Date.now() }), SLOW_MS);
    return;
  }
  json(res, 200, { ok: true, kind: "fast", ts: Date.now() });
});

server.listen(PORT, "127.0.0.1", () => {
  logger.info({ port: PORT, FAIL_RATE, THROTTLE_RATE, SLOW_RATE, SLOW_MS }, "flaky upstream listening");
});
