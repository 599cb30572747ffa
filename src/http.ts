// src/http.ts
import { Agent, request as undiciRequest } from "undici";
import { RequestTimeoutError, TransportError } from "./errors.js";
import type { QueryParams, Transport, TransportRequest, TransportResponse } from "./types.js";

function normalizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (v === undefined) continue;
    out[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
  }
  return out;
}

export function appendQuery(url: string, params?: QueryParams): string {
  if (!params) return url;

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value];
    for (const v of values) search.append(key, String(v));
  }
  const qs = search.toString();
  if (qs === "") return url;
  return `${url}${url.includes("?") ? "&" : "?"}${qs}`;
}

function encodeBody(body: unknown, headers: Record<string, string>): string | Uint8Array | undefined {
  if (body === undefined || body === null) return undefined;
  if (typeof body === "string" || body instanceof Uint8Array) return body;

  const hasContentType = Object.keys(headers).some((h) => h.toLowerCase() === "content-type");
  if (!hasContentType) headers["content-type"] = "application/json";
  return JSON.stringify(body);
}

/** JSON when the payload parses as JSON, raw text otherwise. */
function decodeBody(text: string): unknown {
  if (text === "") return text;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Transport on undici with a hard per-attempt timeout via AbortController.
 * No retries. No breaker. Just raw outbound I/O.
 */
export class UndiciTransport implements Transport {
  private readonly agent: Agent;

  constructor(opts: { connections?: number } = {}) {
    this.agent = new Agent({ connections: opts.connections ?? null });
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), req.timeoutMs);
    const started = performance.now();
    const headers = { ...req.headers };

    try {
      const res = await undiciRequest(appendQuery(req.url, req.params), {
        method: req.method,
        headers,
        body: encodeBody(req.body, headers),
        signal: ac.signal,
        dispatcher: this.agent,
      });

      const text = await res.body.text();
      return {
        status: res.statusCode,
        headers: normalizeHeaders(res.headers),
        body: decodeBody(text),
        elapsedMs: performance.now() - started,
      };
    } catch (err) {
      if (isAbortError(err) || ac.signal.aborted) {
        throw new RequestTimeoutError(req.timeoutMs);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${req.method} ${req.url} failed: ${message}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
