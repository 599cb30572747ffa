// src/response.ts
import { HttpStatusError } from "./errors.js";
import type { ApiResponse } from "./types.js";

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function deepFreeze(value: unknown): void {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) return;
  const proto: unknown = Object.getPrototypeOf(value);
  if (!Array.isArray(value) && proto !== Object.prototype && proto !== null) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}

/**
 * Builds an immutable response. Plain JSON bodies (objects and arrays) are
 * frozen in place, since cached responses are shared between callers.
 */
export function createResponse<T>(init: {
  status: number;
  body: T;
  headers?: Record<string, string>;
  elapsedMs: number;
  url: string;
}): ApiResponse<T> {
  deepFreeze(init.body);
  return Object.freeze({
    status: init.status,
    body: init.body,
    headers: Object.freeze({ ...(init.headers ?? {}) }),
    elapsedMs: init.elapsedMs,
    url: init.url,
    success: isSuccessStatus(init.status),
  });
}

export function raiseForStatus<T>(response: ApiResponse<T>): ApiResponse<T> {
  if (!response.success) throw new HttpStatusError(response);
  return response;
}
