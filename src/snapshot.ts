import type { BreakerSnapshot } from "./breaker.js";
import type { RateLimiterSnapshot } from "./rateLimiter.js";

export interface ClientSnapshot {
  name: string;
  breaker: BreakerSnapshot;
  rateLimiter?: RateLimiterSnapshot;
  cacheSize?: number;
  mocksEnabled: boolean;
  mockCount: number;
  pool: { active: number; queued: number; size: number };
}
