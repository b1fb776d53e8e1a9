import Bottleneck from "bottleneck";

const DEFAULT_RATE_LIMIT = 32;

function minTimeFor(requestsPerSecond: number): number {
  return Math.ceil(1000 / requestsPerSecond);
}

// Shared limiter for every outgoing purchase request
const limiter = new Bottleneck({
  maxConcurrent: DEFAULT_RATE_LIMIT,
  minTime: minTimeFor(DEFAULT_RATE_LIMIT),
});

/**
 * Reconfigure the request rate (requests per second).
 */
export function setRateLimit(requestsPerSecond: number): void {
  if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
    throw new Error(`Rate limit must be a positive number (got ${requestsPerSecond})`);
  }
  limiter.updateSettings({
    maxConcurrent: Math.ceil(requestsPerSecond),
    minTime: minTimeFor(requestsPerSecond),
  });
}

export default limiter;
