/**
 * Sliding-window rate limiter for TMDB (40 requests per 10 seconds by default)
 *
 * Callers queue in arrival order, so a burst of concurrent lookups drains
 * evenly instead of every waiter waking at the same instant.
 */
export class RateLimiter {
  private requests: number[] = []; // Timestamps of requests in current window
  private queue: Promise<void> = Promise.resolve();
  private readonly maxRequests: number;
  private readonly windowMs: number;

  constructor(maxRequests: number = 40, windowSeconds: number = 10) {
    this.maxRequests = maxRequests;
    this.windowMs = windowSeconds * 1000;
  }

  /**
   * Wait for a free slot, then run fn
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const slot = this.queue.then(() => this.acquire());
    this.queue = slot;
    await slot;
    return fn();
  }

  private async acquire(): Promise<void> {
    this.cleanOldRequests();

    while (this.requests.length >= this.maxRequests) {
      const oldestRequest = this.requests[0] ?? Date.now();
      const timeToWait = this.windowMs - (Date.now() - oldestRequest);
      if (timeToWait > 0) {
        await this.delay(timeToWait);
      }
      this.cleanOldRequests();
    }

    this.requests.push(Date.now());
  }

  private cleanOldRequests(): void {
    const cutoff = Date.now() - this.windowMs;
    this.requests = this.requests.filter(timestamp => timestamp > cutoff);
  }

  getRequestCount(): number {
    this.cleanOldRequests();
    return this.requests.length;
  }

  getRemainingRequests(): number {
    return this.maxRequests - this.getRequestCount();
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
