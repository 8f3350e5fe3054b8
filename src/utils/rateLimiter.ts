export class RateLimiter {
  private requests: Map<string, number[]> = new Map();
  private maxRequests: number;
  private windowMs: number;
  private now: () => number;

  constructor(maxRequests: number = 20, windowMs: number = 60000, now: () => number = Date.now) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.now = now;
  }

  /**
   * Records a request for `key` if the window has room.
   *
   * @returns false when the limit is already reached
   */
  checkLimit(key: string): boolean {
    const now = this.now();
    const recentRequests = this.recent(key, now);

    if (recentRequests.length >= this.maxRequests) {
      this.requests.set(key, recentRequests);
      return false;
    }

    recentRequests.push(now);
    this.requests.set(key, recentRequests);
    return true;
  }

  /**
   * Milliseconds until `key` may issue another request (0 when it may now).
   */
  msUntilAvailable(key: string): number {
    const now = this.now();
    const recentRequests = this.recent(key, now);
    if (recentRequests.length < this.maxRequests) return 0;
    return Math.max(0, recentRequests[0] + this.windowMs - now);
  }

  /**
   * Waits until a slot is free, then records the request.
   */
  async acquire(key: string): Promise<void> {
    while (!this.checkLimit(key)) {
      const waitMs = Math.max(this.msUntilAvailable(key), 10);
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }

  reset(key: string): void {
    this.requests.delete(key);
  }

  // Drop timestamps that fell out of the window
  private recent(key: string, now: number): number[] {
    const requests = this.requests.get(key) || [];
    return requests.filter((time) => now - time < this.windowMs);
  }
}
