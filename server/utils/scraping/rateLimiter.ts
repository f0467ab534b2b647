/**
 * Politeness delay between consecutive page loads.
 *
 * The pipeline navigates strictly one page at a time; this keeps a fixed gap
 * between the end of one load and the start of the next on the same host.
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
  private lastRequest: Map<string, number> = new Map();

  /**
   * @param delayMs Minimum gap between requests to the same host
   * @param now Clock, injectable for tests
   * @param wait Sleep function, injectable for tests
   */
  constructor(
    private readonly delayMs: number,
    private readonly now: () => number = Date.now,
    private readonly wait: Sleep = sleep
  ) {}

  /**
   * Wait if necessary to keep the politeness gap for a host
   * @returns Milliseconds actually waited
   */
  async waitIfNeeded(host: string): Promise<number> {
    const waitTime = this.getTimeUntilNextRequest(host);
    if (waitTime > 0) {
      await this.wait(waitTime);
    }
    this.lastRequest.set(host, this.now());
    return waitTime;
  }

  /**
   * Restart the gap once a load has finished, so slow loads still get the full delay after them
   */
  markDone(host: string): void {
    this.lastRequest.set(host, this.now());
  }

  /**
   * Milliseconds until the next request to the host is allowed, 0 if allowed now
   */
  getTimeUntilNextRequest(host: string): number {
    const lastTime = this.lastRequest.get(host);
    if (lastTime === undefined) return 0;
    return Math.max(0, this.delayMs - (this.now() - lastTime));
  }

  reset(host?: string): void {
    if (host) {
      this.lastRequest.delete(host);
    } else {
      this.lastRequest.clear();
    }
  }
}
