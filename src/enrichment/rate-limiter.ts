import { RateLimitExceededError } from "./errors.js";

export interface RateLimiterOptions {
  requestsPerMinute?: number;
  requestsPerDay?: number;
  now?: () => number; // monotonic milliseconds
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimitStatus {
  requestsLastMinute: number;
  requestsLastDay: number;
  minuteLimit: number;
  dayLimit: number;
}

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Sliding-window limiter for outgoing LLM calls. Callers are served one at a
 * time in arrival order; a full minute window delays the caller, a full day
 * window refuses it with RateLimitExceededError.
 */
export class RateLimiter {
  private readonly minuteRequests: number[] = [];
  private readonly dayRequests: number[] = [];
  private readonly requestsPerMinute: number;
  private readonly requestsPerDay: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.requestsPerMinute = options.requestsPerMinute ?? 15;
    this.requestsPerDay = options.requestsPerDay ?? 1500;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.reserve());
    // A refused caller must not block the ones queued behind it
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  getStatus(): RateLimitStatus {
    this.prune(this.now());
    return {
      requestsLastMinute: this.minuteRequests.length,
      requestsLastDay: this.dayRequests.length,
      minuteLimit: this.requestsPerMinute,
      dayLimit: this.requestsPerDay,
    };
  }

  private async reserve(): Promise<void> {
    let now = this.now();
    this.prune(now);

    if (this.dayRequests.length >= this.requestsPerDay) {
      throw new RateLimitExceededError("day", this.requestsPerDay);
    }

    while (this.minuteRequests.length >= this.requestsPerMinute) {
      const waitMs = this.minuteRequests[0] + MINUTE_MS - now;
      console.log(`LLM rate limit: waiting ${(waitMs / 1000).toFixed(1)}s`);
      await this.sleep(waitMs);
      now = this.now();
      this.prune(now);
    }

    this.minuteRequests.push(now);
    this.dayRequests.push(now);
  }

  private prune(now: number): void {
    while (this.minuteRequests.length > 0 && this.minuteRequests[0] <= now - MINUTE_MS) {
      this.minuteRequests.shift();
    }
    while (this.dayRequests.length > 0 && this.dayRequests[0] <= now - DAY_MS) {
      this.dayRequests.shift();
    }
  }
}
