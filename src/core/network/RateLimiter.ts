import { Logger } from '../../utils/logger/Logger';
import { LogLevel } from '../../types/enums';
import { RateLimitConfig } from '../../types/config';
import { sleep } from '../../utils/async';

const DEFAULT_BACKOFF_MS = 1000;

/**
 * Token-bucket limiter shared by every probe of one audit.
 * A 429 answer pushes all waiters back by an increasing backoff.
 */
export class RateLimiter {
  private readonly ratePerSecond: number;
  private readonly burst: number;
  private readonly backoffStepMs: number;
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private available: number;
  private refilledAt: number;
  private pausedUntil: number = 0;

  constructor(config: RateLimitConfig, logger?: Logger) {
    this.ratePerSecond = config.requestsPerSecond;
    this.burst = config.burstSize ?? config.requestsPerSecond;
    this.backoffStepMs = config.initialBackoffMs ?? DEFAULT_BACKOFF_MS;
    this.enabled = config.enabled ?? true;
    this.logger = logger ?? new Logger(LogLevel.INFO, 'RateLimiter');
    this.available = this.burst;
    this.refilledAt = Date.now();
  }

  /**
   * Waits until a request may go out.
   * @returns false when the signal aborted before a token was granted
   */
  public async waitForToken(signal?: AbortSignal): Promise<boolean> {
    if (!this.enabled) return !signal?.aborted;

    while (!signal?.aborted) {
      const pause = this.pausedUntil - Date.now();
      if (pause > 0) {
        this.logger.debug(`Backing off for ${pause}ms after 429`);
        await sleep(pause, signal);
        continue;
      }

      this.topUp();
      if (this.available >= 1) {
        this.available -= 1;
        return true;
      }

      await sleep(Math.ceil(((1 - this.available) / this.ratePerSecond) * 1000), signal);
    }

    return false;
  }

  /**
   * Feeds a response status back; only 429 has an effect
   */
  public handleResponse(status: number): void {
    if (!this.enabled || status !== 429) return;

    const now = Date.now();
    this.pausedUntil = Math.max(this.pausedUntil, now) + this.backoffStepMs;
    this.logger.warn(`Received 429 Too Many Requests. Backoff until ${new Date(this.pausedUntil).toISOString()}`);
  }

  private topUp(): void {
    const now = Date.now();
    const earned = ((now - this.refilledAt) / 1000) * this.ratePerSecond;
    if (earned > 0) {
      this.available = Math.min(this.burst, this.available + earned);
      this.refilledAt = now;
    }
  }
}
