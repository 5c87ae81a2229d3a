/**
 * =============================================================================
 * REQUEST SPACER - Minimum interval between outbound calls
 * =============================================================================
 *
 * A hard rate limit for providers with usage policies (Nominatim allows one
 * request per second). Each caller of `wait()` is suspended until at least
 * `minIntervalMs` has passed since the previous caller was released.
 *
 * Callers are served one at a time in arrival order: the "time of last
 * request" is only read and written inside the serialized section, so
 * concurrent callers sharing one spacer can never both pass in the same
 * interval.
 * =============================================================================
 */

import { setTimeout as sleepMs } from 'node:timers/promises';

export interface RequestSpacerOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RequestSpacer {
  private lastReleaseAt = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RequestSpacerOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (async (ms: number) => { await sleepMs(ms); });
  }

  /**
   * Resolve when the caller may send its request
   */
  wait(): Promise<void> {
    const turn = this.tail.then(() => this.takeTurn());
    // The caller observes a rejection through `turn`; the chain itself keeps going
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async takeTurn(): Promise<void> {
    if (this.minIntervalMs > 0) {
      const elapsed = this.now() - this.lastReleaseAt;
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastReleaseAt = this.now();
  }
}
