/**
 * Per-probe refresh pacing.
 *
 * Every probe shares the scheduler's single tick; a schedule only answers
 * "has my interval elapsed". A probe whose interval is not a multiple of the
 * tick refreshes on the first tick after the interval, never in between.
 */
export interface RefreshStamp {
  lastRefresh: number | null;
}

/**
 * First call always refreshes. Later calls refresh only once strictly more than
 * `intervalMs` has passed since the last stamp. Every `true` re-stamps.
 */
export function shouldRefresh(stamp: RefreshStamp, intervalMs: number, now: number) {
  if (stamp.lastRefresh === null) {
    stamp.lastRefresh = now;
    return true;
  }

  if (now - stamp.lastRefresh > intervalMs) {
    stamp.lastRefresh = now;
    return true;
  }

  return false;
}

export class RefreshSchedule implements RefreshStamp {
  lastRefresh: number | null = null;

  constructor(readonly intervalMs: number) {}

  due(now: number) {
    return shouldRefresh(this, this.intervalMs, now);
  }
}
