import type { Logger } from 'pino';

import type { Drawable } from './drawables';
import { logger } from './logger';
import { RefreshSchedule } from './refresh-policy';

export interface Size {
  width: number;
  height: number;
}

/**
 * A self-contained unit owning one metric's acquisition and presentation state.
 */
export interface Probe {
  readonly name: string;
  /** Present when the probe refreshes on its own interval rather than every tick */
  readonly schedule?: RefreshSchedule;
  /** The drawable for the current state. No side effects. */
  renderTarget(): Drawable;
  /** Re-sample the source. Must absorb its own failures. */
  refresh(now: Date): Promise<void>;
  onResize(size: Size): void;
  /** Release push subscriptions or child processes */
  dispose?(): void;
}

/**
 * Base for probes whose state is replaced wholesale.
 *
 * `sample` computes a complete next state from the previous one. Returning
 * null (parse error, nothing new) or throwing (transient failure) leaves the
 * previous state in place, so the render pass never sees a half-updated probe.
 */
export abstract class BaseProbe<S> implements Probe {
  readonly schedule?: RefreshSchedule;
  protected readonly log: Logger;
  protected size: Size = { width: 0, height: 0 };
  private current: S;

  protected constructor(readonly name: string, initial: S, intervalMs?: number) {
    this.current = initial;
    this.log = logger.child({ probe: name });
    if (intervalMs !== undefined) {
      this.schedule = new RefreshSchedule(intervalMs);
    }
  }

  get state(): S {
    return this.current;
  }

  async refresh(now: Date) {
    if (this.schedule !== undefined && !this.schedule.due(now.getTime())) return;

    try {
      const next = await this.sample(now, this.current);
      if (next !== null) {
        this.current = next;
      }
    } catch (error) {
      this.log.warn({ err: error }, 'Refresh failed, keeping previous state');
    }
  }

  onResize(size: Size) {
    this.size = { ...size };
  }

  renderTarget(): Drawable {
    return this.view(this.current, this.size);
  }

  /**
   * Swap in a complete state outside a scheduled refresh (push notifications).
   */
  protected replaceState(next: S) {
    this.current = next;
  }

  protected abstract sample(now: Date, previous: S): Promise<S | null>;

  protected abstract view(state: S, size: Size): Drawable;
}
