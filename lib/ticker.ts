import cron, { type ScheduledTask } from 'node-cron';

export interface TickSource {
  start(onTick: (at: Date) => void): void;
  stop(): void;
}

/**
 * Convert an interval to a cron expression (seconds field included)
 */
export function intervalToCron(intervalMs: number) {
  const intervalSeconds = Math.max(1, Math.floor(intervalMs / 1000));

  if (intervalSeconds <= 59) {
    // Every N seconds
    return `*/${String(intervalSeconds)} * * * * *`;
  }
  if (intervalSeconds < 3600) {
    // Every N minutes
    const minutes = Math.floor(intervalSeconds / 60);
    return `0 */${String(minutes)} * * * *`;
  }
  // Every N hours
  const hours = Math.floor(intervalSeconds / 3600);
  return `0 0 */${String(hours)} * * *`;
}

export class CronTickSource implements TickSource {
  private task: ScheduledTask | null = null;

  constructor(private readonly intervalMs: number) {}

  start(onTick: (at: Date) => void) {
    if (this.task !== null) return;
    this.task = cron.schedule(intervalToCron(this.intervalMs), () => {
      onTick(new Date());
    });
  }

  stop() {
    this.task?.stop();
    this.task = null;
  }
}
