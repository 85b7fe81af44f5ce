/**
 * FetchScheduler - decides whether a polling tick may fetch, and drives the polling
 * timer.
 *
 * Fetching is skipped inside the blackout window unless a one-shot override was
 * requested. The override is consumed after the next fetch attempt whatever its
 * outcome.
 */

import { logger } from '../utils/logger';

export interface SchedulerOptions {
  blockStartHour: number;
  blockEndHour: number;
  intervalMs: number;
}

export function isHourBlocked(hour: number, blockStartHour: number, blockEndHour: number): boolean {
  if (blockStartHour === blockEndHour) return false;
  if (blockStartHour < blockEndHour) {
    return blockStartHour <= hour && hour < blockEndHour;
  }
  // Overnight window, e.g. 23 -> 6
  return hour >= blockStartHour || hour < blockEndHour;
}

export class FetchScheduler {
  private forceRefresh = false;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(private readonly options: SchedulerOptions) {}

  isBlocked(hour: number): boolean {
    return isHourBlocked(hour, this.options.blockStartHour, this.options.blockEndHour);
  }

  requestOverride() {
    this.forceRefresh = true;
  }

  get overrideRequested(): boolean {
    return this.forceRefresh;
  }

  shouldFetch(hour: number): boolean {
    return this.forceRefresh || !this.isBlocked(hour);
  }

  consumeOverride() {
    this.forceRefresh = false;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run `tick` every interval. The next timeout is armed only once the previous tick
   * settled, so ticks never overlap.
   */
  start(tick: () => Promise<unknown>) {
    if (this.running) return;
    this.running = true;

    const schedule = () => {
      if (!this.running) return;
      this.timer = setTimeout(() => {
        this.timer = null;
        void tick()
          .catch(error => logger.error('[scheduler] Polling tick failed', error))
          .finally(schedule);
      }, this.options.intervalMs);
    };

    schedule();
  }

  stop() {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
