/**
 * Timer Scheduler
 *
 * Cancellable, re-armable timers keyed by purpose. Arming a key that is
 * already scheduled replaces the pending callback, so at most one timer per
 * key exists at any time.
 */

import type { Clock, TimerHandle } from './clock.js';
import { systemClock } from './clock.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('TimerScheduler');

/**
 * Purposes the coordinator schedules work for
 */
export type TimerKey =
  | 'window-poll'
  | 'text-validation'
  | 'reshow'
  | 'scroll-restore'
  | 'toggle-settle'
  | 'reanalysis';

interface ScheduledTimer {
  handle: TimerHandle;
  dueAt: number;
}

export class TimerScheduler {
  private readonly timers = new Map<TimerKey, ScheduledTimer>();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Run callback once after delayMs. Re-arms if key is already scheduled.
   */
  schedule(key: TimerKey, delayMs: number, callback: () => void): void {
    this.cancel(key);

    const handle = this.clock.setTimeout(() => {
      this.timers.delete(key);
      this.invoke(key, callback);
    }, delayMs);

    this.timers.set(key, { handle, dueAt: this.clock.now() + delayMs });
  }

  /**
   * Run callback every intervalMs until cancelled.
   *
   * Implemented as a chain of one-shot timers so a slow callback can never
   * stack up invocations.
   */
  repeat(key: TimerKey, intervalMs: number, callback: () => void): void {
    this.cancel(key);

    const tick = (): void => {
      const handle = this.clock.setTimeout(() => {
        this.invoke(key, callback);
        // callback may have cancelled its own key
        if (this.timers.get(key)?.handle === handle) {
          tick();
        }
      }, intervalMs);
      this.timers.set(key, { handle, dueAt: this.clock.now() + intervalMs });
    };

    tick();
  }

  cancel(key: TimerKey): boolean {
    const timer = this.timers.get(key);
    if (!timer) return false;

    this.clock.clearTimeout(timer.handle);
    this.timers.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      this.clock.clearTimeout(timer.handle);
    }
    this.timers.clear();
  }

  isScheduled(key: TimerKey): boolean {
    return this.timers.has(key);
  }

  /**
   * Milliseconds until key fires, or null if not scheduled
   */
  remainingMs(key: TimerKey): number | null {
    const timer = this.timers.get(key);
    if (!timer) return null;
    return Math.max(0, timer.dueAt - this.clock.now());
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  now(): number {
    return this.clock.now();
  }

  private invoke(key: TimerKey, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      logger.error('Timer callback failed', error instanceof Error ? error : new Error(String(error)), {
        key,
      });
    }
  }
}
