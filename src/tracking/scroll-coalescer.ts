/**
 * Scroll Coalescer
 *
 * Collapses bursts of raw scroll signals into one scroll-started and one
 * scroll-stopped event. The stop is emitted once no signal has arrived for
 * the profile's reshow delay.
 */

import type { ScrollStartedEvent, ScrollStoppedEvent } from '../events/coordinator-events.js';
import type { AppBehaviorProfile } from '../profiles/app-behavior.types.js';
import type { TimerScheduler } from '../scheduler/timer-scheduler.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('ScrollCoalescer');

export type ScrollEvent = ScrollStartedEvent | ScrollStoppedEvent;

export type ScrollSignalOutcome = 'ignored-replacement-grace' | 'ignored-profile' | 'started' | 'extended';

export interface ScrollSignalContext {
  nowMs: number;
  lastReplacementAtMs: number | null;
  profile: AppBehaviorProfile;
}

export class ScrollCoalescer {
  private scrolling = false;

  constructor(
    private readonly scheduler: TimerScheduler,
    private readonly replacementGraceMs: number,
    private readonly emit: (event: ScrollEvent) => void
  ) {}

  signal({ nowMs, lastReplacementAtMs, profile }: ScrollSignalContext): ScrollSignalOutcome {
    // Replacing text makes some hosts report scroll activity of their own
    if (lastReplacementAtMs !== null && nowMs - lastReplacementAtMs < this.replacementGraceMs) {
      logger.debug('Scroll ignored during replacement grace period', {
        sinceReplacementMs: nowMs - lastReplacementAtMs,
      });
      return 'ignored-replacement-grace';
    }

    if (!profile.scroll.hideOnScroll) {
      return 'ignored-profile';
    }

    const outcome = this.scrolling ? 'extended' : 'started';
    if (!this.scrolling) {
      this.scrolling = true;
      this.emit({ source: 'scroll', type: 'scroll-started' });
    }

    this.scheduler.schedule('scroll-restore', profile.scroll.reshowDelayMs, () => {
      this.scrolling = false;
      this.emit({ source: 'scroll', type: 'scroll-stopped' });
    });

    return outcome;
  }

  get active(): boolean {
    return this.scrolling;
  }

  reset(): void {
    this.scheduler.cancel('scroll-restore');
    this.scrolling = false;
  }
}
