/**
 * Frame Sampler
 *
 * Compares successive window rects of the monitored process and reports
 * movement, resizing, stability and off-screen transitions.
 */

import { distance, sizeDelta, type Rect } from '../geometry/rect.js';
import type { MoveCause, WindowEvent } from '../events/coordinator-events.js';
import type { HostWindowQuery } from '../host/host.types.js';
import { queryOrNull } from '../host/query-or-null.js';
import { ErrorCode } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('FrameSampler');

export interface FrameSamplerOptions {
  /** Origin distance above which the window counts as moved (px) */
  positionThresholdPx: number;
  /** Per-axis size change above which the window counts as resized (px) */
  sizeThresholdPx: number;
  /** Consecutive failed queries before off-screen becomes persistent */
  offScreenFailureThreshold: number;
}

export type FrameReport =
  | { kind: 'initial'; frame: Rect }
  | { kind: 'stable'; frame: Rect }
  | {
      kind: 'moved';
      frame: Rect;
      cause: MoveCause;
      distance: number;
      widthDelta: number;
      heightDelta: number;
    }
  | { kind: 'off-screen'; persistent: boolean; consecutiveFailures: number }
  | { kind: 'on-screen'; frame: Rect };

export class FrameSampler {
  private lastFrame: Rect | null = null;
  private lastResizeAt: number | null = null;
  private consecutiveFailures = 0;
  private offScreen = false;

  constructor(private readonly options: FrameSamplerOptions) {}

  /**
   * Query the host and evaluate the result. Query errors are treated as a
   * missing rect for this tick.
   */
  async sample(query: HostWindowQuery, processId: number, nowMs: () => number): Promise<FrameReport> {
    const frame = await queryOrNull(
      'getFrontmostWindowFrame',
      () => query.getFrontmostWindowFrame(processId),
      ErrorCode.HOST_WINDOW_QUERY_FAILED
    );
    return this.evaluate(frame, nowMs());
  }

  evaluate(frame: Rect | null, nowMs: number): FrameReport {
    if (!frame) {
      this.consecutiveFailures++;
      this.offScreen = true;
      this.lastFrame = null;
      if (this.consecutiveFailures === this.options.offScreenFailureThreshold) {
        logger.notice('Window unavailable on consecutive polls - element considered abandoned', {
          consecutiveFailures: this.consecutiveFailures,
        });
      }
      return {
        kind: 'off-screen',
        persistent: this.consecutiveFailures >= this.options.offScreenFailureThreshold,
        consecutiveFailures: this.consecutiveFailures,
      };
    }

    this.consecutiveFailures = 0;
    const previous = this.lastFrame;
    this.lastFrame = frame;

    if (this.offScreen) {
      this.offScreen = false;
      return { kind: 'on-screen', frame };
    }

    if (!previous) {
      logger.debug('Initial window frame', { frame });
      return { kind: 'initial', frame };
    }

    const moved = distance(previous, frame);
    const size = sizeDelta(previous, frame);
    const positionChanged = moved > this.options.positionThresholdPx;
    const sizeChanged =
      size.width > this.options.sizeThresholdPx || size.height > this.options.sizeThresholdPx;

    if (!positionChanged && !sizeChanged) {
      return { kind: 'stable', frame };
    }

    if (sizeChanged) {
      this.lastResizeAt = nowMs;
    }

    const cause: MoveCause = positionChanged && sizeChanged ? 'both' : sizeChanged ? 'size' : 'position';
    return {
      kind: 'moved',
      frame,
      cause,
      distance: moved,
      widthDelta: size.width,
      heightDelta: size.height,
    };
  }

  /**
   * Translate a report into coordinator events
   */
  static toEvents(report: FrameReport): WindowEvent[] {
    switch (report.kind) {
      case 'initial':
        return [];
      case 'stable':
        return [{ source: 'window', type: 'window-stable' }];
      case 'moved':
        return [
          {
            source: 'window',
            type: 'window-moved',
            cause: report.cause,
            distance: report.distance,
            widthDelta: report.widthDelta,
            heightDelta: report.heightDelta,
          },
        ];
      case 'off-screen':
        return [{ source: 'window', type: 'window-off-screen', persistent: report.persistent }];
      case 'on-screen':
        return [{ source: 'window', type: 'window-on-screen' }];
    }
  }

  /**
   * Time of the most recent resize, or null if none since the last clear
   */
  get lastResizeAtMs(): number | null {
    return this.lastResizeAt;
  }

  clearResize(): void {
    this.lastResizeAt = null;
  }

  get currentFrame(): Rect | null {
    return this.lastFrame;
  }

  reset(): void {
    this.lastFrame = null;
    this.lastResizeAt = null;
    this.consecutiveFailures = 0;
    this.offScreen = false;
  }
}
