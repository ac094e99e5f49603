/**
 * Element Frame Tracker
 *
 * Follows the rect of the observed element independently of its window and
 * classifies each significant change. The baseline always advances to the
 * latest frame, including when the coordinator ends up ignoring the result.
 */

import { distance, type Rect } from '../geometry/rect.js';
import type { ElementChangedEvent, ElementChangeKind } from '../events/coordinator-events.js';
import type { AppBehaviorProfile } from '../profiles/app-behavior.types.js';

export interface ElementFrameTrackerOptions {
  /** Height change that counts as content grown or cleared (exclusive, px) */
  heightChangeThresholdPx: number;
  /** Origin movement that counts as relocation (exclusive, px) */
  moveThresholdPx: number;
  /** Relocations beyond this are treated as focus landing on another element */
  largeMoveThresholdPx: number;
}

export interface ElementTrackingContext {
  /** Underlines or the indicator are currently on screen */
  findingsVisible: boolean;
  /** Cached findings exist, shown or not */
  hasFindings: boolean;
  toggleInProgress: boolean;
  profile: AppBehaviorProfile;
}

export class ElementFrameTracker {
  private lastFrame: Rect | null = null;

  constructor(private readonly options: ElementFrameTrackerOptions) {}

  /**
   * Compare frame with the previous one.
   *
   * @returns the classified change, or null when nothing significant happened
   * (including a failed query, which keeps the previous baseline)
   */
  track(frame: Rect | null, context: ElementTrackingContext): ElementChangedEvent | null {
    if (!frame) return null;

    const previous = this.lastFrame;
    this.lastFrame = frame;
    if (!previous) return null;

    const heightDelta = frame.height - previous.height;
    const moved = distance(previous, frame);
    const kind = this.classify(heightDelta, moved, context);

    if (!kind) return null;
    return { source: 'element', type: 'element-changed', kind, heightDelta, distance: moved };
  }

  private classify(
    heightDelta: number,
    moved: number,
    context: ElementTrackingContext
  ): ElementChangeKind | null {
    const { heightChangeThresholdPx, moveThresholdPx, largeMoveThresholdPx } = this.options;

    if (heightDelta < -heightChangeThresholdPx && context.findingsVisible) {
      return 'content-cleared';
    }
    if (heightDelta > heightChangeThresholdPx && context.hasFindings) {
      return 'content-grown';
    }

    if (moved <= moveThresholdPx) return null;

    // Order matters: messenger hosts move the compose field on every
    // conversation switch, whatever the distance.
    if (context.profile.quirks.messenger) return 'context-switch';
    if (moved > largeMoveThresholdPx) return 'different-element';
    if (context.toggleInProgress) return 'toggle-ignored';
    return 'toggle-started';
  }

  get currentFrame(): Rect | null {
    return this.lastFrame;
  }

  reset(): void {
    this.lastFrame = null;
  }
}
