/**
 * ElementFrameTracker Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ElementFrameTracker, type ElementTrackingContext } from '../../../src/tracking/element-frame-tracker.js';
import { AppBehaviorRegistry } from '../../../src/profiles/app-behavior-registry.js';
import type { Rect } from '../../../src/geometry/rect.js';

const registry = new AppBehaviorRegistry();
const BASE: Rect = { x: 20, y: 400, width: 600, height: 80 };

function context(overrides: Partial<ElementTrackingContext> = {}): ElementTrackingContext {
  return {
    findingsVisible: true,
    hasFindings: true,
    toggleInProgress: false,
    profile: registry.resolve('com.apple.mail'),
    ...overrides,
  };
}

describe('ElementFrameTracker', () => {
  let tracker: ElementFrameTracker;

  beforeEach(() => {
    tracker = new ElementFrameTracker({
      heightChangeThresholdPx: 5,
      moveThresholdPx: 10,
      largeMoveThresholdPx: 500,
    });
    tracker.track(BASE, context());
  });

  it('should not classify the first frame', () => {
    const fresh = new ElementFrameTracker({ heightChangeThresholdPx: 5, moveThresholdPx: 10, largeMoveThresholdPx: 500 });
    expect(fresh.track(BASE, context())).toBeNull();
    expect(fresh.currentFrame).toEqual(BASE);
  });

  it('should classify a shrink while findings are visible as content cleared', () => {
    const change = tracker.track({ ...BASE, height: 60 }, context());

    expect(change).toEqual({
      source: 'element',
      type: 'element-changed',
      kind: 'content-cleared',
      heightDelta: -20,
      distance: 0,
    });
  });

  it('should ignore a shrink when nothing is visible', () => {
    expect(tracker.track({ ...BASE, height: 60 }, context({ findingsVisible: false }))).toBeNull();
  });

  it('should ignore height changes at the threshold', () => {
    expect(tracker.track({ ...BASE, height: 75 }, context())).toBeNull();
    expect(tracker.track({ ...BASE, height: 80 }, context())).toBeNull();
  });

  it('should classify growth with findings as content grown', () => {
    const change = tracker.track({ ...BASE, height: 100 }, context({ findingsVisible: false }));
    expect(change?.kind).toBe('content-grown');
    expect(change?.heightDelta).toBe(20);
  });

  it('should ignore growth without findings', () => {
    expect(tracker.track({ ...BASE, height: 100 }, context({ hasFindings: false, findingsVisible: false }))).toBeNull();
  });

  it('should ignore moves up to the move threshold', () => {
    expect(tracker.track({ ...BASE, x: BASE.x + 6, y: BASE.y + 8 }, context())).toBeNull();
  });

  it('should treat any move in a messenger as a context switch', () => {
    const messages = registry.resolve('com.apple.MobileSMS');

    expect(tracker.track({ ...BASE, y: BASE.y + 40 }, context({ profile: messages }))?.kind).toBe('context-switch');
    expect(tracker.track({ ...BASE, y: BASE.y + 1000 }, context({ profile: messages }))?.kind).toBe(
      'context-switch'
    );
  });

  it('should treat a move beyond the large-move threshold as a different element', () => {
    const change = tracker.track({ ...BASE, x: BASE.x + 360, y: BASE.y + 480 }, context());

    expect(change?.kind).toBe('different-element');
    expect(change?.distance).toBe(600);
  });

  it('should keep a move of exactly the large-move threshold as a toggle', () => {
    expect(tracker.track({ ...BASE, y: BASE.y + 500 }, context())?.kind).toBe('toggle-started');
  });

  it('should ignore moves while a toggle is settling', () => {
    expect(tracker.track({ ...BASE, y: BASE.y + 40 }, context({ toggleInProgress: true }))?.kind).toBe(
      'toggle-ignored'
    );
  });

  it('should keep the previous baseline when a query fails', () => {
    expect(tracker.track(null, context())).toBeNull();
    expect(tracker.currentFrame).toEqual(BASE);
  });

  it('should advance the baseline after every classified change', () => {
    tracker.track({ ...BASE, y: BASE.y + 40 }, context());
    expect(tracker.track({ ...BASE, y: BASE.y + 40 }, context())).toBeNull();
  });

  it('should forget the baseline on reset', () => {
    tracker.reset();
    expect(tracker.currentFrame).toBeNull();
    expect(tracker.track({ ...BASE, height: 10 }, context())).toBeNull();
  });
});
