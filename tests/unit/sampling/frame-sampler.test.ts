/**
 * FrameSampler Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../../src/shared/services/logging.service.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    notice: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    critical: vi.fn(),
  })),
}));

import { FrameSampler } from '../../../src/sampling/frame-sampler.js';
import type { Rect } from '../../../src/geometry/rect.js';

const frame = (x: number, y: number, width = 800, height = 600): Rect => ({ x, y, width, height });

describe('FrameSampler', () => {
  let sampler: FrameSampler;

  beforeEach(() => {
    sampler = new FrameSampler({
      positionThresholdPx: 5,
      sizeThresholdPx: 5,
      offScreenFailureThreshold: 3,
    });
  });

  describe('evaluate', () => {
    it('should report the first frame as initial', () => {
      expect(sampler.evaluate(frame(0, 0), 0).kind).toBe('initial');
      expect(sampler.currentFrame).toEqual(frame(0, 0));
    });

    it('should report stable for changes within both thresholds', () => {
      const samples = [frame(0, 0), frame(3, 4), frame(6, 8, 805, 595), frame(3, 4, 800, 600), frame(0, 0, 795, 605)];

      const kinds = samples.map((sample, index) => sampler.evaluate(sample, index * 50).kind);

      expect(kinds).toEqual(['initial', 'stable', 'stable', 'stable', 'stable']);
      expect(sampler.lastResizeAtMs).toBeNull();
    });

    it('should report a position move beyond the threshold', () => {
      sampler.evaluate(frame(0, 0), 0);
      const report = sampler.evaluate(frame(6, 0), 50);

      expect(report).toEqual({
        kind: 'moved',
        frame: frame(6, 0),
        cause: 'position',
        distance: 6,
        widthDelta: 0,
        heightDelta: 0,
      });
      expect(sampler.lastResizeAtMs).toBeNull();
    });

    it('should report a resize and record when it happened', () => {
      sampler.evaluate(frame(0, 0), 0);
      const report = sampler.evaluate(frame(0, 0, 800, 640), 50);

      expect(report.kind).toBe('moved');
      expect(report.kind === 'moved' && report.cause).toBe('size');
      expect(sampler.lastResizeAtMs).toBe(50);

      sampler.clearResize();
      expect(sampler.lastResizeAtMs).toBeNull();
    });

    it('should report both when position and size change', () => {
      sampler.evaluate(frame(0, 0), 0);
      const report = sampler.evaluate(frame(30, 40, 900, 600), 50);

      expect(report.kind === 'moved' && report.cause).toBe('both');
      expect(report.kind === 'moved' && report.distance).toBe(50);
    });

    it('should mark off-screen persistent after the failure threshold', () => {
      sampler.evaluate(frame(0, 0), 0);

      expect(sampler.evaluate(null, 50)).toEqual({ kind: 'off-screen', persistent: false, consecutiveFailures: 1 });
      expect(sampler.evaluate(null, 100)).toEqual({ kind: 'off-screen', persistent: false, consecutiveFailures: 2 });
      expect(sampler.evaluate(null, 150)).toEqual({ kind: 'off-screen', persistent: true, consecutiveFailures: 3 });
    });

    it('should report on-screen when a frame returns, then compare from it', () => {
      sampler.evaluate(frame(0, 0), 0);
      sampler.evaluate(null, 50);

      expect(sampler.evaluate(frame(400, 400), 100).kind).toBe('on-screen');
      expect(sampler.evaluate(frame(401, 400), 150).kind).toBe('stable');
    });

    it('should reset the failure count once a frame is obtained', () => {
      sampler.evaluate(null, 0);
      sampler.evaluate(null, 50);
      sampler.evaluate(frame(0, 0), 100);

      const report = sampler.evaluate(null, 150);
      expect(report.kind === 'off-screen' && report.consecutiveFailures).toBe(1);
    });
  });

  describe('sample', () => {
    it('should treat a throwing window query as off-screen', async () => {
      const query = { getFrontmostWindowFrame: vi.fn().mockRejectedValue(new Error('window server gone')) };

      const report = await sampler.sample(query, 42, () => 0);

      expect(report.kind).toBe('off-screen');
      expect(query.getFrontmostWindowFrame).toHaveBeenCalledWith(42);
    });

    it('should evaluate the frame the query returns', async () => {
      const query = { getFrontmostWindowFrame: vi.fn().mockResolvedValue(frame(10, 10)) };

      const report = await sampler.sample(query, 42, () => 0);

      expect(report).toEqual({ kind: 'initial', frame: frame(10, 10) });
    });
  });

  describe('toEvents', () => {
    it('should emit nothing for the initial frame', () => {
      expect(FrameSampler.toEvents({ kind: 'initial', frame: frame(0, 0) })).toEqual([]);
    });

    it('should map reports to window events', () => {
      expect(FrameSampler.toEvents({ kind: 'stable', frame: frame(0, 0) })).toEqual([
        { source: 'window', type: 'window-stable' },
      ]);
      expect(FrameSampler.toEvents({ kind: 'off-screen', persistent: true, consecutiveFailures: 3 })).toEqual([
        { source: 'window', type: 'window-off-screen', persistent: true },
      ]);
      expect(FrameSampler.toEvents({ kind: 'on-screen', frame: frame(0, 0) })).toEqual([
        { source: 'window', type: 'window-on-screen' },
      ]);
    });
  });
});
