/**
 * Stability Gate
 *
 * Decides when a stream of geometric samples has settled. Each sample is
 * compared with the one before it; a sample within tolerance extends the
 * consecutive-stable run, anything else restarts the run from zero.
 * An optional wall-clock ceiling guarantees every episode terminates.
 */

import { distance, type Rect } from '../geometry/rect.js';

export interface StabilityGateOptions {
  /** Max origin movement between consecutive samples (exclusive, px) */
  positionTolerancePx: number;
  /** Max width change between consecutive samples (exclusive, px). Unchecked when omitted. */
  widthTolerancePx?: number;
  /** Consecutive in-tolerance comparisons needed to settle */
  requiredStableSamples: number;
  /** Episode ceiling measured from begin() (ms). No ceiling when omitted. */
  maxEpisodeMs?: number;
}

export type StabilityVerdict = 'pending' | 'settled' | 'timed-out';

export interface StabilitySample {
  bounds: Rect;
  timestampMs: number;
}

export interface StabilityReading {
  verdict: StabilityVerdict;
  /** False when the sample only established a baseline */
  compared: boolean;
  /** Whether this sample was within tolerance of the previous one */
  withinTolerance: boolean;
  positionDelta: number | null;
  widthDelta: number | null;
  stableCount: number;
}

export class StabilityGate {
  private samples: StabilitySample[] = [];
  private baseline: Rect | null = null;
  private stableCount = 0;
  private episodeStartMs: number | null = null;

  constructor(private readonly options: StabilityGateOptions) {}

  /**
   * Start a new settle episode, discarding all previous samples
   */
  begin(nowMs: number): void {
    this.reset();
    this.episodeStartMs = nowMs;
  }

  reset(): void {
    this.samples = [];
    this.baseline = null;
    this.stableCount = 0;
    this.episodeStartMs = null;
  }

  /**
   * Feed one reading. A null reading (bounds unavailable) drops the baseline
   * and the current run.
   */
  sample(bounds: Rect | null, nowMs: number): StabilityReading {
    this.episodeStartMs ??= nowMs;

    if (!bounds) {
      this.baseline = null;
      this.stableCount = 0;
      return this.reading(nowMs, false, false, null, null);
    }

    this.samples.push({ bounds, timestampMs: nowMs });

    const previous = this.baseline;
    this.baseline = bounds;

    if (!previous) {
      return this.reading(nowMs, false, false, null, null);
    }

    const positionDelta = distance(previous, bounds);
    const widthDelta = Math.abs(bounds.width - previous.width);
    const withinTolerance =
      positionDelta < this.options.positionTolerancePx &&
      (this.options.widthTolerancePx === undefined || widthDelta < this.options.widthTolerancePx);

    this.stableCount = withinTolerance ? this.stableCount + 1 : 0;

    return this.reading(nowMs, true, withinTolerance, positionDelta, widthDelta);
  }

  get consecutiveStable(): number {
    return this.stableCount;
  }

  get hasBaseline(): boolean {
    return this.baseline !== null;
  }

  /**
   * Samples recorded in the current episode (oldest first)
   */
  get history(): readonly StabilitySample[] {
    return this.samples;
  }

  get startedAtMs(): number | null {
    return this.episodeStartMs;
  }

  private reading(
    nowMs: number,
    compared: boolean,
    withinTolerance: boolean,
    positionDelta: number | null,
    widthDelta: number | null
  ): StabilityReading {
    return {
      verdict: this.verdict(nowMs),
      compared,
      withinTolerance,
      positionDelta,
      widthDelta,
      stableCount: this.stableCount,
    };
  }

  private verdict(nowMs: number): StabilityVerdict {
    if (this.stableCount >= this.options.requiredStableSamples) {
      return 'settled';
    }
    const { maxEpisodeMs } = this.options;
    if (
      maxEpisodeMs !== undefined &&
      this.episodeStartMs !== null &&
      nowMs - this.episodeStartMs >= maxEpisodeMs
    ) {
      return 'timed-out';
    }
    return 'pending';
  }
}
