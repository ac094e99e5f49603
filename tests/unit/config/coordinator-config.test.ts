/**
 * Coordinator configuration tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_COORDINATOR_CONFIG,
  loadCoordinatorConfig,
} from '../../../src/config/coordinator-config.js';
import { ConfigurationError, ErrorCode } from '../../../src/shared/errors/index.js';
import { catchSyncError } from '../../helpers/test-utils.js';

describe('loadCoordinatorConfig', () => {
  it('should apply defaults for every threshold', () => {
    const config = loadCoordinatorConfig({}, {});

    expect(config.pollIntervalMs).toBe(50);
    expect(config.positionThresholdPx).toBe(5);
    expect(config.sizeThresholdPx).toBe(5);
    expect(config.reshowSettleDelayMs).toBe(150);
    expect(config.maxPositionSyncRetries).toBe(10);
    expect(config.largeMoveThresholdPx).toBe(500);
    expect(config.replacementGraceMs).toBe(1500);
    expect(config.contentSettle).toEqual({
      positionTolerancePx: 3,
      widthTolerancePx: 2,
      requiredStableSamples: 4,
      sampleIntervalMs: 100,
      maxEpisodeMs: 1000,
    });
  });

  it('should match the exported defaults', () => {
    expect(loadCoordinatorConfig({}, {})).toEqual(DEFAULT_COORDINATOR_CONFIG);
  });

  it('should read OVERLAY_* environment variables', () => {
    const config = loadCoordinatorConfig(
      {},
      { OVERLAY_POLL_INTERVAL_MS: '100', OVERLAY_LARGE_MOVE_THRESHOLD_PX: '750' }
    );

    expect(config.pollIntervalMs).toBe(100);
    expect(config.largeMoveThresholdPx).toBe(750);
  });

  it('should let programmatic overrides win over the environment', () => {
    const config = loadCoordinatorConfig({ pollIntervalMs: 25 }, { OVERLAY_POLL_INTERVAL_MS: '100' });
    expect(config.pollIntervalMs).toBe(25);
  });

  it('should ignore blank environment values', () => {
    expect(loadCoordinatorConfig({}, { OVERLAY_POLL_INTERVAL_MS: '  ' }).pollIntervalMs).toBe(50);
  });

  it('should reject a non-numeric environment value', () => {
    const error = catchSyncError(() => loadCoordinatorConfig({}, { OVERLAY_SIZE_THRESHOLD_PX: 'wide' }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.message).toBe(
      'OVERLAY_SIZE_THRESHOLD_PX must be a number, got "wide"'
    );
  });

  it('should reject values that fail validation', () => {
    const error = catchSyncError(() => loadCoordinatorConfig({ pollIntervalMs: -1 }, {}));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error instanceof ConfigurationError && error.message).toContain('pollIntervalMs');
  });

  it('should accept nested content settle overrides', () => {
    const config = loadCoordinatorConfig({ contentSettle: { requiredStableSamples: 6 } }, {});

    expect(config.contentSettle.requiredStableSamples).toBe(6);
    expect(config.contentSettle.sampleIntervalMs).toBe(100);
  });
});
