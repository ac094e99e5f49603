/**
 * Coordinator Configuration
 *
 * Thresholds and delays for every detector, validated with zod.
 * Defaults can be overridden programmatically or via OVERLAY_* environment
 * variables (programmatic overrides win).
 */

import { z } from 'zod';
import { ConfigurationError, ErrorCode } from '../shared/errors/index.js';

const ms = z.number().int().nonnegative();
const px = z.number().nonnegative();

export const ContentSettleConfigSchema = z.object({
  /** Max origin movement between consecutive samples (px) */
  positionTolerancePx: px.default(3),
  /** Max width change between consecutive samples (px) */
  widthTolerancePx: px.default(2),
  /** Consecutive in-tolerance samples required */
  requiredStableSamples: z.number().int().positive().default(4),
  /** Interval between samples (ms) */
  sampleIntervalMs: ms.default(100),
  /** Wall-clock ceiling from episode start (ms) */
  maxEpisodeMs: ms.default(1000),
});

export const CoordinatorConfigSchema = z.object({
  // Window polling
  pollIntervalMs: ms.default(50),
  positionThresholdPx: px.default(5),
  sizeThresholdPx: px.default(5),
  offScreenFailureThreshold: z.number().int().positive().default(3),

  // Reshow after movement
  reshowSettleDelayMs: ms.default(150),
  positionSyncRetryIntervalMs: ms.default(50),
  maxPositionSyncRetries: z.number().int().nonnegative().default(10),
  windowAgreementTolerancePx: px.default(5),
  elementStabilityTolerancePx: px.default(3),
  postSyncSettleDelayMs: ms.default(100),
  minResizeSettleMs: ms.default(150),
  contentSettle: ContentSettleConfigSchema.default({}),

  // Element tracking
  elementHeightChangeThresholdPx: px.default(5),
  elementMoveThresholdPx: px.default(10),
  largeMoveThresholdPx: px.default(500),

  // Text drift
  textValidationIntervalMs: ms.default(500),
  replacementGraceMs: ms.default(1500),
  contextSwitchGraceMs: ms.default(600),
  fullReanalysisDelayMs: ms.default(100),
  unreliableChannelReanalysisDelayMs: ms.default(200),
});

export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;
export type ContentSettleConfig = z.infer<typeof ContentSettleConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;

/**
 * Environment variables recognised by loadCoordinatorConfig()
 */
const ENV_KEYS: Record<string, keyof CoordinatorConfig> = {
  OVERLAY_POLL_INTERVAL_MS: 'pollIntervalMs',
  OVERLAY_POSITION_THRESHOLD_PX: 'positionThresholdPx',
  OVERLAY_SIZE_THRESHOLD_PX: 'sizeThresholdPx',
  OVERLAY_RESHOW_SETTLE_DELAY_MS: 'reshowSettleDelayMs',
  OVERLAY_MAX_POSITION_SYNC_RETRIES: 'maxPositionSyncRetries',
  OVERLAY_LARGE_MOVE_THRESHOLD_PX: 'largeMoveThresholdPx',
  OVERLAY_TEXT_VALIDATION_INTERVAL_MS: 'textValidationIntervalMs',
  OVERLAY_REPLACEMENT_GRACE_MS: 'replacementGraceMs',
};

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, number> {
  const overrides: Record<string, number> = {};

  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${variable} must be a number, got "${raw}"`, ErrorCode.INVALID_CONFIG, {
        variable,
        value: raw,
      });
    }
    overrides[key] = value;
  }

  return overrides;
}

/**
 * Build a validated configuration.
 *
 * @param overrides - Programmatic overrides (highest precedence)
 * @param env - Environment to read OVERLAY_* variables from
 * @throws ConfigurationError when a value fails validation
 */
export function loadCoordinatorConfig(
  overrides: CoordinatorConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): CoordinatorConfig {
  const result = CoordinatorConfigSchema.safeParse({ ...readEnvOverrides(env), ...overrides });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid coordinator configuration: ${issues.join('; ')}`, ErrorCode.INVALID_CONFIG, {
      issues,
    });
  }

  return result.data;
}

/** Defaults with no environment influence */
export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = CoordinatorConfigSchema.parse({});
