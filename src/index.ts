/**
 * overlay-sentinel
 *
 * Decides when overlays drawn over a third-party text field are shown,
 * hidden, redrawn or re-analyzed, based on polled window and element
 * geometry, scroll activity and silent text drift.
 */

// Coordinator
export {
  OverlayVisibilityCoordinator,
  type CoordinatorDependencies,
  type CoordinatorSnapshot,
  type TextSnapshot,
} from './coordinator/overlay-visibility-coordinator.js';
export { AnalysisRunner, type AnalysisTarget } from './coordinator/analysis-runner.js';
export {
  activeSuppressions,
  createSuppressionState,
  isDisplayEligible,
  type SuppressionState,
} from './coordinator/suppression-state.js';

// Detectors
export { FrameSampler, type FrameReport, type FrameSamplerOptions } from './sampling/frame-sampler.js';
export {
  StabilityGate,
  type StabilityGateOptions,
  type StabilityReading,
  type StabilitySample,
  type StabilityVerdict,
} from './sampling/stability-gate.js';
export { RetryBudget } from './sampling/retry-budget.js';
export {
  ElementFrameTracker,
  type ElementFrameTrackerOptions,
  type ElementTrackingContext,
} from './tracking/element-frame-tracker.js';
export { ScrollCoalescer, type ScrollEvent, type ScrollSignalOutcome } from './tracking/scroll-coalescer.js';
export {
  TextDriftValidator,
  type DriftResponse,
  type TextDrift,
  type TextDriftValidatorOptions,
} from './tracking/text-drift-validator.js';

// Events and scheduling
export type * from './events/coordinator-events.js';
export { EventChannel, type EventHandler } from './events/event-channel.js';
export { TimerScheduler, type TimerKey } from './scheduler/timer-scheduler.js';
export { systemClock, type Clock, type TimerHandle } from './scheduler/clock.js';

// Host
export type * from './host/host.types.js';
export { PlaywrightHost, type PlaywrightHostOptions } from './host/playwright-host.js';
export { queryOrNull } from './host/query-or-null.js';

// Profiles and configuration
export { AppBehaviorRegistry } from './profiles/app-behavior-registry.js';
export { BUILTIN_PROFILES } from './profiles/builtin-profiles.js';
export * from './profiles/app-behavior.types.js';
export * from './config/coordinator-config.js';
export { distance, originOf, sizeDelta, PointSchema, RectSchema, type Point, type Rect } from './geometry/rect.js';

// Shared
export * from './shared/errors/index.js';
export {
  createLogger,
  getLogger,
  setLogger,
  parseLogLevel,
  LoggingService,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type Logger,
} from './shared/services/logging.service.js';
