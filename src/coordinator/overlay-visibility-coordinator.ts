/**
 * Overlay Visibility Coordinator
 *
 * Decides when overlays for the observed text element are shown, hidden,
 * redrawn or invalidated. Detectors never touch state directly: each poll or
 * timer gathers host answers, turns them into typed events and drains them
 * through a single handler, in source order (window, element, scroll, text).
 *
 * Every asynchronous continuation carries the session epoch it was started
 * under and drops itself once monitoring stopped or restarted. The reshow
 * sequence additionally carries a movement cycle so that a new movement
 * supersedes a reshow already in progress.
 */

import { DEFAULT_COORDINATOR_CONFIG, type CoordinatorConfig } from '../config/coordinator-config.js';
import type {
  CoordinatorEvent,
  ElementChangedEvent,
  TextDriftEvent,
  WindowMovedEvent,
  WindowOffScreenEvent,
} from '../events/coordinator-events.js';
import { EventChannel } from '../events/event-channel.js';
import { distance, type Rect } from '../geometry/rect.js';
import type {
  AnalysisEngine,
  ElementHandle,
  Finding,
  HostQuery,
  MonitoringContext,
  PresentationLayer,
} from '../host/host.types.js';
import { queryOrNull } from '../host/query-or-null.js';
import { AppBehaviorRegistry } from '../profiles/app-behavior-registry.js';
import type { AppBehaviorLookup, AppBehaviorProfile } from '../profiles/app-behavior.types.js';
import { FrameSampler } from '../sampling/frame-sampler.js';
import { RetryBudget } from '../sampling/retry-budget.js';
import { StabilityGate } from '../sampling/stability-gate.js';
import type { Clock } from '../scheduler/clock.js';
import { TimerScheduler } from '../scheduler/timer-scheduler.js';
import { ErrorCode } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import { ElementFrameTracker } from '../tracking/element-frame-tracker.js';
import { ScrollCoalescer } from '../tracking/scroll-coalescer.js';
import { TextDriftValidator } from '../tracking/text-drift-validator.js';
import { AnalysisRunner } from './analysis-runner.js';
import {
  activeSuppressions,
  createSuppressionState,
  isDisplayEligible,
  type SuppressionState,
} from './suppression-state.js';

const logger = createLogger('OverlayVisibilityCoordinator');

export interface CoordinatorDependencies {
  host: HostQuery;
  presentation: PresentationLayer;
  analysis: AnalysisEngine;
  /** Defaults to the built-in registry */
  profiles?: AppBehaviorLookup;
  config?: CoordinatorConfig;
  clock?: Clock;
}

export interface TextSnapshot {
  /** Text whose findings are currently cached */
  lastAnalyzedText: string | null;
  /** Text most recently handed to the analysis engine */
  lastSubmittedText: string | null;
  lastReplacementAtMs: number | null;
  lastContextSwitchAtMs: number | null;
}

/**
 * Read-only view of the coordinator, for diagnostics and tests
 */
export interface CoordinatorSnapshot {
  active: boolean;
  applicationId: string | null;
  elementId: string | null;
  suppression: SuppressionState;
  eligible: boolean;
  findings: readonly Finding[];
  text: TextSnapshot;
  toggleInProgress: boolean;
  persistentOffScreen: boolean;
  pendingTimers: number;
}

interface SessionState {
  context: MonitoringContext;
  element: ElementHandle | null;
  /** Resolved once per session */
  profile: AppBehaviorProfile;
  suppression: SuppressionState;
  findings: Finding[];
  text: TextSnapshot;
  toggleInProgress: boolean;
  persistentOffScreen: boolean;
  /** The reshow timer has fired and its sequence has not finished */
  reshowActive: boolean;
  movementCycle: number;
}

function emptyTextSnapshot(): TextSnapshot {
  return {
    lastAnalyzedText: null,
    lastSubmittedText: null,
    lastReplacementAtMs: null,
    lastContextSwitchAtMs: null,
  };
}

function sameApplication(left: MonitoringContext, right: MonitoringContext): boolean {
  return left.processId === right.processId && left.applicationId === right.applicationId;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * @example
 * ```typescript
 * const coordinator = new OverlayVisibilityCoordinator({ host, presentation, analysis });
 * coordinator.startMonitoring({ processId: 4242, applicationId: 'com.apple.mail', applicationName: 'Mail' });
 * await coordinator.handleTextChange('Helo world', context);
 * ```
 */
export class OverlayVisibilityCoordinator {
  private readonly config: CoordinatorConfig;
  private readonly profiles: AppBehaviorLookup;
  private readonly scheduler: TimerScheduler;
  private readonly channel = new EventChannel();

  private readonly frameSampler: FrameSampler;
  private readonly elementTracker: ElementFrameTracker;
  private readonly scrollCoalescer: ScrollCoalescer;
  private readonly textValidator: TextDriftValidator;
  private readonly runner: AnalysisRunner;

  private readonly retryBudget: RetryBudget;
  private readonly positionGate: StabilityGate;
  private readonly contentGate: StabilityGate;
  private readonly toggleGate: StabilityGate;

  private session: SessionState | null = null;
  private epoch = 0;
  private pollInFlight: number | null = null;
  private validationInFlight: number | null = null;

  constructor(private readonly deps: CoordinatorDependencies) {
    this.config = deps.config ?? DEFAULT_COORDINATOR_CONFIG;
    this.profiles = deps.profiles ?? new AppBehaviorRegistry();
    this.scheduler = new TimerScheduler(deps.clock);

    const config = this.config;
    this.frameSampler = new FrameSampler({
      positionThresholdPx: config.positionThresholdPx,
      sizeThresholdPx: config.sizeThresholdPx,
      offScreenFailureThreshold: config.offScreenFailureThreshold,
    });
    this.elementTracker = new ElementFrameTracker({
      heightChangeThresholdPx: config.elementHeightChangeThresholdPx,
      moveThresholdPx: config.elementMoveThresholdPx,
      largeMoveThresholdPx: config.largeMoveThresholdPx,
    });
    this.scrollCoalescer = new ScrollCoalescer(this.scheduler, config.replacementGraceMs, (event) =>
      this.emit(event)
    );
    this.textValidator = new TextDriftValidator({
      replacementGraceMs: config.replacementGraceMs,
      contextSwitchGraceMs: config.contextSwitchGraceMs,
      fullReanalysisDelayMs: config.fullReanalysisDelayMs,
      unreliableChannelReanalysisDelayMs: config.unreliableChannelReanalysisDelayMs,
    });
    this.runner = new AnalysisRunner(deps.analysis, () => ({
      epoch: this.epoch,
      elementId: this.session?.element?.id ?? null,
    }));

    this.retryBudget = new RetryBudget(config.maxPositionSyncRetries);
    this.positionGate = new StabilityGate({
      positionTolerancePx: config.elementStabilityTolerancePx,
      requiredStableSamples: 1,
    });
    const settle = config.contentSettle;
    const contentSettleOptions = {
      positionTolerancePx: settle.positionTolerancePx,
      widthTolerancePx: settle.widthTolerancePx,
      requiredStableSamples: settle.requiredStableSamples,
      maxEpisodeMs: settle.maxEpisodeMs,
    };
    this.contentGate = new StabilityGate(contentSettleOptions);
    this.toggleGate = new StabilityGate(contentSettleOptions);
  }

  // ============================================
  // Public API
  // ============================================

  /**
   * Begin observing context. Any previous session is torn down first.
   */
  startMonitoring(context: MonitoringContext): void {
    if (this.session) {
      this.teardown();
    }

    this.epoch++;
    const epoch = this.epoch;
    const profile = this.profiles.resolve(context.applicationId);

    this.session = {
      context,
      element: context.element ?? null,
      profile,
      suppression: createSuppressionState(),
      findings: [],
      text: emptyTextSnapshot(),
      toggleInProgress: false,
      persistentOffScreen: false,
      reshowActive: false,
      movementCycle: 0,
    };

    this.scheduler.repeat('window-poll', this.config.pollIntervalMs, () => {
      this.spawn('Window poll', this.poll(epoch));
    });
    this.scheduler.repeat('text-validation', this.config.textValidationIntervalMs, () => {
      this.spawn('Text validation', this.validateText(epoch));
    });

    logger.info('Monitoring started', {
      applicationId: context.applicationId,
      processId: context.processId,
      profile: profile.displayName,
      elementId: context.element?.id ?? null,
    });
  }

  stopMonitoring(): void {
    const session = this.session;
    if (!session) return;

    this.teardown();
    logger.info('Monitoring stopped', { applicationId: session.context.applicationId });
  }

  /**
   * Text changed in the observed element. Starts or switches the session
   * when context belongs to another application or element.
   */
  async handleTextChange(text: string, context: MonitoringContext): Promise<void> {
    if (!this.session || !sameApplication(this.session.context, context)) {
      this.startMonitoring(context);
    }
    const session = this.session;
    if (!session) return;

    if (context.element && context.element.id !== session.element?.id) {
      this.attachElement(session, context.element);
    }

    if (text === session.text.lastSubmittedText) return;

    this.scheduler.cancel('reanalysis');
    await this.analyze(session, text);
  }

  /**
   * The frontmost application changed; null means no monitorable application
   */
  handleApplicationSwitched(context: MonitoringContext | null): void {
    if (!context) {
      this.stopMonitoring();
      return;
    }
    if (this.session && sameApplication(this.session.context, context)) {
      return;
    }
    this.startMonitoring(context);
  }

  /**
   * Raw scroll activity from the host
   */
  notifyScroll(): void {
    const session = this.session;
    if (!session) return;

    this.scrollCoalescer.signal({
      nowMs: this.scheduler.now(),
      lastReplacementAtMs: session.text.lastReplacementAtMs,
      profile: session.profile,
    });
  }

  /**
   * A suggestion was applied to the host text
   */
  notifyReplacementApplied(): void {
    const session = this.session;
    if (!session) return;
    session.text.lastReplacementAtMs = this.scheduler.now();
  }

  getState(): CoordinatorSnapshot {
    const session = this.session;
    if (!session) {
      return {
        active: false,
        applicationId: null,
        elementId: null,
        suppression: createSuppressionState(),
        eligible: false,
        findings: [],
        text: emptyTextSnapshot(),
        toggleInProgress: false,
        persistentOffScreen: false,
        pendingTimers: this.scheduler.pendingCount,
      };
    }

    return {
      active: true,
      applicationId: session.context.applicationId,
      elementId: session.element?.id ?? null,
      suppression: { ...session.suppression },
      eligible: isDisplayEligible(session.suppression),
      findings: [...session.findings],
      text: { ...session.text },
      toggleInProgress: session.toggleInProgress,
      persistentOffScreen: session.persistentOffScreen,
      pendingTimers: this.scheduler.pendingCount,
    };
  }

  // ============================================
  // Session plumbing
  // ============================================

  private teardown(): void {
    const session = this.session;

    // Bumping the epoch strands every callback and await of the old session
    this.epoch++;
    this.scheduler.cancelAll();
    this.channel.clear();
    this.runner.invalidate();

    this.frameSampler.reset();
    this.elementTracker.reset();
    this.scrollCoalescer.reset();
    this.retryBudget.reset();
    this.positionGate.reset();
    this.contentGate.reset();
    this.toggleGate.reset();

    this.hideAll();
    if (session?.toggleInProgress) {
      this.deps.presentation.setToggleInProgress(false);
    }
    this.deps.presentation.clearGeometryCache();

    this.session = null;
  }

  private sessionFor(epoch: number): SessionState | null {
    return epoch === this.epoch ? this.session : null;
  }

  private reshowSession(epoch: number, cycle: number): SessionState | null {
    const session = this.sessionFor(epoch);
    return session && session.movementCycle === cycle ? session : null;
  }

  private attachElement(session: SessionState, element: ElementHandle): void {
    logger.debug('Observed element changed', {
      from: session.element?.id ?? null,
      to: element.id,
    });

    this.hideAll();
    if (session.toggleInProgress) {
      this.finishToggle(session, false);
    }
    this.scheduler.cancel('reanalysis');
    this.elementTracker.reset();

    session.element = element;
    session.context = { ...session.context, element };
    session.findings = [];
    session.text = {
      ...emptyTextSnapshot(),
      lastReplacementAtMs: session.text.lastReplacementAtMs,
    };
  }

  private spawn(task: string, work: Promise<void>): void {
    void work.catch((error: unknown) => {
      logger.error(`${task} failed`, toError(error));
    });
  }

  private emit(event: CoordinatorEvent): void {
    this.channel.post(event);
    this.drainEvents();
  }

  private drainEvents(): void {
    this.channel.drain((event) => this.handleEvent(event));
  }

  // ============================================
  // Presentation
  // ============================================

  private hideAll(): void {
    const { presentation } = this.deps;
    presentation.hideUnderlines();
    presentation.hideIndicator();
    presentation.hidePopover();
  }

  /**
   * Show cached findings if nothing suppresses them
   *
   * @returns whether presentation commands were issued
   */
  private presentFindings(session: SessionState): boolean {
    if (!isDisplayEligible(session.suppression)) {
      logger.debug('Presentation suppressed', { flags: activeSuppressions(session.suppression) });
      return false;
    }

    const { presentation } = this.deps;
    if (session.findings.length === 0) {
      presentation.hideUnderlines();
      presentation.hideIndicator();
      return true;
    }

    // Terminals report character bounds that don't match what is drawn
    if (session.profile.quirks.terminal || !session.element) {
      presentation.hideUnderlines();
    } else {
      presentation.showUnderlines(session.findings, session.element);
    }
    presentation.updateIndicator(session.findings);
    return true;
  }

  // ============================================
  // Analysis
  // ============================================

  private async analyze(session: SessionState, text: string): Promise<void> {
    const epoch = this.epoch;
    session.text.lastSubmittedText = text;

    const findings = await this.runner.run(text, session.context);
    if (findings === null || this.sessionFor(epoch) !== session) return;

    session.findings = findings;
    session.text.lastAnalyzedText = text;
    logger.debug('Findings updated', { count: findings.length });
    this.presentFindings(session);
  }

  /**
   * Read the element's text again and analyze it, whatever was analyzed before
   */
  private async refreshFromHost(epoch: number): Promise<void> {
    const session = this.sessionFor(epoch);
    const element = session?.element;
    if (!session || !element) return;

    const text = await queryOrNull(
      'extractText',
      () => this.deps.host.extractText(element),
      ErrorCode.HOST_TEXT_EXTRACTION_FAILED
    );
    if (text === null || this.sessionFor(epoch) !== session || session.element !== element) return;

    await this.analyze(session, text);
  }

  private async reanalyzeAfterContextSwitch(epoch: number, previousText: string | null): Promise<void> {
    const session = this.sessionFor(epoch);
    const element = session?.element;
    if (!session || !element) return;

    const text = await queryOrNull(
      'extractText',
      () => this.deps.host.extractText(element),
      ErrorCode.HOST_TEXT_EXTRACTION_FAILED
    );
    if (text === null || this.sessionFor(epoch) !== session || session.element !== element) return;

    if (session.profile.quirks.staleTextAfterContextSwitch && text === previousText) {
      logger.debug('Host still reports the previous conversation text - skipping analysis');
      return;
    }

    await this.analyze(session, text);
  }

  private async reacquireElement(epoch: number): Promise<void> {
    const session = this.sessionFor(epoch);
    if (!session) return;

    const element = await queryOrNull('getFocusedElement', () =>
      this.deps.host.getFocusedElement(session.context.processId)
    );
    if (!element || this.sessionFor(epoch) !== session) return;

    logger.info('Re-acquired focused element - restarting monitoring', { elementId: element.id });
    this.startMonitoring({ ...session.context, element });
    await this.refreshFromHost(this.epoch);
  }

  // ============================================
  // Polling
  // ============================================

  private async poll(epoch: number): Promise<void> {
    const session = this.sessionFor(epoch);
    if (!session || this.pollInFlight === epoch) return;

    this.pollInFlight = epoch;
    try {
      const { host } = this.deps;
      const report = await this.frameSampler.sample(host, session.context.processId, () =>
        this.scheduler.now()
      );
      if (this.sessionFor(epoch) !== session) return;

      const element = session.element;
      let elementFrame: Rect | null = null;
      if (report.kind !== 'off-screen' && element) {
        elementFrame = await queryOrNull('getFrame', () => host.getFrame(element));
        if (this.sessionFor(epoch) !== session) return;
      }

      const events: CoordinatorEvent[] = [];
      if (report.kind === 'off-screen') {
        events.push(...FrameSampler.toEvents(report));
      } else if (session.suppression.offScreen) {
        if (session.persistentOffScreen && element && !elementFrame) {
          logger.debug('Window is back but the element has not answered yet');
          return;
        }
        events.push({ source: 'window', type: 'window-on-screen' });
        this.elementTracker.reset();
      } else if (report.kind === 'on-screen') {
        events.push({ source: 'window', type: 'window-stable' });
      } else {
        events.push(...FrameSampler.toEvents(report));
      }

      if (elementFrame && session.element === element) {
        const change = this.elementTracker.track(elementFrame, {
          findingsVisible: session.findings.length > 0 && isDisplayEligible(session.suppression),
          hasFindings: session.findings.length > 0,
          toggleInProgress: session.toggleInProgress,
          profile: session.profile,
        });
        if (change) events.push(change);
      }

      this.channel.postAll(events);
      this.drainEvents();
    } finally {
      if (this.pollInFlight === epoch) {
        this.pollInFlight = null;
      }
    }
  }

  private async validateText(epoch: number): Promise<void> {
    const session = this.sessionFor(epoch);
    if (!session || this.validationInFlight === epoch) return;

    const element = session.element;
    const previous = session.text.lastAnalyzedText;
    const skip = this.textValidator.skipReason({
      nowMs: this.scheduler.now(),
      findingsDisplayed: session.findings.length > 0 && isDisplayEligible(session.suppression),
      lastReplacementAtMs: session.text.lastReplacementAtMs,
      lastContextSwitchAtMs: session.text.lastContextSwitchAtMs,
    });
    if (skip || !element || previous === null) return;

    this.validationInFlight = epoch;
    try {
      const text = await queryOrNull(
        'extractText',
        () => this.deps.host.extractText(element),
        ErrorCode.HOST_TEXT_EXTRACTION_FAILED
      );
      if (
        text === null ||
        this.sessionFor(epoch) !== session ||
        session.element !== element ||
        session.text.lastAnalyzedText !== previous
      ) {
        return;
      }

      const drift = this.textValidator.classify(previous, text);
      if (drift === 'emptied' || drift === 'replaced') {
        this.emit({ source: 'text', type: 'text-drift', kind: drift, currentText: text });
      }
    } finally {
      if (this.validationInFlight === epoch) {
        this.validationInFlight = null;
      }
    }
  }

  // ============================================
  // Event handling
  // ============================================

  private handleEvent(event: CoordinatorEvent): void {
    const session = this.session;
    if (!session) return;

    switch (event.type) {
      case 'window-moved':
        this.onWindowMoved(session, event);
        break;
      case 'window-stable':
        this.onWindowStable(session);
        break;
      case 'window-off-screen':
        this.onWindowOffScreen(session, event);
        break;
      case 'window-on-screen':
        this.onWindowOnScreen(session);
        break;
      case 'element-changed':
        this.onElementChanged(session, event);
        break;
      case 'scroll-started':
        session.suppression.scrolling = true;
        this.deps.presentation.clearGeometryCache();
        this.deps.presentation.hideUnderlines();
        this.deps.presentation.hidePopover();
        break;
      case 'scroll-stopped':
        session.suppression.scrolling = false;
        this.presentFindings(session);
        break;
      case 'text-drift':
        this.onTextDrift(session, event);
        break;
    }
  }

  private onWindowMoved(session: SessionState, event: WindowMovedEvent): void {
    if (!session.suppression.movedOrResizing) {
      logger.debug('Window movement started', {
        cause: event.cause,
        distance: event.distance,
        widthDelta: event.widthDelta,
        heightDelta: event.heightDelta,
      });
      session.suppression.movedOrResizing = true;
      this.hideAll();
      this.deps.presentation.clearGeometryCache();
    }
    this.cancelReshow(session);
  }

  private onWindowStable(session: SessionState): void {
    if (
      !session.suppression.movedOrResizing ||
      session.reshowActive ||
      this.scheduler.isScheduled('reshow')
    ) {
      return;
    }

    const epoch = this.epoch;
    const cycle = session.movementCycle;
    this.scheduler.schedule('reshow', this.config.reshowSettleDelayMs, () => this.beginReshow(epoch, cycle));
  }

  private onWindowOffScreen(session: SessionState, event: WindowOffScreenEvent): void {
    if (!session.suppression.offScreen) {
      logger.debug('Window off-screen');
      session.suppression.offScreen = true;
      this.hideAll();
    }
    if (event.persistent) {
      session.persistentOffScreen = true;
    }
    this.cancelReshow(session);
  }

  private onWindowOnScreen(session: SessionState): void {
    logger.debug('Window back on screen', { persistent: session.persistentOffScreen });
    session.suppression.offScreen = false;
    session.persistentOffScreen = false;
    this.deps.presentation.clearGeometryCache();

    if (session.element) {
      // Cached text may belong to whatever the window showed before it left
      session.text.lastSubmittedText = null;
      this.spawn('Text refresh', this.refreshFromHost(this.epoch));
    } else if (session.findings.length > 0) {
      if (isDisplayEligible(session.suppression)) {
        this.deps.presentation.updateIndicator(session.findings);
      }
    } else {
      this.spawn('Element re-acquisition', this.reacquireElement(this.epoch));
    }
  }

  private onElementChanged(session: SessionState, event: ElementChangedEvent): void {
    if (session.suppression.movedOrResizing) {
      logger.debug('Element change ignored while window is moving', { kind: event.kind });
      return;
    }

    const { presentation } = this.deps;
    switch (event.kind) {
      case 'content-cleared':
        logger.debug('Element shrank - content cleared', { heightDelta: event.heightDelta });
        session.findings = [];
        this.runner.invalidate();
        this.hideAll();
        break;

      case 'content-grown':
        presentation.clearGeometryCache();
        presentation.hideUnderlines();
        break;

      case 'context-switch':
        this.onContextSwitch(session);
        break;

      case 'different-element':
        logger.debug('Element relocated far away - treating as a different element', {
          distance: event.distance,
        });
        break;

      case 'toggle-ignored':
        break;

      case 'toggle-started':
        presentation.clearGeometryCache();
        session.toggleInProgress = true;
        presentation.setToggleInProgress(true);
        this.toggleGate.begin(this.scheduler.now());
        this.spawn('Toggle settle', this.toggleSettleSample(this.epoch));
        break;
    }
  }

  private onContextSwitch(session: SessionState): void {
    const epoch = this.epoch;
    const previousText = session.text.lastAnalyzedText;
    logger.debug('Conversation switch detected', { delayMs: session.profile.timing.contextSwitchDelayMs });

    session.findings = [];
    session.text = {
      ...emptyTextSnapshot(),
      lastReplacementAtMs: session.text.lastReplacementAtMs,
      lastContextSwitchAtMs: this.scheduler.now(),
    };
    this.runner.invalidate();
    this.hideAll();

    this.scheduler.schedule('reanalysis', session.profile.timing.contextSwitchDelayMs, () => {
      this.spawn('Context switch reanalysis', this.reanalyzeAfterContextSwitch(epoch, previousText));
    });
  }

  private onTextDrift(session: SessionState, event: TextDriftEvent): void {
    const response = this.textValidator.respond(event.kind, session.profile);
    logger.debug('Text drift detected', { kind: event.kind, reason: response.reason });

    if (response.clearFindings) {
      session.findings = [];
      // an analysis still running was computed for the text that is gone
      this.runner.invalidate();
    }
    if (response.hideOverlays) {
      this.hideAll();
    }
    if (response.reanalyzeAfterMs !== null) {
      const epoch = this.epoch;
      session.text.lastSubmittedText = null;
      this.scheduler.schedule('reanalysis', response.reanalyzeAfterMs, () => {
        this.spawn('Drift reanalysis', this.refreshFromHost(epoch));
      });
    }
  }

  // ============================================
  // Reshow sequence
  // ============================================

  /**
   * Abandon any reshow in progress and start a fresh movement cycle
   */
  private cancelReshow(session: SessionState): void {
    this.scheduler.cancel('reshow');
    session.reshowActive = false;
    session.movementCycle++;
    session.suppression.positionSyncRetryCount = 0;
    session.suppression.contentStabilityCount = 0;
    this.retryBudget.reset();
    this.positionGate.reset();
    this.contentGate.reset();
  }

  private beginReshow(epoch: number, cycle: number): void {
    const session = this.reshowSession(epoch, cycle);
    if (!session) return;

    session.reshowActive = true;
    this.retryBudget.reset();

    const now = this.scheduler.now();
    this.positionGate.begin(now);
    const lastKnown = this.elementTracker.currentFrame;
    if (lastKnown) {
      this.positionGate.sample(lastKnown, now);
    }

    this.spawn('Position sync', this.positionSyncAttempt(epoch, cycle));
  }

  private async positionSyncAttempt(epoch: number, cycle: number): Promise<void> {
    const session = this.reshowSession(epoch, cycle);
    if (!session) return;

    const synced = await this.checkPositionSync(session);
    if (!this.reshowSession(epoch, cycle)) return;

    if (synced) {
      if (this.retryBudget.count > 0) {
        this.scheduler.schedule('reshow', this.config.postSyncSettleDelayMs, () =>
          this.afterPositionSync(epoch, cycle)
        );
      } else {
        this.afterPositionSync(epoch, cycle);
      }
      return;
    }

    if (this.retryBudget.tryConsume()) {
      session.suppression.positionSyncRetryCount = this.retryBudget.count;
      this.scheduler.schedule('reshow', this.config.positionSyncRetryIntervalMs, () => {
        this.spawn('Position sync', this.positionSyncAttempt(epoch, cycle));
      });
      return;
    }

    logger.warning('Position sync retries exhausted - reshowing with unverified geometry', {
      retries: this.retryBudget.count,
    });
    this.afterPositionSync(epoch, cycle);
  }

  /**
   * The window query and the element agree on where the window is, and the
   * element itself has stopped moving
   */
  private async checkPositionSync(session: SessionState): Promise<boolean> {
    const { host } = this.deps;
    const element = session.element;

    const windowFrame = await queryOrNull(
      'getFrontmostWindowFrame',
      () => host.getFrontmostWindowFrame(session.context.processId),
      ErrorCode.HOST_WINDOW_QUERY_FAILED
    );
    if (!windowFrame) return false;
    if (!element) return true;

    const reportedOrigin = await queryOrNull('getWindowOrigin', () => host.getWindowOrigin(element));
    if (reportedOrigin && distance(windowFrame, reportedOrigin) > this.config.windowAgreementTolerancePx) {
      logger.debug('Window position sources disagree', {
        window: { x: windowFrame.x, y: windowFrame.y },
        element: reportedOrigin,
      });
      return false;
    }

    const frame = await queryOrNull('getFrame', () => host.getFrame(element));
    return this.positionGate.sample(frame, this.scheduler.now()).verdict === 'settled';
  }

  private afterPositionSync(epoch: number, cycle: number): void {
    const session = this.reshowSession(epoch, cycle);
    if (!session) return;

    const resizedAt = this.frameSampler.lastResizeAtMs;
    if (resizedAt === null) {
      this.completeReshow(session);
      return;
    }

    if (session.profile.quirks.webRendering && session.element) {
      this.contentGate.begin(this.scheduler.now());
      this.spawn('Content settle', this.contentSettleSample(epoch, cycle));
      return;
    }

    const remaining = this.config.minResizeSettleMs - (this.scheduler.now() - resizedAt);
    if (remaining > 0) {
      this.scheduler.schedule('reshow', remaining, () => {
        const current = this.reshowSession(epoch, cycle);
        if (current) this.completeReshow(current);
      });
      return;
    }
    this.completeReshow(session);
  }

  private async contentSettleSample(epoch: number, cycle: number): Promise<void> {
    const session = this.reshowSession(epoch, cycle);
    const element = session?.element;
    if (!session || !element) return;

    const bounds = await queryOrNull('getContentBounds', () => this.deps.host.getContentBounds(element));
    if (!this.reshowSession(epoch, cycle)) return;

    const reading = this.contentGate.sample(bounds, this.scheduler.now());
    session.suppression.contentStabilityCount = reading.stableCount;

    if (reading.verdict === 'pending') {
      this.scheduler.schedule('reshow', this.config.contentSettle.sampleIntervalMs, () => {
        this.spawn('Content settle', this.contentSettleSample(epoch, cycle));
      });
      return;
    }

    if (reading.verdict === 'timed-out') {
      logger.warning('Content did not settle before the ceiling - reshowing anyway', {
        stableCount: reading.stableCount,
        samples: this.contentGate.history.length,
      });
    }
    this.completeReshow(session);
  }

  private completeReshow(session: SessionState): void {
    session.suppression.movedOrResizing = false;
    session.suppression.positionSyncRetryCount = 0;
    session.suppression.contentStabilityCount = 0;
    session.reshowActive = false;
    this.retryBudget.reset();
    this.frameSampler.clearResize();

    logger.debug('Reshow complete');
    this.deps.presentation.clearGeometryCache();
    this.presentFindings(session);
  }

  // ============================================
  // Toggle settle
  // ============================================

  private async toggleSettleSample(epoch: number): Promise<void> {
    const session = this.sessionFor(epoch);
    const element = session?.element;
    if (!session || !element || !session.toggleInProgress) return;

    const bounds = await queryOrNull('getContentBounds', () => this.deps.host.getContentBounds(element));
    if (this.sessionFor(epoch) !== session || !session.toggleInProgress) return;

    const reading = this.toggleGate.sample(bounds, this.scheduler.now());
    if (reading.verdict === 'pending') {
      this.scheduler.schedule('toggle-settle', this.config.contentSettle.sampleIntervalMs, () => {
        this.spawn('Toggle settle', this.toggleSettleSample(epoch));
      });
      return;
    }

    this.finishToggle(session, true);
  }

  private finishToggle(session: SessionState, redraw: boolean): void {
    this.scheduler.cancel('toggle-settle');
    this.toggleGate.reset();
    session.toggleInProgress = false;
    this.deps.presentation.setToggleInProgress(false);

    if (redraw) {
      this.deps.presentation.clearGeometryCache();
      this.presentFindings(session);
    }
  }
}
