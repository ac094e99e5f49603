/**
 * Text Drift Validator
 *
 * Detects host text that changed without a notification reaching us, by
 * comparing a fresh extraction with the last text the analysis engine saw.
 */

import type { AppBehaviorProfile } from '../profiles/app-behavior.types.js';

/**
 * unchanged: identical text.
 * typing: one text extends the other at the end (normal insertion/deletion).
 * emptied: the field was cleared.
 * replaced: anything else.
 */
export type TextDrift = 'unchanged' | 'typing' | 'emptied' | 'replaced';

export interface DriftResponse {
  clearFindings: boolean;
  hideOverlays: boolean;
  /** Delay before re-reading and re-analyzing, or null for none */
  reanalyzeAfterMs: number | null;
  reason: string;
}

export interface TextDriftValidatorOptions {
  replacementGraceMs: number;
  contextSwitchGraceMs: number;
  fullReanalysisDelayMs: number;
  unreliableChannelReanalysisDelayMs: number;
}

export interface ValidationWindow {
  nowMs: number;
  findingsDisplayed: boolean;
  lastReplacementAtMs: number | null;
  lastContextSwitchAtMs: number | null;
}

const IGNORE = (reason: string): DriftResponse => ({
  clearFindings: false,
  hideOverlays: false,
  reanalyzeAfterMs: null,
  reason,
});

export class TextDriftValidator {
  constructor(private readonly options: TextDriftValidatorOptions) {}

  /**
   * Reason to skip this validation tick, or null to proceed
   */
  skipReason({ nowMs, findingsDisplayed, lastReplacementAtMs, lastContextSwitchAtMs }: ValidationWindow): string | null {
    if (!findingsDisplayed) return 'no findings displayed';
    if (lastReplacementAtMs !== null && nowMs - lastReplacementAtMs < this.options.replacementGraceMs) {
      return 'replacement grace period';
    }
    if (lastContextSwitchAtMs !== null && nowMs - lastContextSwitchAtMs < this.options.contextSwitchGraceMs) {
      return 'context switch grace period';
    }
    return null;
  }

  classify(previous: string, current: string): TextDrift {
    if (previous === current) return 'unchanged';
    if (current.length === 0) return 'emptied';
    if (current.startsWith(previous) || previous.startsWith(current)) return 'typing';
    return 'replaced';
  }

  respond(drift: TextDrift, profile: AppBehaviorProfile): DriftResponse {
    const { quirks } = profile;

    switch (drift) {
      case 'unchanged':
      case 'typing':
        return IGNORE(drift);

      case 'emptied':
        // Web views briefly report empty values while focus moves around
        if (quirks.webRendering) return IGNORE('transient empty text in web view');
        return { clearFindings: true, hideOverlays: true, reanalyzeAfterMs: null, reason: 'content cleared' };

      case 'replaced':
        if (quirks.webRendering || quirks.unstableTextRetrieval) {
          return IGNORE('text retrieval noise');
        }
        if (quirks.requiresFullReanalysisAfterReplacement) {
          return {
            clearFindings: true,
            hideOverlays: false,
            reanalyzeAfterMs: this.options.fullReanalysisDelayMs,
            reason: 'full reanalysis',
          };
        }
        if (quirks.unreliableNotifications) {
          return {
            clearFindings: true,
            hideOverlays: true,
            reanalyzeAfterMs: this.options.unreliableChannelReanalysisDelayMs,
            reason: 'missed change notification',
          };
        }
        return { clearFindings: false, hideOverlays: true, reanalyzeAfterMs: null, reason: 'content replaced' };
    }
  }
}
