/**
 * App Behavior Profile Types
 *
 * Per-application quirk flags and timing parameters. Profiles are frozen
 * once resolved; the coordinator never mutates them.
 */

import { z } from 'zod';

export const AppQuirksSchema = z.object({
  /** Rendered by a web engine (Electron/Chromium/WebKit views) */
  webRendering: z.boolean().default(false),
  /** Text read back from the host varies between reads without edits */
  unstableTextRetrieval: z.boolean().default(false),
  /** Findings must be recomputed from scratch after a replacement */
  requiresFullReanalysisAfterReplacement: z.boolean().default(false),
  /** Terminal emulator; underline positions cannot be trusted */
  terminal: z.boolean().default(false),
  /** Chat client where the compose field moves on conversation switch */
  messenger: z.boolean().default(false),
  /** Value-change notifications are often not delivered */
  unreliableNotifications: z.boolean().default(false),
  /** Returns the previous conversation's text for a while after a switch */
  staleTextAfterContextSwitch: z.boolean().default(false),
});

export const ScrollBehaviorSchema = z.object({
  /** Whether underlines are hidden while the host scrolls */
  hideOnScroll: z.boolean().default(true),
  /** Quiet period after the last scroll signal before redrawing (ms) */
  reshowDelayMs: z.number().int().nonnegative().default(300),
});

export const TimingProfileSchema = z.object({
  /** Wait after a conversation switch before reading text again (ms) */
  contextSwitchDelayMs: z.number().int().nonnegative().default(200),
});

export const AppBehaviorProfileSchema = z.object({
  applicationId: z.string().min(1),
  displayName: z.string().min(1),
  quirks: AppQuirksSchema.default({}),
  scroll: ScrollBehaviorSchema.default({}),
  timing: TimingProfileSchema.default({}),
});

export type AppQuirks = z.infer<typeof AppQuirksSchema>;
export type ScrollBehavior = z.infer<typeof ScrollBehaviorSchema>;
export type TimingProfile = z.infer<typeof TimingProfileSchema>;
export type AppBehaviorProfileInput = z.input<typeof AppBehaviorProfileSchema>;

export interface AppBehaviorProfile {
  readonly applicationId: string;
  readonly displayName: string;
  readonly quirks: Readonly<AppQuirks>;
  readonly scroll: Readonly<ScrollBehavior>;
  readonly timing: Readonly<TimingProfile>;
}

/**
 * Read-only lookup of profiles by application identifier
 */
export interface AppBehaviorLookup {
  resolve(applicationId: string): AppBehaviorProfile;
}
