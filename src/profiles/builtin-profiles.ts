/**
 * Built-in application profiles
 *
 * Web-rendered hosts get a longer scroll reshow delay because their
 * accessibility geometry lags behind the visible layout.
 */

import type { AppBehaviorProfileInput } from './app-behavior.types.js';

const WEB_SCROLL_RESHOW_MS = 700;

export const BUILTIN_PROFILES: readonly AppBehaviorProfileInput[] = [
  {
    applicationId: 'com.tinyspeck.slackmacgap',
    displayName: 'Slack',
    quirks: { webRendering: true, requiresFullReanalysisAfterReplacement: true },
    // Scroll events are unreliable in Slack
    scroll: { hideOnScroll: false, reshowDelayMs: WEB_SCROLL_RESHOW_MS },
  },
  {
    applicationId: 'notion.id',
    displayName: 'Notion',
    quirks: { webRendering: true },
    scroll: { reshowDelayMs: WEB_SCROLL_RESHOW_MS },
  },
  {
    applicationId: 'com.microsoft.teams2',
    displayName: 'Microsoft Teams',
    quirks: { webRendering: true, unstableTextRetrieval: true },
    scroll: { reshowDelayMs: WEB_SCROLL_RESHOW_MS },
  },
  {
    applicationId: 'com.google.Chrome',
    displayName: 'Google Chrome',
    quirks: { webRendering: true },
    scroll: { reshowDelayMs: WEB_SCROLL_RESHOW_MS },
  },
  {
    applicationId: 'com.apple.MobileSMS',
    displayName: 'Messages',
    quirks: { messenger: true, unreliableNotifications: true },
    timing: { contextSwitchDelayMs: 200 },
  },
  {
    applicationId: 'net.whatsapp.WhatsApp',
    displayName: 'WhatsApp',
    quirks: { messenger: true, unreliableNotifications: true, staleTextAfterContextSwitch: true },
    timing: { contextSwitchDelayMs: 500 },
  },
  {
    applicationId: 'ru.keepcoder.Telegram',
    displayName: 'Telegram',
    quirks: { messenger: true },
    timing: { contextSwitchDelayMs: 150 },
  },
  {
    applicationId: 'com.microsoft.Word',
    displayName: 'Microsoft Word',
    quirks: { requiresFullReanalysisAfterReplacement: true },
  },
  {
    applicationId: 'com.microsoft.Powerpoint',
    displayName: 'Microsoft PowerPoint',
    quirks: { requiresFullReanalysisAfterReplacement: true },
  },
  {
    applicationId: 'com.apple.Terminal',
    displayName: 'Terminal',
    quirks: { terminal: true },
  },
  {
    applicationId: 'com.googlecode.iterm2',
    displayName: 'iTerm2',
    quirks: { terminal: true },
  },
  {
    applicationId: 'com.apple.mail',
    displayName: 'Mail',
  },
];
