/**
 * AppBehaviorRegistry Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { AppBehaviorRegistry } from '../../../src/profiles/app-behavior-registry.js';
import { BUILTIN_PROFILES } from '../../../src/profiles/builtin-profiles.js';
import { ConfigurationError, ErrorCode } from '../../../src/shared/errors/index.js';
import { catchSyncError } from '../../helpers/test-utils.js';

describe('AppBehaviorRegistry', () => {
  it('should load every built-in profile', () => {
    const registry = new AppBehaviorRegistry();
    expect(registry.size).toBe(BUILTIN_PROFILES.length);
    expect(registry.has('com.apple.Terminal')).toBe(true);
  });

  it('should fill quirk and timing defaults', () => {
    const mail = new AppBehaviorRegistry().resolve('com.apple.mail');

    expect(mail.quirks.webRendering).toBe(false);
    expect(mail.quirks.messenger).toBe(false);
    expect(mail.scroll).toEqual({ hideOnScroll: true, reshowDelayMs: 300 });
    expect(mail.timing.contextSwitchDelayMs).toBe(200);
  });

  it('should give web-rendered hosts the longer scroll delay', () => {
    const notion = new AppBehaviorRegistry().resolve('notion.id');

    expect(notion.quirks.webRendering).toBe(true);
    expect(notion.scroll.reshowDelayMs).toBe(700);
  });

  it('should resolve unknown applications to a conservative default', () => {
    const profile = new AppBehaviorRegistry().resolve('org.example.editor');

    expect(profile.applicationId).toBe('org.example.editor');
    expect(profile.quirks).toEqual({
      webRendering: false,
      unstableTextRetrieval: false,
      requiresFullReanalysisAfterReplacement: false,
      terminal: false,
      messenger: false,
      unreliableNotifications: false,
      staleTextAfterContextSwitch: false,
    });
  });

  it('should resolve an empty identifier', () => {
    expect(new AppBehaviorRegistry().resolve('').applicationId).toBe('unknown');
  });

  it('should return frozen profiles', () => {
    const profile = new AppBehaviorRegistry().resolve('com.apple.MobileSMS');

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.quirks)).toBe(true);
    expect(Object.isFrozen(profile.timing)).toBe(true);
  });

  it('should replace a profile on register', () => {
    const registry = new AppBehaviorRegistry([]);
    registry.register({ applicationId: 'com.example.chat', displayName: 'Chat' });
    registry.register({
      applicationId: 'com.example.chat',
      displayName: 'Chat',
      quirks: { messenger: true },
      timing: { contextSwitchDelayMs: 350 },
    });

    const profile = registry.resolve('com.example.chat');
    expect(registry.size).toBe(1);
    expect(profile.quirks.messenger).toBe(true);
    expect(profile.timing.contextSwitchDelayMs).toBe(350);
  });

  it('should reject an invalid profile', () => {
    const registry = new AppBehaviorRegistry([]);
    const error = catchSyncError(() =>
      registry.register({ applicationId: 'com.example.bad', displayName: '', scroll: { reshowDelayMs: -5 } })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.code).toBe(ErrorCode.INVALID_PROFILE);
  });
});
