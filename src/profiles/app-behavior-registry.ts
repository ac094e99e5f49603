/**
 * App Behavior Registry
 *
 * Resolves an application identifier to a frozen AppBehaviorProfile.
 * Unknown applications get a conservative default profile.
 */

import { ConfigurationError, ErrorCode } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import {
  AppBehaviorProfileSchema,
  type AppBehaviorLookup,
  type AppBehaviorProfile,
  type AppBehaviorProfileInput,
} from './app-behavior.types.js';
import { BUILTIN_PROFILES } from './builtin-profiles.js';

const logger = createLogger('AppBehaviorRegistry');

function freezeProfile(input: AppBehaviorProfileInput): AppBehaviorProfile {
  const result = AppBehaviorProfileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid behavior profile for "${input.applicationId}"`,
      ErrorCode.INVALID_PROFILE,
      { issues: result.error.issues.map((issue) => issue.message) }
    );
  }

  const profile = result.data;
  return Object.freeze({
    applicationId: profile.applicationId,
    displayName: profile.displayName,
    quirks: Object.freeze(profile.quirks),
    scroll: Object.freeze(profile.scroll),
    timing: Object.freeze(profile.timing),
  });
}

/**
 * @example
 * ```typescript
 * const registry = new AppBehaviorRegistry();
 * const profile = registry.resolve('notion.id');
 * if (profile.quirks.webRendering) {
 *   // wait for content to settle after resizes
 * }
 * ```
 */
export class AppBehaviorRegistry implements AppBehaviorLookup {
  private readonly profiles = new Map<string, AppBehaviorProfile>();

  constructor(profiles: readonly AppBehaviorProfileInput[] = BUILTIN_PROFILES) {
    for (const profile of profiles) {
      this.register(profile);
    }
  }

  /**
   * Register or replace a profile
   *
   * @throws ConfigurationError if the profile fails validation
   */
  register(input: AppBehaviorProfileInput): AppBehaviorProfile {
    const profile = freezeProfile(input);
    if (this.profiles.has(profile.applicationId)) {
      logger.debug('Replacing behavior profile', { applicationId: profile.applicationId });
    }
    this.profiles.set(profile.applicationId, profile);
    return profile;
  }

  resolve(applicationId: string): AppBehaviorProfile {
    return this.profiles.get(applicationId) ?? this.defaultProfile(applicationId);
  }

  has(applicationId: string): boolean {
    return this.profiles.has(applicationId);
  }

  get size(): number {
    return this.profiles.size;
  }

  private defaultProfile(applicationId: string): AppBehaviorProfile {
    const id = applicationId || 'unknown';
    return freezeProfile({ applicationId: id, displayName: id });
  }
}
