/**
 * Suppression State
 *
 * Three independent reasons to keep overlays hidden. Each flag is set by one
 * detector path and cleared by another; none of them touches the others.
 */

export interface SuppressionState {
  /** Set by window-moved, cleared when the reshow sequence completes */
  movedOrResizing: boolean;
  /** Set by window-off-screen, cleared by window-on-screen */
  offScreen: boolean;
  /** Set by scroll-started, cleared by scroll-stopped */
  scrolling: boolean;
  positionSyncRetryCount: number;
  contentStabilityCount: number;
}

export function createSuppressionState(): SuppressionState {
  return {
    movedOrResizing: false,
    offScreen: false,
    scrolling: false,
    positionSyncRetryCount: 0,
    contentStabilityCount: 0,
  };
}

/**
 * Overlays may be shown only when no suppression flag is set
 */
export function isDisplayEligible(state: Readonly<SuppressionState>): boolean {
  return !state.movedOrResizing && !state.offScreen && !state.scrolling;
}

/**
 * Names of the flags currently set, for logging
 */
export function activeSuppressions(state: Readonly<SuppressionState>): string[] {
  const active: string[] = [];
  if (state.movedOrResizing) active.push('movedOrResizing');
  if (state.offScreen) active.push('offScreen');
  if (state.scrolling) active.push('scrolling');
  return active;
}
