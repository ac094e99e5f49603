/**
 * Coordinator Events
 *
 * Typed events emitted by detectors and consumed by the coordinator.
 */

export type EventSource = 'window' | 'element' | 'scroll' | 'text';

export type MoveCause = 'position' | 'size' | 'both';

export interface WindowMovedEvent {
  source: 'window';
  type: 'window-moved';
  cause: MoveCause;
  distance: number;
  widthDelta: number;
  heightDelta: number;
}

export interface WindowStableEvent {
  source: 'window';
  type: 'window-stable';
}

export interface WindowOffScreenEvent {
  source: 'window';
  type: 'window-off-screen';
  /** Query has failed for several ticks in a row; the element is considered abandoned */
  persistent: boolean;
}

export interface WindowOnScreenEvent {
  source: 'window';
  type: 'window-on-screen';
}

export type ElementChangeKind =
  | 'content-cleared'
  | 'content-grown'
  | 'context-switch'
  | 'different-element'
  | 'toggle-started'
  | 'toggle-ignored';

export interface ElementChangedEvent {
  source: 'element';
  type: 'element-changed';
  kind: ElementChangeKind;
  heightDelta: number;
  distance: number;
}

export interface ScrollStartedEvent {
  source: 'scroll';
  type: 'scroll-started';
}

export interface ScrollStoppedEvent {
  source: 'scroll';
  type: 'scroll-stopped';
}

export type TextDriftKind = 'emptied' | 'replaced';

export interface TextDriftEvent {
  source: 'text';
  type: 'text-drift';
  kind: TextDriftKind;
  currentText: string;
}

export type WindowEvent =
  | WindowMovedEvent
  | WindowStableEvent
  | WindowOffScreenEvent
  | WindowOnScreenEvent;

export type CoordinatorEvent =
  | WindowEvent
  | ElementChangedEvent
  | ScrollStartedEvent
  | ScrollStoppedEvent
  | TextDriftEvent;
