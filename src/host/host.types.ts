/**
 * Host and collaborator interfaces
 *
 * The coordinator reaches the observed application, the analysis engine and
 * the overlay widgets only through these narrow contracts.
 */

import type { Point, Rect } from '../geometry/rect.js';

/**
 * Opaque reference to the observed editable element.
 * Two handles with the same id refer to the same element.
 */
export interface ElementHandle {
  readonly id: string;
}

/**
 * Application the user is typing in
 */
export interface MonitoringContext {
  processId: number;
  applicationId: string;
  applicationName: string;
  /** Focused editable element, when already known */
  element?: ElementHandle | null;
}

/**
 * One analysis result attached to a text range
 */
export interface Finding {
  id: string;
  start: number;
  end: number;
  message: string;
  category?: string;
  suggestions?: string[];
}

export interface HostWindowQuery {
  /**
   * Frontmost on-screen window of the process, or null when it has none
   * (minimized, hidden, closed).
   */
  getFrontmostWindowFrame(processId: number): Promise<Rect | null>;
}

export interface HostElementQuery {
  getFrame(element: ElementHandle): Promise<Rect | null>;
  extractText(element: ElementHandle): Promise<string | null>;
  /** Origin of the element's window as the element itself reports it */
  getWindowOrigin(element: ElementHandle): Promise<Point | null>;
  /** Bounds of the first rendered character, for content reflow detection */
  getContentBounds(element: ElementHandle): Promise<Rect | null>;
  getFocusedElement(processId: number): Promise<ElementHandle | null>;
}

export interface AnalysisEngine {
  analyze(text: string, context: MonitoringContext): Promise<Finding[]>;
}

/**
 * Imperative overlay commands. The coordinator never renders directly.
 */
export interface PresentationLayer {
  hideUnderlines(): void;
  hideIndicator(): void;
  hidePopover(): void;
  showUnderlines(findings: readonly Finding[], element: ElementHandle): void;
  updateIndicator(findings: readonly Finding[]): void;
  /** Drop screen positions computed for the current findings */
  clearGeometryCache(): void;
  /** While true, the underline layer keeps its last frame instead of collapsing */
  setToggleInProgress(active: boolean): void;
}

export type HostQuery = HostWindowQuery & HostElementQuery;
