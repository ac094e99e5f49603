/**
 * Playwright Host
 *
 * Host adapter that observes an editable field inside a Playwright page.
 * The browser window plays the role of the host window and a CSS selector
 * identifies the observed element. All DOM access goes through
 * page.evaluate() and never waits for elements to appear.
 */

import type { Page } from 'playwright';
import { z } from 'zod';
import { PointSchema, RectSchema, type Point, type Rect } from '../geometry/rect.js';
import { ErrorCode, HostQueryError } from '../shared/errors/index.js';
import type { ElementHandle, HostQuery } from './host.types.js';

// Browser globals used inside page.evaluate(). They exist only in the page,
// not in Node.js, so only the members used below are declared.
interface BrowserRect {
  x: number;
  y: number;
  width: number;
  height: number;
}
interface BrowserNode {
  textContent: string | null;
}
interface BrowserElement extends BrowserNode {
  readonly tagName: string;
  readonly id: string;
  readonly isContentEditable: boolean;
  readonly value?: string;
  readonly innerText?: string;
  readonly ownerDocument: {
    defaultView: { screenX: number; screenY: number } | null;
  };
  getBoundingClientRect(): BrowserRect;
  getAttribute(name: string): string | null;
  setAttribute(name: string, value: string): void;
}
declare const document: {
  readonly visibilityState: string;
  readonly activeElement: BrowserElement | null;
  querySelector(selector: string): BrowserElement | null;
  createTreeWalker(root: BrowserElement, whatToShow: number): { nextNode(): BrowserNode | null };
  createRange(): {
    setStart(node: BrowserNode, offset: number): void;
    setEnd(node: BrowserNode, offset: number): void;
    getBoundingClientRect(): BrowserRect;
  };
};
declare const window: {
  screenX: number;
  screenY: number;
  outerWidth: number;
  outerHeight: number;
};
declare const CSS: {
  escape(value: string): string;
};

export interface PlaywrightHostOptions {
  /** Attribute stamped on focused fields that have no id */
  markerAttribute?: string;
}

const DEFAULT_MARKER_ATTRIBUTE = 'data-overlay-sentinel-id';

// Shapes of what the page functions return
const WindowStateSchema = RectSchema.extend({ hidden: z.boolean() });
const NullableRectSchema = RectSchema.nullable();
const NullablePointSchema = PointSchema.nullable();
const NullableStringSchema = z.string().nullable();

/**
 * @example
 * ```typescript
 * const page = await browser.newPage();
 * const host = new PlaywrightHost(page);
 * const coordinator = new OverlayVisibilityCoordinator({ host, presentation, analysis });
 * ```
 */
export class PlaywrightHost implements HostQuery {
  private readonly markerAttribute: string;

  constructor(
    private readonly page: Page,
    options: PlaywrightHostOptions = {}
  ) {
    this.markerAttribute = options.markerAttribute ?? DEFAULT_MARKER_ATTRIBUTE;
  }

  /**
   * The page's browser window. Hidden or closed pages have no window.
   * A page hosts exactly one process, so processId is not consulted.
   */
  async getFrontmostWindowFrame(_processId: number): Promise<Rect | null> {
    if (this.page.isClosed()) return null;

    const code = ErrorCode.HOST_WINDOW_QUERY_FAILED;
    const raw = await this.evaluate('getFrontmostWindowFrame', code, () =>
      this.page.evaluate(() => ({
        hidden: document.visibilityState === 'hidden',
        x: window.screenX,
        y: window.screenY,
        width: window.outerWidth,
        height: window.outerHeight,
      }))
    );
    const state = this.validate('getFrontmostWindowFrame', code, WindowStateSchema, raw);

    if (state.hidden || state.width === 0 || state.height === 0) return null;
    return { x: state.x, y: state.y, width: state.width, height: state.height };
  }

  async getFrame(element: ElementHandle): Promise<Rect | null> {
    if (this.page.isClosed()) return null;

    const code = ErrorCode.HOST_ELEMENT_QUERY_FAILED;
    const raw = await this.evaluate('getFrame', code, () =>
      this.page.evaluate((selector) => {
        const el = document.querySelector(selector);
        if (!el) return null;
        const rect = el.getBoundingClientRect();
        return { x: rect.x, y: rect.y, width: rect.width, height: rect.height };
      }, element.id)
    );
    return this.validate('getFrame', code, NullableRectSchema, raw);
  }

  async extractText(element: ElementHandle): Promise<string | null> {
    if (this.page.isClosed()) return null;

    const code = ErrorCode.HOST_TEXT_EXTRACTION_FAILED;
    const raw = await this.evaluate('extractText', code, () =>
      this.page.evaluate((selector) => {
        const el = document.querySelector(selector);
        if (!el) return null;
        if (el.tagName === 'INPUT' || el.tagName === 'TEXTAREA') return el.value ?? '';
        return el.innerText ?? el.textContent ?? '';
      }, element.id)
    );
    return this.validate('extractText', code, NullableStringSchema, raw);
  }

  async getWindowOrigin(element: ElementHandle): Promise<Point | null> {
    if (this.page.isClosed()) return null;

    const code = ErrorCode.HOST_ELEMENT_QUERY_FAILED;
    const raw = await this.evaluate('getWindowOrigin', code, () =>
      this.page.evaluate((selector) => {
        const view = document.querySelector(selector)?.ownerDocument.defaultView;
        if (!view) return null;
        return { x: view.screenX, y: view.screenY };
      }, element.id)
    );
    return this.validate('getWindowOrigin', code, NullablePointSchema, raw);
  }

  /**
   * Bounds of the first rendered character, falling back to the element
   * itself for empty fields and form controls
   */
  async getContentBounds(element: ElementHandle): Promise<Rect | null> {
    if (this.page.isClosed()) return null;

    const code = ErrorCode.HOST_ELEMENT_QUERY_FAILED;
    const raw = await this.evaluate('getContentBounds', code, () =>
      this.page.evaluate((selector) => {
        const el = document.querySelector(selector);
        if (!el) return null;

        const SHOW_TEXT = 4;
        const textNode = el.isContentEditable ? document.createTreeWalker(el, SHOW_TEXT).nextNode() : null;
        let rect: BrowserRect;
        if (textNode?.textContent) {
          const range = document.createRange();
          range.setStart(textNode, 0);
          range.setEnd(textNode, 1);
          rect = range.getBoundingClientRect();
        } else {
          rect = el.getBoundingClientRect();
        }
        return { x: rect.x, y: rect.y, width: rect.width, height: rect.height };
      }, element.id)
    );
    return this.validate('getContentBounds', code, NullableRectSchema, raw);
  }

  /**
   * Focused editable field of the page, addressed by a selector that stays
   * valid while the element lives
   */
  async getFocusedElement(_processId: number): Promise<ElementHandle | null> {
    if (this.page.isClosed()) return null;

    const code = ErrorCode.HOST_ELEMENT_QUERY_FAILED;
    const raw = await this.evaluate('getFocusedElement', code, () =>
      this.page.evaluate((marker) => {
        const el = document.activeElement;
        if (!el) return null;

        const editable = el.isContentEditable || el.tagName === 'INPUT' || el.tagName === 'TEXTAREA';
        if (!editable) return null;

        if (el.id) return `#${CSS.escape(el.id)}`;

        let token = el.getAttribute(marker);
        if (!token) {
          token = `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
          el.setAttribute(marker, token);
        }
        return `[${marker}="${token}"]`;
      }, this.markerAttribute)
    );

    const selector = this.validate('getFocusedElement', code, NullableStringSchema, raw);
    return selector ? { id: selector } : null;
  }

  /**
   * Check a page answer against the shape the caller expects. Layout values
   * such as NaN or negative sizes come back from detached or collapsed nodes.
   */
  private validate<T>(operation: string, code: ErrorCode, schema: z.ZodType<T>, value: unknown): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new HostQueryError(`${operation} returned malformed data`, code, {
        url: this.page.url(),
        issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
    }
    return result.data;
  }

  private async evaluate<T>(operation: string, code: ErrorCode, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      // page.evaluate failed - usually navigation or the page closing
      const message = error instanceof Error ? error.message : String(error);
      throw new HostQueryError(
        `${operation} failed: ${message}`,
        code,
        { url: this.page.url() },
        error instanceof Error ? error : undefined
      );
    }
  }
}
