import { isContextMenuHandled, markContextMenuHandled } from '../../components/context-menu/event-flags.js';
import { deployContextMenu } from '../context-menu/deployContextMenu.js';
import type { DisplayPoint } from '../display/DisplayMap.js';
import { normalizeClientPoint } from '../dom/PointerNormalization.js';
import type { LayoutPoint } from '../dom/PointerNormalization.js';
import type { EditingSurface } from '../Surface.js';

export type ContextMenuInputBridgeOptions = {
  /** Scroll container; defaults to the layout surface */
  visibleHost?: HTMLElement;
  getZoom?: () => number;
};

/**
 * Listens for `contextmenu` on the visible layout surface and deploys the surface's
 * menu at the clicked display point.
 */
export class ContextMenuInputBridge {
  #surface: EditingSurface;
  #layoutSurface: HTMLElement;
  #visibleHost: HTMLElement;
  #getZoom: () => number;
  #hitTest: (point: LayoutPoint) => DisplayPoint | null;
  #listeners: Array<{ type: string; handler: EventListener; target: EventTarget }> = [];
  #destroyed = false;

  /**
   * @param surface - Surface that owns the menu
   * @param layoutSurface - Element that receives pointer events; its bounding rect is the layout origin
   * @param hitTest - Maps a layout point to a display point, or null when nothing was hit
   */
  constructor(
    surface: EditingSurface,
    layoutSurface: HTMLElement,
    hitTest: (point: LayoutPoint) => DisplayPoint | null,
    options?: ContextMenuInputBridgeOptions,
  ) {
    this.#surface = surface;
    this.#layoutSurface = layoutSurface;
    this.#hitTest = hitTest;
    this.#visibleHost = options?.visibleHost ?? layoutSurface;
    this.#getZoom = options?.getZoom ?? (() => 1);
  }

  bind(): void {
    if (this.#destroyed || this.#listeners.length > 0) return;
    this.#addListener('contextmenu', this.#handleContextMenu, this.#layoutSurface);
  }

  destroy(): void {
    this.#listeners.forEach(({ type, handler, target }) => {
      target.removeEventListener(type, handler);
    });
    this.#listeners = [];
    this.#destroyed = true;
  }

  #addListener<T extends Event>(type: string, handler: (event: T) => void, target: EventTarget): void {
    const bound = handler.bind(this) as EventListener;
    this.#listeners.push({ type, handler: bound, target });
    target.addEventListener(type, bound);
  }

  /**
   * The browser menu is only suppressed when a menu was actually deployed; ineligible
   * surfaces leave the event alone.
   */
  #handleContextMenu(event: MouseEvent): void {
    if (isContextMenuHandled(event) || event.defaultPrevented) {
      return;
    }
    if (this.#surface.isDestroyed) {
      return;
    }
    const layoutPoint = normalizeClientPoint(
      { viewportHost: this.#layoutSurface, visibleHost: this.#visibleHost, zoom: this.#getZoom() },
      event.clientX,
      event.clientY,
    );
    if (!layoutPoint) {
      return;
    }
    const point = this.#hitTest(layoutPoint);
    if (!point) {
      return;
    }
    const menu = deployContextMenu(this.#surface, { x: event.clientX, y: event.clientY }, point);
    if (menu) {
      event.preventDefault();
      markContextMenuHandled(event);
    }
  }
}
