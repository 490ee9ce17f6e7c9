import type { ContextMenu } from '../../components/context-menu/ContextMenu.js';
import type { Subscription } from '../EventEmitter.js';
import type { EditingSurface } from '../Surface.js';
import { debugLog } from '../debug/debugLog.js';

/** Screen-space position, in client pixels */
export type ScreenPoint = {
  x: number;
  y: number;
};

/**
 * The open context menu of one surface. Owns the menu and the subscription that closes
 * it; both go away together.
 */
export class MouseContextMenu {
  readonly position: ScreenPoint;
  readonly contextMenu: ContextMenu;
  #subscription: Subscription;

  /**
   * Moves focus into the menu and subscribes to its dismissal. On dismissal the
   * surface's slot is cleared, and focus returns to the surface only if it is still
   * inside the menu.
   */
  constructor(surface: EditingSurface, position: ScreenPoint, contextMenu: ContextMenu) {
    this.position = position;
    this.contextMenu = contextMenu;

    const contextMenuFocus = contextMenu.focusHandle;
    contextMenuFocus.focus();

    this.#subscription = contextMenu.subscribe('dismiss', () => {
      surface.releaseMouseContextMenu(this);
      if (contextMenuFocus.containsFocused()) {
        surface.focus();
        debugLog('verbose', 'menu dismissed, focus restored to surface', { x: position.x, y: position.y });
      } else {
        debugLog('verbose', 'menu dismissed, focus already moved', { x: position.x, y: position.y });
      }
    });
  }

  get isActive(): boolean {
    return this.#subscription.active;
  }

  /**
   * Tears down the subscription and the menu without running the dismissal handler.
   */
  dispose(): void {
    if (!this.#subscription.active) return;
    this.#subscription.unsubscribe();
    this.contextMenu.destroy();
  }

  /**
   * Drops the dismissal subscription but leaves the menu open. Used when a newer
   * instance wraps the same menu.
   */
  detach(): void {
    this.#subscription.unsubscribe();
  }
}
