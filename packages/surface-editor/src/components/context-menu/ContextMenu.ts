import { EventEmitter } from '../../core/EventEmitter.js';
import type { FocusHandle, FocusManager } from '../../core/focus/FocusManager.js';
import type { SurfaceAction } from '../../core/context-menu/actions.js';

export type ContextMenuEntry =
  | { kind: 'action'; label: string; action: SurfaceAction }
  | { kind: 'separator' };

export type ContextMenuEventMap = {
  /** Fired once, when the menu closes for any reason */
  dismiss: [];
  /** Fired before `dismiss` when an action entry is chosen */
  confirm: [action: SurfaceAction, context: FocusHandle | null];
};

/**
 * Headless context menu model. Rendering is left to the host, which reads `entries`,
 * moves focus into `focusHandle`, and reports the user's choice back through
 * `confirm` or `cancel`.
 */
export class ContextMenu extends EventEmitter<ContextMenuEventMap> {
  readonly focusHandle: FocusHandle;
  #entries: ContextMenuEntry[] = [];
  #context: FocusHandle | null = null;
  #dismissed = false;

  private constructor(focusHandle: FocusHandle) {
    super();
    this.focusHandle = focusHandle;
  }

  /**
   * Creates a menu and lets `fn` populate it through the chainable builder methods.
   *
   * @example
   * ContextMenu.build(focusManager, (menu) => menu.action('Copy', Copy).separator());
   */
  static build(focusManager: FocusManager, fn: (menu: ContextMenu) => ContextMenu): ContextMenu {
    return fn(new ContextMenu(focusManager.createHandle()));
  }

  get entries(): readonly ContextMenuEntry[] {
    return this.#entries;
  }

  /** Focus scope used to resolve key bindings for dispatched actions */
  get contextHandle(): FocusHandle | null {
    return this.#context;
  }

  get isDismissed(): boolean {
    return this.#dismissed;
  }

  action(label: string, action: SurfaceAction): this {
    this.#entries.push({ kind: 'action', label, action });
    return this;
  }

  separator(): this {
    this.#entries.push({ kind: 'separator' });
    return this;
  }

  when(condition: boolean, fn: (menu: this) => this): this {
    return condition ? fn(this) : this;
  }

  context(handle: FocusHandle): this {
    this.#context = handle;
    return this;
  }

  /**
   * Chooses the entry at `index`. Separators and out-of-range indexes are ignored.
   */
  confirm(index: number): boolean {
    const entry = this.#entries[index];
    if (this.#dismissed || !entry || entry.kind !== 'action') return false;
    this.emit('confirm', entry.action, this.#context);
    this.#dismiss();
    return true;
  }

  cancel(): void {
    this.#dismiss();
  }

  /**
   * Drops every listener without emitting `dismiss`. Used when the owner replaces the
   * menu with a newer one.
   */
  destroy(): void {
    this.#dismissed = true;
    this.removeAllListeners();
  }

  #dismiss(): void {
    if (this.#dismissed) return;
    this.#dismissed = true;
    this.emit('dismiss');
  }
}
