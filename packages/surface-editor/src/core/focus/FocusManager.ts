import { EventEmitter } from '../EventEmitter.js';

export type FocusEventMap = {
  focusChange: [next: FocusHandle | null, previous: FocusHandle | null];
};

/**
 * A node in the focus tree. A handle "contains" focus when the focused handle is the
 * handle itself or one of its descendants (e.g. a submenu inside a menu).
 */
export class FocusHandle {
  readonly id: number;
  readonly parent: FocusHandle | null;
  #manager: FocusManager;

  constructor(manager: FocusManager, id: number, parent: FocusHandle | null) {
    this.#manager = manager;
    this.id = id;
    this.parent = parent;
  }

  isFocused(): boolean {
    return this.#manager.focused === this;
  }

  containsFocused(): boolean {
    let current = this.#manager.focused;
    while (current) {
      if (current === this) return true;
      current = current.parent;
    }
    return false;
  }

  focus(): void {
    this.#manager.focus(this);
  }

  createChild(): FocusHandle {
    return this.#manager.createHandle(this);
  }
}

/**
 * Tracks which {@link FocusHandle} currently holds input focus for one host.
 */
export class FocusManager extends EventEmitter<FocusEventMap> {
  #focused: FocusHandle | null = null;
  #nextId = 1;

  get focused(): FocusHandle | null {
    return this.#focused;
  }

  createHandle(parent: FocusHandle | null = null): FocusHandle {
    return new FocusHandle(this, this.#nextId++, parent);
  }

  focus(handle: FocusHandle): void {
    if (this.#focused === handle) return;
    const previous = this.#focused;
    this.#focused = handle;
    this.emit('focusChange', handle, previous);
  }

  blur(): void {
    if (!this.#focused) return;
    const previous = this.#focused;
    this.#focused = null;
    this.emit('focusChange', null, previous);
  }
}
