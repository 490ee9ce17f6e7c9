import type { Node as ProseMirrorNode } from 'prosemirror-model';
import type { EditorState, Transaction } from 'prosemirror-state';
import { PluginKey, TextSelection } from 'prosemirror-state';
import { EventEmitter } from './EventEmitter.js';
import { SurfaceError } from './errors.js';
import { DisplayMap } from './display/DisplayMap.js';
import type { FocusHandle, FocusManager } from './focus/FocusManager.js';
import type { HostPlatform } from './platform.js';
import { createSurfaceState } from './schema.js';
import { SelectionsCollection } from './selection/SelectionsCollection.js';
import type { SelectionsMutator } from './selection/SelectionsCollection.js';
import { resolveSurfaceOptions } from './types/SurfaceConfig.js';
import type {
  CustomContextMenuBuilder,
  SurfaceMode,
  SurfaceOptions,
  SurfaceProject,
} from './types/SurfaceConfig.js';
import type { MouseContextMenu } from './context-menu/MouseContextMenu.js';
import { debugLog } from './debug/debugLog.js';

export type SurfaceEventMap = {
  /** The surface should re-render */
  update: [];
  selectionUpdate: [selections: SelectionsCollection];
  transaction: [transaction: Transaction];
  contextMenuOpen: [menu: MouseContextMenu];
  contextMenuClose: [menu: MouseContextMenu];
  destroy: [];
};

/** Marks transactions that only mirror the surface's own selections into the state */
const selectionSyncKey = new PluginKey('surfaceSelectionSync');

/**
 * One text-editing view: a ProseMirror state, its selections, its focus handle and at
 * most one open mouse context menu.
 */
export class EditingSurface extends EventEmitter<SurfaceEventMap> {
  readonly focusManager: FocusManager;
  readonly focusHandle: FocusHandle;
  readonly platform: HostPlatform;
  readonly selections: SelectionsCollection;

  #state: EditorState;
  #mode: SurfaceMode;
  #project: SurfaceProject | null;
  #customContextMenu: CustomContextMenuBuilder | null;
  #mouseContextMenu: MouseContextMenu | null = null;
  #displayMap: { doc: ProseMirrorNode; map: DisplayMap } | null = null;
  #destroyed = false;

  constructor(options: SurfaceOptions = {}) {
    super();
    const resolved = resolveSurfaceOptions(options);
    this.#state = resolved.state ?? createSurfaceState(resolved.content);
    this.#mode = resolved.mode;
    this.#project = resolved.project;
    this.#customContextMenu = resolved.customContextMenu;
    this.platform = resolved.platform;
    this.focusManager = resolved.focusManager;
    this.focusHandle = this.focusManager.createHandle();
    this.selections = new SelectionsCollection(() => this.#state.doc.content.size, this.#state.selection.head);
  }

  get state(): EditorState {
    return this.#state;
  }

  get doc(): ProseMirrorNode {
    return this.#state.doc;
  }

  get mode(): SurfaceMode {
    return this.#mode;
  }

  setMode(mode: SurfaceMode): void {
    this.#mode = mode;
  }

  get project(): SurfaceProject | null {
    return this.#project;
  }

  setProject(project: SurfaceProject | null): void {
    this.#project = project;
  }

  /** Reads `null` while the builder is running */
  get customContextMenu(): CustomContextMenuBuilder | null {
    return this.#customContextMenu;
  }

  setCustomContextMenu(builder: CustomContextMenuBuilder | null): void {
    this.#customContextMenu = builder;
  }

  /**
   * Moves the builder out of its slot. Pair with {@link restoreCustomContextMenu}.
   */
  takeCustomContextMenu(): CustomContextMenuBuilder | null {
    const builder = this.#customContextMenu;
    this.#customContextMenu = null;
    return builder;
  }

  restoreCustomContextMenu(builder: CustomContextMenuBuilder): void {
    this.#customContextMenu = builder;
  }

  get mouseContextMenu(): MouseContextMenu | null {
    return this.#mouseContextMenu;
  }

  /**
   * Stores `menu` as the open menu, disposing the previous one first so its dismissal
   * can no longer reach this surface. A previous instance wrapping the same menu is only
   * detached, since the menu stays open under `menu`.
   */
  setMouseContextMenu(menu: MouseContextMenu): void {
    this.#assertAlive();
    const previous = this.#mouseContextMenu;
    if (previous && previous !== menu) {
      if (previous.contextMenu === menu.contextMenu) {
        previous.detach();
      } else {
        previous.dispose();
      }
    }
    this.#mouseContextMenu = menu;
    this.emit('contextMenuOpen', menu);
  }

  /**
   * Clears the slot if it still holds `menu`. Returns false for a stale menu.
   */
  releaseMouseContextMenu(menu: MouseContextMenu): boolean {
    if (this.#mouseContextMenu !== menu) return false;
    this.#mouseContextMenu = null;
    menu.dispose();
    this.emit('contextMenuClose', menu);
    return true;
  }

  isFocused(): boolean {
    return this.focusHandle.isFocused();
  }

  focus(): void {
    this.focusManager.focus(this.focusHandle);
  }

  /**
   * Display snapshot of the current document, reused until the document changes.
   */
  displayMap(): DisplayMap {
    const doc = this.#state.doc;
    let cached = this.#displayMap;
    if (!cached || cached.doc !== doc) {
      cached = { doc, map: DisplayMap.fromDoc(doc) };
      this.#displayMap = cached;
    }
    return cached.map;
  }

  /**
   * Mutates the selections and mirrors the newest one into the editor state so that
   * commands run against the same range.
   */
  changeSelections(fn: (mutator: SelectionsMutator) => void): boolean {
    this.#assertAlive();
    const changed = this.selections.change(fn);
    if (!changed) return false;
    const newest = this.selections.newest();
    if (newest) {
      const anchor = newest.reversed ? newest.end : newest.start;
      const head = newest.reversed ? newest.start : newest.end;
      const doc = this.#state.doc;
      const tr = this.#state.tr
        .setSelection(TextSelection.between(doc.resolve(anchor), doc.resolve(head)))
        .setMeta(selectionSyncKey, true);
      this.#applyTransaction(tr);
    }
    this.emit('selectionUpdate', this.selections);
    return true;
  }

  /**
   * Applies a transaction from outside. Document changes remap the selections; an
   * explicit selection replaces them.
   */
  dispatch(tr: Transaction): void {
    this.#assertAlive();
    this.#applyTransaction(tr);
    if (tr.docChanged) {
      this.selections.map(tr.mapping);
    }
    if (tr.selectionSet && !tr.getMeta(selectionSyncKey)) {
      const { anchor, head } = this.#state.selection;
      this.selections.change((s) => s.select([[anchor, head]]));
    }
    if (tr.docChanged || tr.selectionSet) {
      this.emit('selectionUpdate', this.selections);
    }
  }

  notify(): void {
    this.emit('update');
  }

  get isDestroyed(): boolean {
    return this.#destroyed;
  }

  destroy(): void {
    if (this.#destroyed) return;
    const menu = this.#mouseContextMenu;
    this.#mouseContextMenu = null;
    menu?.dispose();
    if (this.isFocused()) this.focusManager.blur();
    this.#destroyed = true;
    this.emit('destroy');
    this.removeAllListeners();
    debugLog('verbose', 'surface destroyed');
  }

  #applyTransaction(tr: Transaction): void {
    this.#state = this.#state.apply(tr);
    this.emit('transaction', tr);
  }

  #assertAlive(): void {
    if (this.#destroyed) {
      throw new SurfaceError('SURFACE_DESTROYED', 'Cannot use a destroyed editing surface');
    }
  }
}
