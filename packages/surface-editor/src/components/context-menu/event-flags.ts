/**
 * Property set on a `contextmenu` event once a surface has deployed its menu for it.
 * Other listeners check it to avoid opening a second menu for the same click.
 */
export const CONTEXT_MENU_HANDLED_FLAG = '__surfaceHandledByContextMenu';

type FlaggableEvent = Event & { [CONTEXT_MENU_HANDLED_FLAG]?: boolean };

export function isContextMenuHandled(event: Event): boolean {
  return Boolean((event as FlaggableEvent)[CONTEXT_MENU_HANDLED_FLAG]);
}

export function markContextMenuHandled(event: Event): void {
  (event as FlaggableEvent)[CONTEXT_MENU_HANDLED_FLAG] = true;
}
