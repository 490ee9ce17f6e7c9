import { ContextMenu } from '../../components/context-menu/ContextMenu.js';
import type { DisplayPoint } from '../display/DisplayMap.js';
import type { FocusHandle } from '../focus/FocusManager.js';
import type { HostPlatform } from '../platform.js';
import type { EditingSurface } from '../Surface.js';
import { debugLog } from '../debug/debugLog.js';
import {
  Copy,
  CopyFileLine,
  CopyPermalinkToLine,
  Cut,
  FindAllReferences,
  GoToDefinition,
  GoToImplementation,
  GoToTypeDefinition,
  OpenInTerminal,
  Paste,
  Rename,
  RevealInFileManager,
  ToggleCodeActions,
} from './actions.js';
import { isPointInSelections } from './displayRanges.js';
import { MouseContextMenu } from './MouseContextMenu.js';
import type { ScreenPoint } from './MouseContextMenu.js';

/**
 * Opens the mouse context menu for a click at `position` (client pixels) resolving to
 * `point`. Returns the new menu, or `null` when the surface does not show one here:
 * a destroyed or non-full surface, a custom builder that declines or hands back a
 * closed menu, or no project attached. Those cases leave selections and the open menu
 * untouched. Out-of-range points are clipped to the nearest display point.
 */
export function deployContextMenu(
  surface: EditingSurface,
  position: ScreenPoint,
  point: DisplayPoint,
): MouseContextMenu | null {
  if (surface.isDestroyed) {
    return null;
  }

  // Actions dispatched from the menu have to reach this surface
  if (!surface.isFocused()) {
    surface.focus();
  }

  // Inline editors get no context menu
  if (surface.mode !== 'full') {
    return null;
  }

  let contextMenu: ContextMenu;
  const custom = surface.takeCustomContextMenu();
  if (custom) {
    let menu: ContextMenu | null;
    try {
      menu = custom(point);
    } finally {
      surface.restoreCustomContextMenu(custom);
    }
    // A menu that already closed can never dismiss again
    if (!menu || menu.isDismissed) {
      return null;
    }
    contextMenu = menu;
  } else {
    // Project-scoped commands make no sense without a project
    if (!surface.project) {
      return null;
    }

    const displayMap = surface.displayMap();
    const clicked = displayMap.clipPoint(point);
    const anchor = displayMap.toDocumentPosition(clicked);
    if (!isPointInSelections(displayMap, surface.selections, clicked)) {
      // Move the cursor to the clicked location so that dispatched actions make sense
      surface.changeSelections((s) => {
        s.clearDisjoint();
        s.setPendingAnchorRange(anchor, anchor, 'character');
      });
    }

    contextMenu = buildDefaultContextMenu(surface, surface.focusManager.focused);
  }

  const mouseContextMenu = new MouseContextMenu(surface, position, contextMenu);
  surface.setMouseContextMenu(mouseContextMenu);
  surface.notify();
  debugLog('verbose', 'menu deployed', { x: position.x, y: position.y, row: point.row, column: point.column });
  return mouseContextMenu;
}

/**
 * Default editor menu. `focus` becomes the menu's key-binding context.
 */
export function buildDefaultContextMenu(surface: EditingSurface, focus: FocusHandle | null): ContextMenu {
  const platform: HostPlatform = surface.platform;
  return ContextMenu.build(surface.focusManager, (menu) => {
    const builder = menu
      .action('Rename Symbol', Rename)
      .action('Go to Definition', GoToDefinition)
      .action('Go to Type Definition', GoToTypeDefinition)
      .action('Go to Implementation', GoToImplementation)
      .action('Find All References', FindAllReferences)
      .action('Code Actions', ToggleCodeActions)
      .separator()
      .action('Cut', Cut)
      .action('Copy', Copy)
      .action('Paste', Paste)
      .separator()
      .when(platform === 'macos', (b) => b.action('Reveal in Finder', RevealInFileManager))
      .when(platform !== 'macos', (b) => b.action('Reveal in File Manager', RevealInFileManager))
      .action('Open in Terminal', OpenInTerminal)
      .action('Copy Permalink', CopyPermalinkToLine)
      .action('Copy File:Line', CopyFileLine);
    return focus ? builder.context(focus) : builder;
  });
}
