export { EditingSurface } from './core/Surface.js';
export type { SurfaceEventMap } from './core/Surface.js';
export { resolveSurfaceOptions } from './core/types/SurfaceConfig.js';
export type {
  CustomContextMenuBuilder,
  ResolvedSurfaceOptions,
  SurfaceMode,
  SurfaceOptions,
  SurfaceProject,
} from './core/types/SurfaceConfig.js';
export { EventEmitter } from './core/EventEmitter.js';
export type { EventCallback, Subscription } from './core/EventEmitter.js';
export { SurfaceError, isSurfaceError } from './core/errors.js';
export type { SurfaceErrorCode } from './core/errors.js';
export { debugLog, getContextMenuDebugConfig, setContextMenuDebugConfig } from './core/debug/debugLog.js';
export type { ContextMenuDebugConfig, DebugLogLevel } from './core/debug/debugLog.js';
export { detectHostPlatform } from './core/platform.js';
export type { HostPlatform } from './core/platform.js';
export { surfaceSchema, createSurfaceDoc, createSurfaceState } from './core/schema.js';

export { FocusManager, FocusHandle } from './core/focus/FocusManager.js';
export { DisplayMap, compareDisplayPoints, displayRangeContains } from './core/display/DisplayMap.js';
export type { DisplayPoint, DisplayRange } from './core/display/DisplayMap.js';
export { SelectionsCollection, SelectionsMutator, mergeOverlapping } from './core/selection/SelectionsCollection.js';
export type { PendingSelection, SelectMode, SurfaceSelection } from './core/selection/SelectionsCollection.js';

export { deployContextMenu, buildDefaultContextMenu } from './core/context-menu/deployContextMenu.js';
export { MouseContextMenu } from './core/context-menu/MouseContextMenu.js';
export type { ScreenPoint } from './core/context-menu/MouseContextMenu.js';
export { displayRanges, isPointInSelections } from './core/context-menu/displayRanges.js';
export * as SurfaceActions from './core/context-menu/actions.js';
export type { SurfaceAction } from './core/context-menu/actions.js';

export { ContextMenu } from './components/context-menu/ContextMenu.js';
export type { ContextMenuEntry, ContextMenuEventMap } from './components/context-menu/ContextMenu.js';
export {
  CONTEXT_MENU_HANDLED_FLAG,
  isContextMenuHandled,
  markContextMenuHandled,
} from './components/context-menu/event-flags.js';

export { ContextMenuInputBridge } from './core/input/ContextMenuInputBridge.js';
export type { ContextMenuInputBridgeOptions } from './core/input/ContextMenuInputBridge.js';
export { normalizeClientPoint } from './core/dom/PointerNormalization.js';
export type { LayoutPoint, PointerNormalizationOptions } from './core/dom/PointerNormalization.js';
export { createGridHitTest } from './core/dom/GridHitTest.js';
export type { GridMetrics } from './core/dom/GridHitTest.js';
