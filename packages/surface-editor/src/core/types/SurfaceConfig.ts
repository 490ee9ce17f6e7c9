import type { EditorState } from 'prosemirror-state';
import type { ContextMenu } from '../../components/context-menu/ContextMenu.js';
import type { DisplayPoint } from '../display/DisplayMap.js';
import { FocusManager } from '../focus/FocusManager.js';
import { detectHostPlatform } from '../platform.js';
import type { HostPlatform } from '../platform.js';

/**
 * `'full'` is the only mode with the complete feature set. Single-line and
 * auto-height surfaces are embedded inputs (search fields, inline prompts).
 */
export type SurfaceMode = 'full' | 'single-line' | 'auto-height';

/**
 * Workspace the surface belongs to. Project-scoped commands (reveal, terminal,
 * permalinks) need one.
 */
export interface SurfaceProject {
  readonly id: string;
}

/**
 * Replaces the default menu. Returning `null` suppresses the menu for that point.
 */
export type CustomContextMenuBuilder = (point: DisplayPoint) => ContextMenu | null;

export interface SurfaceOptions {
  /** Initial editor state. Takes precedence over `content`. */
  state?: EditorState;
  /** Initial plain text, one paragraph per line */
  content?: string;
  mode?: SurfaceMode;
  project?: SurfaceProject | null;
  /** Defaults to the detected host platform */
  platform?: HostPlatform;
  /** Share one manager between surfaces and menus of the same host */
  focusManager?: FocusManager;
  customContextMenu?: CustomContextMenuBuilder | null;
}

export type ResolvedSurfaceOptions = {
  state: EditorState | null;
  content: string;
  mode: SurfaceMode;
  project: SurfaceProject | null;
  platform: HostPlatform;
  focusManager: FocusManager;
  customContextMenu: CustomContextMenuBuilder | null;
};

export function resolveSurfaceOptions(options: SurfaceOptions = {}): ResolvedSurfaceOptions {
  return {
    state: options.state ?? null,
    content: options.content ?? '',
    mode: options.mode ?? 'full',
    project: options.project ?? null,
    platform: options.platform ?? detectHostPlatform(),
    focusManager: options.focusManager ?? new FocusManager(),
    customContextMenu: options.customContextMenu ?? null,
  };
}
