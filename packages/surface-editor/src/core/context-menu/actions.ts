/**
 * Opaque command descriptor bound to a menu entry. The menu never interprets it; the
 * host resolves `type` against its own command registry.
 */
export type SurfaceAction = {
  readonly type: string;
  readonly payload?: Readonly<Record<string, unknown>>;
};

export const Rename: SurfaceAction = { type: 'editor.rename' };
export const GoToDefinition: SurfaceAction = { type: 'editor.goToDefinition' };
export const GoToTypeDefinition: SurfaceAction = { type: 'editor.goToTypeDefinition' };
export const GoToImplementation: SurfaceAction = { type: 'editor.goToImplementation' };
export const FindAllReferences: SurfaceAction = { type: 'editor.findAllReferences' };
export const ToggleCodeActions: SurfaceAction = {
  type: 'editor.toggleCodeActions',
  // Opened from the menu, not from the gutter indicator
  payload: { deployedFromIndicator: null },
};
export const Cut: SurfaceAction = { type: 'editor.cut' };
export const Copy: SurfaceAction = { type: 'editor.copy' };
export const Paste: SurfaceAction = { type: 'editor.paste' };
export const RevealInFileManager: SurfaceAction = { type: 'editor.revealInFileManager' };
export const OpenInTerminal: SurfaceAction = { type: 'workspace.openInTerminal' };
export const CopyPermalinkToLine: SurfaceAction = { type: 'editor.copyPermalinkToLine' };
export const CopyFileLine: SurfaceAction = { type: 'editor.copyFileLine' };
