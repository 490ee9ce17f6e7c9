export type LayoutPoint = {
  x: number;
  y: number;
};

export type PointerNormalizationOptions = {
  /** Element whose bounding rect is the layout origin */
  viewportHost: HTMLElement;
  /** Scroll container of the content */
  visibleHost: HTMLElement;
  zoom: number;
};

/**
 * Convert a client (screen) point into layout coordinates relative to the
 * surface content, accounting for the viewport's scroll offsets and zoom factor.
 *
 * @returns The normalized layout point, or null if inputs are not finite or zoom is not positive.
 */
export function normalizeClientPoint(
  options: PointerNormalizationOptions,
  clientX: number,
  clientY: number,
): LayoutPoint | null {
  if (!Number.isFinite(clientX) || !Number.isFinite(clientY)) {
    return null;
  }
  if (!Number.isFinite(options.zoom) || options.zoom <= 0) {
    return null;
  }

  const rect = options.viewportHost.getBoundingClientRect();
  const scrollLeft = options.visibleHost.scrollLeft ?? 0;
  const scrollTop = options.visibleHost.scrollTop ?? 0;

  return {
    x: (clientX - rect.left + scrollLeft) / options.zoom,
    y: (clientY - rect.top + scrollTop) / options.zoom,
  };
}
