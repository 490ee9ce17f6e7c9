import { afterEach, describe, expect, it, vi } from 'vitest';
import { normalizeClientPoint } from './PointerNormalization.js';

describe('normalizeClientPoint', () => {
  const makeHosts = () => {
    const viewportHost = document.createElement('div');
    const visibleHost = document.createElement('div');
    viewportHost.appendChild(visibleHost);

    vi.spyOn(viewportHost, 'getBoundingClientRect').mockReturnValue({
      left: 20,
      top: 10,
      right: 0,
      bottom: 0,
      width: 0,
      height: 0,
      x: 0,
      y: 0,
      toJSON: () => ({}),
    } as DOMRect);

    Object.defineProperty(visibleHost, 'scrollLeft', { value: 30, configurable: true });
    Object.defineProperty(visibleHost, 'scrollTop', { value: 40, configurable: true });

    return { viewportHost, visibleHost };
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns null for non-finite client coordinates', () => {
    const { viewportHost, visibleHost } = makeHosts();
    const options = { viewportHost, visibleHost, zoom: 1 };

    expect(normalizeClientPoint(options, NaN, 0)).toBe(null);
    expect(normalizeClientPoint(options, 0, Infinity)).toBe(null);
  });

  it('returns null for a zoom that is not positive', () => {
    const { viewportHost, visibleHost } = makeHosts();

    expect(normalizeClientPoint({ viewportHost, visibleHost, zoom: 0 }, 10, 10)).toBe(null);
    expect(normalizeClientPoint({ viewportHost, visibleHost, zoom: -1 }, 10, 10)).toBe(null);
  });

  it('normalizes client coordinates to layout coordinates with zoom and scroll', () => {
    const { viewportHost, visibleHost } = makeHosts();

    const result = normalizeClientPoint({ viewportHost, visibleHost, zoom: 2 }, 120, 60);

    // x: (120 - 20 + 30) / 2, y: (60 - 10 + 40) / 2
    expect(result).toEqual({ x: 65, y: 45 });
  });
});
