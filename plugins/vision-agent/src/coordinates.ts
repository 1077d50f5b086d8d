import type { NormalizedPoint, Point, Viewport } from './types.js';

/** Side length of the model's coordinate grid. */
export const NORMALIZED_SIZE = 1000;

function clamp(val: number, min: number, max: number) {
  return Math.max(min, Math.min(max, val));
}

function scale(value: number, extent: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round((value / NORMALIZED_SIZE) * extent);
}

/**
 * Map a normalized grid point to a viewport pixel. Model coordinates are
 * untrusted: anything off-screen is clamped onto the nearest edge pixel.
 */
export function toPixel([x, y]: NormalizedPoint, viewport: Viewport): Point {
  return {
    x: clamp(scale(x, viewport.width), 0, viewport.width - 1),
    y: clamp(scale(y, viewport.height), 0, viewport.height - 1),
  };
}

/** Convert a normalized scroll magnitude into wheel pixels (at least 1). */
export function scrollPixels(amount: number, viewportHeight: number): number {
  return Math.max(1, scale(Math.abs(amount), viewportHeight));
}
