import { describe, expect, it } from 'vitest';
import { scrollPixels, toPixel } from './coordinates.js';

const VIEWPORT = { width: 1440, height: 900 };

describe('toPixel', () => {
  it('scales grid points to viewport pixels', () => {
    expect(toPixel([500, 500], VIEWPORT)).toEqual({ x: 720, y: 450 });
    expect(toPixel([0, 0], VIEWPORT)).toEqual({ x: 0, y: 0 });
    expect(toPixel([250, 100], VIEWPORT)).toEqual({ x: 360, y: 90 });
  });

  it('keeps the far edge inside the viewport', () => {
    expect(toPixel([1000, 1000], VIEWPORT)).toEqual({ x: 1439, y: 899 });
  });

  it('clamps off-grid coordinates to the nearest pixel instead of failing', () => {
    expect(toPixel([1500, 200], VIEWPORT)).toEqual({ x: 1439, y: 180 });
    expect(toPixel([-50, 1200], VIEWPORT)).toEqual({ x: 0, y: 899 });
  });

  it('maps non-finite input to the origin', () => {
    expect(toPixel([Number.NaN, Number.POSITIVE_INFINITY], VIEWPORT)).toEqual({ x: 0, y: 0 });
  });

  it('always lands inside [0, W-1] x [0, H-1]', () => {
    const viewports = [
      { width: 1, height: 1 },
      { width: 3, height: 7 },
      { width: 1280, height: 720 },
      { width: 1441, height: 901 },
    ];
    const values = [0, 1, 333, 499.5, 500, 999, 999.9, 1000];
    for (const viewport of viewports) {
      for (const x of values) {
        for (const y of values) {
          const { x: px, y: py } = toPixel([x, y], viewport);
          expect(px).toBeGreaterThanOrEqual(0);
          expect(px).toBeLessThanOrEqual(viewport.width - 1);
          expect(py).toBeGreaterThanOrEqual(0);
          expect(py).toBeLessThanOrEqual(viewport.height - 1);
          expect(Number.isInteger(px) && Number.isInteger(py)).toBe(true);
        }
      }
    }
  });
});

describe('scrollPixels', () => {
  it('converts grid units to a share of the viewport height', () => {
    expect(scrollPixels(500, 900)).toBe(450);
    expect(scrollPixels(1000, 900)).toBe(900);
  });

  it('ignores sign and never returns zero', () => {
    expect(scrollPixels(-300, 900)).toBe(270);
    expect(scrollPixels(0.1, 900)).toBe(1);
  });
});
