import { describe, expect, it } from 'vitest';
import { rgbCovariance, symmetricEigen3 } from '../../src/sixel/eigen.js';
import { RgbImage } from '../../src/sixel/image.js';
import {
  medianCutPalette,
  PcaColorMatcher,
  samplePixels,
  squaredDistance,
  UniformPalette,
} from '../../src/sixel/sixel-color.js';

function bruteForceNearest(palette: readonly number[], rgb: number): number {
  let best = 0;
  for (let i = 1; i < palette.length; i += 1) {
    if (squaredDistance(rgb, palette[i]) < squaredDistance(rgb, palette[best])) best = i;
  }
  return best;
}

/** Deterministic pseudo-random colors. */
function colors(count: number, seed: number): number[] {
  const out: number[] = [];
  let state = seed;
  for (let i = 0; i < count; i += 1) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    out.push(state >>> 8);
  }
  return out;
}

describe('medianCutPalette', () => {
  it('returns black for no samples', () => {
    expect(medianCutPalette([], 16)).toEqual([0]);
  });

  it('pins black and white ahead of the median-cut boxes', () => {
    expect(medianCutPalette([0x000000, 0xffffff, 0xff0000, 0x0000ff], 4)).toEqual([
      0x000000, 0xffffff, 0x000080, 0xff8080,
    ]);
  });

  it('does not pin with only two registers', () => {
    expect(medianCutPalette([0x000000, 0xffffff], 2)).toEqual([0x000000, 0xffffff]);
  });

  it('never returns duplicates or more colors than asked', () => {
    expect(medianCutPalette([0x101010, 0x101010], 4)).toEqual([0x101010]);
    expect(medianCutPalette(colors(500, 7), 32)).toHaveLength(32);
    expect(new Set(medianCutPalette(colors(500, 7), 32)).size).toBe(32);
  });
});

describe('samplePixels', () => {
  it('samples opaque pixels on a regular grid', () => {
    const image = new RgbImage(4, 4);
    for (let i = 0; i < 16; i += 1) image.pixels[i] = i;
    expect(samplePixels(image, 4)).toEqual([0, 2, 8, 10]);
  });

  it('skips transparent pixels', () => {
    const image = new RgbImage(2, 1, Uint32Array.from([1, 2]), Uint8Array.from([0, 1]));
    expect(samplePixels(image)).toEqual([2]);
  });
});

describe('UniformPalette', () => {
  it('builds the largest cube that fits', () => {
    const palette = new UniformPalette(256);
    expect(palette.colors).toHaveLength(216);
    expect(palette.indexOf(0xff0000)).toBe(180);
    expect(palette.colors[180]).toBe(0xff0000);
    expect(new UniformPalette(8).colors).toHaveLength(8);
  });

  it('uses a gray ramp below eight registers', () => {
    const palette = new UniformPalette(4);
    expect(palette.colors).toEqual([0x000000, 0x555555, 0xaaaaaa, 0xffffff]);
    expect(palette.indexOf(0x808080)).toBe(2);
  });
});

describe('PcaColorMatcher', () => {
  it('finds the nearest palette entry', () => {
    const matcher = new PcaColorMatcher([0x000000, 0xffffff, 0xff0000, 0x00ff00, 0x0000ff]);
    expect(matcher.nearest(0xf01010)).toBe(2);
    expect(matcher.nearest(0x101010)).toBe(0);
    expect(matcher.nearest(0x10e020)).toBe(3);
  });

  it('breaks ties toward the lower index', () => {
    const matcher = new PcaColorMatcher([0x000000, 0x202020, 0x000000]);
    expect(matcher.nearest(0x000000)).toBe(0);
  });

  it('agrees with an exhaustive search', () => {
    const palette = colors(64, 3);
    const matcher = new PcaColorMatcher(palette);
    for (const rgb of colors(300, 11)) {
      expect(squaredDistance(rgb, palette[matcher.nearest(rgb)])).toBe(
        squaredDistance(rgb, palette[bruteForceNearest(palette, rgb)]),
      );
    }
  });
});

describe('eigen', () => {
  it('sorts a diagonal matrix by eigenvalue', () => {
    const pairs = symmetricEigen3([
      [3, 0, 0],
      [0, 1, 0],
      [0, 0, 2],
    ]);
    expect(pairs.map((pair) => pair.value)).toEqual([3, 2, 1]);
    expect(pairs.map((pair) => pair.vector)).toEqual([
      [1, 0, 0],
      [0, 0, 1],
      [0, 1, 0],
    ]);
  });

  it('rotates off-diagonal terms away', () => {
    const [top] = symmetricEigen3([
      [2, 1, 0],
      [1, 2, 0],
      [0, 0, 1],
    ]);
    expect(top.value).toBeCloseTo(3);
    expect(top.vector[0]).toBeCloseTo(Math.SQRT1_2);
    expect(top.vector[1]).toBeCloseTo(Math.SQRT1_2);
    expect(top.vector[2]).toBeCloseTo(0);
  });

  it('computes the covariance of packed colors', () => {
    const { mean, covariance } = rgbCovariance([0x000000, 0xff0000]);
    expect(mean).toEqual([127.5, 0, 0]);
    expect(covariance[0][0]).toBe(16256.25);
    expect(covariance[1][1]).toBe(0);
    expect(covariance[0][2]).toBe(0);
  });
});
