import { describe, expect, it } from 'vitest';
import { GlyphDownsampler, renderGlyphGridAnsi } from '../../src/sixel/glyph-downsampler.js';
import { RgbImage } from '../../src/sixel/image.js';

function image(width: number, height: number, pixels: number[]): RgbImage {
  return new RgbImage(width, height, Uint32Array.from(pixels));
}

const W = 0xffffff;
const K = 0x000000;

describe('GlyphDownsampler', () => {
  it('emits one glyph per text cell, rounding partial cells up', () => {
    const grid = new GlyphDownsampler('halves', 10, 20).downsample(RgbImage.filled(25, 41, W));
    expect(grid).toHaveLength(3);
    expect(grid.every((line) => line.length === 3)).toBe(true);
  });

  it('pads a cell overhanging the image edge with black', () => {
    expect(new GlyphDownsampler('halves', 1, 2).downsample(RgbImage.filled(1, 1, W))).toEqual([
      [{ ch: '▀', fg: W, bg: K }],
    ]);
    expect(new GlyphDownsampler('quadrants', 2, 2).downsample(RgbImage.filled(1, 2, W))).toEqual([
      [{ ch: '▌', fg: W, bg: K }],
    ]);
  });

  it('puts the top-left region in the foreground for block sets', () => {
    const halves = new GlyphDownsampler('halves', 1, 2);
    expect(halves.downsample(image(1, 2, [W, K]))).toEqual([[{ ch: '▀', fg: W, bg: K }]]);
    expect(halves.downsample(image(1, 2, [K, W]))).toEqual([[{ ch: '▀', fg: K, bg: W }]]);
  });

  it('matches quadrant coverage', () => {
    const quadrants = new GlyphDownsampler('quadrants', 2, 2);
    expect(quadrants.downsample(image(2, 2, [W, K, K, K]))).toEqual([[{ ch: '▘', fg: W, bg: K }]]);
    expect(quadrants.downsample(image(2, 2, [W, K, W, K]))).toEqual([[{ ch: '▌', fg: W, bg: K }]]);
    expect(quadrants.downsample(image(2, 2, [W, K, K, W]))).toEqual([[{ ch: '▚', fg: W, bg: K }]]);
  });

  it('prefers the fuller glyph for a uniform cell', () => {
    const quadrants = new GlyphDownsampler('quadrants', 2, 2);
    expect(quadrants.downsample(RgbImage.filled(2, 2, 0x404040))).toEqual([[{ ch: '█', fg: 0x404040, bg: 0x404040 }]]);
  });

  it('uses the legacy-computing sextants and the existing half blocks', () => {
    const sextants = new GlyphDownsampler('sextants', 2, 3);
    expect(sextants.downsample(image(2, 3, [W, K, K, K, K, K]))).toEqual([[{ ch: '\u{1fb00}', fg: W, bg: K }]]);
    expect(sextants.downsample(image(2, 3, [K, W, K, W, K, W]))).toEqual([[{ ch: '▌', fg: K, bg: W }]]);
  });

  it('draws braille dots in the brighter color', () => {
    const left = image(2, 3, [W, K, W, K, W, K]);
    expect(new GlyphDownsampler('6dotsolid', 2, 3).downsample(left)).toEqual([[{ ch: '⠇', fg: W, bg: K }]]);
    expect(new GlyphDownsampler('6dot', 2, 3).downsample(left)).toEqual([[{ ch: '⠇', fg: 0x7f7f7f, bg: K }]]);
  });

  it('fills the cell with one color for the solid set', () => {
    expect(new GlyphDownsampler('solid', 2, 2).downsample(image(2, 2, [0xff0000, 0xff0000, 0x0000ff, 0x0000ff]))).toEqual([
      [{ ch: '█', fg: 0x800080, bg: 0x800080 }],
    ]);
  });

  it('leaves fully transparent cells blank', () => {
    const clear = new RgbImage(2, 2, Uint32Array.from([W, W, W, W]), new Uint8Array(4));
    expect(new GlyphDownsampler('quadrants', 2, 2).downsample(clear)).toEqual([[{ ch: ' ', fg: 0, bg: 0 }]]);
  });

  it('rejects empty cells', () => {
    expect(() => new GlyphDownsampler('halves', 0, 20)).toThrow(RangeError);
  });
});

describe('renderGlyphGridAnsi', () => {
  it('writes truecolor foreground and background around each glyph', () => {
    expect(renderGlyphGridAnsi([[{ ch: '▀', fg: W, bg: K }], [{ ch: ' ', fg: K, bg: 0x102030 }]])).toBe(
      '\x1b[38;2;255;255;255m\x1b[48;2;0;0;0m▀\x1b[49m\x1b[39m\n' + '\x1b[38;2;0;0;0m\x1b[48;2;16;32;48m \x1b[49m\x1b[39m',
    );
  });
});
