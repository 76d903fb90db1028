import { describe, expect, it } from 'vitest';
import { colorDistance, RgbImage } from '../../src/sixel/image.js';
import { decodeSixel } from '../../src/sixel/sixel-decoder.js';
import { ditherBandHeight, HqSixelEncoder, splitBands } from '../../src/sixel/sixel-hq-encoder.js';

function gradient(width: number, height: number): RgbImage {
  const image = new RgbImage(width, height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      image.set(x, y, (((x * 255) / width) << 16) | (((y * 255) / height) << 8) | ((x * y) & 0xff));
    }
  }
  return image;
}

/** 16x16 gray field whose sampled grid holds only black and white. */
function grayField(): RgbImage {
  const image = RgbImage.filled(16, 16, 0x808080);
  image.set(0, 0, 0x000000);
  image.set(8, 0, 0xffffff);
  image.set(0, 8, 0xffffff);
  image.set(8, 8, 0x000000);
  return image;
}

function countOf(image: RgbImage, rgb: number): number {
  return image.pixels.filter((value) => value === rgb).length;
}

describe('band layout', () => {
  it('aligns bands to both sixel rows and text cells', () => {
    expect(ditherBandHeight(20)).toBe(60);
    expect(ditherBandHeight(6)).toBe(6);
    expect(ditherBandHeight(4)).toBe(12);
    expect(ditherBandHeight(1)).toBe(6);
  });

  it('covers the image with a shorter last band', () => {
    expect(splitBands(30, 12)).toEqual([
      { top: 0, bottom: 12 },
      { top: 12, bottom: 24 },
      { top: 24, bottom: 30 },
    ]);
  });
});

describe('HqSixelEncoder', () => {
  it('reproduces images with few colors', () => {
    const colors = [0x000000, 0xffffff, 0xff0000, 0x2040a0];
    const source = new RgbImage(8, 12);
    for (let y = 0; y < 12; y += 1) {
      for (let x = 0; x < 8; x += 1) source.set(x, y, colors[(y >= 6 ? 2 : 0) + (x >= 4 ? 1 : 0)]);
    }
    const { image } = decodeSixel(new HqSixelEncoder().encode(source, { paletteSize: 16 }));
    expect(image.get(0, 0)).toBe(0x000000);
    expect(image.get(7, 0)).toBe(0xffffff);
    expect(image.get(0, 11)).toBe(0xff0000);
    // Register values carry whole percentages.
    expect(image.get(7, 11)).toBe(0x213fa0);
  });

  it('keeps a gradient close to its source through decode', () => {
    const source = gradient(37, 23);
    const { image } = decodeSixel(new HqSixelEncoder().encode(source));
    expect(image.width).toBe(37);
    expect(image.height).toBe(23);
    let worst = 0;
    let total = 0;
    source.pixels.forEach((rgb, i) => {
      const distance = colorDistance(rgb, image.pixels[i]);
      worst = Math.max(worst, distance);
      total += distance;
    });
    expect(worst).toBeLessThan(48);
    expect(total / source.pixels.length).toBeLessThan(16);
  });

  it('gives the same bytes sequentially and with any number of workers', async () => {
    const image = gradient(16, 30);
    const options = { paletteSize: 8, cellSize: { width: 10, height: 4 } };
    const expected = new HqSixelEncoder().encode(image, options);
    await expect(new HqSixelEncoder({ concurrency: 1 }).encodeAsync(image, options)).resolves.toBe(expected);
    await expect(new HqSixelEncoder({ concurrency: 3 }).encodeAsync(image, options)).resolves.toBe(expected);
  });

  it('keeps no state between calls', () => {
    const encoder = new HqSixelEncoder();
    const image = gradient(12, 12);
    const first = encoder.encode(image, { paletteSize: 16 });
    encoder.encode(RgbImage.filled(4, 4, 0x123456), { paletteSize: 4 });
    expect(encoder.encode(image, { paletteSize: 16 })).toBe(first);
  });

  it('diffuses quantization error unless dithering is off', () => {
    const options = { paletteSize: 2 };
    const flat = decodeSixel(new HqSixelEncoder({ sampleTarget: 4, dither: false }).encode(grayField(), options));
    const dithered = decodeSixel(new HqSixelEncoder({ sampleTarget: 4 }).encode(grayField(), options));
    expect(countOf(flat.image, 0x000000)).toBe(2);
    expect(countOf(dithered.image, 0x000000)).toBeGreaterThan(2);
  });

  it('leaves transparent pixels undrawn', () => {
    const image = new RgbImage(2, 1, Uint32Array.from([0xffffff, 0xffffff]), Uint8Array.from([1, 0]));
    const { image: decoded } = decodeSixel({ params: '0;1', data: new HqSixelEncoder().encode(image) });
    expect(decoded.isOpaque(0, 0)).toBe(true);
    expect(decoded.isOpaque(1, 0)).toBe(false);
  });
});
