import { describe, expect, it } from 'vitest';
import { createSixelEncoder } from '../../src/sixel/encoder-factory.js';
import { colorDistance, RgbImage } from '../../src/sixel/image.js';
import { decodeSixel } from '../../src/sixel/sixel-decoder.js';
import {
  resolvePaletteSize,
  SimpleSixelEncoder,
  TRANSPARENT_INDEX,
  wrapSixel,
  writeSixelBody,
} from '../../src/sixel/sixel-encoder.js';
import { HqSixelEncoder } from '../../src/sixel/sixel-hq-encoder.js';

describe('writeSixelBody', () => {
  it('defines used registers and separates colors within a band', () => {
    expect(writeSixelBody(2, 1, [0x000000, 0xffffff], Int32Array.from([0, 1]))).toBe(
      '"1;1;2;1#0;2;0;0;0#1;2;100;100;100#0@$#1?@',
    );
  });

  it('skips registers no pixel uses', () => {
    expect(writeSixelBody(1, 1, [0x000000, 0xffffff], Int32Array.from([1]))).toBe('"1;1;1;1#1;2;100;100;100#1@');
  });

  it('compresses runs longer than three', () => {
    expect(writeSixelBody(3, 1, [0], new Int32Array(3))).toBe('"1;1;3;1#0;2;0;0;0#0@@@');
    expect(writeSixelBody(5, 1, [0], new Int32Array(5))).toBe('"1;1;5;1#0;2;0;0;0#0!5@');
  });

  it('drops trailing transparent columns', () => {
    const indices = Int32Array.from([0, TRANSPARENT_INDEX, TRANSPARENT_INDEX]);
    expect(writeSixelBody(3, 1, [0], indices)).toBe('"1;1;3;1#0;2;0;0;0#0@');
  });

  it('separates six-row bands with -', () => {
    expect(writeSixelBody(1, 7, [0], new Int32Array(7))).toBe('"1;1;1;7#0;2;0;0;0#0~-#0@');
  });
});

describe('SimpleSixelEncoder', () => {
  const encoder = new SimpleSixelEncoder();

  it('maps pixels onto the uniform color cube', () => {
    expect(encoder.encode(RgbImage.filled(1, 1, 0xffffff))).toBe('"1;1;1;1#215;2;100;100;100#215@');
  });

  it('falls back to a gray ramp for small palettes', () => {
    const image = new RgbImage(2, 1, Uint32Array.from([0x000000, 0xffffff]));
    expect(encoder.encode(image, { paletteSize: 2 })).toBe('"1;1;2;1#0;2;0;0;0#1;2;100;100;100#0@$#1?@');
  });

  it('leaves transparent pixels undrawn', () => {
    const image = new RgbImage(1, 1, Uint32Array.from([0xffffff]), Uint8Array.from([0]));
    expect(encoder.encode(image)).toBe('"1;1;1;1');
  });

  it('round-trips colors that lie on the cube', () => {
    const pixels = Uint32Array.from([0xff0000, 0x33cc99, 0x000000, 0xffffff, 0x6699ff, 0x00ff00]);
    const { image } = decodeSixel(encoder.encode(new RgbImage(3, 2, pixels)));
    expect(image.width).toBe(3);
    expect(image.height).toBe(2);
    expect(Array.from(image.pixels)).toEqual(Array.from(pixels));
  });

  it('stays within half a cube step of a gradient', () => {
    const source = new RgbImage(37, 23);
    for (let y = 0; y < 23; y += 1) {
      for (let x = 0; x < 37; x += 1) source.set(x, y, (x * 7) << 16 | (y * 11) << 8 | ((x + y) * 4));
    }
    const { image } = decodeSixel(encoder.encode(source));
    expect(image.width).toBe(37);
    expect(image.height).toBe(23);
    const worst = Math.max(...Array.from(source.pixels, (rgb, i) => colorDistance(rgb, image.pixels[i])));
    // At most 25 per channel off the nearest of six levels.
    expect(worst).toBeLessThanOrEqual(Math.sqrt(3 * 25 * 25));
  });
});

describe('encoder helpers', () => {
  it('wraps a body in a transparent-background DCS', () => {
    expect(wrapSixel('"1;1;1;1')).toBe('\x1bP0;1;0q"1;1;1;1\x1b\\');
  });

  it('clamps the palette size', () => {
    expect(resolvePaletteSize(undefined)).toBe(256);
    expect(resolvePaletteSize(1)).toBe(2);
    expect(resolvePaletteSize(5000)).toBe(1024);
    expect(resolvePaletteSize(17.9)).toBe(17);
  });

  it('creates the encoder named by the configuration', () => {
    expect(createSixelEncoder('simple')).toBeInstanceOf(SimpleSixelEncoder);
    expect(createSixelEncoder('hq')).toBeInstanceOf(HqSixelEncoder);
  });
});
