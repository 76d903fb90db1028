import { beforeEach, describe, expect, it } from 'vitest';
import { getRuntimeMetric, resetRuntimeMetrics } from '../../src/infra/diagnostics.js';
import { decodeSixel, hlsToRgb, toSixelPayload, VT340_PALETTE } from '../../src/sixel/sixel-decoder.js';

function pixels(data: string, params = ''): number[] {
  return Array.from(decodeSixel({ params, data }).image.pixels);
}

describe('decodeSixel', () => {
  beforeEach(() => {
    resetRuntimeMetrics();
  });

  it('draws six-pixel columns in the selected color', () => {
    const { image, truncated } = decodeSixel({ params: '', data: '#1;2;100;0;0!3~' });
    expect(image.width).toBe(3);
    expect(image.height).toBe(6);
    expect(truncated).toBe(false);
    expect(new Set(image.pixels)).toEqual(new Set([0xff0000]));
  });

  it('maps sixel bits to rows and fills undrawn pixels with register 0', () => {
    const { image } = decodeSixel({ params: '', data: '#1;2;0;0;100A' });
    expect(image.width).toBe(1);
    expect(image.height).toBe(2);
    expect(image.get(0, 0)).toBe(VT340_PALETTE[0]);
    expect(image.get(0, 1)).toBe(0x0000ff);
  });

  it('returns to the left edge on $ and moves down a band on -', () => {
    expect(pixels('#1;2;100;0;0@$#2;2;0;100;0A')).toEqual([0xff0000, 0x00ff00]);

    const { image } = decodeSixel({ params: '', data: '#1;2;100;100;100@-@' });
    expect(image.height).toBe(7);
    expect(image.get(0, 6)).toBe(0xffffff);
  });

  it('keeps unset pixels transparent when P2 is 1', () => {
    const { image, transparent } = decodeSixel({ params: '0;1', data: '#1;2;100;100;100A' });
    expect(transparent).toBe(true);
    expect(image.isOpaque(0, 0)).toBe(false);
    expect(image.isOpaque(0, 1)).toBe(true);
    expect(image.get(0, 0)).toBe(0);
  });

  it('selects predefined registers without redefining them', () => {
    expect(pixels('#3@')).toEqual([VT340_PALETTE[3]]);
  });

  it('defines HLS colors with hue 0 at blue', () => {
    expect(pixels('#1;1;120;50;100@')).toEqual([0xff0000]);
  });

  it('uses raster attributes as the minimum size of a drawn image', () => {
    const { image, truncated } = decodeSixel({ params: '', data: '"1;1;4;3@' });
    expect(image.width).toBe(4);
    expect(image.height).toBe(3);
    expect(truncated).toBe(false);
  });

  it('does not allocate a raster size when nothing is drawn', () => {
    const { image } = decodeSixel('\x1bPq"1;1;3840;6480\x1b\\');
    expect(image.width).toBe(1);
    expect(image.height).toBe(1);
  });

  it('returns a 1x1 background image for empty input', () => {
    const { image } = decodeSixel('');
    expect(image.width).toBe(1);
    expect(image.height).toBe(1);
  });

  it('treats a repeat count of zero as one', () => {
    expect(decodeSixel({ params: '', data: '!0~' }).image.width).toBe(1);
  });

  it('clips spans beyond the width limit and flags the result', () => {
    const { image, truncated } = decodeSixel({ params: '', data: '!10~' }, { maxWidth: 4 });
    expect(image.width).toBe(4);
    expect(truncated).toBe(true);
    expect(getRuntimeMetric('sixel_partial_decode')).toBe(1);
  });

  it('stops drawing below the height limit', () => {
    const { image, truncated } = decodeSixel({ params: '', data: '~-~' }, { maxHeight: 8 });
    expect(image.height).toBe(8);
    expect(truncated).toBe(true);
  });

  it('flags an unknown color system and keeps drawing', () => {
    const { image, truncated } = decodeSixel({ params: '', data: '#1;3;0;0;0@' });
    expect(truncated).toBe(true);
    expect(image.get(0, 0)).toBe(VT340_PALETTE[1]);
  });

  it('accepts full DCS strings with either introducer', () => {
    expect(toSixelPayload('\x1bP0;1;0q#1@\x1b\\')).toEqual({ params: '0;1;0', data: '#1@' });
    expect(toSixelPayload('\x900;1q@\x9c')).toEqual({ params: '0;1', data: '@' });
    expect(toSixelPayload('#1@')).toEqual({ params: '', data: '#1@' });
  });
});

describe('hlsToRgb', () => {
  it('places the primaries on the DEC hue circle', () => {
    expect(hlsToRgb(0, 50, 100)).toBe(0x0000ff);
    expect(hlsToRgb(120, 50, 100)).toBe(0xff0000);
    expect(hlsToRgb(240, 50, 100)).toBe(0x00ff00);
  });

  it('gives gray without saturation', () => {
    expect(hlsToRgb(77, 50, 0)).toBe(0x808080);
    expect(hlsToRgb(0, 100, 0)).toBe(0xffffff);
  });
});
