import { describe, expect, it } from 'vitest';
import {
  applyOsc104,
  applyOsc4,
  formatXColorSpec,
  Palette,
  parseXColorSpec,
  resolveAttributes,
  scaleRgbChannel,
  xterm256Color,
} from '../../src/terminal/vt-palette.js';

describe('scaleRgbChannel', () => {
  it('treats every width of an all-f channel as full intensity', () => {
    for (const group of ['f', 'ff', 'fff', 'ffff']) {
      expect(scaleRgbChannel(group)).toBe(0xff);
    }
  });

  it('replicates digits when scaling up', () => {
    for (const group of ['5', '55', '555', '5555']) {
      expect(scaleRgbChannel(group)).toBe(0x55);
    }
    expect(scaleRgbChannel('8')).toBe(0x88);
    expect(scaleRgbChannel('80')).toBe(0x80);
    expect(scaleRgbChannel('0')).toBe(0);
  });

  it('keeps the high byte of a 16-bit channel', () => {
    expect(scaleRgbChannel('55ff')).toBe(0x55);
    expect(scaleRgbChannel('ff00')).toBe(0xff);
  });

  it('rejects empty, oversized and non-hex groups', () => {
    expect(scaleRgbChannel('')).toBeUndefined();
    expect(scaleRgbChannel('12345')).toBeUndefined();
    expect(scaleRgbChannel('g')).toBeUndefined();
  });
});

describe('parseXColorSpec', () => {
  it('parses rgb: specs with mixed widths', () => {
    expect(parseXColorSpec('rgb:5555/ffff/5555')).toBe(0x55ff55);
    expect(parseXColorSpec('rgb:f/80/000')).toBe(0xff8000);
    expect(parseXColorSpec('RGB:1/2/3')).toBe(0x112233);
  });

  it('left-justifies # forms', () => {
    expect(parseXColorSpec('#fff')).toBe(0xf0f0f0);
    expect(parseXColorSpec('#123456')).toBe(0x123456);
    expect(parseXColorSpec('#abcabcabc')).toBe(0xababab);
  });

  it('rejects malformed specs', () => {
    expect(parseXColorSpec('rgb:1/2')).toBeUndefined();
    expect(parseXColorSpec('rgb:1/2/zz')).toBeUndefined();
    expect(parseXColorSpec('#12345')).toBeUndefined();
    expect(parseXColorSpec('red')).toBeUndefined();
  });

  it('formats reports with 16-bit channels', () => {
    expect(formatXColorSpec(0x55ff55)).toBe('rgb:5555/ffff/5555');
  });
});

describe('xterm256Color', () => {
  it('covers the cube and the gray ramp', () => {
    expect(xterm256Color(16)).toBe(0x000000);
    expect(xterm256Color(196)).toBe(0xff0000);
    expect(xterm256Color(231)).toBe(0xffffff);
    expect(xterm256Color(232)).toBe(0x080808);
    expect(xterm256Color(255)).toBe(0xeeeeee);
    expect(xterm256Color(256)).toBeUndefined();
  });
});

describe('Palette', () => {
  it('redefines entries through OSC 4 and reports them back', () => {
    const palette = new Palette();
    expect(applyOsc4(palette, '10;rgb:5555/ffff/5555')).toEqual([]);
    expect(palette.get(10)).toBe(0x55ff55);
    expect(applyOsc4(palette, '10;?')).toEqual(['\x1b]4;10;rgb:5555/ffff/5555\x1b\\']);
  });

  it('skips malformed OSC 4 pairs and applies the rest', () => {
    const palette = new Palette();
    applyOsc4(palette, '300;#ffffff;x;#ffffff;2;bogus;3;#010203');
    expect(palette.get(2)).toBe(0x0dbc79);
    expect(palette.get(3)).toBe(0x010203);
  });

  it('resets single entries or the whole table with OSC 104', () => {
    const palette = new Palette();
    palette.set(1, 0x123456);
    palette.set(2, 0x654321);
    applyOsc104(palette, '1');
    expect(palette.get(1)).toBe(0xcd3131);
    expect(palette.get(2)).toBe(0x654321);
    applyOsc104(palette, '');
    expect(palette.get(2)).toBe(0x0dbc79);
  });

  it('clones independently', () => {
    const palette = new Palette();
    const copy = palette.clone();
    palette.set(0, 0xffffff);
    expect(copy.get(0)).toBe(0x000000);
  });

  it('resolves indexed colors at read time', () => {
    const palette = new Palette();
    const style = { fg: { kind: 'indexed' as const, index: 4 } };
    expect(resolveAttributes(palette, style).fg).toBe(0x2472c8);
    palette.set(4, 0x0000ff);
    expect(resolveAttributes(palette, style).fg).toBe(0x0000ff);
  });

  it('brightens bold base colors and swaps for inverse', () => {
    const palette = new Palette();
    const bold = resolveAttributes(palette, { bold: true, fg: { kind: 'indexed', index: 1 } });
    expect(bold.fg).toBe(0xf14c4c);

    const inverse = resolveAttributes(palette, { inverse: true });
    expect(inverse.fg).toBe(0x000000);
    expect(inverse.bg).toBe(0xe5e5e5);
  });

  it('never consults the table for truecolor', () => {
    const palette = new Palette();
    palette.set(1, 0x000000);
    expect(resolveAttributes(palette, { fg: { kind: 'rgb', rgb: 0xcd3131 } }).fg).toBe(0xcd3131);
  });
});
