import { beforeEach, describe, expect, it } from 'vitest';
import { getRuntimeMetric, resetRuntimeMetrics } from '../../src/infra/diagnostics.js';
import {
  deviceAttributes,
  deviceStatusReport,
  dynamicColorReport,
  graphicsAttributeReport,
  modeReport,
  windowReport,
  type QueryGeometry,
} from '../../src/terminal/vt-query-handler.js';
import { createScreenState } from '../../src/terminal/vt-screen-buffer-ops.js';
import { VtScreen } from '../../src/terminal/vt-screen.js';

const geometry: QueryGeometry = { cellWidthPx: 10, cellHeightPx: 20, sixelColorRegisters: 256 };

describe('vt-query-handler', () => {
  beforeEach(() => {
    resetRuntimeMetrics();
  });

  it('reports private and ANSI mode state', () => {
    const s = createScreenState(80, 24, 0);
    expect(modeReport(s, 2026, true)).toBe('\x1b[?2026;2$y');
    s.synchronizedUpdate = true;
    expect(modeReport(s, 2026, true)).toBe('\x1b[?2026;1$y');
    expect(modeReport(s, 9999, true)).toBe('\x1b[?9999;0$y');
    expect(modeReport(s, 4, false)).toBe('\x1b[4;2$y');
  });

  it('reports status and cursor position', () => {
    const s = createScreenState(80, 24, 0);
    expect(deviceStatusReport(s, 5, false)).toBe('\x1b[0n');
    s.cursorRow = 3;
    s.cursorCol = 4;
    expect(deviceStatusReport(s, 6, false)).toBe('\x1b[4;5R');
    s.originMode = true;
    s.scrollTop = 2;
    expect(deviceStatusReport(s, 6, true)).toBe('\x1b[?2;5R');
    expect(deviceStatusReport(s, 7, false)).toBeUndefined();
  });

  it('reports the text area in pixels and in cells', () => {
    const s = createScreenState(80, 24, 0);
    expect(windowReport(s, 14, geometry)).toBe('\x1b[4;480;800t');
    expect(windowReport(s, 18, geometry)).toBe('\x1b[8;24;80t');
    expect(windowReport(s, 21, geometry)).toBeUndefined();
  });

  it('answers graphics attribute reads and rejects the rest', () => {
    const s = createScreenState(80, 24, 0);
    expect(graphicsAttributeReport(s, 1, 1, geometry)).toBe('\x1b[?1;0;256S');
    expect(graphicsAttributeReport(s, 2, 4, geometry)).toBe('\x1b[?2;0;800;480S');
    expect(graphicsAttributeReport(s, 1, 3, geometry)).toBe('\x1b[?1;3;0S');
    expect(graphicsAttributeReport(s, 5, 1, geometry)).toBe('\x1b[?5;1;0S');
  });

  it('formats dynamic color reports', () => {
    expect(dynamicColorReport(10, 0xe5e5e5)).toBe('\x1b]10;rgb:e5e5/e5e5/e5e5\x1b\\');
  });

  it('counts the responses it builds', () => {
    deviceAttributes();
    deviceAttributes();
    expect(getRuntimeMetric('vt_query_response', { kind: 'da1' })).toBe(2);
  });

  it('is reachable through the screen', () => {
    const replies: string[] = [];
    const vt = new VtScreen({ cols: 10, rows: 3, handlers: { reply: (data) => replies.push(data) } });
    vt.write('\x1b[>c\x1b[?2;1;0S\x1b[18t\x1b]11;?\x07');
    expect(replies).toEqual([
      '\x1b[>1;10;0c',
      '\x1b[?2;0;100;60S',
      '\x1b[8;3;10t',
      '\x1b]11;rgb:0000/0000/0000\x1b\\',
    ]);
  });
});
