import { describe, expect, it } from 'vitest';
import * as ops from '../../src/terminal/vt-screen-buffer-ops.js';
import type { VtScreenState } from '../../src/terminal/vt-types.js';
import { lineText } from '../../src/terminal/vt-utils.js';

function makeState(cols = 5, rows = 3, scrollback = 10): VtScreenState {
  return ops.createScreenState(cols, rows, scrollback);
}

function put(s: VtScreenState, row: number, text: string): void {
  [...text].forEach((ch, c) => {
    s.display[row][c] = ops.makeCell(s, ch, 1);
  });
}

function rows(s: VtScreenState): string[] {
  return s.display.map((line) => lineText(line).trimEnd());
}

describe('vt-screen-buffer-ops', () => {
  describe('createScreenState', () => {
    it('builds a blank display with default tab stops', () => {
      const s = makeState(20, 4);
      expect(s.display).toHaveLength(4);
      expect(s.display.every((line) => line.length === 20)).toBe(true);
      expect(s.scrollBottom).toBe(3);
      expect(s.tabStops[0]).toBe(false);
      expect(s.tabStops[8]).toBe(true);
      expect(s.tabStops[16]).toBe(true);
    });
  });

  describe('wide glyphs', () => {
    it('keeps complete pairs and blanks orphaned halves', () => {
      const s = makeState();
      const line = ops.defaultLine(4);
      line[1] = ops.makeCell(s, '中', 2);
      line[2] = ops.makeContinuationCell(s);
      ops.repairWideSpan(line);
      expect(line[1].width).toBe(2);

      line[2] = ops.defaultCell();
      ops.repairWideSpan(line);
      expect(line[1]).toEqual({ ch: ' ', width: 1, style: {} });
    });

    it('keeps the background of an orphaned continuation', () => {
      const s = makeState();
      s.currentStyle = { bg: { kind: 'indexed', index: 4 } };
      const line = ops.defaultLine(2);
      line[0] = ops.makeContinuationCell(s);
      ops.repairWideSpan(line);
      expect(line[0]).toEqual({ ch: ' ', width: 1, style: { bg: { kind: 'indexed', index: 4 } } });
    });

    it('blanks a wide glyph cut by the right edge when fitting', () => {
      const s = makeState();
      const line = [ops.makeCell(s, 'a', 1), ops.makeCell(s, '中', 2), ops.makeContinuationCell(s)];
      expect(lineText(ops.fitLine(line, 2))).toBe('a ');
      expect(ops.fitLine(line, 5)).toHaveLength(5);
    });
  });

  describe('scrolling', () => {
    it('moves rows leaving a full-screen region into scrollback', () => {
      const s = makeState();
      put(s, 0, 'a');
      put(s, 1, 'b');
      put(s, 2, 'c');
      ops.scrollRegionUp(s, 0, 2, 1);
      expect(rows(s)).toEqual(['b', 'c', '']);
      expect(s.scrollback.length).toBe(1);
      expect(lineText(s.scrollback.get(0) ?? []).trimEnd()).toBe('a');
    });

    it('discards rows leaving a partial region', () => {
      const s = makeState();
      put(s, 0, 'a');
      put(s, 1, 'b');
      put(s, 2, 'c');
      ops.scrollRegionUp(s, 1, 2, 1);
      expect(rows(s)).toEqual(['a', 'c', '']);
      expect(s.scrollback.length).toBe(0);
    });

    it('keeps the alternate screen out of scrollback', () => {
      const s = makeState();
      put(s, 0, 'a');
      s.cursorRow = 2;
      ops.enterAltScreen(s, false);
      put(s, 0, 'x');
      ops.scrollRegionUp(s, 0, 2, 1);
      expect(s.scrollback.length).toBe(0);
      ops.leaveAltScreen(s);
      expect(rows(s)).toEqual(['a', '', '']);
      expect(s.cursorRow).toBe(2);
    });

    it('inserts blank lines at the cursor within the region', () => {
      const s = makeState();
      put(s, 0, 'a');
      put(s, 1, 'b');
      put(s, 2, 'c');
      s.cursorRow = 1;
      s.cursorCol = 3;
      ops.insertLines(s, 1);
      expect(rows(s)).toEqual(['a', '', 'b']);
      expect(s.cursorCol).toBe(0);
    });
  });

  describe('editing', () => {
    it('inserts and deletes characters within the line', () => {
      const s = makeState(5, 1);
      put(s, 0, 'abcde');
      s.cursorCol = 1;
      ops.insertChars(s, 2);
      expect(lineText(s.display[0])).toBe('a  bc');
      ops.deleteChars(s, 1);
      expect(lineText(s.display[0])).toBe('a bc ');
    });

    it('skips protected cells in a selective erase', () => {
      const s = makeState(5, 1);
      put(s, 0, 'abc');
      s.display[0][1].style.protected = true;
      ops.eraseInLine(s, 2, true);
      expect(lineText(s.display[0])).toBe(' b   ');
      ops.eraseInLine(s, 2);
      expect(lineText(s.display[0])).toBe('     ');
    });

    it('erases with the current background', () => {
      const s = makeState(5, 1);
      put(s, 0, 'abc');
      s.currentStyle = { bg: { kind: 'rgb', rgb: 0x102030 } };
      ops.eraseChars(s, 1);
      expect(s.display[0][0]).toEqual({ ch: ' ', width: 1, style: { bg: { kind: 'rgb', rgb: 0x102030 } } });
    });
  });

  describe('tabs', () => {
    it('moves between stops and stops at the margins', () => {
      const s = makeState(20, 1);
      ops.forwardTab(s, 1);
      expect(s.cursorCol).toBe(8);
      ops.forwardTab(s, 2);
      expect(s.cursorCol).toBe(19);
      ops.backwardTab(s, 1);
      expect(s.cursorCol).toBe(16);
    });
  });

  describe('resize and viewing', () => {
    it('pushes rows above the cursor into scrollback when shrinking', () => {
      const s = makeState();
      put(s, 0, 'a');
      put(s, 1, 'b');
      put(s, 2, 'c');
      s.cursorRow = 2;
      ops.resizeBuffer(s, 5, 2);
      expect(rows(s)).toEqual(['b', 'c']);
      expect(s.cursorRow).toBe(1);
      expect(s.scrollBottom).toBe(1);

      expect(ops.getVisibleLines(s, 2, 1).map((line) => lineText(line).trimEnd())).toEqual(['a', 'b']);
      expect(ops.getVisibleLines(s, 4).map((line) => lineText(line).trimEnd())).toEqual(['a', 'b', 'c', '']);
    });

    it('tiles an image over the cells below the cursor', () => {
      const s = makeState();
      s.cursorCol = 1;
      ops.attachImage(s, 7, 25, 30, 10, 20);
      expect(s.display[0][1].image).toEqual({ imageId: 7, x: 0, y: 0 });
      expect(s.display[1][3].image).toEqual({ imageId: 7, x: 20, y: 20 });
      expect(s.display[0][4].image).toBeUndefined();
      expect(s.cursorRow).toBe(2);
      expect(s.cursorCol).toBe(1);
    });
  });
});
