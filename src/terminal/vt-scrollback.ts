/**
 * Bounded FIFO of rows that scrolled off the top of the primary screen.
 *
 * Rows are frozen on entry and never edited afterwards, so snapshots
 * share them instead of copying.
 */

import type { Line } from './vt-types.js';
import { deepFreeze } from './vt-utils.js';

export class ScrollbackRing {
  private slots: (Line | undefined)[] = [];
  private head = 0;
  private count = 0;
  private limit: number;

  constructor(limit: number) {
    this.limit = Math.max(0, Math.floor(limit));
  }

  get length(): number {
    return this.count;
  }

  get capacity(): number {
    return this.limit;
  }

  /** Append a row, evicting the oldest one when the ring is full. */
  push(line: Line): void {
    if (this.limit === 0) return;
    deepFreeze(line);
    if (this.slots.length < this.limit) {
      this.slots.length = this.limit;
    }
    const tail = (this.head + this.count) % this.limit;
    this.slots[tail] = line;
    if (this.count < this.limit) {
      this.count += 1;
    } else {
      this.head = (this.head + 1) % this.limit;
    }
  }

  /** Row by age; 0 is the oldest retained row. */
  get(index: number): Line | undefined {
    if (index < 0 || index >= this.count) return undefined;
    return this.slots[(this.head + index) % this.limit];
  }

  toArray(): Line[] {
    const rows: Line[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const row = this.get(i);
      if (row) rows.push(row);
    }
    return rows;
  }

  /** Change the cap; shrinking evicts the oldest rows immediately. */
  setLimit(limit: number): void {
    const next = Math.max(0, Math.floor(limit));
    const rows = this.toArray();
    const kept = next === 0 ? [] : rows.slice(Math.max(0, rows.length - next));
    this.limit = next;
    this.slots = kept;
    this.head = 0;
    this.count = kept.length;
  }

  clear(): void {
    this.slots = [];
    this.head = 0;
    this.count = 0;
  }
}
