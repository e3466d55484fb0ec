/**
 * Multi-Cursor Set
 *
 * A set of independent cursors with one designated primary. After every
 * operation the set is sorted in document order and contains no two
 * cursors at the same position.
 */

import { clonePosition, comparePositions, positionsEqual, type Position, type TextBuffer } from './buffer.ts';

/**
 * Serializable cursor state, recorded around every committed edit.
 */
export interface CursorSnapshot {
  positions: Position[];
  primary: number;
}

export class MultiCursorSet {
  private cursors: Position[] = [{ line: 0, column: 0 }];
  private primaryIndex = 0;
  /** Column vertical movement tries to return to */
  private desiredColumn: number | null = null;

  primary(): Position {
    return clonePosition(this.cursors[this.primaryIndex] ?? { line: 0, column: 0 });
  }

  primaryIndexOf(): number {
    return this.primaryIndex;
  }

  /**
   * All cursors in document order.
   */
  all(): Position[] {
    return this.cursors.map(clonePosition);
  }

  count(): number {
    return this.cursors.length;
  }

  isMulti(): boolean {
    return this.cursors.length > 1;
  }

  getDesiredColumn(): number | null {
    return this.desiredColumn;
  }

  setDesiredColumn(column: number | null): void {
    this.desiredColumn = column;
  }

  /**
   * Replace all cursors with a single one.
   */
  set(pos: Position): void {
    this.cursors = [clonePosition(pos)];
    this.primaryIndex = 0;
  }

  /**
   * Replace all cursors. The primary index refers to the given array and
   * follows its cursor through sorting and merging.
   */
  setAll(positions: readonly Position[], primary: number = 0): void {
    if (positions.length === 0) {
      this.set({ line: 0, column: 0 });
      return;
    }
    this.cursors = positions.map(clonePosition);
    this.primaryIndex = Math.max(0, Math.min(primary, positions.length - 1));
    this.normalize();
  }

  /**
   * Add a cursor. Returns false when a cursor already sits there.
   */
  add(pos: Position): boolean {
    if (this.cursors.some((c) => positionsEqual(c, pos))) return false;
    const primary = this.cursors[this.primaryIndex];
    this.cursors.push(clonePosition(pos));
    this.sortKeepingPrimary(primary);
    return true;
  }

  /**
   * Add a cursor on the line above the topmost cursor, at the same column
   * clamped to that line's length.
   */
  addAbove(buffer: TextBuffer): boolean {
    const top = this.cursors[0];
    if (!top || top.line === 0) return false;
    return this.add(buffer.clampPosition({ line: top.line - 1, column: top.column }));
  }

  /**
   * Add a cursor on the line below the bottommost cursor.
   */
  addBelow(buffer: TextBuffer): boolean {
    const bottom = this.cursors[this.cursors.length - 1];
    if (!bottom || bottom.line >= buffer.lineCount() - 1) return false;
    return this.add(buffer.clampPosition({ line: bottom.line + 1, column: bottom.column }));
  }

  /**
   * Keep only the primary cursor.
   */
  collapse(): void {
    this.set(this.primary());
  }

  /**
   * Sort, merge duplicates and keep the primary pointing at its cursor.
   */
  normalize(): void {
    const primary = this.cursors[this.primaryIndex];
    this.sortKeepingPrimary(primary);

    const merged: Position[] = [];
    let primaryIndex = 0;
    for (const cursor of this.cursors) {
      const last = merged[merged.length - 1];
      if (last && positionsEqual(last, cursor)) {
        if (cursor === primary) primaryIndex = merged.length - 1;
        continue;
      }
      if (cursor === primary) primaryIndex = merged.length;
      merged.push(cursor);
    }
    this.cursors = merged;
    this.primaryIndex = primaryIndex;
  }

  /**
   * Clamp every cursor into the buffer, then normalize.
   */
  clampTo(buffer: TextBuffer): void {
    const primary = this.cursors[this.primaryIndex];
    this.cursors = this.cursors.map((c) => {
      const clamped = buffer.clampPosition(c);
      return c === primary ? Object.assign(c, clamped) : clamped;
    });
    this.normalize();
  }

  snapshot(): CursorSnapshot {
    return { positions: this.all(), primary: this.primaryIndex };
  }

  restore(snapshot: CursorSnapshot): void {
    this.setAll(snapshot.positions, snapshot.primary);
  }

  private sortKeepingPrimary(primary: Position | undefined): void {
    this.cursors.sort(comparePositions);
    const index = primary ? this.cursors.indexOf(primary) : -1;
    this.primaryIndex = index >= 0 ? index : 0;
  }
}
