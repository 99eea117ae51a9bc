/**
 * Screen buffer: a sized grid of cells representing one full frame
 *
 * Cells are stored row-major in a flat array (index = y * width + x).
 * Out-of-bounds reads return undefined and out-of-bounds writes are
 * rejected; nothing is clamped into range.
 */

import { toVec2, vec2, type Vec2, type Vec2Like } from '../math.js';
import { Rect } from '../layout/Rect.js';
import { Cell, type CellLike } from './Cell.js';
import { renderItem, type Render, type Renderable } from './render.js';

export interface DiffEntry {
  loc: Vec2;
  cell: Cell;
}

// Scratch area used to measure elements that don't report their own size
const SCRATCH_SIZE = vec2(256, 256);

export class Buffer implements Render {
  private bufferSize: Vec2;
  private cells: Cell[];
  private clip: Rect | null = null;

  constructor(size: Vec2Like) {
    this.bufferSize = toVec2(size);
    this.cells = Buffer.emptyCells(this.bufferSize, Cell.EMPTY);
  }

  static filled(size: Vec2Like, cell: CellLike): Buffer {
    const buffer = new Buffer(size);
    buffer.fill(cell);
    return buffer;
  }

  /**
   * Render an element into a scratch buffer and shrink it to the area the
   * element actually painted
   */
  static sizedElement(item: Renderable): Buffer {
    const buffer = new Buffer(SCRATCH_SIZE);
    renderItem(item, vec2(0, 0), buffer);
    buffer.shrink();
    return buffer;
  }

  private static emptyCells(size: Vec2, cell: Cell): Cell[] {
    return new Array<Cell>(size.x * size.y).fill(cell);
  }

  size(): Vec2 {
    return vec2(this.bufferSize.x, this.bufferSize.y);
  }

  get width(): number {
    return this.bufferSize.x;
  }

  get height(): number {
    return this.bufferSize.y;
  }

  inBounds(loc: Vec2): boolean {
    return (
      Number.isInteger(loc.x) &&
      Number.isInteger(loc.y) &&
      loc.x >= 0 &&
      loc.y >= 0 &&
      loc.x < this.bufferSize.x &&
      loc.y < this.bufferSize.y
    );
  }

  private indexOf(x: number, y: number): number {
    return y * this.bufferSize.x + x;
  }

  /**
   * Returns the cell at the location, or undefined if there is no such cell
   */
  get(loc: Vec2Like): Cell | undefined {
    const { x, y } = toVec2(loc);
    if (!this.inBounds({ x, y })) return undefined;
    return this.cells[this.indexOf(x, y)];
  }

  /**
   * Replace one grid slot. A two-column cell also claims the next column
   * with a continuation placeholder, and overwriting either half of an
   * existing wide glyph blanks its other half.
   *
   * Returns false when the write is rejected (out of bounds, outside the
   * active clip, a bare continuation cell, or a wide cell with no column
   * left for its second half).
   */
  set(loc: Vec2Like, value: CellLike): boolean {
    const { x, y } = toVec2(loc);
    const cell = Cell.from(value);

    if (cell.isContinuation()) return false;
    if (!this.inBounds({ x, y })) return false;
    if (cell.width === 2 && x + 1 >= this.bufferSize.x) return false;
    if (this.clip) {
      if (!this.clip.contains({ x, y })) return false;
      if (cell.width === 2 && !this.clip.contains({ x: x + 1, y })) return false;
    }

    const width = this.bufferSize.x;
    const idx = this.indexOf(x, y);
    const previous = this.cells[idx];

    if (previous.isContinuation() && x > 0 && this.cells[idx - 1].width === 2) {
      this.cells[idx - 1] = Cell.EMPTY;
    }
    if (previous.width === 2 && x + 1 < width) {
      this.cells[idx + 1] = Cell.EMPTY;
    }

    this.cells[idx] = cell;

    if (cell.width === 2) {
      const next = this.cells[idx + 1];
      if (next.width === 2 && x + 2 < width) {
        this.cells[idx + 2] = Cell.EMPTY;
      }
      this.cells[idx + 1] = Cell.CONTINUATION;
    }

    return true;
  }

  /**
   * Overwrite every slot with the same cell. Wide cells are laid out in
   * pairs so each one keeps its continuation column.
   */
  fill(value: CellLike): void {
    const cell = Cell.from(value);
    if (cell.width !== 2) {
      this.cells.fill(cell);
      return;
    }
    for (let y = 0; y < this.bufferSize.y; y++) {
      for (let x = 0; x < this.bufferSize.x; x++) {
        const even = x % 2 === 0;
        const lastColumn = x === this.bufferSize.x - 1;
        this.cells[this.indexOf(x, y)] = even ? (lastColumn ? Cell.EMPTY : cell) : Cell.CONTINUATION;
      }
    }
  }

  /**
   * Clear the buffer
   */
  clear(): void {
    this.cells.fill(Cell.EMPTY);
  }

  /**
   * Resize while retaining the cells in the overlapping region. New area is
   * empty; cells beyond the new bounds are dropped.
   */
  resize(size: Vec2Like): void {
    const next = toVec2(size);
    if (next.x === this.bufferSize.x && next.y === this.bufferSize.y) return;

    const cells = Buffer.emptyCells(next, Cell.EMPTY);
    const copyWidth = Math.min(next.x, this.bufferSize.x);
    const copyHeight = Math.min(next.y, this.bufferSize.y);

    for (let y = 0; y < copyHeight; y++) {
      for (let x = 0; x < copyWidth; x++) {
        cells[y * next.x + x] = this.cells[this.indexOf(x, y)];
      }
      // A wide glyph cut off at the new edge loses its second column
      const edge = y * next.x + copyWidth - 1;
      if (copyWidth > 0 && cells[edge].width === 2) {
        cells[edge] = Cell.EMPTY;
      }
    }

    this.bufferSize = next;
    this.cells = cells;
  }

  /**
   * Shrink to the smallest size that still holds every non-empty cell,
   * anchored at the top-left corner. An all-empty buffer becomes 0x0.
   */
  shrink(): void {
    let maxX = -1;
    let maxY = -1;

    for (let y = 0; y < this.bufferSize.y; y++) {
      for (let x = 0; x < this.bufferSize.x; x++) {
        const cell = this.cells[this.indexOf(x, y)];
        if (cell.isEmpty()) continue;
        maxX = Math.max(maxX, Math.min(x + cell.width - 1, this.bufferSize.x - 1));
        maxY = Math.max(maxY, y);
      }
    }

    this.resize(vec2(maxX + 1, maxY + 1));
  }

  /**
   * Cells of `other` that differ from this buffer, in row-major order.
   * After a changed wide cell the walk skips the columns it covers, so a
   * continuation placeholder is never reported on its own.
   */
  diff(other: Buffer): DiffEntry[] {
    if (this.bufferSize.x !== other.bufferSize.x || this.bufferSize.y !== other.bufferSize.y) {
      throw new Error(
        `Cannot diff buffers of different sizes (${this.bufferSize.x}x${this.bufferSize.y} vs ${other.bufferSize.x}x${other.bufferSize.y})`,
      );
    }

    const result: DiffEntry[] = [];
    const { x: width, y: height } = this.bufferSize;

    for (let y = 0; y < height; y++) {
      let x = 0;
      while (x < width) {
        const idx = this.indexOf(x, y);
        const cell = other.cells[idx];
        if (!this.cells[idx].equals(cell)) {
          result.push({ loc: vec2(x, y), cell });
          x += Math.max(0, cell.width - 1);
        }
        x++;
      }
    }

    return result;
  }

  /**
   * Run fn with writes restricted to rect (within any clip already active)
   */
  withClip<T>(rect: Rect, fn: () => T): T {
    const previous = this.clip;
    this.clip = previous ? previous.intersect(rect) : rect;
    try {
      return fn();
    } finally {
      this.clip = previous;
    }
  }

  /**
   * Text of each row, continuation columns omitted
   */
  lines(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.bufferSize.y; y++) {
      let line = '';
      for (let x = 0; x < this.bufferSize.x; x++) {
        line += this.cells[this.indexOf(x, y)].text;
      }
      rows.push(line);
    }
    return rows;
  }

  /**
   * Copy this buffer's cells into another buffer at loc, truncated at the
   * target's edges
   */
  render(loc: Vec2, buffer: Buffer): Vec2 {
    for (let y = 0; y < this.bufferSize.y; y++) {
      if (loc.y + y >= buffer.height) break;
      for (let x = 0; x < this.bufferSize.x; x++) {
        if (loc.x + x >= buffer.width) break;
        const cell = this.cells[this.indexOf(x, y)];
        if (cell.isContinuation()) continue;
        buffer.set(vec2(loc.x + x, loc.y + y), cell);
      }
    }
    return vec2(loc.x + this.bufferSize.x, loc.y + Math.max(0, this.bufferSize.y - 1));
  }
}
