/**
 * Grid layouts: rows with a height constraint, each holding columns with
 * width constraints, resolved into concrete rectangles
 */

import { toVec2, type Vec2, type Vec2Like } from '../math.js';
import type { Buffer } from '../renderer/Buffer.js';
import { renderClippedItem, renderItem, type Renderable } from '../renderer/render.js';
import { flexible, resolveConstraints, type Constraint } from './constraints.js';
import { Rect } from './Rect.js';

export interface LayoutRow {
  height: Constraint;
  columns: readonly Constraint[];
}

/**
 * Resolve row heights against the total height, then each row's columns
 * against the total width. Rects run top-to-bottom, left-to-right.
 *
 * @throws LayoutError
 */
export function calculateLayout(space: Vec2Like, rows: readonly LayoutRow[]): Rect[][] {
  const total = toVec2(space);
  const heights = resolveConstraints(
    rows.map(row => row.height),
    total.y,
  );

  const result: Rect[][] = [];
  let y = 0;

  rows.forEach((row, rowIndex) => {
    const height = heights[rowIndex];
    const widths = resolveConstraints(row.columns, total.x);
    const rects: Rect[] = [];
    let x = 0;

    for (const width of widths) {
      rects.push(new Rect(x, y, width, height));
      x += width;
    }

    result.push(rects);
    y += height;
  });

  return result;
}

export class Layout {
  private readonly rows: LayoutRow[] = [];

  /**
   * Add a row with a height constraint and one width constraint per column
   */
  row(height: Constraint, columns: readonly Constraint[]): this {
    this.rows.push({ height, columns: [...columns] });
    return this;
  }

  /**
   * Add a row with a single column spanning the full width
   */
  emptyRow(height: Constraint): this {
    return this.row(height, [flexible()]);
  }

  calculate(space: Vec2Like): Rect[][] {
    return calculateLayout(space, this.rows);
  }

  compute(space: Vec2Like): CalculatedLayout {
    return new CalculatedLayout(this.calculate(space));
  }

  /**
   * Calculate the layout and render each element at its rect's position.
   * Missing elements leave their rect untouched.
   */
  render(space: Vec2Like, buffer: Buffer, elements: readonly (readonly Renderable[])[]): Rect[][] {
    const layout = this.compute(space);
    for (const { row, col } of layout.entries()) {
      const element = elements[row]?.[col];
      if (element !== undefined) layout.renderAt(row, col, element, buffer);
    }
    return layout.rects;
  }

  /**
   * Like render(), but each element is clipped to its rect
   */
  renderClipped(space: Vec2Like, buffer: Buffer, elements: readonly (readonly Renderable[])[]): Rect[][] {
    const layout = this.compute(space);
    for (const { row, col } of layout.entries()) {
      const element = elements[row]?.[col];
      if (element !== undefined) layout.renderClippedAt(row, col, element, buffer);
    }
    return layout.rects;
  }
}

export interface LayoutEntry {
  row: number;
  col: number;
  rect: Rect;
}

/**
 * A resolved layout with lookups by row and column
 */
export class CalculatedLayout {
  constructor(readonly rects: Rect[][]) {}

  get(row: number, col: number): Rect | undefined {
    return this.rects[row]?.[col];
  }

  row(row: number): readonly Rect[] | undefined {
    return this.rects[row];
  }

  rowCount(): number {
    return this.rects.length;
  }

  colCount(row: number): number {
    return this.rects[row]?.length ?? 0;
  }

  entries(): LayoutEntry[] {
    return this.rects.flatMap((rects, row) => rects.map((rect, col) => ({ row, col, rect })));
  }

  renderAt(row: number, col: number, element: Renderable, buffer: Buffer): Vec2 | undefined {
    const rect = this.get(row, col);
    if (!rect) return undefined;
    return renderItem(element, rect.position(), buffer);
  }

  renderClippedAt(row: number, col: number, element: Renderable, buffer: Buffer): Vec2 | undefined {
    const rect = this.get(row, col);
    if (!rect) return undefined;
    return renderClippedItem(element, rect.position(), rect.size(), buffer);
  }
}
