import { toVec2, vec2, type Vec2, type Vec2Like } from '../math.js';
import type { Buffer } from '../renderer/Buffer.js';
import { Cell, type CellLike } from '../renderer/Cell.js';
import type { Render } from '../renderer/render.js';

export type NineSliceCells = readonly [
  CellLike, CellLike, CellLike,
  CellLike, CellLike, CellLike,
  CellLike, CellLike, CellLike,
];

/**
 * A panel stretched from nine cells: four corners, four edges repeated
 * along the sides and a centre filling the inside
 */
export class NineSlice implements Render {
  private readonly cells: Cell[];
  private readonly panelSize: Vec2;

  constructor(cells: NineSliceCells, size: Vec2Like) {
    this.cells = cells.map(cell => Cell.from(cell));
    this.panelSize = toVec2(size);
  }

  size(): Vec2 {
    return vec2(this.panelSize.x, this.panelSize.y);
  }

  render(loc: Vec2, buffer: Buffer): Vec2 {
    const { x: width, y: height } = this.panelSize;
    if (width < 1 || height < 1) return loc;

    const [topLeft, top, topRight, left, centre, right, bottomLeft, bottom, bottomRight] = this.cells;
    const lastX = loc.x + width - 1;
    const lastY = loc.y + height - 1;

    for (let y = loc.y; y <= lastY; y++) {
      for (let x = loc.x; x <= lastX; x++) {
        const atTop = y === loc.y;
        const atBottom = y === lastY;
        const atLeft = x === loc.x;
        const atRight = x === lastX;

        let cell: Cell;
        if (atTop) cell = atLeft ? topLeft : atRight ? topRight : top;
        else if (atBottom) cell = atLeft ? bottomLeft : atRight ? bottomRight : bottom;
        else cell = atLeft ? left : atRight ? right : centre;

        buffer.set(vec2(x, y), cell);
      }
    }

    return vec2(loc.x + 1, loc.y + 1);
  }
}
