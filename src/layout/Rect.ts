import { vec2, type Vec2 } from '../math.js';

/**
 * A rectangular area of the grid: top-left corner plus dimensions
 */
export class Rect {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number,
  ) {}

  static fromCorners(topLeft: Vec2, bottomRight: Vec2): Rect {
    return new Rect(
      topLeft.x,
      topLeft.y,
      Math.max(0, bottomRight.x - topLeft.x),
      Math.max(0, bottomRight.y - topLeft.y),
    );
  }

  static fromPosSize(pos: Vec2, size: Vec2): Rect {
    return new Rect(pos.x, pos.y, size.x, size.y);
  }

  position(): Vec2 {
    return vec2(this.x, this.y);
  }

  size(): Vec2 {
    return vec2(this.width, this.height);
  }

  /**
   * Exclusive bottom-right corner
   */
  bottomRight(): Vec2 {
    return vec2(this.x + this.width, this.y + this.height);
  }

  center(): Vec2 {
    return vec2(this.x + Math.floor(this.width / 2), this.y + Math.floor(this.height / 2));
  }

  isEmpty(): boolean {
    return this.width === 0 || this.height === 0;
  }

  contains(loc: Vec2): boolean {
    return loc.x >= this.x && loc.y >= this.y && loc.x < this.x + this.width && loc.y < this.y + this.height;
  }

  intersect(other: Rect): Rect {
    const x = Math.max(this.x, other.x);
    const y = Math.max(this.y, other.y);
    const right = Math.min(this.x + this.width, other.x + other.width);
    const bottom = Math.min(this.y + this.height, other.y + other.height);
    return new Rect(x, y, Math.max(0, right - x), Math.max(0, bottom - y));
  }

  withPadding(padding: number): Rect {
    return this.withPaddingSides(padding, padding, padding, padding);
  }

  withPaddingSides(top: number, right: number, bottom: number, left: number): Rect {
    return new Rect(
      this.x + left,
      this.y + top,
      Math.max(0, this.width - left - right),
      Math.max(0, this.height - top - bottom),
    );
  }

  equals(other: Rect): boolean {
    return this.x === other.x && this.y === other.y && this.width === other.width && this.height === other.height;
  }
}
