/**
 * Column/row coordinates used across buffers, layout and the window
 */

export interface Vec2 {
  x: number;
  y: number;
}

export type Vec2Like = Vec2 | readonly [number, number];

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function toVec2(value: Vec2Like): Vec2 {
  if (isTuple(value)) {
    return { x: value[0], y: value[1] };
  }
  return { x: value.x, y: value.y };
}

function isTuple(value: Vec2Like): value is readonly [number, number] {
  return Array.isArray(value);
}

export function addVec2(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function equalsVec2(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}
