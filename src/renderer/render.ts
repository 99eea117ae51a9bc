/**
 * The render contract: anything that can paint itself into a Buffer
 *
 * Built-in kinds (text, single cells, sequences, buffers) are dispatched
 * directly; any other widget implements the Render interface.
 */

import { toVec2, vec2, type Vec2, type Vec2Like } from '../math.js';
import { Rect } from '../layout/Rect.js';
import { parseStyled } from './ansi.js';
import { Buffer } from './Buffer.js';
import { Cell } from './Cell.js';
import { cellWidth, graphemes } from './width.js';

// C0 and C1 controls move the real cursor when printed; they take no cell
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTER = /^[\x00-\x1f\x7f-\x9f]$/;

export interface Render {
  /**
   * Paint at loc and return where painting logically ended, so the next
   * element can continue from there
   */
  render(loc: Vec2, buffer: Buffer): Vec2;

  /**
   * Footprint of the element. Optional; measured with a scratch buffer
   * when missing.
   */
  size?(): Vec2;

  /**
   * Paint without touching anything outside loc + clipSize. Optional;
   * defaults to render() under a buffer clip.
   */
  renderClipped?(loc: Vec2, clipSize: Vec2, buffer: Buffer): Vec2;
}

export type Renderable = string | Cell | Render | readonly Renderable[];

/** Anything that hands out a buffer to paint into, such as a Window */
export interface BufferTarget {
  buffer(): Buffer;
}

function isSequence(item: Renderable): item is readonly Renderable[] {
  return Array.isArray(item);
}

/**
 * Multi-line styled text. Inline SGR sequences (chalk output) become cell
 * styles; each grapheme takes one cell and advances by its width.
 */
export class Text implements Render {
  private readonly lines: string[];

  constructor(
    readonly content: string,
    readonly style = '',
  ) {
    this.lines = content.split(/\r?\n/);
  }

  render(loc: Vec2, buffer: Buffer): Vec2 {
    let x = loc.x;
    let y = loc.y;

    this.lines.forEach((line, index) => {
      if (index > 0) y++;
      x = loc.x;
      for (const segment of parseStyled(line, this.style)) {
        for (const glyph of graphemes(segment.text)) {
          if (CONTROL_CHARACTER.test(glyph)) continue;
          const cell = Cell.new(glyph, segment.style);
          buffer.set(vec2(x, y), cell);
          x += cell.width;
        }
      }
    });

    return vec2(x, y);
  }

  size(): Vec2 {
    const width = this.lines.reduce((widest, line) => Math.max(widest, textWidth(line)), 0);
    return vec2(width, this.lines.length);
  }
}

/**
 * Paint any renderable at loc and return where it ended
 */
export function renderItem(item: Renderable, loc: Vec2Like, buffer: Buffer): Vec2 {
  const at = toVec2(loc);

  if (typeof item === 'string') {
    return new Text(item).render(at, buffer);
  }
  if (item instanceof Cell) {
    buffer.set(at, item);
    return at;
  }
  if (isSequence(item)) {
    let next = at;
    for (const element of item) {
      next = renderItem(element, next, buffer);
    }
    return next;
  }
  return item.render(at, buffer);
}

/**
 * Footprint of a renderable: its own size() when it has one, otherwise the
 * shrunk area it paints into a scratch buffer
 */
export function measure(item: Renderable): Vec2 {
  if (typeof item === 'string') {
    return new Text(item).size();
  }
  if (item instanceof Cell) {
    return vec2(item.width, 1);
  }
  if (!isSequence(item) && item.size) {
    return item.size();
  }
  return Buffer.sizedElement(item).size();
}

/**
 * Paint a renderable so that nothing lands outside loc + clipSize. The
 * returned location never leaves the clip area.
 */
export function renderClippedItem(item: Renderable, loc: Vec2Like, clipSize: Vec2Like, buffer: Buffer): Vec2 {
  const at = toVec2(loc);
  const clip = toVec2(clipSize);
  const area = Rect.fromPosSize(at, clip);

  if (area.isEmpty()) return at;

  if (isSequence(item)) {
    const end = area.bottomRight();
    let next = at;
    for (const element of item) {
      const remaining = vec2(end.x - next.x, end.y - next.y);
      if (remaining.x <= 0 || remaining.y <= 0) break;
      next = renderClippedItem(element, next, remaining, buffer);
    }
    return clampTo(next, area);
  }

  if (typeof item !== 'string' && !(item instanceof Cell) && item.renderClipped) {
    return clampTo(item.renderClipped(at, clip, buffer), area);
  }

  return clampTo(
    buffer.withClip(area, () => renderItem(item, at, buffer)),
    area,
  );
}

function clampTo(loc: Vec2, area: Rect): Vec2 {
  const end = area.bottomRight();
  return vec2(Math.min(loc.x, end.x), Math.min(loc.y, end.y - 1));
}

function resolveTarget(target: Buffer | BufferTarget): Buffer {
  return target instanceof Buffer ? target : target.buffer();
}

/**
 * Render a sequence of items into a buffer (or a window) starting at loc,
 * each one continuing where the previous ended
 */
export function render(target: Buffer | BufferTarget, loc: Vec2Like, ...items: Renderable[]): Vec2 {
  return renderItem(items, loc, resolveTarget(target));
}

/**
 * Clipped variant of render()
 */
export function renderClipped(
  target: Buffer | BufferTarget,
  loc: Vec2Like,
  clipSize: Vec2Like,
  ...items: Renderable[]
): Vec2 {
  return renderClippedItem(items, loc, clipSize, resolveTarget(target));
}

/**
 * Columns a single line of text takes once laid out in cells, ignoring
 * escape sequences
 */
export function textWidth(text: string): number {
  let width = 0;
  for (const segment of parseStyled(text)) {
    for (const glyph of graphemes(segment.text)) {
      width += cellWidth(glyph);
    }
  }
  return width;
}
