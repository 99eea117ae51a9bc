/**
 * Box-drawing frame. Content rendered after it starts inside the frame.
 */

import { vec2, type Vec2 } from '../math.js';
import type { Buffer } from '../renderer/Buffer.js';
import { parseStyled } from '../renderer/ansi.js';
import { Cell } from '../renderer/Cell.js';
import type { Render } from '../renderer/render.js';
import { cellWidth, graphemes } from '../renderer/width.js';

// Box drawing characters (Unicode)
export const boxChars = {
  single: {
    topLeft: '┌',
    topRight: '┐',
    bottomLeft: '└',
    bottomRight: '┘',
    horizontal: '─',
    vertical: '│',
  },
  double: {
    topLeft: '╔',
    topRight: '╗',
    bottomLeft: '╚',
    bottomRight: '╝',
    horizontal: '═',
    vertical: '║',
  },
  rounded: {
    topLeft: '╭',
    topRight: '╮',
    bottomLeft: '╰',
    bottomRight: '╯',
    horizontal: '─',
    vertical: '│',
  },
  heavy: {
    topLeft: '┏',
    topRight: '┓',
    bottomLeft: '┗',
    bottomRight: '┛',
    horizontal: '━',
    vertical: '┃',
  },
};

export type BoxStyle = keyof typeof boxChars;

export interface BorderOptions {
  style?: BoxStyle;
  title?: string;
  titleAlign?: 'left' | 'center' | 'right';
  /** SGR prefix for the frame */
  borderStyle?: string;
  /** SGR prefix for the title; defaults to borderStyle */
  titleStyle?: string;
}

interface StyledGlyph {
  text: string;
  style: string;
}

/**
 * Cut glyphs to fit maxWidth columns, ending in an ellipsis when cut
 */
function truncate(glyphs: StyledGlyph[], maxWidth: number): StyledGlyph[] {
  const total = glyphs.reduce((sum, g) => sum + cellWidth(g.text), 0);
  if (total <= maxWidth) return glyphs;

  const kept: StyledGlyph[] = [];
  let width = 0;
  for (const glyph of glyphs) {
    const w = cellWidth(glyph.text);
    if (width + w > maxWidth - 1) break;
    kept.push(glyph);
    width += w;
  }
  kept.push({ text: '…', style: kept[kept.length - 1]?.style ?? glyphs[0].style });
  return kept;
}

export class Border implements Render {
  readonly options: Required<Omit<BorderOptions, 'title' | 'titleStyle'>> & Pick<BorderOptions, 'title' | 'titleStyle'>;

  constructor(
    readonly width: number,
    readonly height: number,
    options: BorderOptions = {},
  ) {
    this.options = {
      style: options.style ?? 'single',
      titleAlign: options.titleAlign ?? 'center',
      borderStyle: options.borderStyle ?? '',
      title: options.title,
      titleStyle: options.titleStyle,
    };
  }

  static square(width: number, height: number): Border {
    return new Border(width, height);
  }

  size(): Vec2 {
    return vec2(this.width, this.height);
  }

  /**
   * Frames smaller than 3x3 have no inside and are skipped
   */
  render(loc: Vec2, buffer: Buffer): Vec2 {
    const { width, height } = this;
    if (width < 3 || height < 3) return loc;

    const chars = boxChars[this.options.style];
    const edge = (text: string) => Cell.new(text, this.options.borderStyle);
    const right = loc.x + width - 1;
    const bottom = loc.y + height - 1;

    for (let x = loc.x + 1; x < right; x++) {
      buffer.set(vec2(x, loc.y), edge(chars.horizontal));
      buffer.set(vec2(x, bottom), edge(chars.horizontal));
    }
    for (let y = loc.y + 1; y < bottom; y++) {
      buffer.set(vec2(loc.x, y), edge(chars.vertical));
      buffer.set(vec2(right, y), edge(chars.vertical));
    }

    buffer.set(vec2(loc.x, loc.y), edge(chars.topLeft));
    buffer.set(vec2(right, loc.y), edge(chars.topRight));
    buffer.set(vec2(loc.x, bottom), edge(chars.bottomLeft));
    buffer.set(vec2(right, bottom), edge(chars.bottomRight));

    this.renderTitle(loc, buffer);

    return vec2(loc.x + 1, loc.y + 1);
  }

  private renderTitle(loc: Vec2, buffer: Buffer): void {
    const { title, titleAlign } = this.options;
    if (!title || this.width <= 4) return;

    // Titles may carry their own inline SGR sequences (chalk output)
    const titleStyle = this.options.titleStyle ?? this.options.borderStyle;
    const parsed = parseStyled(title, titleStyle).flatMap(segment =>
      graphemes(segment.text).map(text => ({ text, style: segment.style })),
    );
    const pad = { text: ' ', style: titleStyle };
    const glyphs = [pad, ...truncate(parsed, this.width - 4), pad];
    const titleWidth = glyphs.reduce((sum, g) => sum + cellWidth(g.text), 0);

    let offset: number;
    if (titleAlign === 'left') {
      offset = 2;
    } else if (titleAlign === 'right') {
      offset = this.width - titleWidth - 2;
    } else {
      offset = Math.floor((this.width - titleWidth) / 2);
    }

    let x = loc.x + offset;
    for (const glyph of glyphs) {
      const cell = Cell.new(glyph.text, glyph.style);
      buffer.set(vec2(x, loc.y), cell);
      x += cell.width;
    }
  }
}
