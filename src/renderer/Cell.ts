/**
 * A single terminal grid unit: glyph text, the style applied to it and the
 * number of columns it covers
 */

import { parseStyled, style as sgr } from './ansi.js';
import { cellWidth } from './width.js';

export type CellLike = Cell | string;

export class Cell {
  /** The default cell: a space with no style */
  static readonly EMPTY = new Cell(' ', '', 1);

  /** Filler written after a two-column glyph; never printed on its own */
  static readonly CONTINUATION = new Cell('', '', 0);

  private constructor(
    readonly text: string,
    readonly style: string,
    readonly width: number,
  ) {}

  /**
   * Create a cell, measuring the display width of its text once
   */
  static new(text: string, style = ''): Cell {
    if (text === '') text = ' ';
    if (text === ' ' && style === '') return Cell.EMPTY;
    return new Cell(text, style, cellWidth(text));
  }

  static chr(chr: string): Cell {
    return Cell.new(chr);
  }

  static string(text: string): Cell {
    return Cell.new(text);
  }

  /**
   * Create a cell from text carrying inline SGR sequences, such as chalk
   * output. The style in effect at the first glyph becomes the cell style.
   */
  static styled(content: string): Cell {
    const segments = parseStyled(content);
    if (segments.length === 0) return Cell.EMPTY;
    const text = segments.map(s => s.text).join('');
    return Cell.new(text, segments[0].style);
  }

  static from(value: CellLike): Cell {
    return value instanceof Cell ? value : Cell.string(value);
  }

  /**
   * Whitespace-only and continuation cells count as empty
   */
  isEmpty(): boolean {
    return this.text.trim() === '';
  }

  isContinuation(): boolean {
    return this.width === 0;
  }

  equals(other: Cell): boolean {
    return this === other || (this.text === other.text && this.style === other.style && this.width === other.width);
  }

  /**
   * Printable form: style, glyph, reset
   */
  toString(): string {
    return this.style === '' ? this.text : this.style + this.text + sgr.reset;
  }
}
