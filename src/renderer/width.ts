import stringWidth from 'string-width';

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Split text into user-perceived characters, so a family emoji or a letter
 * with combining marks lands in one cell.
 */
export function graphemes(text: string): string[] {
  const out: string[] = [];
  for (const { segment } of segmenter.segment(text)) {
    out.push(segment);
  }
  return out;
}

/**
 * Terminal columns taken by plain text (no escape sequences)
 */
export function displayWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Columns a cell holding this text occupies: 1 or 2
 */
export function cellWidth(text: string): 1 | 2 {
  return displayWidth(text) >= 2 ? 2 : 1;
}
