/**
 * ANSI escape codes for terminal control
 * Low-level building blocks for the renderer and the terminal driver
 */

export type CursorShape =
  | 'default'
  | 'blinkingBlock'
  | 'steadyBlock'
  | 'blinkingUnderline'
  | 'steadyUnderline'
  | 'blinkingBar'
  | 'steadyBar';

const CURSOR_SHAPES: Record<CursorShape, number> = {
  default: 0,
  blinkingBlock: 1,
  steadyBlock: 2,
  blinkingUnderline: 3,
  steadyUnderline: 4,
  blinkingBar: 5,
  steadyBar: 6,
};

// Cursor control
export const cursor = {
  hide: '\x1b[?25l',
  show: '\x1b[?25h',
  home: '\x1b[H',

  // Move cursor to position (1-indexed)
  to: (row: number, col: number) => `\x1b[${row};${col}H`,

  // Move cursor to a 0-based column/row
  moveTo: (x: number, y: number) => `\x1b[${y + 1};${x + 1}H`,

  // Move cursor relative
  up: (n = 1) => `\x1b[${n}A`,
  down: (n = 1) => `\x1b[${n}B`,
  right: (n = 1) => `\x1b[${n}C`,
  left: (n = 1) => `\x1b[${n}D`,

  shape: (shape: CursorShape) => `\x1b[${CURSOR_SHAPES[shape]} q`,

  // Get position (requires reading response)
  getPosition: '\x1b[6n',
};

// Screen control
export const screen = {
  clear: '\x1b[2J',
  clearLine: '\x1b[2K',
  clearToEnd: '\x1b[J',

  // Alternative screen buffer (like vim uses)
  enterAltBuffer: '\x1b[?1049h',
  exitAltBuffer: '\x1b[?1049l',

  disableLineWrap: '\x1b[?7l',
  enableLineWrap: '\x1b[?7h',

  // DEC Mode 2026 - Synchronized Output
  syncStart: '\x1b[?2026h',
  syncEnd: '\x1b[?2026l',
};

// Input reporting modes
export const reporting = {
  // button events, drag, any motion, RXVT and SGR extended coordinates
  enableMouse: '\x1b[?1000h\x1b[?1002h\x1b[?1003h\x1b[?1015h\x1b[?1006h',
  disableMouse: '\x1b[?1006l\x1b[?1015l\x1b[?1003l\x1b[?1002l\x1b[?1000l',

  enableFocus: '\x1b[?1004h',
  disableFocus: '\x1b[?1004l',

  // wraps pastes in \x1b[200~ ... \x1b[201~
  enableBracketedPaste: '\x1b[?2004h',
  disableBracketedPaste: '\x1b[?2004l',
};

// Kitty keyboard protocol
export const keyboard = {
  // disambiguate | event types | alternate keys | all keys as escapes | associated text
  allFlags: 0b11111,
  push: (flags: number) => `\x1b[>${flags}u`,
  pop: '\x1b[<1u',
  queryFlags: '\x1b[?u',
};

export const queries = {
  cursorPosition: '\x1b[6n',
  primaryDeviceAttributes: '\x1b[c',
};

// Colors - basic 16 colors
export const fg = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',

  // 256 color
  color256: (n: number) => `\x1b[38;5;${n}m`,

  // RGB
  rgb: (r: number, g: number, b: number) => `\x1b[38;2;${r};${g};${b}m`,
};

export const bg = {
  black: '\x1b[40m',
  red: '\x1b[41m',
  green: '\x1b[42m',
  yellow: '\x1b[43m',
  blue: '\x1b[44m',
  magenta: '\x1b[45m',
  cyan: '\x1b[46m',
  white: '\x1b[47m',
  gray: '\x1b[100m',

  color256: (n: number) => `\x1b[48;5;${n}m`,
  rgb: (r: number, g: number, b: number) => `\x1b[48;2;${r};${g};${b}m`,
};

// Text styles
export const style = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  italic: '\x1b[3m',
  underline: '\x1b[4m',
  blink: '\x1b[5m',
  inverse: '\x1b[7m',
  hidden: '\x1b[8m',
  strikethrough: '\x1b[9m',
};

/**
 * Helper to create styled text
 */
export function styled(text: string, ...styles: string[]): string {
  if (styles.length === 0) return text;
  return styles.join('') + text + style.reset;
}

// CSI sequences and two-byte escapes
// eslint-disable-next-line no-control-regex
const ESCAPE_PATTERN = /\x1b\[[0-9;:?<=>]*[ -/]*[@-~]|\x1b[@-Z\\-_]/g;

/**
 * Strip ANSI codes from string (for width calculation)
 */
export function stripAnsi(str: string): string {
  return str.replace(ESCAPE_PATTERN, '');
}

export interface StyledSegment {
  text: string;
  style: string;
}

// Codes that switch an attribute off, and the attributes they clear
const ATTRIBUTE_RESETS: Record<number, number[]> = {
  21: [4],
  22: [1, 2],
  23: [3],
  24: [4],
  25: [5, 6],
  27: [7],
  28: [8],
  29: [9],
};

type ColorSlot = 'fg' | 'bg' | 'underline';

/**
 * Tracks the SGR state while walking styled text, and renders it back as a
 * canonical prefix: attributes in code order, then foreground, background
 * and underline colour. Equal visual states therefore compare equal as
 * strings, which is what the buffer diff relies on.
 */
class SgrState {
  private attributes = new Set<number>();
  private colors = new Map<ColorSlot, string>();

  apply(params: string): void {
    const codes = params === '' ? [0] : params.split(/[;:]/).map(p => (p === '' ? 0 : Number(p)));

    for (let i = 0; i < codes.length; i++) {
      const code = codes[i];

      if (code === 0) {
        this.attributes.clear();
        this.colors.clear();
      } else if (code >= 1 && code <= 9) {
        this.attributes.add(code);
      } else if (code in ATTRIBUTE_RESETS) {
        for (const cleared of ATTRIBUTE_RESETS[code]) this.attributes.delete(cleared);
      } else if ((code >= 30 && code <= 37) || (code >= 90 && code <= 97)) {
        this.colors.set('fg', String(code));
      } else if ((code >= 40 && code <= 47) || (code >= 100 && code <= 107)) {
        this.colors.set('bg', String(code));
      } else if (code === 39) {
        this.colors.delete('fg');
      } else if (code === 49) {
        this.colors.delete('bg');
      } else if (code === 59) {
        this.colors.delete('underline');
      } else if (code === 38 || code === 48 || code === 58) {
        const slot: ColorSlot = code === 38 ? 'fg' : code === 48 ? 'bg' : 'underline';
        const mode = codes[i + 1];
        const length = mode === 5 ? 2 : mode === 2 ? 4 : 0;
        if (length === 0) break;
        this.colors.set(slot, [code, ...codes.slice(i + 1, i + 1 + length)].join(';'));
        i += length;
      }
    }
  }

  toString(): string {
    let out = '';
    for (const code of [...this.attributes].sort((a, b) => a - b)) {
      out += `\x1b[${code}m`;
    }
    for (const slot of ['fg', 'bg', 'underline'] as const) {
      const value = this.colors.get(slot);
      if (value !== undefined) out += `\x1b[${value}m`;
    }
    return out;
  }
}

/**
 * Split text carrying inline SGR sequences (chalk output, for example) into
 * runs of plain text with the style active for each run. Non-SGR escapes
 * are dropped.
 */
export function parseStyled(input: string, baseStyle = ''): StyledSegment[] {
  const segments: StyledSegment[] = [];
  const state = new SgrState();
  let current = baseStyle;
  let lastIndex = 0;

  const push = (text: string) => {
    if (text.length === 0) return;
    const last = segments[segments.length - 1];
    if (last && last.style === current) {
      last.text += text;
    } else {
      segments.push({ text, style: current });
    }
  };

  for (const match of input.matchAll(ESCAPE_PATTERN)) {
    const index = match.index ?? 0;
    push(input.slice(lastIndex, index));
    lastIndex = index + match[0].length;

    const sgr = /^\x1b\[([0-9;:]*)m$/.exec(match[0]);
    if (sgr) {
      state.apply(sgr[1]);
      current = baseStyle + state.toString();
    }
  }
  push(input.slice(lastIndex));

  return segments;
}
