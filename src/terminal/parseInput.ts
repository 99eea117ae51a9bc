/**
 * Raw input parsing
 * Splits a chunk read from the terminal into key, mouse, focus and paste
 * events, plus replies to the queries the driver sends
 */

import { graphemes } from '../renderer/width.js';
import type { KeyEvent, KeyEventKind, KeyModifiers, MouseButton, MouseEvent, TerminalEvent } from './types.js';

export type QueryReply =
  | { type: 'reply'; reply: 'cursorPosition'; x: number; y: number }
  | { type: 'reply'; reply: 'keyboardFlags'; flags: number }
  | { type: 'reply'; reply: 'deviceAttributes' };

export type ParsedInput = TerminalEvent | QueryReply;

export function isTerminalEvent(item: ParsedInput): item is TerminalEvent {
  return item.type !== 'reply';
}

export interface ParseOptions {
  /**
   * Read `CSI row;col R` as a cursor position reply rather than F3 with
   * modifiers (the two are indistinguishable on the wire)
   */
  expectCursorReply?: boolean;
}

const PASTE_START = '\x1b[200~';
const PASTE_END = '\x1b[201~';

// eslint-disable-next-line no-control-regex
const CSI_PATTERN = /^\x1b\[([0-9;:<=>?]*)([ -/]*)([@-~])/;

const CSI_LETTER_KEYS: Record<string, string> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
  P: 'f1',
  Q: 'f2',
  R: 'f3',
  S: 'f4',
};

const CSI_TILDE_KEYS: Record<number, string> = {
  1: 'home',
  2: 'insert',
  3: 'delete',
  4: 'end',
  5: 'pageup',
  6: 'pagedown',
  7: 'home',
  8: 'end',
  11: 'f1',
  12: 'f2',
  13: 'f3',
  14: 'f4',
  15: 'f5',
  17: 'f6',
  18: 'f7',
  19: 'f8',
  20: 'f9',
  21: 'f10',
  23: 'f11',
  24: 'f12',
};

const KITTY_KEYS: Record<number, string> = {
  9: 'tab',
  13: 'enter',
  27: 'escape',
  127: 'backspace',
};

const KITTY_EVENT_KINDS: Record<number, KeyEventKind> = {
  1: 'press',
  2: 'repeat',
  3: 'release',
};

const NO_MODIFIERS: KeyModifiers = { ctrl: false, alt: false, shift: false };

function key(code: string, raw: string, modifiers: Partial<KeyModifiers> = {}, kind: KeyEventKind = 'press'): KeyEvent {
  return { type: 'key', code, kind, raw, ...NO_MODIFIERS, ...modifiers };
}

/**
 * xterm-style modifier parameter: 1 + (shift | alt << 1 | ctrl << 2)
 */
function decodeModifiers(param: number | undefined): KeyModifiers {
  const bits = param && param > 1 ? param - 1 : 0;
  return {
    shift: (bits & 1) !== 0,
    alt: (bits & 2) !== 0,
    ctrl: (bits & 4) !== 0,
  };
}

/**
 * Parse a single non-escape character (or grapheme) into a key
 */
function parseCharacter(char: string, alt = false): KeyEvent {
  const raw = alt ? `\x1b${char}` : char;

  if (char === '\r' || char === '\n' || char === '\r\n') {
    return key('enter', raw, { alt });
  }
  if (char === '\t') {
    return key('tab', raw, { alt });
  }
  if (char === '\x7f' || char === '\b') {
    return key('backspace', raw, { alt });
  }
  if (char === '\x00') {
    return key(' ', raw, { ctrl: true, alt });
  }

  // Ctrl+letter (0x01-0x1a maps to a-z)
  const code = char.charCodeAt(0);
  if (char.length === 1 && code >= 1 && code <= 26) {
    return key(String.fromCharCode(code + 96), raw, { ctrl: true, alt });
  }
  // Ctrl+\ ] ^ _
  if (char.length === 1 && code >= 0x1c && code <= 0x1f) {
    return key(String.fromCharCode(code + 64), raw, { ctrl: true, alt });
  }

  const shift = char !== char.toLowerCase() && char === char.toUpperCase();
  return key(char, raw, { alt, shift });
}

function parseNumbers(params: string): number[] {
  return params.split(';').map(p => (p === '' ? 0 : Number(p.split(':')[0])));
}

function parseMouse(params: string, final: string): MouseEvent | null {
  const [b, col, row] = params.slice(1).split(';').map(Number);
  if ([b, col, row].some(n => n === undefined || Number.isNaN(n))) return null;

  const low = b & 3;
  const modifiers: KeyModifiers = {
    shift: (b & 4) !== 0,
    alt: (b & 8) !== 0,
    ctrl: (b & 16) !== 0,
  };
  const buttons: Array<MouseButton | null> = ['left', 'middle', 'right', null];
  const button = buttons[low];
  const base = { type: 'mouse' as const, x: Math.max(0, col - 1), y: Math.max(0, row - 1), ...modifiers };

  if ((b & 64) !== 0) {
    const kinds = ['scrollUp', 'scrollDown', 'scrollLeft', 'scrollRight'] as const;
    return { ...base, kind: kinds[low], button: null };
  }
  if ((b & 32) !== 0) {
    return button === null ? { ...base, kind: 'moved', button: null } : { ...base, kind: 'drag', button };
  }
  return { ...base, kind: final === 'm' ? 'up' : 'down', button };
}

function parseKitty(params: string, raw: string): KeyEvent {
  const [codeField = '', modifierField = ''] = params.split(';');
  const codepoint = Number(codeField.split(':')[0]);
  const [modifierParam, eventParam] = modifierField.split(':').map(Number);
  const modifiers = decodeModifiers(Number.isNaN(modifierParam) ? undefined : modifierParam);
  const kind = KITTY_EVENT_KINDS[eventParam] ?? 'press';

  const named = KITTY_KEYS[codepoint];
  if (named !== undefined) return key(named, raw, modifiers, kind);
  if (!Number.isInteger(codepoint) || codepoint <= 0) return key('unknown', raw, modifiers, kind);
  return key(String.fromCodePoint(codepoint), raw, modifiers, kind);
}

function parseCsi(raw: string, params: string, final: string, options: ParseOptions): ParsedInput | null {
  // SGR mouse: \x1b[<button;x;y(M|m)
  if (params.startsWith('<') && (final === 'M' || final === 'm')) {
    return parseMouse(params, final);
  }

  if (params.startsWith('?')) {
    if (final === 'u') {
      return { type: 'reply', reply: 'keyboardFlags', flags: Number(params.slice(1)) || 0 };
    }
    if (final === 'c') {
      return { type: 'reply', reply: 'deviceAttributes' };
    }
    return null;
  }

  if (params === '' && final === 'I') return { type: 'focus', focused: true };
  if (params === '' && final === 'O') return { type: 'focus', focused: false };

  if (final === 'u') return parseKitty(params, raw);

  const numbers = parseNumbers(params);

  if (final === 'R' && options.expectCursorReply && numbers.length === 2) {
    return { type: 'reply', reply: 'cursorPosition', x: Math.max(0, numbers[1] - 1), y: Math.max(0, numbers[0] - 1) };
  }

  if (final === 'Z') {
    return key('backtab', raw, { shift: true });
  }

  if (final === '~') {
    const named = CSI_TILDE_KEYS[numbers[0]];
    return key(named ?? 'unknown', raw, decodeModifiers(numbers[1]));
  }

  const letter = CSI_LETTER_KEYS[final];
  if (letter !== undefined) {
    return key(letter, raw, decodeModifiers(numbers[1]));
  }

  return key('unknown', raw);
}

export interface InputChunk {
  parsed: ParsedInput[];
  /**
   * Unconsumed tail: an escape sequence or bracketed paste that may still
   * be completed by the next chunk ('' when everything was parsed)
   */
  rest: string;
}

// A CSI introducer with parameters but no final byte yet
// eslint-disable-next-line no-control-regex
const PARTIAL_CSI_PATTERN = /^\x1b\[[0-9;:<=>?]*[ -/]*$/;

/**
 * Parse one chunk read from the terminal. A sequence cut off at the end of
 * the chunk is left in `rest` for the caller to prepend to the next one;
 * when no more input is coming, pass the rest to parseInput() instead.
 */
export function parseInputChunk(data: string, options: ParseOptions = {}): InputChunk {
  return parse(data, options, false);
}

/**
 * Parse raw input into events. One chunk may hold several events (fast
 * typing, mouse motion bursts), so everything is returned in order. The
 * input is taken as complete: a trailing ESC is the escape key.
 */
export function parseInput(data: string, options: ParseOptions = {}): ParsedInput[] {
  return parse(data, options, true).parsed;
}

function parse(data: string, options: ParseOptions, final: boolean): InputChunk {
  const out: ParsedInput[] = [];
  let i = 0;

  while (i < data.length) {
    if (data[i] !== '\x1b') {
      const next = data.indexOf('\x1b', i);
      const end = next === -1 ? data.length : next;
      for (const glyph of graphemes(data.slice(i, end))) {
        out.push(parseCharacter(glyph));
      }
      i = end;
      continue;
    }

    const rest = data.slice(i);

    // Bracketed paste mode: terminal wraps pastes in \x1b[200~ ... \x1b[201~
    if (rest.startsWith(PASTE_START)) {
      const close = rest.indexOf(PASTE_END, PASTE_START.length);
      if (close === -1 && !final) return { parsed: out, rest };
      const stop = close === -1 ? rest.length : close;
      out.push({ type: 'paste', text: rest.slice(PASTE_START.length, stop) });
      i += close === -1 ? rest.length : close + PASTE_END.length;
      continue;
    }

    const csi = CSI_PATTERN.exec(rest);
    if (csi) {
      const parsed = parseCsi(csi[0], csi[1], csi[3], options);
      if (parsed) out.push(parsed);
      i += csi[0].length;
      continue;
    }

    const incomplete = rest === '\x1b' || rest === '\x1bO' || PARTIAL_CSI_PATTERN.test(rest);
    if (incomplete && !final) return { parsed: out, rest };

    // SS3 sequences: \x1bOP (F1), \x1bOA (up), ...
    if (rest.length >= 3 && rest[1] === 'O') {
      const named = CSI_LETTER_KEYS[rest[2]];
      out.push(key(named ?? 'unknown', rest.slice(0, 3)));
      i += 3;
      continue;
    }

    // Alt+key (ESC followed by character)
    if (rest.length >= 2) {
      const [glyph] = graphemes(rest.slice(1));
      out.push(parseCharacter(glyph, true));
      i += 1 + glyph.length;
      continue;
    }

    out.push(key('escape', '\x1b'));
    i++;
  }

  return { parsed: out, rest: '' };
}
