import { describe, it, expect } from 'vitest';
import { isTerminalEvent, parseInput, parseInputChunk } from './parseInput.js';

const plain = { ctrl: false, alt: false, shift: false };

describe('parseInput', () => {
  describe('characters', () => {
    it('should parse printable characters one key each', () => {
      expect(parseInput('ab')).toEqual([
        { type: 'key', code: 'a', kind: 'press', raw: 'a', ...plain },
        { type: 'key', code: 'b', kind: 'press', raw: 'b', ...plain },
      ]);
    });

    it('should mark uppercase letters as shifted', () => {
      expect(parseInput('A')).toEqual([{ type: 'key', code: 'A', kind: 'press', raw: 'A', ...plain, shift: true }]);
    });

    it('should keep a wide grapheme together', () => {
      expect(parseInput('中')).toEqual([{ type: 'key', code: '中', kind: 'press', raw: '中', ...plain }]);
    });

    it('should name enter, tab and backspace', () => {
      expect(parseInput('\r\t\x7f').map(e => (e.type === 'key' ? e.code : e.type))).toEqual([
        'enter',
        'tab',
        'backspace',
      ]);
    });

    it('should map control characters to ctrl+letter', () => {
      expect(parseInput('\x03')).toEqual([{ type: 'key', code: 'c', kind: 'press', raw: '\x03', ...plain, ctrl: true }]);
    });

    it('should read ESC followed by a character as alt', () => {
      expect(parseInput('\x1bx')).toEqual([{ type: 'key', code: 'x', kind: 'press', raw: '\x1bx', ...plain, alt: true }]);
    });

    it('should read a lone ESC as escape', () => {
      expect(parseInput('\x1b')).toEqual([{ type: 'key', code: 'escape', kind: 'press', raw: '\x1b', ...plain }]);
    });
  });

  describe('escape sequences', () => {
    it('should parse arrow keys and modifiers', () => {
      expect(parseInput('\x1b[A')).toEqual([{ type: 'key', code: 'up', kind: 'press', raw: '\x1b[A', ...plain }]);
      expect(parseInput('\x1b[1;5C')).toEqual([
        { type: 'key', code: 'right', kind: 'press', raw: '\x1b[1;5C', ...plain, ctrl: true },
      ]);
    });

    it('should parse SS3 keys', () => {
      expect(parseInput('\x1bOP')).toEqual([{ type: 'key', code: 'f1', kind: 'press', raw: '\x1bOP', ...plain }]);
    });

    it('should parse tilde keys', () => {
      const codes = parseInput('\x1b[3~\x1b[5~\x1b[15~\x1b[24~').map(e => (e.type === 'key' ? e.code : e.type));
      expect(codes).toEqual(['delete', 'pageup', 'f5', 'f12']);
    });

    it('should parse shift+tab as backtab', () => {
      expect(parseInput('\x1b[Z')).toEqual([
        { type: 'key', code: 'backtab', kind: 'press', raw: '\x1b[Z', ...plain, shift: true },
      ]);
    });

    it('should report unrecognised sequences as unknown keys', () => {
      expect(parseInput('\x1b[99~')).toEqual([{ type: 'key', code: 'unknown', kind: 'press', raw: '\x1b[99~', ...plain }]);
    });

    it('should keep parsing after a sequence', () => {
      const codes = parseInput('a\x1b[Bb').map(e => (e.type === 'key' ? e.code : e.type));
      expect(codes).toEqual(['a', 'down', 'b']);
    });
  });

  describe('kitty keyboard protocol', () => {
    it('should parse press, repeat and release', () => {
      expect(parseInput('\x1b[97u')).toEqual([{ type: 'key', code: 'a', kind: 'press', raw: '\x1b[97u', ...plain }]);
      expect(parseInput('\x1b[97;1:2u')).toEqual([
        { type: 'key', code: 'a', kind: 'repeat', raw: '\x1b[97;1:2u', ...plain },
      ]);
      expect(parseInput('\x1b[97;5:3u')).toEqual([
        { type: 'key', code: 'a', kind: 'release', raw: '\x1b[97;5:3u', ...plain, ctrl: true },
      ]);
    });

    it('should name functional keys', () => {
      expect(parseInput('\x1b[13u\x1b[27u').map(e => (e.type === 'key' ? e.code : e.type))).toEqual(['enter', 'escape']);
    });
  });

  describe('mouse', () => {
    it('should parse SGR presses and releases at 0-based positions', () => {
      expect(parseInput('\x1b[<0;5;3M\x1b[<0;5;3m')).toEqual([
        { type: 'mouse', kind: 'down', button: 'left', x: 4, y: 2, ...plain },
        { type: 'mouse', kind: 'up', button: 'left', x: 4, y: 2, ...plain },
      ]);
    });

    it('should parse drags, moves and scrolling', () => {
      const [drag, moved, scroll] = parseInput('\x1b[<34;2;2M\x1b[<35;11;6M\x1b[<65;1;1M');
      expect(drag).toEqual({ type: 'mouse', kind: 'drag', button: 'right', x: 1, y: 1, ...plain });
      expect(moved).toEqual({ type: 'mouse', kind: 'moved', button: null, x: 10, y: 5, ...plain });
      expect(scroll).toEqual({ type: 'mouse', kind: 'scrollDown', button: null, x: 0, y: 0, ...plain });
    });

    it('should decode modifier bits', () => {
      expect(parseInput('\x1b[<16;1;1M')).toEqual([
        { type: 'mouse', kind: 'down', button: 'left', x: 0, y: 0, ...plain, ctrl: true },
      ]);
    });
  });

  describe('focus and paste', () => {
    it('should parse focus changes', () => {
      expect(parseInput('\x1b[I\x1b[O')).toEqual([
        { type: 'focus', focused: true },
        { type: 'focus', focused: false },
      ]);
    });

    it('should keep pasted text as one event', () => {
      expect(parseInput('\x1b[200~hi\x1b[Athere\x1b[201~q')).toEqual([
        { type: 'paste', text: 'hi\x1b[Athere' },
        { type: 'key', code: 'q', kind: 'press', raw: 'q', ...plain },
      ]);
    });

    it('should take an unterminated paste to the end of the chunk', () => {
      expect(parseInput('\x1b[200~abc')).toEqual([{ type: 'paste', text: 'abc' }]);
    });
  });

  describe('query replies', () => {
    it('should read a cursor report only when one is expected', () => {
      expect(parseInput('\x1b[5;10R', { expectCursorReply: true })).toEqual([
        { type: 'reply', reply: 'cursorPosition', x: 9, y: 4 },
      ]);
      expect(parseInput('\x1b[5;10R')).toEqual([
        { type: 'key', code: 'f3', kind: 'press', raw: '\x1b[5;10R', ...plain, shift: true },
      ]);
    });

    it('should read keyboard flags and device attributes', () => {
      expect(parseInput('\x1b[?31u\x1b[?62;22c')).toEqual([
        { type: 'reply', reply: 'keyboardFlags', flags: 31 },
        { type: 'reply', reply: 'deviceAttributes' },
      ]);
    });

    it('should tell events from replies', () => {
      const parsed = parseInput('a\x1b[?0u');
      expect(parsed.filter(isTerminalEvent)).toHaveLength(1);
    });
  });

  describe('parseInputChunk', () => {
    it('should hold back a mouse report cut off mid-sequence', () => {
      const first = parseInputChunk('a\x1b[<0;10');
      expect(first).toEqual({ parsed: [{ type: 'key', code: 'a', kind: 'press', raw: 'a', ...plain }], rest: '\x1b[<0;10' });

      expect(parseInputChunk(first.rest + ';5M')).toEqual({
        parsed: [{ type: 'mouse', kind: 'down', button: 'left', x: 9, y: 4, ...plain }],
        rest: '',
      });
    });

    it('should hold back a paste until its end marker arrives', () => {
      const first = parseInputChunk('\x1b[200~hello\n');
      expect(first).toEqual({ parsed: [], rest: '\x1b[200~hello\n' });

      expect(parseInputChunk(first.rest + 'world\x1b[201~')).toEqual({
        parsed: [{ type: 'paste', text: 'hello\nworld' }],
        rest: '',
      });
    });

    it('should hold back a trailing ESC and SS3 introducer', () => {
      expect(parseInputChunk('x\x1b').rest).toBe('\x1b');
      expect(parseInputChunk('\x1bO')).toEqual({ parsed: [], rest: '\x1bO' });
    });

    it('should consume complete input entirely', () => {
      expect(parseInputChunk('\x1b[A\x1bx')).toEqual({
        parsed: [
          { type: 'key', code: 'up', kind: 'press', raw: '\x1b[A', ...plain },
          { type: 'key', code: 'x', kind: 'press', raw: '\x1bx', ...plain, alt: true },
        ],
        rest: '',
      });
    });
  });
});
