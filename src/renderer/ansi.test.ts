import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { cursor, keyboard, parseStyled, stripAnsi, styled, style } from './ansi.js';

const chalk = new Chalk({ level: 1 });

describe('ansi', () => {
  describe('cursor', () => {
    it('should convert 0-based positions to 1-based CUP', () => {
      expect(cursor.moveTo(0, 0)).toBe('\x1b[1;1H');
      expect(cursor.moveTo(9, 4)).toBe('\x1b[5;10H');
    });

    it('should encode cursor shapes with DECSCUSR', () => {
      expect(cursor.shape('default')).toBe('\x1b[0 q');
      expect(cursor.shape('steadyBar')).toBe('\x1b[6 q');
    });
  });

  it('should push every kitty keyboard flag', () => {
    expect(keyboard.push(keyboard.allFlags)).toBe('\x1b[>31u');
  });

  describe('stripAnsi', () => {
    it('should remove SGR and cursor sequences', () => {
      expect(stripAnsi('\x1b[31mred\x1b[0m \x1b[2;3Hmoved')).toBe('red moved');
    });

    it('should strip what styled() adds', () => {
      expect(stripAnsi(styled('x', style.bold, style.underline))).toBe('x');
    });
  });

  describe('parseStyled', () => {
    it('should split text into runs by style', () => {
      expect(parseStyled('a\x1b[31mb\x1b[0mc')).toEqual([
        { text: 'a', style: '' },
        { text: 'b', style: '\x1b[31m' },
        { text: 'c', style: '' },
      ]);
    });

    it('should merge adjacent runs with the same style', () => {
      expect(parseStyled('\x1b[1mab\x1b[1mcd')).toEqual([{ text: 'abcd', style: '\x1b[1m' }]);
    });

    it('should apply attribute resets', () => {
      expect(parseStyled(chalk.bold('a') + 'b')).toEqual([
        { text: 'a', style: '\x1b[1m' },
        { text: 'b', style: '' },
      ]);
    });

    it('should keep 256-colour and RGB parameters together', () => {
      expect(parseStyled('\x1b[38;5;196mx')).toEqual([{ text: 'x', style: '\x1b[38;5;196m' }]);
      expect(parseStyled('\x1b[48;2;1;2;3mx')).toEqual([{ text: 'x', style: '\x1b[48;2;1;2;3m' }]);
    });

    it('should prefix the base style', () => {
      expect(parseStyled('a\x1b[4mb', '\x1b[7m')).toEqual([
        { text: 'a', style: '\x1b[7m' },
        { text: 'b', style: '\x1b[7m\x1b[4m' },
      ]);
    });

    it('should drop non-SGR sequences', () => {
      expect(parseStyled('a\x1b[2Kb')).toEqual([{ text: 'ab', style: '' }]);
    });
  });
});
