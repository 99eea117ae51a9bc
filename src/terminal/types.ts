/**
 * Input events and the capability interface the window drives the
 * terminal through
 */

import type { Vec2 } from '../math.js';

export type KeyEventKind = 'press' | 'repeat' | 'release';

export interface KeyModifiers {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

export interface KeyEvent extends KeyModifiers {
  type: 'key';
  /** Named key ('enter', 'up', 'f5', ...) or the character itself */
  code: string;
  kind: KeyEventKind;
  raw: string;
}

export type MouseButton = 'left' | 'middle' | 'right';

export type MouseEventKind =
  | 'down'
  | 'up'
  | 'drag'
  | 'moved'
  | 'scrollUp'
  | 'scrollDown'
  | 'scrollLeft'
  | 'scrollRight';

export interface MouseEvent extends KeyModifiers {
  type: 'mouse';
  kind: MouseEventKind;
  /** Button involved; null for plain moves, scrolling and unknown releases */
  button: MouseButton | null;
  /** 0-based column */
  x: number;
  /** 0-based row */
  y: number;
}

export interface ResizeEvent {
  type: 'resize';
  width: number;
  height: number;
}

export interface FocusEvent {
  type: 'focus';
  focused: boolean;
}

export interface PasteEvent {
  type: 'paste';
  text: string;
}

export type TerminalEvent = KeyEvent | MouseEvent | ResizeEvent | FocusEvent | PasteEvent;

/**
 * What the window needs from a terminal. The Node implementation talks to
 * process.stdin/stdout; tests use an in-memory stand-in.
 */
export interface TerminalDriver {
  /** Current size in columns and rows */
  size(): Vec2;

  /** Queue output; nothing reaches the terminal until a flush */
  write(data: string): void;

  flush(): Promise<void>;

  /** Flush without waiting; used from exit and crash handlers */
  flushSync(): void;

  enableRawMode(): void;

  disableRawMode(): void;

  /**
   * Resolve true as soon as an event is queued, or false once timeoutMs
   * passes without one. A timeout of 0 only checks what has already
   * arrived.
   */
  poll(timeoutMs: number): Promise<boolean>;

  /** Dequeue the next event without waiting */
  read(): TerminalEvent | undefined;

  /** 0-based cursor position as reported by the terminal */
  queryCursorPosition(): Promise<Vec2>;

  /** Whether the terminal speaks the kitty keyboard protocol */
  queryKeyboardEnhancement(): Promise<boolean>;
}
