/**
 * In-process terminal driver for tests: records everything written and
 * lets the test feed input, resizes and query answers
 */

import { toVec2, vec2, type Vec2, type Vec2Like } from '../math.js';
import { isTerminalEvent, parseInput } from '../terminal/parseInput.js';
import type { TerminalDriver, TerminalEvent } from '../terminal/types.js';

export interface MemoryTerminalOptions {
  size?: Vec2Like;
  /** Reported by queryCursorPosition() */
  cursorPosition?: Vec2Like;
  /** Reported by queryKeyboardEnhancement() */
  keyboardEnhancement?: boolean;
}

export type MemoryTerminalQuery = 'cursorPosition' | 'keyboardEnhancement';

export class MemoryTerminal implements TerminalDriver {
  /** Everything flushed so far */
  output = '';
  flushCount = 0;
  rawMode = false;
  readonly rawModeChanges: boolean[] = [];
  readonly queries: MemoryTerminalQuery[] = [];
  cursorPosition: Vec2;
  keyboardEnhancement: boolean;

  private currentSize: Vec2;
  private pendingOutput = '';
  private readonly events: TerminalEvent[] = [];

  constructor(options: MemoryTerminalOptions = {}) {
    this.currentSize = toVec2(options.size ?? [80, 24]);
    this.cursorPosition = toVec2(options.cursorPosition ?? [0, 0]);
    this.keyboardEnhancement = options.keyboardEnhancement ?? false;
  }

  size(): Vec2 {
    return vec2(this.currentSize.x, this.currentSize.y);
  }

  write(data: string): void {
    this.pendingOutput += data;
  }

  async flush(): Promise<void> {
    this.flushSync();
  }

  flushSync(): void {
    this.output += this.pendingOutput;
    this.pendingOutput = '';
    this.flushCount++;
  }

  enableRawMode(): void {
    this.rawMode = true;
    this.rawModeChanges.push(true);
  }

  disableRawMode(): void {
    this.rawMode = false;
    this.rawModeChanges.push(false);
  }

  /**
   * Never waits: tests queue input before calling update()
   */
  async poll(_timeoutMs: number): Promise<boolean> {
    return this.events.length > 0;
  }

  read(): TerminalEvent | undefined {
    return this.events.shift();
  }

  async queryCursorPosition(): Promise<Vec2> {
    this.queries.push('cursorPosition');
    return vec2(this.cursorPosition.x, this.cursorPosition.y);
  }

  async queryKeyboardEnhancement(): Promise<boolean> {
    this.queries.push('keyboardEnhancement');
    return this.keyboardEnhancement;
  }

  pushEvent(...events: TerminalEvent[]): void {
    this.events.push(...events);
  }

  /**
   * Queue the events a raw input chunk parses into
   */
  pushInput(data: string): void {
    this.events.push(...parseInput(data).filter(isTerminalEvent));
  }

  /**
   * Change the size and queue the matching resize event
   */
  resize(width: number, height: number): void {
    this.currentSize = vec2(width, height);
    this.events.push({ type: 'resize', width, height });
  }

  /**
   * Return and forget what has been flushed so far
   */
  takeOutput(): string {
    const output = this.output;
    this.output = '';
    return output;
  }

  pendingEvents(): number {
    return this.events.length;
  }
}
