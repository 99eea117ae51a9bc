/**
 * Window - owns the terminal session and the two frame buffers
 *
 * Each update() paints the difference between the previous frame and the
 * one the application just drew, swaps buffers, syncs the cursor, flushes,
 * then collects input for the next frame.
 */

import { resolveSettings, type Settings } from '../config/index.js';
import { Rect } from '../layout/Rect.js';
import { equalsVec2, toVec2, vec2, type Vec2, type Vec2Like } from '../math.js';
import { cursor, keyboard, reporting, screen, style as sgr, type CursorShape } from '../renderer/ansi.js';
import { Buffer, type DiffEntry } from '../renderer/Buffer.js';
import type { BufferTarget } from '../renderer/render.js';
import { useSynchronizedOutput } from '../terminal/capabilities.js';
import { NodeTerminal } from '../terminal/NodeTerminal.js';
import type { TerminalDriver, TerminalEvent } from '../terminal/types.js';
import { logger } from '../utils/logger.js';
import { UnsupportedFeatureError, WindowStateError } from './errors.js';
import { registerWindow, unregisterWindow } from './guard.js';

export type WindowState = 'uninitialized' | 'active' | 'restored';

export type WindowMode = 'fullscreen' | 'inline';

export interface WindowOptions extends Partial<Omit<Settings, 'logLevel' | 'logDir'>> {
  /** Driver to talk through; defaults to process.stdin/stdout */
  terminal?: TerminalDriver;
  /** Render into a band of this many rows below the prompt instead of the alternate screen */
  inlineHeight?: number;
  /** Inline only: push kitty keyboard flags when the region activates */
  keyboardEnhancement?: boolean;
}

export interface FrameStats {
  /** Glyphs printed by the last render */
  cellsWritten: number;
  fullRepaint: boolean;
}

interface CursorState {
  visible: boolean;
  pos: Vec2;
  shape: CursorShape;
}

interface InlineRegion {
  height: number;
  /** Terminal row just below the region; null until the first render */
  start: number | null;
}

export class Window implements BufferTarget {
  private readonly terminal: TerminalDriver;
  private readonly settings: Settings;
  private readonly syncOutput: boolean;
  private readonly inline: InlineRegion | null;
  private readonly wantKeyboard: boolean;

  private buffers: [Buffer, Buffer];
  private activeIndex = 0;
  private currentState: WindowState = 'uninitialized';
  private needsFullRepaint = true;
  private keyboardPushed = false;
  private keyboardRequested = false;
  private shapeSent = false;
  private frame: FrameStats = { cellsWritten: 0, fullRepaint: false };

  private cursorState: CursorState = { visible: false, pos: vec2(0, 0), shape: 'steadyBlock' };
  private lastCursor: CursorState = { visible: false, pos: vec2(0, 0), shape: 'steadyBlock' };

  private frameEvents: TerminalEvent[] = [];
  private mouse = vec2(0, 0);

  constructor(options: WindowOptions = {}) {
    this.settings = resolveSettings(options);
    this.terminal = options.terminal ?? new NodeTerminal({ queryTimeoutMs: this.settings.queryTimeoutMs });
    this.syncOutput = useSynchronizedOutput(this.settings.synchronizedOutput);
    this.wantKeyboard = options.keyboardEnhancement ?? false;

    const termSize = this.terminal.size();
    if (options.inlineHeight !== undefined) {
      const height = Math.max(1, Math.floor(options.inlineHeight));
      this.inline = { height, start: null };
      this.buffers = [new Buffer([termSize.x, height]), new Buffer([termSize.x, height])];
    } else {
      this.inline = null;
      this.buffers = [new Buffer(termSize), new Buffer(termSize)];
    }
  }

  /**
   * Create a full-screen window and take over the terminal
   */
  static init(options: WindowOptions = {}): Window {
    return new Window(options).init();
  }

  /**
   * Create an inline window of the given height. The terminal is left
   * untouched until the first frame is rendered.
   */
  static initInline(height: number, options: WindowOptions = {}): Window {
    return new Window({ ...options, inlineHeight: height }).init();
  }

  get state(): WindowState {
    return this.currentState;
  }

  get mode(): WindowMode {
    return this.inline ? 'inline' : 'fullscreen';
  }

  get activeBufferIndex(): number {
    return this.activeIndex;
  }

  get lastFrame(): FrameStats {
    return { ...this.frame };
  }

  /**
   * Enter raw mode and, for full-screen windows, the alternate screen
   */
  init(): this {
    if (this.currentState !== 'uninitialized') {
      throw new WindowStateError(this.currentState, 'initialize');
    }

    if (!this.inline) {
      this.terminal.enableRawMode();
      this.terminal.write(screen.enterAltBuffer + cursor.hide + screen.disableLineWrap + this.reportingOn());
      this.terminal.flushSync();
    }

    this.currentState = 'active';
    registerWindow(this);
    logger.info('Window initialized', { mode: this.mode, size: this.size() });
    return this;
  }

  /**
   * Switch on the kitty keyboard protocol (key release and repeat events)
   *
   * @throws UnsupportedFeatureError when the terminal does not speak it
   */
  async enableKeyboardEnhancement(): Promise<void> {
    this.assertActive('enable keyboard enhancement');

    const supported = await this.terminal.queryKeyboardEnhancement();
    if (!supported) {
      throw new UnsupportedFeatureError('kitty keyboard protocol');
    }
    if (this.keyboardPushed) return;

    // Inline regions push on activation
    if (this.inline && this.inline.start === null) {
      this.keyboardRequested = true;
      return;
    }

    this.terminal.write(keyboard.push(keyboard.allFlags));
    await this.terminal.flush();
    this.keyboardPushed = true;
  }

  /**
   * The buffer the application draws the next frame into
   */
  buffer(): Buffer {
    return this.buffers[this.activeIndex];
  }

  size(): Vec2 {
    return this.buffer().size();
  }

  swapBuffers(): void {
    this.activeIndex = 1 - this.activeIndex;
    this.buffers[this.activeIndex].clear();
  }

  /**
   * Render the frame, flush it, and collect input for the next one
   */
  async update(pollTimeoutMs: number = this.settings.pollTimeoutMs): Promise<void> {
    this.assertActive('update');
    await this.activateInline();

    if (this.syncOutput) this.terminal.write(screen.syncStart);
    await this.render();
    this.swapBuffers();
    this.renderCursor();
    if (this.syncOutput) this.terminal.write(screen.syncEnd);

    await this.terminal.flush();
    await this.handleEvents(pollTimeoutMs);
  }

  /**
   * Queue the changed glyphs of the active buffer. The first frame, and
   * the first after a resize, repaints everything.
   */
  async render(): Promise<void> {
    this.assertActive('render');
    await this.activateInline();

    const current = this.buffers[this.activeIndex];
    const fullRepaint = this.needsFullRepaint;
    const entries = fullRepaint ? allCells(current) : this.buffers[1 - this.activeIndex].diff(current);
    this.needsFullRepaint = false;

    const top = this.regionTop();
    let out = '';
    let activeStyle = '';

    for (const { loc, cell } of entries) {
      out += cursor.moveTo(loc.x, loc.y + top);
      if (cell.style !== activeStyle) {
        out += (activeStyle === '' ? '' : sgr.reset) + cell.style;
        activeStyle = cell.style;
      }
      out += cell.text;
    }
    if (activeStyle !== '') out += sgr.reset;

    this.terminal.write(out);
    this.frame = { cellsWritten: entries.length, fullRepaint };
  }

  /**
   * Sync cursor visibility, position and shape with the terminal. Nothing
   * is sent when they are unchanged, unless the cursor is visible and the
   * frame printed glyphs (which moved the terminal's cursor).
   */
  renderCursor(): void {
    const current = this.cursorState;
    const last = this.lastCursor;
    const changed =
      current.visible !== last.visible ||
      current.shape !== last.shape ||
      !equalsVec2(current.pos, last.pos) ||
      (current.visible && this.frame.cellsWritten > 0);

    if (changed) {
      if (current.visible) {
        this.terminal.write(cursor.moveTo(current.pos.x, current.pos.y + this.regionTop()) + cursor.shape(current.shape) + cursor.show);
        this.shapeSent = true;
      } else {
        this.terminal.write(cursor.hide);
      }
    }

    this.lastCursor = { ...current, pos: { ...current.pos } };
  }

  /**
   * Wait up to timeoutMs for input, then drain everything queued
   */
  async handleEvents(timeoutMs: number): Promise<void> {
    this.frameEvents = [];

    let ready = await this.terminal.poll(timeoutMs);
    while (ready) {
      for (let event = this.terminal.read(); event !== undefined; event = this.terminal.read()) {
        this.ingest(event);
      }
      ready = await this.terminal.poll(0);
    }
  }

  /**
   * Hand the terminal back: leave the alternate screen or the inline
   * region, show the cursor, stop reporting and leave raw mode. Safe to
   * call more than once and from exit handlers. Raw mode is left even when
   * writing the escape sequences fails; that error is rethrown.
   */
  restore(): void {
    if (this.currentState !== 'active') return;
    this.currentState = 'restored';
    unregisterWindow(this);

    let out = this.keyboardPushed ? keyboard.pop : '';
    this.keyboardPushed = false;
    if (this.shapeSent) out += cursor.shape('default');

    if (!this.inline) {
      out += screen.exitAltBuffer + screen.enableLineWrap + cursor.show + this.reportingOff();
    } else if (this.inline.start !== null) {
      // Leave the cursor on the line just below the region
      out += this.reportingOff() + screen.enableLineWrap + cursor.show + cursor.moveTo(0, Math.max(0, this.inline.start - 1)) + '\r\n';
    } else {
      logger.info('Window restored', { mode: this.mode, activated: false });
      return;
    }

    try {
      this.terminal.write(out);
      this.terminal.flushSync();
    } finally {
      this.terminal.disableRawMode();
    }
    logger.info('Window restored', { mode: this.mode });
  }

  events(): readonly TerminalEvent[] {
    return this.frameEvents;
  }

  hasEvent(predicate: (event: TerminalEvent) => boolean): boolean {
    return this.frameEvents.some(predicate);
  }

  /**
   * Add a synthetic event to this frame's batch
   */
  insertEvent(event: TerminalEvent): void {
    this.ingest(event);
  }

  clearEvents(): void {
    this.frameEvents = [];
  }

  mousePos(): Vec2 {
    return vec2(this.mouse.x, this.mouse.y);
  }

  /**
   * Whether the mouse is over the area at loc with the given size
   */
  hover(loc: Vec2Like, size: Vec2Like): boolean {
    return Rect.fromPosSize(toVec2(loc), toVec2(size)).contains(this.mouse);
  }

  cursorVisible(): boolean {
    return this.cursorState.visible;
  }

  setCursorVisible(visible: boolean): void {
    this.cursorState.visible = visible;
  }

  cursor(): Vec2 {
    return vec2(this.cursorState.pos.x, this.cursorState.pos.y);
  }

  /**
   * Place the cursor, clamped to the window
   */
  setCursor(pos: Vec2Like): void {
    const { x, y } = toVec2(pos);
    const size = this.size();
    this.cursorState.pos = vec2(clamp(x, 0, size.x - 1), clamp(y, 0, size.y - 1));
  }

  moveCursor(dx: number, dy: number): void {
    const pos = this.cursorState.pos;
    this.setCursor([pos.x + dx, pos.y + dy]);
  }

  cursorShape(): CursorShape {
    return this.cursorState.shape;
  }

  setCursorShape(shape: CursorShape): void {
    this.cursorState.shape = shape;
  }

  private ingest(event: TerminalEvent): void {
    this.frameEvents.push(event);

    if (event.type === 'mouse') {
      this.mouse = vec2(event.x, event.y);
    } else if (event.type === 'resize' && !this.inline) {
      const size = vec2(event.width, event.height);
      this.buffers = [new Buffer(size), new Buffer(size)];
      this.needsFullRepaint = true;
      this.setCursor(this.cursorState.pos);
      logger.debug('Window resized', { width: event.width, height: event.height });
    }
  }

  /**
   * First render of an inline window: reserve the rows, enter raw mode
   * and find out where the region landed
   */
  private async activateInline(): Promise<void> {
    if (!this.inline || this.inline.start !== null) return;

    // Before raw mode, so each newline also returns the carriage
    this.terminal.write('\n'.repeat(this.inline.height));
    this.terminal.enableRawMode();

    let out = cursor.hide + screen.disableLineWrap + this.reportingOn();
    if (this.keyboardRequested || this.wantKeyboard) {
      if (this.keyboardRequested || (await this.terminal.queryKeyboardEnhancement())) {
        out += keyboard.push(keyboard.allFlags);
        this.keyboardPushed = true;
      } else {
        logger.warn('Kitty keyboard protocol not supported; continuing without it');
      }
      this.keyboardRequested = false;
    }
    this.terminal.write(out);
    await this.terminal.flush();

    const position = await this.terminal.queryCursorPosition();
    this.inline.start = position.y;
    logger.info('Inline region activated', { start: position.y, height: this.inline.height });
  }

  private regionTop(): number {
    if (!this.inline || this.inline.start === null) return 0;
    return Math.max(0, this.inline.start - this.inline.height);
  }

  private reportingOn(): string {
    let out = reporting.enableBracketedPaste;
    if (this.settings.mouseCapture) out += reporting.enableMouse;
    if (this.settings.focusReporting) out += reporting.enableFocus;
    return out;
  }

  private reportingOff(): string {
    let out = reporting.disableBracketedPaste;
    if (this.settings.mouseCapture) out += reporting.disableMouse;
    if (this.settings.focusReporting) out += reporting.disableFocus;
    return out;
  }

  private assertActive(operation: string): void {
    if (this.currentState !== 'active') {
      throw new WindowStateError(this.currentState, operation);
    }
  }
}

/**
 * Every printable cell of a buffer, continuation columns left out
 */
function allCells(buffer: Buffer): DiffEntry[] {
  const { x: width, y: height } = buffer.size();
  const entries: DiffEntry[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const cell = buffer.get([x, y]);
      if (cell && !cell.isContinuation()) entries.push({ loc: vec2(x, y), cell });
    }
  }
  return entries;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}
