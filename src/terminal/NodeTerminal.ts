/**
 * Terminal driver over process.stdin/stdout
 *
 * Input arrives through the stdin 'data' listener and is parsed into a
 * queue; output is buffered until flush() so a whole frame goes out in one
 * write. A sequence split across reads is held until the rest arrives, or
 * until escapeTimeoutMs passes (a lone ESC then becomes the escape key).
 */

import { writeSync } from 'fs';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { vec2, type Vec2 } from '../math.js';
import { keyboard, queries } from '../renderer/ansi.js';
import { logger } from '../utils/logger.js';
import { parseInput, parseInputChunk, type ParsedInput, type QueryReply } from './parseInput.js';
import type { TerminalDriver, TerminalEvent } from './types.js';

/** The parts of process.stdin the driver uses */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  removeListener(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
  ref?(): unknown;
  unref?(): unknown;
}

/** The parts of process.stdout the driver uses */
export interface TerminalOutput {
  columns?: number;
  rows?: number;
  write(data: string, callback: (error?: Error | null) => void): unknown;
  on(event: 'resize', listener: () => void): unknown;
  removeListener(event: 'resize', listener: () => void): unknown;
}

export interface NodeTerminalOptions {
  input?: TerminalInput;
  output?: TerminalOutput;
  /** File descriptor behind output, for synchronous flushes */
  outputFd?: number;
  /** How long device queries wait for a reply */
  queryTimeoutMs?: number;
  /** How long an incomplete escape sequence waits for the rest of it */
  escapeTimeoutMs?: number;
}

type ReplyHandler = (reply: QueryReply) => void;

export class NodeTerminal implements TerminalDriver {
  private readonly input: TerminalInput;
  private readonly output: TerminalOutput;
  private readonly outputFd: number;
  private readonly queryTimeoutMs: number;
  private readonly escapeTimeoutMs: number;

  private readonly events: TerminalEvent[] = [];
  private readonly waiters = new Set<() => void>();
  private pendingOutput = '';
  private pendingInput = '';
  private escapeTimer: NodeJS.Timeout | null = null;
  private listening = false;
  private replyHandler: ReplyHandler | null = null;
  private expectCursorReply = false;

  constructor(options: NodeTerminalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.outputFd = options.outputFd ?? 1;
    this.queryTimeoutMs = options.queryTimeoutMs ?? 200;
    this.escapeTimeoutMs = options.escapeTimeoutMs ?? 50;
  }

  size(): Vec2 {
    return vec2(this.output.columns || 80, this.output.rows || 24);
  }

  write(data: string): void {
    this.pendingOutput += data;
  }

  flush(): Promise<void> {
    const data = this.takeOutput();
    if (!data) return Promise.resolve();

    return new Promise((resolve, reject) => {
      this.output.write(data, error => (error ? reject(error) : resolve()));
    });
  }

  flushSync(): void {
    const data = this.takeOutput();
    if (data) writeSync(this.outputFd, data);
  }

  enableRawMode(): void {
    if (this.input.isTTY) {
      this.input.setRawMode?.(true);
    }
    this.startListening();
  }

  disableRawMode(): void {
    this.stopListening();
    if (this.input.isTTY) {
      this.input.setRawMode?.(false);
    }
  }

  async poll(timeoutMs: number): Promise<boolean> {
    if (this.events.length > 0) return true;

    if (timeoutMs <= 0) {
      // Let already-buffered stdin data reach the listener
      await yieldToEventLoop();
      return this.events.length > 0;
    }

    return new Promise(resolve => {
      const wake = () => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(wake);
        resolve(this.events.length > 0);
      }, timeoutMs);
      this.waiters.add(wake);
    });
  }

  read(): TerminalEvent | undefined {
    return this.events.shift();
  }

  async queryCursorPosition(): Promise<Vec2> {
    const position = await this.request(
      queries.cursorPosition,
      reply => (reply.reply === 'cursorPosition' ? vec2(reply.x, reply.y) : undefined),
      true,
    );
    if (!position) {
      throw new Error('Terminal did not report the cursor position');
    }
    return position;
  }

  /**
   * Ask for the kitty keyboard flags together with the primary device
   * attributes. Every terminal answers the latter, so a DA reply arriving
   * first means the protocol is not supported.
   */
  async queryKeyboardEnhancement(): Promise<boolean> {
    const supported = await this.request(
      keyboard.queryFlags + queries.primaryDeviceAttributes,
      reply => {
        if (reply.reply === 'keyboardFlags') return true;
        if (reply.reply === 'deviceAttributes') return false;
        return undefined;
      },
      false,
    );
    return supported ?? false;
  }

  private takeOutput(): string {
    const data = this.pendingOutput;
    this.pendingOutput = '';
    return data;
  }

  private async request<T>(sequence: string, accept: (reply: QueryReply) => T | undefined, cursor: boolean): Promise<T | undefined> {
    this.startListening();

    const answer = new Promise<T | undefined>(resolve => {
      const finish = (value: T | undefined) => {
        clearTimeout(timer);
        this.replyHandler = null;
        this.expectCursorReply = false;
        resolve(value);
      };
      const timer = setTimeout(() => {
        logger.debug('Terminal query timed out', { sequence: JSON.stringify(sequence) });
        finish(undefined);
      }, this.queryTimeoutMs);

      this.expectCursorReply = cursor;
      this.replyHandler = reply => {
        const value = accept(reply);
        if (value !== undefined) finish(value);
      };
    });

    this.write(sequence);
    await this.flush();
    return answer;
  }

  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    this.clearEscapeTimer();

    const { parsed, rest } = parseInputChunk(this.pendingInput + text, { expectCursorReply: this.expectCursorReply });
    this.pendingInput = rest;
    this.dispatch(parsed);

    if (rest) {
      this.escapeTimer = setTimeout(() => {
        this.escapeTimer = null;
        this.flushPendingInput();
      }, this.escapeTimeoutMs);
    }
  };

  /** Parse whatever is held back as complete input */
  private flushPendingInput(): void {
    this.clearEscapeTimer();
    const text = this.pendingInput;
    this.pendingInput = '';
    if (text) this.dispatch(parseInput(text, { expectCursorReply: this.expectCursorReply }));
  }

  private clearEscapeTimer(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }
  }

  private dispatch(items: ParsedInput[]): void {
    for (const item of items) {
      if (item.type === 'reply') {
        this.replyHandler?.(item);
      } else {
        this.push(item);
      }
    }
  }

  private readonly onResize = (): void => {
    const { x, y } = this.size();
    this.push({ type: 'resize', width: x, height: y });
  };

  private push(event: TerminalEvent): void {
    this.events.push(event);
    for (const wake of [...this.waiters]) wake();
  }

  private startListening(): void {
    if (this.listening) return;
    this.listening = true;
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.resume();
    // stdin alone must not keep the process alive
    this.input.unref?.();
    this.output.on('resize', this.onResize);
  }

  private stopListening(): void {
    if (!this.listening) return;
    this.listening = false;
    this.flushPendingInput();
    this.input.removeListener('data', this.onData);
    this.input.pause();
    this.input.ref?.();
    this.output.removeListener('resize', this.onResize);
  }
}
