import { describe, it, expect, vi, afterEach } from 'vitest';
import { vec2 } from '../math.js';
import { NodeTerminal, type TerminalInput, type TerminalOutput } from './NodeTerminal.js';

const plain = { ctrl: false, alt: false, shift: false };

type DataListener = (chunk: string | Buffer) => void;

class StubInput implements TerminalInput {
  isTTY = false;
  calls: string[] = [];
  private listeners: DataListener[] = [];

  setEncoding(): void {}

  on(_event: 'data', listener: DataListener): void {
    this.listeners.push(listener);
  }

  removeListener(_event: 'data', listener: DataListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  resume(): void {
    this.calls.push('resume');
  }

  pause(): void {
    this.calls.push('pause');
  }

  ref(): void {
    this.calls.push('ref');
  }

  unref(): void {
    this.calls.push('unref');
  }

  emit(chunk: string): void {
    for (const listener of this.listeners) listener(chunk);
  }
}

class StubOutput implements TerminalOutput {
  columns = 40;
  rows = 10;
  written: string[] = [];

  write(data: string, callback: (error?: Error | null) => void): void {
    this.written.push(data);
    callback(null);
  }

  on(): void {}

  removeListener(): void {}
}

function setup() {
  const input = new StubInput();
  const output = new StubOutput();
  const terminal = new NodeTerminal({ input, output, escapeTimeoutMs: 50 });
  return { input, output, terminal };
}

describe('NodeTerminal', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report the output size', () => {
    const { terminal } = setup();
    expect(terminal.size()).toEqual(vec2(40, 10));
  });

  it('should not hold the process open while listening', () => {
    const { input, terminal } = setup();
    terminal.enableRawMode();
    expect(input.calls).toEqual(['resume', 'unref']);
    terminal.disableRawMode();
    expect(input.calls).toEqual(['resume', 'unref', 'pause', 'ref']);
  });

  it('should buffer output until flush', async () => {
    const { output, terminal } = setup();
    terminal.write('ab');
    terminal.write('c');
    expect(output.written).toEqual([]);
    await terminal.flush();
    expect(output.written).toEqual(['abc']);
  });

  it('should join a paste split across reads', () => {
    const { input, terminal } = setup();
    terminal.enableRawMode();
    input.emit('\x1b[200~hel');
    expect(terminal.read()).toBeUndefined();
    input.emit('lo\x1b[201~');
    expect(terminal.read()).toEqual({ type: 'paste', text: 'hello' });
    expect(terminal.read()).toBeUndefined();
  });

  it('should join a mouse report split across reads', () => {
    const { input, terminal } = setup();
    terminal.enableRawMode();
    input.emit('\x1b[<0;3');
    input.emit(';2M');
    expect(terminal.read()).toEqual({ type: 'mouse', kind: 'down', button: 'left', x: 2, y: 1, ...plain });
    expect(terminal.read()).toBeUndefined();
  });

  it('should read a lone ESC as escape once the timeout passes', () => {
    vi.useFakeTimers();
    const { input, terminal } = setup();
    terminal.enableRawMode();
    input.emit('\x1b');
    vi.advanceTimersByTime(49);
    expect(terminal.read()).toBeUndefined();
    vi.advanceTimersByTime(1);
    expect(terminal.read()).toEqual({ type: 'key', code: 'escape', kind: 'press', raw: '\x1b', ...plain });
  });

  it('should read ESC and a following character in the next read as alt', () => {
    vi.useFakeTimers();
    const { input, terminal } = setup();
    terminal.enableRawMode();
    input.emit('\x1b');
    input.emit('x');
    vi.advanceTimersByTime(50);
    expect(terminal.read()).toEqual({ type: 'key', code: 'x', kind: 'press', raw: '\x1bx', ...plain, alt: true });
    expect(terminal.read()).toBeUndefined();
  });

  it('should deliver held-back input when listening stops', () => {
    const { input, terminal } = setup();
    terminal.enableRawMode();
    input.emit('\x1b');
    terminal.disableRawMode();
    expect(terminal.read()).toEqual({ type: 'key', code: 'escape', kind: 'press', raw: '\x1b', ...plain });
  });
});
