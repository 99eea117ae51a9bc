import { describe, it, expect, afterEach } from 'vitest';
import { MemoryTerminal } from '../testing/MemoryTerminal.js';
import { restoreActiveWindows } from '../window/guard.js';
import type { Window } from '../window/Window.js';
import { runApp, withWindow, type Scene } from './index.js';

describe('withWindow', () => {
  afterEach(() => {
    restoreActiveWindows();
  });

  it('should hand back the result and restore the window', async () => {
    const terminal = new MemoryTerminal();
    const seen: Window[] = [];

    const result = await withWindow({ terminal, synchronizedOutput: 'never' }, window => {
      seen.push(window);
      return 42;
    });

    expect(result).toBe(42);
    expect(seen.map(window => window.state)).toEqual(['restored']);
    expect(terminal.rawModeChanges).toEqual([true, false]);
  });

  it('should restore the window when the callback throws', async () => {
    const terminal = new MemoryTerminal();

    await expect(
      withWindow({ terminal }, async () => {
        throw new Error('scene failed');
      }),
    ).rejects.toThrow('scene failed');

    expect(terminal.rawMode).toBe(false);
  });
});

describe('runApp', () => {
  it('should run scenes until one returns null', async () => {
    const terminal = new MemoryTerminal();
    const visited: string[] = [];

    const second: Scene = {
      async run(window) {
        visited.push('second');
        await window.update(0);
        return null;
      },
    };
    const first: Scene = {
      run() {
        visited.push('first');
        return second;
      },
    };

    await runApp(first, { terminal, panicHook: false, synchronizedOutput: 'never' });

    expect(visited).toEqual(['first', 'second']);
    expect(terminal.rawModeChanges).toEqual([true, false]);
  });
});
