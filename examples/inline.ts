/**
 * Inline progress bar: renders in two rows below the prompt and leaves the
 * terminal scrollback alone
 */

import chalk from 'chalk';
import { installPanicHook, render, vec2, Window } from '../src/index.js';

async function progressBar(durationMs: number): Promise<void> {
  const window = Window.initInline(2);
  const started = Date.now();

  try {
    for (;;) {
      await window.update(0);

      const done = (Date.now() - started) / durationMs;
      if (done >= 1) break;

      const width = window.size().x;
      const filled = Math.round(width * done);

      render(window, vec2(0, 0), 'Progress');
      render(window, vec2(0, 1), chalk.green('|'.repeat(filled)), chalk.red('|'.repeat(width - filled)));

      if (window.hasEvent(e => e.type === 'key' && e.ctrl && e.code === 'c')) break;
    }
  } finally {
    window.restore();
  }
}

installPanicHook();
await progressBar(3000);
console.log('Progress bar complete!');
