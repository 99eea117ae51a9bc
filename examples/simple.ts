/**
 * Minimal full-screen program: a few styled lines, quit with Enter
 */

import chalk from 'chalk';
import { render, runApp, vec2, type Scene, type Window } from '../src/index.js';

class HelloScene implements Scene {
  async run(window: Window): Promise<Scene | null> {
    for (;;) {
      await window.update(200);

      render(window, vec2(0, 0), 'Hello World!');
      render(window, vec2(0, 1), chalk.red('Press `Enter` to exit!'));
      render(window, vec2(0, 2), chalk.red('Render '), chalk.yellow('Multiple '), 'Elements ', 'In one go!');

      const mouse = window.mousePos();
      render(window, vec2(0, 4), chalk.dim(`Mouse at ${mouse.x},${mouse.y}`));

      if (window.hasEvent(e => e.type === 'key' && e.code === 'enter')) {
        return null;
      }
    }
  }
}

await runApp(new HelloScene());
