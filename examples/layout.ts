/**
 * Header / sidebar / main / footer grid built from layout constraints
 */

import chalk from 'chalk';
import {
  Border,
  Layout,
  LayoutError,
  addVec2,
  fixed,
  flexible,
  render,
  runApp,
  vec2,
  type Scene,
  type Window,
} from '../src/index.js';

const layout = new Layout()
  .row(fixed(3), [flexible()])
  .row(flexible(), [fixed(20), flexible()])
  .row(fixed(3), [flexible()]);

class LayoutScene implements Scene {
  async run(window: Window): Promise<Scene | null> {
    for (;;) {
      await window.update(200);

      try {
        this.draw(window);
      } catch (error) {
        if (!(error instanceof LayoutError)) throw error;
        render(window, vec2(0, 0), chalk.red(`Layout error: ${error.kind}`));
      }

      if (window.hasEvent(e => e.type === 'key' && e.code === 'enter')) {
        return null;
      }
    }
  }

  private draw(window: Window): void {
    const rects = layout.compute(window.size());
    const header = rects.get(0, 0);
    const sidebar = rects.get(1, 0);
    const main = rects.get(1, 1);
    const footer = rects.get(2, 0);
    if (!header || !sidebar || !main || !footer) return;

    const headerInner = render(
      window,
      header.position(),
      new Border(header.width, header.height, { style: 'double', title: chalk.yellow.bgBlue(' Application Header ') }),
    );
    render(window, headerInner, chalk.white.bold('A multi-column layout example'));

    const sidebarInner = render(
      window,
      sidebar.position(),
      new Border(sidebar.width, sidebar.height, { style: 'rounded', title: chalk.magenta('Nav') }),
    );
    render(window, sidebarInner, chalk.bold('Home'));
    render(window, addVec2(sidebarInner, vec2(0, 1)), 'Settings');
    render(window, addVec2(sidebarInner, vec2(0, 2)), 'Help');

    const mainInner = render(
      window,
      main.position(),
      new Border(main.width, main.height, { title: chalk.green('Main Content Panel') }),
    );
    render(window, mainInner, 'This area is the main view.\nIt takes up all flexible space.');

    const footerInner = render(
      window,
      footer.position(),
      new Border(footer.width, footer.height, { style: 'heavy', title: chalk.cyan('Status') }),
    );
    render(window, addVec2(footerInner, vec2(1, 0)), chalk.red("Press 'Enter' to exit."));
  }
}

await runApp(new LayoutScene());
