/**
 * Application harness: acquire the terminal, run scenes, always give the
 * terminal back
 */

import { logger } from '../utils/logger.js';
import { installPanicHook } from '../window/panic.js';
import { Window, type WindowOptions } from '../window/Window.js';

/**
 * One screen of an application. Runs until it returns the next scene, or
 * null to quit.
 */
export interface Scene {
  run(window: Window): Promise<Scene | null> | Scene | null;
}

export interface RunAppOptions extends WindowOptions {
  /** Register the process-wide crash handlers (default true) */
  panicHook?: boolean;
}

/**
 * Run fn with an initialized window, restoring it however fn exits
 */
export async function withWindow<T>(options: WindowOptions, fn: (window: Window) => Promise<T> | T): Promise<T> {
  const window = Window.init(options);
  try {
    return await fn(window);
  } finally {
    window.restore();
  }
}

/**
 * Run a chain of scenes in one full-screen window
 */
export async function runApp(scene: Scene, options: RunAppOptions = {}): Promise<void> {
  const { panicHook = true, ...windowOptions } = options;
  if (panicHook) installPanicHook();

  await withWindow(windowOptions, async window => {
    let current: Scene | null = scene;
    let transitions = 0;
    while (current) {
      current = await current.run(window);
      if (current) transitions++;
    }
    logger.debug('Application finished', { transitions });
  });
}
