/**
 * Session guard: keeps track of every window holding the terminal so that
 * an exiting process always hands it back in a usable state
 */

import { logError, logger } from '../utils/logger.js';

export interface Restorable {
  restore(): void;
}

const activeWindows = new Set<Restorable>();
let exitHookInstalled = false;

const onExit = (): void => {
  if (activeWindows.size > 0) {
    logger.warn('Process exiting with active windows', { count: activeWindows.size });
  }
  restoreActiveWindows();
};

export function registerWindow(window: Restorable): void {
  activeWindows.add(window);
  if (!exitHookInstalled) {
    process.on('exit', onExit);
    exitHookInstalled = true;
  }
}

export function unregisterWindow(window: Restorable): void {
  activeWindows.delete(window);
}

export function activeWindowCount(): number {
  return activeWindows.size;
}

/**
 * Restore every registered window. Failures don't stop the others; they
 * are logged and returned.
 */
export function restoreActiveWindows(): unknown[] {
  const errors: unknown[] = [];
  for (const window of [...activeWindows]) {
    try {
      window.restore();
    } catch (error) {
      errors.push(error);
      logError(error, 'restoreActiveWindows');
    } finally {
      activeWindows.delete(window);
    }
  }
  return errors;
}
