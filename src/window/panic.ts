/**
 * Process-wide crash handling: put the terminal back before an uncaught
 * error or a termination signal ends the process
 */

import chalk from 'chalk';
import { logError, logger } from '../utils/logger.js';
import { restoreActiveWindows } from './guard.js';

export type CrashOrigin = 'uncaughtException' | 'unhandledRejection';

export type HandledSignal = 'SIGTERM' | 'SIGHUP';

const SIGNAL_NUMBERS: Record<HandledSignal, number> = {
  SIGHUP: 1,
  SIGTERM: 15,
};

export interface PanicHookOptions {
  /** Defaults to process.exit */
  exit?: (code: number) => void;
  /** Where the crash report goes; defaults to stderr */
  report?: (text: string) => void;
  /**
   * Whether the application listens for this crash itself, in which case
   * reporting and exiting are left to it. Defaults to checking for other
   * process listeners.
   */
  handledElsewhere?: (origin: CrashOrigin) => boolean;
}

export interface PanicHook {
  handleCrash(error: unknown, origin: CrashOrigin): void;
  handleSignal(signal: HandledSignal): void;
}

interface Installed {
  hook: PanicHook;
  onException: (error: Error) => void;
  onRejection: (reason: unknown) => void;
  onSignal: (signal: NodeJS.Signals) => void;
}

let installed: Installed | null = null;

function describeCrash(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return `Uncaught: ${String(error)}`;
}

function isHandledSignal(signal: string): signal is HandledSignal {
  return signal === 'SIGTERM' || signal === 'SIGHUP';
}

/**
 * Restore every active window on uncaught errors and on SIGTERM/SIGHUP.
 * Installing again replaces the previous registration.
 */
export function installPanicHook(options: PanicHookOptions = {}): PanicHook {
  uninstallPanicHook();

  const exit = options.exit ?? ((code: number) => process.exit(code));
  const report = options.report ?? ((text: string) => process.stderr.write(text));
  const handledElsewhere = options.handledElsewhere ?? ((origin: CrashOrigin) => process.listenerCount(origin) > 1);

  const hook: PanicHook = {
    handleCrash(error, origin) {
      restoreActiveWindows();
      logError(error, origin);

      if (handledElsewhere(origin)) return;
      report(chalk.red(describeCrash(error)) + '\n');
      exit(1);
    },

    handleSignal(signal) {
      restoreActiveWindows();
      logger.warn('Terminated by signal', { signal });
      exit(128 + SIGNAL_NUMBERS[signal]);
    },
  };

  installed = {
    hook,
    onException: error => hook.handleCrash(error, 'uncaughtException'),
    onRejection: reason => hook.handleCrash(reason, 'unhandledRejection'),
    onSignal: signal => {
      if (isHandledSignal(signal)) hook.handleSignal(signal);
    },
  };

  process.on('uncaughtException', installed.onException);
  process.on('unhandledRejection', installed.onRejection);
  process.on('SIGTERM', installed.onSignal);
  process.on('SIGHUP', installed.onSignal);

  return hook;
}

export function uninstallPanicHook(): void {
  if (!installed) return;
  process.removeListener('uncaughtException', installed.onException);
  process.removeListener('unhandledRejection', installed.onRejection);
  process.removeListener('SIGTERM', installed.onSignal);
  process.removeListener('SIGHUP', installed.onSignal);
  installed = null;
}

export function isPanicHookInstalled(): boolean {
  return installed !== null;
}
