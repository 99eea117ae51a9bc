import type { WindowState } from './Window.js';

/**
 * The terminal lacks an optional capability the caller asked for
 */
export class UnsupportedFeatureError extends Error {
  constructor(
    public feature: string,
    message = `Terminal does not support ${feature}`,
  ) {
    super(message);
    this.name = 'UnsupportedFeatureError';
  }
}

/**
 * A window was used in a state that does not allow the operation
 */
export class WindowStateError extends Error {
  constructor(
    public state: WindowState,
    public operation: string,
  ) {
    super(`Cannot ${operation}: window is ${state}`);
    this.name = 'WindowStateError';
  }
}
