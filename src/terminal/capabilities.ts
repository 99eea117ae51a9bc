/**
 * Terminal capability detection
 */

import type { SyncOutputMode } from '../config/index.js';

// Terminals known to honour DEC Mode 2026 (Synchronized Output)
const SYNC_TERMINALS = ['ghostty', 'iterm.app', 'iterm2', 'kitty', 'wezterm', 'vscode', 'alacritty', 'contour', 'foot'];

/**
 * Check if terminal supports synchronized output (DEC 2026)
 * Modern terminals: Ghostty, iTerm2 3.5+, Kitty, WezTerm, VSCode 1.80+
 */
export function supportsSynchronizedOutput(env: NodeJS.ProcessEnv = process.env): boolean {
  const program = env.TERM_PROGRAM?.toLowerCase() || '';
  const term = env.TERM?.toLowerCase() || '';

  if (SYNC_TERMINALS.some(t => program.includes(t) || term.includes(t))) {
    return true;
  }

  // Terminals that don't know the mode ignore it, so xterm-compatibles get it too
  return term.includes('xterm') || term.includes('256color');
}

/**
 * Apply the configured mode: 'auto' detects, the others force
 */
export function useSynchronizedOutput(mode: SyncOutputMode, env: NodeJS.ProcessEnv = process.env): boolean {
  if (mode === 'always') return true;
  if (mode === 'never') return false;
  return supportsSynchronizedOutput(env);
}
