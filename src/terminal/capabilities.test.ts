import { describe, it, expect } from 'vitest';
import { supportsSynchronizedOutput, useSynchronizedOutput } from './capabilities.js';

describe('supportsSynchronizedOutput', () => {
  it('should detect known terminals by program name', () => {
    expect(supportsSynchronizedOutput({ TERM_PROGRAM: 'WezTerm' })).toBe(true);
    expect(supportsSynchronizedOutput({ TERM_PROGRAM: 'iTerm.app', TERM: 'dumb' })).toBe(true);
  });

  it('should detect known terminals by TERM', () => {
    expect(supportsSynchronizedOutput({ TERM: 'xterm-kitty' })).toBe(true);
  });

  it('should accept xterm-compatible terminals', () => {
    expect(supportsSynchronizedOutput({ TERM: 'screen-256color' })).toBe(true);
  });

  it('should reject unknown terminals', () => {
    expect(supportsSynchronizedOutput({ TERM: 'linux' })).toBe(false);
    expect(supportsSynchronizedOutput({})).toBe(false);
  });
});

describe('useSynchronizedOutput', () => {
  it('should force the mode unless set to auto', () => {
    expect(useSynchronizedOutput('always', {})).toBe(true);
    expect(useSynchronizedOutput('never', { TERM_PROGRAM: 'kitty' })).toBe(false);
    expect(useSynchronizedOutput('auto', { TERM_PROGRAM: 'kitty' })).toBe(true);
    expect(useSynchronizedOutput('auto', { TERM: 'vt100' })).toBe(false);
  });
});
