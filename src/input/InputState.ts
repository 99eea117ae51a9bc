/**
 * Folds a frame's events into held/pressed/released queries
 */

import type { KeyModifiers, MouseButton, TerminalEvent } from '../terminal/types.js';

interface KeyEntry extends KeyModifiers {
  code: string;
}

export interface InputStateOptions {
  /**
   * The terminal reports key releases (kitty keyboard protocol). Without
   * them a held key only lasts for the frame it was reported in.
   */
  releaseEvents?: boolean;
}

function matches(entry: KeyEntry, code: string, modifiers?: Partial<KeyModifiers>): boolean {
  if (entry.code !== code) return false;
  if (!modifiers) return true;
  return (
    (modifiers.ctrl === undefined || modifiers.ctrl === entry.ctrl) &&
    (modifiers.alt === undefined || modifiers.alt === entry.alt) &&
    (modifiers.shift === undefined || modifiers.shift === entry.shift)
  );
}

export class InputState {
  private justPressedKeys: KeyEntry[] = [];
  private heldKeys: KeyEntry[] = [];
  private justReleasedKeys: KeyEntry[] = [];

  private justPressedMouse = new Set<MouseButton>();
  private heldMouse = new Set<MouseButton>();
  private justReleasedMouse = new Set<MouseButton>();

  private releaseEvents: boolean;

  /** Accumulated wheel movement: down adds one, up takes one away */
  scroll = 0;

  constructor(options: InputStateOptions = {}) {
    this.releaseEvents = options.releaseEvents ?? false;
  }

  setReleaseEvents(enabled: boolean): void {
    this.releaseEvents = enabled;
  }

  /**
   * Start a new frame: forget what happened in the last one
   */
  update(): void {
    this.justPressedKeys = [];
    this.justReleasedKeys = [];
    this.justPressedMouse.clear();
    this.justReleasedMouse.clear();
    if (!this.releaseEvents) {
      this.heldKeys = [];
    }
  }

  registerEvents(events: Iterable<TerminalEvent>): void {
    for (const event of events) this.registerEvent(event);
  }

  registerEvent(event: TerminalEvent): void {
    if (event.type === 'key') {
      const entry: KeyEntry = { code: event.code, ctrl: event.ctrl, alt: event.alt, shift: event.shift };
      switch (event.kind) {
        case 'press':
          this.justPressedKeys.push(entry);
          this.heldKeys.push(entry);
          break;
        case 'repeat':
          if (!this.heldKeys.some(k => k.code === entry.code)) this.heldKeys.push(entry);
          break;
        case 'release':
          this.justReleasedKeys.push(entry);
          this.heldKeys = this.heldKeys.filter(k => k.code !== entry.code);
          break;
      }
      return;
    }

    if (event.type === 'mouse') {
      switch (event.kind) {
        case 'down':
          if (event.button) {
            this.justPressedMouse.add(event.button);
            this.heldMouse.add(event.button);
          }
          break;
        case 'up':
          if (event.button) {
            this.justReleasedMouse.add(event.button);
            this.heldMouse.delete(event.button);
          } else {
            // Release without a button (X10 style): everything is up
            for (const button of this.heldMouse) this.justReleasedMouse.add(button);
            this.heldMouse.clear();
          }
          break;
        case 'scrollDown':
          this.scroll++;
          break;
        case 'scrollUp':
          this.scroll--;
          break;
        default:
          break;
      }
    }
  }

  justPressed(code: string, modifiers?: Partial<KeyModifiers>): boolean {
    return this.justPressedKeys.some(k => matches(k, code, modifiers));
  }

  pressed(code: string, modifiers?: Partial<KeyModifiers>): boolean {
    return this.heldKeys.some(k => matches(k, code, modifiers));
  }

  justReleased(code: string, modifiers?: Partial<KeyModifiers>): boolean {
    return this.justReleasedKeys.some(k => matches(k, code, modifiers));
  }

  mouseJustPressed(button: MouseButton): boolean {
    return this.justPressedMouse.has(button);
  }

  mousePressed(button: MouseButton): boolean {
    return this.heldMouse.has(button);
  }

  mouseJustReleased(button: MouseButton): boolean {
    return this.justReleasedMouse.has(button);
  }
}
