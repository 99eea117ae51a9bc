/**
 * gridpaint - styled cell buffers, diff rendering, grid layout and
 * terminal session handling
 */

export { vec2, toVec2, addVec2, equalsVec2, type Vec2, type Vec2Like } from './math.js';

export { Cell, type CellLike } from './renderer/Cell.js';
export { Buffer, type DiffEntry } from './renderer/Buffer.js';
export {
  Text,
  render,
  renderClipped,
  renderItem,
  renderClippedItem,
  measure,
  textWidth,
  type Render,
  type Renderable,
  type BufferTarget,
} from './renderer/render.js';
export { cursor, screen, reporting, keyboard, fg, bg, style, styled, stripAnsi, parseStyled, type CursorShape, type StyledSegment } from './renderer/ansi.js';
export { graphemes, displayWidth, cellWidth } from './renderer/width.js';

export { Rect } from './layout/Rect.js';
export {
  percent,
  fixed,
  range,
  min,
  max,
  flexible,
  resolveConstraints,
  LayoutError,
  type Constraint,
  type LayoutErrorKind,
} from './layout/constraints.js';
export { Layout, CalculatedLayout, calculateLayout, type LayoutRow, type LayoutEntry } from './layout/Layout.js';

export type {
  TerminalDriver,
  TerminalEvent,
  KeyEvent,
  KeyEventKind,
  KeyModifiers,
  MouseEvent,
  MouseEventKind,
  MouseButton,
  ResizeEvent,
  FocusEvent,
  PasteEvent,
} from './terminal/types.js';
export { NodeTerminal, type NodeTerminalOptions } from './terminal/NodeTerminal.js';
export { parseInput, isTerminalEvent, type ParsedInput, type QueryReply, type ParseOptions } from './terminal/parseInput.js';
export { supportsSynchronizedOutput, useSynchronizedOutput } from './terminal/capabilities.js';

export { Window, type WindowOptions, type WindowState, type WindowMode, type FrameStats } from './window/Window.js';
export { UnsupportedFeatureError, WindowStateError } from './window/errors.js';
export { restoreActiveWindows, activeWindowCount } from './window/guard.js';
export { installPanicHook, uninstallPanicHook, isPanicHookInstalled, type PanicHook, type PanicHookOptions } from './window/panic.js';

export { InputState, type InputStateOptions } from './input/InputState.js';
export { Border, boxChars, type BorderOptions, type BoxStyle } from './widgets/Border.js';
export { NineSlice, type NineSliceCells } from './widgets/NineSlice.js';
export { runApp, withWindow, type Scene, type RunAppOptions } from './app/index.js';

export {
  getConfig,
  getSetting,
  setSetting,
  resolveSettings,
  DEFAULT_SETTINGS,
  type Settings,
  type LogLevel,
  type SyncOutputMode,
} from './config/index.js';
export { logger, logError, configureLogger } from './utils/logger.js';
export { MemoryTerminal, type MemoryTerminalOptions } from './testing/MemoryTerminal.js';
