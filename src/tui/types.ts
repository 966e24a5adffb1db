/**
 * Shared types for the TUI components
 */

// ============================================================================
// Rendering surface
// ============================================================================

/**
 * A rectangular sub-surface of the screen. Coordinates are zero-based and
 * relative to the viewport. Nothing is shown until `refresh()`.
 */
export interface Viewport {
  readonly width: number;
  readonly height: number;
  /** Drop everything written since the last refresh and blank the region */
  clear(): void;
  /**
   * Write text at a coordinate. Text is clipped to the viewport width.
   * Throws a RenderError for coordinates outside the viewport or text
   * containing control characters.
   */
  write(x: number, y: number, text: string): void;
  /** Draw a single-line border around the viewport edge */
  border(): void;
  /** Paint the region */
  refresh(): void;
}

export interface ScreenSize {
  width: number;
  height: number;
}

/**
 * The full-screen surface split into a scrolling history area on top and a
 * three-row input box below.
 */
export interface Screen {
  readonly history: Viewport;
  readonly input: Viewport;
  /** Re-query the terminal dimensions */
  querySize(): ScreenSize;
  /** Clear the whole base surface */
  clear(): void;
  refresh(): void;
}

/**
 * Thrown by a viewport when text cannot be placed
 */
export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}

// ============================================================================
// Input
// ============================================================================

/**
 * Input as delivered by the terminal. Terminals disagree on whether Enter or
 * Backspace arrive as a named key or as the raw character, so both forms exist.
 */
export type RawInput =
  | { type: 'key'; name: string; code?: number }
  | { type: 'char'; value: string };

/**
 * Normalized input event
 */
export type InputEvent =
  | { kind: 'backspace' }
  | { kind: 'submit' }
  | { kind: 'interrupt' }
  | { kind: 'resize' }
  | { kind: 'character'; char: string };

/**
 * Blocking source of raw input. `next()` resolves with the next input and
 * has no timeout.
 */
export interface InputReader {
  next(): Promise<RawInput>;
}
