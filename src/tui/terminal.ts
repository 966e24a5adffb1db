/**
 * Terminal adapter
 *
 * Binds the chat surface to terminal-kit: a fullscreen screen split into a
 * history area and a three-row input box, key and resize events fed into an
 * input queue, and drawing through cursor moves plus raw writes.
 */

import termKit from 'terminal-kit';
import { RESIZE_KEY } from './input-engine.js';
import { createInputQueue } from './input-queue.js';
import { cleanupTerminal } from './terminal-cleanup.js';
import type { InputReader, RawInput, Screen, ScreenSize } from './types.js';
import { createViewport, type Painter } from './viewport.js';

// ============================================================================
// Types
// ============================================================================

export interface TerminalScreen extends Screen {
  /** Blocking source of key and resize events */
  readonly reader: InputReader;
  /** Enter fullscreen and start delivering input */
  start(): void;
  /** Stop input and restore the terminal */
  stop(): void;
}

/**
 * Third argument of terminal-kit's `key` event
 */
interface KeyData {
  isCharacter: boolean;
  code?: number | Buffer;
}

// ============================================================================
// Constants
// ============================================================================

export const INPUT_BOX_HEIGHT = 3;

// Used when terminal-kit cannot report a size (not a TTY)
const FALLBACK_SIZE: ScreenSize = { width: 80, height: 24 };

const term = termKit.terminal;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Current terminal dimensions
 */
export function getTerminalSize(): ScreenSize {
  const width = typeof term.width === 'number' && Number.isFinite(term.width) && term.width > 0 ? term.width : FALLBACK_SIZE.width;
  const height =
    typeof term.height === 'number' && Number.isFinite(term.height) && term.height > 0 ? term.height : FALLBACK_SIZE.height;
  return { width, height };
}

/**
 * Converts a terminal-kit key event into raw input
 */
export function toRawInput(name: string, data: KeyData): RawInput {
  if (data.isCharacter) {
    return { type: 'char', value: name };
  }
  return typeof data.code === 'number' ? { type: 'key', name, code: data.code } : { type: 'key', name };
}

const painter: Painter = {
  moveTo: (x, y) => {
    term.moveTo(x, y);
  },
  write: (text) => {
    process.stdout.write(text);
  },
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Creates the chat screen. The layout is fixed from the size at creation;
 * a later resize clears the screen but does not move the two areas.
 */
export function createTerminalScreen(): TerminalScreen {
  const { width, height } = getTerminalSize();
  const historyHeight = Math.max(1, height - INPUT_BOX_HEIGHT);

  const history = createViewport({ x: 1, y: 1, width, height: historyHeight }, painter);
  const input = createViewport({ x: 1, y: historyHeight + 1, width, height: INPUT_BOX_HEIGHT }, painter);
  const queue = createInputQueue();

  const onKey = (name: string, _matches: string[], data: KeyData) => {
    queue.push(toRawInput(name, data));
  };
  const onResize = () => {
    queue.push({ type: 'key', name: RESIZE_KEY });
  };

  function start(): void {
    term.fullscreen(true);
    term.hideCursor();
    term.grabInput(true);
    term.on('key', onKey);
    term.on('resize', onResize);
  }

  function stop(): void {
    term.removeAllListeners('key');
    term.removeAllListeners('resize');
    cleanupTerminal();
  }

  function clear(): void {
    term.clear();
  }

  function refresh(): void {
    // terminal-kit writes straight to the TTY; there is nothing buffered to flush
  }

  return {
    history,
    input,
    reader: queue,
    querySize: getTerminalSize,
    clear,
    refresh,
    start,
    stop,
  };
}
