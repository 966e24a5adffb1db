/**
 * Display Surface Module
 *
 * The log watcher and the input loop both draw on the same terminal, which
 * cannot take interleaved partial redraws. Every mutation of either viewport
 * or of the base screen runs under one mutex, held for one redraw only.
 */

import { Mutex } from 'async-mutex';
import { type DebugLogger, describeError, silentLogger } from '../debug-log.js';
import { tailForInput } from './text-width.js';
import type { Screen, ScreenSize } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface DisplaySurface {
  /** Replace the history viewport with `lines` (bottom-anchored) */
  repaintHistory(lines: readonly string[]): Promise<void>;
  /** Redraw the input box around the current buffer text */
  repaintInput(bufferText: string): Promise<void>;
  /**
   * Re-query the terminal size and clear the base screen. The two viewports
   * keep their original layout.
   */
  resetBase(): Promise<ScreenSize>;
}

// ============================================================================
// Constants
// ============================================================================

export const INPUT_LABEL = 'Say: ';
const LABEL_COLUMN = 1;
const TEXT_COLUMN = 6;
const TEXT_ROW = 1;
// Border, label and padding take eight columns of the input box
const INPUT_CHROME_WIDTH = 8;

// ============================================================================
// Factory
// ============================================================================

export function createDisplaySurface(screen: Screen, debugLog: DebugLogger = silentLogger): DisplaySurface {
  const lock = new Mutex();

  function reportSkipped(viewport: string, text: string, error: unknown): void {
    debugLog({
      type: 'warn',
      source: 'display',
      text: `Skipped unrenderable ${viewport} text`,
      details: { text, error: describeError(error) },
    });
  }

  function repaintHistory(lines: readonly string[]): Promise<void> {
    return lock.runExclusive(() => {
      const { history } = screen;
      history.clear();

      const visible = lines.slice(-history.height);
      visible.forEach((line, row) => {
        try {
          history.write(0, row, line.replace(/\r?\n$/, ''));
        } catch (error) {
          reportSkipped('history', line, error);
        }
      });

      history.refresh();
    });
  }

  function repaintInput(bufferText: string): Promise<void> {
    return lock.runExclusive(() => {
      const { input } = screen;
      input.clear();
      input.border();

      const shown = tailForInput(bufferText, input.width - INPUT_CHROME_WIDTH);
      for (const [column, text] of [
        [LABEL_COLUMN, INPUT_LABEL],
        [TEXT_COLUMN, shown],
      ] as const) {
        try {
          input.write(column, TEXT_ROW, text);
        } catch (error) {
          reportSkipped('input', text, error);
        }
      }

      input.refresh();
    });
  }

  function resetBase(): Promise<ScreenSize> {
    return lock.runExclusive(() => {
      const size = screen.querySize();
      screen.clear();
      screen.refresh();
      return size;
    });
  }

  return {
    repaintHistory,
    repaintInput,
    resetBase,
  };
}
