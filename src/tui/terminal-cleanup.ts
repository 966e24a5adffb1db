/**
 * Terminal cleanup
 *
 * Restores the terminal after the chat screen took it over, whether the
 * session ended normally or failed.
 */

import termKit from 'terminal-kit';

const term = termKit.terminal;

/**
 * Leave fullscreen, release input and show the cursor again.
 */
export function cleanupTerminal(): void {
  term.grabInput(false);
  term.fullscreen(false);
  term.styleReset();

  // grabInput(false) does not always undo raw mode
  if (process.stdin.isTTY && process.stdin.setRawMode) {
    process.stdin.setRawMode(false);
  }

  process.stdout.write('\x1b[?25h'); // Show cursor
}
