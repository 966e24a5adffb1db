/**
 * Nickname prompt
 *
 * Asks for a display name before the chat screen is drawn. The prompt is
 * centered with the same width heuristic the chat screen uses, and typing
 * is echoed.
 */

import termKit from 'terminal-kit';
import { type DebugLogger, describeError, silentLogger } from '../debug-log.js';
import { resolveNickname } from '../nickname.js';
import { getTerminalSize } from './terminal.js';
import { centerColumn } from './text-width.js';

export const NICKNAME_PROMPT = 'Enter your nickname: ';

const term = termKit.terminal;

/**
 * Reads one echoed line. Resolves null when the user presses Ctrl+C, which
 * the input field itself ignores.
 */
function readLine(): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const field = term.inputField({}, (error: unknown, input?: string) => {
      term.removeAllListeners('key');
      if (error) {
        reject(error);
      } else {
        resolve(input ?? '');
      }
    });

    term.on('key', (name: string) => {
      if (name !== 'CTRL_C') return;
      field.abort();
      term.removeAllListeners('key');
      resolve(null);
    });
  });
}

/**
 * Shows the prompt and resolves with the session identity, or null when the
 * user interrupts.
 */
export async function promptNickname(maxBytes: number, debugLog: DebugLogger = silentLogger): Promise<string | null> {
  const { width, height } = getTerminalSize();

  term.fullscreen(true);
  term.grabInput(true);
  term.clear();
  term.moveTo(centerColumn(NICKNAME_PROMPT, width) + 1, Math.floor(height / 2) + 1);
  process.stdout.write(NICKNAME_PROMPT);

  let raw: string | null;
  try {
    raw = await readLine();
    if (raw === null) {
      debugLog({ type: 'info', source: 'nickname', text: 'Interrupted at the nickname prompt' });
      return null;
    }
  } catch (error) {
    debugLog({ type: 'warn', source: 'nickname', text: 'Nickname could not be read', details: describeError(error) });
    raw = null;
  }

  return resolveNickname(raw, maxBytes);
}
