/**
 * Chat Session
 *
 * Wires one client process together: announces the join, starts the
 * background watcher, runs the input loop until interrupt, then announces
 * the leave. The watcher and the input loop only meet at the display lock.
 */

import type { LogWatcher } from './log-watcher.js';
import { JOIN_MESSAGE, LEAVE_MESSAGE } from './record.js';
import type { LogWriter } from './shared-log.js';
import type { DisplaySurface } from './tui/display-surface.js';
import { createInputEngine } from './tui/input-engine.js';
import type { InputReader } from './tui/types.js';

export interface ChatSessionDeps {
  /** Session identity, fixed for the process lifetime */
  author: string;
  writer: LogWriter;
  watcher: LogWatcher;
  surface: DisplaySurface;
  reader: InputReader;
}

/**
 * Runs a session to completion. Resolves once the user interrupts and the
 * leave record has been attempted.
 */
export async function runChatSession(deps: ChatSessionDeps): Promise<void> {
  const { author, writer, watcher, surface, reader } = deps;

  await writer.append(author, JOIN_MESSAGE);
  await surface.repaintInput('');
  watcher.start();

  try {
    const engine = createInputEngine({ author, writer, surface });
    await engine.run(reader);
  } finally {
    // Shutting down: the watcher finishes its current cycle and stops
    watcher.stop();
    await writer.append(author, LEAVE_MESSAGE);
  }
}
