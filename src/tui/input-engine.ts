/**
 * Input Engine
 *
 * Foreground loop of a chat session: reads raw input, edits the line buffer,
 * submits finished lines to the shared log and echoes the buffer into the
 * input box. The buffer is only ever touched from here.
 */

import type { LogWriter } from '../shared-log.js';
import type { DisplaySurface } from './display-surface.js';
import type { InputEvent, InputReader, RawInput } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type DispatchResult = 'continue' | 'exit';

export interface InputEngineDeps {
  /** Session identity attached to every submitted line */
  author: string;
  writer: LogWriter;
  surface: DisplaySurface;
}

export interface InputEngine {
  /** Current (unsent) buffer contents */
  getBuffer(): string;
  /** Apply one normalized event */
  dispatch(event: InputEvent): Promise<DispatchResult>;
  /** Read and dispatch until an interrupt arrives */
  run(reader: InputReader): Promise<void>;
}

// ============================================================================
// Normalization
// ============================================================================

const BACKSPACE_CODES = new Set([8, 127]);
const ENTER_CODES = new Set([10, 13]);
const INTERRUPT_CODE = 3;

const BACKSPACE_KEYS = new Set(['BACKSPACE']);
const ENTER_KEYS = new Set(['ENTER', 'KP_ENTER']);
const INTERRUPT_KEYS = new Set(['CTRL_C']);
export const RESIZE_KEY = 'RESIZE';

function classifyCode(code: number): InputEvent | null {
  if (BACKSPACE_CODES.has(code)) return { kind: 'backspace' };
  if (ENTER_CODES.has(code)) return { kind: 'submit' };
  if (code === INTERRUPT_CODE) return { kind: 'interrupt' };
  return null;
}

/**
 * Maps both input representations onto one event. Returns null for named
 * keys the chat does not use (arrows, function keys).
 */
export function normalizeInput(raw: RawInput): InputEvent | null {
  if (raw.type === 'key') {
    if (raw.name === RESIZE_KEY) return { kind: 'resize' };
    if (BACKSPACE_KEYS.has(raw.name)) return { kind: 'backspace' };
    if (ENTER_KEYS.has(raw.name)) return { kind: 'submit' };
    if (INTERRUPT_KEYS.has(raw.name)) return { kind: 'interrupt' };
    return raw.code === undefined ? null : classifyCode(raw.code);
  }

  const chars = Array.from(raw.value);
  if (chars.length === 1) {
    const code = chars[0].codePointAt(0) ?? 0;
    const event = classifyCode(code);
    if (event) return event;
  }
  return { kind: 'character', char: raw.value };
}

// ============================================================================
// Factory
// ============================================================================

export function createInputEngine(deps: InputEngineDeps): InputEngine {
  const { author, writer, surface } = deps;
  // Held as code points so backspace never splits a surrogate pair
  let buffer: string[] = [];

  function getBuffer(): string {
    return buffer.join('');
  }

  async function dispatch(event: InputEvent): Promise<DispatchResult> {
    switch (event.kind) {
      case 'resize':
        await surface.resetBase();
        return 'continue';

      case 'backspace':
        if (buffer.length > 0) {
          buffer = buffer.slice(0, -1);
          await surface.repaintInput(getBuffer());
        }
        return 'continue';

      case 'submit': {
        const text = getBuffer();
        if (text.trim()) {
          await writer.append(author, text);
        }
        buffer = [];
        await surface.repaintInput('');
        return 'continue';
      }

      case 'interrupt':
        return 'exit';

      case 'character':
        buffer.push(...Array.from(event.char));
        await surface.repaintInput(getBuffer());
        return 'continue';
    }
  }

  async function run(reader: InputReader): Promise<void> {
    for (;;) {
      const event = normalizeInput(await reader.next());
      if (!event) continue;
      if ((await dispatch(event)) === 'exit') return;
    }
  }

  return {
    getBuffer,
    dispatch,
    run,
  };
}
