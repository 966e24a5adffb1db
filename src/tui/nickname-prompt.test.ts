import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

type FieldCallback = (error: unknown, input?: string) => void;
type KeyHandler = (name: string) => void;

const fakeTerm = vi.hoisted(() => {
  let fieldCallback: FieldCallback | undefined;
  let keyHandlers: KeyHandler[] = [];
  const abort = vi.fn();

  return {
    abort,
    pressKey(name: string) {
      for (const handler of [...keyHandlers]) handler(name);
    },
    finishField(error: unknown, input?: string) {
      fieldCallback?.(error, input);
    },
    listenerCount() {
      return keyHandlers.length;
    },
    reset() {
      fieldCallback = undefined;
      keyHandlers = [];
    },
    terminal: {
      width: 40,
      height: 10,
      fullscreen: vi.fn(),
      grabInput: vi.fn(),
      clear: vi.fn(),
      moveTo: vi.fn(),
      on: vi.fn((event: string, handler: KeyHandler) => {
        if (event === 'key') keyHandlers.push(handler);
      }),
      removeAllListeners: vi.fn((event: string) => {
        if (event === 'key') keyHandlers = [];
      }),
      inputField: vi.fn((_options: object, callback: FieldCallback) => {
        fieldCallback = callback;
        return { abort };
      }),
    },
  };
});

vi.mock('terminal-kit', () => ({ default: { terminal: fakeTerm.terminal } }));

import { NICKNAME_PROMPT, promptNickname } from './nickname-prompt.js';

describe('promptNickname', () => {
  let written: string[];

  beforeEach(() => {
    fakeTerm.reset();
    fakeTerm.abort.mockClear();
    written = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should center the prompt and resolve with the typed name', async () => {
    const result = promptNickname(60);
    fakeTerm.finishField(undefined, 'Alice');

    await expect(result).resolves.toBe('Alice');
    expect(written).toEqual([NICKNAME_PROMPT]);
    // 21 columns wide in a 40 column terminal, middle row of 10
    expect(fakeTerm.terminal.moveTo).toHaveBeenCalledWith(10, 6);
  });

  it('should abort the field and resolve null on Ctrl+C', async () => {
    const debugLog = vi.fn();
    const result = promptNickname(60, debugLog);

    fakeTerm.pressKey('CTRL_C');

    await expect(result).resolves.toBeNull();
    expect(fakeTerm.abort).toHaveBeenCalledTimes(1);
    expect(fakeTerm.listenerCount()).toBe(0);
    expect(debugLog).toHaveBeenCalledWith(expect.objectContaining({ type: 'info', source: 'nickname' }));
  });

  it('should ignore other keys while the field is open', async () => {
    const result = promptNickname(60);

    fakeTerm.pressKey('a');
    fakeTerm.pressKey('ENTER');
    fakeTerm.finishField(undefined, 'Bob');

    await expect(result).resolves.toBe('Bob');
    expect(fakeTerm.abort).not.toHaveBeenCalled();
  });

  it('should fall back to the placeholder name when the field fails', async () => {
    const debugLog = vi.fn();
    const result = promptNickname(60, debugLog);

    fakeTerm.finishField(new Error('stdin closed'));

    await expect(result).resolves.toBe('Anonymous');
    expect(debugLog).toHaveBeenCalledWith(expect.objectContaining({ type: 'warn', source: 'nickname' }));
  });
});
