import * as fs from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogWatcher, type LogWatcher } from './log-watcher.js';
import { JOIN_MESSAGE, LEAVE_MESSAGE } from './record.js';
import { runChatSession } from './session.js';
import { createLogWriter } from './shared-log.js';
import { createFakeScreen } from './test-utils/fake-screen.js';
import { createDisplaySurface } from './tui/display-surface.js';
import { createInputQueue } from './tui/input-queue.js';
import type { RawInput } from './tui/types.js';

const RECORD_LINE = /^\[\d{2}:\d{2}:\d{2}\] <([^>]+)> (.*)$/;

function readRecords(filePath: string): Array<{ author: string; body: string }> {
  return fs
    .readFileSync(filePath, 'utf-8')
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => {
      const match = RECORD_LINE.exec(line);
      if (!match) throw new Error(`Malformed line: ${line}`);
      return { author: match[1], body: match[2] };
    });
}

function typed(text: string): RawInput[] {
  return Array.from(text, (value): RawInput => ({ type: 'char', value }));
}

describe('chat session', () => {
  let dir: string;
  let chatFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(tmpdir(), 'ledgerchat-session-'));
    chatFile = path.join(dir, 'chat.log');
    fs.writeFileSync(chatFile, '');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should keep two busy writers from merging or truncating lines', async () => {
    const alice = createLogWriter(chatFile);
    const bob = createLogWriter(chatFile);

    await Promise.all([
      (async () => {
        for (let i = 0; i < 10; i++) await alice.append('Alice', 'hello');
      })(),
      (async () => {
        for (let i = 0; i < 10; i++) await bob.append('Bob', 'hi');
      })(),
    ]);

    const records = readRecords(chatFile);
    expect(records).toHaveLength(20);
    for (const record of records) {
      expect(['hello', 'hi']).toContain(record.body);
      expect(record.body).toBe(record.author === 'Alice' ? 'hello' : 'hi');
    }
    expect(records.filter((r) => r.author === 'Alice')).toHaveLength(10);
    expect(records.filter((r) => r.author === 'Bob')).toHaveLength(10);
  });

  it('should announce the join, send typed lines, and announce the leave', async () => {
    const screen = createFakeScreen();
    const surface = createDisplaySurface(screen);
    const writer = createLogWriter(chatFile);
    const watcher: LogWatcher = {
      start: vi.fn(),
      stop: vi.fn(),
      poll: vi.fn(async () => false),
      getWindow: vi.fn(() => []),
      isRunning: vi.fn(() => false),
    };
    const reader = createInputQueue();
    for (const input of [
      ...typed('hi there'),
      { type: 'key', name: 'ENTER' } as const,
      ...typed('   '),
      { type: 'char', value: '\r' } as const,
      ...typed('unsent'),
      { type: 'key', name: 'CTRL_C' } as const,
    ]) {
      reader.push(input);
    }

    await runChatSession({ author: 'Alice', writer, watcher, surface, reader });

    expect(readRecords(chatFile)).toEqual([
      { author: 'Alice', body: JOIN_MESSAGE },
      { author: 'Alice', body: 'hi there' },
      { author: 'Alice', body: LEAVE_MESSAGE },
    ]);
    expect(watcher.start).toHaveBeenCalledTimes(1);
    expect(watcher.stop).toHaveBeenCalledTimes(1);
    expect(screen.input.frames[0].writes).toEqual([{ x: 1, y: 1, text: 'Say: ' }, { x: 6, y: 1, text: '' }]);
    expect(screen.input.lastFrame()?.writes[1]).toEqual({ x: 6, y: 1, text: 'unsent' });
  });

  it('should show what another session wrote in the history viewport', async () => {
    const screen = createFakeScreen({ historyHeight: 5 });
    const surface = createDisplaySurface(screen);
    const bob = createLogWriter(chatFile, { now: () => new Date(2024, 0, 2, 9, 30, 0) });
    const watcher = createLogWatcher({
      filePath: chatFile,
      maxLines: 100,
      pollIntervalMs: 500,
      onChange: (lines) => surface.repaintHistory(lines),
    });

    await bob.append('Bob', JOIN_MESSAGE);
    await bob.append('Bob', '你好');
    await watcher.poll();

    expect(screen.history.lastFrame()?.writes).toEqual([
      { x: 0, y: 0, text: `[09:30:00] <Bob> ${JOIN_MESSAGE}` },
      { x: 0, y: 1, text: '[09:30:00] <Bob> 你好' },
    ]);
  });
});
