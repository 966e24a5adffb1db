import * as fs from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogWatcher, tailLines } from './log-watcher.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('log-watcher', () => {
  describe('tailLines', () => {
    it('should return the last lines without terminators', () => {
      expect(tailLines('a\nb\nc\n', 2)).toEqual(['b', 'c']);
    });

    it('should count a final line without a newline', () => {
      expect(tailLines('a\nb', 5)).toEqual(['a', 'b']);
    });

    it('should strip carriage returns', () => {
      expect(tailLines('a\r\nb\r\n', 5)).toEqual(['a', 'b']);
    });

    it('should keep blank lines in the middle', () => {
      expect(tailLines('a\n\nb\n', 5)).toEqual(['a', '', 'b']);
    });

    it('should return nothing for empty content', () => {
      expect(tailLines('', 3)).toEqual([]);
      expect(tailLines('a\n', 0)).toEqual([]);
    });
  });

  describe('createLogWatcher', () => {
    let dir: string;
    let chatFile: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(tmpdir(), 'ledgerchat-watch-'));
      chatFile = path.join(dir, 'chat.log');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should keep only the newest lines in their original order', async () => {
      const all = Array.from({ length: 150 }, (_, i) => `line ${i + 1}`);
      fs.writeFileSync(chatFile, `${all.join('\n')}\n`);
      const onChange = vi.fn();
      const watcher = createLogWatcher({ filePath: chatFile, maxLines: 100, pollIntervalMs: 500, onChange });

      await expect(watcher.poll()).resolves.toBe(true);

      expect(onChange).toHaveBeenCalledTimes(1);
      expect(onChange).toHaveBeenCalledWith(all.slice(50));
      expect(watcher.getWindow()).toHaveLength(100);
      expect(watcher.getWindow()[0]).toBe('line 51');
    });

    it('should not repaint when nothing changed between polls', async () => {
      fs.writeFileSync(chatFile, 'hello\n');
      const onChange = vi.fn();
      const watcher = createLogWatcher({ filePath: chatFile, maxLines: 100, pollIntervalMs: 500, onChange });

      await expect(watcher.poll()).resolves.toBe(true);
      await expect(watcher.poll()).resolves.toBe(false);

      expect(onChange).toHaveBeenCalledTimes(1);
    });

    it('should rebuild the window after the log changes', async () => {
      fs.writeFileSync(chatFile, 'a\nb\n');
      const onChange = vi.fn();
      const watcher = createLogWatcher({ filePath: chatFile, maxLines: 2, pollIntervalMs: 500, onChange });

      await watcher.poll();
      // File timestamps can be coarser than a millisecond
      await sleep(50);
      fs.appendFileSync(chatFile, 'c\n');

      await expect(watcher.poll()).resolves.toBe(true);
      expect(onChange).toHaveBeenLastCalledWith(['b', 'c']);
    });

    it('should hand out a copy of the window', async () => {
      fs.writeFileSync(chatFile, 'a\n');
      const onChange = vi.fn((lines: string[]) => {
        lines.push('mutated');
      });
      const watcher = createLogWatcher({ filePath: chatFile, maxLines: 10, pollIntervalMs: 500, onChange });

      await watcher.poll();

      expect(watcher.getWindow()).toEqual(['a']);
    });

    it('should recreate a missing log', async () => {
      const onChange = vi.fn();
      const watcher = createLogWatcher({ filePath: chatFile, maxLines: 10, pollIntervalMs: 500, onChange });

      await expect(watcher.poll()).resolves.toBe(true);

      expect(fs.existsSync(chatFile)).toBe(true);
      expect(onChange).toHaveBeenCalledWith([]);
    });

    it('should replace malformed bytes instead of failing', async () => {
      fs.writeFileSync(chatFile, Buffer.from([0x61, 0xff, 0x62, 0x0a]));
      const onChange = vi.fn();
      const watcher = createLogWatcher({ filePath: chatFile, maxLines: 10, pollIntervalMs: 500, onChange });

      await watcher.poll();

      expect(onChange).toHaveBeenCalledWith(['a\uFFFDb']);
    });

    it('should swallow a failing repaint and report it', async () => {
      fs.writeFileSync(chatFile, 'a\n');
      const debugLog = vi.fn();
      const watcher = createLogWatcher({
        filePath: chatFile,
        maxLines: 10,
        pollIntervalMs: 500,
        onChange: () => {
          throw new Error('screen gone');
        },
        debugLog,
      });

      await expect(watcher.poll()).resolves.toBe(false);
      expect(debugLog).toHaveBeenCalledWith(expect.objectContaining({ type: 'warn', source: 'watcher' }));
    });

    it('should swallow I/O errors', async () => {
      const debugLog = vi.fn();
      const watcher = createLogWatcher({
        filePath: path.join(dir, 'missing', 'chat.log'),
        maxLines: 10,
        pollIntervalMs: 500,
        onChange: vi.fn(),
        debugLog,
      });

      await expect(watcher.poll()).resolves.toBe(false);
      expect(debugLog).toHaveBeenCalledTimes(1);
    });

    it('should poll in the background until stopped', async () => {
      fs.writeFileSync(chatFile, 'a\n');
      const onChange = vi.fn();
      const watcher = createLogWatcher({ filePath: chatFile, maxLines: 10, pollIntervalMs: 10, onChange });

      watcher.start();
      expect(watcher.isRunning()).toBe(true);
      await vi.waitFor(() => expect(onChange).toHaveBeenCalledTimes(1));

      watcher.stop();
      expect(watcher.isRunning()).toBe(false);

      // Let any cycle already in flight finish before changing the file
      await sleep(50);
      fs.appendFileSync(chatFile, 'b\n');
      await sleep(100);

      expect(onChange).toHaveBeenCalledTimes(1);
    });
  });
});
