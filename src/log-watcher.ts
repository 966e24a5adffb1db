/**
 * Log Watcher Module
 *
 * Polls the shared log's modification time and, when it changes, re-reads
 * the whole file and hands the last N lines to the display. The window is
 * rebuilt from scratch on every change, never merged.
 *
 * A file that shrinks or is replaced without its timestamp changing goes
 * unnoticed until the next write; only the timestamp is compared.
 */

import * as fs from 'node:fs';
import { type DebugLogger, describeError, silentLogger } from './debug-log.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Receives a copy of the new display window
 */
export type WindowCallback = (lines: string[]) => Promise<void> | void;

export interface LogWatcherOptions {
  filePath: string;
  /** Lines kept in the display window */
  maxLines: number;
  pollIntervalMs: number;
  onChange: WindowCallback;
  debugLog?: DebugLogger;
}

export interface LogWatcher {
  /** Start polling; the first cycle runs immediately */
  start: () => void;
  /** Stop after the current cycle */
  stop: () => void;
  /**
   * Run one poll cycle. Resolves true when the file changed and a repaint
   * was issued. Never rejects.
   */
  poll: () => Promise<boolean>;
  /** Copy of the current display window */
  getWindow: () => string[];
  isRunning: () => boolean;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Last `maxLines` lines of `content`, without line terminators. A final line
 * with no trailing newline still counts.
 */
export function tailLines(content: string, maxLines: number): string[] {
  if (maxLines <= 0 || content.length === 0) return [];

  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.slice(-maxLines).map((line) => line.replace(/\r$/, ''));
}

// ============================================================================
// Factory Function
// ============================================================================

export function createLogWatcher(options: LogWatcherOptions): LogWatcher {
  const { filePath, maxLines, pollIntervalMs, onChange } = options;
  const debugLog = options.debugLog ?? silentLogger;

  let displayWindow: string[] = [];
  let lastModTime: bigint | null = null;
  let running = false;
  let timer: NodeJS.Timeout | null = null;

  async function ensureExists(): Promise<void> {
    // 'a' creates the file when someone deleted it and leaves content alone
    const handle = await fs.promises.open(filePath, 'a');
    await handle.close();
  }

  async function poll(): Promise<boolean> {
    try {
      await ensureExists();

      const stat = await fs.promises.stat(filePath, { bigint: true });
      if (stat.mtimeNs === lastModTime) {
        return false;
      }
      lastModTime = stat.mtimeNs;

      // Buffer#toString replaces malformed UTF-8 rather than throwing
      const content = (await fs.promises.readFile(filePath)).toString('utf-8');
      displayWindow = tailLines(content, maxLines);

      await onChange([...displayWindow]);
      return true;
    } catch (error) {
      debugLog({
        type: 'warn',
        source: 'watcher',
        text: `Poll of ${filePath} failed`,
        details: describeError(error),
      });
      return false;
    }
  }

  function scheduleNext(): void {
    if (!running) return;
    timer = setTimeout(cycle, pollIntervalMs);
  }

  function cycle(): void {
    timer = null;
    void poll().then(scheduleNext, scheduleNext);
  }

  function start(): void {
    if (running) return; // Already running
    running = true;
    cycle();
  }

  function stop(): void {
    running = false;
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  }

  function getWindow(): string[] {
    return [...displayWindow];
  }

  function isRunning(): boolean {
    return running;
  }

  return {
    start,
    stop,
    poll,
    getWindow,
    isRunning,
  };
}
