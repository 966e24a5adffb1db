/**
 * Debug Log Module
 *
 * Diagnostics never reach the chat screen. Failures that the chat client
 * contains (lost writes, skipped poll cycles, unrenderable lines) are appended
 * here instead, one entry per line.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ============================================================================
// Types
// ============================================================================

export type DebugLogType = 'info' | 'warn' | 'error';

/**
 * A single diagnostic entry
 */
export interface DebugLogEntry {
  type: DebugLogType;
  /** Component that produced the entry (e.g. "writer", "watcher") */
  source: string;
  text: string;
  /** Extra structured context, serialized as JSON */
  details?: unknown;
}

export type DebugLogger = (entry: DebugLogEntry) => void;

// ============================================================================
// Formatting
// ============================================================================

/**
 * Flatten an unknown thrown value into something JSON.stringify can show
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
    };
  }
  return { message: String(error) };
}

export function formatDebugLine(entry: DebugLogEntry, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] [${entry.type.toUpperCase()}] [${entry.source}] ${entry.text}`;

  if (entry.details !== undefined) {
    logLine += `\n    DETAILS: ${JSON.stringify(entry.details, null, 2).split('\n').join('\n    ')}`;
  }

  return `${logLine}\n`;
}

// ============================================================================
// Writers
// ============================================================================

/**
 * Truncate the debug log and write a session header.
 */
export function startDebugLog(filePath: string, pid: number = process.pid): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `=== ledgerchat session ${new Date().toISOString()} pid:${pid} ===\n\n`);
  } catch {
    // Diagnostics are optional; the chat still runs without them
  }
}

/**
 * Creates a logger appending to `filePath`. Writing never throws.
 */
export function createDebugLogger(filePath: string): DebugLogger {
  return (entry) => {
    try {
      fs.appendFileSync(filePath, formatDebugLine(entry));
    } catch {
      // Silently ignore write errors
    }
  };
}

/** Logger that drops everything */
export const silentLogger: DebugLogger = () => {};
