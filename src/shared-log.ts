/**
 * Shared Log Module
 *
 * The chat room is a single append-only file shared by every client process.
 * Writers serialize through an exclusive advisory lock held for exactly one
 * append; readers never lock and rely on modification-time polling instead.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import lockfile, { type LockOptions } from 'proper-lockfile';
import { type DebugLogger, describeError, silentLogger } from './debug-log.js';
import { createRecord, formatHeader, serializeRecord } from './record.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Appends chat records to the shared log
 */
export interface LogWriter {
  /**
   * Append one record. Blank bodies are ignored. Never rejects: a failed
   * write is lost and only reported to the debug log.
   */
  append: (author: string, body: string) => Promise<void>;
}

export interface LogWriterOptions {
  /** Lock location shared by all participants (defaults to `<filePath>.lock`) */
  lockPath?: string;
  debugLog?: DebugLogger;
  /** Clock used for record timestamps */
  now?: () => Date;
}

/**
 * Thrown at startup when the shared log or its lock cannot be created.
 * Every participant needs write access to both the log and the directory
 * the lock is created in.
 */
export class SharedLogPermissionError extends Error {
  readonly filePath: string;
  /** Set when the log is usable but its lock is not */
  readonly lockPath?: string;
  readonly hint: string;

  constructor(filePath: string, options: { cause?: unknown; lockPath?: string } = {}) {
    const { lockPath, cause } = options;
    super(
      lockPath
        ? `Cannot create lock at ${lockPath}. Permission denied.`
        : `Cannot create chat file at ${filePath}. Permission denied.`,
      { cause },
    );
    this.name = 'SharedLogPermissionError';
    this.filePath = filePath;
    this.lockPath = lockPath;

    if (lockPath) {
      const lockDir = path.dirname(lockPath);
      this.hint = `Please run: sudo chmod 777 ${lockDir}\nor pass --lock <path> in a directory every user can write.`;
    } else {
      const fileDir = path.dirname(filePath);
      this.hint = `Please run: sudo touch ${filePath} && sudo chmod 666 ${filePath} && sudo chmod 777 ${fileDir}`;
    }
  }
}

// ============================================================================
// Constants
// ============================================================================

/** Participants may run as different users, so the log is world-writable */
export const SHARED_LOG_MODE = 0o666;

// Backoff between attempts on a held lock. Waiting never gives up.
const LOCK_BACKOFF_MIN_MS = 5;
const LOCK_BACKOFF_MAX_MS = 100;
const LOCK_BACKOFF_FACTOR = 1.5;

// A lock left behind by a crashed process is taken over after this long
const LOCK_STALE_MS = 10_000;

// ============================================================================
// Bootstrap
// ============================================================================

function hasCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}

function isPermissionError(error: unknown): boolean {
  return hasCode(error, 'EACCES', 'EPERM');
}

/**
 * Creates the shared log with a header line if it does not exist yet.
 *
 * @returns true when this call created the file
 * @throws SharedLogPermissionError when creation is not permitted
 */
export function ensureSharedLog(filePath: string, now: Date = new Date()): boolean {
  if (fs.existsSync(filePath)) {
    return false;
  }

  try {
    // 'wx' so two processes starting together never both write a header
    fs.writeFileSync(filePath, formatHeader(now), { encoding: 'utf-8', flag: 'wx' });
    fs.chmodSync(filePath, SHARED_LOG_MODE);
    return true;
  } catch (error) {
    if (hasCode(error, 'EEXIST')) {
      return false;
    }
    if (isPermissionError(error)) {
      throw new SharedLogPermissionError(filePath, { cause: error });
    }
    throw error;
  }
}

// ============================================================================
// Writer
// ============================================================================

export function defaultLockPath(filePath: string): string {
  return `${filePath}.lock`;
}

function lockOptionsFor(filePath: string, lockPath: string | undefined, debugLog: DebugLogger): LockOptions {
  return {
    lockfilePath: lockPath ?? defaultLockPath(filePath),
    realpath: false,
    stale: LOCK_STALE_MS,
    // Contention is retried by acquireLock(); other errors fail fast
    retries: 0,
    onCompromised: (error) => {
      debugLog({ type: 'warn', source: 'writer', text: 'Lock compromised', details: describeError(error) });
    },
  };
}

/**
 * Blocks until the exclusive lock is held. Errors other than contention
 * (missing directory, permissions) are thrown.
 */
async function acquireLock(filePath: string, lockOptions: LockOptions): Promise<() => Promise<void>> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await lockfile.lock(filePath, lockOptions);
    } catch (error) {
      if (!hasCode(error, 'ELOCKED')) throw error;
      const backoff = Math.min(LOCK_BACKOFF_MAX_MS, LOCK_BACKOFF_MIN_MS * LOCK_BACKOFF_FACTOR ** attempt);
      await sleep(backoff * (0.5 + Math.random() / 2));
    }
  }
}

/**
 * Takes and releases the lock once. Appends swallow their failures, so a
 * lock location this user cannot write has to be caught before the session.
 *
 * @throws SharedLogPermissionError when the lock cannot be created or a
 *   stale lock cannot be removed
 */
export async function verifyLockAccess(filePath: string, lockPath?: string): Promise<void> {
  const resolvedLockPath = lockPath ?? defaultLockPath(filePath);
  const options = lockOptionsFor(filePath, resolvedLockPath, silentLogger);
  let release: () => Promise<void>;
  try {
    release = await acquireLock(filePath, options);
  } catch (error) {
    if (isPermissionError(error)) {
      throw new SharedLogPermissionError(filePath, { cause: error, lockPath: resolvedLockPath });
    }
    throw error;
  }
  await release();
}

/**
 * Creates a writer for the shared log at `filePath`.
 */
export function createLogWriter(filePath: string, options: LogWriterOptions = {}): LogWriter {
  const debugLog = options.debugLog ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const lockOptions = lockOptionsFor(filePath, options.lockPath, debugLog);

  async function writeLine(line: string): Promise<void> {
    const release = await acquireLock(filePath, lockOptions);
    try {
      const handle = await fs.promises.open(filePath, 'a');
      try {
        await handle.write(line, null, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
    } finally {
      await release();
    }
  }

  async function append(author: string, body: string): Promise<void> {
    if (!body.trim()) {
      return;
    }

    const line = serializeRecord(createRecord(author, body, now()));

    try {
      await writeLine(line);
    } catch (error) {
      // The message is lost: nothing is surfaced or retried
      debugLog({
        type: 'error',
        source: 'writer',
        text: `Append to ${filePath} failed`,
        details: describeError(error),
      });
    }
  }

  return { append };
}
