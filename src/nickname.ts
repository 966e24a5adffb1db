import { truncateToBytes } from './tui/text-width.js';

/** Name used when the nickname prompt itself fails */
export const UNREADABLE_NICKNAME = 'Anonymous';

/**
 * Default name for an empty answer
 */
export function defaultNickname(pid: number = process.pid): string {
  return `User-${pid}`;
}

/**
 * Turns a raw prompt answer into the session identity.
 *
 * @param raw - The answer, or null when it could not be read
 * @param maxBytes - UTF-8 byte limit; code points are never split
 */
export function resolveNickname(raw: string | null, maxBytes: number, pid: number = process.pid): string {
  if (raw === null) {
    return UNREADABLE_NICKNAME;
  }
  // Authors are written as <name> on one line
  const cleaned = truncateToBytes(raw.replace(/[\r\n<>]+/g, ' '), maxBytes).trim();
  return cleaned || defaultNickname(pid);
}
