// Chat record formatting for the shared log
// One record is exactly one line: `[HH:MM:SS] <author> body\n`

/**
 * A single chat line
 */
export interface ChatRecord {
  /** Local wall-clock time, HH:MM:SS */
  timestamp: string;
  author: string;
  body: string;
}

export const JOIN_MESSAGE = 'joined the room';
export const LEAVE_MESSAGE = 'left the room';

const LINE_BREAKS = /[\r\n]+/g;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats a Date as HH:MM:SS in local time
 */
export function formatClock(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/**
 * Replaces embedded line breaks so the value stays on one line
 */
export function singleLine(text: string): string {
  return text.replace(LINE_BREAKS, ' ');
}

export function createRecord(author: string, body: string, now: Date = new Date()): ChatRecord {
  return {
    timestamp: formatClock(now),
    author: singleLine(author),
    body: singleLine(body),
  };
}

/**
 * Serializes a record, including the trailing newline
 */
export function serializeRecord(record: ChatRecord): string {
  return `[${record.timestamp}] <${record.author}> ${record.body}\n`;
}

/**
 * Header written once when the shared log is first created
 */
export function formatHeader(now: Date = new Date()): string {
  return `[System] Chat room created at ${now.toISOString()}\n`;
}
