/**
 * Display width heuristic shared by the prompt, the input box and viewports.
 *
 * Any code point above ASCII is counted as two columns. Accented Latin text
 * is over-counted; CJK is never under-counted.
 */

/**
 * Display columns of a single code point
 */
export function charWidth(char: string): number {
  const codePoint = char.codePointAt(0) ?? 0;
  return codePoint > 127 ? 2 : 1;
}

export function displayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    width += charWidth(char);
  }
  return width;
}

export const TAB_SIZE = 8;

/**
 * Replace tabs with spaces up to the next tab stop, counted from the start
 * of `text` in heuristic columns
 */
export function expandTabs(text: string, tabSize: number = TAB_SIZE): string {
  if (!text.includes('\t')) return text;

  let column = 0;
  let out = '';
  for (const char of text) {
    if (char === '\t') {
      const pad = tabSize - (column % tabSize);
      out += ' '.repeat(pad);
      column += pad;
    } else {
      out += char;
      column += charWidth(char);
    }
  }
  return out;
}

/**
 * Longest prefix of `text` that fits in `maxWidth` columns
 */
export function clipToWidth(text: string, maxWidth: number): string {
  let width = 0;
  let end = 0;
  for (const char of text) {
    width += charWidth(char);
    if (width > maxWidth) break;
    end += char.length;
  }
  return text.slice(0, end);
}

/**
 * Text to show in the input box. When the buffer is too wide only the last
 * `floor(maxWidth / 2)` code points are shown; the buffer itself is untouched.
 */
export function tailForInput(text: string, maxWidth: number): string {
  if (displayWidth(text) <= maxWidth) {
    return text;
  }
  const keep = Math.floor(maxWidth / 2);
  if (keep <= 0) {
    return '';
  }
  return Array.from(text).slice(-keep).join('');
}

/**
 * Zero-based column that centers `text` in `totalWidth`
 */
export function centerColumn(text: string, totalWidth: number): number {
  return Math.max(0, Math.floor((totalWidth - displayWidth(text)) / 2));
}

/**
 * Cut `text` to at most `maxBytes` UTF-8 bytes without splitting a code point
 */
export function truncateToBytes(text: string, maxBytes: number): string {
  let bytes = 0;
  let end = 0;
  for (const char of text) {
    bytes += Buffer.byteLength(char, 'utf-8');
    if (bytes > maxBytes) break;
    end += char.length;
  }
  return text.slice(0, end);
}
