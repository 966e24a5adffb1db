/**
 * Input Queue
 *
 * Turns terminal-kit's pushed key events into the pull-style blocking read
 * the input loop expects. Events that arrive while nobody is reading are
 * kept in order.
 */

import type { InputReader, RawInput } from './types.js';

export interface InputQueue extends InputReader {
  push(input: RawInput): void;
  /** Inputs received but not yet read */
  pending(): number;
}

export function createInputQueue(): InputQueue {
  const buffered: RawInput[] = [];
  const waiting: Array<(input: RawInput) => void> = [];

  function push(input: RawInput): void {
    const resolve = waiting.shift();
    if (resolve) {
      resolve(input);
    } else {
      buffered.push(input);
    }
  }

  function next(): Promise<RawInput> {
    const input = buffered.shift();
    if (input) {
      return Promise.resolve(input);
    }
    return new Promise((resolve) => {
      waiting.push(resolve);
    });
  }

  function pending(): number {
    return buffered.length;
  }

  return {
    push,
    next,
    pending,
  };
}
