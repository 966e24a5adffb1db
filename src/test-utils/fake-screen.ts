// In-memory screen for tests: records what each viewport would paint

import { RenderError, type Screen, type ScreenSize, type Viewport } from '../tui/types.js';

export interface Placed {
  x: number;
  y: number;
  text: string;
}

/**
 * What a viewport showed at one refresh
 */
export interface Frame {
  bordered: boolean;
  writes: Placed[];
}

export interface FakeViewport extends Viewport {
  frames: Frame[];
  /** Clear/refresh calls in order, for lock-ordering checks */
  events: string[];
  lastFrame(): Frame | undefined;
}

export interface FakeScreen extends Screen {
  history: FakeViewport;
  input: FakeViewport;
  size: ScreenSize;
  clears: number;
  refreshes: number;
}

export function createFakeViewport(
  name: string,
  width: number,
  height: number,
  events: string[] = [],
  rejects: (text: string) => boolean = () => false,
): FakeViewport {
  let pending: Placed[] = [];
  let bordered = false;
  const frames: Frame[] = [];

  return {
    width,
    height,
    frames,
    events,
    clear() {
      pending = [];
      bordered = false;
      events.push(`${name}:clear`);
    },
    write(x, y, text) {
      if (rejects(text)) {
        throw new RenderError(`rejected ${text}`);
      }
      pending.push({ x, y, text });
    },
    border() {
      bordered = true;
    },
    refresh() {
      frames.push({ bordered, writes: [...pending] });
      events.push(`${name}:refresh`);
    },
    lastFrame() {
      return frames[frames.length - 1];
    },
  };
}

export function createFakeScreen(
  options: { width?: number; historyHeight?: number; rejects?: (text: string) => boolean } = {},
): FakeScreen {
  const width = options.width ?? 40;
  const historyHeight = options.historyHeight ?? 10;
  const events: string[] = [];

  const screen: FakeScreen = {
    history: createFakeViewport('history', width, historyHeight, events, options.rejects),
    input: createFakeViewport('input', width, 3, events, options.rejects),
    size: { width, height: historyHeight + 3 },
    clears: 0,
    refreshes: 0,
    querySize() {
      return { ...screen.size };
    },
    clear() {
      screen.clears++;
    },
    refresh() {
      screen.refreshes++;
    },
  };
  return screen;
}
