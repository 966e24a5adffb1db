/**
 * Viewport Module
 *
 * A viewport keeps a display list of the writes made since its last clear and
 * paints them on refresh, so a repaint is cleared and drawn in one pass.
 */

import { clipToWidth, expandTabs } from './text-width.js';
import { RenderError, type Viewport } from './types.js';

/**
 * Placement of a viewport on the terminal, 1-based like terminal-kit
 */
export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Low-level drawing primitives provided by the terminal library
 */
export interface Painter {
  moveTo(x: number, y: number): void;
  /** Write text at the cursor without interpreting markup */
  write(text: string): void;
}

interface DrawOp {
  x: number;
  y: number;
  text: string;
}

// C0 controls and DEL; tabs are expanded before the check
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x1f\x7f]/;

const BORDER = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
};

/**
 * Creates a viewport drawing into `region` through `painter`.
 */
export function createViewport(region: Region, painter: Painter): Viewport {
  let ops: DrawOp[] = [];
  let borderOps: DrawOp[] = [];

  function clear(): void {
    ops = [];
    borderOps = [];
  }

  function write(x: number, y: number, text: string): void {
    if (y < 0 || y >= region.height || x < 0 || x >= region.width) {
      throw new RenderError(`Position (${x}, ${y}) is outside a ${region.width}x${region.height} viewport`);
    }
    const expanded = expandTabs(text);
    if (CONTROL_CHARS.test(expanded)) {
      throw new RenderError('Text contains control characters');
    }
    ops.push({ x, y, text: clipToWidth(expanded, region.width - x) });
  }

  function border(): void {
    const { width, height } = region;
    if (width < 2 || height < 2) return;

    const inner = BORDER.horizontal.repeat(width - 2);
    borderOps = [
      { x: 0, y: 0, text: `${BORDER.topLeft}${inner}${BORDER.topRight}` },
      { x: 0, y: height - 1, text: `${BORDER.bottomLeft}${inner}${BORDER.bottomRight}` },
    ];
    for (let row = 1; row < height - 1; row++) {
      borderOps.push({ x: 0, y: row, text: BORDER.vertical });
      borderOps.push({ x: width - 1, y: row, text: BORDER.vertical });
    }
  }

  function refresh(): void {
    const blank = ' '.repeat(region.width);
    for (let row = 0; row < region.height; row++) {
      painter.moveTo(region.x, region.y + row);
      painter.write(blank);
    }
    for (const op of [...borderOps, ...ops]) {
      if (op.text.length === 0) continue;
      painter.moveTo(region.x + op.x, region.y + op.y);
      painter.write(op.text);
    }
  }

  return {
    get width() {
      return region.width;
    },
    get height() {
      return region.height;
    },
    clear,
    write,
    border,
    refresh,
  };
}
