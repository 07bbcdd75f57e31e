/**
 * Recording Surface
 *
 * Keeps every paint call in order instead of drawing. Useful for asserting
 * draw order and for replaying a render onto another surface.
 */

import type { ClosedPath } from '../geometry/types.js';
import { DEFAULT_VIEWPORT_SIZE } from '../config/defaults.js';
import type { DrawingSurface, SurfaceSize } from './surface.js';

export type PaintCall =
  | { op: 'fill'; path: ClosedPath; color: string }
  | { op: 'stroke'; path: ClosedPath; color: string; strokeWidthPx: number };

export class RecordingSurface implements DrawingSurface {
  readonly width: number;
  readonly height: number;
  readonly calls: PaintCall[] = [];

  constructor(size: SurfaceSize = {}) {
    this.width = size.width ?? DEFAULT_VIEWPORT_SIZE;
    this.height = size.height ?? DEFAULT_VIEWPORT_SIZE;
  }

  fillPath(path: ClosedPath, color: string): void {
    this.calls.push({ op: 'fill', path, color });
  }

  strokePath(path: ClosedPath, color: string, strokeWidthPx: number): void {
    this.calls.push({ op: 'stroke', path, color, strokeWidthPx });
  }

  /**
   * Paint the recorded calls onto another surface
   */
  replay(target: DrawingSurface): void {
    for (const call of this.calls) {
      if (call.op === 'fill') {
        target.fillPath(call.path, call.color);
      } else {
        target.strokePath(call.path, call.color, call.strokeWidthPx);
      }
    }
  }
}
