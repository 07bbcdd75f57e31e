/**
 * Drawing Surface Contract
 *
 * The only boundary of the renderer. A surface accepts closed paths to fill
 * or stroke and reports its size so the box can be centered on it.
 */

import type { ClosedPath } from '../geometry/types.js';

export interface DrawingSurface {
  /** Surface width in pixels */
  readonly width: number;
  /** Surface height in pixels */
  readonly height: number;
  fillPath(path: ClosedPath, color: string): void;
  strokePath(path: ClosedPath, color: string, strokeWidthPx: number): void;
}

/**
 * Size options shared by the surfaces that own their size
 */
export interface SurfaceSize {
  width?: number;
  height?: number;
}
