/**
 * One-call renderers for the built-in surfaces
 */

import type { BoxSpecInput } from '../config/boxSpec.js';
import { renderBox } from './renderBox.js';
import { SvgSurface, type SvgSurfaceOptions } from './svgSurface.js';
import { CanvasSurface, type CanvasPathContext } from './canvasSurface.js';

/**
 * Anything with a size that hands out a 2D context
 */
export interface CanvasLike {
  width: number;
  height: number;
  getContext(contextId: '2d'): CanvasPathContext | null;
}

export interface RenderBoxToCanvasOptions {
  /** Painted over the whole canvas before the box */
  backgroundColor?: string;
}

/**
 * Render a box to an SVG document string
 *
 * @param options - Document size (default 200×200) and background
 */
export function renderBoxToSVG(spec: BoxSpecInput = {}, options: SvgSurfaceOptions = {}): string {
  const surface = new SvgSurface(options);
  renderBox(spec, surface);
  return surface.toSVG();
}

/**
 * Render a box onto a canvas, centered in its current size
 */
export function renderBoxToCanvas(
  canvas: CanvasLike,
  spec: BoxSpecInput = {},
  options: RenderBoxToCanvasOptions = {}
): void {
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error('Could not get 2D context from canvas');
  }

  if (options.backgroundColor !== undefined) {
    ctx.fillStyle = options.backgroundColor;
    ctx.fillRect(0, 0, canvas.width, canvas.height);
  }

  renderBox(spec, new CanvasSurface(ctx, canvas.width, canvas.height));
}
