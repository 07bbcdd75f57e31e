/**
 * Canvas Surface
 *
 * Replays closed paths onto a 2D canvas context. Only the members below are
 * used, so a browser CanvasRenderingContext2D or any compatible context
 * (node-canvas, skia-canvas) can be passed in.
 */

import type { ClosedPath } from '../geometry/types.js';
import type { DrawingSurface } from './surface.js';

export interface CanvasPathContext {
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number, counterclockwise?: boolean): void;
  closePath(): void;
  fill(): void;
  stroke(): void;
  fillRect(x: number, y: number, w: number, h: number): void;
}

export class CanvasSurface implements DrawingSurface {
  constructor(
    private readonly ctx: CanvasPathContext,
    readonly width: number,
    readonly height: number
  ) {}

  fillPath(path: ClosedPath, color: string): void {
    this.trace(path);
    this.ctx.fillStyle = color;
    this.ctx.fill();
  }

  strokePath(path: ClosedPath, color: string, strokeWidthPx: number): void {
    this.trace(path);
    this.ctx.strokeStyle = color;
    this.ctx.lineWidth = strokeWidthPx;
    this.ctx.stroke();
  }

  private trace(path: ClosedPath): void {
    const ctx = this.ctx;
    ctx.beginPath();

    for (const segment of path.segments) {
      switch (segment.kind) {
        case 'move':
          ctx.moveTo(segment.to.x, segment.to.y);
          break;
        case 'line':
          ctx.lineTo(segment.to.x, segment.to.y);
          break;
        case 'arc':
          if (segment.radius === 0) {
            ctx.lineTo(segment.to.x, segment.to.y);
          } else {
            ctx.arc(
              segment.center.x,
              segment.center.y,
              segment.radius,
              segment.startAngle,
              segment.startAngle + segment.sweepAngle,
              segment.sweepAngle < 0
            );
          }
          break;
        case 'close':
          ctx.closePath();
          break;
      }
    }
  }
}
