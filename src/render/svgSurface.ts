/**
 * SVG Surface
 *
 * Collects painted paths as <path> elements and serialises them into a
 * standalone SVG document.
 */

import type { ClosedPath } from '../geometry/types.js';
import { DEFAULT_VIEWPORT_SIZE } from '../config/defaults.js';
import type { DrawingSurface, SurfaceSize } from './surface.js';

export interface SvgSurfaceOptions extends SurfaceSize {
  /** Fills the whole document behind the box when set */
  backgroundColor?: string;
}

function fmt(n: number): string {
  return String(Number(n.toFixed(3)));
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;');
}

/**
 * SVG path data for a closed path
 *
 * Zero-radius arcs become straight lines to their end point.
 */
export function pathToSvgData(path: ClosedPath): string {
  const commands: string[] = [];

  for (const segment of path.segments) {
    switch (segment.kind) {
      case 'move':
        commands.push(`M ${fmt(segment.to.x)} ${fmt(segment.to.y)}`);
        break;
      case 'line':
        commands.push(`L ${fmt(segment.to.x)} ${fmt(segment.to.y)}`);
        break;
      case 'arc': {
        if (segment.radius === 0) {
          commands.push(`L ${fmt(segment.to.x)} ${fmt(segment.to.y)}`);
          break;
        }
        const largeArc = Math.abs(segment.sweepAngle) > Math.PI ? 1 : 0;
        const sweepFlag = segment.sweepAngle > 0 ? 1 : 0;
        const r = fmt(segment.radius);
        commands.push(`A ${r} ${r} 0 ${largeArc} ${sweepFlag} ${fmt(segment.to.x)} ${fmt(segment.to.y)}`);
        break;
      }
      case 'close':
        commands.push('Z');
        break;
    }
  }

  return commands.join(' ');
}

export class SvgSurface implements DrawingSurface {
  readonly width: number;
  readonly height: number;
  private readonly backgroundColor: string | undefined;
  private readonly elements: string[] = [];

  constructor(options: SvgSurfaceOptions = {}) {
    this.width = options.width ?? DEFAULT_VIEWPORT_SIZE;
    this.height = options.height ?? DEFAULT_VIEWPORT_SIZE;
    this.backgroundColor = options.backgroundColor;
  }

  fillPath(path: ClosedPath, color: string): void {
    this.elements.push(
      `<path d="${pathToSvgData(path)}" fill="${escapeAttribute(color)}" stroke="none" />`
    );
  }

  strokePath(path: ClosedPath, color: string, strokeWidthPx: number): void {
    this.elements.push(
      `<path d="${pathToSvgData(path)}" fill="none" stroke="${escapeAttribute(color)}" stroke-width="${fmt(strokeWidthPx)}" stroke-linejoin="round" />`
    );
  }

  toSVG(): string {
    const body = [...this.elements];
    if (this.backgroundColor !== undefined) {
      body.unshift(
        `<rect width="${this.width}" height="${this.height}" fill="${escapeAttribute(this.backgroundColor)}" />`
      );
    }

    return [
      '<?xml version="1.0" encoding="UTF-8"?>',
      `<svg width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}" xmlns="http://www.w3.org/2000/svg">`,
      ...body.map(element => `  ${element}`),
      '</svg>'
    ].join('\n');
  }
}
