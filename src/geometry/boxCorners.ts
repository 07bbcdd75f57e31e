/**
 * Box Corners
 *
 * Derives the 8 corners of an axis-aligned box and projects them.
 */

import type { BoxCorners, CornerName, Vec2, Vec3 } from './types.js';
import { projectToViewport } from './isoProjection.js';

export interface BoxGeometry {
  x: number;
  y: number;
  z: number;
  width: number;
  depth: number;
  height: number;
}

export const CORNER_NAMES: readonly CornerName[] = [
  'bottomLeftBack',
  'bottomRightBack',
  'bottomLeftFront',
  'bottomRightFront',
  'topLeftBack',
  'topRightBack',
  'topLeftFront',
  'topRightFront'
];

/**
 * Corners of {x, x+width} × {y, y+depth} × {z, z+height}
 */
export function computeBoxCorners(box: BoxGeometry): BoxCorners<Vec3> {
  const { x, y, z, width, depth, height } = box;
  const left = x;
  const right = x + width;
  const back = y;
  const front = y + depth;
  const bottom = z;
  const top = z + height;

  return {
    bottomLeftBack: { x: left, y: back, z: bottom },
    bottomRightBack: { x: right, y: back, z: bottom },
    bottomLeftFront: { x: left, y: front, z: bottom },
    bottomRightFront: { x: right, y: front, z: bottom },
    topLeftBack: { x: left, y: back, z: top },
    topRightBack: { x: right, y: back, z: top },
    topLeftFront: { x: left, y: front, z: top },
    topRightFront: { x: right, y: front, z: top }
  };
}

/**
 * Project every corner into viewport space
 *
 * @param center - Viewport center in pixels
 * @param scale - Pixels per projected unit
 */
export function projectBoxCorners(
  corners: BoxCorners<Vec3>,
  angleDegrees: number,
  center: Vec2,
  scale: number
): BoxCorners<Vec2> {
  const project = (name: CornerName): Vec2 =>
    projectToViewport(corners[name], angleDegrees, center, scale);

  return {
    bottomLeftBack: project('bottomLeftBack'),
    bottomRightBack: project('bottomRightBack'),
    bottomLeftFront: project('bottomLeftFront'),
    bottomRightFront: project('bottomRightFront'),
    topLeftBack: project('topLeftBack'),
    topRightBack: project('topRightBack'),
    topLeftFront: project('topLeftFront'),
    topRightFront: project('topRightFront')
  };
}
