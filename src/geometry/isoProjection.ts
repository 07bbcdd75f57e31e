/**
 * Isometric Projection
 *
 * Oblique projection parameterised by a single angle. Height (z) only lifts
 * a point on screen; x and y both move it horizontally and vertically.
 * Deterministic: same input → same output always.
 */

import type { Vec2, Vec3 } from './types.js';

/**
 * Project a 3D point to 2D
 *
 * isoX = (x − y)·cos(angle), isoY = (x + y)·sin(angle) − z
 *
 * @param angleDegrees - Projection angle, conventionally 30
 * @returns Projected offset in scene units (NEW object)
 */
export function project(x: number, y: number, z: number, angleDegrees: number): Vec2 {
  const rad = angleDegrees * (Math.PI / 180);

  return {
    x: (x - y) * Math.cos(rad),
    y: (x + y) * Math.sin(rad) - z
  };
}

/**
 * Project a 3D point and map it into viewport space:
 * center + projected · scale
 *
 * @param center - Viewport center in pixels
 * @param scale - Pixels per projected unit
 */
export function projectToViewport(
  point: Vec3,
  angleDegrees: number,
  center: Vec2,
  scale: number
): Vec2 {
  const projected = project(point.x, point.y, point.z, angleDegrees);

  return {
    x: center.x + projected.x * scale,
    y: center.y + projected.y * scale
  };
}
