/**
 * Geometry utilities
 * Small 2D vector helpers. All functions are pure and return new objects.
 */

import type { Vec2 } from '../geometry/types.js';

export const EPSILON = 1e-9;

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(a: Vec2, s: number): Vec2 {
  return { x: a.x * s, y: a.y * s };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

/**
 * z component of the 3D cross product; positive when b turns clockwise
 * from a in viewport space (y down)
 */
export function cross(a: Vec2, b: Vec2): number {
  return a.x * b.y - a.y * b.x;
}

export function length(a: Vec2): number {
  return Math.sqrt(a.x * a.x + a.y * a.y);
}

/**
 * Unit vector, or the zero vector for zero-length input
 */
export function normalize(a: Vec2): Vec2 {
  const l = length(a);
  return l > EPSILON ? { x: a.x / l, y: a.y / l } : { x: 0, y: 0 };
}

/**
 * Normalize an angle to 0-2π range
 */
export function normalizeAngle(angle: number): number {
  const turn = 2 * Math.PI;
  const normalized = angle % turn;
  return normalized < 0 ? normalized + turn : normalized;
}

/**
 * Angle of a vector in radians, 0-2π
 */
export function angleOf(a: Vec2): number {
  return normalizeAngle(Math.atan2(a.y, a.x));
}
