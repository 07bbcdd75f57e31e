/**
 * Rounded Quad Path
 *
 * Builds a closed path for a quadrilateral with every corner replaced by a
 * circular arc. Each arc is derived from the corner's own edge directions,
 * so any convex quad rounds correctly whatever its orientation or skew:
 *
 *   u1, u2   unit vectors from the corner toward its two neighbours
 *   θ        interior angle, acos(u1 · u2)
 *   t        r / tan(θ/2), distance from the corner to each tangent point
 *   center   corner + bisector(u1, u2) · r / sin(θ/2)
 *   sweep    π − θ, signed by the direction the outline turns
 *
 * For a right-angled corner the sweep is the familiar 90°; the four sweeps
 * of a convex quad always add up to a full turn.
 *
 * No clamping happens here. Radii too large for the quad produce
 * overlapping segments; use maxCornerRadius() to bound the radius first.
 */

import type { ClosedPath, PathSegment, Quad, Vec2 } from './types.js';
import { EPSILON, add, angleOf, cross, dot, length, normalize, scale, sub } from '../utils/geom.js';

/**
 * Arc that replaces one corner
 */
export interface CornerArc {
  center: Vec2;
  radius: number;
  startAngle: number;
  sweepAngle: number;
  /** Tangent point on the incoming edge */
  entry: Vec2;
  /** Tangent point on the outgoing edge */
  exit: Vec2;
}

interface CornerFrame {
  toPrev: Vec2;
  toNext: Vec2;
  prevLength: number;
  nextLength: number;
  /** Interior angle in radians */
  theta: number;
}

function cornerFrame(prev: Vec2, corner: Vec2, next: Vec2): CornerFrame | null {
  const toPrev = sub(prev, corner);
  const toNext = sub(next, corner);
  const prevLength = length(toPrev);
  const nextLength = length(toNext);

  if (prevLength < EPSILON || nextLength < EPSILON) {
    return null;
  }

  const u1 = scale(toPrev, 1 / prevLength);
  const u2 = scale(toNext, 1 / nextLength);
  const cosTheta = Math.max(-1, Math.min(1, dot(u1, u2)));

  return {
    toPrev: u1,
    toNext: u2,
    prevLength,
    nextLength,
    theta: Math.acos(cosTheta)
  };
}

function sharpCorner(corner: Vec2): CornerArc {
  return {
    center: corner,
    radius: 0,
    startAngle: 0,
    sweepAngle: 0,
    entry: corner,
    exit: corner
  };
}

/**
 * Compute the arc rounding `corner`, given its neighbours in traversal order
 *
 * Zero-length edges, collinear edges and a zero radius all yield a
 * zero-radius arc sitting on the corner itself.
 */
export function roundCorner(prev: Vec2, corner: Vec2, next: Vec2, radius: number): CornerArc {
  const frame = cornerFrame(prev, corner, next);
  const r = Math.max(0, radius);

  if (!frame || r === 0) {
    return sharpCorner(corner);
  }

  const halfTheta = frame.theta / 2;
  // Straight through (θ = π) or folded back (θ = 0): nothing to round
  if (Math.sin(frame.theta) < EPSILON) {
    return sharpCorner(corner);
  }

  const tangentDistance = r / Math.tan(halfTheta);
  const centerDistance = r / Math.sin(halfTheta);
  const bisector = normalize(add(frame.toPrev, frame.toNext));

  const center = add(corner, scale(bisector, centerDistance));
  const entry = add(corner, scale(frame.toPrev, tangentDistance));
  const exit = add(corner, scale(frame.toNext, tangentDistance));

  const turn = cross(sub(corner, prev), sub(next, corner));
  const sweepMagnitude = Math.PI - frame.theta;

  return {
    center,
    radius: r,
    startAngle: angleOf(sub(entry, center)),
    sweepAngle: turn >= 0 ? sweepMagnitude : -sweepMagnitude,
    entry,
    exit
  };
}

/**
 * Build the rounded path p1 → p2 → p3 → p4 → close
 *
 * The path starts at p1's incoming tangent point and, for each corner in
 * turn, emits the corner arc followed by a line to the next corner's
 * incoming tangent point. The last line returns to the start.
 */
export function buildRoundedPath(
  p1: Vec2,
  p2: Vec2,
  p3: Vec2,
  p4: Vec2,
  cornerRadius: number
): ClosedPath {
  const quad: Quad = [p1, p2, p3, p4];
  const arcs = quad.map((corner, i) =>
    roundCorner(quad[(i + 3) % 4], corner, quad[(i + 1) % 4], cornerRadius)
  );

  const segments: PathSegment[] = [{ kind: 'move', to: arcs[0].entry }];

  arcs.forEach((arc, i) => {
    segments.push({
      kind: 'arc',
      center: arc.center,
      radius: arc.radius,
      startAngle: arc.startAngle,
      sweepAngle: arc.sweepAngle,
      to: arc.exit
    });
    segments.push({ kind: 'line', to: arcs[(i + 1) % 4].entry });
  });

  segments.push({ kind: 'close' });

  return { segments };
}

/**
 * Largest radius that keeps every pair of tangent points on a shared edge
 * from crossing: min over corners of (shorter adjacent edge / 2) · tan(θ/2).
 *
 * Returns 0 when any corner is degenerate.
 */
export function maxCornerRadius(quad: Quad): number {
  let max = Infinity;

  quad.forEach((corner, i) => {
    const frame = cornerFrame(quad[(i + 3) % 4], corner, quad[(i + 1) % 4]);
    if (!frame) {
      max = 0;
      return;
    }
    if (Math.sin(frame.theta) < EPSILON) {
      // Collinear edges impose no limit; folded ones leave no room
      if (frame.theta < Math.PI / 2) max = 0;
      return;
    }
    const halfEdge = Math.min(frame.prevLength, frame.nextLength) / 2;
    max = Math.min(max, halfEdge * Math.tan(frame.theta / 2));
  });

  return max;
}
