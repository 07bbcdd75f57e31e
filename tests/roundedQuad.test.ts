/**
 * Rounded quad path construction
 */

import { describe, it, expect } from '@jest/globals';
import { buildRoundedPath, maxCornerRadius, roundCorner } from '../src/geometry/roundedQuad.js';
import type { ClosedPath, PathSegment, Quad, Vec2 } from '../src/geometry/types.js';

type ArcSegment = Extract<PathSegment, { kind: 'arc' }>;

const square: Quad = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 }
];

// Top face of the default box on a 200×200 viewport
const c = 3 * Math.cos(Math.PI / 6) * 40;
const rhombus: Quad = [
  { x: 100, y: 20 },
  { x: 100 + c, y: 80 },
  { x: 100, y: 140 },
  { x: 100 - c, y: 80 }
];

function arcsOf(path: ClosedPath): ArcSegment[] {
  return path.segments.filter((s): s is ArcSegment => s.kind === 'arc');
}

function expectNear(actual: Vec2, expected: Vec2, digits = 6) {
  expect(actual.x).toBeCloseTo(expected.x, digits);
  expect(actual.y).toBeCloseTo(expected.y, digits);
}

describe('buildRoundedPath', () => {
  const path = buildRoundedPath(...square, 2);

  it('should contain exactly 4 arcs and 4 lines between move and close', () => {
    const kinds = path.segments.map(s => s.kind);
    expect(kinds).toEqual([
      'move',
      'arc', 'line',
      'arc', 'line',
      'arc', 'line',
      'arc', 'line',
      'close'
    ]);
  });

  it('should end where it starts', () => {
    const first = path.segments[0];
    const last = path.segments[path.segments.length - 2];
    if (first.kind !== 'move' || last.kind !== 'line') {
      throw new Error('unexpected path shape');
    }
    expectNear(last.to, first.to);
  });

  it('should round a right-angled corner with a 90° clockwise arc', () => {
    const [firstArc] = arcsOf(path);
    expectNear(firstArc.center, { x: 2, y: 2 });
    expect(firstArc.radius).toBe(2);
    expect(firstArc.startAngle).toBeCloseTo(Math.PI, 10);
    expect(firstArc.sweepAngle).toBeCloseTo(Math.PI / 2, 10);
    expectNear(firstArc.to, { x: 2, y: 0 });
  });

  it('should place tangent points r away from each corner of a square', () => {
    const points = path.segments.flatMap(s => (s.kind === 'close' ? [] : [s.to]));
    const expected = [
      { x: 0, y: 2 },
      { x: 2, y: 0 }, { x: 8, y: 0 },
      { x: 10, y: 2 }, { x: 10, y: 8 },
      { x: 8, y: 10 }, { x: 2, y: 10 },
      { x: 0, y: 8 }, { x: 0, y: 2 }
    ];
    expect(points).toHaveLength(expected.length);
    points.forEach((p, i) => expectNear(p, expected[i]));
  });

  it('should end each arc at center + r·(cos, sin)(start + sweep)', () => {
    for (const arc of arcsOf(buildRoundedPath(...rhombus, 6))) {
      const end = arc.startAngle + arc.sweepAngle;
      expectNear(arc.to, {
        x: arc.center.x + arc.radius * Math.cos(end),
        y: arc.center.y + arc.radius * Math.sin(end)
      });
    }
  });

  it('should sweep the exterior angle at skewed corners', () => {
    const sweeps = arcsOf(buildRoundedPath(...rhombus, 6)).map(a => a.sweepAngle);
    expect(sweeps[0]).toBeCloseTo(Math.PI / 3, 10);
    expect(sweeps[1]).toBeCloseTo((2 * Math.PI) / 3, 10);
    expect(sweeps.reduce((sum, s) => sum + s, 0)).toBeCloseTo(2 * Math.PI, 10);
  });

  it('should start just past the first corner on a skewed quad', () => {
    const first = buildRoundedPath(...rhombus, 6).segments[0];
    if (first.kind !== 'move') throw new Error('expected move');
    // t = 6 / tan(60°) along the edge toward the last corner
    expectNear(first.to, { x: 97, y: 20 + Math.sqrt(3) }, 6);
  });

  it('should sweep counter-clockwise when the quad is wound the other way', () => {
    const reversed = buildRoundedPath(square[0], square[3], square[2], square[1], 2);
    for (const arc of arcsOf(reversed)) {
      expect(arc.sweepAngle).toBeCloseTo(-Math.PI / 2, 10);
    }
  });

  it('should degenerate to the plain quad for radius 0', () => {
    const flat = buildRoundedPath(...square, 0);
    const arcs = arcsOf(flat);
    expect(arcs).toHaveLength(4);
    arcs.forEach((arc, i) => {
      expect(arc.radius).toBe(0);
      expect(arc.sweepAngle).toBe(0);
      expect(arc.to).toEqual(square[i]);
    });
    expect(flat.segments[0]).toEqual({ kind: 'move', to: square[0] });
  });

  it('should not throw when two corners coincide', () => {
    const collapsed = buildRoundedPath(square[0], square[0], square[2], square[3], 3);
    const arcs = arcsOf(collapsed);
    expect(arcs[0].radius).toBe(0);
    expect(arcs[1].radius).toBe(0);
    expect(collapsed.segments).toHaveLength(10);
  });

  it('should treat a negative radius as 0', () => {
    expect(arcsOf(buildRoundedPath(...square, -4)).every(a => a.radius === 0)).toBe(true);
  });
});

describe('roundCorner', () => {
  it('should leave collinear edges sharp', () => {
    const arc = roundCorner({ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 10, y: 0 }, 2);
    expect(arc.radius).toBe(0);
    expect(arc.entry).toEqual({ x: 5, y: 0 });
    expect(arc.exit).toEqual({ x: 5, y: 0 });
  });
});

describe('maxCornerRadius', () => {
  it('should allow half the side of a square', () => {
    expect(maxCornerRadius(square)).toBeCloseTo(5, 10);
  });

  it('should be limited by the acute corners of a rhombus', () => {
    // edge 120, acute corner 60° → 60 · tan(30°)
    expect(maxCornerRadius(rhombus)).toBeCloseTo(60 * Math.tan(Math.PI / 6), 6);
  });

  it('should be 0 when a corner has a zero-length edge', () => {
    expect(maxCornerRadius([square[0], square[0], square[2], square[3]])).toBe(0);
  });
});
