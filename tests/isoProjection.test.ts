/**
 * Unit tests for the isometric projection
 */

import { describe, it, expect } from '@jest/globals';
import { project, projectToViewport } from '../src/geometry/isoProjection.js';

describe('project', () => {
  it('should project origin to (0, 0)', () => {
    const result = project(0, 0, 0, 30);
    expect(result.x).toBeCloseTo(0, 10);
    expect(result.y).toBeCloseTo(0, 10);
  });

  it('should reduce to (x − y, −z) at 0°', () => {
    expect(project(2, 1, 3, 0)).toEqual({ x: 1, y: -3 });
  });

  it('should reduce to (0, x + y − z) at 90°', () => {
    const result = project(2, 1, 5, 90);
    expect(result.x).toBeCloseTo(0, 10);
    expect(result.y).toBeCloseTo(-2, 10);
  });

  it('should project point on X axis with cos/sin of the angle', () => {
    const result = project(100, 0, 0, 30);
    expect(result.x).toBeCloseTo(100 * Math.cos(Math.PI / 6), 10);
    expect(result.y).toBeCloseTo(50, 10);
  });

  it('should mirror the Y axis horizontally', () => {
    const result = project(0, 100, 0, 30);
    expect(result.x).toBeCloseTo(-100 * Math.cos(Math.PI / 6), 10);
    expect(result.y).toBeCloseTo(50, 10);
  });

  it('should only lift points when z grows', () => {
    const low = project(1, 2, 0, 30);
    const high = project(1, 2, 4, 30);
    expect(high.x).toBe(low.x);
    expect(high.y).toBeCloseTo(low.y - 4, 10);
  });

  it('should be deterministic (same input → same output)', () => {
    const a = project(123.456, 789.012, 345.678, 30);
    const b = project(123.456, 789.012, 345.678, 30);
    expect(a).toEqual(b);
  });
});

describe('projectToViewport', () => {
  it('should put the top-back-left corner of the default box at (100, 20)', () => {
    const result = projectToViewport({ x: 0, y: 0, z: 2 }, 30, { x: 100, y: 100 }, 40);
    expect(result).toEqual({ x: 100, y: 20 });
  });

  it('should not mutate the input point', () => {
    const point = { x: 1, y: 2, z: 3 };
    projectToViewport(point, 30, { x: 0, y: 0 }, 10);
    expect(point).toEqual({ x: 1, y: 2, z: 3 });
  });
});
