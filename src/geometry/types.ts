/**
 * Canonical Geometry Types
 *
 * Pure geometry model with no renderer imports, no DOM/canvas usage.
 */

/**
 * 2D vector (x, y), in viewport pixels once projected
 */
export interface Vec2 {
  x: number;
  y: number;
}

/**
 * 3D vector (x, y, z), in scene units
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Names of the 8 corners of an axis-aligned box.
 * left/right = x vs x + width, back/front = y vs y + depth,
 * bottom/top = z vs z + height.
 */
export type CornerName =
  | 'bottomLeftBack'
  | 'bottomRightBack'
  | 'bottomLeftFront'
  | 'bottomRightFront'
  | 'topLeftBack'
  | 'topRightBack'
  | 'topLeftFront'
  | 'topRightFront';

export type BoxCorners<T> = Record<CornerName, T>;

/**
 * Exactly four points in traversal order
 */
export type Quad = readonly [Vec2, Vec2, Vec2, Vec2];

export type FaceName = 'bottom' | 'left' | 'right' | 'front' | 'back' | 'top';

/**
 * One projected face of the box
 */
export interface BoxFace {
  name: FaceName;
  vertices: Quad;
}

/**
 * Path commands understood by every drawing surface.
 *
 * Arc angles are in radians, measured in viewport space (y grows down),
 * so a positive sweep turns clockwise on screen.
 */
export type PathSegment =
  | { kind: 'move'; to: Vec2 }
  | { kind: 'line'; to: Vec2 }
  | {
      kind: 'arc';
      center: Vec2;
      radius: number;
      startAngle: number;
      sweepAngle: number;
      /** Point where the arc ends */
      to: Vec2;
    }
  | { kind: 'close' };

/**
 * Closed path: starts with `move`, ends with `close`
 */
export interface ClosedPath {
  segments: PathSegment[];
}
