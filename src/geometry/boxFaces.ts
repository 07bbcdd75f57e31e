/**
 * Box Faces
 *
 * Groups projected corners into faces in the fixed painter's order.
 * There is no depth sort: the order below is what makes the top face
 * cover the side faces along their shared edges.
 */

import type { BoxCorners, BoxFace, ClosedPath, CornerName, FaceName, Quad, Vec2 } from './types.js';

type FaceCorners = readonly [CornerName, CornerName, CornerName, CornerName];

/**
 * Faces in draw order, back to front. `top` is always last.
 */
export const FACE_LAYOUT: ReadonlyArray<{ name: FaceName; corners: FaceCorners }> = [
  { name: 'bottom', corners: ['bottomLeftBack', 'bottomRightBack', 'bottomRightFront', 'bottomLeftFront'] },
  { name: 'left', corners: ['bottomLeftBack', 'topLeftBack', 'topLeftFront', 'bottomLeftFront'] },
  { name: 'right', corners: ['bottomRightBack', 'topRightBack', 'topRightFront', 'bottomRightFront'] },
  { name: 'front', corners: ['bottomLeftFront', 'topLeftFront', 'topRightFront', 'bottomRightFront'] },
  { name: 'back', corners: ['bottomLeftBack', 'topLeftBack', 'topRightBack', 'bottomRightBack'] },
  { name: 'top', corners: ['topLeftBack', 'topRightBack', 'topRightFront', 'topLeftFront'] }
];

/**
 * Build all six faces from projected corners, top face last
 */
export function buildBoxFaces(projected: BoxCorners<Vec2>): BoxFace[] {
  return FACE_LAYOUT.map(({ name, corners }) => {
    const [a, b, c, d] = corners;
    const vertices: Quad = [projected[a], projected[b], projected[c], projected[d]];
    return { name, vertices };
  });
}

/**
 * Straight-edged closed path through the quad's vertices
 */
export function buildQuadPath(quad: Quad): ClosedPath {
  const [p1, p2, p3, p4] = quad;
  return {
    segments: [
      { kind: 'move', to: p1 },
      { kind: 'line', to: p2 },
      { kind: 'line', to: p3 },
      { kind: 'line', to: p4 },
      { kind: 'close' }
    ]
  };
}
