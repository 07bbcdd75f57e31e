/**
 * Box Renderer
 *
 * Paints one rounded-top box onto a drawing surface:
 * - five flat faces, fill with sideColor, in fixed order bottom → back
 * - the rounded top face last, fill with topColor
 * Each face is stroked with outlineColor when outlineWidthPx > 0.
 */

import type { BoxSpec, BoxSpecInput } from '../config/boxSpec.js';
import { InvalidBoxSpecError, isDegenerate, parseBoxSpec } from '../config/boxSpec.js';
import { CORNER_NAMES, computeBoxCorners, projectBoxCorners } from '../geometry/boxCorners.js';
import { buildBoxFaces, buildQuadPath } from '../geometry/boxFaces.js';
import { buildRoundedPath, maxCornerRadius } from '../geometry/roundedQuad.js';
import type { BoxCorners, ClosedPath, FaceName, Vec2 } from '../geometry/types.js';
import { debug, warn } from '../utils/debug.js';
import type { DrawingSurface } from './surface.js';

/**
 * What a render actually did
 */
export interface BoxRenderReport {
  /** Faces in the order they were painted */
  faces: FaceName[];
  /** Radius used for the top face after clamping */
  cornerRadiusPx: number;
  radiusClamped: boolean;
  /** True when width, depth or height is zero */
  degenerate: boolean;
}

export function viewportCenter(surface: Pick<DrawingSurface, 'width' | 'height'>): Vec2 {
  return { x: surface.width / 2, y: surface.height / 2 };
}

function paintFace(surface: DrawingSurface, path: ClosedPath, fillColor: string, spec: BoxSpec): void {
  surface.fillPath(path, fillColor);
  if (spec.outlineWidthPx > 0) {
    surface.strokePath(path, spec.outlineColor, spec.outlineWidthPx);
  }
}

/**
 * Large but finite inputs can still overflow once projected and scaled
 */
function assertFiniteCorners(projected: BoxCorners<Vec2>): void {
  const overflowed = CORNER_NAMES.filter(name => {
    const p = projected[name];
    return !Number.isFinite(p.x) || !Number.isFinite(p.y);
  });
  if (overflowed.length > 0) {
    throw new InvalidBoxSpecError(
      overflowed.map(name => `${name}: Projected corner is not finite`)
    );
  }
}

/**
 * Render a box onto a surface
 *
 * @param input - Box spec; missing fields take their defaults
 * @throws InvalidBoxSpecError when the spec fails validation or its
 * projected corners overflow
 */
export function renderBox(input: BoxSpecInput, surface: DrawingSurface): BoxRenderReport {
  const spec = parseBoxSpec(input);
  const center = viewportCenter(surface);

  const corners = computeBoxCorners(spec);
  const projected = projectBoxCorners(corners, spec.angleDegrees, center, spec.scale);
  assertFiniteCorners(projected);
  const faces = buildBoxFaces(projected);

  const painted: FaceName[] = [];
  let cornerRadiusPx = spec.topCornerRadiusPx;
  let radiusClamped = false;

  for (const face of faces) {
    if (face.name !== 'top') {
      paintFace(surface, buildQuadPath(face.vertices), spec.sideColor, spec);
      painted.push(face.name);
      continue;
    }

    const limit = maxCornerRadius(face.vertices);
    if (cornerRadiusPx > limit) {
      warn('Top corner radius too large for face, clamping', {
        requested: cornerRadiusPx,
        clampedTo: limit
      });
      cornerRadiusPx = limit;
      radiusClamped = true;
    }

    const [p1, p2, p3, p4] = face.vertices;
    paintFace(surface, buildRoundedPath(p1, p2, p3, p4, cornerRadiusPx), spec.topColor, spec);
    painted.push(face.name);
  }

  const report: BoxRenderReport = {
    faces: painted,
    cornerRadiusPx,
    radiusClamped,
    degenerate: isDegenerate(spec)
  };

  debug('Rendered box', report);

  return report;
}
