/**
 * Default style and geometry for a rendered box
 */

/** Pixels per projected unit */
export const DEFAULT_SCALE = 40;

/** Width and height of the default square viewport, in pixels */
export const DEFAULT_VIEWPORT_SIZE = 200;

export const BOX_DEFAULTS = {
  x: 0,
  y: 0,
  z: 0,
  width: 3,
  depth: 3,
  height: 2,
  angleDegrees: 30,
  scale: DEFAULT_SCALE,
  topCornerRadiusPx: 6,
  topColor: '#888888', // Gray
  sideColor: '#000000',
  outlineColor: '#000000',
  outlineWidthPx: 0, // ≤ 0 disables stroking
} as const;
