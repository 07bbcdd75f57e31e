/**
 * Rounded-top isometric box renderer
 */

export * from './geometry/index.js';
export * from './config/defaults.js';
export {
  boxSpecSchema,
  parseBoxSpec,
  isDegenerate,
  InvalidBoxSpecError,
  type BoxSpec,
  type BoxSpecInput
} from './config/boxSpec.js';
export type { DrawingSurface, SurfaceSize } from './render/surface.js';
export { renderBox, viewportCenter, type BoxRenderReport } from './render/renderBox.js';
export { SvgSurface, pathToSvgData, type SvgSurfaceOptions } from './render/svgSurface.js';
export { CanvasSurface, type CanvasPathContext } from './render/canvasSurface.js';
export { RecordingSurface, type PaintCall } from './render/recordingSurface.js';
export {
  renderBoxToSVG,
  renderBoxToCanvas,
  type CanvasLike,
  type RenderBoxToCanvasOptions
} from './render/renderTargets.js';
