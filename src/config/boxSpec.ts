/**
 * Box Spec
 *
 * Entry contract for rendering. Every field is optional on input and
 * defaulted from BOX_DEFAULTS; invalid values are rejected here so the
 * geometry below never sees them.
 */

import { z } from 'zod';
import { BOX_DEFAULTS } from './defaults.js';

const finite = () => z.number().finite();
const extent = () => finite().nonnegative();
const color = () => z.string().min(1);

export const boxSpecSchema = z.object({
  x: finite().default(BOX_DEFAULTS.x),
  y: finite().default(BOX_DEFAULTS.y),
  z: finite().default(BOX_DEFAULTS.z),
  width: extent().default(BOX_DEFAULTS.width),
  depth: extent().default(BOX_DEFAULTS.depth),
  height: extent().default(BOX_DEFAULTS.height),
  angleDegrees: finite().default(BOX_DEFAULTS.angleDegrees),
  scale: finite().positive().default(BOX_DEFAULTS.scale),
  topCornerRadiusPx: finite().nonnegative().default(BOX_DEFAULTS.topCornerRadiusPx),
  topColor: color().default(BOX_DEFAULTS.topColor),
  sideColor: color().default(BOX_DEFAULTS.sideColor),
  outlineColor: color().default(BOX_DEFAULTS.outlineColor),
  outlineWidthPx: finite().default(BOX_DEFAULTS.outlineWidthPx),
});

/** What callers pass in: every field optional */
export type BoxSpecInput = z.input<typeof boxSpecSchema>;

/** Fully defaulted, validated spec */
export type BoxSpec = z.output<typeof boxSpecSchema>;

export class InvalidBoxSpecError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid box spec: ${issues.join('; ')}`);
    this.name = 'InvalidBoxSpecError';
    this.issues = issues;
  }
}

/**
 * Validate and default a box spec
 *
 * @throws InvalidBoxSpecError when any field is out of range
 */
export function parseBoxSpec(input: BoxSpecInput = {}): BoxSpec {
  const result = boxSpecSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidBoxSpecError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * A box with any zero extent collapses to a plane, line or point.
 * It still renders; its faces overlap.
 */
export function isDegenerate(spec: BoxSpec): boolean {
  return spec.width === 0 || spec.depth === 0 || spec.height === 0;
}
