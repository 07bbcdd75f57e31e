/**
 * Geometry Module Index
 *
 * Exports all geometry types and utilities
 */

export * from './types.js';
export * from './isoProjection.js';
export * from './boxCorners.js';
export * from './boxFaces.js';
export * from './roundedQuad.js';
