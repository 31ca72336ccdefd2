// CPU mirror of the vertex and fragment math in particles.wgsl.

import type { WindowExtent } from './types';

/** Local radius where the edge falloff begins. */
export const FALLOFF_START = 0.75;

/** Unit-quad corner for a triangle-strip vertex index: (-1,-1) (1,-1) (-1,1) (1,1). */
export function billboardCorner(vertexIndex: number): [number, number] {
  const x = (vertexIndex & 1) * 2 - 1;
  const y = ((vertexIndex >> 1) & 1) * 2 - 1;
  return [x, y];
}

/** Map a position in pixels (origin top-left) to normalized device coordinates (+y up). */
export function worldToNdc(
  x: number,
  y: number,
  extent: WindowExtent,
): [number, number] {
  return [(x / extent.width) * 2 - 1, 1 - (y / extent.height) * 2];
}

/** Clip-space position of one billboard vertex. */
export function billboardVertex(
  vertexIndex: number,
  position: readonly [number, number],
  pointSize: number,
  extent: WindowExtent,
): [number, number] {
  const [cx, cy] = billboardCorner(vertexIndex);
  const half = pointSize * 0.5;
  return worldToNdc(position[0] + cx * half, position[1] + cy * half, extent);
}

/**
 * Fragment opacity at local radius `len` (0 at the center, 1 on the circle).
 * Zero on and outside the circle.
 */
export function billboardAlpha(len: number, intensity: number): number {
  if (len >= 1) return 0;
  if (len <= FALLOFF_START) return intensity;
  return Math.min(intensity, (1 - (len - FALLOFF_START)) * intensity);
}
