import type { WindowExtent } from './types';
import { POINT_STRIDE_FLOATS } from './point-store';

/** Points per compute workgroup (matches physics.wgsl @workgroup_size). */
export const PHYSICS_WORKGROUP_SIZE = 64;

/** Number of workgroups dispatched for `count` points. */
export function physicsWorkgroupCount(count: number): number {
  if (count <= 0) return 0;
  return Math.ceil(count / PHYSICS_WORKGROUP_SIZE);
}

/**
 * Advance the point at `index` of a packed point array by one step
 * (CPU reference of physics.wgsl).
 */
export function stepPoint(
  data: Float32Array,
  index: number,
  extent: WindowExtent,
  deltaTime: number,
): void {
  const o = index * POINT_STRIDE_FLOATS;
  let px = data[o] + data[o + 2] * deltaTime;
  let py = data[o + 1] + data[o + 3] * deltaTime;

  if (px < 0 || px > extent.width) data[o + 2] = -data[o + 2];
  if (py < 0 || py > extent.height) data[o + 3] = -data[o + 3];

  px = Math.min(Math.max(px, 0), extent.width);
  py = Math.min(Math.max(py, 0), extent.height);
  data[o] = px;
  data[o + 1] = py;
}

/**
 * Run one physics dispatch over `count` points the way the GPU does:
 * every invocation of every workgroup runs, and invocations at or past
 * `count` return without touching memory.
 *
 * Returns the number of invocations launched.
 */
export function stepPoints(
  data: Float32Array,
  count: number,
  extent: WindowExtent,
  deltaTime: number,
): number {
  const invocations = physicsWorkgroupCount(count) * PHYSICS_WORKGROUP_SIZE;
  for (let i = 0; i < invocations; i++) {
    if (i >= count) continue;
    stepPoint(data, i, extent, deltaTime);
  }
  return invocations;
}
