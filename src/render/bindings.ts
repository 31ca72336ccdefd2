/**
 * Bind group layouts shared between host and WGSL programs.
 *
 * Each layout is the host side of one shader's `@group(0)` declarations.
 * Binding order, type and stage visibility must stay in sync with the
 * matching file in `src/shaders/`.
 */

import type { ResourcePool } from './resource-pool';

/** ResourcePool names for everything the passes share. */
export const Resources = {
  windowExtent: 'window-extent',
  deltaTime: 'delta-time',
  pointSize: 'point-size',
  intensity: 'intensity',
  windowPos: 'window-pos',
  backgroundTexture: 'background',
  backgroundSampler: 'background-sampler',
  colorTarget: 'color-target',
  swapchain: 'swapchain',
} as const;

/** Pool name of a point storage buffer slot. */
export function pointSlotName(slot: number): string {
  return `points-${slot}`;
}

/** physics.wgsl: points (rw), window extent, delta time. */
export const PHYSICS_LAYOUT: GPUBindGroupLayoutDescriptor = {
  label: 'physics-layout',
  entries: [
    { binding: 0, visibility: GPUShaderStage.COMPUTE, buffer: { type: 'storage' } },
    { binding: 1, visibility: GPUShaderStage.COMPUTE, buffer: { type: 'uniform' } },
    { binding: 2, visibility: GPUShaderStage.COMPUTE, buffer: { type: 'uniform' } },
  ],
};

/** particles.wgsl: points (ro), window extent, point size, intensity. */
export const PARTICLE_LAYOUT: GPUBindGroupLayoutDescriptor = {
  label: 'particle-layout',
  entries: [
    { binding: 0, visibility: GPUShaderStage.VERTEX, buffer: { type: 'read-only-storage' } },
    { binding: 1, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
    { binding: 2, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
    { binding: 3, visibility: GPUShaderStage.FRAGMENT, buffer: { type: 'uniform' } },
  ],
};

/** background.wgsl: texture, sampler, window extent, window position. */
export const BACKGROUND_LAYOUT: GPUBindGroupLayoutDescriptor = {
  label: 'background-layout',
  entries: [
    { binding: 0, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: 'float', viewDimension: '2d' } },
    { binding: 1, visibility: GPUShaderStage.FRAGMENT, sampler: { type: 'filtering' } },
    { binding: 2, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
    { binding: 3, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
  ],
};

/** points.wgsl: points (ro), window extent, intensity. */
export const POINT_LIST_LAYOUT: GPUBindGroupLayoutDescriptor = {
  label: 'point-list-layout',
  entries: [
    { binding: 0, visibility: GPUShaderStage.VERTEX, buffer: { type: 'read-only-storage' } },
    { binding: 1, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
    { binding: 2, visibility: GPUShaderStage.FRAGMENT, buffer: { type: 'uniform' } },
  ],
};

/** Standard alpha-over blending. */
export const ALPHA_BLEND: GPUBlendState = {
  color: { srcFactor: 'src-alpha', dstFactor: 'one-minus-src-alpha', operation: 'add' },
  alpha: { srcFactor: 'one', dstFactor: 'one-minus-src-alpha', operation: 'add' },
};

/**
 * Look up every point slot registered in the pool, in slot order.
 * Throws if none is registered.
 */
export function collectPointSlots(
  resources: ResourcePool,
  passName: string,
): GPUBuffer[] {
  const slots: GPUBuffer[] = [];
  for (let slot = 0; ; slot++) {
    const buffer = resources.getBuffer(pointSlotName(slot));
    if (!buffer) break;
    slots.push(buffer);
  }
  if (slots.length === 0) {
    throw new Error(`${passName}.setup: missing '${pointSlotName(0)}' in ResourcePool`);
  }
  return slots;
}

/**
 * One bind group per point slot: the slot's buffer at binding 0, then
 * `uniforms` at bindings 1..n in order.
 */
export function createSlotBindGroups(
  device: GPUDevice,
  layout: GPUBindGroupLayout,
  slots: readonly GPUBuffer[],
  uniforms: readonly GPUBuffer[],
  label: string,
): GPUBindGroup[] {
  return slots.map((points, slot) => device.createBindGroup({
    label: `${label}-${slot}`,
    layout,
    entries: [
      { binding: 0, resource: { buffer: points } },
      ...uniforms.map((buffer, i) => ({ binding: i + 1, resource: { buffer } })),
    ],
  }));
}
