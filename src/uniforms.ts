import type { FrameState } from './render/render-pass';
import type { ResourcePool } from './render/resource-pool';
import { Resources } from './render/bindings';

/** Byte size of each uniform, matching its WGSL declaration. */
export const UniformSize = {
  windowExtent: 8, // vec2<f32>
  deltaTime: 4,    // f32
  pointSize: 4,    // f32
  intensity: 4,    // f32
  windowPos: 8,    // vec2<f32>
} as const;

type UniformKey = keyof typeof UniformSize;

/**
 * Owns the per-frame uniform buffers and uploads them from a FrameState.
 *
 * Delta time is written every frame; the other values only when they
 * differ from the last upload. All writes go through `device.queue`, so
 * they land before the command buffer submitted for the same frame.
 */
export class FrameUniforms {
  private readonly device: GPUDevice;
  private readonly buffers: Record<UniformKey, GPUBuffer>;
  private readonly last = new Map<UniformKey, number[]>();

  constructor(device: GPUDevice, resources: ResourcePool) {
    this.device = device;
    const create = (key: UniformKey): GPUBuffer => {
      const buffer = device.createBuffer({
        label: Resources[key],
        size: UniformSize[key],
        usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
      });
      resources.setBuffer(Resources[key], buffer);
      return buffer;
    };
    this.buffers = {
      windowExtent: create('windowExtent'),
      deltaTime: create('deltaTime'),
      pointSize: create('pointSize'),
      intensity: create('intensity'),
      windowPos: create('windowPos'),
    };
  }

  write(frame: FrameState): void {
    this.upload('windowExtent', [frame.extent.width, frame.extent.height]);
    this.upload('deltaTime', [frame.deltaTime], true);
    this.upload('pointSize', [frame.pointSize]);
    this.upload('intensity', [frame.intensity]);
    this.upload('windowPos', [frame.windowPos[0], frame.windowPos[1]]);
  }

  /** Force every value to be re-uploaded on the next write. */
  invalidate(): void {
    this.last.clear();
  }

  private upload(key: UniformKey, values: number[], always = false): void {
    const prev = this.last.get(key);
    if (!always && prev && prev.length === values.length && prev.every((v, i) => v === values[i])) {
      return;
    }
    this.device.queue.writeBuffer(this.buffers[key], 0, new Float32Array(values));
    this.last.set(key, values);
  }
}
