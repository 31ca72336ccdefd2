import type { WindowExtent } from '../types';
import type { ResourcePool } from './resource-pool';

export interface FrameState {
  pointCount: number;
  extent: WindowExtent;
  deltaTime: number;       // seconds
  pointSize: number;       // billboard diameter, px
  intensity: number;
  windowPos: [number, number];
  slot: number;            // point slot integrated + drawn this frame
  previousSlot: number;    // point slot drawn last frame
}

export interface RenderPass {
  readonly name: string;
  readonly reads: string[];
  readonly writes: string[];
  setup(device: GPUDevice, resources: ResourcePool): void;
  prepare(device: GPUDevice, frame: FrameState): void;
  execute(encoder: GPUCommandEncoder, frame: FrameState, resources: ResourcePool): void;
  resize(width: number, height: number): void;
  destroy(): void;
}
