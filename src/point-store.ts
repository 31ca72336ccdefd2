/**
 * GPU-resident point state.
 *
 * Points are packed as `[px, py, vx, vy]` f32 quadruples (the WGSL `Point`
 * struct: two vec2<f32>, 16 bytes). The store owns one buffer in `single`
 * mode and two in `ping-pong` mode; every slot has the same size and
 * layout so each pass binds any slot with one layout.
 */

import type { BufferMode, Point, RandomSource, WindowExtent } from './types';
import type { ResourcePool } from './render/resource-pool';
import { pointSlotName } from './render/bindings';

/** Number of f32 values per point in the GPU buffer. */
export const POINT_STRIDE_FLOATS = 4;

/** Byte size of a single point in the GPU buffer. */
export const POINT_STRIDE_BYTES = POINT_STRIDE_FLOATS * 4;

const MIN_SPEED = 1;
const MAX_SPEED = 3;

/** Pack points into the GPU layout. */
export function packPoints(points: readonly Point[]): Float32Array<ArrayBuffer> {
  const data = new Float32Array(points.length * POINT_STRIDE_FLOATS);
  points.forEach((p, i) => {
    const o = i * POINT_STRIDE_FLOATS;
    data[o] = p.position[0];
    data[o + 1] = p.position[1];
    data[o + 2] = p.velocity[0];
    data[o + 3] = p.velocity[1];
  });
  return data;
}

/** Read point `index` back out of a packed array. */
export function unpackPoint(data: Float32Array, index: number): Point {
  const o = index * POINT_STRIDE_FLOATS;
  return {
    position: [data[o], data[o + 1]],
    velocity: [data[o + 2], data[o + 3]],
  };
}

/**
 * Random initial state: integer positions inside the extent, each velocity
 * component with magnitude in [1, 3) and an independent random sign.
 */
export function seedPoints(
  count: number,
  extent: WindowExtent,
  random: RandomSource = Math.random,
): Float32Array<ArrayBuffer> {
  const data = new Float32Array(count * POINT_STRIDE_FLOATS);
  const width = Math.max(1, Math.floor(extent.width));
  const height = Math.max(1, Math.floor(extent.height));
  for (let i = 0; i < count; i++) {
    const o = i * POINT_STRIDE_FLOATS;
    data[o] = Math.floor(random() * width);
    data[o + 1] = Math.floor(random() * height);
    const signX = random() < 0.5 ? -1 : 1;
    const signY = random() < 0.5 ? -1 : 1;
    data[o + 2] = (MIN_SPEED + random() * (MAX_SPEED - MIN_SPEED)) * signX;
    data[o + 3] = (MIN_SPEED + random() * (MAX_SPEED - MIN_SPEED)) * signY;
  }
  return data;
}

/** Slots read and written by one frame. */
export interface SlotPair {
  /** Slot rendered by the previous frame. */
  previous: number;
  /** Slot integrated and rendered by this frame. */
  current: number;
}

export class PointStore {
  readonly count: number;
  readonly byteLength: number;
  readonly mode: BufferMode;

  private readonly device: GPUDevice;
  private readonly buffers: GPUBuffer[] = [];
  private _current = 0;

  constructor(device: GPUDevice, count: number, mode: BufferMode = 'single') {
    if (!Number.isInteger(count) || count <= 0) {
      throw new Error(`PointStore: count must be a positive integer, got ${count}`);
    }
    this.device = device;
    this.count = count;
    this.mode = mode;
    this.byteLength = count * POINT_STRIDE_BYTES;

    const slotCount = mode === 'ping-pong' ? 2 : 1;
    for (let slot = 0; slot < slotCount; slot++) {
      this.buffers.push(device.createBuffer({
        label: pointSlotName(slot),
        size: this.byteLength,
        usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_DST | GPUBufferUsage.COPY_SRC,
      }));
    }
  }

  get slotCount(): number {
    return this.buffers.length;
  }

  /** Slot holding the most recent point state. */
  get current(): number {
    return this._current;
  }

  buffer(slot: number): GPUBuffer {
    const buffer = this.buffers[slot];
    if (!buffer) throw new Error(`PointStore: no slot ${slot}`);
    return buffer;
  }

  /** Register every slot in the pool under its slot name. */
  register(resources: ResourcePool): void {
    this.buffers.forEach((buffer, slot) => resources.setBuffer(pointSlotName(slot), buffer));
  }

  /**
   * Pick the slot this frame writes. In ping-pong mode this alternates, so
   * a frame never writes the slot the previous frame rendered.
   */
  advance(): SlotPair {
    const previous = this._current;
    if (this.buffers.length > 1) {
      this._current = (this._current + 1) % this.buffers.length;
    }
    return { previous, current: this._current };
  }

  /** Overwrite the current slot with packed point data. */
  upload(data: Float32Array<ArrayBuffer>): void {
    if (data.length !== this.count * POINT_STRIDE_FLOATS) {
      throw new Error(
        `PointStore: expected ${this.count * POINT_STRIDE_FLOATS} floats, got ${data.length}`,
      );
    }
    this.device.queue.writeBuffer(this.buffer(this._current), 0, data);
  }

  /** Replace all points with a fresh random state inside `extent`. */
  seed(extent: WindowExtent, random?: RandomSource): void {
    this.upload(seedPoints(this.count, extent, random));
  }

  /** Destroy all slots. Buffer destruction is idempotent, so pool teardown may follow. */
  destroy(): void {
    for (const buffer of this.buffers) buffer.destroy();
    this.buffers.length = 0;
  }
}
