import type { RenderPass, FrameState } from '../render-pass';
import type { ResourcePool } from '../resource-pool';
import { PHYSICS_LAYOUT, Resources, collectPointSlots, createSlotBindGroups } from '../bindings';
import { physicsWorkgroupCount } from '../../physics';
import { POINT_STRIDE_BYTES } from '../../point-store';

/**
 * Point integration compute pass.
 *
 * Dispatches `ceil(N / 64)` workgroups over the point slot selected by the
 * frame. In ping-pong mode the slot differs from the one drawn last frame;
 * the previous state is copied over first and then integrated in place, so
 * the slot being read by the previous frame's draw is never written.
 */
export class PhysicsPass implements RenderPass {
  readonly name = 'physics';
  readonly reads = ['points'];
  readonly writes = ['points'];

  /**
   * WGSL source of the compute program. Set before `setup()`:
   *
   *   import physicsSrc from '../../shaders/physics.wgsl?raw';
   *   PhysicsPass.SHADER_SOURCE = physicsSrc;
   */
  static SHADER_SOURCE = '';

  private pipeline: GPUComputePipeline | null = null;
  private bindGroups: GPUBindGroup[] = [];
  private slots: GPUBuffer[] = [];

  setup(device: GPUDevice, resources: ResourcePool): void {
    if (!PhysicsPass.SHADER_SOURCE) {
      throw new Error('PhysicsPass.SHADER_SOURCE must be set before calling setup()');
    }

    this.slots = collectPointSlots(resources, 'PhysicsPass');
    const extent = resources.requireBuffer(Resources.windowExtent, 'PhysicsPass');
    const deltaTime = resources.requireBuffer(Resources.deltaTime, 'PhysicsPass');

    const module = device.createShaderModule({ label: 'physics', code: PhysicsPass.SHADER_SOURCE });
    const layout = device.createBindGroupLayout(PHYSICS_LAYOUT);
    this.pipeline = device.createComputePipeline({
      label: 'physics',
      layout: device.createPipelineLayout({ bindGroupLayouts: [layout] }),
      compute: { module, entryPoint: 'main' },
    });
    this.bindGroups = createSlotBindGroups(device, layout, this.slots, [extent, deltaTime], 'physics');
  }

  prepare(): void {
    // uniforms are uploaded by FrameUniforms before the graph runs
  }

  execute(encoder: GPUCommandEncoder, frame: FrameState): void {
    if (!this.pipeline) return;
    const workgroups = physicsWorkgroupCount(frame.pointCount);
    if (workgroups === 0) return;

    const bindGroup = this.bindGroups[frame.slot];
    if (!bindGroup) throw new Error(`PhysicsPass: no point slot ${frame.slot}`);

    if (frame.slot !== frame.previousSlot) {
      const from = this.slots[frame.previousSlot];
      const to = this.slots[frame.slot];
      if (!from || !to) throw new Error(`PhysicsPass: no point slot ${frame.previousSlot}`);
      encoder.copyBufferToBuffer(from, 0, to, 0, frame.pointCount * POINT_STRIDE_BYTES);
    }

    const pass = encoder.beginComputePass({ label: 'physics' });
    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, bindGroup);
    pass.dispatchWorkgroups(workgroups);
    pass.end();
  }

  resize(): void {
    // extent is a uniform; nothing sized to the drawable
  }

  destroy(): void {
    this.pipeline = null;
    this.bindGroups = [];
    this.slots = [];
  }
}
