import type { RenderPass, FrameState } from '../render-pass';
import type { ResourcePool } from '../resource-pool';
import {
  ALPHA_BLEND,
  PARTICLE_LAYOUT,
  Resources,
  collectPointSlots,
  createSlotBindGroups,
} from '../bindings';
import { colorAttachment } from '../targets';

export interface ParticlePassOptions {
  format: GPUTextureFormat;
  sampleCount: number;
}

/**
 * Soft circular billboards, one instance per point.
 *
 * Draws 4 vertices × N instances as a triangle strip over the background,
 * alpha-blended, reading the point slot the physics pass just wrote. As the
 * last pass of the frame it resolves a multisampled target to the swapchain.
 */
export class ParticlePass implements RenderPass {
  readonly name = 'particles';
  readonly reads = ['points', 'background-layer'];
  readonly writes = ['swapchain'];

  /**
   * WGSL source of the billboard program. Set before `setup()`:
   *
   *   import particleSrc from '../../shaders/particles.wgsl?raw';
   *   ParticlePass.SHADER_SOURCE = particleSrc;
   */
  static SHADER_SOURCE = '';

  private readonly options: ParticlePassOptions;
  private pipeline: GPURenderPipeline | null = null;
  private bindGroups: GPUBindGroup[] = [];

  constructor(options: ParticlePassOptions) {
    this.options = options;
  }

  setup(device: GPUDevice, resources: ResourcePool): void {
    if (!ParticlePass.SHADER_SOURCE) {
      throw new Error('ParticlePass.SHADER_SOURCE must be set before calling setup()');
    }

    const slots = collectPointSlots(resources, 'ParticlePass');
    const uniforms = [
      resources.requireBuffer(Resources.windowExtent, 'ParticlePass'),
      resources.requireBuffer(Resources.pointSize, 'ParticlePass'),
      resources.requireBuffer(Resources.intensity, 'ParticlePass'),
    ];

    const module = device.createShaderModule({ label: 'particles', code: ParticlePass.SHADER_SOURCE });
    const layout = device.createBindGroupLayout(PARTICLE_LAYOUT);
    this.pipeline = device.createRenderPipeline({
      label: 'particles',
      layout: device.createPipelineLayout({ bindGroupLayouts: [layout] }),
      vertex: { module, entryPoint: 'vs_main' },
      fragment: {
        module,
        entryPoint: 'fs_main',
        targets: [{ format: this.options.format, blend: ALPHA_BLEND }],
      },
      primitive: { topology: 'triangle-strip' },
      multisample: { count: this.options.sampleCount },
    });
    this.bindGroups = createSlotBindGroups(device, layout, slots, uniforms, 'particles');
  }

  prepare(): void {
    // point style lives in shared uniforms
  }

  execute(encoder: GPUCommandEncoder, frame: FrameState, resources: ResourcePool): void {
    if (!this.pipeline) return;
    const attachment = colorAttachment(resources, { clear: false, final: true });
    if (!attachment) return;
    const bindGroup = this.bindGroups[frame.slot];
    if (!bindGroup) throw new Error(`ParticlePass: no point slot ${frame.slot}`);

    const pass = encoder.beginRenderPass({ label: 'particles', colorAttachments: [attachment] });
    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, bindGroup);
    pass.draw(4, frame.pointCount);
    pass.end();
  }

  resize(): void {
    // NDC mapping reads the window-extent uniform
  }

  destroy(): void {
    this.pipeline = null;
    this.bindGroups = [];
  }
}
