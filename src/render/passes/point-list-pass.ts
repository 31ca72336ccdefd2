import type { RenderPass, FrameState } from '../render-pass';
import type { ResourcePool } from '../resource-pool';
import {
  ALPHA_BLEND,
  POINT_LIST_LAYOUT,
  Resources,
  collectPointSlots,
  createSlotBindGroups,
} from '../bindings';
import { colorAttachment } from '../targets';
import type { ParticlePassOptions } from './particle-pass';

/**
 * Fallback point renderer: one hard-edged pixel per point, drawn as a
 * point list with no instancing. Ignores point size.
 */
export class PointListPass implements RenderPass {
  readonly name = 'point-list';
  readonly reads = ['points', 'background-layer'];
  readonly writes = ['swapchain'];

  static SHADER_SOURCE = '';

  private readonly options: ParticlePassOptions;
  private pipeline: GPURenderPipeline | null = null;
  private bindGroups: GPUBindGroup[] = [];

  constructor(options: ParticlePassOptions) {
    this.options = options;
  }

  setup(device: GPUDevice, resources: ResourcePool): void {
    if (!PointListPass.SHADER_SOURCE) {
      throw new Error('PointListPass.SHADER_SOURCE must be set before calling setup()');
    }

    const slots = collectPointSlots(resources, 'PointListPass');
    const uniforms = [
      resources.requireBuffer(Resources.windowExtent, 'PointListPass'),
      resources.requireBuffer(Resources.intensity, 'PointListPass'),
    ];

    const module = device.createShaderModule({ label: 'points', code: PointListPass.SHADER_SOURCE });
    const layout = device.createBindGroupLayout(POINT_LIST_LAYOUT);
    this.pipeline = device.createRenderPipeline({
      label: 'point-list',
      layout: device.createPipelineLayout({ bindGroupLayouts: [layout] }),
      vertex: { module, entryPoint: 'vs_main' },
      fragment: {
        module,
        entryPoint: 'fs_main',
        targets: [{ format: this.options.format, blend: ALPHA_BLEND }],
      },
      primitive: { topology: 'point-list' },
      multisample: { count: this.options.sampleCount },
    });
    this.bindGroups = createSlotBindGroups(device, layout, slots, uniforms, 'point-list');
  }

  prepare(): void {}

  execute(encoder: GPUCommandEncoder, frame: FrameState, resources: ResourcePool): void {
    if (!this.pipeline) return;
    const attachment = colorAttachment(resources, { clear: false, final: true });
    if (!attachment) return;
    const bindGroup = this.bindGroups[frame.slot];
    if (!bindGroup) throw new Error(`PointListPass: no point slot ${frame.slot}`);

    const pass = encoder.beginRenderPass({ label: 'point-list', colorAttachments: [attachment] });
    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, bindGroup);
    pass.draw(frame.pointCount);
    pass.end();
  }

  resize(): void {}

  destroy(): void {
    this.pipeline = null;
    this.bindGroups = [];
  }
}
