import type { RenderPass, FrameState } from '../render-pass';
import type { ResourcePool } from '../resource-pool';
import { BACKGROUND_LAYOUT, Resources } from '../bindings';
import { colorAttachment } from '../targets';

export interface BackgroundPassOptions {
  format: GPUTextureFormat;
  sampleCount: number;
  /** Size the background texture was decoded to, baked into the pipeline. */
  imageSize: readonly [number, number];
  /** Without an image the pass only clears the target. */
  hasImage: boolean;
}

/**
 * Bottom layer of the frame: a window-sized crop of the background image,
 * panned by `windowPos`, drawn as one 4-vertex strip with no blending.
 * Always clears the color target to black first.
 */
export class BackgroundPass implements RenderPass {
  readonly name = 'background';
  readonly reads: string[] = [];
  readonly writes = ['background-layer'];

  /**
   * WGSL source of the background program. Set before `setup()`:
   *
   *   import backgroundSrc from '../../shaders/background.wgsl?raw';
   *   BackgroundPass.SHADER_SOURCE = backgroundSrc;
   */
  static SHADER_SOURCE = '';

  private readonly options: BackgroundPassOptions;
  private pipeline: GPURenderPipeline | null = null;
  private bindGroup: GPUBindGroup | null = null;

  constructor(options: BackgroundPassOptions) {
    this.options = options;
  }

  setup(device: GPUDevice, resources: ResourcePool): void {
    if (!this.options.hasImage) return;
    if (!BackgroundPass.SHADER_SOURCE) {
      throw new Error('BackgroundPass.SHADER_SOURCE must be set before calling setup()');
    }

    const view = resources.getTextureView(Resources.backgroundTexture);
    if (!view) throw new Error(`BackgroundPass.setup: missing '${Resources.backgroundTexture}' in ResourcePool`);
    const sampler = resources.getSampler(Resources.backgroundSampler);
    if (!sampler) throw new Error(`BackgroundPass.setup: missing '${Resources.backgroundSampler}' in ResourcePool`);
    const extent = resources.requireBuffer(Resources.windowExtent, 'BackgroundPass');
    const windowPos = resources.requireBuffer(Resources.windowPos, 'BackgroundPass');

    const [imageWidth, imageHeight] = this.options.imageSize;
    const constants = { IMAGE_WIDTH: imageWidth, IMAGE_HEIGHT: imageHeight };
    const module = device.createShaderModule({ label: 'background', code: BackgroundPass.SHADER_SOURCE });
    const layout = device.createBindGroupLayout(BACKGROUND_LAYOUT);
    this.pipeline = device.createRenderPipeline({
      label: 'background',
      layout: device.createPipelineLayout({ bindGroupLayouts: [layout] }),
      vertex: { module, entryPoint: 'vs_main', constants },
      // no blend state: fragments replace the cleared target
      fragment: { module, entryPoint: 'fs_main', constants, targets: [{ format: this.options.format }] },
      primitive: { topology: 'triangle-strip' },
      multisample: { count: this.options.sampleCount },
    });
    this.bindGroup = device.createBindGroup({
      label: 'background',
      layout,
      entries: [
        { binding: 0, resource: view },
        { binding: 1, resource: sampler },
        { binding: 2, resource: { buffer: extent } },
        { binding: 3, resource: { buffer: windowPos } },
      ],
    });
  }

  prepare(): void {
    // windowPos and extent live in shared uniforms
  }

  execute(encoder: GPUCommandEncoder, _frame: FrameState, resources: ResourcePool): void {
    const attachment = colorAttachment(resources, { clear: true, final: false });
    if (!attachment) return;

    const pass = encoder.beginRenderPass({ label: 'background', colorAttachments: [attachment] });
    if (this.pipeline && this.bindGroup) {
      pass.setPipeline(this.pipeline);
      pass.setBindGroup(0, this.bindGroup);
      pass.draw(4, 1);
    }
    pass.end();
  }

  resize(): void {
    // the crop follows the window-extent uniform
  }

  destroy(): void {
    this.pipeline = null;
    this.bindGroup = null;
  }
}
