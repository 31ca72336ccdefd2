import type { ResourcePool } from './resource-pool';
import { Resources } from './bindings';

const BLACK: GPUColor = { r: 0, g: 0, b: 0, a: 1 };

/**
 * Color target shared by the render passes.
 *
 * With `sampleCount > 1` the passes draw into a multisampled texture sized
 * to the drawable and the last pass resolves it into the swapchain
 * texture. With `sampleCount === 1` they draw straight into the swapchain.
 */
export class RenderTargets {
  readonly format: GPUTextureFormat;
  readonly sampleCount: number;

  private readonly device: GPUDevice;
  private msaaTexture: GPUTexture | null = null;
  private msaaView: GPUTextureView | null = null;
  private width = 0;
  private height = 0;

  constructor(device: GPUDevice, format: GPUTextureFormat, sampleCount: number) {
    this.device = device;
    this.format = format;
    this.sampleCount = sampleCount;
  }

  get multisampled(): boolean {
    return this.sampleCount > 1;
  }

  /** Recreate the multisampled texture when the drawable size changes. */
  resize(width: number, height: number): void {
    if (!this.multisampled) return;
    if (this.msaaTexture && this.width === width && this.height === height) return;
    this.msaaTexture?.destroy();
    this.msaaTexture = this.device.createTexture({
      label: 'msaa-color',
      size: { width, height },
      format: this.format,
      sampleCount: this.sampleCount,
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
    });
    this.msaaView = this.msaaTexture.createView();
    this.width = width;
    this.height = height;
  }

  /** Publish this frame's swapchain view and the color target passes draw into. */
  bind(resources: ResourcePool, swapchainView: GPUTextureView): void {
    resources.setTextureView(Resources.swapchain, swapchainView);
    if (this.multisampled) {
      if (!this.msaaView) throw new Error('RenderTargets: resize() must run before bind()');
      resources.setTextureView(Resources.colorTarget, this.msaaView);
    } else {
      resources.setTextureView(Resources.colorTarget, swapchainView);
    }
  }

  destroy(): void {
    this.msaaTexture?.destroy();
    this.msaaTexture = null;
    this.msaaView = null;
  }
}

export interface AttachmentOptions {
  /** Clear to black instead of loading previous contents. */
  clear: boolean;
  /** Last pass of the frame: resolves a multisampled target into the swapchain. */
  final: boolean;
}

/**
 * Color attachment for the current frame, or null when no target has been
 * bound yet.
 */
export function colorAttachment(
  resources: ResourcePool,
  opts: AttachmentOptions,
): GPURenderPassColorAttachment | null {
  const target = resources.getTextureView(Resources.colorTarget);
  const swapchain = resources.getTextureView(Resources.swapchain);
  if (!target || !swapchain) return null;

  const multisampled = target !== swapchain;
  const attachment: GPURenderPassColorAttachment = {
    view: target,
    loadOp: opts.clear ? 'clear' : 'load',
    clearValue: BLACK,
    storeOp: opts.final && multisampled ? 'discard' : 'store',
  };
  if (opts.final && multisampled) attachment.resolveTarget = swapchain;
  return attachment;
}
