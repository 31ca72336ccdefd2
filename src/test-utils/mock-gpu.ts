import { vi } from 'vitest';
import type { BufferMode } from '../types';
import type { FrameState } from '../render/render-pass';
import { ResourcePool } from '../render/resource-pool';
import { Resources } from '../render/bindings';
import { PointStore } from '../point-store';
import { FrameUniforms } from '../uniforms';

/**
 * Headless GPUDevice stand-in. Every factory is a `vi.fn()` returning a
 * plain object that remembers its descriptor, so tests can assert on what
 * was created, bound, dispatched and drawn.
 */
export function createMockGpu() {
  const computePass = {
    setPipeline: vi.fn(),
    setBindGroup: vi.fn(),
    dispatchWorkgroups: vi.fn(),
    end: vi.fn(),
  };
  const renderPass = {
    setPipeline: vi.fn(),
    setBindGroup: vi.fn(),
    draw: vi.fn(),
    end: vi.fn(),
  };
  const encoder = {
    beginComputePass: vi.fn((_desc?: GPUComputePassDescriptor) => computePass),
    beginRenderPass: vi.fn((_desc: GPURenderPassDescriptor) => renderPass),
    copyBufferToBuffer: vi.fn(),
    finish: vi.fn(() => ({ label: 'frame' })),
  };
  const queue = {
    writeBuffer: vi.fn(),
    submit: vi.fn(),
    copyExternalImageToTexture: vi.fn(),
  };
  const raw = {
    createBuffer: vi.fn((desc: GPUBufferDescriptor) => ({
      label: desc.label ?? '',
      size: desc.size,
      usage: desc.usage,
      destroy: vi.fn(),
    })),
    createTexture: vi.fn((desc: GPUTextureDescriptor) => ({
      label: desc.label ?? '',
      descriptor: desc,
      createView: vi.fn(() => ({ label: `${desc.label ?? ''}-view` })),
      destroy: vi.fn(),
    })),
    createSampler: vi.fn((desc?: GPUSamplerDescriptor) => ({ label: desc?.label ?? '', descriptor: desc })),
    createShaderModule: vi.fn((desc: GPUShaderModuleDescriptor) => ({ code: desc.code })),
    createBindGroupLayout: vi.fn((desc: GPUBindGroupLayoutDescriptor) => ({ label: desc.label ?? '' })),
    createPipelineLayout: vi.fn(() => ({})),
    createComputePipeline: vi.fn((desc: GPUComputePipelineDescriptor) => ({ descriptor: desc })),
    createRenderPipeline: vi.fn((desc: GPURenderPipelineDescriptor) => ({ descriptor: desc })),
    createBindGroup: vi.fn((desc: GPUBindGroupDescriptor) => ({ label: desc.label ?? '', descriptor: desc })),
    createCommandEncoder: vi.fn((_desc?: GPUCommandEncoderDescriptor) => encoder),
    queue,
    destroy: vi.fn(),
  };
  return {
    device: raw as unknown as GPUDevice,
    raw,
    encoder,
    computePass,
    renderPass,
    queue,
  };
}

export type MockGpu = ReturnType<typeof createMockGpu>;

/** A stand-in texture view, distinguishable by label. */
export function mockView(label: string): GPUTextureView {
  return { label } as unknown as GPUTextureView;
}

/**
 * A pool populated the way the renderer populates it: point slots,
 * frame uniforms and, optionally, a background texture view and sampler.
 */
export function createPassFixture(
  gpu: MockGpu,
  opts: { pointCount?: number; mode?: BufferMode; background?: boolean } = {},
) {
  const resources = new ResourcePool();
  const store = new PointStore(gpu.device, opts.pointCount ?? 100, opts.mode ?? 'single');
  store.register(resources);
  const uniforms = new FrameUniforms(gpu.device, resources);
  if (opts.background) {
    resources.setTextureView(Resources.backgroundTexture, mockView('background'));
    resources.setSampler(Resources.backgroundSampler, gpu.device.createSampler({ label: 'background-sampler' }));
  }
  return { resources, store, uniforms };
}

/** Frame state with test defaults; any field can be overridden. */
export function frameState(overrides: Partial<FrameState> = {}): FrameState {
  return {
    pointCount: 100,
    extent: { width: 800, height: 600 },
    deltaTime: 1 / 60,
    pointSize: 5,
    intensity: 0.8,
    windowPos: [0, 0],
    slot: 0,
    previousSlot: 0,
    ...overrides,
  };
}
