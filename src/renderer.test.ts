import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildRenderer, createRenderer, type RendererParts } from './renderer';
import type { PresentationSurface } from './frame-orchestrator';
import type { BackgroundImage } from './background-loader';
import { validateConfig, type DotfieldConfig } from './types';
import { ConstantIntensitySource } from './intensity';
import { createMockGpu, mockView, type MockGpu } from './test-utils/mock-gpu';

function mockSurface(): PresentationSurface {
  const view = mockView('swapchain');
  return {
    getCurrentTexture: () => ({ createView: () => view }) as unknown as GPUTexture,
    resize: vi.fn(),
  };
}

function mockBackground(gpu: MockGpu): BackgroundImage {
  const texture = gpu.device.createTexture({
    label: 'background',
    size: { width: 1920, height: 1080 },
    format: 'rgba8unorm',
    usage: 0,
  });
  return {
    texture,
    view: texture.createView(),
    sampler: gpu.device.createSampler({ label: 'background-sampler' }),
    width: 1920,
    height: 1080,
  };
}

function build(config: Partial<DotfieldConfig> = {}, withBackground = false) {
  const gpu = createMockGpu();
  const resolved = validateConfig({
    canvas: {} as HTMLCanvasElement,
    random: () => 0.25,
    ...config,
  });
  const parts: RendererParts = {
    device: gpu.device,
    surface: mockSurface(),
    format: 'bgra8unorm',
    extent: { width: 800, height: 600 },
    background: withBackground ? mockBackground(gpu) : undefined,
  };
  const renderer = buildRenderer(resolved, parts);
  return { gpu, renderer };
}

describe('buildRenderer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('compiles the bundled shaders', () => {
    const { gpu } = build({}, true);
    const codes = gpu.raw.createShaderModule.mock.calls.map(c => String(c[0].code));
    expect(codes).toHaveLength(3);
    expect(codes[0]).toContain('@compute');
    expect(codes.some(code => code.includes('override IMAGE_WIDTH'))).toBe(true);
  });

  it('draws the background then the billboards', () => {
    const { gpu, renderer } = build({}, true);
    const state = renderer.frame(0.5);
    expect(state.pointCount).toBe(1000);
    expect(gpu.computePass.dispatchWorkgroups).toHaveBeenCalledWith(16);
    expect(gpu.renderPass.draw.mock.calls).toEqual([[4, 1], [4, 1000]]);
    expect(renderer.frameCount).toBe(1);
  });

  it('skips the background draw without an image', () => {
    const { gpu, renderer } = build();
    renderer.frame(0.5);
    expect(gpu.renderPass.draw.mock.calls).toEqual([[4, 1000]]);
  });

  it('uses the point-list renderer for the point style', () => {
    const { gpu, renderer } = build({ particleStyle: 'point', sampleCount: 1 });
    renderer.frame(0.5);
    expect(gpu.renderPass.draw.mock.calls).toEqual([[1000]]);
  });

  it('forwards style changes to the next frame', () => {
    const { renderer } = build();
    renderer.setPointStyle({ pointSize: 12 });
    renderer.setWindowPos(40, 50);
    const state = renderer.frame(0.5);
    expect(state.pointSize).toBe(12);
    expect(state.windowPos).toEqual([40, 50]);
  });

  it('reports the live intensity from an attached source', () => {
    const { renderer } = build();
    renderer.setIntensitySource(new ConstantIntensitySource(0.5));
    renderer.frame(0.5);
    expect(renderer.intensity).toBe(0.5);
  });

  it('fails every frame once the device is lost', () => {
    const { renderer } = build();
    renderer.markDeviceLost('test');
    expect(() => renderer.frame(0.5)).toThrow('FrameOrchestrator: GPU device lost (test)');
  });

  it('destroys the device once', () => {
    const { gpu, renderer } = build({}, true);
    renderer.destroy();
    renderer.destroy();
    expect(gpu.raw.destroy).toHaveBeenCalledTimes(1);
    const points = gpu.raw.createBuffer.mock.results[0].value;
    expect(points.destroy).toHaveBeenCalled();
  });
});

describe('createRenderer', () => {
  function stubWebGpu(gpu: MockGpu) {
    const device = Object.assign(gpu.raw, { lost: new Promise<GPUDeviceLostInfo>(() => {}) });
    const adapter = {
      info: { vendor: 'test', architecture: '' },
      limits: {
        maxStorageBufferBindingSize: 134_217_728,
        maxComputeWorkgroupSizeX: 256,
        maxComputeWorkgroupsPerDimension: 65_535,
      },
      requestDevice: vi.fn(async () => device),
    };
    vi.stubGlobal('navigator', {
      gpu: {
        getPreferredCanvasFormat: () => 'bgra8unorm',
        requestAdapter: vi.fn(async () => adapter),
      },
    });
    const context = {
      configure: vi.fn(),
      getCurrentTexture: () => ({ createView: () => mockView('swapchain') }),
    };
    const canvas = { width: 800, height: 600, getContext: vi.fn(() => context) };
    return { context, canvas: canvas as unknown as HTMLCanvasElement };
  }

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('configures an opaque canvas context and returns a working renderer', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'group').mockImplementation(() => {});
    vi.spyOn(console, 'groupEnd').mockImplementation(() => {});
    const gpu = createMockGpu();
    const { context, canvas } = stubWebGpu(gpu);

    const renderer = await createRenderer(validateConfig({ canvas, random: () => 0.5 }));

    expect(context.configure).toHaveBeenCalledWith({
      device: gpu.device,
      format: 'bgra8unorm',
      alphaMode: 'opaque',
    });
    expect(renderer.frame(0.5).extent).toEqual({ width: 800, height: 600 });
  });

  it('destroys the device when wiring the passes fails', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'group').mockImplementation(() => {});
    vi.spyOn(console, 'groupEnd').mockImplementation(() => {});
    const gpu = createMockGpu();
    const { canvas } = stubWebGpu(gpu);
    gpu.raw.createComputePipeline.mockImplementation(() => {
      throw new Error('pipeline rejected');
    });

    await expect(createRenderer(validateConfig({ canvas }))).rejects.toThrow('pipeline rejected');
    expect(gpu.raw.destroy).toHaveBeenCalledTimes(1);
  });

  it('rejects without WebGPU', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'group').mockImplementation(() => {});
    vi.spyOn(console, 'groupEnd').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubGlobal('navigator', {});
    await expect(createRenderer(validateConfig({ canvas: {} as HTMLCanvasElement })))
      .rejects.toThrow('WebGPU is not available');
  });
});
