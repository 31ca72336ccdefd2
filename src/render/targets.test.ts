import { describe, it, expect } from 'vitest';
import { RenderTargets, colorAttachment } from './targets';
import { ResourcePool } from './resource-pool';
import { createMockGpu, mockView } from '../test-utils/mock-gpu';

describe('RenderTargets', () => {
  it('should draw straight into the swapchain with one sample', () => {
    const gpu = createMockGpu();
    const pool = new ResourcePool();
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 1);
    targets.resize(800, 600);
    const swapchain = mockView('swapchain');
    targets.bind(pool, swapchain);

    expect(gpu.raw.createTexture).not.toHaveBeenCalled();
    expect(pool.getTextureView('color-target')).toBe(swapchain);
    expect(pool.getTextureView('swapchain')).toBe(swapchain);
  });

  it('should create a multisampled texture sized to the drawable', () => {
    const gpu = createMockGpu();
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 4);
    targets.resize(800, 600);

    expect(gpu.raw.createTexture).toHaveBeenCalledTimes(1);
    const desc = gpu.raw.createTexture.mock.calls[0][0];
    expect(desc.size).toEqual({ width: 800, height: 600 });
    expect(desc.sampleCount).toBe(4);
    expect(desc.format).toBe('bgra8unorm');
    expect(desc.usage).toBe(0x10);
  });

  it('should recreate the texture only when the size changes', () => {
    const gpu = createMockGpu();
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 4);
    targets.resize(800, 600);
    targets.resize(800, 600);
    expect(gpu.raw.createTexture).toHaveBeenCalledTimes(1);

    targets.resize(1024, 768);
    expect(gpu.raw.createTexture).toHaveBeenCalledTimes(2);
    const first = gpu.raw.createTexture.mock.results[0].value;
    expect(first.destroy).toHaveBeenCalledTimes(1);
  });

  it('should throw when bound before the first resize', () => {
    const gpu = createMockGpu();
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 4);
    expect(() => targets.bind(new ResourcePool(), mockView('swapchain'))).toThrow(/resize/);
  });
});

describe('colorAttachment', () => {
  it('should return null before any target is bound', () => {
    expect(colorAttachment(new ResourcePool(), { clear: true, final: false })).toBeNull();
  });

  it('should clear and store on the first multisampled pass', () => {
    const gpu = createMockGpu();
    const pool = new ResourcePool();
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 4);
    targets.resize(8, 8);
    targets.bind(pool, mockView('swapchain'));

    const att = colorAttachment(pool, { clear: true, final: false });
    expect(att?.view).toEqual({ label: 'msaa-color-view' });
    expect(att?.loadOp).toBe('clear');
    expect(att?.storeOp).toBe('store');
    expect(att?.clearValue).toEqual({ r: 0, g: 0, b: 0, a: 1 });
    expect(att?.resolveTarget).toBeUndefined();
  });

  it('should load and resolve into the swapchain on the final multisampled pass', () => {
    const gpu = createMockGpu();
    const pool = new ResourcePool();
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 4);
    targets.resize(8, 8);
    const swapchain = mockView('swapchain');
    targets.bind(pool, swapchain);

    const att = colorAttachment(pool, { clear: false, final: true });
    expect(att?.loadOp).toBe('load');
    expect(att?.storeOp).toBe('discard');
    expect(att?.resolveTarget).toBe(swapchain);
  });

  it('should store without resolving when single-sampled', () => {
    const gpu = createMockGpu();
    const pool = new ResourcePool();
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 1);
    const swapchain = mockView('swapchain');
    targets.bind(pool, swapchain);

    const att = colorAttachment(pool, { clear: false, final: true });
    expect(att?.view).toBe(swapchain);
    expect(att?.storeOp).toBe('store');
    expect(att?.resolveTarget).toBeUndefined();
  });
});
