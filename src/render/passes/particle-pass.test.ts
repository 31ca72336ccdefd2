import { describe, it, expect, afterEach } from 'vitest';
import { ParticlePass } from './particle-pass';
import { RenderTargets } from '../targets';
import { ALPHA_BLEND } from '../bindings';
import { createMockGpu, createPassFixture, frameState, mockView } from '../../test-utils/mock-gpu';

const OPTIONS = { format: 'bgra8unorm', sampleCount: 4 } as const;

describe('ParticlePass', () => {
  afterEach(() => {
    ParticlePass.SHADER_SOURCE = '';
  });

  it('should implement RenderPass interface', () => {
    const pass = new ParticlePass(OPTIONS);
    expect(pass.name).toBe('particles');
    expect(pass.reads).toContain('points');
    expect(pass.reads).toContain('background-layer');
    expect(pass.writes).toEqual(['swapchain']);
  });

  it('should throw when SHADER_SOURCE is unset', () => {
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu);
    expect(() => new ParticlePass(OPTIONS).setup(gpu.device, resources)).toThrow(/SHADER_SOURCE/);
  });

  it('should build an alpha-blended triangle-strip pipeline', () => {
    ParticlePass.SHADER_SOURCE = 'particles';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu);
    new ParticlePass(OPTIONS).setup(gpu.device, resources);

    const desc = gpu.raw.createRenderPipeline.mock.calls[0][0];
    expect(desc.vertex.entryPoint).toBe('vs_main');
    expect(desc.fragment?.entryPoint).toBe('fs_main');
    expect(Array.from(desc.fragment?.targets ?? [])).toEqual([{ format: 'bgra8unorm', blend: ALPHA_BLEND }]);
    expect(desc.primitive?.topology).toBe('triangle-strip');
    expect(desc.multisample?.count).toBe(4);
  });

  it('should bind points, extent, point size and intensity', () => {
    ParticlePass.SHADER_SOURCE = 'particles';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu);
    new ParticlePass(OPTIONS).setup(gpu.device, resources);

    expect(gpu.raw.createBindGroup.mock.calls[0][0].entries).toEqual([
      { binding: 0, resource: { buffer: resources.getBuffer('points-0') } },
      { binding: 1, resource: { buffer: resources.getBuffer('window-extent') } },
      { binding: 2, resource: { buffer: resources.getBuffer('point-size') } },
      { binding: 3, resource: { buffer: resources.getBuffer('intensity') } },
    ]);
  });

  it('should draw 4 vertices per point and resolve to the swapchain', () => {
    ParticlePass.SHADER_SOURCE = 'particles';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu, { pointCount: 1000 });
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 4);
    targets.resize(800, 600);
    const swapchain = mockView('swapchain');
    targets.bind(resources, swapchain);

    const pass = new ParticlePass(OPTIONS);
    pass.setup(gpu.device, resources);
    pass.execute(gpu.encoder as unknown as GPUCommandEncoder, frameState({ pointCount: 1000 }), resources);

    expect(gpu.renderPass.draw).toHaveBeenCalledWith(4, 1000);
    const [attachment] = Array.from(gpu.encoder.beginRenderPass.mock.calls[0][0].colorAttachments);
    expect(attachment?.loadOp).toBe('load');
    expect(attachment?.resolveTarget).toBe(swapchain);
  });

  it('should draw the slot chosen for the frame', () => {
    ParticlePass.SHADER_SOURCE = 'particles';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu, { mode: 'ping-pong' });
    const targets = new RenderTargets(gpu.device, 'bgra8unorm', 1);
    targets.bind(resources, mockView('swapchain'));

    const pass = new ParticlePass({ format: 'bgra8unorm', sampleCount: 1 });
    pass.setup(gpu.device, resources);
    pass.execute(gpu.encoder as unknown as GPUCommandEncoder, frameState({ slot: 1, previousSlot: 0 }), resources);

    const slotOneGroup = gpu.raw.createBindGroup.mock.results[1].value;
    expect(gpu.renderPass.setBindGroup).toHaveBeenCalledWith(0, slotOneGroup);
  });
});
