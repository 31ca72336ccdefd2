import { describe, it, expect, afterEach } from 'vitest';
import { PhysicsPass } from './physics-pass';
import { ResourcePool } from '../resource-pool';
import { PointStore } from '../../point-store';
import { createMockGpu, createPassFixture, frameState } from '../../test-utils/mock-gpu';

describe('PhysicsPass', () => {
  afterEach(() => {
    PhysicsPass.SHADER_SOURCE = '';
  });

  it('should implement RenderPass interface', () => {
    const pass = new PhysicsPass();
    expect(pass.name).toBe('physics');
    expect(pass.reads).toEqual(['points']);
    expect(pass.writes).toEqual(['points']);
  });

  it('should throw when SHADER_SOURCE is unset', () => {
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu);
    expect(() => new PhysicsPass().setup(gpu.device, resources)).toThrow(/SHADER_SOURCE/);
  });

  it('should throw when the point buffer is missing', () => {
    PhysicsPass.SHADER_SOURCE = 'physics';
    const gpu = createMockGpu();
    expect(() => new PhysicsPass().setup(gpu.device, new ResourcePool()))
      .toThrow("PhysicsPass.setup: missing 'points-0' in ResourcePool");
  });

  it('should throw when a uniform is missing', () => {
    PhysicsPass.SHADER_SOURCE = 'physics';
    const gpu = createMockGpu();
    const resources = new ResourcePool();
    new PointStore(gpu.device, 10).register(resources);
    expect(() => new PhysicsPass().setup(gpu.device, resources))
      .toThrow("PhysicsPass.setup: missing 'window-extent' in ResourcePool");
  });

  it('should bind points, extent and delta time in binding order', () => {
    PhysicsPass.SHADER_SOURCE = 'physics';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu);
    new PhysicsPass().setup(gpu.device, resources);

    expect(gpu.raw.createComputePipeline.mock.calls[0][0].compute.entryPoint).toBe('main');
    expect(gpu.raw.createBindGroup).toHaveBeenCalledTimes(1);
    expect(gpu.raw.createBindGroup.mock.calls[0][0].entries).toEqual([
      { binding: 0, resource: { buffer: resources.getBuffer('points-0') } },
      { binding: 1, resource: { buffer: resources.getBuffer('window-extent') } },
      { binding: 2, resource: { buffer: resources.getBuffer('delta-time') } },
    ]);
  });

  it('should dispatch ceil(N / 64) workgroups', () => {
    PhysicsPass.SHADER_SOURCE = 'physics';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu, { pointCount: 1000 });
    const pass = new PhysicsPass();
    pass.setup(gpu.device, resources);
    pass.execute(gpu.encoder as unknown as GPUCommandEncoder, frameState({ pointCount: 1000 }));

    expect(gpu.computePass.dispatchWorkgroups).toHaveBeenCalledWith(16);
    expect(gpu.computePass.end).toHaveBeenCalledTimes(1);
    expect(gpu.encoder.copyBufferToBuffer).not.toHaveBeenCalled();
  });

  it('should skip the dispatch for an empty population', () => {
    PhysicsPass.SHADER_SOURCE = 'physics';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu);
    const pass = new PhysicsPass();
    pass.setup(gpu.device, resources);
    pass.execute(gpu.encoder as unknown as GPUCommandEncoder, frameState({ pointCount: 0 }));
    expect(gpu.encoder.beginComputePass).not.toHaveBeenCalled();
  });

  it('should copy the previous slot forward before integrating in ping-pong mode', () => {
    PhysicsPass.SHADER_SOURCE = 'physics';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu, { pointCount: 100, mode: 'ping-pong' });
    const pass = new PhysicsPass();
    pass.setup(gpu.device, resources);
    expect(gpu.raw.createBindGroup).toHaveBeenCalledTimes(2);

    pass.execute(gpu.encoder as unknown as GPUCommandEncoder, frameState({ slot: 1, previousSlot: 0 }));

    expect(gpu.encoder.copyBufferToBuffer).toHaveBeenCalledWith(
      resources.getBuffer('points-0'), 0, resources.getBuffer('points-1'), 0, 1600,
    );
    const copyOrder = gpu.encoder.copyBufferToBuffer.mock.invocationCallOrder[0];
    const computeOrder = gpu.encoder.beginComputePass.mock.invocationCallOrder[0];
    expect(copyOrder).toBeLessThan(computeOrder);

    const slotOneGroup = gpu.raw.createBindGroup.mock.results[1].value;
    expect(gpu.computePass.setBindGroup).toHaveBeenCalledWith(0, slotOneGroup);
  });

  it('should throw for a slot the store does not have', () => {
    PhysicsPass.SHADER_SOURCE = 'physics';
    const gpu = createMockGpu();
    const { resources } = createPassFixture(gpu);
    const pass = new PhysicsPass();
    pass.setup(gpu.device, resources);
    expect(() => pass.execute(gpu.encoder as unknown as GPUCommandEncoder, frameState({ slot: 1 })))
      .toThrow('PhysicsPass: no point slot 1');
  });
});
