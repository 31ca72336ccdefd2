import type { RenderPass, FrameState } from './render-pass';
import type { ResourcePool } from './resource-pool';

/**
 * Frame passes ordered by the resources they read and write.
 *
 * A pass that reads a resource runs after the pass that writes it; ties keep
 * insertion order. Every pass is encoded into one command buffer, so compute
 * writes land before later render reads by submission order alone.
 */
export class RenderGraph {
  private readonly passes = new Map<string, RenderPass>();
  private order: RenderPass[] | null = null;

  addPass(pass: RenderPass): void {
    if (this.passes.has(pass.name)) {
      throw new Error(`RenderPass '${pass.name}' already registered`);
    }
    this.passes.set(pass.name, pass);
    this.order = null;
  }

  /**
   * Execution order as pass names. Throws on a cycle, or when two passes
   * write the same resource.
   */
  compile(): string[] {
    return this.sorted().map(p => p.name);
  }

  /** Run `setup` on every pass in execution order. */
  setup(device: GPUDevice, resources: ResourcePool): void {
    for (const pass of this.sorted()) pass.setup(device, resources);
  }

  /** Prepare then execute every pass, submitting a single command buffer. */
  render(device: GPUDevice, frame: FrameState, resources: ResourcePool): void {
    const order = this.sorted();
    for (const pass of order) pass.prepare(device, frame);

    const encoder = device.createCommandEncoder({ label: 'frame' });
    for (const pass of order) pass.execute(encoder, frame, resources);
    device.queue.submit([encoder.finish()]);
  }

  resize(width: number, height: number): void {
    for (const pass of this.passes.values()) pass.resize(width, height);
  }

  destroy(): void {
    for (const pass of this.passes.values()) pass.destroy();
    this.passes.clear();
    this.order = null;
  }

  // Kahn's algorithm over writer -> reader edges.
  private sorted(): RenderPass[] {
    if (this.order) return this.order;

    const writers = new Map<string, string>();
    for (const [name, pass] of this.passes) {
      for (const w of pass.writes) {
        const other = writers.get(w);
        if (other !== undefined && other !== name) {
          throw new Error(`RenderGraph: multiple writers for '${w}' ('${other}', '${name}')`);
        }
        writers.set(w, name);
      }
    }

    const readers = new Map<string, string[]>();
    const pending = new Map<string, number>();
    for (const name of this.passes.keys()) {
      readers.set(name, []);
      pending.set(name, 0);
    }
    for (const [name, pass] of this.passes) {
      for (const r of pass.reads) {
        const writer = writers.get(r);
        if (writer === undefined || writer === name) continue;
        readers.get(writer)?.push(name);
        pending.set(name, (pending.get(name) ?? 0) + 1);
      }
    }

    const ready = [...pending].filter(([, n]) => n === 0).map(([name]) => name);
    const order: RenderPass[] = [];
    for (let name = ready.shift(); name !== undefined; name = ready.shift()) {
      const pass = this.passes.get(name);
      if (pass) order.push(pass);
      for (const reader of readers.get(name) ?? []) {
        const left = (pending.get(reader) ?? 0) - 1;
        pending.set(reader, left);
        if (left === 0) ready.push(reader);
      }
    }

    if (order.length !== this.passes.size) {
      throw new Error('RenderGraph has a cycle, cannot compile');
    }
    this.order = order;
    return order;
  }
}
