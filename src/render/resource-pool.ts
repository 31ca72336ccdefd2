/**
 * Named GPU resources shared between passes.
 *
 * Buffers and textures registered here are owned by the pool and destroyed
 * with it. Texture views and samplers are plain handles; the swapchain view
 * is replaced every frame.
 */
export class ResourcePool {
  private buffers = new Map<string, GPUBuffer>();
  private textures = new Map<string, GPUTexture>();
  private textureViews = new Map<string, GPUTextureView>();
  private samplers = new Map<string, GPUSampler>();

  setBuffer(name: string, buffer: GPUBuffer): void {
    this.buffers.set(name, buffer);
  }

  getBuffer(name: string): GPUBuffer | undefined {
    return this.buffers.get(name);
  }

  /** Like `getBuffer`, but throws naming the pass that needed it. */
  requireBuffer(name: string, owner: string): GPUBuffer {
    const buffer = this.buffers.get(name);
    if (!buffer) throw new Error(`${owner}.setup: missing '${name}' in ResourcePool`);
    return buffer;
  }

  /** Register a texture, destroying any texture previously stored under the name. */
  setTexture(name: string, texture: GPUTexture): void {
    const prev = this.textures.get(name);
    if (prev && prev !== texture) prev.destroy();
    this.textures.set(name, texture);
  }

  getTexture(name: string): GPUTexture | undefined {
    return this.textures.get(name);
  }

  setTextureView(name: string, view: GPUTextureView): void {
    this.textureViews.set(name, view);
  }

  getTextureView(name: string): GPUTextureView | undefined {
    return this.textureViews.get(name);
  }

  setSampler(name: string, sampler: GPUSampler): void {
    this.samplers.set(name, sampler);
  }

  getSampler(name: string): GPUSampler | undefined {
    return this.samplers.get(name);
  }

  destroy(): void {
    for (const buf of this.buffers.values()) buf.destroy();
    for (const tex of this.textures.values()) tex.destroy();
    this.buffers.clear();
    this.textures.clear();
    this.textureViews.clear();
    this.samplers.clear();
  }
}
