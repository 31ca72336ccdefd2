import type { RandomSource, WindowExtent } from './types';
import type { FrameState } from './render/render-pass';
import type { ResourcePool } from './render/resource-pool';
import type { RenderGraph } from './render/render-graph';
import type { RenderTargets } from './render/targets';
import type { PointStore } from './point-store';
import type { FrameUniforms } from './uniforms';
import type { IntensityController, IntensitySource } from './intensity';

/** The drawable the frame is presented to. */
export interface PresentationSurface {
  getCurrentTexture(): GPUTexture;
  /** Resize the backing store to whole pixels. */
  resize(width: number, height: number): void;
}

export interface FrameOrchestratorDeps {
  device: GPUDevice;
  surface: PresentationSurface;
  resources: ResourcePool;
  graph: RenderGraph;
  store: PointStore;
  uniforms: FrameUniforms;
  targets: RenderTargets;
  intensity: IntensityController;
}

export interface FrameOrchestratorOptions {
  extent: WindowExtent;
  pointSize: number;
  intensity: number;
  windowPos?: [number, number];
  reseedOnResize: boolean;
  random: RandomSource;
}

/**
 * Whole-pixel extent of at least 1×1. Non-finite sizes become 1.
 * `clamped` is true when a dimension had to be raised.
 */
export function clampExtent(width: number, height: number): { extent: WindowExtent; clamped: boolean } {
  const fix = (v: number) => (Number.isFinite(v) ? Math.max(1, Math.floor(v)) : 1);
  const extent = { width: fix(width), height: fix(height) };
  const clamped = !(Number.isFinite(width) && width >= 1 && Number.isFinite(height) && height >= 1);
  return { extent, clamped };
}

/**
 * Sequences one frame: pending resize, uniform uploads, slot selection and
 * the render graph (physics, background, particles) in one submission.
 *
 * Resize requests only record the new extent; they take effect at the start
 * of the next `frame()`, so no stage ever sees a size change mid-frame.
 */
export class FrameOrchestrator {
  private readonly deps: FrameOrchestratorDeps;
  private readonly reseedOnResize: boolean;
  private readonly random: RandomSource;

  private _extent: WindowExtent;
  private pending: WindowExtent | null = null;
  private pointSize: number;
  private baseIntensity: number;
  private _intensity: number;
  private windowPos: [number, number];
  private lostReason: string | null = null;
  private _frameCount = 0;

  constructor(deps: FrameOrchestratorDeps, opts: FrameOrchestratorOptions) {
    this.deps = deps;
    this.reseedOnResize = opts.reseedOnResize;
    this.random = opts.random;
    this.pointSize = opts.pointSize;
    this.baseIntensity = opts.intensity;
    this._intensity = opts.intensity;
    this.windowPos = opts.windowPos ?? [0, 0];

    const { extent } = clampExtent(opts.extent.width, opts.extent.height);
    this._extent = extent;
    deps.surface.resize(extent.width, extent.height);
    this.resizeStages(extent);
    deps.store.seed(extent, this.random);
  }

  get extent(): WindowExtent {
    return { ...this._extent };
  }

  get intensity(): number {
    return this._intensity;
  }

  get frameCount(): number {
    return this._frameCount;
  }

  get deviceLost(): boolean {
    return this.lostReason !== null;
  }

  /** Record a new drawable size; applied at the start of the next frame. */
  requestResize(width: number, height: number): void {
    const { extent, clamped } = clampExtent(width, height);
    if (clamped) {
      console.warn(`[dotfield] resize to ${width}x${height} clamped to ${extent.width}x${extent.height}`);
    }
    this.pending = extent;
  }

  setPointStyle(style: { pointSize?: number; intensity?: number }): void {
    if (style.pointSize !== undefined) this.pointSize = style.pointSize;
    if (style.intensity !== undefined) {
      this.baseIntensity = style.intensity;
      if (!this.deps.intensity.hasSource) this._intensity = style.intensity;
    }
  }

  /** Background pan offset in image pixels, y measured from the bottom edge. */
  setWindowPos(x: number, y: number): void {
    this.windowPos = [x, y];
  }

  /** Attach or detach a live intensity source; detaching restores the configured intensity. */
  setIntensitySource(source: IntensitySource | null): void {
    this.deps.intensity.setSource(source);
    if (!source) this._intensity = this.baseIntensity;
  }

  /** After device loss every `frame()` throws. */
  markDeviceLost(reason: string): void {
    this.lostReason = reason;
  }

  frame(dt: number): FrameState {
    if (this.lostReason !== null) {
      throw new Error(`FrameOrchestrator: GPU device lost (${this.lostReason})`);
    }
    const { device, surface, resources, graph, store, uniforms, targets, intensity } = this.deps;
    const deltaTime = Number.isFinite(dt) && dt > 0 ? dt : 0;

    if (this.pending) {
      const extent = this.pending;
      this.pending = null;
      if (extent.width !== this._extent.width || extent.height !== this._extent.height) {
        this._extent = extent;
        surface.resize(extent.width, extent.height);
        this.resizeStages(extent);
        if (this.reseedOnResize) store.seed(extent, this.random);
      }
    }

    this._intensity = intensity.hasSource ? intensity.update(deltaTime) : this.baseIntensity;

    const { previous, current } = store.advance();
    const state: FrameState = {
      pointCount: store.count,
      extent: { ...this._extent },
      deltaTime,
      pointSize: this.pointSize,
      intensity: this._intensity,
      windowPos: [this.windowPos[0], this.windowPos[1]],
      slot: current,
      previousSlot: previous,
    };

    uniforms.write(state);
    targets.bind(resources, surface.getCurrentTexture().createView());
    graph.render(device, state, resources);
    this._frameCount++;
    return state;
  }

  private resizeStages(extent: WindowExtent): void {
    this.deps.targets.resize(extent.width, extent.height);
    this.deps.graph.resize(extent.width, extent.height);
  }
}
