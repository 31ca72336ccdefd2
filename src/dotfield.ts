import type { Renderer } from './renderer';
import { createRenderer } from './renderer';
import type { DotfieldConfig, DotfieldStats, PointStyle, ResolvedConfig } from './types';
import { validateConfig } from './types';
import type { IntensitySource } from './intensity';
import { GameLoop, type HookFn, type HookPhase } from './game-loop';

/**
 * Top-level facade. Owns the renderer and the frame loop and is the
 * public surface for starting, pausing, resizing, restyling and panning
 * the visualizer.
 *
 * Construct via `Dotfield.create(config)` in the browser, or
 * `Dotfield.fromParts(config, renderer)` for testing.
 */
export class Dotfield {
  private readonly config: ResolvedConfig;
  private readonly renderer: Renderer;
  private readonly loop: GameLoop;
  private destroyed = false;

  private constructor(config: ResolvedConfig, renderer: Renderer) {
    this.config = config;
    this.renderer = renderer;
    this.loop = new GameLoop((dt) => this.renderer.frame(dt), (err) => this.handleError(err));
  }

  /** Build an instance from a pre-constructed renderer. */
  static fromParts(config: ResolvedConfig, renderer: Renderer): Dotfield {
    return new Dotfield(config, renderer);
  }

  /**
   * Validate the config, bring up WebGPU, load the background and return a
   * ready, stopped instance. Rejects on any startup failure.
   */
  static async create(userConfig: DotfieldConfig): Promise<Dotfield> {
    const config = validateConfig(userConfig);
    const renderer = await createRenderer(config);
    return new Dotfield(config, renderer);
  }

  get running(): boolean {
    return this.loop.running;
  }

  get paused(): boolean {
    return this.loop.paused;
  }

  /** Live statistics snapshot. */
  get stats(): DotfieldStats {
    return {
      fps: this.loop.fps,
      frameDt: this.loop.frameDt,
      frameTimeAvg: this.loop.frameTimeAvg,
      frameTimeMax: this.loop.frameTimeMax,
      frameCount: this.renderer.frameCount,
      pointCount: this.config.pointCount,
      intensity: this.renderer.intensity,
    };
  }

  /** Start the frame loop (requestAnimationFrame). */
  start(): void {
    this.checkDestroyed();
    this.loop.start();
  }

  /** Pause the simulation; frames keep firing but nothing is drawn. */
  pause(): void {
    this.loop.pause();
  }

  resume(): void {
    this.loop.resume();
  }

  /** Request a new drawable size, applied at the start of the next frame. */
  resize(width: number, height: number): void {
    this.checkDestroyed();
    this.renderer.requestResize(width, height);
  }

  /** Change the billboard diameter and/or peak opacity. */
  setPointStyle(style: Partial<PointStyle>): void {
    this.checkDestroyed();
    if (style.pointSize !== undefined && !(style.pointSize > 0)) {
      throw new Error('pointSize must be > 0');
    }
    if (style.intensity !== undefined && !(style.intensity >= 0)) {
      throw new Error('intensity must be >= 0');
    }
    this.renderer.setPointStyle(style);
  }

  /** Pan the background, in image pixels with y measured from the bottom edge. */
  setWindowPos(x: number, y: number): void {
    this.checkDestroyed();
    this.renderer.setWindowPos(x, y);
  }

  /** Attach a live intensity source, or null to return to the configured intensity. */
  setIntensitySource(source: IntensitySource | null): void {
    this.checkDestroyed();
    this.renderer.setIntensitySource(source);
  }

  addHook(phase: HookPhase, fn: HookFn): void {
    this.loop.addHook(phase, fn);
  }

  removeHook(phase: HookPhase, fn: HookFn): void {
    this.loop.removeHook(phase, fn);
  }

  /**
   * Stop the loop and release every GPU resource.
   * Idempotent -- calling more than once is safe.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.loop.stop();
    this.renderer.destroy();
  }

  private handleError(err: unknown): void {
    if (this.config.onError) this.config.onError(err);
    else console.error('[dotfield] frame loop stopped', err);
  }

  private checkDestroyed(): void {
    if (this.destroyed) throw new Error('Dotfield instance has been destroyed');
  }
}
