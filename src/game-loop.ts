export type HookPhase = 'preTick' | 'postTick' | 'frameEnd';
export type HookFn = (dt: number) => void;
export type TickFn = (dt: number) => void;
export type ErrorFn = (err: unknown) => void;

/** Frame time used for the first frame and the first frame after resume. */
export const DEFAULT_DT = 1 / 60;

/** Summary of the last completed one-second window. */
export interface FrameWindow {
  fps: number;
  avg: number;
  max: number;
}

const EMPTY_WINDOW: FrameWindow = { fps: 0, avg: 0, max: 0 };

/**
 * Rolling frame-time statistics. Frame times accumulate until they cover at
 * least one second, then the window is summarized and a new one begins.
 */
export class FrameStats {
  private window: FrameWindow = EMPTY_WINDOW;
  private times: number[] = [];
  private elapsed = 0;
  private _last = 0;

  get last(): number {
    return this._last;
  }

  get summary(): FrameWindow {
    return this.window;
  }

  record(dt: number): void {
    this._last = dt;
    this.times.push(dt);
    this.elapsed += dt;
    if (this.elapsed < 1) return;

    const frames = this.times.length;
    this.window = {
      fps: Math.round(frames / this.elapsed),
      avg: this.elapsed / frames,
      max: Math.max(...this.times),
    };
    this.times = [];
    this.elapsed = 0;
  }

  reset(): void {
    this.window = EMPTY_WINDOW;
    this.times = [];
    this.elapsed = 0;
    this._last = 0;
  }
}

/**
 * requestAnimationFrame driver.
 *
 * Supplies each tick with the seconds since the previous frame. A tick
 * that throws stops the loop and is reported to `onError` (or
 * `console.error` without one).
 */
export class GameLoop {
  private readonly tickFn: TickFn;
  private readonly onError: ErrorFn | null;
  private readonly stats = new FrameStats();
  private readonly hooks: Record<HookPhase, HookFn[]> = {
    preTick: [],
    postTick: [],
    frameEnd: [],
  };

  private _running = false;
  private _paused = false;
  private rafId = 0;
  // Timestamp of the previous frame; null restarts timing at DEFAULT_DT.
  private lastTime: number | null = null;

  constructor(tickFn: TickFn, onError?: ErrorFn) {
    this.tickFn = tickFn;
    this.onError = onError ?? null;
  }

  get running(): boolean {
    return this._running;
  }

  get paused(): boolean {
    return this._paused;
  }

  get fps(): number {
    return this.stats.summary.fps;
  }

  get frameDt(): number {
    return this.stats.last;
  }

  get frameTimeAvg(): number {
    return this.stats.summary.avg;
  }

  get frameTimeMax(): number {
    return this.stats.summary.max;
  }

  start(): void {
    if (this._running) return;
    this._running = true;
    this._paused = false;
    this.lastTime = null;
    this.stats.reset();
    this.schedule();
  }

  stop(): void {
    if (!this._running) return;
    this._running = false;
    cancelAnimationFrame(this.rafId);
  }

  pause(): void {
    this._paused = true;
  }

  /** Resume ticking; the paused interval is not fed to the simulation. */
  resume(): void {
    if (!this._paused) return;
    this._paused = false;
    this.lastTime = null;
  }

  addHook(phase: HookPhase, fn: HookFn): void {
    this.hooks[phase].push(fn);
  }

  removeHook(phase: HookPhase, fn: HookFn): void {
    const arr = this.hooks[phase];
    const idx = arr.indexOf(fn);
    if (idx !== -1) arr.splice(idx, 1);
  }

  private schedule(): void {
    this.rafId = requestAnimationFrame((t) => this.frame(t));
  }

  private frame(now: number): void {
    if (!this._running) return;

    const dt = this.lastTime === null ? DEFAULT_DT : (now - this.lastTime) / 1000;
    this.lastTime = now;
    this.stats.record(dt);

    if (!this._paused) {
      try {
        this.runTick(dt);
      } catch (err) {
        this._running = false;
        if (this.onError) this.onError(err);
        else console.error('[dotfield] frame failed, loop stopped', err);
        return;
      }
    }

    this.schedule();
  }

  private runTick(dt: number): void {
    for (const fn of this.hooks.preTick) fn(dt);
    this.tickFn(dt);
    for (const fn of this.hooks.postTick) fn(dt);
    for (const fn of this.hooks.frameEnd) fn(dt);
  }
}
