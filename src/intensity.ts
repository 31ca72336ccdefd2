/**
 * Intensity sources drive the particle opacity uniform.
 *
 * A source reports a raw peak each frame; `IntensityController` turns the
 * peaks into an intensity in [0, 1] with automatic gain, so quiet and loud
 * inputs both use the full range.
 */

export interface IntensitySource {
  /** Latest peak in [0, ∞), or null when the source has nothing this frame. */
  poll(): number | null;
  destroy?(): void;
}

export class ConstantIntensitySource implements IntensitySource {
  private readonly value: number;

  constructor(value: number) {
    this.value = value;
  }

  poll(): number {
    return this.value;
  }
}

/** Largest absolute sample value. */
export function peakAmplitude(samples: ArrayLike<number>): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const v = Math.abs(samples[i]);
    if (v > peak) peak = v;
  }
  return peak;
}

export interface AudioPeakOptions {
  /** Factory for creating AudioContext. Overridable for testing. */
  contextFactory?: () => AudioContext;
  /** Analyser window, a power of two in [32, 32768]. */
  fftSize?: number;
}

/**
 * Peak level of a live MediaStream (microphone, tab capture), read from an
 * AnalyserNode's time-domain buffer.
 */
export class AudioPeakIntensitySource implements IntensitySource {
  private readonly ctx: AudioContext;
  private readonly analyser: AnalyserNode;
  private readonly input: MediaStreamAudioSourceNode;
  private readonly samples: Float32Array<ArrayBuffer>;
  private closed = false;

  constructor(stream: MediaStream, opts?: AudioPeakOptions) {
    const factory = opts?.contextFactory ?? (() => new AudioContext());
    this.ctx = factory();
    this.analyser = this.ctx.createAnalyser();
    this.analyser.fftSize = opts?.fftSize ?? 2048;
    this.input = this.ctx.createMediaStreamSource(stream);
    this.input.connect(this.analyser);
    this.samples = new Float32Array(this.analyser.fftSize);
  }

  /** Resume a context that the autoplay policy started suspended. */
  resume(): Promise<void> {
    return this.ctx.resume();
  }

  poll(): number | null {
    if (this.closed || this.ctx.state !== 'running') return null;
    this.analyser.getFloatTimeDomainData(this.samples);
    return peakAmplitude(this.samples);
  }

  destroy(): void {
    if (this.closed) return;
    this.closed = true;
    this.input.disconnect();
    this.ctx.close().catch((err: unknown) => {
      console.warn('[dotfield] failed to close audio context', err);
    });
  }
}

const GAIN_RECOVERY_SECONDS = 20;
const MAX_GAIN = 100;

/**
 * Automatic gain over an intensity source.
 *
 * With a peak: `i = peak * gain`. Without one: `i` decays linearly to 0
 * over 20 s. When `i` overshoots 1 the gain is divided by the overshoot and
 * `i` pinned to 1; otherwise a non-zero `i` lets the gain creep back up by
 * `dt / 20`, capped at 100.
 */
export class IntensityController {
  private source: IntensitySource | null;
  private _gain = 1;
  private _value: number;

  constructor(source: IntensitySource | null, initial: number) {
    this.source = source;
    this._value = initial;
  }

  get value(): number {
    return this._value;
  }

  get gain(): number {
    return this._gain;
  }

  get hasSource(): boolean {
    return this.source !== null;
  }

  /** Swap the source, destroying the old one. Gain restarts at 1. */
  setSource(source: IntensitySource | null): void {
    if (this.source === source) return;
    this.source?.destroy?.();
    this.source = source;
    this._gain = 1;
  }

  /** Advance by `dt` seconds. Without a source the value is left untouched. */
  update(dt: number): number {
    if (!this.source) return this._value;

    const peak = this.source.poll();
    let i = peak !== null
      ? peak * this._gain
      : Math.max(this._value - dt / GAIN_RECOVERY_SECONDS, 0);

    if (i > 1) {
      this._gain /= i;
      console.info(`[dotfield] intensity clipped at ${i.toFixed(3)}, gain now ${this._gain.toFixed(3)}`);
      i = 1;
    } else if (i !== 0) {
      this._gain = Math.min(this._gain + dt / GAIN_RECOVERY_SECONDS, MAX_GAIN);
    }

    this._value = i;
    return i;
  }

  destroy(): void {
    this.source?.destroy?.();
    this.source = null;
  }
}
