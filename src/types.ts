import type { IntensitySource } from './intensity';

/** Drawable size in pixels. Both components are > 0 once resolved. */
export interface WindowExtent {
  width: number;
  height: number;
}

/** A single simulated point. Position in pixels, velocity in pixels/second. */
export interface Point {
  position: [number, number];
  velocity: [number, number];
}

/**
 * Billboard style. `pointSize` is the billboard diameter in pixels and
 * `intensity` the peak opacity. Values above 1 are passed through unchanged.
 */
export interface PointStyle {
  pointSize: number;
  intensity: number;
}

/** How the point storage buffer is shared between frames. */
export type BufferMode = 'single' | 'ping-pong';

/** `billboard` draws soft instanced discs; `point` is the 1-pixel fallback. */
export type ParticleStyle = 'billboard' | 'point';

/** Random source returning values in [0, 1). */
export type RandomSource = () => number;

/** Configuration for Dotfield.create(). */
export interface DotfieldConfig {
  canvas: HTMLCanvasElement;
  pointCount?: number;
  pointSize?: number;
  intensity?: number;
  /** URL of the background image. No background is drawn when omitted. */
  backgroundImage?: string;
  /** Pixel size the background asset is scaled to. Default 1920x1080. */
  backgroundSize?: [number, number];
  backgroundAddressMode?: GPUAddressMode;
  sampleCount?: 1 | 4;
  bufferMode?: BufferMode;
  particleStyle?: ParticleStyle;
  /** Re-seed point positions whenever the drawable is resized. Default true. */
  reseedOnResize?: boolean;
  random?: RandomSource;
  intensitySource?: IntensitySource;
  onDeviceLost?: (reason: string) => void;
  onError?: (err: unknown) => void;
}

/** Resolved config with all defaults applied. */
export interface ResolvedConfig {
  canvas: HTMLCanvasElement;
  pointCount: number;
  pointSize: number;
  intensity: number;
  backgroundImage?: string;
  backgroundSize: [number, number];
  backgroundAddressMode: GPUAddressMode;
  sampleCount: 1 | 4;
  bufferMode: BufferMode;
  particleStyle: ParticleStyle;
  reseedOnResize: boolean;
  random: RandomSource;
  intensitySource?: IntensitySource;
  onDeviceLost?: (reason: string) => void;
  onError?: (err: unknown) => void;
}

/** Live statistics. */
export interface DotfieldStats {
  fps: number;
  frameDt: number;
  frameTimeAvg: number;
  frameTimeMax: number;
  frameCount: number;
  pointCount: number;
  intensity: number;
}

export function validateConfig(config: DotfieldConfig): ResolvedConfig {
  if (!config.canvas) {
    throw new Error('canvas is required');
  }
  const pointCount = config.pointCount ?? 1000;
  if (!Number.isInteger(pointCount) || pointCount <= 0) {
    throw new Error('pointCount must be a positive integer');
  }
  const pointSize = config.pointSize ?? 5;
  if (!(pointSize > 0)) {
    throw new Error('pointSize must be > 0');
  }
  const intensity = config.intensity ?? 0.8;
  if (!(intensity >= 0)) {
    throw new Error('intensity must be >= 0');
  }
  const backgroundSize = config.backgroundSize ?? [1920, 1080];
  if (!backgroundSize.every(v => Number.isInteger(v) && v > 0)) {
    throw new Error('backgroundSize must be two positive integers');
  }
  const sampleCount = config.sampleCount ?? 4;
  if (sampleCount !== 1 && sampleCount !== 4) {
    throw new Error('sampleCount must be 1 or 4');
  }
  const bufferMode = config.bufferMode ?? 'single';
  if (bufferMode !== 'single' && bufferMode !== 'ping-pong') {
    throw new Error(`unknown bufferMode '${String(bufferMode)}'`);
  }
  const particleStyle = config.particleStyle ?? 'billboard';
  if (particleStyle !== 'billboard' && particleStyle !== 'point') {
    throw new Error(`unknown particleStyle '${String(particleStyle)}'`);
  }
  return {
    canvas: config.canvas,
    pointCount,
    pointSize,
    intensity,
    backgroundImage: config.backgroundImage,
    backgroundSize: [backgroundSize[0], backgroundSize[1]],
    backgroundAddressMode: config.backgroundAddressMode ?? 'repeat',
    sampleCount,
    bufferMode,
    particleStyle,
    reseedOnResize: config.reseedOnResize ?? true,
    random: config.random ?? Math.random,
    intensitySource: config.intensitySource,
    onDeviceLost: config.onDeviceLost,
    onError: config.onError,
  };
}
