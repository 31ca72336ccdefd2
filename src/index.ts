export { Dotfield } from './dotfield';
export type {
  DotfieldConfig,
  ResolvedConfig,
  DotfieldStats,
  PointStyle,
  Point,
  WindowExtent,
  BufferMode,
  ParticleStyle,
  RandomSource,
} from './types';
export { validateConfig } from './types';
export type { HookPhase, HookFn } from './game-loop';
export type { Renderer } from './renderer';

// Intensity
export type { IntensitySource, AudioPeakOptions } from './intensity';
export { ConstantIntensitySource, AudioPeakIntensitySource, IntensityController, peakAmplitude } from './intensity';

// Background
export { backgroundUv, screenPanOffset } from './background';
export type { BackgroundImage, BackgroundLoadOptions } from './background-loader';

// CPU mirrors of the shader math
export { stepPoint, stepPoints, physicsWorkgroupCount, PHYSICS_WORKGROUP_SIZE } from './physics';
export { billboardAlpha, billboardVertex, worldToNdc } from './billboard';
export { packPoints, unpackPoint, seedPoints, POINT_STRIDE_BYTES } from './point-store';

export { detectCapabilities, checkLimits } from './capabilities';
export type { Capabilities } from './capabilities';
