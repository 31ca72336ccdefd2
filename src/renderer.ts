import physicsShader from './shaders/physics.wgsl?raw';
import backgroundShader from './shaders/background.wgsl?raw';
import particleShader from './shaders/particles.wgsl?raw';
import pointShader from './shaders/points.wgsl?raw';

import type { PointStyle, ResolvedConfig, WindowExtent } from './types';
import type { FrameState } from './render/render-pass';
import type { IntensitySource } from './intensity';
import { IntensityController } from './intensity';
import { checkLimits, detectCapabilities, logCapabilities } from './capabilities';
import { loadBackground, registerBackground, type BackgroundImage } from './background-loader';
import { FrameOrchestrator, type PresentationSurface } from './frame-orchestrator';
import { PointStore } from './point-store';
import { FrameUniforms } from './uniforms';
import { ResourcePool } from './render/resource-pool';
import { RenderGraph } from './render/render-graph';
import { RenderTargets } from './render/targets';
import { PhysicsPass } from './render/passes/physics-pass';
import { BackgroundPass } from './render/passes/background-pass';
import { ParticlePass } from './render/passes/particle-pass';
import { PointListPass } from './render/passes/point-list-pass';

export interface Renderer {
  readonly intensity: number;
  readonly frameCount: number;
  frame(dt: number): FrameState;
  requestResize(width: number, height: number): void;
  setPointStyle(style: Partial<PointStyle>): void;
  setWindowPos(x: number, y: number): void;
  setIntensitySource(source: IntensitySource | null): void;
  /** Flag the device as lost; every later frame throws. */
  markDeviceLost(reason: string): void;
  destroy(): void;
}

export interface RendererParts {
  device: GPUDevice;
  surface: PresentationSurface;
  format: GPUTextureFormat;
  extent: WindowExtent;
  /** Decoded background, when the config names one. */
  background?: BackgroundImage;
}

/**
 * Wire the GPU objects for one visualizer: point store, uniforms, the
 * physics/background/particle graph and the frame orchestrator.
 * Synchronous; everything that awaits happens in `createRenderer`.
 */
export function buildRenderer(config: ResolvedConfig, parts: RendererParts): Renderer {
  const { device, surface, format } = parts;

  PhysicsPass.SHADER_SOURCE = physicsShader;
  BackgroundPass.SHADER_SOURCE = backgroundShader;
  ParticlePass.SHADER_SOURCE = particleShader;
  PointListPass.SHADER_SOURCE = pointShader;

  const resources = new ResourcePool();
  const store = new PointStore(device, config.pointCount, config.bufferMode);
  store.register(resources);
  const uniforms = new FrameUniforms(device, resources);
  if (parts.background) registerBackground(resources, parts.background);

  const passOptions = { format, sampleCount: config.sampleCount };
  const graph = new RenderGraph();
  graph.addPass(new PhysicsPass());
  graph.addPass(new BackgroundPass({
    ...passOptions,
    imageSize: config.backgroundSize,
    hasImage: parts.background !== undefined,
  }));
  graph.addPass(config.particleStyle === 'point'
    ? new PointListPass(passOptions)
    : new ParticlePass(passOptions));
  graph.setup(device, resources);

  const targets = new RenderTargets(device, format, config.sampleCount);
  const intensity = new IntensityController(config.intensitySource ?? null, config.intensity);
  const orchestrator = new FrameOrchestrator(
    { device, surface, resources, graph, store, uniforms, targets, intensity },
    {
      extent: parts.extent,
      pointSize: config.pointSize,
      intensity: config.intensity,
      reseedOnResize: config.reseedOnResize,
      random: config.random,
    },
  );

  let destroyed = false;
  return {
    get intensity() {
      return orchestrator.intensity;
    },
    get frameCount() {
      return orchestrator.frameCount;
    },
    frame: (dt) => orchestrator.frame(dt),
    requestResize: (width, height) => orchestrator.requestResize(width, height),
    setPointStyle: (style) => orchestrator.setPointStyle(style),
    setWindowPos: (x, y) => orchestrator.setWindowPos(x, y),
    setIntensitySource: (source) => orchestrator.setIntensitySource(source),
    markDeviceLost: (reason) => orchestrator.markDeviceLost(reason),
    destroy() {
      if (destroyed) return;
      destroyed = true;
      intensity.destroy();
      graph.destroy();
      targets.destroy();
      store.destroy();
      resources.destroy();
      device.destroy();
    },
  };
}

/**
 * Bootstrap WebGPU on the configured canvas and build a renderer.
 *
 * Rejects when WebGPU or an adapter is unavailable, when the device limits
 * cannot hold the population, or when the background image fails to load.
 */
export async function createRenderer(config: ResolvedConfig): Promise<Renderer> {
  const caps = detectCapabilities();
  if (!caps.webgpu || !caps.preferredFormat) {
    logCapabilities(caps);
    throw new Error('WebGPU is not available');
  }
  const adapter = await navigator.gpu.requestAdapter();
  if (!adapter) throw new Error('No WebGPU adapter');
  logCapabilities(caps, adapter);

  const limitError = checkLimits(adapter.limits, config.pointCount);
  if (limitError) throw new Error(`Device limits: ${limitError}`);

  const device = await adapter.requestDevice();
  const canvas = config.canvas;
  const context = canvas.getContext('webgpu');
  if (!context) {
    device.destroy();
    throw new Error('Failed to acquire a WebGPU canvas context');
  }
  const format = caps.preferredFormat;
  context.configure({ device, format, alphaMode: 'opaque' });

  let background: BackgroundImage | undefined;
  if (config.backgroundImage) {
    try {
      background = await loadBackground(device, config.backgroundImage, {
        size: config.backgroundSize,
        addressMode: config.backgroundAddressMode,
      });
    } catch (err) {
      device.destroy();
      throw err;
    }
  }

  const surface: PresentationSurface = {
    getCurrentTexture: () => context.getCurrentTexture(),
    resize: (width, height) => {
      canvas.width = width;
      canvas.height = height;
    },
  };
  let renderer: Renderer;
  try {
    renderer = buildRenderer(config, {
      device,
      surface,
      format,
      extent: { width: canvas.width, height: canvas.height },
      background,
    });
  } catch (err) {
    background?.texture.destroy();
    device.destroy();
    throw err;
  }

  device.onuncapturederror = (ev) => {
    console.error('[dotfield] GPU error:', ev.error.message);
  };
  device.lost
    .then((info) => {
      if (info.reason === 'destroyed') return;
      const reason = info.message || String(info.reason);
      console.error(`[dotfield] GPU device lost: ${reason}`);
      renderer.markDeviceLost(reason);
      config.onDeviceLost?.(reason);
    })
    .catch((err: unknown) => {
      console.error('[dotfield] device loss handler failed', err);
    });

  return renderer;
}
