import { PHYSICS_WORKGROUP_SIZE } from './physics';
import { POINT_STRIDE_BYTES } from './point-store';

export interface Capabilities {
  webgpu: boolean;
  /** Canvas format the browser prefers, or null without WebGPU. */
  preferredFormat: GPUTextureFormat | null;
  /** getUserMedia is available for the audio intensity source. */
  audioInput: boolean;
}

export function detectCapabilities(nav: Navigator = navigator): Capabilities {
  const webgpu = 'gpu' in nav;
  const preferredFormat = webgpu ? nav.gpu.getPreferredCanvasFormat() : null;
  const audioInput = typeof nav.mediaDevices?.getUserMedia === 'function';
  return { webgpu, preferredFormat, audioInput };
}

/**
 * Check the device limits against what a population of `pointCount` needs.
 * Returns a description of the first limit exceeded, or null.
 */
export function checkLimits(limits: GPUSupportedLimits, pointCount: number): string | null {
  const bytes = pointCount * POINT_STRIDE_BYTES;
  if (bytes > limits.maxStorageBufferBindingSize) {
    return `${pointCount} points need ${bytes} bytes, maxStorageBufferBindingSize is ${limits.maxStorageBufferBindingSize}`;
  }
  if (PHYSICS_WORKGROUP_SIZE > limits.maxComputeWorkgroupSizeX) {
    return `workgroup size ${PHYSICS_WORKGROUP_SIZE} exceeds maxComputeWorkgroupSizeX ${limits.maxComputeWorkgroupSizeX}`;
  }
  const workgroups = Math.ceil(pointCount / PHYSICS_WORKGROUP_SIZE);
  if (workgroups > limits.maxComputeWorkgroupsPerDimension) {
    return `${workgroups} workgroups exceed maxComputeWorkgroupsPerDimension ${limits.maxComputeWorkgroupsPerDimension}`;
  }
  return null;
}

export function logCapabilities(caps: Capabilities, adapter?: GPUAdapter): void {
  console.group('[dotfield] Capabilities');
  console.log('WebGPU:', caps.webgpu);
  console.log('Preferred format:', caps.preferredFormat);
  console.log('Audio input:', caps.audioInput);
  if (adapter) {
    console.log('Adapter:', `${adapter.info.vendor} ${adapter.info.architecture}`.trim() || 'unknown');
    console.log('Max storage binding:', adapter.limits.maxStorageBufferBindingSize);
  }
  if (!caps.webgpu) {
    console.warn('WebGPU unavailable. Use a browser with WebGPU enabled.');
  }
  console.groupEnd();
}
