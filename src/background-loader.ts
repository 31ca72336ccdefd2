import type { ResourcePool } from './render/resource-pool';
import { Resources } from './render/bindings';
import { fillCrop } from './background';

export interface BackgroundImage {
  texture: GPUTexture;
  view: GPUTextureView;
  sampler: GPUSampler;
  width: number;
  height: number;
}

export interface BackgroundLoadOptions {
  /** Size to decode the image to; must match the pipeline's IMAGE_WIDTH/HEIGHT. */
  size: readonly [number, number];
  addressMode?: GPUAddressMode;
}

/**
 * Load a background image into an rgba8unorm texture.
 *
 * fetch -> Blob -> createImageBitmap, cropped to the aspect ratio of `size`
 * and scaled to it -> copyExternalImageToTexture. Fetch and decode failures
 * reject; there is no fallback image.
 */
export async function loadBackground(
  device: GPUDevice,
  url: string,
  opts: BackgroundLoadOptions,
): Promise<BackgroundImage> {
  const [width, height] = opts.size;

  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Failed to fetch background ${url}: ${response.status}`);
  }
  const blob = await response.blob();

  let bitmap: ImageBitmap;
  try {
    const source = await createImageBitmap(blob);
    const crop = fillCrop(source.width, source.height, width, height);
    try {
      bitmap = await createImageBitmap(source, crop.x, crop.y, crop.width, crop.height, {
        resizeWidth: width,
        resizeHeight: height,
        resizeQuality: 'high',
      });
    } finally {
      source.close();
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to decode background ${url}: ${reason}`);
  }

  const texture = device.createTexture({
    label: 'background',
    size: { width, height },
    format: 'rgba8unorm',
    usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST | GPUTextureUsage.RENDER_ATTACHMENT,
  });
  device.queue.copyExternalImageToTexture(
    { source: bitmap },
    { texture },
    { width: bitmap.width, height: bitmap.height },
  );
  bitmap.close();

  const addressMode = opts.addressMode ?? 'repeat';
  const sampler = device.createSampler({
    label: 'background-sampler',
    addressModeU: addressMode,
    addressModeV: addressMode,
    magFilter: 'linear',
    minFilter: 'nearest',
  });

  return { texture, view: texture.createView(), sampler, width, height };
}

/** Publish a loaded background under the names BackgroundPass binds. */
export function registerBackground(resources: ResourcePool, image: BackgroundImage): void {
  resources.setTexture(Resources.backgroundTexture, image.texture);
  resources.setTextureView(Resources.backgroundTexture, image.view);
  resources.setSampler(Resources.backgroundSampler, image.sampler);
}
