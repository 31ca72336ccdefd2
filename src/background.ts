import type { WindowExtent } from './types';

/**
 * Texture coordinate sampled at a corner of the background quad
 * (CPU mirror of background.wgsl).
 *
 * The visible window covers `[windowPos, windowPos + extent]` of the image,
 * with `windowPos.y` measured from the image's bottom edge; `v` is flipped
 * afterwards to match texture row order.
 */
export function backgroundUv(
  corner: readonly [number, number],
  extent: WindowExtent,
  windowPos: readonly [number, number],
  imageSize: readonly [number, number],
): [number, number] {
  const u = (corner[0] * extent.width + windowPos[0]) / imageSize[0];
  const v = (corner[1] * extent.height + windowPos[1]) / imageSize[1];
  return [u, 1 - v];
}

/**
 * Pan offset that keeps a screen-sized background fixed to the screen while
 * the window moves: x from the left edge, y from the bottom edge.
 */
export function screenPanOffset(
  screenX: number,
  screenY: number,
  windowHeight: number,
  screenHeight: number,
): [number, number] {
  return [screenX, screenHeight - (windowHeight + screenY)];
}

export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Centered region of a `srcWidth`×`srcHeight` image with the aspect ratio
 * of `dstWidth`×`dstHeight`. Scaling that region to the destination fills
 * it without distortion; the overhang on the longer axis is cut off.
 */
export function fillCrop(
  srcWidth: number,
  srcHeight: number,
  dstWidth: number,
  dstHeight: number,
): CropRect {
  if (srcWidth * dstHeight > dstWidth * srcHeight) {
    const width = Math.max(1, Math.round((srcHeight * dstWidth) / dstHeight));
    return { x: Math.floor((srcWidth - width) / 2), y: 0, width, height: srcHeight };
  }
  const height = Math.max(1, Math.round((srcWidth * dstHeight) / dstWidth));
  return { x: 0, y: Math.floor((srcHeight - height) / 2), width: srcWidth, height };
}
