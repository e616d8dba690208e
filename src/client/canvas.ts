import type { RgbaImage } from '../render/rgba-image.js';

/**
 * Create a canvas of `width` x `height` device pixels inside `container`.
 * The 2D context is null where the host has no canvas support.
 */
export function createCanvas(
  container: HTMLElement,
  width: number,
  height: number,
): { canvas: HTMLCanvasElement; ctx: CanvasRenderingContext2D | null } {
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  canvas.style.display = 'block';
  canvas.style.maxWidth = '100%';
  container.appendChild(canvas);
  return { canvas, ctx: canvas.getContext('2d') };
}

/** Copy a rendered raster onto the canvas at its origin. */
export function blit(ctx: CanvasRenderingContext2D, image: RgbaImage): void {
  const imageData = ctx.createImageData(image.width, image.height);
  imageData.data.set(image.data);
  ctx.putImageData(imageData, 0, 0);
}

/** Canvas pixel under a mouse event, allowing for CSS scaling. */
export function eventToCanvasPixel(canvas: HTMLCanvasElement, e: MouseEvent): { x: number; y: number } {
  const rect = canvas.getBoundingClientRect();
  const scaleX = rect.width > 0 ? canvas.width / rect.width : 1;
  const scaleY = rect.height > 0 ? canvas.height / rect.height : 1;
  return {
    x: (e.clientX - rect.left) * scaleX,
    y: (e.clientY - rect.top) * scaleY,
  };
}
