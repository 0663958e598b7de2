// Pixel helpers shared by the protocol encoders

import type { PalettedImage, RasterImage, RgbaImage } from './types.ts';

/**
 * Pack RGBA components into a 32-bit value (0xRRGGBBAA)
 */
export function packRGBA(r: number, g: number, b: number, a: number = 255): number {
  return (((r & 0xFF) << 24) | ((g & 0xFF) << 16) | ((b & 0xFF) << 8) | (a & 0xFF)) >>> 0;
}

export function createRgbaImage(width: number, height: number, pixels?: Uint32Array): RgbaImage {
  return { kind: 'rgba', width, height, pixels: pixels ?? new Uint32Array(width * height) };
}

export function createPalettedImage(
  width: number,
  height: number,
  palette: number[],
  indices?: Uint8Array
): PalettedImage {
  return { kind: 'paletted', width, height, palette, indices: indices ?? new Uint8Array(width * height) };
}

/**
 * Throw a RangeError unless the pixel buffer matches the image dimensions.
 */
export function assertImageShape(image: RasterImage): void {
  const { width, height } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`Invalid image dimensions ${width}x${height}`);
  }
  const length = image.kind === 'rgba' ? image.pixels.length : image.indices.length;
  if (length !== width * height) {
    throw new RangeError(`Image buffer holds ${length} pixels, expected ${width * height}`);
  }
}

/**
 * Convert an image to RGBA bytes (4 bytes per pixel).
 * Paletted indices outside the palette become transparent black.
 */
export function toRgbaBytes(image: RasterImage): Uint8Array {
  assertImageShape(image);
  const count = image.width * image.height;
  const bytes = new Uint8Array(count * 4);

  for (let i = 0; i < count; i++) {
    const pixel = image.kind === 'rgba'
      ? image.pixels[i]
      : image.palette[image.indices[i]] ?? 0;
    const offset = i * 4;

    bytes[offset] = (pixel >>> 24) & 0xFF;     // R
    bytes[offset + 1] = (pixel >>> 16) & 0xFF; // G
    bytes[offset + 2] = (pixel >>> 8) & 0xFF;  // B
    bytes[offset + 3] = pixel & 0xFF;          // A
  }

  return bytes;
}

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}
