/**
 * Terminal Graphics Types
 */

import type { OutputWriter } from '../runtime/mod.ts';
import type { GraphicsEnvironment } from './environment.ts';

/**
 * Truecolor image. Pixels are packed 0xRRGGBBAA, R in the high bits.
 */
export interface RgbaImage {
  kind: 'rgba';
  width: number;
  height: number;
  pixels: Uint32Array;
}

/**
 * Indexed image. Each byte of `indices` selects a packed 0xRRGGBBAA palette entry.
 */
export interface PalettedImage {
  kind: 'paletted';
  width: number;
  height: number;
  indices: Uint8Array;
  palette: number[];
}

export type RasterImage = RgbaImage | PalettedImage;

/**
 * A terminal graphics protocol encoder.
 *
 * `available()` never rejects: detection failures resolve to false.
 */
export interface GraphicsEncoder {
  available(): Promise<boolean>;
  encode(out: OutputWriter, image: RasterImage): Promise<void>;
}

/**
 * Options shared by the protocol encoders.
 */
export interface EncoderOptions {
  /** Skip the newline written after each image */
  noNewline?: boolean;
  /** Environment signals to decide availability from (default: process environment) */
  environment?: GraphicsEnvironment;
}

/**
 * How a protocol's availability was decided.
 */
export type DetectionMethod = 'override' | 'env' | 'query' | 'none';

/**
 * Base shape of every protocol's capabilities.
 */
export interface BaseCapabilities {
  supported: boolean;
  detectionMethod: DetectionMethod;
}
