// Sixel encoder - converts images to sixel format
// Quantization and band encoding are done by the sixel package

import { image2sixel } from '../deps.ts';
import { getLogger } from '../logging.ts';
import { RasterConfig } from '../config/mod.ts';
import { GraphicsEnvironment } from '../graphics/environment.ts';
import { assertImageShape, toRgbaBytes } from '../graphics/pixels.ts';
import type { EncoderOptions, GraphicsEncoder, RasterImage } from '../graphics/types.ts';
import {
  stdin,
  stdout,
  writeText,
  type OutputWriter,
  type TerminalInput,
  type TerminalOutput,
} from '../runtime/mod.ts';
import { hasSixelSupport } from './detect.ts';

const logger = getLogger('SixelEncoder');

/**
 * Sixel encoding options
 */
export interface SixelEncodeOptions {
  /** Maximum palette size, 2-256 (default: config sixel.maxColors) */
  maxColors?: number;
}

export interface SixelEncoderOptions extends EncoderOptions {
  /** Terminal input queried during detection (default: stdin) */
  input?: TerminalInput;
  /** Terminal output queried during detection (default: stdout) */
  output?: TerminalOutput;
}

/**
 * Encode an image to a complete sixel sequence (DCS q ... ST).
 */
export function encodeToSixel(image: RasterImage, options: SixelEncodeOptions = {}): string {
  assertImageShape(image);
  const maxColors = options.maxColors ?? RasterConfig.get().sixelMaxColors;
  const startTime = performance.now();

  const data = image2sixel(toRgbaBytes(image), image.width, image.height, maxColors);

  logger.debug('Sixel encoding complete', {
    width: image.width,
    height: image.height,
    maxColors,
    size: data.length,
    encodingTimeMs: Math.round((performance.now() - startTime) * 100) / 100,
  });

  return data;
}

/**
 * Sixel terminal graphics encoder.
 *
 * See: https://saitoha.github.io/libsixel/
 */
export class SixelEncoder implements GraphicsEncoder {
  private _environment: GraphicsEnvironment;
  private _noNewline: boolean;
  private _input: TerminalInput;
  private _output: TerminalOutput;

  constructor(options: SixelEncoderOptions = {}) {
    this._environment = options.environment ?? new GraphicsEnvironment();
    this._noNewline = options.noNewline ?? false;
    this._input = options.input ?? stdin;
    this._output = options.output ?? stdout;
  }

  async available(): Promise<boolean> {
    if (this._environment.hasTermGraphics('none')) {
      return false;
    }
    if (this._environment.hasTermGraphics('sixel')) {
      logger.debug('Sixel forced via graphics override');
      return true;
    }
    return hasSixelSupport(this._input, this._output);
  }

  async encode(out: OutputWriter, image: RasterImage): Promise<void> {
    writeText(out, encodeToSixel(image));
    if (!this._noNewline) {
      writeText(out, '\n');
    }
  }
}
