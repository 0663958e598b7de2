/**
 * iTerm2 Inline Images Protocol Encoder
 *
 * Encodes images to iTerm2 inline images escape sequences.
 *
 * ## Protocol Format
 *
 * ```
 * ESC ] 1337 ; File=inline=1 : <base64-data> BEL
 * ```
 *
 * The whole file goes out in one sequence; there is no multipart mode.
 *
 * ## Payload Format
 *
 * Paletted images are sent as PNG so indexed artwork stays lossless.
 * Truecolor images are sent as JPEG, which is much smaller for photographs.
 */

import { encodeJpeg, encodePng } from '../deps.ts';
import { getLogger } from '../logging.ts';
import { RasterConfig } from '../config/mod.ts';
import { GraphicsEnvironment } from '../graphics/environment.ts';
import { assertImageShape, encodeBase64, toRgbaBytes } from '../graphics/pixels.ts';
import type { GraphicsEncoder, RasterImage } from '../graphics/types.ts';
import { writeText, type OutputWriter } from '../runtime/mod.ts';
import { detectITermCapabilities } from './detect.ts';
import type { ITermEncodeOptions, ITermEncoderOptions, ITermImageFormat, ITermOutput } from './types.ts';

const logger = getLogger('ITermEncoder');

export const ITERM_PREFIX = '\x1b]1337;File=inline=1:';

export const ITERM_SUFFIX = '\x07';

function encodeImageFile(image: RasterImage, format: ITermImageFormat, jpegQuality: number): Uint8Array {
  const data = toRgbaBytes(image);
  if (format === 'png') {
    return encodePng({
      width: image.width,
      height: image.height,
      data,
      depth: 8,
      channels: 4,
    });
  }
  const jpeg = encodeJpeg({ width: image.width, height: image.height, data }, jpegQuality);
  return jpeg.data;
}

/**
 * Wrap a base64 file payload in the inline image sequence.
 */
export function frameITermPayload(base64Data: string): string {
  return `${ITERM_PREFIX}${base64Data}${ITERM_SUFFIX}`;
}

/**
 * Encode an image to an iTerm2 inline image sequence.
 */
export function encodeToITerm2(image: RasterImage, options: ITermEncodeOptions = {}): ITermOutput {
  assertImageShape(image);

  const format: ITermImageFormat = image.kind === 'paletted' ? 'png' : 'jpeg';
  const quality = options.jpegQuality ?? RasterConfig.get().jpegQuality;

  logger.debug('Encoding to iTerm2', {
    width: image.width,
    height: image.height,
    format,
    quality: format === 'jpeg' ? quality : undefined,
  });

  const base64Data = encodeBase64(encodeImageFile(image, format, quality));

  return {
    sequence: frameITermPayload(base64Data),
    format,
    totalBytes: base64Data.length,
  };
}

/**
 * iTerm2 inline images encoder.
 *
 * See: https://iterm2.com/documentation-images.html
 */
export class ITermEncoder implements GraphicsEncoder {
  private _environment: GraphicsEnvironment;
  private _noNewline: boolean;

  constructor(options: ITermEncoderOptions = {}) {
    this._environment = options.environment ?? new GraphicsEnvironment();
    this._noNewline = options.noNewline ?? false;
  }

  async available(): Promise<boolean> {
    return detectITermCapabilities(this._environment).supported;
  }

  async encode(out: OutputWriter, image: RasterImage): Promise<void> {
    const output = encodeToITerm2(image);
    writeText(out, output.sequence);
    if (!this._noNewline) {
      writeText(out, '\n');
    }
  }
}
