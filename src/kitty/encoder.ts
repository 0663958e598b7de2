/**
 * Kitty Graphics Protocol Encoder
 *
 * Encodes images as PNG files transmitted through Kitty graphics escape sequences.
 *
 * ## Protocol Format
 *
 * All commands use the Application Programming Command (APC) structure:
 * ```
 * <ESC>_G<control data>;<payload><ESC>\
 * ```
 *
 * The transfer opens with a transmit-and-display command for a PNG file
 * (`a=T,f=100`) announcing chunked data (`m=1`), and carries no payload.
 *
 * ## Chunking
 *
 * The base64 payload is split into chunks no larger than 4096 bytes:
 * - Intermediate chunks: `m=1`
 * - Final chunk: `m=0`
 *
 * An empty payload still produces a single `m=0` chunk so the transfer is terminated.
 */

import { encodePng } from '../deps.ts';
import { getLogger } from '../logging.ts';
import { GraphicsEnvironment } from '../graphics/environment.ts';
import { assertImageShape, encodeBase64, toRgbaBytes } from '../graphics/pixels.ts';
import type { GraphicsEncoder, RasterImage } from '../graphics/types.ts';
import { writeText, type OutputWriter } from '../runtime/mod.ts';
import { detectKittyCapabilities } from './detect.ts';
import type { KittyEncoderOptions, KittyOutput } from './types.ts';

const logger = getLogger('KittyEncoder');

// Maximum chunk size for base64-encoded data
export const MAX_CHUNK_SIZE = 4096;

export const KITTY_PREAMBLE = '\x1b_Ga=T,f=100,m=1;\x1b\\';

/**
 * Split base64 string into chunks (at least one, possibly empty)
 */
function splitIntoChunks(data: string, maxSize: number): string[] {
  if (data.length === 0) {
    return [''];
  }
  const chunks: string[] = [];
  for (let i = 0; i < data.length; i += maxSize) {
    chunks.push(data.slice(i, i + maxSize));
  }
  return chunks;
}

/**
 * Wrap a base64 payload in the Kitty chunked transfer sequences.
 */
export function frameKittyPayload(base64Data: string): KittyOutput {
  const dataChunks = splitIntoChunks(base64Data, MAX_CHUNK_SIZE);
  const chunks = dataChunks.map((chunk, i) => {
    const more = i < dataChunks.length - 1 ? 1 : 0;
    // ESC _ G m=<more> ; <data> ESC \
    return `\x1b_Gm=${more};${chunk}\x1b\\`;
  });

  return {
    preamble: KITTY_PREAMBLE,
    chunks,
    totalBytes: base64Data.length,
  };
}

/**
 * Encode an image to the Kitty graphics protocol as a chunked PNG transfer.
 */
export function encodeToKitty(image: RasterImage): KittyOutput {
  assertImageShape(image);

  logger.debug('Encoding to Kitty', {
    width: image.width,
    height: image.height,
    kind: image.kind,
  });

  const pngBytes = encodePng({
    width: image.width,
    height: image.height,
    data: toRgbaBytes(image),
    depth: 8,
    channels: 4,
  });

  const output = frameKittyPayload(encodeBase64(pngBytes));

  logger.debug('Kitty encoding complete', {
    chunks: output.chunks.length,
    totalBytes: output.totalBytes,
  });

  return output;
}

/**
 * Calculate the number of chunks needed for a base64 payload
 */
export function calculateChunkCount(payloadLength: number): number {
  return Math.max(1, Math.ceil(payloadLength / MAX_CHUNK_SIZE));
}

/**
 * Kitty terminal graphics encoder.
 *
 * See: https://sw.kovidgoyal.net/kitty/graphics-protocol/
 */
export class KittyEncoder implements GraphicsEncoder {
  private _environment: GraphicsEnvironment;
  private _noNewline: boolean;

  constructor(options: KittyEncoderOptions = {}) {
    this._environment = options.environment ?? new GraphicsEnvironment();
    this._noNewline = options.noNewline ?? false;
  }

  async available(): Promise<boolean> {
    return detectKittyCapabilities(this._environment).supported;
  }

  async encode(out: OutputWriter, image: RasterImage): Promise<void> {
    const output = encodeToKitty(image);
    writeText(out, output.preamble);
    for (const chunk of output.chunks) {
      writeText(out, chunk);
    }
    if (!this._noNewline) {
      writeText(out, '\n');
    }
  }
}
