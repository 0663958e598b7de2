/**
 * Default encoder: the first available protocol, chosen once.
 */

import { getLogger } from '../logging.ts';
import type { OutputWriter } from '../runtime/mod.ts';
import { TermGraphicsError } from './errors.ts';
import type { GraphicsEncoder, RasterImage } from './types.ts';

const logger = getLogger('DefaultEncoder');

type Resolution =
  | { encoder: GraphicsEncoder; error?: undefined }
  | { encoder?: undefined; error: TermGraphicsError };

/**
 * Wraps several encoders and delegates to the first whose `available()`
 * resolves true. The choice is made on first use and shared by every caller,
 * including concurrent ones.
 */
export class DefaultEncoder implements GraphicsEncoder {
  private _encoders: readonly GraphicsEncoder[];
  private _resolution: Promise<Resolution> | null = null;

  constructor(encoders: readonly GraphicsEncoder[]) {
    this._encoders = encoders;
  }

  private _resolve(): Promise<Resolution> {
    if (!this._resolution) {
      this._resolution = this._pick();
    }
    return this._resolution;
  }

  private async _pick(): Promise<Resolution> {
    for (const [index, encoder] of this._encoders.entries()) {
      if (await encoder.available()) {
        logger.debug('Encoder selected', { index, encoder: encoder.constructor.name });
        return { encoder };
      }
    }
    logger.debug('No terminal graphics encoder available', { candidates: this._encoders.length });
    return { error: new TermGraphicsError('TERM_GRAPHICS_NOT_AVAILABLE') };
  }

  async available(): Promise<boolean> {
    const resolution = await this._resolve();
    return resolution.encoder !== undefined;
  }

  async encode(out: OutputWriter, image: RasterImage): Promise<void> {
    const resolution = await this._resolve();
    if (resolution.error) {
      throw resolution.error;
    }
    await resolution.encoder.encode(out, image);
  }
}
