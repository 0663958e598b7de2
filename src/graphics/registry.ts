/**
 * Encoder registry keyed by TermType.
 */

import { ITermEncoder } from '../iterm2/encoder.ts';
import { KittyEncoder } from '../kitty/encoder.ts';
import { SixelEncoder } from '../sixel/encoder.ts';
import { stdin, stdout, type OutputWriter, type TerminalInput, type TerminalOutput } from '../runtime/mod.ts';
import { DefaultEncoder } from './default-encoder.ts';
import { GraphicsEnvironment } from './environment.ts';
import { TermGraphicsError } from './errors.ts';
import { TermType } from './term-type.ts';
import type { GraphicsEncoder, RasterImage } from './types.ts';

export interface EncoderRegistryOptions {
  environment?: GraphicsEnvironment;
  /** Terminal input used for sixel detection (default: stdin) */
  input?: TerminalInput;
  /** Terminal output used for sixel detection (default: stdout) */
  output?: TerminalOutput;
  noNewline?: boolean;
}

/**
 * One encoder per protocol, plus a Default encoder trying Kitty, iTerm2 and
 * Sixel in that order. All share one environment and terminal.
 */
export class EncoderRegistry {
  private _encoders: Map<TermType, GraphicsEncoder>;

  constructor(options: EncoderRegistryOptions = {}) {
    const environment = options.environment ?? new GraphicsEnvironment();
    const noNewline = options.noNewline ?? false;

    const kitty = new KittyEncoder({ environment, noNewline });
    const iterm = new ITermEncoder({ environment, noNewline });
    const sixel = new SixelEncoder({
      environment,
      noNewline,
      input: options.input ?? stdin,
      output: options.output ?? stdout,
    });

    this._encoders = new Map<TermType, GraphicsEncoder>([
      [TermType.Kitty, kitty],
      [TermType.ITerm, iterm],
      [TermType.Sixel, sixel],
      [TermType.Default, new DefaultEncoder([kitty, iterm, sixel])],
    ]);
  }

  /**
   * Encoder for a type, undefined for None.
   */
  get(type: TermType): GraphicsEncoder | undefined {
    return this._encoders.get(type);
  }

  available(type: TermType = TermType.Default): Promise<boolean> {
    const encoder = this.get(type);
    return encoder ? encoder.available() : Promise.resolve(false);
  }

  async encode(out: OutputWriter, image: RasterImage, type: TermType = TermType.Default): Promise<void> {
    const encoder = this.get(type);
    if (!encoder) {
      throw new TermGraphicsError('TERM_GRAPHICS_NOT_AVAILABLE');
    }
    await encoder.encode(out, image);
  }
}

let defaultRegistry: EncoderRegistry | undefined;

/**
 * Process-wide registry over the process environment, stdin and stdout.
 */
export function getDefaultRegistry(): EncoderRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new EncoderRegistry();
  }
  return defaultRegistry;
}

/**
 * Replace the process-wide registry (undefined recreates it on next use).
 */
export function setDefaultRegistry(registry: EncoderRegistry | undefined): void {
  defaultRegistry = registry;
}

export function termTypeAvailable(type: TermType): Promise<boolean> {
  return getDefaultRegistry().available(type);
}

export function termTypeEncode(type: TermType, out: OutputWriter, image: RasterImage): Promise<void> {
  return getDefaultRegistry().encode(out, image, type);
}

/**
 * Whether any terminal graphics protocol is available.
 */
export function available(): Promise<boolean> {
  return getDefaultRegistry().available();
}

/**
 * Encode an image with the first available protocol.
 */
export function encode(out: OutputWriter, image: RasterImage): Promise<void> {
  return getDefaultRegistry().encode(out, image);
}
