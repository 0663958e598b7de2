/**
 * iTerm2 Inline Images Protocol Types
 *
 * The iTerm2 protocol uses OSC escape sequences to display images inline:
 * ESC ] 1337 ; File = [params] : <base64-data> BEL
 *
 * Unlike Kitty/Sixel which take raw pixels, iTerm2 expects encoded image
 * files (PNG, JPEG, GIF, etc.) as the payload.
 */

import type { BaseCapabilities, EncoderOptions } from '../graphics/types.ts';

/**
 * iTerm2 terminal capabilities
 */
export interface ITermCapabilities extends BaseCapabilities {
  /** Terminal program name if detected */
  terminalProgram?: string;
}

export type ITermImageFormat = 'png' | 'jpeg';

/**
 * iTerm2 encode options
 */
export interface ITermEncodeOptions {
  /** JPEG quality 1-100 (default: config jpeg.quality) */
  jpegQuality?: number;
}

/**
 * iTerm2 encoder output
 */
export interface ITermOutput {
  /** Escape sequence to output */
  sequence: string;
  /** File format carried in the payload */
  format: ITermImageFormat;
  /** Base64 payload length in bytes */
  totalBytes: number;
}

export type ITermEncoderOptions = EncoderOptions;
