/**
 * Kitty Graphics Protocol Types
 */

import type { BaseCapabilities, EncoderOptions } from '../graphics/types.ts';

/**
 * Kitty terminal capabilities
 */
export interface KittyCapabilities extends BaseCapabilities {
  /** Terminal program name if detected */
  terminalProgram?: string;
}

/**
 * Kitty encoder output
 */
export interface KittyOutput {
  /** Transmit-and-display command opening the chunked transfer */
  preamble: string;
  /** Payload chunks, each wrapped in its own escape sequence */
  chunks: string[];
  /** Base64 payload length in bytes */
  totalBytes: number;
}

export type KittyEncoderOptions = EncoderOptions;
