/**
 * Kitty Graphics Protocol Detection
 *
 * Environment-based only; no terminal query is sent.
 *
 * - TERM_GRAPHICS=kitty forces support, TERM_GRAPHICS=none disables it
 * - TERM=xterm-kitty (kitty itself)
 * - TERM_PROGRAM=ghostty
 */

import { getLogger } from '../logging.ts';
import type { GraphicsEnvironment } from '../graphics/environment.ts';
import type { KittyCapabilities } from './types.ts';

const logger = getLogger('KittyDetect');

/**
 * Detect kitty capabilities from the environment.
 */
export function detectKittyCapabilities(env: GraphicsEnvironment): KittyCapabilities {
  if (env.hasTermGraphics('none')) {
    logger.debug('Kitty disabled - graphics override is none');
    return { supported: false, detectionMethod: 'override' };
  }

  if (env.hasTermGraphics('kitty')) {
    logger.debug('Kitty forced via graphics override');
    return { supported: true, detectionMethod: 'override' };
  }

  if (env.term === 'xterm-kitty') {
    logger.debug('Kitty detected via TERM');
    return { supported: true, detectionMethod: 'env', terminalProgram: 'kitty' };
  }

  if (env.termProgram === 'ghostty') {
    logger.debug('Ghostty detected via TERM_PROGRAM');
    return { supported: true, detectionMethod: 'env', terminalProgram: 'ghostty' };
  }

  return { supported: false, detectionMethod: 'none' };
}
