/**
 * iTerm2 Inline Images Protocol Detection
 *
 * Environment-based only (fast, no terminal queries):
 * - TERM_GRAPHICS=iterm forces support, TERM_GRAPHICS=none disables it
 * - TERM=mintty
 * - LC_TERMINAL=iTerm2
 * - TERM_PROGRAM=WezTerm (WezTerm supports the iTerm2 protocol)
 */

import { getLogger } from '../logging.ts';
import type { GraphicsEnvironment } from '../graphics/environment.ts';
import type { ITermCapabilities } from './types.ts';

const logger = getLogger('ITermDetect');

/**
 * Detect iTerm2 capabilities from the environment.
 */
export function detectITermCapabilities(env: GraphicsEnvironment): ITermCapabilities {
  if (env.hasTermGraphics('none')) {
    logger.debug('iTerm2 disabled - graphics override is none');
    return { supported: false, detectionMethod: 'override' };
  }

  if (env.hasTermGraphics('iterm')) {
    logger.debug('iTerm2 forced via graphics override');
    return { supported: true, detectionMethod: 'override' };
  }

  if (env.term === 'mintty') {
    logger.debug('mintty detected via TERM (supports iTerm2 protocol)');
    return { supported: true, detectionMethod: 'env', terminalProgram: 'mintty' };
  }

  if (env.lcTerminal === 'iterm2') {
    logger.debug('iTerm2 detected via LC_TERMINAL');
    return { supported: true, detectionMethod: 'env', terminalProgram: 'iTerm2' };
  }

  if (env.termProgram === 'wezterm') {
    logger.debug('WezTerm detected via TERM_PROGRAM (supports iTerm2 protocol)');
    return { supported: true, detectionMethod: 'env', terminalProgram: 'WezTerm' };
  }

  logger.debug('No iTerm2 environment hints found');
  return { supported: false, detectionMethod: 'none' };
}
