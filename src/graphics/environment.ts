/**
 * Terminal Environment Signals
 *
 * Availability of the Kitty and iTerm2 protocols is decided from environment
 * variables alone. TERM_GRAPHICS overrides every heuristic: it can force one
 * protocol on, or disable graphics with `none`.
 */

import { Env, type EnvMap } from '../env.ts';
import { getLogger } from '../logging.ts';

const logger = getLogger('TerminalEnv');

export const TERM_GRAPHICS_ENV = 'TERM_GRAPHICS';

export type EnvLookup = (name: string) => string | undefined;

export class GraphicsEnvironment {
  private _lookup: EnvLookup;
  private _override: string | null = null;

  /**
   * @param source - Plain variable map, a lookup function, or nothing for the process environment
   */
  constructor(source?: EnvMap | EnvLookup) {
    if (typeof source === 'function') {
      this._lookup = source;
    } else if (source) {
      this._lookup = name => source[name];
    } else {
      this._lookup = name => Env.get(name);
    }
  }

  /**
   * Lower-cased value of a variable, '' when unset.
   */
  get(name: string): string {
    return (this._lookup(name) ?? '').toLowerCase();
  }

  /**
   * Lower-cased TERM_GRAPHICS, read once and kept for the life of this instance.
   */
  get override(): string {
    if (this._override === null) {
      this._override = this.get(TERM_GRAPHICS_ENV);
      if (this._override !== '') {
        logger.debug('Graphics override set', { override: this._override });
      }
    }
    return this._override;
  }

  /**
   * True when TERM_GRAPHICS names the given protocol token.
   */
  hasTermGraphics(type: string): boolean {
    return this.override === type;
  }

  get term(): string {
    return this.get('TERM');
  }

  get termProgram(): string {
    return this.get('TERM_PROGRAM');
  }

  get lcTerminal(): string {
    return this.get('LC_TERMINAL');
  }
}
