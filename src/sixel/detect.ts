/**
 * Sixel Terminal Capability Detection
 *
 * Detects terminal sixel graphics support with a Primary Device Attributes
 * (DA1) query.
 *
 * ## Query
 *
 * DA1: `ESC [ 0 c`
 * Response: `ESC [ ? Ps ; Ps ; ... c`. A `4` anywhere after the first
 * parameter means sixel graphics. The first parameter is the terminal id,
 * where `4` means VT132 rather than sixel.
 *
 * ## Exchange
 *
 * ```
 *  raw mode ─▶ write DA1 ─▶ read ◀──────────── reply
 *                  │                             ▲
 *                  └─ 1/16 s ─▶ write ESC ESC[6n ─┘  (nudge)
 *                                  │
 *                                  └─ 1/16 s ─▶ abandon read
 * ```
 *
 * Some terminals only flush their DA1 reply once more input is requested,
 * so a cursor position report is asked for when the reply is slow. A reply
 * read before the nudge was needed is discarded and reads as "no sixel".
 */

import { getLogger } from '../logging.ts';
import { TermGraphicsError, ensureError } from '../graphics/errors.ts';
import {
  stdin,
  stdout,
  writeText,
  type TerminalInput,
  type TerminalOutput,
} from '../runtime/mod.ts';

const logger = getLogger('SixelDetect');

export const DA1_QUERY = '\x1b[0c';

export const CURSOR_POSITION_QUERY = '\x1b\x1b[6n';

export const RESPONSE_BUFFER_SIZE = 1024;

export const RESPONSE_TIMEOUT_MS = 1000 / 16;

/**
 * Terminal mode captured before entering raw mode.
 */
export interface TerminalModeSnapshot {
  raw: boolean;
}

/**
 * One-shot timer that can be stopped before it fires and joined afterwards.
 */
export class FallbackTimer {
  /** Settles once the timer has fired (and its callback returned) or was stopped */
  readonly done: Promise<void>;

  private _handle: ReturnType<typeof setTimeout>;
  private _settle: () => void = () => {};
  private _fired = false;
  private _stopped = false;

  constructor(delayMs: number, onFire: () => void) {
    this.done = new Promise<void>(resolve => {
      this._settle = resolve;
    });
    this._handle = setTimeout(() => {
      this._fired = true;
      try {
        onFire();
      } finally {
        this._settle();
      }
    }, delayMs);
  }

  get fired(): boolean {
    return this._fired;
  }

  /**
   * Stop the timer. True if this call stopped it before it fired.
   */
  stop(): boolean {
    if (this._fired || this._stopped) {
      return false;
    }
    this._stopped = true;
    clearTimeout(this._handle);
    this._settle();
    return true;
  }
}

function restoreMode(input: TerminalInput, snapshot: TerminalModeSnapshot, errorPending: boolean): void {
  try {
    input.setRaw(snapshot.raw);
  } catch (error) {
    if (!errorPending) {
      throw error;
    }
    logger.warn('Failed to restore terminal mode', { error: ensureError(error).message });
  }
}

async function exchange(input: TerminalInput, output: TerminalOutput, request: string): Promise<Uint8Array> {
  writeText(output, request);

  const buf = new Uint8Array(RESPONSE_BUFFER_SIZE);
  const abort = new AbortController();
  let grace: ReturnType<typeof setTimeout> | undefined;

  const timer = new FallbackTimer(RESPONSE_TIMEOUT_MS, () => {
    try {
      writeText(output, CURSOR_POSITION_QUERY);
    } catch (error) {
      logger.warn('Failed to write cursor position query', { error: ensureError(error).message });
    }
    grace = setTimeout(() => abort.abort(), RESPONSE_TIMEOUT_MS);
  });

  let n: number | null = null;
  let readError: Error | undefined;
  try {
    n = await input.read(buf, abort.signal);
  } catch (error) {
    readError = ensureError(error);
  }

  const stoppedEarly = timer.stop();
  await timer.done;
  if (grace !== undefined) {
    clearTimeout(grace);
  }

  if (stoppedEarly) {
    if (readError) {
      throw readError;
    }
    if (n === null) {
      // Abort only follows the nudge, so null here is end of input
      throw new Error('terminal input closed');
    }
    logger.debug('Reply arrived before fallback query, discarding', { bytes: n });
    return new Uint8Array(0);
  }

  if (n !== null && n > 0) {
    return buf.slice(0, n);
  }

  if (readError) {
    logger.debug('Read failed after fallback query', { error: readError.message });
  }
  throw new TermGraphicsError('TERM_RESPONSE_TIMED_OUT');
}

/**
 * Send a request sequence to the terminal and capture its reply
 * (at most RESPONSE_BUFFER_SIZE bytes).
 *
 * The input is held in raw mode for the duration of the exchange so the reply
 * reaches the reader instead of being echoed. Input that ends before the
 * fallback query rejects with "terminal input closed"; a read error at that
 * point rejects unchanged.
 */
export async function termRequestResponse(
  input: TerminalInput,
  output: TerminalOutput,
  request: string
): Promise<Uint8Array> {
  if (!input.isTerminal() || !output.isTerminal()) {
    throw new TermGraphicsError('NON_TTY');
  }

  const snapshot: TerminalModeSnapshot = { raw: input.isRaw() };
  let response: Uint8Array;
  try {
    input.setRaw(true);
    response = await exchange(input, output, request);
  } catch (error) {
    restoreMode(input, snapshot, true);
    throw error;
  }
  restoreMode(input, snapshot, false);
  return response;
}

/**
 * Every run of decimal digits in a reply, in order.
 */
export function parseDeviceAttributes(reply: Uint8Array | string): number[] {
  const text = typeof reply === 'string' ? reply : new TextDecoder('latin1').decode(reply);
  return (text.match(/\d+/g) ?? []).map(digits => parseInt(digits, 10));
}

/**
 * True when attribute 4 (sixel graphics) is present after the terminal id.
 */
export function hasSixelAttribute(attrs: readonly number[]): boolean {
  return attrs.some((attr, i) => i > 0 && attr === 4);
}

/**
 * Request the terminal's primary device attributes.
 */
export async function termAttributes(input: TerminalInput, output: TerminalOutput): Promise<number[]> {
  const reply = await termRequestResponse(input, output, DA1_QUERY);
  return parseDeviceAttributes(reply);
}

/**
 * Query the terminal for sixel support. Never rejects: failures resolve false.
 */
export async function hasSixelSupport(
  input: TerminalInput = stdin,
  output: TerminalOutput = stdout
): Promise<boolean> {
  if (process.platform === 'win32') {
    return false;
  }

  try {
    const attrs = await termAttributes(input, output);
    const supported = hasSixelAttribute(attrs);
    logger.debug('Device attributes received', { attrs, supported });
    return supported;
  } catch (error) {
    logger.debug('Sixel detection failed', { error: ensureError(error).message });
    return false;
  }
}
