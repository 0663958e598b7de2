/**
 * Terminal I/O wrappers.
 * Wraps process.stdin and process.stdout behind small interfaces so detection
 * and encoding can run against an in-process stand-in.
 */

import { writeSync } from 'node:fs';
import type { Readable } from 'node:stream';

/**
 * Synchronous byte sink. Every encoder writes through this.
 */
export interface OutputWriter {
  writeSync(data: Uint8Array): number;
}

export interface TerminalInput {
  isTerminal(): boolean;
  isRaw(): boolean;
  setRaw(mode: boolean): void;
  /**
   * Read one chunk of at most `buf.length` bytes.
   * Resolves null on end of input or when `signal` aborts the pending read.
   */
  read(buf: Uint8Array, signal?: AbortSignal): Promise<number | null>;
}

export interface TerminalOutput extends OutputWriter {
  isTerminal(): boolean;
}

/**
 * Readable side of a terminal: process.stdin, or any stream with the same TTY fields.
 */
export interface TtyReadable extends Readable {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Writable side of a terminal, addressed by file descriptor.
 */
export interface TtyWritable {
  fd: number;
  isTTY?: boolean;
}

/**
 * Write bytes from `offset` to the descriptor, returning how many were written.
 */
export type FdWrite = (fd: number, data: Uint8Array, offset: number) => number;

const textEncoder = new TextEncoder();

export function writeText(out: OutputWriter, text: string): void {
  out.writeSync(textEncoder.encode(text));
}

/**
 * Adapt a readable TTY stream.
 *
 * Each read resumes the stream, takes one chunk and pauses it again, unless
 * the stream was already flowing for another consumer. Bytes beyond
 * `buf.length` are put back for the next read.
 */
export function createTerminalInput(stream: TtyReadable): TerminalInput {
  return {
    isTerminal(): boolean {
      return stream.isTTY === true;
    },
    isRaw(): boolean {
      return stream.isRaw === true;
    },
    setRaw(mode: boolean): void {
      if (typeof stream.setRawMode !== 'function') {
        throw new Error('Input stream does not support raw mode');
      }
      stream.setRawMode(mode);
    },
    read(buf: Uint8Array, signal?: AbortSignal): Promise<number | null> {
      return new Promise((resolve, reject) => {
        if (signal?.aborted || stream.readableEnded) {
          resolve(null);
          return;
        }
        const wasFlowing = stream.readableFlowing === true;

        const cleanup = (): void => {
          stream.off('data', onData);
          stream.off('end', onEnd);
          stream.off('error', onError);
          signal?.removeEventListener('abort', onAbort);
          if (!wasFlowing) {
            stream.pause();
          }
        };
        const onData = (chunk: Buffer | string): void => {
          cleanup();
          const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
          const n = Math.min(bytes.length, buf.length);
          buf.set(bytes.subarray(0, n));
          if (n < bytes.length && !wasFlowing) {
            stream.unshift(bytes.subarray(n));
          }
          resolve(n);
        };
        const onEnd = (): void => {
          cleanup();
          resolve(null);
        };
        const onError = (error: Error): void => {
          cleanup();
          reject(error);
        };
        const onAbort = (): void => {
          cleanup();
          resolve(null);
        };

        stream.on('data', onData);
        stream.on('end', onEnd);
        stream.on('error', onError);
        signal?.addEventListener('abort', onAbort, { once: true });
        // A paused stream stays paused when a data listener is added
        stream.resume();
      });
    },
  };
}

/**
 * Adapt a writable TTY by descriptor. Short writes are retried until every byte is out.
 */
export function createTerminalOutput(stream: TtyWritable, write: FdWrite = writeSync): TerminalOutput {
  return {
    isTerminal(): boolean {
      return stream.isTTY === true;
    },
    writeSync(data: Uint8Array): number {
      let written = 0;
      while (written < data.length) {
        written += write(stream.fd, data, written);
      }
      return written;
    },
  };
}

let processInput: TerminalInput | undefined;
let processOutput: TerminalOutput | undefined;

// process.stdin is only touched on first use
function getProcessInput(): TerminalInput {
  if (!processInput) {
    processInput = createTerminalInput(process.stdin);
  }
  return processInput;
}

function getProcessOutput(): TerminalOutput {
  if (!processOutput) {
    processOutput = createTerminalOutput(process.stdout);
  }
  return processOutput;
}

export const stdin: TerminalInput = {
  isTerminal: () => getProcessInput().isTerminal(),
  isRaw: () => getProcessInput().isRaw(),
  setRaw: mode => getProcessInput().setRaw(mode),
  read: (buf, signal) => getProcessInput().read(buf, signal),
};

export const stdout: TerminalOutput = {
  isTerminal: () => getProcessOutput().isTerminal(),
  writeSync: data => getProcessOutput().writeSync(data),
};
