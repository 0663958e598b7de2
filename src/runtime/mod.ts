/**
 * Runtime abstraction layer.
 *
 * Thin wrappers around Node process APIs. Code outside this directory takes
 * the interfaces, never process.stdin / process.stdout directly.
 */

export * from './terminal.ts';
