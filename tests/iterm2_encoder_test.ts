// Tests for the iTerm2 inline images encoder

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { decode as decodePng } from 'fast-png';
import { ITERM_PREFIX, ITERM_SUFFIX, ITermEncoder, encodeToITerm2, frameITermPayload } from '../src/iterm2/encoder.ts';
import { detectITermCapabilities } from '../src/iterm2/detect.ts';
import { GraphicsEnvironment } from '../src/graphics/environment.ts';
import { createPalettedImage, createRgbaImage, packRGBA } from '../src/graphics/pixels.ts';
import { MemoryWriter } from './fake_terminal.ts';

function payloadBytes(sequence: string): Buffer {
  return Buffer.from(sequence.slice(ITERM_PREFIX.length, -ITERM_SUFFIX.length), 'base64');
}

test('frameITermPayload wraps the payload in one OSC 1337 sequence', () => {
  assert.equal(frameITermPayload('QUJD'), '\x1b]1337;File=inline=1:QUJD\x07');
  assert.equal(frameITermPayload(''), '\x1b]1337;File=inline=1:\x07');
});

test('paletted images are sent as PNG', () => {
  const image = createPalettedImage(2, 1, [packRGBA(0, 0, 0), packRGBA(255, 255, 255)], new Uint8Array([1, 0]));

  const output = encodeToITerm2(image);
  const png = decodePng(payloadBytes(output.sequence));

  assert.equal(output.format, 'png');
  assert.equal(output.totalBytes, output.sequence.length - ITERM_PREFIX.length - ITERM_SUFFIX.length);
  assert.equal(png.width, 2);
  assert.equal(png.height, 1);
  assert.deepEqual(Array.from(png.data), [255, 255, 255, 255, 0, 0, 0, 255]);
});

test('truecolor images are sent as JPEG', () => {
  const image = createRgbaImage(4, 4, new Uint32Array(16).fill(packRGBA(200, 100, 50)));

  const output = encodeToITerm2(image);
  const jpeg = payloadBytes(output.sequence);

  assert.equal(output.format, 'jpeg');
  assert.equal(output.sequence.startsWith(ITERM_PREFIX), true);
  assert.equal(output.sequence.endsWith('\x07'), true);
  // SOI and EOI markers
  assert.deepEqual([jpeg[0], jpeg[1]], [0xFF, 0xD8]);
  assert.deepEqual([jpeg[jpeg.length - 2], jpeg[jpeg.length - 1]], [0xFF, 0xD9]);
});

test('lower JPEG quality gives a smaller payload', () => {
  const pixels = new Uint32Array(64);
  for (let i = 0; i < pixels.length; i++) {
    pixels[i] = packRGBA((i * 37) & 0xFF, (i * 91) & 0xFF, (i * 13) & 0xFF);
  }
  const image = createRgbaImage(8, 8, pixels);

  const high = encodeToITerm2(image, { jpegQuality: 100 });
  const low = encodeToITerm2(image, { jpegQuality: 10 });

  assert.ok(low.totalBytes < high.totalBytes);
});

test('ITermEncoder writes the sequence and a newline', async () => {
  const image = createPalettedImage(1, 1, [packRGBA(9, 9, 9)]);
  const out = new MemoryWriter();

  await new ITermEncoder().encode(out, image);

  assert.deepEqual(out.writes, [encodeToITerm2(image).sequence, '\n']);
});

test('ITermEncoder noNewline writes only the sequence', async () => {
  const image = createPalettedImage(1, 1, [packRGBA(9, 9, 9)]);
  const out = new MemoryWriter();

  await new ITermEncoder({ noNewline: true }).encode(out, image);

  assert.deepEqual(out.writes, [encodeToITerm2(image).sequence]);
});

test('ITermEncoder rejects malformed images before writing', async () => {
  const out = new MemoryWriter();
  await assert.rejects(new ITermEncoder().encode(out, { kind: 'rgba', width: -1, height: 2, pixels: new Uint32Array(0) }), {
    name: 'RangeError',
    message: 'Invalid image dimensions -1x2',
  });
  assert.deepEqual(out.writes, []);
});

test('iTerm2 availability from the environment', () => {
  const supported = (vars: Record<string, string>): boolean =>
    detectITermCapabilities(new GraphicsEnvironment(vars)).supported;

  assert.equal(supported({ TERM: 'mintty' }), true);
  assert.equal(supported({ LC_TERMINAL: 'iTerm2' }), true);
  assert.equal(supported({ TERM_PROGRAM: 'WezTerm' }), true);
  assert.equal(supported({ TERM_GRAPHICS: 'iterm' }), true);
  assert.equal(supported({ TERM_GRAPHICS: 'none', LC_TERMINAL: 'iTerm2' }), false);
  assert.equal(supported({ TERM_GRAPHICS: 'kitty', TERM: 'mintty' }), true);
  assert.equal(supported({ TERM_PROGRAM: 'iTerm.app' }), false);
  assert.equal(supported({}), false);
});

test('ITermEncoder.available uses its environment', async () => {
  const wezterm = new ITermEncoder({ environment: new GraphicsEnvironment({ TERM_PROGRAM: 'WezTerm' }) });
  assert.equal(await wezterm.available(), true);

  const disabled = new ITermEncoder({ environment: new GraphicsEnvironment({ TERM_GRAPHICS: 'none', TERM: 'mintty' }) });
  assert.equal(await disabled.available(), false);
});
