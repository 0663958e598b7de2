// Tests for the sixel encoder

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { SixelEncoder, encodeToSixel } from '../src/sixel/encoder.ts';
import { GraphicsEnvironment } from '../src/graphics/environment.ts';
import { createPalettedImage, createRgbaImage, packRGBA } from '../src/graphics/pixels.ts';
import { FakeInput, FakeOutput, MemoryWriter, createNudgedTerminal } from './fake_terminal.ts';

const red = packRGBA(255, 0, 0);
const blue = packRGBA(0, 0, 255);

test('encodeToSixel produces a complete DCS sequence', () => {
  const image = createRgbaImage(2, 6, new Uint32Array(12).fill(red));

  const data = encodeToSixel(image);

  assert.equal(data.startsWith('\x1bP'), true);
  assert.equal(data.endsWith('\x1b\\'), true);
  assert.ok(data.includes('q'));
});

test('encodeToSixel accepts paletted images', () => {
  const image = createPalettedImage(2, 1, [red, blue], new Uint8Array([0, 1]));
  const rgba = createRgbaImage(2, 1, new Uint32Array([red, blue]));

  assert.equal(encodeToSixel(image), encodeToSixel(rgba));
});

test('encodeToSixel rejects malformed images', () => {
  assert.throws(() => encodeToSixel(createPalettedImage(2, 2, [red], new Uint8Array(5))), {
    name: 'RangeError',
    message: 'Image buffer holds 5 pixels, expected 4',
  });
});

test('SixelEncoder writes the sequence and a newline', async () => {
  const image = createRgbaImage(1, 1, new Uint32Array([blue]));
  const out = new MemoryWriter();

  await new SixelEncoder().encode(out, image);

  assert.deepEqual(out.writes, [encodeToSixel(image), '\n']);
});

test('SixelEncoder noNewline writes only the sequence', async () => {
  const image = createRgbaImage(1, 1, new Uint32Array([blue]));
  const out = new MemoryWriter();

  await new SixelEncoder({ noNewline: true }).encode(out, image);

  assert.deepEqual(out.writes, [encodeToSixel(image)]);
});

test('sixel override skips the terminal query', async () => {
  const input = new FakeInput();
  const output = new FakeOutput();
  const encoder = new SixelEncoder({
    environment: new GraphicsEnvironment({ TERM_GRAPHICS: 'sixel' }),
    input,
    output,
  });

  assert.equal(await encoder.available(), true);
  assert.deepEqual(input.modeChanges, []);
  assert.deepEqual(output.writes, []);
});

test('none override disables sixel without querying', async () => {
  const { input, output } = createNudgedTerminal('\x1b[?62;4c');
  const encoder = new SixelEncoder({
    environment: new GraphicsEnvironment({ TERM_GRAPHICS: 'none' }),
    input,
    output,
  });

  assert.equal(await encoder.available(), false);
  assert.deepEqual(output.writes, []);
});

test('SixelEncoder.available queries the terminal', async () => {
  const sixel = createNudgedTerminal('\x1b[?62;4;22c');
  const withSixel = new SixelEncoder({ environment: new GraphicsEnvironment({}), ...sixel });
  assert.equal(await withSixel.available(), true);

  const plain = createNudgedTerminal('\x1b[?62;22c');
  const withoutSixel = new SixelEncoder({ environment: new GraphicsEnvironment({}), ...plain });
  assert.equal(await withoutSixel.available(), false);

  const pipe = new SixelEncoder({
    environment: new GraphicsEnvironment({}),
    input: new FakeInput({ tty: false }),
    output: new FakeOutput(),
  });
  assert.equal(await pipe.available(), false);
});
