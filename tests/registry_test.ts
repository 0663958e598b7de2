// Tests for the encoder registry and the process-wide entry points

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  EncoderRegistry,
  available,
  encode,
  getDefaultRegistry,
  setDefaultRegistry,
  termTypeAvailable,
  termTypeEncode,
} from '../src/graphics/registry.ts';
import { DefaultEncoder } from '../src/graphics/default-encoder.ts';
import { GraphicsEnvironment } from '../src/graphics/environment.ts';
import { isTermGraphicsError } from '../src/graphics/errors.ts';
import { createRgbaImage, packRGBA } from '../src/graphics/pixels.ts';
import { TermType } from '../src/graphics/term-type.ts';
import { ITermEncoder } from '../src/iterm2/encoder.ts';
import { KITTY_PREAMBLE, KittyEncoder } from '../src/kitty/encoder.ts';
import { SixelEncoder, encodeToSixel } from '../src/sixel/encoder.ts';
import { FakeInput, FakeOutput, MemoryWriter } from './fake_terminal.ts';

const image = createRgbaImage(1, 1, new Uint32Array([packRGBA(0, 128, 255)]));

function createRegistry(vars: Record<string, string>, noNewline = false): {
  registry: EncoderRegistry;
  input: FakeInput;
  output: FakeOutput;
} {
  const input = new FakeInput();
  const output = new FakeOutput();
  const registry = new EncoderRegistry({ environment: new GraphicsEnvironment(vars), input, output, noNewline });
  return { registry, input, output };
}

test('registry holds one encoder per protocol', () => {
  const { registry } = createRegistry({});

  assert.ok(registry.get(TermType.Kitty) instanceof KittyEncoder);
  assert.ok(registry.get(TermType.ITerm) instanceof ITermEncoder);
  assert.ok(registry.get(TermType.Sixel) instanceof SixelEncoder);
  assert.ok(registry.get(TermType.Default) instanceof DefaultEncoder);
  assert.equal(registry.get(TermType.None), undefined);
});

test('None is never available and cannot encode', async () => {
  const { registry } = createRegistry({ TERM: 'xterm-kitty' });
  const out = new MemoryWriter();

  assert.equal(await registry.available(TermType.None), false);
  await assert.rejects(registry.encode(out, image, TermType.None), error =>
    isTermGraphicsError(error, 'TERM_GRAPHICS_NOT_AVAILABLE')
  );
  assert.equal(out.text, '');
});

test('Default prefers Kitty', async () => {
  const { registry, input } = createRegistry({ TERM: 'xterm-kitty', LC_TERMINAL: 'iTerm2' });
  const out = new MemoryWriter();

  assert.equal(await registry.available(), true);
  await registry.encode(out, image);

  assert.equal(out.writes[0], KITTY_PREAMBLE);
  assert.equal(out.writes.at(-1), '\n');
  assert.deepEqual(input.modeChanges, []);
});

test('Default falls through to sixel override', async () => {
  const { registry } = createRegistry({ TERM_GRAPHICS: 'sixel' }, true);
  const out = new MemoryWriter();

  assert.equal(await registry.available(TermType.Kitty), false);
  assert.equal(await registry.available(TermType.ITerm), false);
  await registry.encode(out, image);

  assert.deepEqual(out.writes, [encodeToSixel(image)]);
});

test('none override disables every protocol', async () => {
  const { registry, input, output } = createRegistry({ TERM_GRAPHICS: 'none', TERM: 'xterm-kitty' });

  assert.equal(await registry.available(), false);
  assert.equal(await registry.available(TermType.Sixel), false);
  await assert.rejects(registry.encode(new MemoryWriter(), image), error =>
    isTermGraphicsError(error, 'TERM_GRAPHICS_NOT_AVAILABLE')
  );
  assert.deepEqual(input.modeChanges, []);
  assert.deepEqual(output.writes, []);
});

test('explicit type bypasses the default resolution', async () => {
  const { registry } = createRegistry({ TERM: 'xterm-kitty' });
  const out = new MemoryWriter();

  await registry.encode(out, image, TermType.ITerm);

  assert.equal(out.writes[0].startsWith('\x1b]1337;File=inline=1:'), true);
});

test('top-level functions use the process-wide registry', async () => {
  const { registry } = createRegistry({ LC_TERMINAL: 'iTerm2' }, true);
  setDefaultRegistry(registry);
  try {
    assert.equal(getDefaultRegistry(), registry);
    assert.equal(await available(), true);
    assert.equal(await termTypeAvailable(TermType.ITerm), true);
    assert.equal(await termTypeAvailable(TermType.Kitty), false);

    const out = new MemoryWriter();
    await encode(out, image);
    assert.equal(out.writes.length, 1);
    assert.equal(out.writes[0].startsWith('\x1b]1337;File=inline=1:'), true);

    const none = new MemoryWriter();
    await assert.rejects(termTypeEncode(TermType.None, none, image), error => isTermGraphicsError(error));
  } finally {
    setDefaultRegistry(undefined);
  }
});
