#!/usr/bin/env node
/**
 * Image Inspector Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import sharp from 'sharp';
import { PassThroughInspector, SharpImageInspector } from '../cli/services/media/image-inspector';

function solid(width: number, height: number) {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } } });
}

test('reads format and size of a PNG', async () => {
  const png = await solid(4, 3).png().toBuffer();
  assert.deepEqual(await new SharpImageInspector().inspect(png), { format: 'png', width: 4, height: 3 });
});

test('maps jpeg to the jpg extension', async () => {
  const jpeg = await solid(8, 8).jpeg().toBuffer();
  assert.deepEqual(await new SharpImageInspector().inspect(jpeg), { format: 'jpg', width: 8, height: 8 });
});

test('returns null for bytes that are not an image', async () => {
  const html = Buffer.from('<html><body>Too many requests</body></html>'.repeat(40));
  assert.equal(await new SharpImageInspector().inspect(html), null);
});

test('pass-through inspector accepts everything as jpg', async () => {
  assert.deepEqual(await new PassThroughInspector().inspect(), { format: 'jpg', width: 0, height: 0 });
});
