#!/usr/bin/env node
/**
 * Image Fetch Client Tests
 * Status and size checks, image verification and file writing over an in-process axios adapter
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { BROWSER_USER_AGENT, ImageFetchClient } from '../cli/services/media/fetch-client';
import type { ImageInfo, ImageInspector } from '../cli/services/media/image-inspector';

const IMAGE_URL = 'https://example.com/full.jpg';

function respond(status: number, body: Buffer | Error, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    if (body instanceof Error) {
      throw body;
    }
    return { data: body, status, statusText: String(status), headers: {}, config };
  };
}

class FixedInspector implements ImageInspector {
  constructor(private readonly info: ImageInfo | null) {}

  async inspect(): Promise<ImageInfo | null> {
    return this.info;
  }
}

async function destination(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fetch-client-'));
  return path.join(dir, 'Rome_01');
}

test('saves a 200 response larger than the threshold verbatim', async () => {
  const body = Buffer.alloc(2000, 7);
  const seen: InternalAxiosRequestConfig[] = [];
  const base = await destination();

  const result = await new ImageFetchClient({ adapter: respond(200, body, seen) }).fetchToFile(IMAGE_URL, base);

  assert.deepEqual(result, { ok: true, filePath: `${base}.jpg`, bytes: 2000, format: 'jpg' });
  assert.deepEqual(await fs.readFile(`${base}.jpg`), body);
  assert.equal(seen[0].url, IMAGE_URL);
  assert.equal(seen[0].timeout, 15000);
  assert.equal(String(seen[0].headers['User-Agent']), BROWSER_USER_AGENT);
});

test('rejects non-200 responses without writing', async () => {
  const base = await destination();

  const result = await new ImageFetchClient({ adapter: respond(404, Buffer.alloc(5000)) }).fetchToFile(IMAGE_URL, base);

  assert.deepEqual(result, { ok: false, reason: 'bad-status', status: 404 });
  assert.equal(await fs.pathExists(`${base}.jpg`), false);
});

test('requires the body to be strictly larger than the minimum', async () => {
  const base = await destination();

  const atLimit = await new ImageFetchClient({ adapter: respond(200, Buffer.alloc(1000)) }).fetchToFile(IMAGE_URL, base);
  assert.deepEqual(atLimit, { ok: false, reason: 'too-small', status: 200, message: '1000 bytes' });

  const above = await new ImageFetchClient({ adapter: respond(200, Buffer.alloc(1001)) }).fetchToFile(IMAGE_URL, base);
  assert.equal(above.ok, true);
});

test('reports transport errors as network failures', async () => {
  const client = new ImageFetchClient({ adapter: respond(0, new Error('socket hang up')) });

  const result = await client.fetchToFile(IMAGE_URL, await destination());

  assert.deepEqual(result, { ok: false, reason: 'network', message: 'socket hang up' });
});

test('rejects bodies the inspector does not recognize as images', async () => {
  const client = new ImageFetchClient({ adapter: respond(200, Buffer.alloc(4000)), inspector: new FixedInspector(null) });

  const result = await client.fetchToFile(IMAGE_URL, await destination());

  assert.deepEqual(result, { ok: false, reason: 'not-an-image', status: 200 });
});

test('names the file after the detected format', async () => {
  const base = await destination();
  const client = new ImageFetchClient({
    adapter: respond(200, Buffer.alloc(4000)),
    inspector: new FixedInspector({ format: 'png', width: 640, height: 480 }),
  });

  const result = await client.fetchToFile(IMAGE_URL, base);

  assert.deepEqual(result, { ok: true, filePath: `${base}.png`, bytes: 4000, format: 'png' });
  assert.ok(await fs.pathExists(`${base}.png`));
});

test('honors custom user agent, timeout and threshold', async () => {
  const seen: InternalAxiosRequestConfig[] = [];
  const client = new ImageFetchClient({
    adapter: respond(200, Buffer.alloc(50), seen),
    userAgent: 'test-agent',
    timeoutMs: 500,
    minBytes: 10,
  });

  const result = await client.fetchToFile(IMAGE_URL, await destination());

  assert.equal(result.ok, true);
  assert.equal(String(seen[0].headers['User-Agent']), 'test-agent');
  assert.equal(seen[0].timeout, 500);
});

test('reports a failed write', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fetch-client-'));
  const blocker = path.join(dir, 'blocker');
  await fs.writeFile(blocker, 'not a directory');

  const result = await new ImageFetchClient({ adapter: respond(200, Buffer.alloc(2000)) }).fetchToFile(
    IMAGE_URL,
    path.join(blocker, 'Rome_01')
  );

  assert.equal(result.ok, false);
  assert.equal(result.ok === false && result.reason, 'write-failed');
});
