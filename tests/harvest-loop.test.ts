#!/usr/bin/env node
/**
 * Harvest Loop Tests
 * Ordering, budget early-stop, concept failure policy and cancellation
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ConceptHarvestError } from '../cli/lib/harvest-types';
import type { ConceptQuota } from '../cli/lib/types';
import {
  ConceptHarvestRequest,
  ConceptHarvestResult,
  ConceptHarvester,
  FallbackOrchestrator,
} from '../cli/services/media/fallback';
import { HarvestAbortedError, HarvestLoop, HarvestOptions } from '../cli/services/media/harvest-loop';
import { SearchSessionDriver } from '../cli/services/media/session-driver';
import { FakeFetcher, FakeLauncher, FakePage, TEST_SESSION, thumb } from './helpers/fake-browser';

type Behavior = number | Error | ((request: ConceptHarvestRequest) => number);

/**
 * Saves what each concept's behavior says (default: everything requested)
 */
class FakeHarvester implements ConceptHarvester {
  readonly requests: ConceptHarvestRequest[] = [];

  constructor(private readonly behaviors: Record<string, Behavior> = {}) {}

  async harvestConcept(request: ConceptHarvestRequest): Promise<ConceptHarvestResult> {
    this.requests.push(request);
    const behavior = this.behaviors[request.concept];
    if (behavior instanceof Error) {
      throw behavior;
    }
    const saved =
      behavior === undefined
        ? request.imagesNeeded
        : typeof behavior === 'function'
          ? behavior(request)
          : Math.min(behavior, request.imagesNeeded);
    return { concept: request.concept, savedCount: saved, files: [], attempts: [] };
  }
}

const OUTPUT = path.join('/tmp', 'harvest-out');

function quotas(...entries: Array<[string, number]>): ConceptQuota[] {
  return entries.map(([concept, imagesNeeded]) => ({ concept, imagesNeeded }));
}

function options(overrides: Partial<HarvestOptions> = {}): HarvestOptions {
  return { outputRoot: OUTPUT, maxTotalImages: 60, maxScrolls: 6, session: TEST_SESSION, ...overrides };
}

test('processes concepts in order into sanitized folders', async () => {
  const harvester = new FakeHarvester();
  const messages: string[] = [];

  const report = await new HarvestLoop(harvester).run(
    quotas(['Ancient Rome', 2], ['Julius Caesar', 3]),
    options({ reporter: (m) => messages.push(m) })
  );

  assert.deepEqual(
    harvester.requests.map((r) => [r.concept, r.targetDir, r.imagesNeeded, r.runOffset]),
    [
      ['Ancient Rome', path.join(OUTPUT, 'ancient_rome'), 2, 0],
      ['Julius Caesar', path.join(OUTPUT, 'julius_caesar'), 3, 2],
    ]
  );
  assert.equal(report.totalSaved, 5);
  assert.equal(report.stopReason, 'completed');
  assert.deepEqual(messages, [
    "Keyword 'Ancient Rome' → 2 images (total 2)",
    "Keyword 'Julius Caesar' → 3 images (total 5)",
  ]);
});

test('stops issuing concepts once the run budget is reached', async () => {
  const harvester = new FakeHarvester();

  const report = await new HarvestLoop(harvester).run(
    quotas(['a', 4], ['b', 4], ['c', 4], ['d', 4]),
    options({ maxTotalImages: 10 })
  );

  assert.deepEqual(
    harvester.requests.map((r) => [r.concept, r.imagesNeeded]),
    [
      ['a', 4],
      ['b', 4],
      ['c', 2],
    ]
  );
  assert.equal(report.totalSaved, 10);
  assert.equal(report.stopReason, 'budget-exhausted');
});

test('carries shortfalls forward as run offsets and reports empty concepts', async () => {
  const harvester = new FakeHarvester({ a: 1, b: 0 });
  const messages: string[] = [];

  const report = await new HarvestLoop(harvester).run(
    quotas(['a', 3], ['b', 3], ['c', 3]),
    options({ reporter: (m) => messages.push(m) })
  );

  assert.deepEqual(harvester.requests.map((r) => r.runOffset), [0, 1, 1]);
  assert.equal(report.totalSaved, 4);
  assert.deepEqual(
    report.concepts.map((c) => [c.concept, c.requested, c.savedCount]),
    [
      ['a', 3, 1],
      ['b', 3, 0],
      ['c', 3, 3],
    ]
  );
  assert.equal(messages[1], "Skipped 'b' (no images); total 1");
});

test('abort-run policy stops the run and keeps the partial report', async () => {
  const harvester = new FakeHarvester({ b: new ConceptHarvestError('b', 1, new Error('search box missing')) });

  await assert.rejects(
    new HarvestLoop(harvester).run(quotas(['a', 2], ['b', 2], ['c', 2]), options()),
    (error: unknown) => {
      assert.ok(error instanceof HarvestAbortedError);
      assert.equal(error.report.stopReason, 'aborted');
      assert.equal(error.report.totalSaved, 3);
      assert.equal(error.report.concepts[1].error, "Harvest failed for 'b' after 1 saved: search box missing");
      return true;
    }
  );
  assert.deepEqual(harvester.requests.map((r) => r.concept), ['a', 'b']);
});

test('skip-concept policy records the failure and continues', async () => {
  const harvester = new FakeHarvester({ b: new Error('boom') });
  const messages: string[] = [];

  const report = await new HarvestLoop(harvester).run(
    quotas(['a', 2], ['b', 2], ['c', 2]),
    options({ failurePolicy: 'skip-concept', reporter: (m) => messages.push(m) })
  );

  assert.deepEqual(harvester.requests.map((r) => r.concept), ['a', 'b', 'c']);
  assert.equal(report.totalSaved, 4);
  assert.equal(report.stopReason, 'completed');
  assert.equal(report.concepts[1].error, 'boom');
  assert.equal(messages[1], "Skipped 'b' (boom); total 2");
});

test('checks for cancellation between concepts', async () => {
  const controller = new AbortController();
  const harvester = new FakeHarvester({
    a: (request) => {
      controller.abort();
      return request.imagesNeeded;
    },
  });

  const report = await new HarvestLoop(harvester).run(
    quotas(['a', 2], ['b', 2]),
    options({ signal: controller.signal })
  );

  assert.deepEqual(harvester.requests.map((r) => r.concept), ['a']);
  assert.equal(report.totalSaved, 2);
  assert.equal(report.stopReason, 'cancelled');
});

test('passes timestamps and dedup option through to each concept', async () => {
  const harvester = new FakeHarvester();
  const timestamps = ['00-00-01-000'];

  await new HarvestLoop(harvester).run(
    quotas(['a', 1]),
    options({ timestamps, dedupeAcrossAttempts: true, maxScrolls: 2 })
  );

  const [request] = harvester.requests;
  assert.equal(request.timestamps, timestamps);
  assert.equal(request.dedupeAcrossAttempts, true);
  assert.equal(request.maxScrolls, 2);
});

test('images saved before a session failure count against the run budget', async () => {
  let opened = 0;
  const launcher = new FakeLauncher(() =>
    opened++ === 0
      ? new FakePage({ batches: [[thumb('https://example.com/a.jpg')]], scrollError: new Error('Target closed') })
      : new FakePage({ batches: [[thumb('https://example.com/b.jpg'), thumb('https://example.com/c.jpg')]] })
  );
  const fetcher = new FakeFetcher();
  const orchestrator = new FallbackOrchestrator(new SearchSessionDriver({ launcher, fetcher }));
  const outputRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'harvest-loop-'));
  const messages: string[] = [];

  const report = await new HarvestLoop(orchestrator).run(
    quotas(['alpha', 2], ['beta', 2]),
    options({ outputRoot, maxTotalImages: 2, failurePolicy: 'skip-concept', reporter: (m) => messages.push(m) })
  );

  assert.equal(report.totalSaved, 2);
  assert.equal(report.stopReason, 'budget-exhausted');
  assert.deepEqual(fetcher.calls.map((c) => c.url), ['https://example.com/a.jpg', 'https://example.com/b.jpg']);
  assert.deepEqual(
    report.concepts.map((c) => [c.concept, c.requested, c.savedCount, c.files.length]),
    [
      ['alpha', 2, 1, 1],
      ['beta', 1, 1, 1],
    ]
  );
  assert.equal(launcher.closed, 2);
  assert.equal(
    messages[0],
    "Skipped 'alpha' (Harvest failed for 'alpha' after 1 saved: Search for 'alpha' stopped after 1 saved: Target closed); total 1"
  );
});
