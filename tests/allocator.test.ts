#!/usr/bin/env node
/**
 * Concept Allocator Tests
 * Budget validation, quota distribution and the run-total cap
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { defaultSettings } from '../cli/lib/config';
import { BudgetConfigError } from '../cli/lib/harvest-types';
import type { BudgetConfig, ConceptExtractor } from '../cli/lib/types';
import {
  allocateQuotas,
  budgetFromSettings,
  createBudgetConfig,
  distributeQuotas,
} from '../cli/services/concepts/allocator';

class ListExtractor implements ConceptExtractor {
  readonly calls: Array<{ text: string; maxCount: number }> = [];

  constructor(private readonly concepts: string[]) {}

  extractConcepts(text: string, maxCount: number): string[] {
    this.calls.push({ text, maxCount });
    return this.concepts;
  }
}

function budget(values: Partial<BudgetConfig> = {}): BudgetConfig {
  return createBudgetConfig({
    maxConcepts: 20,
    imagesPerConcept: 3,
    maxTotalImages: 60,
    minImagesOverall: 20,
    ...values,
  });
}

const FIVE = ['c1', 'c2', 'c3', 'c4', 'c5'];

test('raises a small naive total to the overall minimum', () => {
  const quotas = distributeQuotas(FIVE, budget({ maxConcepts: 5 }));

  assert.deepEqual(
    quotas.map((q) => [q.concept, q.imagesNeeded]),
    [
      ['c1', 4],
      ['c2', 4],
      ['c3', 4],
      ['c4', 4],
      ['c5', 4],
    ]
  );
});

test('cuts the walk off at the run cap, giving the last concept the remainder', () => {
  const quotas = distributeQuotas(FIVE, budget({ maxTotalImages: 10 }));

  assert.deepEqual(
    quotas.map((q) => [q.concept, q.imagesNeeded]),
    [
      ['c1', 4],
      ['c2', 4],
      ['c3', 2],
    ]
  );
});

test('uses images per concept when it lies between the minimum and the cap', () => {
  const quotas = distributeQuotas(['a', 'b'], budget({ imagesPerConcept: 5, minImagesOverall: 0 }));
  assert.deepEqual(quotas.map((q) => q.imagesNeeded), [5, 5]);
});

test('never allocates more than the cap and never less than one image', () => {
  for (const maxTotalImages of [1, 2, 7, 10, 60]) {
    for (const minImagesOverall of [0, 5, 20, 100]) {
      for (const count of [1, 3, 8, 25]) {
        const concepts = Array.from({ length: count }, (_, i) => `concept-${i}`);
        const quotas = distributeQuotas(concepts, budget({ maxTotalImages, minImagesOverall }));
        const total = quotas.reduce((sum, q) => sum + q.imagesNeeded, 0);

        assert.ok(total <= maxTotalImages, `total ${total} exceeds cap ${maxTotalImages}`);
        assert.ok(quotas.every((q) => q.imagesNeeded >= 1));
        assert.ok(quotas.length >= 1);
      }
    }
  }
});

test('returns no quotas when nothing was extracted', () => {
  const extractor = new ListExtractor([]);
  assert.deepEqual(allocateQuotas('', budget(), extractor), []);
});

test('asks the extractor for at most maxConcepts and trims extra results', () => {
  const extractor = new ListExtractor(['a', 'b', 'c', 'd']);

  const quotas = allocateQuotas('some text', budget({ maxConcepts: 2, minImagesOverall: 0 }), extractor);

  assert.deepEqual(extractor.calls, [{ text: 'some text', maxCount: 2 }]);
  assert.deepEqual(quotas.map((q) => q.concept), ['a', 'b']);
});

test('quotas are frozen', () => {
  const [quota] = distributeQuotas(['a'], budget());
  assert.ok(Object.isFrozen(quota));
});

test('rejects out-of-range budgets', () => {
  assert.throws(
    () => createBudgetConfig({ maxConcepts: 0, imagesPerConcept: 3, maxTotalImages: 60, minImagesOverall: 20 }),
    (error: unknown) => {
      assert.ok(error instanceof BudgetConfigError);
      assert.equal(error.issues.length, 1);
      assert.match(error.issues[0], /^maxConcepts: /);
      return true;
    }
  );
  assert.throws(
    () => createBudgetConfig({ maxConcepts: 5, imagesPerConcept: 1.5, maxTotalImages: 60, minImagesOverall: -1 }),
    BudgetConfigError
  );
});

test('builds the budget from settings', () => {
  assert.deepEqual(budgetFromSettings(defaultSettings()), {
    maxConcepts: 20,
    imagesPerConcept: 3,
    maxTotalImages: 60,
    minImagesOverall: 20,
  });
});
