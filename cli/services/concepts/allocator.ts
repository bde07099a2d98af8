import type { HarvestSettings } from '../../lib/config';
import { BudgetConfigError, BudgetConfigSchema } from '../../lib/harvest-types';
import type { BudgetConfig, ConceptExtractor, ConceptQuota } from '../../lib/types';
import { logger } from '../../utils/logger';

/**
 * Validate budget values and freeze them
 */
export function createBudgetConfig(values: BudgetConfig): Readonly<BudgetConfig> {
  const parsed = BudgetConfigSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new BudgetConfigError(`Invalid image budget: ${issues.join('; ')}`, issues);
  }
  return Object.freeze({ ...parsed.data });
}

export function budgetFromSettings(settings: HarvestSettings): Readonly<BudgetConfig> {
  return createBudgetConfig({
    maxConcepts: settings.maxConcepts,
    imagesPerConcept: settings.imagesPerConcept,
    maxTotalImages: settings.maxTotalImages,
    minImagesOverall: settings.minImagesPerSrt,
  });
}

/**
 * Spread the run budget over concepts in extraction order. The target total is
 * the naive total clamped to [minImagesOverall, maxTotalImages]; each concept
 * gets ceil(target / count) until the cap runs out, and later concepts are dropped.
 */
export function distributeQuotas(concepts: readonly string[], budget: BudgetConfig): ConceptQuota[] {
  if (concepts.length === 0) {
    return [];
  }

  const naiveTotal = budget.imagesPerConcept * concepts.length;
  const targetTotal = Math.max(budget.minImagesOverall, Math.min(naiveTotal, budget.maxTotalImages));
  const perConcept = Math.min(Math.ceil(targetTotal / concepts.length), budget.maxTotalImages);

  const quotas: ConceptQuota[] = [];
  let remaining = budget.maxTotalImages;
  for (const concept of concepts) {
    if (remaining <= 0) break;
    const need = Math.min(perConcept, remaining);
    if (need <= 0) break;
    quotas.push(Object.freeze({ concept, imagesNeeded: need }));
    remaining -= need;
  }
  return quotas;
}

/**
 * Extract up to `maxConcepts` concepts and allocate their quotas
 */
export function allocateQuotas(text: string, budget: BudgetConfig, extractor: ConceptExtractor): ConceptQuota[] {
  const concepts = extractor.extractConcepts(text, budget.maxConcepts).slice(0, budget.maxConcepts);
  const quotas = distributeQuotas(concepts, budget);
  logger.debug(`Allocated ${quotas.length}/${concepts.length} concepts`, {
    total: quotas.reduce((sum, q) => sum + q.imagesNeeded, 0),
    cap: budget.maxTotalImages,
  });
  return quotas;
}
