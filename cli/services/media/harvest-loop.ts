/**
 * Harvest Loop - walks the concept quotas strictly in order and stops at the
 * run budget. One concept's primary and fallback attempts finish before the
 * next concept starts.
 */

import { ConceptHarvestError, toError } from '../../lib/harvest-types';
import { conceptDir } from '../../lib/naming';
import type { ConceptFailurePolicy, ConceptQuota, SessionConfig, StatusReporter } from '../../lib/types';
import { logger } from '../../utils/logger';
import type { ConceptHarvester } from './fallback';

export interface HarvestOptions {
  outputRoot: string;
  maxTotalImages: number;
  maxScrolls: number;
  session: SessionConfig;
  failurePolicy?: ConceptFailurePolicy;
  dedupeAcrossAttempts?: boolean;
  /** Cue timestamps of the transcript; switches file naming to timestamps */
  timestamps?: readonly string[];
  signal?: AbortSignal;
  reporter?: StatusReporter;
}

export type HarvestStopReason = 'completed' | 'budget-exhausted' | 'cancelled' | 'aborted';

export interface ConceptReport {
  concept: string;
  requested: number;
  savedCount: number;
  directory: string;
  files: string[];
  error?: string;
}

export interface HarvestReport {
  totalSaved: number;
  concepts: ConceptReport[];
  stopReason: HarvestStopReason;
}

/**
 * Thrown under the abort-run policy; `report` holds everything done so far
 */
export class HarvestAbortedError extends Error {
  constructor(
    public readonly report: HarvestReport,
    public readonly cause: Error
  ) {
    super(`Harvest aborted after ${report.totalSaved} images: ${cause.message}`);
    this.name = 'HarvestAbortedError';
  }
}

export class HarvestLoop {
  constructor(private readonly harvester: ConceptHarvester) {}

  async run(quotas: readonly ConceptQuota[], options: HarvestOptions): Promise<HarvestReport> {
    const report: HarvestReport = { totalSaved: 0, concepts: [], stopReason: 'completed' };
    const policy = options.failurePolicy ?? 'abort-run';
    const notify = options.reporter ?? (() => undefined);

    for (const quota of quotas) {
      if (options.signal?.aborted) {
        report.stopReason = 'cancelled';
        logger.info(`Harvest cancelled before '${quota.concept}'`);
        break;
      }

      const effectiveNeed = Math.min(quota.imagesNeeded, options.maxTotalImages - report.totalSaved);
      if (effectiveNeed <= 0) {
        report.stopReason = 'budget-exhausted';
        break;
      }

      const directory = conceptDir(options.outputRoot, quota.concept);
      const entry: ConceptReport = {
        concept: quota.concept,
        requested: effectiveNeed,
        savedCount: 0,
        directory,
        files: [],
      };
      report.concepts.push(entry);

      try {
        const result = await this.harvester.harvestConcept({
          concept: quota.concept,
          targetDir: directory,
          imagesNeeded: effectiveNeed,
          maxScrolls: options.maxScrolls,
          session: options.session,
          timestamps: options.timestamps,
          runOffset: report.totalSaved,
          dedupeAcrossAttempts: options.dedupeAcrossAttempts,
          signal: options.signal,
        });
        entry.savedCount = result.savedCount;
        entry.files = result.files;
      } catch (error: unknown) {
        const failure = toError(error);
        if (error instanceof ConceptHarvestError) {
          entry.savedCount = error.savedCount;
          entry.files = error.files;
        }
        entry.error = failure.message;
        report.totalSaved += entry.savedCount;

        if (policy === 'abort-run') {
          report.stopReason = 'aborted';
          logger.error(`Concept '${quota.concept}' failed, stopping run`, failure);
          throw new HarvestAbortedError(report, failure);
        }
        logger.warn(`Concept '${quota.concept}' failed, continuing: ${failure.message}`);
        notify(`Skipped '${quota.concept}' (${failure.message}); total ${report.totalSaved}`);
        continue;
      }

      report.totalSaved += entry.savedCount;
      if (entry.savedCount === 0) {
        notify(`Skipped '${quota.concept}' (no images); total ${report.totalSaved}`);
      } else {
        notify(`Keyword '${quota.concept}' → ${entry.savedCount} images (total ${report.totalSaved})`);
      }

      if (report.totalSaved >= options.maxTotalImages) {
        report.stopReason = 'budget-exhausted';
        break;
      }
    }

    return report;
  }
}
