import { ConceptHarvestError, SessionInterruptedError, toError } from '../../lib/harvest-types';
import type { NamingContext, SessionConfig, StatusReporter } from '../../lib/types';
import { logger } from '../../utils/logger';
import type { SessionResult, SessionRunner } from './session-driver';

export const FALLBACK_QUERY_SUFFIX = ' Wikipedia';

export interface ConceptHarvestRequest {
  concept: string;
  targetDir: string;
  imagesNeeded: number;
  maxScrolls: number;
  session: SessionConfig;
  /** Transcript cue timestamps used for file names, if any */
  timestamps?: readonly string[];
  /** Images already saved in the run before this concept */
  runOffset: number;
  /** Seed the fallback session with the primary attempt's URLs */
  dedupeAcrossAttempts?: boolean;
  signal?: AbortSignal;
}

export interface ConceptHarvestResult {
  concept: string;
  savedCount: number;
  files: string[];
  attempts: SessionResult[];
}

/**
 * Anything that can realize one concept quota
 */
export interface ConceptHarvester {
  harvestConcept(request: ConceptHarvestRequest): Promise<ConceptHarvestResult>;
}

function partialSaves(error: unknown): { savedCount: number; files: string[] } {
  return error instanceof SessionInterruptedError
    ? { savedCount: error.savedCount, files: error.files }
    : { savedCount: 0, files: [] };
}

/**
 * Primary search for the concept, then one "<concept> Wikipedia" search for
 * whatever is still missing. An attempt failure ends the concept and is
 * rethrown as a ConceptHarvestError carrying the images already saved.
 */
export class FallbackOrchestrator implements ConceptHarvester {
  constructor(
    private readonly runner: SessionRunner,
    private readonly reporter?: StatusReporter
  ) {}

  async harvestConcept(request: ConceptHarvestRequest): Promise<ConceptHarvestResult> {
    const { concept, imagesNeeded } = request;
    let primary: SessionResult;
    try {
      primary = await this.runner.run({
        query: concept,
        targetDir: request.targetDir,
        imagesNeeded,
        maxScrolls: request.maxScrolls,
        session: request.session,
        naming: this.naming(request, 0),
      });
    } catch (error: unknown) {
      const partial = partialSaves(error);
      throw new ConceptHarvestError(concept, partial.savedCount, toError(error), partial.files);
    }

    const result: ConceptHarvestResult = {
      concept,
      savedCount: primary.savedCount,
      files: [...primary.files],
      attempts: [primary],
    };

    const shortfall = imagesNeeded - primary.savedCount;
    if (shortfall <= 0) {
      return result;
    }
    if (request.signal?.aborted) {
      logger.info(`Cancelled before fallback search for '${concept}'`);
      return result;
    }

    const query = `${concept}${FALLBACK_QUERY_SUFFIX}`;
    this.reporter?.(`Only ${primary.savedCount}/${imagesNeeded} for '${concept}', trying '${query}'`);

    let fallback: SessionResult;
    try {
      fallback = await this.runner.run({
        query,
        targetDir: request.targetDir,
        imagesNeeded: shortfall,
        maxScrolls: request.maxScrolls,
        session: request.session,
        naming: this.naming(request, primary.savedCount),
        seedUrls: request.dedupeAcrossAttempts ? primary.seenUrls : undefined,
      });
    } catch (error: unknown) {
      const partial = partialSaves(error);
      throw new ConceptHarvestError(
        concept,
        primary.savedCount + partial.savedCount,
        toError(error),
        [...primary.files, ...partial.files]
      );
    }

    result.savedCount += fallback.savedCount;
    result.files.push(...fallback.files);
    result.attempts.push(fallback);
    return result;
  }

  private naming(request: ConceptHarvestRequest, conceptOffset: number): NamingContext {
    return {
      concept: request.concept,
      timestamps: request.timestamps,
      runOffset: request.runOffset + conceptOffset,
      conceptOffset,
    };
  }
}
