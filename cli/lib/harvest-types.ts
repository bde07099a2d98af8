/**
 * Outcome types, failure policy and error classes for image harvesting
 */

import { z } from 'zod';

// ===========================
// Candidate outcomes
// ===========================

/**
 * Why a thumbnail did not produce a saved image
 */
export type SkipReason =
  | 'click-failed'
  | 'no-url'
  | 'not-http'
  | 'duplicate'
  | 'bad-status'
  | 'too-small'
  | 'not-an-image'
  | 'network'
  | 'write-failed';

export type CandidateOutcome =
  | { kind: 'saved'; url: string; filePath: string; bytes: number }
  | { kind: 'skipped'; reason: SkipReason; url?: string; detail?: string };

/**
 * Result of a single fetch-and-save
 */
export type FetchResult =
  | { ok: true; filePath: string; bytes: number; format: ImageFormat }
  | { ok: false; reason: Extract<SkipReason, 'bad-status' | 'too-small' | 'not-an-image' | 'network' | 'write-failed'>; status?: number; message?: string };

export type ImageFormat = 'jpg' | 'png' | 'webp' | 'gif';

// ===========================
// Failure policy
// ===========================

export type FailureKind =
  | 'navigation-failed'
  | 'search-input-missing'
  | 'no-thumbnails'
  | 'session-interrupted'
  | SkipReason;

/**
 * - skip-candidate: move on to the next thumbnail (for attempt-level kinds:
 *   keep going where possible, else end the attempt)
 * - end-attempt: stop scrolling, keep what was saved
 * - abort-attempt: close the session and throw to the orchestrator
 */
export type FailureAction = 'skip-candidate' | 'end-attempt' | 'abort-attempt';

export const FAILURE_POLICY: Readonly<Record<FailureKind, FailureAction>> = {
  'navigation-failed': 'abort-attempt',
  'search-input-missing': 'abort-attempt',
  'no-thumbnails': 'end-attempt',
  'session-interrupted': 'abort-attempt',
  'click-failed': 'skip-candidate',
  'no-url': 'skip-candidate',
  'not-http': 'skip-candidate',
  duplicate: 'skip-candidate',
  'bad-status': 'skip-candidate',
  'too-small': 'skip-candidate',
  'not-an-image': 'skip-candidate',
  network: 'skip-candidate',
  'write-failed': 'skip-candidate',
};

// ===========================
// Schemas
// ===========================

export const BudgetConfigSchema = z.object({
  maxConcepts: z.number().int().min(1),
  imagesPerConcept: z.number().int().min(1),
  maxTotalImages: z.number().int().min(1),
  minImagesOverall: z.number().int().min(0),
});

// ================
// Error Classes
// ================

/**
 * Base error for an attempt that cannot continue. Carries the query and the
 * failure kind so the harvest loop can apply its concept policy.
 */
export class HarvestError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly query: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'HarvestError';
  }
}

/**
 * No search input matched any selector of the chain
 */
export class SearchInputNotFoundError extends HarvestError {
  constructor(query: string, public readonly selectorsTried: string[]) {
    super(`Could not find image search input (tried ${selectorsTried.length} selectors)`, 'search-input-missing', query);
    this.name = 'SearchInputNotFoundError';
  }
}

/**
 * Search entry page could not be opened
 */
export class NavigationError extends HarvestError {
  constructor(query: string, public readonly url: string, cause?: Error) {
    super(`Failed to open ${url}: ${cause?.message ?? 'unknown error'}`, 'navigation-failed', query, cause);
    this.name = 'NavigationError';
  }
}

/**
 * The session stopped after the query was submitted. Carries what it had
 * already written so callers can count it against their budgets.
 */
export class SessionInterruptedError extends HarvestError {
  constructor(
    query: string,
    public readonly savedCount: number,
    public readonly files: string[],
    cause: Error
  ) {
    super(`Search for '${query}' stopped after ${savedCount} saved: ${cause.message}`, 'session-interrupted', query, cause);
    this.name = 'SessionInterruptedError';
  }
}

/**
 * Budget values out of range
 */
export class BudgetConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'BudgetConfigError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * A concept's attempts stopped on an error. `savedCount` and `files` cover
 * every attempt of the concept, the failed one included.
 */
export class ConceptHarvestError extends Error {
  constructor(
    public readonly concept: string,
    public readonly savedCount: number,
    public readonly cause: Error,
    public readonly files: string[] = []
  ) {
    super(`Harvest failed for '${concept}' after ${savedCount} saved: ${cause.message}`);
    this.name = 'ConceptHarvestError';
  }
}
