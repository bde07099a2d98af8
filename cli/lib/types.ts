/**
 * Shared domain types for the transcript → concepts → images pipeline
 */

/**
 * Image budget for one run. Immutable; `maxTotalImages` is the hard ceiling.
 */
export interface BudgetConfig {
  readonly maxConcepts: number;
  readonly imagesPerConcept: number;
  readonly maxTotalImages: number;
  readonly minImagesOverall: number;
}

/**
 * Number of images one concept is entitled to in a run (always >= 1)
 */
export interface ConceptQuota {
  readonly concept: string;
  readonly imagesNeeded: number;
}

/**
 * Browser options shared by every search session of a run
 */
export interface SessionConfig {
  readonly visibleBrowser: boolean;
  /** Persistent profile directory; null uses the app-local profile */
  readonly profileDir: string | null;
  /** Browser binary; null lets the launcher pick one */
  readonly executablePath: string | null;
}

/**
 * Human-readable progress sink. Absent means no-op.
 */
export type StatusReporter = (message: string) => void;

export type ConceptFailurePolicy = 'abort-run' | 'skip-concept';

/**
 * How saved images are named. Timestamps are indexed by the run-wide image
 * index; the counter continues across the attempts of one concept.
 */
export interface NamingContext {
  readonly concept: string;
  readonly timestamps?: readonly string[];
  /** Images already saved in the run before this attempt */
  readonly runOffset: number;
  /** Images already saved for this concept before this attempt */
  readonly conceptOffset: number;
}

export interface TranscriptResult {
  transcriptPath: string;
  text: string;
}

/**
 * Speech-to-text collaborator
 */
export interface Transcriber {
  transcribe(mediaPath: string, modelName: string): Promise<TranscriptResult>;
}

/**
 * Concept/keyword extraction collaborator. Empty text yields [].
 */
export interface ConceptExtractor {
  extractConcepts(text: string, maxCount: number): string[];
}

export interface DownloadSummary {
  successCount: number;
  failCount: number;
}

/**
 * Video acquisition collaborator
 */
export interface VideoDownloader {
  downloadAll(urls: string[], destDir: string): Promise<DownloadSummary>;
}
