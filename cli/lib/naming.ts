import * as path from 'path';
import type { NamingContext } from './types';
import type { ImageFormat } from './harvest-types';

const FOLDER_NAME_MAX = 80;
const TIMESTAMP_STEM_MAX = 30;
const COUNTER_STEM_MAX = 20;

/**
 * Concept → directory name: lowercase, `[a-z0-9_\- ]` only, whitespace runs to
 * `_`, at most 80 chars, "keyword" when nothing is left.
 */
export function sanitizeFolderName(value: string): string {
  const cleaned = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_\- ]+/g, '')
    .replace(/\s+/g, '_')
    .slice(0, FOLDER_NAME_MAX);
  return cleaned.length > 0 ? cleaned : 'keyword';
}

// Whitespace, path separators and characters Windows rejects in file names
const FILE_STEM_UNSAFE = /[\s/\\<>:"|?*\x00-\x1f]/g;

/**
 * Concept → file name stem. Case is kept; unsafe characters become `_`.
 */
export function conceptFileStem(concept: string, maxLength: number): string {
  return concept.trim().replace(FILE_STEM_UNSAFE, '_').slice(0, maxLength);
}

/**
 * Base name (no extension) for the `indexInAttempt`-th image, 0-based, saved by
 * one session. The extension follows the downloaded format.
 */
export function imageBaseName(naming: NamingContext, indexInAttempt: number): string {
  const runIndex = naming.runOffset + indexInAttempt;
  const timestamps = naming.timestamps;
  if (timestamps && runIndex < timestamps.length) {
    return `${timestamps[runIndex]}_${conceptFileStem(naming.concept, TIMESTAMP_STEM_MAX)}`;
  }
  const counter = naming.conceptOffset + indexInAttempt + 1;
  return `${conceptFileStem(naming.concept, COUNTER_STEM_MAX)}_${String(counter).padStart(2, '0')}`;
}

export function withExtension(basePath: string, format: ImageFormat): string {
  return `${basePath}.${format}`;
}

export function conceptDir(outputRoot: string, concept: string): string {
  return path.join(outputRoot, sanitizeFolderName(concept));
}
