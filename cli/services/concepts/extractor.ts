/**
 * Concept extraction with compromise
 *
 * Priority order:
 * 1. Named entities (people, places, organizations)
 * 2. Multi-word noun phrases, leading determiners removed
 * 3. Frequent single content words (>= 4 letters, not stop words)
 */

import * as fs from 'fs';
import * as path from 'path';
import nlp from 'compromise';
import { srtToText } from '../../lib/srt';
import type { ConceptExtractor } from '../../lib/types';
import { logger } from '../../utils/logger';

export const DEFAULT_STOPWORDS_PATH = path.join(__dirname, '../../../config/stopwords.json');

const LEADING_DETERMINER = /^(?:the|a|an|this|that|these|those|his|her|its|their|our|my|your|some|any)\s+/i;
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
const WORD = /[\p{L}][\p{L}'-]*/gu;
const MIN_WORD_LENGTH = 4;

function toStrings(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function cleanPhrase(phrase: string): string {
  return phrase.replace(/\s+/g, ' ').replace(EDGE_PUNCTUATION, '').trim();
}

/**
 * Stop words from a JSON array file; a missing or malformed file yields an empty set
 */
export function loadStopwords(filePath: string = DEFAULT_STOPWORDS_PATH): Set<string> {
  try {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return new Set(toStrings(data).map((word) => word.toLowerCase()));
  } catch (error: unknown) {
    logger.warn(`Could not load stop words from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return new Set();
  }
}

export class CompromiseConceptExtractor implements ConceptExtractor {
  private readonly stopwords: Set<string>;

  constructor(stopwords?: Iterable<string>) {
    this.stopwords = stopwords ? new Set([...stopwords].map((w) => w.toLowerCase())) : loadStopwords();
  }

  extractConcepts(text: string, maxCount: number): string[] {
    const plain = text.includes('-->') ? srtToText(text) : text.replace(/\s+/g, ' ').trim();
    if (!plain || maxCount <= 0) {
      return [];
    }

    const doc = nlp(plain);
    const entities = [
      ...toStrings(doc.people().out('array')),
      ...toStrings(doc.places().out('array')),
      ...toStrings(doc.organizations().out('array')),
    ];
    const phrases = toStrings(doc.nouns().out('array'))
      .map((phrase) => cleanPhrase(phrase).replace(LEADING_DETERMINER, ''))
      .filter((phrase) => phrase.split(' ').length > 1);

    const concepts: string[] = [];
    const seen = new Set<string>();
    const add = (candidate: string): void => {
      const concept = cleanPhrase(candidate);
      const key = concept.toLowerCase();
      if (concept.length < 3 || seen.has(key) || this.stopwords.has(key)) return;
      seen.add(key);
      concepts.push(concept);
    };

    for (const candidate of [...entities, ...phrases, ...this.frequentWords(plain)]) {
      if (concepts.length >= maxCount) break;
      add(candidate);
    }

    logger.debug(`Extracted ${concepts.length} concepts`, { entities: entities.length, phrases: phrases.length });
    return concepts;
  }

  /**
   * Content words by frequency, ties by first appearance
   */
  private frequentWords(text: string): string[] {
    const counts = new Map<string, number>();
    for (const match of text.toLowerCase().matchAll(WORD)) {
      const word = match[0].replace(/['-]+$/, '');
      if (word.length < MIN_WORD_LENGTH || this.stopwords.has(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    // Map iteration keeps insertion order, and sort is stable
    return [...counts.entries()].sort((a, b) => b[1] - a[1]).map(([word]) => word);
  }
}
