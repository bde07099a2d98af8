#!/usr/bin/env node
/**
 * Batch mode: transcript files to concept image folders
 *
 * Accepts one .srt file or a directory of them. Each file gets its own budget;
 * images land in <output-root>/<concept>/.
 * Usage: npm run srt-images -- <srt-file-or-dir> [output-root]
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager, HarvestSettings } from '../lib/config';
import { sanitizeFolderName } from '../lib/naming';
import { srtToText } from '../lib/srt';
import type { ConceptExtractor, SessionConfig } from '../lib/types';
import { allocateQuotas, budgetFromSettings } from '../services/concepts/allocator';
import { HarvestAbortedError, HarvestLoop, HarvestServiceFactory } from '../services/media';
import { logger } from '../utils/logger';

export interface SrtImagesOptions {
  source: string;
  outputRoot?: string;
  settings?: Readonly<HarvestSettings>;
  harvestLoop?: HarvestLoop;
  extractor?: ConceptExtractor;
  session?: SessionConfig;
  /** Base for the default output root */
  cwd?: string;
  signal?: AbortSignal;
}

export interface SrtImagesSummary {
  outputRoot: string;
  files: Array<{ file: string; saved: number }>;
  totalSaved: number;
}

export interface SrtSources {
  files: string[];
  /** Name the default output folder is derived from */
  baseName: string;
}

/**
 * The .srt files a source path stands for, sorted by name
 */
export async function listSrtFiles(source: string): Promise<SrtSources> {
  const stat = await fs.stat(source);
  if (stat.isFile()) {
    return { files: [source], baseName: path.parse(source).name };
  }
  const entries = await fs.readdir(source);
  const files = entries
    .filter((name) => name.toLowerCase().endsWith('.srt'))
    .sort()
    .map((name) => path.join(source, name));
  return { files, baseName: path.basename(path.resolve(source)) };
}

export function defaultOutputRoot(baseName: string, cwd: string = process.cwd()): string {
  return path.join(cwd, 'images', sanitizeFolderName(baseName));
}

export async function runSrtImages(options: SrtImagesOptions): Promise<SrtImagesSummary> {
  const settings = options.settings ?? (await ConfigManager.loadSettings());
  const { files, baseName } = await listSrtFiles(options.source);

  const outputRoot = options.outputRoot ?? defaultOutputRoot(baseName, options.cwd);
  const summary: SrtImagesSummary = { outputRoot, files: [], totalSaved: 0 };
  if (files.length === 0) {
    console.log(`[SRT] No .srt files found in ${options.source}`);
    return summary;
  }

  await fs.ensureDir(outputRoot);
  console.log(`[SRT] Using output root: ${outputRoot}`);

  const budget = budgetFromSettings(settings);
  const extractor = options.extractor ?? HarvestServiceFactory.getConceptExtractor();
  const session = options.session ?? (await HarvestServiceFactory.createSessionConfig(settings));

  for (const file of files) {
    if (options.signal?.aborted) break;

    const label = path.basename(file);
    console.log(`[SRT] Processing SRT: ${file}`);

    const text = srtToText(await fs.readFile(file, 'utf-8'));
    if (!text.trim()) {
      console.log(`[skip] Empty text in ${file}`);
      summary.files.push({ file, saved: 0 });
      continue;
    }

    const quotas = allocateQuotas(text, budget, extractor);
    if (quotas.length === 0) {
      console.log(`[skip] No keywords extracted for ${label}`);
      summary.files.push({ file, saved: 0 });
      continue;
    }
    for (const quota of quotas) {
      console.log(`[${label}] Keyword '${quota.concept}' → ${quota.imagesNeeded} images`);
    }

    const reporter = (message: string): void => console.log(`[${label}] ${message}`);
    const harvestLoop = options.harvestLoop ?? HarvestServiceFactory.createHarvestLoop(settings, { reporter });

    const report = await harvestLoop.run(quotas, {
      outputRoot,
      maxTotalImages: budget.maxTotalImages,
      maxScrolls: settings.maxScrollsPerKeyword,
      session,
      failurePolicy: settings.conceptFailurePolicy,
      dedupeAcrossAttempts: settings.dedupeAcrossAttempts,
      signal: options.signal,
      reporter,
    });

    console.log(`[SRT] ✓ Saved ${report.totalSaved} images for ${label}`);
    summary.files.push({ file, saved: report.totalSaved });
    summary.totalSaved += report.totalSaved;
  }

  console.log(`[SRT] Done. Total images saved: ${summary.totalSaved}`);
  return summary;
}

async function main(source?: string, outputRoot?: string): Promise<void> {
  if (!source) {
    console.error('Usage: npm run srt-images -- <srt_file_or_folder> [output_folder]');
    process.exit(1);
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('[SRT] Interrupted, stopping after the current concept...');
    controller.abort();
  });

  try {
    await runSrtImages({ source, outputRoot, signal: controller.signal });
  } catch (error: unknown) {
    if (error instanceof HarvestAbortedError) {
      console.error(`[SRT] ✗ Stopped after ${error.report.totalSaved} images: ${error.cause.message}`);
    } else {
      console.error('[SRT] ✗ Error:', error instanceof Error ? error.message : String(error));
    }
    logger.debug('srt-images failed', error);
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  const args = process.argv.slice(2).filter((arg) => !arg.startsWith('--'));
  void main(args[0], args[1]);
}

export default main;
