#!/usr/bin/env node
/**
 * Single video to images: transcribe with whisper, allocate concepts, harvest.
 * Files are named after the transcript cue they illustrate.
 * Usage: npm run video-images -- <video-file> [output-root]
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager, HarvestSettings } from '../lib/config';
import { extractSrtTimestamps } from '../lib/srt';
import type { ConceptExtractor, SessionConfig, Transcriber } from '../lib/types';
import { allocateQuotas, budgetFromSettings } from '../services/concepts/allocator';
import { HarvestAbortedError, HarvestLoop, HarvestReport, HarvestServiceFactory } from '../services/media';
import { WhisperCliTranscriber } from '../services/transcription/whisper';
import { logger } from '../utils/logger';
import { defaultOutputRoot } from './srt-images';

export interface VideoImagesOptions {
  video: string;
  outputRoot?: string;
  settings?: Readonly<HarvestSettings>;
  transcriber?: Transcriber;
  extractor?: ConceptExtractor;
  harvestLoop?: HarvestLoop;
  session?: SessionConfig;
  cwd?: string;
  signal?: AbortSignal;
}

export interface VideoImagesResult {
  outputRoot: string;
  transcriptPath: string;
  report: HarvestReport;
}

export async function runVideoImages(options: VideoImagesOptions): Promise<VideoImagesResult> {
  const settings = options.settings ?? (await ConfigManager.loadSettings());
  const outputRoot = options.outputRoot ?? defaultOutputRoot(path.parse(options.video).name, options.cwd);
  await fs.ensureDir(outputRoot);

  console.log(`[VIDEO] Transcribing ${options.video} (model: ${settings.whisperModel})`);
  const transcriber =
    options.transcriber ?? new WhisperCliTranscriber({ language: settings.transcriptLanguage, outputDir: outputRoot });
  const transcript = await transcriber.transcribe(options.video, settings.whisperModel);
  console.log(`[VIDEO] ✓ Transcript: ${transcript.transcriptPath}`);

  const srt = await fs.readFile(transcript.transcriptPath, 'utf-8');
  const budget = budgetFromSettings(settings);
  const quotas = allocateQuotas(transcript.text, budget, options.extractor ?? HarvestServiceFactory.getConceptExtractor());
  const emptyReport: HarvestReport = { totalSaved: 0, concepts: [], stopReason: 'completed' };
  if (quotas.length === 0) {
    console.log(`[skip] No keywords extracted for ${path.basename(options.video)}`);
    return { outputRoot, transcriptPath: transcript.transcriptPath, report: emptyReport };
  }
  console.log(`[VIDEO] ${quotas.length} concepts: ${quotas.map((q) => `${q.concept} (${q.imagesNeeded})`).join(', ')}`);

  const reporter = (message: string): void => console.log(`[VIDEO] ${message}`);
  const harvestLoop = options.harvestLoop ?? HarvestServiceFactory.createHarvestLoop(settings, { reporter });
  const report = await harvestLoop.run(quotas, {
    outputRoot,
    maxTotalImages: budget.maxTotalImages,
    maxScrolls: settings.maxScrollsPerKeyword,
    session: options.session ?? (await HarvestServiceFactory.createSessionConfig(settings)),
    failurePolicy: settings.conceptFailurePolicy,
    dedupeAcrossAttempts: settings.dedupeAcrossAttempts,
    timestamps: extractSrtTimestamps(srt),
    signal: options.signal,
    reporter,
  });

  console.log(`[VIDEO] ✓ Done. Total images saved: ${report.totalSaved}`);
  return { outputRoot, transcriptPath: transcript.transcriptPath, report };
}

async function main(video?: string, outputRoot?: string): Promise<void> {
  if (!video) {
    console.error('Usage: npm run video-images -- <video-file> [output-root]');
    process.exit(1);
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    await runVideoImages({ video, outputRoot, signal: controller.signal });
  } catch (error: unknown) {
    if (error instanceof HarvestAbortedError) {
      console.error(`[VIDEO] ✗ Stopped after ${error.report.totalSaved} images: ${error.cause.message}`);
    } else {
      console.error('[VIDEO] ✗ Error:', error instanceof Error ? error.message : String(error));
    }
    logger.debug('video-images failed', error);
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  const args = process.argv.slice(2).filter((arg) => !arg.startsWith('--'));
  void main(args[0], args[1]);
}

export default main;
