#!/usr/bin/env node
/**
 * Job queue: video URLs to per-topic folders of video, transcript and images
 *
 * Usage: npm run jobs -- --urls <file> --platform <youtube|tiktok|instagram|other>
 *          --output <dir> [--topic "Topic"] [--notes "Notes"]
 */

import * as fs from 'fs-extra';
import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager } from '../lib/config';
import { HarvestServiceFactory } from '../services/media';
import { JobProcessor } from '../services/jobs/job-processor';
import { JobQueue, QueueSummary } from '../services/jobs/job-queue';
import { Platform, PlatformSchema, createJobs } from '../services/jobs/jobs';
import { WhisperCliTranscriber } from '../services/transcription/whisper';
import { YtDlpDownloader } from '../services/video/yt-dlp';
import { logger } from '../utils/logger';

export interface JobsCommandOptions {
  urlsFile?: string;
  platform?: string;
  output?: string;
  topic?: string;
  notes?: string;
}

const STATUS_MARK: Record<string, string> = {
  done: '✓',
  error: '✗',
};

function parsePlatform(value: string | undefined): Platform {
  const parsed = PlatformSchema.safeParse(value ?? 'other');
  if (!parsed.success) {
    throw new Error(`Invalid platform: ${value}. Expected one of ${PlatformSchema.options.join(', ')}`);
  }
  return parsed.data;
}

async function main(options: JobsCommandOptions = {}): Promise<QueueSummary | undefined> {
  try {
    if (!options.urlsFile || !options.output) {
      throw new Error('Usage: npm run jobs -- --urls <file> --platform <p> --output <dir> [--topic T] [--notes N]');
    }

    const platform = parsePlatform(options.platform);
    const urls = (await fs.readFile(options.urlsFile, 'utf-8')).split(/\r?\n/);
    const { jobs, skipped } = createJobs({
      urls,
      platform,
      outputDir: options.output,
      topic: options.topic,
      notes: options.notes,
    });

    if (jobs.length === 0) {
      throw new Error(`No ${platform} URLs found in ${options.urlsFile}`);
    }
    console.log(`[JOBS] Added ${jobs.length} ${platform} job(s)`);
    if (skipped.length > 0) {
      console.log(`[JOBS] Skipped ${skipped.length} non-${platform} URL(s)`);
    }

    const settings = await ConfigManager.loadSettings();
    // jobs always search in the background
    const session = await HarvestServiceFactory.createSessionConfig(settings, { visibleBrowser: false });

    const processor = new JobProcessor({
      settings,
      session,
      downloader: new YtDlpDownloader(),
      transcriber: new WhisperCliTranscriber({ language: settings.transcriptLanguage }),
      extractor: HarvestServiceFactory.getConceptExtractor(),
      // per-image detail only at LOG_LEVEL=debug; job progress comes through onUpdate
      harvestLoop: HarvestServiceFactory.createHarvestLoop(settings, { reporter: logger.child('images').reporter('debug') }),
      onUpdate: (job) => {
        const mark = STATUS_MARK[job.status] ?? '…';
        console.log(`[JOBS] ${mark} ${job.topic} [${job.status}] ${job.progress}`);
      },
    });

    const queue = new JobQueue(processor);
    queue.enqueue(...jobs);
    process.once('SIGINT', () => queue.cancel());

    const summary = await queue.run();
    console.log(
      `[JOBS] Finished: ${summary.done} done, ${summary.failed} failed` +
        (summary.remaining > 0 ? `, ${summary.remaining} cancelled` : '')
    );
    return summary;
  } catch (error: unknown) {
    console.error('[JOBS] ✗ Error:', error instanceof Error ? error.message : String(error));
    logger.debug('jobs failed', error);
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  const args = process.argv.slice(2);
  const valueOf = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    return index !== -1 ? args[index + 1] : undefined;
  };
  void main({
    urlsFile: valueOf('--urls'),
    platform: valueOf('--platform'),
    output: valueOf('--output'),
    topic: valueOf('--topic'),
    notes: valueOf('--notes'),
  });
}

export default main;
