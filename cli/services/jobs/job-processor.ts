import * as fs from 'fs-extra';
import * as path from 'path';
import type { HarvestSettings } from '../../lib/config';
import { sanitizeFolderName } from '../../lib/naming';
import { extractSrtTimestamps } from '../../lib/srt';
import type { ConceptExtractor, SessionConfig, Transcriber, VideoDownloader } from '../../lib/types';
import { logger } from '../../utils/logger';
import { allocateQuotas, budgetFromSettings } from '../concepts/allocator';
import { HarvestAbortedError, HarvestLoop } from '../media/harvest-loop';
import { VideoDownloadError, findMediaFiles, findSubtitleFor } from '../video/yt-dlp';
import { Job, JobStatus, jobMetadata } from './jobs';

export const TRANSCRIPT_FILE = 'transcript.srt';
export const IMAGES_DIR = 'images';

export type JobListener = (job: Job) => void;

export interface JobProcessorDeps {
  settings: Readonly<HarvestSettings>;
  session: SessionConfig;
  downloader: VideoDownloader;
  transcriber: Transcriber;
  extractor: ConceptExtractor;
  harvestLoop: HarvestLoop;
  onUpdate?: JobListener;
}

/**
 * Whether a transcript must be generated locally. TikTok and Instagram never
 * ship usable subtitles; YouTube and other sites follow the settings.
 */
export function shouldTranscribe(job: Pick<Job, 'platform'>, settings: HarvestSettings): boolean {
  switch (job.platform) {
    case 'tiktok':
    case 'instagram':
      return true;
    case 'youtube':
      return settings.srtYoutubeEnabled;
    case 'other':
      return settings.srtOtherEnabled;
  }
}

export function jobDirectory(job: Pick<Job, 'outputDir' | 'topic'>): string {
  return path.join(job.outputDir, sanitizeFolderName(job.topic));
}

/**
 * Runs one job through download → transcript → concepts → images
 */
export class JobProcessor {
  constructor(private readonly deps: JobProcessorDeps) {}

  /**
   * Never throws; failures end in status `error` with the message on the job
   */
  async processJob(job: Job, signal?: AbortSignal): Promise<Job> {
    const jobDir = jobDirectory(job);
    try {
      job.startedAt = new Date();
      this.update(job, 'downloading', 'Downloading video...');

      await fs.ensureDir(jobDir);
      await this.saveMetadata(job, jobDir);

      const videoPath = await this.downloadVideo(job, jobDir);
      const transcriptPath = await this.prepareTranscript(job, jobDir, videoPath);

      if (transcriptPath) {
        this.update(job, 'analyzing', 'Extracting concepts...');
        const srt = await fs.readFile(transcriptPath, 'utf-8');
        const quotas = allocateQuotas(srt, budgetFromSettings(this.deps.settings), this.deps.extractor);

        this.update(job, 'images', `Images: ${quotas.length} concepts`);
        const report = await this.deps.harvestLoop.run(quotas, {
          outputRoot: path.join(jobDir, IMAGES_DIR),
          maxTotalImages: this.deps.settings.maxTotalImages,
          maxScrolls: this.deps.settings.maxScrollsPerKeyword,
          session: this.deps.session,
          failurePolicy: this.deps.settings.conceptFailurePolicy,
          dedupeAcrossAttempts: this.deps.settings.dedupeAcrossAttempts,
          timestamps: extractSrtTimestamps(srt),
          signal,
          reporter: (message) => {
            job.progress = message;
            this.deps.onUpdate?.(job);
          },
        });
        job.imagesSaved = report.totalSaved;
      } else {
        logger.info(`No transcript for job ${job.id}; skipping images`);
      }

      job.completedAt = new Date();
      this.update(job, 'done', job.imagesSaved === undefined ? 'Video only' : `${job.imagesSaved} images`);
    } catch (error: unknown) {
      if (error instanceof HarvestAbortedError) {
        job.imagesSaved = error.report.totalSaved;
      }
      job.error = error instanceof Error ? error.message : String(error);
      job.completedAt = new Date();
      logger.error(`Job ${job.id} failed`, job.error);
      this.update(job, 'error', job.error);
    }

    await this.saveMetadata(job, jobDir).catch((error: unknown) => {
      logger.warn(`Could not update job.json for ${job.id}`, error);
    });
    return job;
  }

  private update(job: Job, status: JobStatus, progress: string): void {
    job.status = status;
    job.progress = progress;
    logger.debug(`Job ${job.id}: ${status}`, progress);
    this.deps.onUpdate?.(job);
  }

  private async saveMetadata(job: Job, jobDir: string): Promise<void> {
    await fs.outputFile(path.join(jobDir, 'links.txt'), `${job.url}\n`);
    await fs.outputFile(path.join(jobDir, 'notes.txt'), job.notes ? `${job.notes}\n` : '');
    await fs.outputJson(path.join(jobDir, 'job.json'), jobMetadata(job), { spaces: 2 });
  }

  private async downloadVideo(job: Job, jobDir: string): Promise<string> {
    const summary = await this.deps.downloader.downloadAll([job.url], jobDir);
    if (summary.successCount === 0) {
      throw new VideoDownloadError(`Download failed: ${job.url}`, job.url);
    }
    const [video] = await findMediaFiles(jobDir);
    if (!video) {
      throw new VideoDownloadError('No video file found after download', job.url);
    }
    return video;
  }

  /**
   * Path of `<jobDir>/transcript.srt`, or null when there is nothing to use
   */
  private async prepareTranscript(job: Job, jobDir: string, videoPath: string): Promise<string | null> {
    const finalPath = path.join(jobDir, TRANSCRIPT_FILE);
    let source: string | null;

    if (shouldTranscribe(job, this.deps.settings)) {
      this.update(job, 'transcribing', 'Generating SRT...');
      const result = await this.deps.transcriber.transcribe(videoPath, this.deps.settings.whisperModel);
      source = result.transcriptPath;
    } else {
      source = await findSubtitleFor(videoPath);
    }

    if (!source) {
      return null;
    }
    if (path.resolve(source) !== path.resolve(finalPath)) {
      await fs.copy(source, finalPath, { overwrite: true });
    }
    return finalPath;
  }
}
