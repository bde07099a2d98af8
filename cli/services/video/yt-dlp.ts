/**
 * Video acquisition through the `yt-dlp` CLI, subtitles included when the
 * platform offers them
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { DownloadSummary, VideoDownloader } from '../../lib/types';
import { CLIExecutionError, CLIExecutor } from '../../utils/cli-executor';
import { logger } from '../../utils/logger';

const log = logger.child('yt-dlp');

export const VIDEO_EXTENSIONS: readonly string[] = ['.mp4', '.mkv', '.webm', '.mov', '.m4v'];

export class VideoDownloadError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly exitCode?: number
  ) {
    super(message);
    this.name = 'VideoDownloadError';
  }
}

export interface YtDlpOptions {
  binary?: string;
  /** Per-URL timeout, 0 disables */
  timeoutMs?: number;
}

export function buildYtDlpArgs(url: string, destDir: string): string[] {
  return [
    '--no-progress',
    '--newline',
    '--ignore-errors',
    '--no-abort-on-error',
    '--restrict-filenames',
    '--merge-output-format', 'mp4',
    '--write-subs',
    '--write-auto-subs',
    '--sub-format', 'srt',
    '--sub-langs', 'en.*,en',
    '-o', path.join(destDir, '%(title).150s [%(id)s].%(ext)s'),
    url,
  ];
}

/**
 * Video files directly inside `dir`, sorted by name
 */
export async function findMediaFiles(dir: string): Promise<string[]> {
  if (!(await fs.pathExists(dir))) {
    return [];
  }
  const entries = await fs.readdir(dir);
  return entries
    .filter((name) => VIDEO_EXTENSIONS.includes(path.extname(name).toLowerCase()))
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * A subtitle file yt-dlp wrote next to the video (`<stem>.srt`, `<stem>.en.srt`), or null
 */
export async function findSubtitleFor(mediaPath: string): Promise<string | null> {
  const dir = path.dirname(mediaPath);
  const stem = path.parse(mediaPath).name;
  const entries = (await fs.readdir(dir)).sort();
  const match = entries.find((name) => name.startsWith(stem) && name.toLowerCase().endsWith('.srt'));
  return match ? path.join(dir, match) : null;
}

export class YtDlpDownloader implements VideoDownloader {
  private readonly binary: string;

  constructor(private readonly options: YtDlpOptions = {}) {
    this.binary = options.binary ?? 'yt-dlp';
  }

  /**
   * Download one URL. Throws VideoDownloadError on failure.
   */
  async download(url: string, destDir: string): Promise<void> {
    try {
      await CLIExecutor.execute(this.binary, buildYtDlpArgs(url, destDir), { timeout: this.options.timeoutMs ?? 0 });
    } catch (error: unknown) {
      if (error instanceof CLIExecutionError) {
        const message = error.notFound
          ? `${this.binary} not found. Install yt-dlp`
          : `${this.binary} exited with code ${error.exitCode}`;
        throw new VideoDownloadError(message, url, error.exitCode);
      }
      throw error;
    }
  }

  /**
   * Download every non-blank URL in order. Per-URL failures are counted, not thrown.
   */
  async downloadAll(urls: string[], destDir: string): Promise<DownloadSummary> {
    await fs.ensureDir(destDir);
    const summary: DownloadSummary = { successCount: 0, failCount: 0 };

    for (const raw of urls) {
      const url = raw.trim();
      if (!url) continue;

      log.info(`START  ${url}`);
      try {
        await this.download(url, destDir);
        summary.successCount++;
        log.info(`DONE   ${url}`);
      } catch (error: unknown) {
        summary.failCount++;
        log.warn(`FAIL   ${url}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return summary;
  }
}
