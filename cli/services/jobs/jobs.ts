/**
 * Video-to-images jobs: one URL, one folder, one harvest
 */

import * as crypto from 'crypto';
import { z } from 'zod';

export const PLATFORMS = ['youtube', 'tiktok', 'instagram', 'other'] as const;
export type Platform = (typeof PLATFORMS)[number];

export const PlatformSchema = z.enum(PLATFORMS);

export type JobStatus = 'queued' | 'downloading' | 'transcribing' | 'analyzing' | 'images' | 'done' | 'error';

export interface Job {
  id: string;
  url: string;
  platform: Platform;
  outputDir: string;
  topic: string;
  notes: string;
  status: JobStatus;
  progress: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  imagesSaved?: number;
}

/**
 * Hosts accepted per platform; an empty list accepts any URL
 */
export const PLATFORM_DOMAINS: Readonly<Record<Platform, readonly string[]>> = {
  tiktok: ['tiktok.com', 'vm.tiktok.com'],
  youtube: ['youtube.com', 'youtu.be'],
  instagram: ['instagram.com'],
  other: [],
};

export interface UrlFilterResult {
  matching: string[];
  skipped: string[];
}

/**
 * Split URLs by whether they belong to `platform`. Blank entries are dropped.
 */
export function filterUrlsForPlatform(urls: readonly string[], platform: Platform): UrlFilterResult {
  const domains = PLATFORM_DOMAINS[platform];
  const result: UrlFilterResult = { matching: [], skipped: [] };
  for (const raw of urls) {
    const url = raw.trim();
    if (!url) continue;
    if (domains.length === 0 || domains.some((domain) => url.includes(domain))) {
      result.matching.push(url);
    } else {
      result.skipped.push(url);
    }
  }
  return result;
}

export function defaultTopic(platform: Platform): string {
  return `${platform.charAt(0).toUpperCase()}${platform.slice(1)} Batch`;
}

export function createJobId(url: string, now: Date = new Date(), index = 0): string {
  const hash = crypto.createHash('md5').update(`${index}:${url}`).digest('hex').slice(0, 8);
  return `${Math.floor(now.getTime() / 1000)}_${hash}`;
}

export interface CreateJobsInput {
  urls: readonly string[];
  platform: Platform;
  outputDir: string;
  topic?: string;
  notes?: string;
  now?: Date;
}

export interface CreateJobsResult {
  jobs: Job[];
  skipped: string[];
}

/**
 * One queued job per matching URL. With several jobs the topic gets a ` - N` suffix.
 */
export function createJobs(input: CreateJobsInput): CreateJobsResult {
  const { matching, skipped } = filterUrlsForPlatform(input.urls, input.platform);
  const topic = input.topic?.trim() || defaultTopic(input.platform);
  const now = input.now ?? new Date();

  const jobs = matching.map((url, index): Job => ({
    id: createJobId(url, now, index),
    url,
    platform: input.platform,
    outputDir: input.outputDir,
    topic: matching.length > 1 ? `${topic} - ${index + 1}` : topic,
    notes: input.notes?.trim() ?? '',
    status: 'queued',
    progress: '',
    createdAt: now,
  }));

  return { jobs, skipped };
}

/**
 * Persisted `job.json` document
 */
export function jobMetadata(job: Job): Record<string, string> {
  return {
    id: job.id,
    url: job.url,
    platform: job.platform,
    topic: job.topic,
    created_at: job.createdAt.toISOString(),
    status: job.status,
  };
}
