/**
 * Single-image HTTP fetch: one GET, validate, write the body verbatim
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import * as fs from 'fs-extra';
import type { FetchResult } from '../../lib/harvest-types';
import { withExtension } from '../../lib/naming';
import { logger } from '../../utils/logger';
import { ImageInspector, PassThroughInspector } from './image-inspector';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface FetchClientOptions {
  timeoutMs?: number;
  /** Bodies must be strictly larger than this */
  minBytes?: number;
  userAgent?: string;
  inspector?: ImageInspector;
  /** Transport override; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
}

/**
 * Anything that can turn a candidate URL into a saved file
 */
export interface ImageFetcher {
  fetchToFile(url: string, destinationBase: string): Promise<FetchResult>;
}

function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data);
  return null;
}

export class ImageFetchClient implements ImageFetcher {
  private readonly client: AxiosInstance;
  private readonly minBytes: number;
  private readonly inspector: ImageInspector;

  constructor(options: FetchClientOptions = {}) {
    this.minBytes = options.minBytes ?? 1000;
    this.inspector = options.inspector ?? new PassThroughInspector();
    this.client = axios.create({
      timeout: options.timeoutMs ?? 15000,
      responseType: 'arraybuffer',
      headers: { 'User-Agent': options.userAgent ?? BROWSER_USER_AGENT },
      maxRedirects: 5,
      // status is judged below, never by axios
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  /**
   * GET `url` and save it as `<destinationBase>.<ext>`. Never throws; failures come
   * back as a rejected result so the caller can skip the candidate.
   */
  async fetchToFile(url: string, destinationBase: string): Promise<FetchResult> {
    let status: number;
    let body: Buffer | null;
    try {
      const response = await this.client.get<unknown>(url);
      status = response.status;
      body = toBuffer(response.data);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Fetch failed for ${url}: ${message}`);
      return { ok: false, reason: 'network', message };
    }

    if (status !== 200) {
      return { ok: false, reason: 'bad-status', status };
    }
    if (!body || body.length <= this.minBytes) {
      return { ok: false, reason: 'too-small', status, message: `${body?.length ?? 0} bytes` };
    }

    const info = await this.inspector.inspect(body);
    if (!info) {
      return { ok: false, reason: 'not-an-image', status };
    }

    const filePath = withExtension(destinationBase, info.format);
    try {
      await fs.outputFile(filePath, body);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not write ${filePath}: ${message}`);
      return { ok: false, reason: 'write-failed', message };
    }

    return { ok: true, filePath, bytes: body.length, format: info.format };
  }
}
