/**
 * Decodes downloaded bytes far enough to know they are an image
 */

import sharp from 'sharp';
import type { ImageFormat } from '../../lib/harvest-types';
import { logger } from '../../utils/logger';

export interface ImageInfo {
  format: ImageFormat;
  width: number;
  height: number;
}

export interface ImageInspector {
  /** null when the buffer is not a supported image */
  inspect(body: Buffer): Promise<ImageInfo | null>;
}

const FORMAT_MAP: Record<string, ImageFormat> = {
  jpeg: 'jpg',
  jpg: 'jpg',
  png: 'png',
  webp: 'webp',
  gif: 'gif',
};

/**
 * Image metadata from sharp
 */
export class SharpImageInspector implements ImageInspector {
  async inspect(body: Buffer): Promise<ImageInfo | null> {
    try {
      const metadata = await sharp(body).metadata();
      const format = metadata.format ? FORMAT_MAP[metadata.format] : undefined;
      if (!format || !metadata.width || !metadata.height) {
        logger.debug(`Unsupported image payload (format: ${metadata.format ?? 'unknown'})`);
        return null;
      }
      return { format, width: metadata.width, height: metadata.height };
    } catch (error: unknown) {
      logger.debug(`Image decode failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}

/**
 * Skips decoding; every body is saved as jpg
 */
export class PassThroughInspector implements ImageInspector {
  async inspect(): Promise<ImageInfo | null> {
    return { format: 'jpg', width: 0, height: 0 };
  }
}
