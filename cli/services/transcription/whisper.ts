/**
 * Speech-to-text through the `whisper` CLI (openai-whisper)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { srtToText } from '../../lib/srt';
import type { Transcriber, TranscriptResult } from '../../lib/types';
import { CLIExecutionError, CLIExecutor } from '../../utils/cli-executor';
import { logger } from '../../utils/logger';

const log = logger.child('whisper');

export class TranscriptionError extends Error {
  constructor(
    message: string,
    public readonly mediaPath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TranscriptionError';
  }
}

export interface WhisperOptions {
  language?: string;
  /** Where `<stem>.srt` is written; defaults to the media file's folder */
  outputDir?: string;
  binary?: string;
  timeoutMs?: number;
}

export function buildWhisperArgs(mediaPath: string, modelName: string, language: string, outputDir: string): string[] {
  return [
    mediaPath,
    '--model', modelName,
    '--language', language,
    '--output_format', 'srt',
    '--output_dir', outputDir,
    '--fp16', 'False',
  ];
}

export class WhisperCliTranscriber implements Transcriber {
  private readonly language: string;
  private readonly binary: string;

  constructor(private readonly options: WhisperOptions = {}) {
    this.language = options.language ?? 'en';
    this.binary = options.binary ?? 'whisper';
  }

  async transcribe(mediaPath: string, modelName: string): Promise<TranscriptResult> {
    if (!(await fs.pathExists(mediaPath))) {
      throw new TranscriptionError(`Media file not found: ${mediaPath}`, mediaPath);
    }

    const outputDir = this.options.outputDir ?? path.dirname(mediaPath);
    await fs.ensureDir(outputDir);

    log.info(`Transcribing ${path.basename(mediaPath)} (model=${modelName}, language=${this.language})`);
    try {
      await CLIExecutor.execute(this.binary, buildWhisperArgs(mediaPath, modelName, this.language, outputDir), {
        timeout: this.options.timeoutMs ?? 0,
      });
    } catch (error: unknown) {
      if (error instanceof CLIExecutionError) {
        const reason = error.notFound
          ? `${this.binary} CLI not found. Install openai-whisper`
          : `${this.binary} exited with code ${error.exitCode}: ${error.stderr.trim().split('\n').pop() ?? ''}`;
        throw new TranscriptionError(reason, mediaPath, error);
      }
      throw error;
    }

    const transcriptPath = path.join(outputDir, `${path.parse(mediaPath).name}.srt`);
    if (!(await fs.pathExists(transcriptPath))) {
      throw new TranscriptionError(`Expected transcript not written: ${transcriptPath}`, mediaPath);
    }

    const srt = await fs.readFile(transcriptPath, 'utf-8');
    return { transcriptPath, text: srtToText(srt) };
  }
}
