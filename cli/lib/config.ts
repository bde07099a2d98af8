import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';
import type { ConceptFailurePolicy, SessionConfig } from './types';

/**
 * Effective settings of one run. Built once, frozen, passed down explicitly.
 */
export interface HarvestSettings {
  whisperModel: string;
  transcriptLanguage: string;
  imagesPerConcept: number;
  maxConcepts: number;
  maxTotalImages: number;
  minImagesPerSrt: number;
  maxScrollsPerKeyword: number;
  useVisibleBrowser: boolean;
  useExistingChromeProfile: boolean;
  chromeProfileDir: string;
  srtYoutubeEnabled: boolean;
  srtOtherEnabled: boolean;
  conceptFailurePolicy: ConceptFailurePolicy;
  dedupeAcrossAttempts: boolean;
  verifyImages: boolean;
}

interface SettingField<T> {
  /** Persisted key names; earlier names win when several are present */
  keys: readonly string[];
  schema: z.ZodType<T>;
  fallback: T;
}

type SettingFields = { [K in keyof HarvestSettings]: SettingField<HarvestSettings[K]> };

const positiveInt = z.coerce.number().int().min(1);
const nonNegativeInt = z.coerce.number().int().min(0);

export const SETTING_FIELDS: SettingFields = {
  whisperModel: { keys: ['whisper_model'], schema: z.string().trim().min(1), fallback: 'base' },
  transcriptLanguage: { keys: ['transcript_language'], schema: z.string().trim().min(1), fallback: 'en' },
  imagesPerConcept: { keys: ['images_per_concept', 'images_per_keyword'], schema: positiveInt, fallback: 3 },
  maxConcepts: { keys: ['max_concepts_per_srt', 'max_keywords'], schema: positiveInt, fallback: 20 },
  maxTotalImages: { keys: ['max_total_images'], schema: positiveInt, fallback: 60 },
  minImagesPerSrt: { keys: ['min_images_per_srt'], schema: nonNegativeInt, fallback: 20 },
  maxScrollsPerKeyword: { keys: ['max_scrolls_per_keyword'], schema: positiveInt, fallback: 6 },
  useVisibleBrowser: { keys: ['use_visible_browser'], schema: z.boolean(), fallback: true },
  useExistingChromeProfile: { keys: ['use_existing_chrome_profile'], schema: z.boolean(), fallback: false },
  chromeProfileDir: { keys: ['chrome_profile_dir'], schema: z.string().trim(), fallback: '' },
  srtYoutubeEnabled: { keys: ['srt_youtube_enabled'], schema: z.boolean(), fallback: false },
  srtOtherEnabled: { keys: ['srt_other_enabled'], schema: z.boolean(), fallback: false },
  conceptFailurePolicy: {
    keys: ['concept_failure_policy'],
    schema: z.enum(['abort-run', 'skip-concept']),
    fallback: 'abort-run',
  },
  dedupeAcrossAttempts: { keys: ['dedupe_across_attempts'], schema: z.boolean(), fallback: false },
  verifyImages: { keys: ['verify_images'], schema: z.boolean(), fallback: true },
};

const PERSISTED_KEYS = new Map<string, string>(
  Object.entries(SETTING_FIELDS).map(([name, field]) => [name, field.keys[0]])
);

export interface ParsedSettings {
  settings: Readonly<HarvestSettings>;
  warnings: string[];
}

/**
 * Validate each key on its own; a bad value only resets that key to its default.
 * Unknown keys are ignored.
 */
export function parseSettings(raw: Record<string, unknown>): ParsedSettings {
  const warnings: string[] = [];

  function pick<K extends keyof HarvestSettings>(name: K): HarvestSettings[K] {
    const field = SETTING_FIELDS[name];
    const key = field.keys.find((k) => Object.prototype.hasOwnProperty.call(raw, k));
    if (key === undefined) {
      return field.fallback;
    }
    const parsed = field.schema.safeParse(raw[key]);
    if (!parsed.success) {
      const issue = parsed.error.errors[0]?.message ?? 'invalid value';
      warnings.push(`${key}: ${issue}; using default ${JSON.stringify(field.fallback)}`);
      return field.fallback;
    }
    return parsed.data;
  }

  const settings: HarvestSettings = {
    whisperModel: pick('whisperModel'),
    transcriptLanguage: pick('transcriptLanguage'),
    imagesPerConcept: pick('imagesPerConcept'),
    maxConcepts: pick('maxConcepts'),
    maxTotalImages: pick('maxTotalImages'),
    minImagesPerSrt: pick('minImagesPerSrt'),
    maxScrollsPerKeyword: pick('maxScrollsPerKeyword'),
    useVisibleBrowser: pick('useVisibleBrowser'),
    useExistingChromeProfile: pick('useExistingChromeProfile'),
    chromeProfileDir: pick('chromeProfileDir'),
    srtYoutubeEnabled: pick('srtYoutubeEnabled'),
    srtOtherEnabled: pick('srtOtherEnabled'),
    conceptFailurePolicy: pick('conceptFailurePolicy'),
    dedupeAcrossAttempts: pick('dedupeAcrossAttempts'),
    verifyImages: pick('verifyImages'),
  };

  return { settings: Object.freeze(settings), warnings };
}

export function defaultSettings(): Readonly<HarvestSettings> {
  return parseSettings({}).settings;
}

/**
 * Persisted (snake_case) form, using each field's first key name
 */
export function toPersisted(settings: HarvestSettings): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(settings)) {
    const key = PERSISTED_KEYS.get(name);
    if (key !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Browser options derived from the settings. The profile directory only applies
 * when the existing-profile option is on.
 */
export function sessionConfigFromSettings(
  settings: HarvestSettings,
  executablePath: string | null = null
): SessionConfig {
  const profileDir =
    settings.useExistingChromeProfile && settings.chromeProfileDir.length > 0 ? settings.chromeProfileDir : null;
  return Object.freeze({
    visibleBrowser: settings.useVisibleBrowser,
    profileDir,
    executablePath,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Loads and saves the flat settings document
 */
export class ConfigManager {
  private static settingsCache: Map<string, Readonly<HarvestSettings>> = new Map();

  static defaultSettingsPath(): string {
    return process.env.HARVEST_SETTINGS_PATH || path.join(process.cwd(), 'config', 'settings.json');
  }

  /**
   * Load settings. A missing file, unreadable JSON or a non-object document all
   * yield the defaults; bad individual values fall back per key.
   */
  static async loadSettings(settingsPath: string = this.defaultSettingsPath()): Promise<Readonly<HarvestSettings>> {
    const cached = this.settingsCache.get(settingsPath);
    if (cached) {
      return cached;
    }

    let raw: Record<string, unknown> = {};
    try {
      const content = await fs.readFile(settingsPath, 'utf-8');
      const data: unknown = JSON.parse(content);
      if (isRecord(data)) {
        raw = data;
      } else {
        logger.warn(`Settings file ${settingsPath} is not a JSON object, using defaults`);
      }
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        logger.debug(`No settings file at ${settingsPath}, using defaults`);
      } else {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Could not read settings ${settingsPath}, using defaults: ${message}`);
      }
    }

    const { settings, warnings } = parseSettings(raw);
    for (const warning of warnings) {
      logger.warn(`Invalid setting ${warning}`);
    }

    this.settingsCache.set(settingsPath, settings);
    return settings;
  }

  /**
   * Save settings to file
   */
  static async saveSettings(
    settings: HarvestSettings,
    settingsPath: string = this.defaultSettingsPath()
  ): Promise<void> {
    try {
      await fs.mkdir(path.dirname(settingsPath), { recursive: true });

      // Write atomically with temp file
      const tempPath = `${settingsPath}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(toPersisted(settings), null, 2), 'utf-8');
      await fs.rename(tempPath, settingsPath);

      this.settingsCache.set(settingsPath, Object.freeze({ ...settings }));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to save settings ${settingsPath}: ${message}`);
    }
  }

  /**
   * Clear configuration cache
   */
  static clearCache(): void {
    this.settingsCache.clear();
  }
}
