/**
 * Image harvesting exports
 */

export * from './browser-types';
export * from './element-locator';
export * from './fetch-client';
export * from './fallback';
export * from './harvest-loop';
export * from './image-inspector';
export * from './session-driver';

import { HarvestSettings, sessionConfigFromSettings } from '../../lib/config';
import type { SessionConfig, StatusReporter } from '../../lib/types';
import { logger } from '../../utils/logger';
import { CompromiseConceptExtractor } from '../concepts/extractor';
import type { BrowserLauncher } from './browser-types';
import { FallbackOrchestrator } from './fallback';
import { ImageFetchClient } from './fetch-client';
import { HarvestLoop } from './harvest-loop';
import { PassThroughInspector, SharpImageInspector } from './image-inspector';
import { PlaywrightLauncher, findBrowserExecutable } from './playwright-browser';
import { SearchSessionDriver } from './session-driver';

export interface HarvestServiceOptions {
  reporter?: StatusReporter;
  /** Replaces the Playwright launcher */
  launcher?: BrowserLauncher;
}

/**
 * Wires the harvesting stack from run settings
 */
export class HarvestServiceFactory {
  private static extractorInstance: CompromiseConceptExtractor | null = null;

  static createFetchClient(settings: HarvestSettings): ImageFetchClient {
    const inspector = settings.verifyImages ? new SharpImageInspector() : new PassThroughInspector();
    return new ImageFetchClient({ inspector });
  }

  static createHarvestLoop(settings: HarvestSettings, options: HarvestServiceOptions = {}): HarvestLoop {
    const driver = new SearchSessionDriver({
      launcher: options.launcher ?? new PlaywrightLauncher(),
      fetcher: this.createFetchClient(settings),
      reporter: options.reporter,
    });
    return new HarvestLoop(new FallbackOrchestrator(driver, options.reporter));
  }

  /**
   * Browser options for a run, with an installed Chrome/Chromium when one is found
   */
  static async createSessionConfig(
    settings: HarvestSettings,
    overrides: Partial<SessionConfig> = {}
  ): Promise<SessionConfig> {
    const executablePath = overrides.executablePath ?? (await findBrowserExecutable());
    if (!executablePath) {
      logger.debug('No system Chrome/Chromium found, using the Playwright browser');
    }
    const base = sessionConfigFromSettings(settings, executablePath);
    return Object.freeze({ ...base, ...overrides, executablePath });
  }

  static getConceptExtractor(): CompromiseConceptExtractor {
    if (!this.extractorInstance) {
      this.extractorInstance = new CompromiseConceptExtractor();
    }
    return this.extractorInstance;
  }

  static clearCache(): void {
    this.extractorInstance = null;
  }
}
