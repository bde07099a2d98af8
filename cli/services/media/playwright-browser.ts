/**
 * Playwright-backed browser sessions. A persistent context is used so searches
 * look like normal browsing; it can reuse the operator's own Chrome profile.
 */

import * as path from 'path';
import { chromium, errors } from 'playwright-core';
import type { BrowserContext, Page } from 'playwright-core';
import type { SessionConfig } from '../../lib/types';
import { CLIExecutor } from '../../utils/cli-executor';
import { logger } from '../../utils/logger';
import type { BrowserLauncher, BrowserSession, PageElement, SearchPage } from './browser-types';

const log = logger.child('browser');

const BROWSER_CANDIDATES = ['google-chrome', 'google-chrome-stable', 'chromium', 'chromium-browser'];

export const DEFAULT_PROFILE_DIR = path.join(process.cwd(), '.playwright_profile');

/**
 * Structural view of a Playwright element handle
 */
interface HandleLike {
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string): Promise<void>;
  getAttribute(name: string): Promise<string | null>;
}

class PlaywrightElement implements PageElement {
  constructor(private readonly handle: HandleLike) {}

  click(timeoutMs: number): Promise<void> {
    return this.handle.click({ timeout: timeoutMs });
  }

  fill(value: string): Promise<void> {
    return this.handle.fill(value);
  }

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }
}

class PlaywrightSearchPage implements SearchPage {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<PageElement | null> {
    try {
      const handle = await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return handle ? new PlaywrightElement(handle) : null;
    } catch (error: unknown) {
      if (error instanceof errors.TimeoutError) {
        return null;
      }
      throw error;
    }
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  pressKey(key: string): Promise<void> {
    return this.page.keyboard.press(key);
  }

  waitForNetworkIdle(): Promise<void> {
    return this.page.waitForLoadState('networkidle');
  }

  wait(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  scrollBy(deltaY: number): Promise<void> {
    return this.page.mouse.wheel(0, deltaY);
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly context: BrowserContext,
    readonly page: SearchPage
  ) {}

  async close(): Promise<void> {
    await this.context.close();
  }
}

/**
 * Path of an installed Chrome/Chromium, or null
 */
export async function findBrowserExecutable(): Promise<string | null> {
  for (const candidate of BROWSER_CANDIDATES) {
    try {
      const result = await CLIExecutor.execute('which', [candidate], { timeout: 5000 });
      if (result.stdout) {
        return result.stdout.split('\n')[0];
      }
    } catch {
      continue;
    }
  }
  return null;
}

export class PlaywrightLauncher implements BrowserLauncher {
  async open(config: SessionConfig): Promise<BrowserSession> {
    const userDataDir = config.profileDir ?? DEFAULT_PROFILE_DIR;
    const executablePath = config.executablePath ?? (await findBrowserExecutable()) ?? undefined;

    log.debug('Launching browser context', {
      userDataDir,
      headless: !config.visibleBrowser,
      executablePath: executablePath ?? 'bundled',
    });

    const context = await chromium.launchPersistentContext(userDataDir, {
      headless: !config.visibleBrowser,
      executablePath,
      args: config.visibleBrowser ? ['--start-maximized'] : ['--disable-gpu'],
      viewport: null,
    });

    try {
      const page = await context.newPage();
      return new PlaywrightSession(context, new PlaywrightSearchPage(page));
    } catch (error: unknown) {
      await context.close();
      throw error;
    }
  }
}
