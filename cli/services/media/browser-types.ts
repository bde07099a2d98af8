import type { SessionConfig } from '../../lib/types';

/**
 * The slice of a browser page the search session drives. Implemented over
 * Playwright in production and by an in-memory page in tests.
 */
export interface SearchPage {
  goto(url: string): Promise<void>;
  /** Resolves null when nothing matches within `timeoutMs` */
  waitForSelector(selector: string, timeoutMs: number): Promise<PageElement | null>;
  querySelectorAll(selector: string): Promise<PageElement[]>;
  pressKey(key: string): Promise<void>;
  waitForNetworkIdle(): Promise<void>;
  wait(ms: number): Promise<void>;
  scrollBy(deltaY: number): Promise<void>;
}

export interface PageElement {
  click(timeoutMs: number): Promise<void>;
  fill(value: string): Promise<void>;
  getAttribute(name: string): Promise<string | null>;
}

/**
 * One browsing context, exclusively owned by a single session
 */
export interface BrowserSession {
  readonly page: SearchPage;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  open(config: SessionConfig): Promise<BrowserSession>;
}
