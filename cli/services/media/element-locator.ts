/**
 * Ordered selector chains for the image search UI. Markup changes often, so each
 * element is found through a list of strategies; the first one that matches wins.
 */

import type { PageElement, SearchPage } from './browser-types';

export interface ElementLocator {
  readonly description: string;
  /** Empty when the strategy matches nothing */
  locate(page: SearchPage): Promise<PageElement[]>;
}

/**
 * CSS selector strategy. With `waitMs` it waits for one element up to that
 * long; without it, it takes whatever is rendered right now.
 */
export class CssLocator implements ElementLocator {
  constructor(
    private readonly selector: string,
    private readonly waitMs?: number
  ) {}

  get description(): string {
    return this.selector;
  }

  async locate(page: SearchPage): Promise<PageElement[]> {
    try {
      if (this.waitMs !== undefined) {
        const element = await page.waitForSelector(this.selector, this.waitMs);
        return element ? [element] : [];
      }
      return await page.querySelectorAll(this.selector);
    } catch {
      // a failing strategy is a non-match; the chain moves on
      return [];
    }
  }
}

export interface LocatorMatch {
  locator: ElementLocator;
  elements: PageElement[];
}

/**
 * First strategy of the chain yielding at least one element, or null
 */
export async function locateFirst(page: SearchPage, chain: readonly ElementLocator[]): Promise<LocatorMatch | null> {
  for (const locator of chain) {
    const elements = await locator.locate(page);
    if (elements.length > 0) {
      return { locator, elements };
    }
  }
  return null;
}

export const SEARCH_INPUT_SELECTORS: readonly string[] = [
  "input[name='q']:not([type='hidden'])",
  "textarea[name='q']",
  "input[aria-label*='Search']",
  "textarea[aria-label*='Search']",
  'input.gLFyf',
  'textarea.gLFyf',
];

export const THUMBNAIL_SELECTORS: readonly string[] = [
  'img.Q4LuWd',
  'img.YQ4gaf',
  'img.rg_i',
  'img[data-src]',
  "img[src*='http']",
  'div.H8Rx8c img',
  'div[data-ved] img',
];

export const DETAIL_IMAGE_SELECTORS: readonly string[] = [
  'img.n3VNCb',
  'img.sFlh5c',
  'img.iPVvYb',
  'img.r48jcc',
  'img.pT0Scc',
  'img.H8Rx8c',
  'div[data-ved] img',
];

function escapeAttributeValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function searchInputChain(waitMs: number): ElementLocator[] {
  return SEARCH_INPUT_SELECTORS.map((selector) => new CssLocator(selector, waitMs));
}

export function thumbnailChain(): ElementLocator[] {
  return THUMBNAIL_SELECTORS.map((selector) => new CssLocator(selector));
}

/**
 * Detail-pane chain; the last strategy matches images whose alt text mentions the query
 */
export function detailImageChain(query: string): ElementLocator[] {
  return [
    ...DETAIL_IMAGE_SELECTORS.map((selector) => new CssLocator(selector)),
    new CssLocator(`img[alt*='${escapeAttributeValue(query)}']`),
  ];
}
