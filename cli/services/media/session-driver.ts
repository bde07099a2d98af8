/**
 * Search Session Driver - realizes one quota (or quota fragment) for one query
 *
 * Workflow:
 * 1. Open a browsing context and the image search entry page
 * 2. Find the search input through the selector chain, submit the query
 * 3. Per scroll cycle: click each rendered thumbnail, read the full-size URL
 *    from the detail pane, dedup, fetch and save
 * 4. Scroll and repeat until the quota is met, thumbnails run out or the
 *    scroll budget is spent
 * 5. Close the context whatever happened
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import {
  CandidateOutcome,
  FAILURE_POLICY,
  FailureAction,
  FailureKind,
  HarvestError,
  NavigationError,
  SearchInputNotFoundError,
  SessionInterruptedError,
  SkipReason,
  toError,
} from '../../lib/harvest-types';
import { imageBaseName } from '../../lib/naming';
import type { NamingContext, SessionConfig, StatusReporter } from '../../lib/types';
import { logger } from '../../utils/logger';
import type { BrowserLauncher, PageElement, SearchPage } from './browser-types';
import {
  SEARCH_INPUT_SELECTORS,
  detailImageChain,
  locateFirst,
  searchInputChain,
  thumbnailChain,
} from './element-locator';
import type { ImageFetcher } from './fetch-client';

const log = logger.child('session');

export const SEARCH_ENTRY_URL = 'https://www.google.com/imghp?hl=en';

/** Thumbnails served from here are low-res previews */
export const STATIC_ASSET_HOST = 'gstatic.com';

export interface SessionTimings {
  searchInputWaitMs: number;
  postSearchSettleMs: number;
  clickTimeoutMs: number;
  detailSettleMs: number;
  scrollDeltaPx: number;
  scrollSettleMs: number;
}

export const DEFAULT_TIMINGS: Readonly<SessionTimings> = Object.freeze({
  searchInputWaitMs: 5000,
  postSearchSettleMs: 2000,
  clickTimeoutMs: 1500,
  detailSettleMs: 350,
  scrollDeltaPx: 1200,
  scrollSettleMs: 700,
});

export interface SessionRequest {
  query: string;
  targetDir: string;
  imagesNeeded: number;
  maxScrolls: number;
  session: SessionConfig;
  naming: NamingContext;
  /** URLs treated as already seen when the session starts */
  seedUrls?: ReadonlySet<string>;
}

export interface SessionResult {
  query: string;
  savedCount: number;
  files: string[];
  /** Every URL accepted for download in this session, seeds included */
  seenUrls: Set<string>;
  scrolls: number;
  /** True when a cycle found no thumbnails at all */
  exhausted: boolean;
  outcomes: CandidateOutcome[];
}

/**
 * Anything that can run one search attempt
 */
export interface SessionRunner {
  run(request: SessionRequest): Promise<SessionResult>;
}

export interface SessionDriverDeps {
  launcher: BrowserLauncher;
  fetcher: ImageFetcher;
  reporter?: StatusReporter;
  timings?: Partial<SessionTimings>;
  /** Overrides merged over FAILURE_POLICY */
  policy?: Partial<Record<FailureKind, FailureAction>>;
}

type UrlPick = { url: string } | { reason: Extract<SkipReason, 'no-url' | 'not-http'> };

function isStaticAssetUrl(url: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === STATIC_ASSET_HOST || host.endsWith(`.${STATIC_ASSET_HOST}`);
  } catch {
    return false;
  }
}

/**
 * Choose the full-size URL among detail-pane `src` values: the first http URL
 * off the static-asset host, else the first http URL at all.
 */
export function pickCandidateUrl(sources: ReadonlyArray<string | null>): UrlPick {
  const present = sources.filter((src): src is string => typeof src === 'string' && src.length > 0);
  if (present.length === 0) {
    return { reason: 'no-url' };
  }
  const http = present.filter((src) => src.startsWith('http'));
  const preferred = http.find((src) => !isStaticAssetUrl(src)) ?? http[0];
  return preferred ? { url: preferred } : { reason: 'not-http' };
}

async function readSources(elements: PageElement[]): Promise<Array<string | null>> {
  const sources: Array<string | null> = [];
  for (const element of elements) {
    try {
      sources.push(await element.getAttribute('src'));
    } catch {
      // detached element; the others may still be readable
      sources.push(null);
    }
  }
  return sources;
}

export class SearchSessionDriver implements SessionRunner {
  private readonly launcher: BrowserLauncher;
  private readonly fetcher: ImageFetcher;
  private readonly report: StatusReporter;
  private readonly timings: SessionTimings;
  private readonly policy: Readonly<Record<FailureKind, FailureAction>>;

  constructor(deps: SessionDriverDeps) {
    this.launcher = deps.launcher;
    this.fetcher = deps.fetcher;
    this.report = deps.reporter ?? (() => undefined);
    this.timings = { ...DEFAULT_TIMINGS, ...deps.timings };
    this.policy = { ...FAILURE_POLICY, ...deps.policy };
  }

  /**
   * Run one attempt. Throws SearchInputNotFoundError / NavigationError when the
   * search cannot be issued and the policy aborts on it. Anything thrown once
   * harvesting started surfaces as SessionInterruptedError with the partial
   * counts. The browser context is closed in every case.
   */
  async run(request: SessionRequest): Promise<SessionResult> {
    const result: SessionResult = {
      query: request.query,
      savedCount: 0,
      files: [],
      seenUrls: new Set(request.seedUrls ?? []),
      scrolls: 0,
      exhausted: false,
      outcomes: [],
    };

    await fs.ensureDir(request.targetDir);

    if (request.imagesNeeded <= 0) {
      return result;
    }

    const browser = await this.launcher.open(request.session);
    try {
      if (await this.submitQuery(browser.page, request.query)) {
        this.report(`Searching images for: ${request.query}`);
        try {
          await this.harvest(browser.page, request, result);
        } catch (error: unknown) {
          throw new SessionInterruptedError(request.query, result.savedCount, [...result.files], toError(error));
        }
      }
    } finally {
      try {
        await browser.close();
      } catch (error: unknown) {
        log.warn(`Failed to close browser context for '${request.query}'`, toError(error));
      }
    }

    log.debug(`Session '${request.query}' saved ${result.savedCount}/${request.imagesNeeded}`, {
      scrolls: result.scrolls,
      seen: result.seenUrls.size,
      exhausted: result.exhausted,
    });

    return result;
  }

  /**
   * Apply the policy for `kind`. Throws `failure` on abort-attempt and returns
   * the action otherwise.
   */
  private decide(kind: FailureKind, failure: () => Error): Exclude<FailureAction, 'abort-attempt'> {
    const action = this.policy[kind];
    if (action === 'abort-attempt') {
      throw failure();
    }
    return action;
  }

  /**
   * Returns false when the query could not be issued and the policy ends the
   * attempt instead of aborting it.
   */
  private async submitQuery(page: SearchPage, query: string): Promise<boolean> {
    try {
      await page.goto(SEARCH_ENTRY_URL);
    } catch (error: unknown) {
      const failure = new NavigationError(query, SEARCH_ENTRY_URL, toError(error));
      this.decide('navigation-failed', () => failure);
      this.report(failure.message);
      return false;
    }

    const input = await locateFirst(page, searchInputChain(this.timings.searchInputWaitMs));
    if (!input) {
      const failure = new SearchInputNotFoundError(query, [...SEARCH_INPUT_SELECTORS]);
      this.decide('search-input-missing', () => failure);
      this.report(failure.message);
      return false;
    }
    log.debug(`Search input matched ${input.locator.description}`);

    await input.elements[0].fill(query);
    await page.pressKey('Enter');
    try {
      await page.waitForNetworkIdle();
    } catch (error: unknown) {
      // long-polling pages never go idle; the settle delay below still applies
      log.debug(`Network idle wait ended early for '${query}': ${toError(error).message}`);
    }
    await page.wait(this.timings.postSearchSettleMs);
    return true;
  }

  private async harvest(page: SearchPage, request: SessionRequest, result: SessionResult): Promise<void> {
    const { query, imagesNeeded, maxScrolls } = request;

    for (let scrollIndex = 0; scrollIndex < maxScrolls; scrollIndex++) {
      const thumbs = await locateFirst(page, thumbnailChain());
      if (!thumbs) {
        const message = `No thumbnails found with any selector for '${query}'`;
        this.report(message);
        if (this.decide('no-thumbnails', () => new HarvestError(message, 'no-thumbnails', query)) === 'end-attempt') {
          result.exhausted = true;
          break;
        }
      } else {
        let ended = false;
        for (const thumb of thumbs.elements) {
          if (result.savedCount >= imagesNeeded) break;

          const outcome = await this.processThumbnail(page, thumb, request, result);
          result.outcomes.push(outcome);
          if (outcome.kind === 'saved') {
            result.savedCount++;
            result.files.push(outcome.filePath);
            continue;
          }

          log.debug(`Skipped candidate for '${query}': ${outcome.reason}`, outcome.url);
          const { reason } = outcome;
          const action = this.decide(
            reason,
            () => new HarvestError(`Candidate rejected (${reason}) for '${query}'`, reason, query)
          );
          if (action === 'end-attempt') {
            ended = true;
            break;
          }
        }
        if (ended) break;
      }

      if (result.savedCount >= imagesNeeded) break;

      this.report(`Scrolling… (${scrollIndex + 1}/${maxScrolls}) for '${query}'`);
      await page.scrollBy(this.timings.scrollDeltaPx);
      await page.wait(this.timings.scrollSettleMs);
      result.scrolls++;
    }
  }

  private async processThumbnail(
    page: SearchPage,
    thumb: PageElement,
    request: SessionRequest,
    result: SessionResult
  ): Promise<CandidateOutcome> {
    try {
      await thumb.click(this.timings.clickTimeoutMs);
    } catch (error: unknown) {
      return { kind: 'skipped', reason: 'click-failed', detail: toError(error).message };
    }

    await page.wait(this.timings.detailSettleMs);

    const detail = await locateFirst(page, detailImageChain(request.query));
    const pick = pickCandidateUrl(detail ? await readSources(detail.elements) : []);
    if ('reason' in pick) {
      return { kind: 'skipped', reason: pick.reason };
    }

    const url = pick.url;
    if (result.seenUrls.has(url)) {
      return { kind: 'skipped', reason: 'duplicate', url };
    }
    result.seenUrls.add(url);

    this.report(`Downloading ${result.savedCount + 1}/${request.imagesNeeded} for '${request.query}'`);
    const destinationBase = path.join(request.targetDir, imageBaseName(request.naming, result.savedCount));
    const fetched = await this.fetcher.fetchToFile(url, destinationBase);
    if (!fetched.ok) {
      return { kind: 'skipped', reason: fetched.reason, url, detail: fetched.message };
    }
    return { kind: 'saved', url, filePath: fetched.filePath, bytes: fetched.bytes };
  }
}
