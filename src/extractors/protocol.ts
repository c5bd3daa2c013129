import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import type { AutomationPage } from '../services/browser.js';
import { chapterSortValue } from '../utils/chapterNumber.js';
import { parseReleaseDate } from '../utils/dates.js';
import { NavigationError, errorMessage } from '../utils/errors.js';
import type { ChapterEntry, ExtractionSettings, RawChapterEntry } from './types.js';

export interface ListingKind {
  label: string;
  /** Level used when the listing never appears. */
  missingLevel: 'error' | 'info';
}

export const CHAPTER_LISTING: ListingKind = { label: 'Chapter listing', missingLevel: 'error' };

// A search with no hits renders no result items.
export const SEARCH_RESULTS: ListingKind = { label: 'Search results', missingLevel: 'info' };

/**
 * Navigates to a page and waits for its listing.
 * Resolves false (after logging) on timeouts, HTTP errors or a missing
 * listing container; never rejects.
 */
export async function openListing(
  page: AutomationPage,
  url: string,
  listingSelector: string,
  settings: ExtractionSettings,
  log: Logger,
  kind: ListingKind = CHAPTER_LISTING,
): Promise<boolean> {
  try {
    log.debug({ url }, 'Navigating');
    const { status } = await page.goto(url, settings.navigationTimeoutMs);

    if (status === null) {
      throw new NavigationError(`No response received for ${url}`, { url });
    }
    if (status >= 400) {
      throw new NavigationError(`HTTP ${status} for ${url}`, { url, status });
    }
  } catch (error) {
    log.error({ url, error: errorMessage(error) }, 'Navigation failed');
    return false;
  }

  try {
    await page.waitForSelector(listingSelector, settings.selectorTimeoutMs);
    return true;
  } catch (error) {
    log[kind.missingLevel](
      { url, selector: listingSelector, error: errorMessage(error) },
      `${kind.label} did not appear`,
    );
    return false;
  }
}

/**
 * Clicks a "load more" control until it disappears or `loadMoreMaxClicks`
 * is reached. Returns the number of clicks performed.
 */
export async function revealAllChapters(
  page: AutomationPage,
  loadMoreSelector: string,
  settings: ExtractionSettings,
  log: Logger,
): Promise<number> {
  let clicks = 0;

  while (clicks < settings.loadMoreMaxClicks) {
    let visible: boolean;
    try {
      visible = await page.isVisible(loadMoreSelector);
    } catch (error) {
      log.debug({ error: errorMessage(error) }, 'Load-more visibility check failed');
      return clicks;
    }

    if (!visible) {
      log.debug({ clicks }, 'All chapters revealed');
      return clicks;
    }

    try {
      await page.click(loadMoreSelector, settings.selectorTimeoutMs);
    } catch (error) {
      log.debug({ clicks, error: errorMessage(error) }, 'Load-more click failed, stopping reveal');
      return clicks;
    }

    clicks++;
    await page.wait(settings.loadMoreSettleMs);
  }

  log.warn(
    { clicks, maxClicks: settings.loadMoreMaxClicks },
    'Reached load-more click limit, chapter list may be incomplete',
  );
  return clicks;
}

/** The single batched DOM read for a page. */
export async function loadDocument(page: AutomationPage): Promise<cheerio.CheerioAPI> {
  const html = await page.content();
  return cheerio.load(html);
}

export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function sortChapters(chapters: ChapterEntry[]): ChapterEntry[] {
  return [...chapters].sort((a, b) => {
    const byNumber = chapterSortValue(a.number) - chapterSortValue(b.number);
    if (byNumber !== 0) {
      return byNumber;
    }
    return a.publishedAt.getTime() - b.publishedAt.getTime();
  });
}

// Rows sharing a URL: a parsed number beats "0", a title with digits beats one without.
function rowRank(entry: ChapterEntry): number {
  if (entry.number === '0') {
    return 0;
  }
  return /\d/.test(entry.title) ? 2 : 1;
}

/**
 * Turns raw rows into chapter entries: resolves URLs, parses numbers and
 * dates, drops rows without a link or text, keeps the best-ranked row per
 * URL, then sorts oldest to newest.
 */
export function normalizeChapters(
  rawEntries: RawChapterEntry[],
  parseNumber: (rawText: string) => string,
  baseUrl: string,
  now: Date = new Date(),
): ChapterEntry[] {
  const byUrl = new Map<string, ChapterEntry>();

  for (const raw of rawEntries) {
    const title = collapseWhitespace(raw.rawTitle);
    const url = raw.href ? resolveUrl(raw.href.trim(), baseUrl) : null;

    if (!title || !url) {
      continue;
    }

    const entry: ChapterEntry = {
      number: parseNumber(title),
      title,
      url,
      publishedAt: parseReleaseDate(raw.rawDate, now),
    };

    const existing = byUrl.get(url);
    if (!existing || rowRank(entry) > rowRank(existing)) {
      byUrl.set(url, entry);
    }
  }

  return sortChapters([...byUrl.values()]);
}
