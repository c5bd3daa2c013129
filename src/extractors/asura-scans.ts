import type { CheerioAPI } from 'cheerio';
import type { Logger } from 'pino';
import type { AutomationPage } from '../services/browser.js';
import { parseChapterNumber } from '../utils/chapterNumber.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  collapseWhitespace,
  loadDocument,
  normalizeChapters,
  openListing,
  resolveUrl,
  SEARCH_RESULTS,
} from './protocol.js';
import type {
  ChapterEntry,
  ExtractionSettings,
  RawChapterEntry,
  Scanlator,
  ScanlatorContext,
  ScanlatorRegistration,
  SearchResult,
} from './types.js';

const BASE_URL = 'https://asuracomic.net';
const CHAPTER_LINK = 'a[href*="/chapter"]';
const ALL_TAB = '[role="tab"]:has-text("All"), button:has-text("All")';
const SEARCH_GRID = '.grid';
const GENRE_TAGS = new Set(['MANHWA', 'MANGA', 'MANHUA', 'WEBTOON']);
const DATE_IN_TEXT =
  /(January|February|March|April|May|June|July|August|September|October|November|December)\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4}|\d+\s+(?:second|minute|hour|day|week|month|year)s?\s+ago/i;

/**
 * asuracomic.net. Series pages render every chapter as an anchor; the
 * "All" tab must be active or only recent chapters are listed.
 */
export class AsuraScans implements Scanlator {
  readonly id = 'AsuraScans';
  private readonly page: AutomationPage;
  private readonly settings: ExtractionSettings;
  private readonly log: Logger;

  constructor({ page, settings }: ScanlatorContext) {
    this.page = page;
    this.settings = settings;
    this.log = logger.child({ scanlator: this.id });
  }

  async search(title: string): Promise<SearchResult[]> {
    this.log.info({ title }, 'Searching');
    const searchUrl = `${BASE_URL}/series?name=${encodeURIComponent(title)}`;

    if (!(await openListing(this.page, searchUrl, SEARCH_GRID, this.settings, this.log, SEARCH_RESULTS))) {
      return [];
    }

    try {
      const $ = await loadDocument(this.page);
      const results = this.extractSearchResults($, this.page.url() || searchUrl);
      this.log.info({ title, count: results.length }, 'Search finished');
      return results;
    } catch (error) {
      this.log.error({ title, error: errorMessage(error) }, 'Search failed');
      return [];
    }
  }

  async extractChapters(workUrl: string): Promise<ChapterEntry[]> {
    this.log.info({ workUrl }, 'Extracting chapters');

    if (!(await openListing(this.page, workUrl, CHAPTER_LINK, this.settings, this.log))) {
      return [];
    }

    try {
      await this.showAllChapters();
      const $ = await loadDocument(this.page);
      const chapters = normalizeChapters(this.extractRawChapters($), (text) => this.parseChapterNumber(text), workUrl);
      this.log.info({ workUrl, count: chapters.length }, 'Extracted chapters');
      return chapters;
    } catch (error) {
      this.log.error({ workUrl, error: errorMessage(error) }, 'Chapter extraction failed');
      return [];
    }
  }

  parseChapterNumber(rawText: string): string {
    if (!/\d/.test(rawText) && /\bfirst\b/i.test(rawText)) {
      return '1';
    }
    return parseChapterNumber(rawText, this.log);
  }

  private async showAllChapters(): Promise<void> {
    try {
      if (await this.page.isVisible(ALL_TAB)) {
        await this.page.click(ALL_TAB, this.settings.selectorTimeoutMs);
        await this.page.wait(this.settings.loadMoreSettleMs);
      }
    } catch (error) {
      this.log.debug({ error: errorMessage(error) }, 'Could not activate the "All" tab');
    }
  }

  private extractRawChapters($: CheerioAPI): RawChapterEntry[] {
    const entries: RawChapterEntry[] = [];

    $(CHAPTER_LINK).each((_, element) => {
      const $link = $(element);
      const heading = $link.find('h3, span[class*="text"]').first();
      const rawTitle = heading.length ? heading.text() : $link.text();

      // Text nodes joined with spaces: .text() glues "Chapter 10" onto "3 days ago".
      const pieces: string[] = [];
      $link
        .find('*')
        .addBack()
        .contents()
        .each((_, node) => {
          if (node.type === 'text') {
            pieces.push($(node).text());
          }
        });
      const dateMatch = collapseWhitespace(pieces.join(' ')).match(DATE_IN_TEXT);

      entries.push({
        rawTitle,
        href: $link.attr('href') ?? '',
        rawDate: dateMatch ? dateMatch[0] : '',
      });
    });

    return entries;
  }

  private extractSearchResults($: CheerioAPI, pageUrl: string): SearchResult[] {
    const grid = $(SEARCH_GRID)
      .filter((_, element) => $(element).find('a[href*="series/"]').length > 0)
      .first();
    if (grid.length === 0) {
      throw new ExtractionError('No results grid with series links', { pageUrl });
    }

    const results: SearchResult[] = [];
    const seen = new Set<string>();

    grid.find('a[href*="series/"]').each((_, element) => {
      const $item = $(element);
      const url = resolveUrl($item.attr('href') ?? '', pageUrl);
      if (!url || seen.has(url)) return;

      let title = '';
      $item.find('h3, span').each((_, candidate) => {
        const text = collapseWhitespace($(candidate).text());
        if (!title && text.length > 2 && !GENRE_TAGS.has(text.toUpperCase())) {
          title = text;
        }
      });
      if (!title) return;

      const $img = $item.find('img').first();
      const cover = $img.attr('src') || $img.attr('data-src') || '';

      seen.add(url);
      results.push({
        title,
        url,
        coverRef: cover ? resolveUrl(cover, pageUrl) ?? '' : '',
      });
    });

    return results;
  }
}

export const asuraScans: ScanlatorRegistration = {
  id: 'AsuraScans',
  displayName: 'Asura Scans',
  baseUrl: BASE_URL,
  create: (context) => new AsuraScans(context),
};
