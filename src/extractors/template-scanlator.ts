import type { CheerioAPI } from 'cheerio';
import type { Logger } from 'pino';
import { loadTemplate, type TemplateConfig } from '../config/templates.js';
import type { AutomationPage } from '../services/browser.js';
import { parseChapterNumber } from '../utils/chapterNumber.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  collapseWhitespace,
  loadDocument,
  normalizeChapters,
  openListing,
  resolveUrl,
  revealAllChapters,
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

/**
 * Plugin driven by a selector template from templates/. Suits sites built
 * on common WordPress manga themes, where only selectors differ.
 */
export class TemplateScanlator implements Scanlator {
  private readonly page: AutomationPage;
  private readonly settings: ExtractionSettings;
  private readonly log: Logger;

  constructor(
    readonly id: string,
    private readonly template: TemplateConfig,
    { page, settings }: ScanlatorContext,
  ) {
    this.page = page;
    this.settings = settings;
    this.log = logger.child({ scanlator: id });
  }

  async search(title: string): Promise<SearchResult[]> {
    const { search, baseUrl } = this.template;
    const searchUrl = new URL(search.path.replace('{query}', encodeURIComponent(title)), baseUrl).toString();
    this.log.info({ title, searchUrl }, 'Searching');

    if (!(await openListing(this.page, searchUrl, search.item, this.settings, this.log, SEARCH_RESULTS))) {
      return [];
    }

    try {
      const $ = await loadDocument(this.page);
      const results = this.extractSearchResults($, searchUrl);
      this.log.info({ title, count: results.length }, 'Search finished');
      return results;
    } catch (error) {
      this.log.error({ title, error: errorMessage(error) }, 'Search failed');
      return [];
    }
  }

  async extractChapters(workUrl: string): Promise<ChapterEntry[]> {
    const { chapters } = this.template;
    this.log.info({ workUrl }, 'Extracting chapters');

    if (!(await openListing(this.page, workUrl, chapters.container, this.settings, this.log))) {
      return [];
    }

    try {
      if (chapters.loadMore) {
        const clicks = await revealAllChapters(this.page, chapters.loadMore, this.settings, this.log);
        this.log.debug({ clicks }, 'Load-more clicks');
      }

      const $ = await loadDocument(this.page);
      const raw = this.extractRawChapters($);
      if (raw.length === 0) {
        this.log.warn({ workUrl, selector: chapters.item }, 'Chapter listing is empty');
      }

      const result = normalizeChapters(raw, (text) => this.parseChapterNumber(text), workUrl);
      this.log.info({ workUrl, count: result.length }, 'Extracted chapters');
      return result;
    } catch (error) {
      this.log.error({ workUrl, error: errorMessage(error) }, 'Chapter extraction failed');
      return [];
    }
  }

  parseChapterNumber(rawText: string): string {
    return parseChapterNumber(rawText, this.log);
  }

  private extractRawChapters($: CheerioAPI): RawChapterEntry[] {
    const { chapters } = this.template;
    const entries: RawChapterEntry[] = [];

    $(chapters.container).find(chapters.item).each((_, element) => {
      const $item = $(element);
      const $link = $item.find(chapters.link).first();
      const $title = chapters.title ? $item.find(chapters.title).first() : $link;
      const rawTitle = $title.length ? $title.text() : $link.text();

      entries.push({
        rawTitle,
        href: $link.attr('href') ?? '',
        rawDate: chapters.date ? $item.find(chapters.date).first().text() : '',
      });
    });

    return entries;
  }

  private extractSearchResults($: CheerioAPI, pageUrl: string): SearchResult[] {
    const { search } = this.template;
    const results: SearchResult[] = [];

    $(search.item).each((_, element) => {
      const $item = $(element);
      const $link = $item.find(search.link).first();
      const url = resolveUrl($link.attr('href') ?? '', pageUrl);
      const $title = search.title ? $item.find(search.title).first() : $link;
      const title = collapseWhitespace($title.text()) || collapseWhitespace($link.attr('title') ?? '');

      if (!url || !title) return;

      const $img = search.cover ? $item.find(search.cover).first() : $item.find('img').first();
      const cover = $img.attr('data-src') || $img.attr('src') || '';

      results.push({
        title,
        url,
        coverRef: cover ? resolveUrl(cover, pageUrl) ?? '' : '',
      });
    });

    return results;
  }
}

function templateRegistration(id: string, displayName: string, templateName: string): ScanlatorRegistration {
  const template = loadTemplate(templateName);
  return {
    id,
    displayName,
    baseUrl: template.baseUrl,
    create: (context) => new TemplateScanlator(id, template, context),
  };
}

export function madaraScans(): ScanlatorRegistration {
  return templateRegistration('MadaraScans', 'Madara Scans', 'madara-scans');
}

export function ravenScans(): ScanlatorRegistration {
  return templateRegistration('RavenScans', 'Raven Scans', 'raven-scans');
}
