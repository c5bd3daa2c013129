import type { AutomationPage } from '../services/browser.js';

export interface SearchResult {
  title: string;
  url: string;
  coverRef: string;
}

export interface ChapterEntry {
  number: string;
  title: string;
  url: string;
  publishedAt: Date;
}

/** One chapter row as it appears on the page, before normalization. */
export interface RawChapterEntry {
  rawTitle: string;
  href: string;
  rawDate: string;
}

export interface ExtractionSettings {
  navigationTimeoutMs: number;
  selectorTimeoutMs: number;
  loadMoreMaxClicks: number;
  loadMoreSettleMs: number;
}

/**
 * Capability contract every source plugin implements.
 *
 * `search` and `extractChapters` resolve to an empty list on navigation or
 * extraction failures instead of rejecting. `extractChapters` returns
 * chapters ordered oldest to newest.
 */
export interface Scanlator {
  readonly id: string;
  search(title: string): Promise<SearchResult[]>;
  extractChapters(workUrl: string): Promise<ChapterEntry[]>;
  parseChapterNumber(rawText: string): string;
}

export interface ScanlatorContext {
  page: AutomationPage;
  settings: ExtractionSettings;
}

export type ScanlatorFactory = (context: ScanlatorContext) => Scanlator;

export interface ScanlatorRegistration {
  /** Implementation identifier stored on the source row. */
  id: string;
  displayName: string;
  baseUrl: string;
  create: ScanlatorFactory;
}
