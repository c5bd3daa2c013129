import type { Logger } from 'pino';
import { logger as rootLogger } from './logger.js';

const CHAPTER_PREFIX =
  /^\s*(?:chapter|ch\.?|episode|ep\.?|cap\.?|cap[íi]tulo|episodio|chapitre)\s*[:#-]?\s*/i;

const NUMERIC_TOKEN = /(\d+(?:\.\d+)?)/;

/**
 * Extracts the chapter number from text such as "Chapter 42.5" or
 * "Cap. 7 - The Return". Returns "0" when no number is present.
 */
export function parseChapterNumber(rawText: string, log: Logger = rootLogger): string {
  const withoutPrefix = rawText.replace(CHAPTER_PREFIX, '');
  const match = withoutPrefix.match(NUMERIC_TOKEN);

  if (match) {
    return match[1];
  }

  log.warn({ rawText }, 'Could not parse chapter number');
  return '0';
}

/** Numeric value used for ordering; non-numeric chapter numbers sort as 0. */
export function chapterSortValue(chapterNumber: string): number {
  const value = Number.parseFloat(chapterNumber);
  return Number.isFinite(value) ? value : 0;
}
