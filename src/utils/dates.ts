import { isValid, parse } from 'date-fns';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const UNIT_MS = {
  second: SECOND,
  minute: MINUTE,
  hour: HOUR,
  day: DAY,
  week: 7 * DAY,
  month: 30 * DAY,
  year: 365 * DAY,
} as const;

type RelativeUnit = keyof typeof UNIT_MS;

const RELATIVE_DATE = /(\d+|an?)\s+(second|minute|hour|day|week|month|year)s?\s+ago/;

const ABSOLUTE_FORMATS = [
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMMM do yyyy',
  'MMMM do, yyyy',
  'yyyy-MM-dd',
  'dd/MM/yyyy',
  'MM/dd/yyyy',
  'd MMMM yyyy',
] as const;

function isRelativeUnit(value: string): value is RelativeUnit {
  return value in UNIT_MS;
}

function parseRelative(text: string, now: Date): Date | null {
  const match = text.match(RELATIVE_DATE);
  if (!match || !isRelativeUnit(match[2])) {
    return null;
  }

  const amount = match[1] === 'a' || match[1] === 'an' ? 1 : Number.parseInt(match[1], 10);
  return new Date(now.getTime() - amount * UNIT_MS[match[2]]);
}

function parseAbsolute(text: string, now: Date): Date | null {
  for (const format of ABSOLUTE_FORMATS) {
    const parsed = parse(text, format, now);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

/**
 * Parses the release date a site shows next to a chapter. Tries relative
 * forms ("3 days ago"), then "today"/"yesterday", then absolute formats.
 * Falls back to `now` and never throws.
 */
export function parseReleaseDate(rawText: string | null | undefined, now: Date = new Date()): Date {
  const text = (rawText ?? '').trim().replace(/\s+/g, ' ');
  if (!text) {
    return new Date(now.getTime());
  }

  const lower = text.toLowerCase();

  const relative = parseRelative(lower, now);
  if (relative) {
    return relative;
  }

  if (lower.includes('yesterday')) {
    return new Date(now.getTime() - DAY);
  }

  if (lower.includes('today') || lower.includes('just now')) {
    return new Date(now.getTime());
  }

  return parseAbsolute(text, now) ?? new Date(now.getTime());
}
