import { describe, expect, it } from 'vitest';
import { parseReleaseDate } from '../dates.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');
const DAY = 24 * 60 * 60 * 1000;

describe('parseReleaseDate', () => {
  it('subtracts relative offsets from the reference time', () => {
    expect(parseReleaseDate('3 days ago', NOW).toISOString()).toBe('2024-06-12T12:00:00.000Z');
    expect(parseReleaseDate('2 weeks ago', NOW).toISOString()).toBe('2024-06-01T12:00:00.000Z');
    expect(parseReleaseDate('An hour ago', NOW).toISOString()).toBe('2024-06-15T11:00:00.000Z');
    expect(parseReleaseDate('5 minutes ago', NOW).toISOString()).toBe('2024-06-15T11:55:00.000Z');
  });

  it('counts a month as 30 days and a year as 365 days', () => {
    expect(parseReleaseDate('1 month ago', NOW).getTime()).toBe(NOW.getTime() - 30 * DAY);
    expect(parseReleaseDate('2 years ago', NOW).getTime()).toBe(NOW.getTime() - 730 * DAY);
  });

  it('returns the reference time for "today" and one day earlier for "yesterday"', () => {
    expect(parseReleaseDate('today', NOW).getTime()).toBe(NOW.getTime());
    expect(parseReleaseDate('Yesterday', NOW).getTime()).toBe(NOW.getTime() - DAY);
  });

  it('parses absolute dates in local time', () => {
    const long = parseReleaseDate('January 5, 2024', NOW);
    expect([long.getFullYear(), long.getMonth(), long.getDate()]).toEqual([2024, 0, 5]);

    const short = parseReleaseDate('Mar 9, 2023', NOW);
    expect([short.getFullYear(), short.getMonth(), short.getDate()]).toEqual([2023, 2, 9]);

    const iso = parseReleaseDate('2024-03-01', NOW);
    expect([iso.getFullYear(), iso.getMonth(), iso.getDate()]).toEqual([2024, 2, 1]);

    const dayFirst = parseReleaseDate('25/12/2023', NOW);
    expect([dayFirst.getFullYear(), dayFirst.getMonth(), dayFirst.getDate()]).toEqual([2023, 11, 25]);
  });

  it('falls back to the reference time for unparseable or missing text', () => {
    expect(parseReleaseDate('sometime soon', NOW).getTime()).toBe(NOW.getTime());
    expect(parseReleaseDate('', NOW).getTime()).toBe(NOW.getTime());
    expect(parseReleaseDate(null, NOW).getTime()).toBe(NOW.getTime());
    expect(parseReleaseDate(undefined, NOW).getTime()).toBe(NOW.getTime());
  });

  it('returns a copy rather than the reference instance', () => {
    expect(parseReleaseDate('today', NOW)).not.toBe(NOW);
  });
});
