import { describe, expect, it } from 'vitest';
import { FakePage } from '../../__tests__/helpers/fakeBrowser.js';
import { madaraScans, ravenScans } from '../template-scanlator.js';
import type { ExtractionSettings } from '../types.js';

const settings: ExtractionSettings = {
  navigationTimeoutMs: 1000,
  selectorTimeoutMs: 500,
  loadMoreMaxClicks: 5,
  loadMoreSettleMs: 25,
};

const LOAD_MORE = '.chapter-readmore, .c-chapter-readmore';

const madaraPage = `
<html><body>
  <ul class="main version-chap">
    <li class="wp-manga-chapter">
      <a href="https://madarascans.com/manga/tower/chapter-12/">Chapter 12</a>
      <span class="chapter-release-date"><i>2 days ago</i></span>
    </li>
    <li class="wp-manga-chapter">
      <a href="https://madarascans.com/manga/tower/chapter-11-5/">Chapter 11.5</a>
      <span class="chapter-release-date"><i>January 5, 2024</i></span>
    </li>
    <li class="wp-manga-chapter">
      <a href="https://madarascans.com/manga/tower/chapter-11/"> Chapter 11 </a>
    </li>
  </ul>
</body></html>`;

describe('TemplateScanlator', () => {
  it('reveals the full listing before reading it', async () => {
    const page = new FakePage(madaraPage);
    page.visibility.set(LOAD_MORE, () => page.clicks.length === 0);

    const chapters = await madaraScans()
      .create({ page, settings })
      .extractChapters('https://madarascans.com/manga/tower/');

    expect(page.clicks).toEqual([LOAD_MORE]);
    expect(chapters.map((c) => [c.number, c.title, c.url])).toEqual([
      ['11', 'Chapter 11', 'https://madarascans.com/manga/tower/chapter-11/'],
      ['11.5', 'Chapter 11.5', 'https://madarascans.com/manga/tower/chapter-11-5/'],
      ['12', 'Chapter 12', 'https://madarascans.com/manga/tower/chapter-12/'],
    ]);

    const dated = chapters[1].publishedAt;
    expect([dated.getFullYear(), dated.getMonth(), dated.getDate()]).toEqual([2024, 0, 5]);
  });

  it('returns an empty list when the page answers with an HTTP error', async () => {
    const page = new FakePage(madaraPage);
    page.status = 503;

    await expect(
      madaraScans().create({ page, settings }).extractChapters('https://madarascans.com/manga/tower/'),
    ).resolves.toEqual([]);
  });

  it('returns an empty list when the listing has no rows', async () => {
    const page = new FakePage('<div id="chapterlist"></div>');

    await expect(
      ravenScans().create({ page, settings }).extractChapters('https://ravenscans.org/manga/tower-god/'),
    ).resolves.toEqual([]);
  });

  it('builds the search URL from the template and reads results', async () => {
    const page = new FakePage(`
      <div class="listupd">
        <div class="bs"><a href="/manga/tower-god/" title="Tower God"><img src="https://ravenscans.org/covers/tg.jpg"><div class="tt"> Tower God </div></a></div>
        <div class="bs"><a href="/manga/untitled/"><div class="tt"></div></a></div>
      </div>`);

    const results = await ravenScans().create({ page, settings }).search('tower god');

    expect(page.visited).toEqual(['https://ravenscans.org/?s=tower%20god']);
    expect(results).toEqual([
      {
        title: 'Tower God',
        url: 'https://ravenscans.org/manga/tower-god/',
        coverRef: 'https://ravenscans.org/covers/tg.jpg',
      },
    ]);
  });
});
