import { SourceUnavailableError } from '@/helpers/errors';
import { SamGovScraper, buildSamSearchUrl } from './sam-gov-scraper';
import { clock } from '@/test/fakes';

const cfg = { baseUrl: 'https://api.sam.example', apiKey: 'test-secret', naicsCodes: ['541512', '541519'] };

describe('buildSamSearchUrl', () => {
  it('puts the window, NAICS filters and paging in the query', () => {
    const url = buildSamSearchUrl(cfg, { postedFrom: '02/24/2025', postedTo: '03/03/2025', limit: 100, offset: 200 });

    expect(url.origin + url.pathname).toBe('https://api.sam.example/opportunities/v2/search');
    expect(url.searchParams.get('api_key')).toBe('test-secret');
    expect(url.searchParams.get('postedFrom')).toBe('02/24/2025');
    expect(url.searchParams.get('postedTo')).toBe('03/03/2025');
    expect(url.searchParams.getAll('ncode')).toEqual(['541512', '541519']);
    expect(url.searchParams.get('limit')).toBe('100');
    expect(url.searchParams.get('offset')).toBe('200');
  });
});

describe('SamGovScraper', () => {
  it('pages through the lookback window until totalRecords is reached', async () => {
    const urls: URL[] = [];
    const pages = [
      { totalRecords: 3, opportunitiesData: [{ noticeId: 'A' }, { noticeId: 'B' }] },
      { totalRecords: 3, opportunitiesData: [{ noticeId: 'C' }] },
    ];
    const scraper = new SamGovScraper({
      ...cfg,
      pageSize: 2,
      now: clock,
      httpGet: async (url) => {
        urls.push(url);
        return pages[urls.length - 1];
      },
    });

    const listings = await scraper.fetchListings(7);

    expect(listings).toEqual([
      { source: 'SAM_GOV', record: { noticeId: 'A' } },
      { source: 'SAM_GOV', record: { noticeId: 'B' } },
      { source: 'SAM_GOV', record: { noticeId: 'C' } },
    ]);
    expect(urls.map((u) => u.searchParams.get('offset'))).toEqual(['0', '2']);
    expect(urls[0].searchParams.get('postedFrom')).toBe('02/24/2025');
    expect(urls[0].searchParams.get('postedTo')).toBe('03/03/2025');
  });

  it('stops at maxPages', async () => {
    let calls = 0;
    const scraper = new SamGovScraper({
      ...cfg,
      pageSize: 1,
      maxPages: 2,
      now: clock,
      httpGet: async () => {
        calls += 1;
        return { totalRecords: 100, opportunitiesData: [{ noticeId: `N${calls}` }] };
      },
    });

    expect(await scraper.fetchListings(7)).toHaveLength(2);
    expect(calls).toBe(2);
  });

  it('reports transport errors as SourceUnavailableError', async () => {
    const scraper = new SamGovScraper({
      ...cfg,
      now: clock,
      httpGet: async () => {
        throw new Error('SAM.gov error: 503 Service Unavailable - ');
      },
    });

    await expect(scraper.fetchListings(7)).rejects.toThrow(SourceUnavailableError);
  });
});
