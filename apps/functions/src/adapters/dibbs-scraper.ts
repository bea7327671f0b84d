import https from 'https';
import type { RawListing } from '@govbid/core';
import { addDays, mmddyyyy } from '@/helpers/date';
import { SourceUnavailableError } from '@/helpers/errors';
import { httpsGetJson, recordsOf, totalRecordsOf } from '@/helpers/http';
import type { ListingScraper } from '@/types/collaborators';

const DEFAULT_PAGE_SIZE = 100;
// DIBBS caps `limit` at 200.
const MAX_PAGE_SIZE = 200;
const DEFAULT_MAX_PAGES = 10;

export type DibbsConfig = {
  baseUrl: string;
  apiKey: string;
  naicsCodes: string[];
  pageSize?: number;
  maxPages?: number;
  httpsAgent?: https.Agent;
  now?: () => Date;
  httpGet?: (url: URL) => Promise<unknown>;
};

export const buildDibbsSearchUrl = (
  cfg: Pick<DibbsConfig, 'baseUrl' | 'apiKey' | 'naicsCodes'>,
  page: { postedFrom: string; postedTo: string; limit: number; offset: number },
): URL => {
  const url = new URL('/api/v1/solicitations/search', cfg.baseUrl);
  url.searchParams.set('api_key', cfg.apiKey);
  url.searchParams.set('postedFrom', page.postedFrom);
  url.searchParams.set('postedTo', page.postedTo);
  for (const code of cfg.naicsCodes) url.searchParams.append('naics', code);
  url.searchParams.set('limit', String(Math.min(page.limit, MAX_PAGE_SIZE)));
  url.searchParams.set('offset', String(page.offset));
  return url;
};

export class DibbsScraper implements ListingScraper {
  readonly source = 'DIBBS' as const;

  constructor(private readonly cfg: DibbsConfig) {}

  async fetchListings(lookbackDays: number): Promise<RawListing[]> {
    const now = this.cfg.now?.() ?? new Date();
    const limit = Math.min(this.cfg.pageSize ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
    const maxPages = this.cfg.maxPages ?? DEFAULT_MAX_PAGES;
    const get = this.cfg.httpGet ?? ((url: URL) => httpsGetJson(url, 'DIBBS', this.cfg.httpsAgent));

    const listings: RawListing[] = [];
    for (let pageNo = 0; pageNo < maxPages; pageNo++) {
      const url = buildDibbsSearchUrl(this.cfg, {
        postedFrom: mmddyyyy(addDays(now, -lookbackDays)),
        postedTo: mmddyyyy(now),
        limit,
        offset: pageNo * limit,
      });

      let json: unknown;
      try {
        json = await get(url);
      } catch (err) {
        throw new SourceUnavailableError(this.source, err instanceof Error ? err.message : String(err), { cause: err });
      }

      const records = recordsOf(json, ['data', 'solicitations', 'results']);
      listings.push(...records.map((record) => ({ source: this.source, record })));
      if (!records.length || (pageNo + 1) * limit >= totalRecordsOf(json)) break;
    }

    return listings;
  }
}
