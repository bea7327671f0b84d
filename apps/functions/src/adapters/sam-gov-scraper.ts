import https from 'https';
import type { RawListing } from '@govbid/core';
import { addDays, mmddyyyy } from '@/helpers/date';
import { SourceUnavailableError } from '@/helpers/errors';
import { httpsGetJson, recordsOf, totalRecordsOf } from '@/helpers/http';
import type { ListingScraper } from '@/types/collaborators';

const DEFAULT_PAGE_SIZE = 100;
const DEFAULT_MAX_PAGES = 10;

export type SamGovConfig = {
  baseUrl: string;
  apiKey: string;
  /** Passed as `ncode`; SAM.gov matches any of them. */
  naicsCodes: string[];
  pageSize?: number;
  maxPages?: number;
  httpsAgent?: https.Agent;
  now?: () => Date;
  /** Test seam; defaults to an https GET returning parsed JSON. */
  httpGet?: (url: URL) => Promise<unknown>;
};

export const buildSamSearchUrl = (
  cfg: Pick<SamGovConfig, 'baseUrl' | 'apiKey' | 'naicsCodes'>,
  page: { postedFrom: string; postedTo: string; limit: number; offset: number },
): URL => {
  const url = new URL('/opportunities/v2/search', cfg.baseUrl);
  url.searchParams.set('api_key', cfg.apiKey);
  url.searchParams.set('postedFrom', page.postedFrom);
  url.searchParams.set('postedTo', page.postedTo);
  for (const code of cfg.naicsCodes) url.searchParams.append('ncode', code);
  url.searchParams.set('limit', String(page.limit));
  url.searchParams.set('offset', String(page.offset));
  return url;
};

/** SAM.gov Get Opportunities API, paged over the lookback window. */
export class SamGovScraper implements ListingScraper {
  readonly source = 'SAM_GOV' as const;

  constructor(private readonly cfg: SamGovConfig) {}

  async fetchListings(lookbackDays: number): Promise<RawListing[]> {
    const now = this.cfg.now?.() ?? new Date();
    const limit = this.cfg.pageSize ?? DEFAULT_PAGE_SIZE;
    const maxPages = this.cfg.maxPages ?? DEFAULT_MAX_PAGES;
    const get = this.cfg.httpGet ?? ((url: URL) => httpsGetJson(url, 'SAM.gov', this.cfg.httpsAgent));

    const listings: RawListing[] = [];
    for (let pageNo = 0; pageNo < maxPages; pageNo++) {
      const url = buildSamSearchUrl(this.cfg, {
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

      const records = recordsOf(json, ['opportunitiesData', 'data', 'results']);
      listings.push(...records.map((record) => ({ source: this.source, record })));

      const total = totalRecordsOf(json);
      if (!records.length || (pageNo + 1) * limit >= total) break;
    }

    return listings;
  }
}
