import type { IncompleteListingWarning, ListingSource, Opportunity, RawListing } from '@govbid/core';
import { LISTING_FIELD_MAPPINGS } from '@/constants/listing-sources';
import type { ListingScraper } from '@/types/collaborators';
import { parseListingDate } from './date';
import { SourceUnavailableError, errorMessage } from './errors';
import { withRetry, withTimeout } from './retry';

// Listings without a posting date lose every dedup comparison
const UNKNOWN_POSTED_DATE = new Date(0).toISOString();

// ─── Field access ─────────────────────────────────────────────────────────────

const firstValue = (record: Record<string, unknown>, keys: string[]): unknown => {
  for (const key of keys) {
    const value = record[key];
    if (value === undefined || value === null) continue;
    if (typeof value === 'string' && !value.trim()) continue;
    if (Array.isArray(value) && !value.length) continue;
    return value;
  }
  return undefined;
};

const asText = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
};

const asTextList = (value: unknown): string[] => {
  const items = Array.isArray(value) ? value : [value];
  return items.flatMap((item) => {
    if (typeof item === 'object' && item !== null && 'name' in item) return asTextList(item.name);
    const text = asText(item);
    return text ? [text] : [];
  });
};

const asNaicsCodes = (value: unknown): string[] =>
  Array.from(new Set(asTextList(value).flatMap((text) => text.match(/\b\d{6}\b/g) ?? [])));

// ─── Normalization ────────────────────────────────────────────────────────────

type MappedListing =
  | { ok: true; opportunity: Opportunity }
  | { ok: false; warning: IncompleteListingWarning };

export const mapListing = (listing: RawListing): MappedListing => {
  const mapping = LISTING_FIELD_MAPPINGS[listing.source];
  const { record } = listing;

  const sourceId = asText(firstValue(record, mapping.sourceId));
  const requirementText = asText(firstValue(record, mapping.requirementText));
  const dueDate = parseListingDate(firstValue(record, mapping.dueDate));

  const missingFields = [
    ...(sourceId ? [] : ['sourceId']),
    ...(requirementText ? [] : ['requirementText']),
    ...(dueDate ? [] : ['dueDate']),
  ];
  if (!sourceId || !requirementText || !dueDate) {
    return {
      ok: false,
      warning: { kind: 'IncompleteListingWarning', source: listing.source, sourceId, missingFields },
    };
  }

  return {
    ok: true,
    opportunity: {
      sourceId,
      title: asText(firstValue(record, mapping.title)) ?? requirementText.slice(0, 80),
      requirementText,
      naicsCodes: asNaicsCodes(firstValue(record, mapping.naicsCodes)),
      dueDate,
      postedDate: parseListingDate(firstValue(record, mapping.postedDate)) ?? UNKNOWN_POSTED_DATE,
      source: listing.source,
      agency: asText(firstValue(record, mapping.agency)),
      url: asText(firstValue(record, mapping.url)),
      requiredDocuments: asTextList(firstValue(record, mapping.requiredDocuments)),
    },
  };
};

export type NormalizedBatch = {
  opportunities: Opportunity[];
  warnings: IncompleteListingWarning[];
};

/**
 * Maps every raw listing to the canonical shape, drops incomplete ones with a
 * warning and keeps the most recently posted version of each source ID.
 */
export function normalizeListings(raw: readonly RawListing[]): NormalizedBatch {
  const latest = new Map<string, Opportunity>();
  const warnings: IncompleteListingWarning[] = [];

  for (const listing of raw) {
    const mapped = mapListing(listing);
    if (!mapped.ok) {
      console.warn(
        `[normalizer] IncompleteListingWarning source=${mapped.warning.source} id=${mapped.warning.sourceId ?? '?'} missing=${mapped.warning.missingFields.join(',')}`,
      );
      warnings.push(mapped.warning);
      continue;
    }

    const { opportunity } = mapped;
    const existing = latest.get(opportunity.sourceId);
    if (!existing || Date.parse(opportunity.postedDate) > Date.parse(existing.postedDate)) {
      latest.set(opportunity.sourceId, opportunity);
    }
  }

  return { opportunities: Array.from(latest.values()), warnings };
}

/**
 * Lazy view over a batch of raw listings. Normalization runs on first use;
 * every iteration starts again from the first opportunity.
 */
export class OpportunityStream implements Iterable<Opportunity> {
  private batch?: NormalizedBatch;

  constructor(private readonly raw: readonly RawListing[]) {}

  get warnings(): IncompleteListingWarning[] {
    return this.normalize().warnings;
  }

  get size(): number {
    return this.normalize().opportunities.length;
  }

  *[Symbol.iterator](): Iterator<Opportunity> {
    yield* this.normalize().opportunities;
  }

  private normalize(): NormalizedBatch {
    if (!this.batch) this.batch = normalizeListings(this.raw);
    return this.batch;
  }
}

// ─── Fetching ─────────────────────────────────────────────────────────────────

export type SourceFailure = { source: ListingSource; message: string };

export type FetchOptions = {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
};

/** Pulls from every scraper. A source that stays unavailable is reported and skipped. */
export async function fetchListings(
  scrapers: ListingScraper[],
  lookbackDays: number,
  options: FetchOptions,
): Promise<{ listings: RawListing[]; failures: SourceFailure[] }> {
  const listings: RawListing[] = [];
  const failures: SourceFailure[] = [];

  for (const scraper of scrapers) {
    try {
      const batch = await withRetry(
        () =>
          withTimeout(
            () => scraper.fetchListings(lookbackDays),
            options.timeoutMs,
            () => new SourceUnavailableError(scraper.source, `Timed out after ${options.timeoutMs}ms`),
          ),
        { maxRetries: options.maxRetries, baseDelayMs: options.baseDelayMs, sleep: options.sleep },
      );
      console.log(`[normalizer] ${scraper.source}: ${batch.length} raw listings`);
      listings.push(...batch);
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[normalizer] source ${scraper.source} unavailable: ${message}`);
      failures.push({ source: scraper.source, message });
    }
  }

  return { listings, failures };
}
