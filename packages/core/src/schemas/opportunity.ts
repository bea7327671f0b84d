import { z } from 'zod';
import { NaicsCodeSchema } from './capability-profile';

/**
 * opportunity.ts
 *
 * Listings arrive in a different shape per source. A RawListing is tagged with
 * the source it came from; the normalizer maps it to the canonical Opportunity.
 */

// ─── Source enum ──────────────────────────────────────────────────────────────

export const ListingSourceSchema = z.enum(['SAM_GOV', 'DIBBS']);
export type ListingSource = z.infer<typeof ListingSourceSchema>;

// ─── Raw listing (tagged variant) ─────────────────────────────────────────────

export const RawListingSchema = z.object({
  source: ListingSourceSchema,
  record: z.record(z.unknown()),
});

export type RawListing = z.infer<typeof RawListingSchema>;

// ─── Normalized opportunity ───────────────────────────────────────────────────

export const OpportunitySchema = z.object({
  sourceId: z.string().min(1),
  title: z.string().min(1),
  requirementText: z.string().min(1),
  naicsCodes: z.array(NaicsCodeSchema),
  dueDate: z.string().datetime({ offset: true }),
  postedDate: z.string().datetime({ offset: true }),
  source: ListingSourceSchema,
  agency: z.string().optional(),
  url: z.string().optional(),
  requiredDocuments: z.array(z.string()).default([]),
});

export type Opportunity = z.infer<typeof OpportunitySchema>;

// ─── Normalizer warnings ──────────────────────────────────────────────────────

export const IncompleteListingWarningSchema = z.object({
  kind: z.literal('IncompleteListingWarning'),
  source: ListingSourceSchema,
  sourceId: z.string().optional(),
  missingFields: z.array(z.string()).min(1),
});

export type IncompleteListingWarning = z.infer<typeof IncompleteListingWarningSchema>;
