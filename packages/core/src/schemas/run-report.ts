import { z } from 'zod';
import { DecisionKindSchema } from './decision';
import { MatchConfidenceSchema } from './match';
import { ListingSourceSchema } from './opportunity';
import { SubmissionStatusSchema } from './submission';

// ─── Per-opportunity outcome ──────────────────────────────────────────────────

export const OutcomeStatusSchema = z.enum([
  'skipped',
  'review',
  'submitted',
  'submission_failed',
  'expired',
  'duplicate',
  'failed',
]);

export type OutcomeStatus = z.infer<typeof OutcomeStatusSchema>;

export const OpportunityOutcomeSchema = z.object({
  opportunityId: z.string().min(1),
  title: z.string(),
  source: ListingSourceSchema,
  status: OutcomeStatusSchema,
  score: z.number().min(0).max(1).nullable(),
  confidence: MatchConfidenceSchema.nullable(),
  degraded: z.boolean(),
  decision: DecisionKindSchema.nullable(),
  reasons: z.array(z.string()),
  generated: z.boolean(),
  failedSections: z.array(z.string()),
  submissionStatus: SubmissionStatusSchema.nullable(),
  error: z.string().optional(),
});

export type OpportunityOutcome = z.infer<typeof OpportunityOutcomeSchema>;

// ─── Report ───────────────────────────────────────────────────────────────────

export const RunCountsSchema = z.object({
  discovered: z.number().int().nonnegative(),
  scored: z.number().int().nonnegative(),
  generated: z.number().int().nonnegative(),
  submitted: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  review: z.number().int().nonnegative(),
  degraded: z.number().int().nonnegative(),
  duplicates: z.number().int().nonnegative(),
  incompleteListings: z.number().int().nonnegative(),
  unavailableSources: z.number().int().nonnegative(),
  skippedDocuments: z.number().int().nonnegative(),
});

export type RunCounts = z.infer<typeof RunCountsSchema>;

export const TopOpportunitySchema = z.object({
  opportunityId: z.string(),
  title: z.string(),
  score: z.number(),
  decision: DecisionKindSchema.nullable(),
});

export type TopOpportunity = z.infer<typeof TopOpportunitySchema>;

export const RunReportSchema = z.object({
  runId: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  cancelled: z.boolean(),
  counts: RunCountsSchema,
  confidence: z.object({
    High: z.number().int().nonnegative(),
    Medium: z.number().int().nonnegative(),
    Low: z.number().int().nonnegative(),
  }),
  outcomes: z.array(OpportunityOutcomeSchema),
  topOpportunities: z.array(TopOpportunitySchema),
  sourceErrors: z.array(z.object({ source: ListingSourceSchema, message: z.string() })),
});

export type RunReport = z.infer<typeof RunReportSchema>;
