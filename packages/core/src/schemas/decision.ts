import { z } from 'zod';

export const DecisionKindSchema = z.enum(['skip', 'review', 'submit']);
export type DecisionKind = z.infer<typeof DecisionKindSchema>;

export const DecisionSchema = z.object({
  opportunityId: z.string().min(1),
  kind: DecisionKindSchema,
  reasons: z.array(z.string()).min(1),
});

export type Decision = z.infer<typeof DecisionSchema>;

export const DECISION_REASONS = {
  belowThreshold: 'below threshold',
  degraded: 'degraded match, manual check required',
  quotaReached: 'daily quota reached',
  reviewMode: 'review mode enabled',
  autoSubmitDisabled: 'auto-submit disabled',
  autoSubmit: 'auto-submit criteria met',
  humanApproval: 'human approval',
  notApproved: 'application not approved',
  alreadySubmitted: 'already submitted',
  applicationIncomplete: 'application incomplete, approval blocked',
} as const;

// ─── Run-level counters ───────────────────────────────────────────────────────

export const DailyCountersSchema = z.object({
  /** yyyy-mm-dd (UTC) */
  day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  submissionsToday: z.number().int().nonnegative(),
  opportunitiesToday: z.number().int().nonnegative(),
});

export type DailyCounters = z.infer<typeof DailyCountersSchema>;
