import { z } from 'zod';

// ─── Gaps ─────────────────────────────────────────────────────────────────────

export const GapSeveritySchema = z.enum(['critical', 'moderate', 'minor']);
export type GapSeverity = z.infer<typeof GapSeveritySchema>;

export const GapSchema = z.object({
  requirement: z.string().min(1),
  severity: GapSeveritySchema,
});

export type Gap = z.infer<typeof GapSchema>;

// ─── Semantic assessment (structured LLM output) ──────────────────────────────

export const SemanticAssessmentSchema = z.object({
  score: z.number().min(0).max(1),
  satisfiedRequirements: z.array(z.string()).default([]),
  gaps: z.array(GapSchema).default([]),
  rationale: z.string().default(''),
});

export type SemanticAssessment = z.infer<typeof SemanticAssessmentSchema>;

// ─── Match result ─────────────────────────────────────────────────────────────

export const MatchConfidenceSchema = z.enum(['High', 'Medium', 'Low']);
export type MatchConfidence = z.infer<typeof MatchConfidenceSchema>;

export const MatchResultSchema = z.object({
  opportunityId: z.string().min(1),
  score: z.number().min(0).max(1),
  satisfiedRequirements: z.array(z.string()),
  gaps: z.array(GapSchema),
  rationale: z.string(),
  /** True when the semantic step failed and only the deterministic score was used. */
  degraded: z.boolean(),
  confidence: MatchConfidenceSchema,
  preFilterCap: z.number().min(0).max(1).nullable(),
});

export type MatchResult = z.infer<typeof MatchResultSchema>;

export const confidenceForScore = (score: number): MatchConfidence => {
  if (score >= 0.8) return 'High';
  if (score >= 0.6) return 'Medium';
  return 'Low';
};
