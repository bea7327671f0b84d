import {
  SemanticAssessmentSchema,
  confidenceForScore,
  type CapabilityProfile,
  type Gap,
  type MatchResult,
  type Opportunity,
} from '@govbid/core';
import {
  LEAD_TIME_CAP,
  LEAD_TIME_GAP,
  MATCH_MAX_TOKENS,
  NAICS_MISMATCH_CAP,
  NAICS_MISMATCH_GAP,
} from '@/constants/pipeline';
import { addDays } from './date';
import { LlmError } from './errors';
import type { LlmService } from './llm';
import { MATCH_SYSTEM_PROMPT, buildMatchUserPrompt } from './matcher-prompts';
import { findCertificationMentions, inferTags } from './capability-profile';

export type MatcherOptions = {
  minLeadTimeDays: number;
  now?: () => Date;
};

// ─── Deterministic phase ──────────────────────────────────────────────────────

export type PreFilterResult = {
  /** Upper bound on the final score, null when nothing capped it. */
  cap: number | null;
  gaps: Gap[];
  naicsOverlap: string[];
};

export function preFilter(opportunity: Opportunity, profile: CapabilityProfile, options: MatcherOptions): PreFilterResult {
  const now = options.now?.() ?? new Date();
  const caps: number[] = [];
  const gaps: Gap[] = [];

  const companyCodes = new Set(profile.naicsCodes);
  const naicsOverlap = opportunity.naicsCodes.filter((code) => companyCodes.has(code));
  if (!naicsOverlap.length) {
    caps.push(NAICS_MISMATCH_CAP);
    gaps.push({ requirement: NAICS_MISMATCH_GAP, severity: 'critical' });
  }

  if (Date.parse(opportunity.dueDate) < addDays(now, options.minLeadTimeDays).getTime()) {
    caps.push(LEAD_TIME_CAP);
    gaps.push({ requirement: LEAD_TIME_GAP, severity: 'critical' });
  }

  return { cap: caps.length ? Math.min(...caps) : null, gaps, naicsOverlap };
}

/**
 * Share of the profile's capability tags and certifications that the
 * opportunity mentions. Used when semantic scoring is unavailable.
 */
export function deterministicScore(
  opportunity: Opportunity,
  profile: CapabilityProfile,
): { score: number; matchedTerms: string[]; totalTerms: number } {
  const profileTags = new Set(profile.capabilityStatements.flatMap((s) => s.tags));
  const profileCerts = new Set(profile.certifications.map((c) => c.toLowerCase()));
  const totalTerms = profileTags.size + profileCerts.size;
  if (!totalTerms) return { score: 0, matchedTerms: [], totalTerms };

  const text = `${opportunity.title}\n${opportunity.requirementText}`;
  const matchedTerms = [
    ...inferTags(text).filter((tag) => profileTags.has(tag)),
    ...findCertificationMentions(text).filter((cert) => profileCerts.has(cert.toLowerCase())),
  ];

  return { score: Math.round((matchedTerms.length / totalTerms) * 1000) / 1000, matchedTerms, totalTerms };
}

const applyCap = (score: number, cap: number | null) => (cap === null ? score : Math.min(cap, score));

// ─── Matcher ──────────────────────────────────────────────────────────────────

/**
 * Scores one opportunity against the profile. Semantic failures that survive
 * the LLM retry policy produce a degraded result instead of an error.
 */
export async function scoreOpportunity(
  opportunity: Opportunity,
  profile: CapabilityProfile,
  llm: LlmService,
  options: MatcherOptions,
): Promise<MatchResult> {
  const pre = preFilter(opportunity, profile, options);

  try {
    const semantic = await llm.completeJson({
      purpose: 'match',
      system: MATCH_SYSTEM_PROMPT,
      user: buildMatchUserPrompt(opportunity, profile),
      schema: SemanticAssessmentSchema,
      maxTokens: MATCH_MAX_TOKENS,
      temperature: 0,
    });

    const score = applyCap(semantic.score, pre.cap);
    return {
      opportunityId: opportunity.sourceId,
      score,
      satisfiedRequirements: semantic.satisfiedRequirements,
      gaps: [...pre.gaps, ...semantic.gaps],
      rationale: semantic.rationale,
      degraded: false,
      confidence: confidenceForScore(score),
      preFilterCap: pre.cap,
    };
  } catch (err) {
    if (!(err instanceof LlmError)) throw err;

    const fallback = deterministicScore(opportunity, profile);
    const score = applyCap(fallback.score, pre.cap);
    console.warn(`[matcher] ${opportunity.sourceId} degraded (${err.kind}): deterministic score ${score}`);

    return {
      opportunityId: opportunity.sourceId,
      score,
      satisfiedRequirements: fallback.matchedTerms,
      gaps: pre.gaps,
      rationale: `Semantic scoring unavailable (${err.kind}). Keyword score ${fallback.score} from ${fallback.matchedTerms.length} of ${fallback.totalTerms} profile terms.`,
      degraded: true,
      confidence: confidenceForScore(score),
      preFilterCap: pre.cap,
    };
  }
}
