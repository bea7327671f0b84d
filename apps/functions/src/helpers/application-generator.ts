import { createHash } from 'crypto';
import { z } from 'zod';
import {
  APPLICATION_SECTIONS,
  SECTION_TITLES,
  type Application,
  type ApplicationSection,
  type ApplicationSectionName,
  type CapabilityProfile,
  type CapabilityStatement,
  type MatchResult,
  type Opportunity,
  type PastPerformanceEntry,
  type RenderedDocument,
} from '@govbid/core';
import {
  MAX_GROUNDING_PAST_PERFORMANCE,
  MAX_GROUNDING_STATEMENTS,
  SECTION_MAX_TOKENS,
} from '@/constants/pipeline';
import { findCertificationMentions, inferTags } from './capability-profile';
import { SECTION_SYSTEM_PROMPT, buildSectionUserPrompt } from './application-prompts';
import { nowIso } from './date';
import { errorMessage } from './errors';
import type { LlmService } from './llm';
import type { RunStore } from './run-store';

const SectionDraftSchema = z.object({
  content: z.string().trim().min(40),
});

// ─── Grounding ────────────────────────────────────────────────────────────────

export type GroundingContext = {
  statements: CapabilityStatement[];
  pastPerformance: PastPerformanceEntry[];
  certifications: string[];
  naicsOverlap: string[];
};

const rankByOverlap = <T>(items: readonly T[], tagsOf: (item: T) => string[], wanted: Set<string>): T[] =>
  items
    .map((item, index) => ({ item, index, overlap: tagsOf(item).filter((t) => wanted.has(t)).length }))
    .filter((r) => r.overlap > 0)
    .sort((a, b) => b.overlap - a.overlap || a.index - b.index)
    .map((r) => r.item);

/**
 * The part of the profile that overlaps the opportunity. Keeps prompts small
 * and makes the facts a section cites a function of the inputs only.
 */
export function selectGroundingContext(
  opportunity: Opportunity,
  profile: CapabilityProfile,
  match: MatchResult,
): GroundingContext {
  const opportunityText = [opportunity.title, opportunity.requirementText, ...match.satisfiedRequirements].join('\n');
  const wanted = new Set(inferTags(opportunityText));

  const statements = rankByOverlap(profile.capabilityStatements, (s) => s.tags, wanted);
  const pastPerformance = rankByOverlap(
    profile.pastPerformance,
    (p) => inferTags(`${p.scopeSummary}\n${p.outcome}`),
    wanted,
  );

  const requested = new Set(findCertificationMentions(opportunityText).map((c) => c.toLowerCase()));
  const relevantCerts = profile.certifications.filter((c) => requested.has(c.toLowerCase()));

  const companyCodes = new Set(profile.naicsCodes);

  return {
    statements: (statements.length ? statements : profile.capabilityStatements.slice(0, 2)).slice(0, MAX_GROUNDING_STATEMENTS),
    pastPerformance: (pastPerformance.length ? pastPerformance : profile.pastPerformance.slice(0, 1)).slice(
      0,
      MAX_GROUNDING_PAST_PERFORMANCE,
    ),
    certifications: relevantCerts.length ? relevantCerts : profile.certifications.slice(0, 5),
    naicsOverlap: opportunity.naicsCodes.filter((code) => companyCodes.has(code)),
  };
}

export function groundingFactsFor(
  section: ApplicationSectionName,
  context: GroundingContext,
  profile: CapabilityProfile,
  match: MatchResult,
): string[] {
  const company = `Company: ${profile.name}`;
  const naics = context.naicsOverlap.length ? [`NAICS: ${context.naicsOverlap.join(', ')}`] : [];
  const meets = match.satisfiedRequirements.map((r) => `Meets: ${r}`);
  const capabilities = context.statements.map((s) => `Capability: ${s.text}`);
  const pastPerformance = context.pastPerformance.map(
    (p) => `Past performance: ${p.client}${p.scopeSummary ? ` - ${p.scopeSummary}` : ''}${p.outcome ? ` (${p.outcome})` : ''}`,
  );
  const certifications = context.certifications.map((c) => `Certification: ${c}`);

  switch (section) {
    case 'cover_letter':
      return [company, ...naics, ...meets.slice(0, 3)];
    case 'technical_approach':
      return [...meets, ...capabilities];
    case 'past_performance':
      return pastPerformance;
    case 'team_qualifications':
      return [...certifications, ...capabilities];
    case 'executive_summary':
      return [company, ...meets, ...pastPerformance.slice(0, 1), ...certifications];
  }
}

export const applicationInputHash = (opportunityId: string, profileVersion: string, match: MatchResult): string =>
  createHash('sha256')
    .update(
      JSON.stringify({
        opportunityId,
        profileVersion,
        score: match.score,
        satisfiedRequirements: match.satisfiedRequirements,
      }),
    )
    .digest('hex');

// ─── Generation ───────────────────────────────────────────────────────────────

export type GeneratorDeps = {
  llm: LlmService;
  store: Pick<RunStore, 'getApplication' | 'saveApplication'>;
  now?: () => Date;
};

export const sectionPlaceholder = (section: ApplicationSectionName): string =>
  `[Section unavailable: ${SECTION_TITLES[section]}]`;

async function generateSection(
  section: ApplicationSectionName,
  opportunity: Opportunity,
  profile: CapabilityProfile,
  match: MatchResult,
  facts: string[],
  llm: LlmService,
): Promise<ApplicationSection> {
  try {
    const draft = await llm.completeJson({
      purpose: `section:${section}`,
      system: SECTION_SYSTEM_PROMPT,
      user: buildSectionUserPrompt({
        section,
        opportunity,
        profile,
        satisfiedRequirements: match.satisfiedRequirements,
        facts,
      }),
      schema: SectionDraftSchema,
      maxTokens: SECTION_MAX_TOKENS,
    });
    return { status: 'COMPLETE', content: draft.content, groundingFacts: facts };
  } catch (err) {
    const failureNote = errorMessage(err);
    console.error(`[application-generator] ${opportunity.sourceId} ${section} failed: ${failureNote}`);
    return { status: 'FAILED', content: sectionPlaceholder(section), groundingFacts: facts, failureNote };
  }
}

/**
 * Generates every section independently and stores the Application. A stored
 * Application with the same input hash is reused section by section; only
 * failed sections are asked for again. A stored Application a reviewer has
 * already decided on is returned as it is.
 */
export async function generateApplication(
  opportunity: Opportunity,
  profile: CapabilityProfile,
  match: MatchResult,
  deps: GeneratorDeps,
): Promise<{ application: Application; reused: boolean }> {
  const inputHash = applicationInputHash(opportunity.sourceId, profile.version, match);
  const stored = await deps.store.getApplication(opportunity.sourceId);
  if (stored && stored.approvalStatus !== 'pending') {
    console.log(`[application-generator] ${opportunity.sourceId} already ${stored.approvalStatus}, not regenerating`);
    return { application: stored, reused: true };
  }
  const cached = stored?.inputHash === inputHash ? stored : null;

  const pending = APPLICATION_SECTIONS.filter((name) => cached?.sections[name].status !== 'COMPLETE');
  if (cached && !pending.length) {
    console.log(`[application-generator] ${opportunity.sourceId} reusing stored application`);
    return { application: cached, reused: true };
  }

  const context = selectGroundingContext(opportunity, profile, match);
  const generated = await Promise.all(
    pending.map(async (name) => {
      const facts = groundingFactsFor(name, context, profile, match);
      return [name, await generateSection(name, opportunity, profile, match, facts, deps.llm)] as const;
    }),
  );
  const fresh = new Map<ApplicationSectionName, ApplicationSection>(generated);

  const sectionFor = (name: ApplicationSectionName): ApplicationSection => {
    const section = fresh.get(name) ?? cached?.sections[name];
    if (!section) throw new Error(`Section ${name} was neither generated nor cached`);
    return section;
  };

  const application: Application = {
    opportunityId: opportunity.sourceId,
    sections: {
      cover_letter: sectionFor('cover_letter'),
      technical_approach: sectionFor('technical_approach'),
      past_performance: sectionFor('past_performance'),
      team_qualifications: sectionFor('team_qualifications'),
      executive_summary: sectionFor('executive_summary'),
    },
    generatedAt: deps.now ? deps.now().toISOString() : nowIso(),
    approvalStatus: 'pending',
    profileVersion: profile.version,
    inputHash,
  };

  await deps.store.saveApplication(application);
  return { application, reused: false };
}

// ─── Rendering ────────────────────────────────────────────────────────────────

const fileSafe = (s: string) => s.replace(/[^A-Za-z0-9._-]+/g, '_');

/** One plain-text document per section, in the fixed section order. */
export function renderApplicationDocuments(
  application: Application,
  company: { name: string; signatory?: string },
): RenderedDocument[] {
  return APPLICATION_SECTIONS.map((name) => {
    let content = application.sections[name].content.trim();
    if (name === 'cover_letter' && !/sincerely,/i.test(content)) {
      content += `\n\nSincerely,\n\n${company.signatory ? `${company.signatory}\n` : ''}${company.name}`;
    }
    return {
      name: `${fileSafe(application.opportunityId)}_${name}.txt`,
      content: `${SECTION_TITLES[name]}\n\n${content}\n`,
    };
  });
}
