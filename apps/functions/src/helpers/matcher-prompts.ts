import type { CapabilityProfile, Opportunity } from '@govbid/core';
import { bulletList, fillPrompt, truncateText } from './prompt';

const MAX_REQUIREMENT_CHARS = 12_000;

export const MATCH_SYSTEM_PROMPT = `You are a government contracts capture analyst. You compare a company's capabilities with the requirements of one federal IT or cybersecurity solicitation.

STRICT OUTPUT CONTRACT:
- Output ONLY a single valid JSON object.
- Do NOT output any text before "{" or after "}".
- No prose, no markdown, no code fences.

OUTPUT SCHEMA:
{
  "score": number between 0 and 1 - how well the company can perform the work,
  "satisfiedRequirements": ["string"] - requirements the company demonstrably meets,
  "gaps": [{ "requirement": "string", "severity": "critical" | "moderate" | "minor" }],
  "rationale": "string - two to four sentences explaining the score"
}

SCORING GUIDELINES:
- 0.8 and above: core scope matches demonstrated capabilities and past performance
- 0.6 to 0.8: most scope matches, gaps are moderate or minor
- below 0.6: critical requirements are not covered
- Only count a requirement as satisfied when the capabilities, certifications or past performance show it
- A missing mandatory certification or clearance is a critical gap`;

const MATCH_USER_PROMPT = `Assess the fit between the company and the solicitation.

SOLICITATION:
Title: {{TITLE}}
Agency: {{AGENCY}}
NAICS: {{OPPORTUNITY_NAICS}}
Due: {{DUE_DATE}}

REQUIREMENTS:
{{REQUIREMENTS}}

COMPANY: {{COMPANY_NAME}}
NAICS: {{COMPANY_NAICS}}

CAPABILITY STATEMENTS:
{{CAPABILITIES}}

CERTIFICATIONS:
{{CERTIFICATIONS}}

PAST PERFORMANCE:
{{PAST_PERFORMANCE}}

Return JSON ONLY. First char "{" last char "}".`;

export const buildMatchUserPrompt = (opportunity: Opportunity, profile: CapabilityProfile): string =>
  fillPrompt(MATCH_USER_PROMPT, {
    TITLE: opportunity.title,
    AGENCY: opportunity.agency ?? 'N/A',
    OPPORTUNITY_NAICS: opportunity.naicsCodes.join(', ') || 'N/A',
    DUE_DATE: opportunity.dueDate,
    REQUIREMENTS: truncateText(opportunity.requirementText, MAX_REQUIREMENT_CHARS),
    COMPANY_NAME: profile.name,
    COMPANY_NAICS: profile.naicsCodes.join(', '),
    CAPABILITIES: bulletList(
      profile.capabilityStatements.map((s) => (s.tags.length ? `${s.text} [${s.tags.join(', ')}]` : s.text)),
    ),
    CERTIFICATIONS: bulletList(profile.certifications),
    PAST_PERFORMANCE: bulletList(
      profile.pastPerformance.map((p) => [p.client, p.scopeSummary, p.outcome].filter(Boolean).join(' | ')),
    ),
  });
