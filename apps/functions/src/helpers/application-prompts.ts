import type { ApplicationSectionName, CapabilityProfile, Opportunity } from '@govbid/core';
import { SECTION_TITLES } from '@govbid/core';
import { bulletList, fillPrompt, truncateText } from './prompt';

const MAX_REQUIREMENT_CHARS = 10_000;

export const SECTION_SYSTEM_PROMPT = `You are an expert government proposal writer for an IT and cybersecurity contractor.

You write ONE section of a bid application. Use only the facts you are given about the company; never invent certifications, clients, contract values or staff.

STRICT OUTPUT CONTRACT:
- Output ONLY a single valid JSON object.
- Do NOT output any text before "{" or after "}".
- No markdown, no code fences.

OUTPUT SCHEMA:
{
  "content": "string - the finished section text, plain prose with paragraph breaks"
}`;

const SECTION_INSTRUCTIONS: Record<ApplicationSectionName, string> = {
  cover_letter:
    'Write a one page cover letter to the contracting officer. State the solicitation, why the company is a strong fit and the main requirements it meets. Do not add a closing signature; it is appended later.',
  technical_approach:
    'Describe how the company will perform the work, requirement by requirement, using the capability statements. Address the satisfied requirements explicitly. 400 to 700 words.',
  past_performance:
    'Present the relevant past performance entries as short narratives: client, scope, outcome and why each is relevant to this solicitation. If no entries are given, state that past performance references are available on request.',
  team_qualifications:
    'Describe the team and corporate qualifications: certifications held and the capabilities the team brings. 200 to 400 words.',
  executive_summary:
    'Summarize the offer in 150 to 250 words: understanding of the need, the approach, and the key differentiators.',
};

const SECTION_USER_PROMPT = `Write the {{SECTION_TITLE}} section.

INSTRUCTIONS:
{{INSTRUCTIONS}}

SOLICITATION:
Title: {{TITLE}}
Solicitation ID: {{SOURCE_ID}}
Agency: {{AGENCY}}
Due: {{DUE_DATE}}

REQUIREMENTS:
{{REQUIREMENTS}}

REQUIREMENTS THE COMPANY MEETS:
{{SATISFIED}}

COMPANY: {{COMPANY_NAME}}

FACTS TO DRAW ON:
{{FACTS}}

Return JSON ONLY. First char "{" last char "}".`;

export const buildSectionUserPrompt = (args: {
  section: ApplicationSectionName;
  opportunity: Opportunity;
  profile: CapabilityProfile;
  satisfiedRequirements: string[];
  facts: string[];
}): string =>
  fillPrompt(SECTION_USER_PROMPT, {
    SECTION_TITLE: SECTION_TITLES[args.section],
    INSTRUCTIONS: SECTION_INSTRUCTIONS[args.section],
    TITLE: args.opportunity.title,
    SOURCE_ID: args.opportunity.sourceId,
    AGENCY: args.opportunity.agency ?? 'N/A',
    DUE_DATE: args.opportunity.dueDate,
    REQUIREMENTS: truncateText(args.opportunity.requirementText, MAX_REQUIREMENT_CHARS),
    SATISFIED: bulletList(args.satisfiedRequirements),
    COMPANY_NAME: args.profile.name,
    FACTS: bulletList(args.facts),
  });
