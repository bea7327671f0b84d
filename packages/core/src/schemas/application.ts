import { z } from 'zod';

/**
 * application.ts
 *
 * A generated bid application. Content is immutable once generated; only the
 * approval status moves, and only forward out of `pending`.
 */

// ─── Sections ─────────────────────────────────────────────────────────────────

export const APPLICATION_SECTIONS = [
  'cover_letter',
  'technical_approach',
  'past_performance',
  'team_qualifications',
  'executive_summary',
] as const;

export const ApplicationSectionNameSchema = z.enum(APPLICATION_SECTIONS);
export type ApplicationSectionName = z.infer<typeof ApplicationSectionNameSchema>;

export const SECTION_TITLES: Record<ApplicationSectionName, string> = {
  cover_letter: 'Cover Letter',
  technical_approach: 'Technical Approach',
  past_performance: 'Past Performance',
  team_qualifications: 'Team Qualifications',
  executive_summary: 'Executive Summary',
};

export const SectionStatusSchema = z.enum(['COMPLETE', 'FAILED']);
export type SectionStatus = z.infer<typeof SectionStatusSchema>;

export const ApplicationSectionSchema = z.object({
  status: SectionStatusSchema,
  content: z.string(),
  /** Profile facts the section was grounded on. Stable across regenerations of the same inputs. */
  groundingFacts: z.array(z.string()),
  failureNote: z.string().optional(),
});

export type ApplicationSection = z.infer<typeof ApplicationSectionSchema>;

// ─── Application ──────────────────────────────────────────────────────────────

export const ApprovalStatusSchema = z.enum(['pending', 'approved', 'rejected']);
export type ApprovalStatus = z.infer<typeof ApprovalStatusSchema>;

export const ApplicationSchema = z.object({
  opportunityId: z.string().min(1),
  sections: z.object({
    cover_letter: ApplicationSectionSchema,
    technical_approach: ApplicationSectionSchema,
    past_performance: ApplicationSectionSchema,
    team_qualifications: ApplicationSectionSchema,
    executive_summary: ApplicationSectionSchema,
  }),
  generatedAt: z.string().datetime(),
  approvalStatus: ApprovalStatusSchema,
  profileVersion: z.string().min(1),
  inputHash: z.string().min(1),
  approvedBy: z.string().optional(),
  approvedAt: z.string().datetime().optional(),
});

export type Application = z.infer<typeof ApplicationSchema>;

// ─── Approval ─────────────────────────────────────────────────────────────────

export const ApprovalRequestSchema = z.object({
  opportunityId: z.string().min(1),
  decision: z.enum(['approved', 'rejected']),
  actor: z.string().min(1),
});

export type ApprovalRequest = z.infer<typeof ApprovalRequestSchema>;

export class ApprovalTransitionError extends Error {
  readonly category = 'policy';

  constructor(message: string) {
    super(message);
    this.name = 'ApprovalTransitionError';
  }
}

export const failedSections = (application: Application): ApplicationSectionName[] =>
  APPLICATION_SECTIONS.filter((name) => application.sections[name].status !== 'COMPLETE');

export const isApplicationComplete = (application: Application): boolean =>
  failedSections(application).length === 0;

/**
 * Returns a new Application with the approval applied.
 * Only `pending` may move, and approval needs every section complete.
 */
export const transitionApproval = (
  application: Application,
  next: 'approved' | 'rejected',
  actor: string,
  at: string,
): Application => {
  if (application.approvalStatus !== 'pending') {
    throw new ApprovalTransitionError(
      `Application ${application.opportunityId} is already ${application.approvalStatus}`,
    );
  }
  if (next === 'approved') {
    const failed = failedSections(application);
    if (failed.length) {
      throw new ApprovalTransitionError(
        `Application ${application.opportunityId} has failed sections: ${failed.join(', ')}`,
      );
    }
  }
  return { ...application, approvalStatus: next, approvedBy: actor, approvedAt: at };
};
