import type { Application, Decision, Opportunity, SubmissionRecord } from '@govbid/core';
import type { PortalSubmissionAdapter } from '@/types/collaborators';
import { renderApplicationDocuments } from './application-generator';
import { DuplicateSubmissionError, PolicyViolationError, SubmissionError, errorMessage } from './errors';
import { withRetry, withTimeout } from './retry';
import type { RunStore } from './run-store';

export type SubmissionDeps = {
  portal: PortalSubmissionAdapter;
  store: Pick<RunStore, 'appendSubmission' | 'claimSubmission' | 'releaseSubmissionClaim'>;
  company: { name: string; signatory?: string };
  maxRetries: number;
  baseDelayMs: number;
  timeoutMs: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Drives the portal adapter for one approved application and appends the
 * outcome. Portal failures end in a `failed` record, never a thrown error.
 * Throws PolicyViolationError when called without approval or a submit decision,
 * and DuplicateSubmissionError when the opportunity's submission claim is taken.
 * A failed attempt gives the claim back so the application can be sent again.
 */
export async function submitApplication(
  application: Application,
  decision: Decision,
  opportunity: Opportunity,
  deps: SubmissionDeps,
): Promise<SubmissionRecord> {
  if (decision.kind !== 'submit' || decision.opportunityId !== application.opportunityId) {
    throw new PolicyViolationError(`No submit decision for ${application.opportunityId} (got ${decision.kind})`);
  }
  if (application.approvalStatus !== 'approved') {
    throw new PolicyViolationError(`Application ${application.opportunityId} is ${application.approvalStatus}, not approved`);
  }

  const clock = deps.now ?? (() => new Date());
  const record = (fields: Omit<SubmissionRecord, 'opportunityId' | 'submittedAt'>): SubmissionRecord => ({
    opportunityId: application.opportunityId,
    submittedAt: clock().toISOString(),
    ...fields,
  });

  let result: SubmissionRecord;

  // Due dates can pass between discovery and submission
  if (Date.parse(opportunity.dueDate) <= clock().getTime()) {
    console.warn(`[submission] ${application.opportunityId} due ${opportunity.dueDate} has passed, not submitting`);
    result = record({ status: 'expired', portalStatus: null, confirmationId: null, retryCount: 0 });
  } else {
    if (!(await deps.store.claimSubmission(application.opportunityId, application.approvedBy ?? 'unknown'))) {
      throw new DuplicateSubmissionError(`Application ${application.opportunityId} has already been submitted`);
    }

    const documents = renderApplicationDocuments(application, deps.company);
    let retryCount = 0;
    try {
      const receipt = await withRetry(
        () =>
          withTimeout(
            () => deps.portal.submit({ portalId: opportunity.source, opportunity, documents }),
            deps.timeoutMs,
            () => new SubmissionError(`Portal call timed out after ${deps.timeoutMs}ms`),
          ),
        {
          maxRetries: deps.maxRetries,
          baseDelayMs: deps.baseDelayMs,
          sleep: deps.sleep,
          onRetry: (err, attempt, delayMs) => {
            retryCount = attempt;
            console.warn(`[submission] ${application.opportunityId} attempt ${attempt} failed: ${errorMessage(err)}; retrying in ${delayMs}ms`);
          },
        },
      );
      console.log(`[submission] ${application.opportunityId} submitted, confirmation ${receipt.confirmationId}`);
      result = record({
        status: 'submitted',
        portalStatus: receipt.status,
        confirmationId: receipt.confirmationId,
        retryCount,
      });
    } catch (err) {
      console.error(`[submission] ${application.opportunityId} failed after ${retryCount} retries: ${errorMessage(err)}`);
      result = record({
        status: 'failed',
        portalStatus: err instanceof SubmissionError ? err.portalStatus ?? null : null,
        confirmationId: null,
        retryCount,
        error: errorMessage(err),
      });
    }
  }

  if (result.status === 'failed') await deps.store.releaseSubmissionClaim(application.opportunityId);
  await deps.store.appendSubmission(result);
  return result;
}
