import type { Decision } from '@govbid/core';
import { DuplicateSubmissionError, PolicyViolationError, SubmissionError } from './errors';
import { submitApplication, type SubmissionDeps } from './submission';
import { FakePortal, InMemoryRunStore, clock, noWait, testApplication, testOpportunity } from '@/test/fakes';

const submitDecision: Decision = { opportunityId: 'SOL-001', kind: 'submit', reasons: ['human approval'] };

const setup = (portal = new FakePortal()) => {
  const store = new InMemoryRunStore();
  const deps: SubmissionDeps = {
    portal,
    store,
    company: { name: 'Acme Federal IT', signatory: 'Jane Roe, CEO' },
    maxRetries: 2,
    baseDelayMs: 0,
    timeoutMs: 1000,
    now: clock,
    sleep: noWait,
  };
  return { portal, store, deps };
};

describe('submitApplication', () => {
  it('submits the rendered documents and records the confirmation', async () => {
    const { portal, store, deps } = setup();

    const record = await submitApplication(testApplication(), submitDecision, testOpportunity(), deps);

    expect(record).toEqual({
      opportunityId: 'SOL-001',
      submittedAt: '2025-03-03T12:00:00.000Z',
      status: 'submitted',
      portalStatus: 'sent',
      confirmationId: 'CONF-1',
      retryCount: 0,
    });
    expect(store.submissions).toEqual([record]);
    expect(portal.submissions).toHaveLength(1);
    expect(portal.submissions[0].portalId).toBe('SAM_GOV');
    expect(portal.submissions[0].documents.map((d) => d.name)[0]).toBe('SOL-001_cover_letter.txt');
  });

  it('retries a transient portal failure', async () => {
    const { portal, deps } = setup(new FakePortal([new SubmissionError('HTTP 503', '503'), 'ok']));

    const record = await submitApplication(testApplication(), submitDecision, testOpportunity(), deps);

    expect(record.status).toBe('submitted');
    expect(record.retryCount).toBe(1);
    expect(portal.submissions).toHaveLength(2);
  });

  it('records a failure once retries are spent', async () => {
    const { portal, store, deps } = setup(new FakePortal([new SubmissionError('Rejected: missing SF-1449', '400')]));

    const record = await submitApplication(testApplication(), submitDecision, testOpportunity(), deps);

    expect(record).toEqual({
      opportunityId: 'SOL-001',
      submittedAt: '2025-03-03T12:00:00.000Z',
      status: 'failed',
      portalStatus: '400',
      confirmationId: null,
      retryCount: 2,
      error: 'SubmissionError: Rejected: missing SF-1449',
    });
    expect(portal.submissions).toHaveLength(3);
    expect(store.submissions).toEqual([record]);
  });

  it('keeps the submission claim after a successful send', async () => {
    const { store, deps } = setup();

    await submitApplication(testApplication(), submitDecision, testOpportunity(), deps);

    expect(store.claims.get('SOL-001')).toBe('reviewer@example.com');
  });

  it('gives the claim back when the portal keeps failing', async () => {
    const { store, deps } = setup(new FakePortal([new SubmissionError('HTTP 503', '503')]));

    const record = await submitApplication(testApplication(), submitDecision, testOpportunity(), deps);

    expect(record.status).toBe('failed');
    expect(store.claims.size).toBe(0);
  });

  it('never sends the same opportunity twice', async () => {
    const { portal, store, deps } = setup();
    await submitApplication(testApplication(), submitDecision, testOpportunity(), deps);

    await expect(submitApplication(testApplication(), submitDecision, testOpportunity(), deps)).rejects.toBeInstanceOf(
      DuplicateSubmissionError,
    );
    expect(portal.submissions).toHaveLength(1);
    expect(store.submissions).toHaveLength(1);
  });

  it('does not submit once the due date has passed', async () => {
    const { portal, deps } = setup();

    const record = await submitApplication(
      testApplication(),
      submitDecision,
      testOpportunity({ dueDate: '2025-03-01T00:00:00.000Z' }),
      deps,
    );

    expect(record.status).toBe('expired');
    expect(record.confirmationId).toBeNull();
    expect(portal.submissions).toEqual([]);
  });

  it('refuses without a submit decision', async () => {
    const { portal, store, deps } = setup();
    const review: Decision = { opportunityId: 'SOL-001', kind: 'review', reasons: ['review mode enabled'] };

    await expect(submitApplication(testApplication(), review, testOpportunity(), deps)).rejects.toThrow(
      PolicyViolationError,
    );
    expect(portal.submissions).toEqual([]);
    expect(store.submissions).toEqual([]);
  });

  it('refuses an application that is not approved', async () => {
    const { portal, deps } = setup();
    const pending = testApplication({ approvalStatus: 'pending', approvedBy: undefined, approvedAt: undefined });

    await expect(submitApplication(pending, submitDecision, testOpportunity(), deps)).rejects.toThrow(
      'Application SOL-001 is pending, not approved',
    );
    expect(portal.submissions).toEqual([]);
  });
});
