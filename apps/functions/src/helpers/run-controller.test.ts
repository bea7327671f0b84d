import { EmptyProfileError, LlmError } from './errors';
import type { LlmRequest } from './llm';
import { runPipeline, type RunDeps } from './run-controller';
import {
  CERTIFICATION_TEXT,
  FakeExtractor,
  FakeLlm,
  FakePortal,
  FakeScraper,
  InMemoryRunStore,
  PAST_PERFORMANCE_TEXT,
  PROFILE_TEXT,
  clock,
  noWait,
  sectionText,
  testApplication,
  testOpportunity,
  testRunConfig,
} from '@/test/fakes';

const DOCUMENTS = {
  'company/profile.txt': { text: PROFILE_TEXT, hint: 'profile' as const },
  'company/past-performance.txt': { text: PAST_PERFORMANCE_TEXT, hint: 'past-performance' as const },
  'company/certifications.txt': { text: CERTIFICATION_TEXT, hint: 'certification' as const },
};

const listing = (noticeId: string, title: string, extra: Record<string, unknown> = {}) => ({
  noticeId,
  title,
  description: 'Provide cybersecurity incident response and SIEM monitoring for agency networks.',
  naicsCode: '541512',
  responseDeadLine: '2025-04-30T00:00:00Z',
  postedDate: '2025-03-01',
  ...extra,
});

/** Semantic score per solicitation title; unknown titles score 0. */
const scoreByTitle = (scores: Record<string, number>) => (request: LlmRequest<unknown>) => {
  const title = Object.keys(scores).find((t) => request.user.includes(`Title: ${t}\n`));
  return {
    score: title ? scores[title] : 0,
    satisfiedRequirements: ['incident response'],
    rationale: 'Scope matches the SOC past performance.',
  };
};

const draft = (request: LlmRequest<unknown>) => ({ content: sectionText(request.purpose) });

const setup = (overrides: Partial<RunDeps> = {}) => {
  const store = new InMemoryRunStore();
  const llm = new FakeLlm().reply('match', scoreByTitle({ Alpha: 0.82 })).reply('section:', draft);
  const portal = new FakePortal();
  const scraper = new FakeScraper('SAM_GOV', [listing('SOL-001', 'Alpha')]);
  const deps: RunDeps = {
    store,
    llm,
    extractor: new FakeExtractor(DOCUMENTS),
    documentPaths: Object.keys(DOCUMENTS),
    scrapers: [scraper],
    portal,
    runId: 'run-1',
    now: clock,
    sleep: noWait,
    ...overrides,
  };
  return { store, llm, portal, scraper, deps };
};

const AUTO = { REVIEW_MODE: 'false', AUTO_SUBMIT: 'true' };

describe('runPipeline', () => {
  it('sends a strong match to review under the default configuration', async () => {
    const { store, llm, portal, deps } = setup();

    const report = await runPipeline(testRunConfig(), deps);

    expect(report.runId).toBe('run-1');
    expect(report.cancelled).toBe(false);
    expect(report.outcomes).toHaveLength(1);
    expect(report.outcomes[0]).toMatchObject({
      opportunityId: 'SOL-001',
      status: 'review',
      score: 0.82,
      confidence: 'High',
      decision: 'review',
      reasons: ['review mode enabled', 'auto-submit disabled'],
      generated: true,
      failedSections: [],
      submissionStatus: null,
    });
    expect(report.counts).toMatchObject({ discovered: 1, scored: 1, generated: 1, review: 1, submitted: 0 });
    expect(report.confidence).toEqual({ High: 1, Medium: 0, Low: 0 });
    expect(llm.callsFor('section:')).toHaveLength(5);
    expect(portal.submissions).toEqual([]);
    expect(store.applications.get('SOL-001')?.approvalStatus).toBe('pending');
    expect(store.seen.get('SOL-001')?.outcome).toBe('review');
    expect(store.reports).toEqual([report]);
    expect(await store.getDailyCounters('2025-03-03')).toEqual({
      day: '2025-03-03',
      submissionsToday: 0,
      opportunitiesToday: 1,
    });
  });

  it('skips a weak match without generating anything', async () => {
    const { llm, deps } = setup();
    llm.reply('match', scoreByTitle({ Alpha: 0.3 }));

    const report = await runPipeline(testRunConfig(), deps);

    expect(report.outcomes[0]).toMatchObject({ status: 'skipped', reasons: ['below threshold'], generated: false });
    expect(report.counts.skipped).toBe(1);
    expect(llm.callsFor('section:')).toEqual([]);
  });

  it('approves and submits automatically when allowed', async () => {
    const { store, portal, deps } = setup();

    const report = await runPipeline(testRunConfig(AUTO), deps);

    expect(report.outcomes[0]).toMatchObject({ status: 'submitted', submissionStatus: 'submitted' });
    expect(report.counts.submitted).toBe(1);
    expect(portal.submissions).toHaveLength(1);
    expect(store.applications.get('SOL-001')).toMatchObject({ approvalStatus: 'approved', approvedBy: 'auto-submit' });
    expect(store.submissions.map((s) => s.confirmationId)).toEqual(['CONF-1']);
    expect((await store.getDailyCounters('2025-03-03')).submissionsToday).toBe(1);
  });

  it('does not auto-approve an application with failed sections', async () => {
    const { store, llm, portal, deps } = setup();
    llm.reply('section:team_qualifications', new LlmError('unavailable', 'model down'));

    const report = await runPipeline(testRunConfig(AUTO), deps);

    expect(report.outcomes[0]).toMatchObject({
      status: 'review',
      failedSections: ['team_qualifications'],
      reasons: ['auto-submit criteria met', 'application incomplete, approval blocked'],
    });
    expect(portal.submissions).toEqual([]);
    expect(store.applications.get('SOL-001')?.approvalStatus).toBe('pending');
    expect((await store.getDailyCounters('2025-03-03')).submissionsToday).toBe(0);
  });

  it('never submits more than the daily quota', async () => {
    const { store, llm, portal, deps } = setup({
      scrapers: [
        new FakeScraper('SAM_GOV', [listing('SOL-001', 'Alpha'), listing('SOL-002', 'Bravo'), listing('SOL-003', 'Charlie')]),
      ],
    });
    llm.reply('match', scoreByTitle({ Alpha: 0.9, Bravo: 0.9, Charlie: 0.9 }));
    await store.adjustDailyCounter('2025-03-03', 'submissionsToday', 1);

    const report = await runPipeline(testRunConfig({ ...AUTO, MAX_APPLICATIONS_PER_DAY: '2' }), deps);

    expect(report.counts.submitted).toBe(1);
    expect(report.counts.review).toBe(2);
    expect(report.outcomes.filter((o) => o.reasons.includes('daily quota reached'))).toHaveLength(2);
    expect(portal.submissions).toHaveLength(1);
    expect((await store.getDailyCounters('2025-03-03')).submissionsToday).toBe(2);
  });

  it('holds the daily quota across runs that overlap', async () => {
    const first = setup();
    const second = setup({
      store: first.store,
      portal: first.portal,
      runId: 'run-2',
      scrapers: [new FakeScraper('SAM_GOV', [listing('SOL-002', 'Bravo')])],
    });
    second.llm.reply('match', scoreByTitle({ Bravo: 0.82 }));
    const config = testRunConfig({ ...AUTO, MAX_APPLICATIONS_PER_DAY: '1' });

    const reports = await Promise.all([runPipeline(config, first.deps), runPipeline(config, second.deps)]);

    const outcomes = reports.flatMap((r) => r.outcomes);
    expect(outcomes.map((o) => o.status).sort()).toEqual(['review', 'submitted']);
    expect(outcomes.find((o) => o.status === 'review')?.reasons).toContain('daily quota reached');
    expect(first.portal.submissions).toHaveLength(1);
    expect((await first.store.getDailyCounters('2025-03-03')).submissionsToday).toBe(1);
  });

  it('does not send an opportunity someone else already claimed', async () => {
    const { store, portal, deps } = setup();
    await store.claimSubmission('SOL-001', 'reviewer@example.com');

    const report = await runPipeline(testRunConfig(AUTO), deps);

    expect(report.outcomes[0]).toMatchObject({ status: 'duplicate', submissionStatus: null });
    expect(report.outcomes[0].reasons).toContain('already submitted');
    expect(portal.submissions).toEqual([]);
    expect(store.submissions).toEqual([]);
    expect((await store.getDailyCounters('2025-03-03')).submissionsToday).toBe(0);
  });

  it('leaves an application a reviewer rejected alone', async () => {
    const { store, llm, portal, deps } = setup();
    store.applications.set('SOL-001', testApplication({ approvalStatus: 'rejected', inputHash: 'older' }));

    const report = await runPipeline(testRunConfig(AUTO), deps);

    expect(report.outcomes[0]).toMatchObject({ status: 'review' });
    expect(report.outcomes[0].reasons).toContain('application not approved');
    expect(llm.callsFor('section:')).toEqual([]);
    expect(portal.submissions).toEqual([]);
    expect(store.applications.get('SOL-001')?.approvalStatus).toBe('rejected');
  });

  it('aborts before scoring when no company document is usable', async () => {
    const { store, llm, scraper, deps } = setup({
      extractor: new FakeExtractor({ 'company/empty.txt': { text: '   ' } }),
      documentPaths: ['company/empty.txt'],
    });

    await expect(runPipeline(testRunConfig(), deps)).rejects.toThrow(EmptyProfileError);
    expect(scraper.calls).toBe(0);
    expect(llm.calls).toEqual([]);
    expect(store.reports).toEqual([]);
  });

  it('stops accepting opportunities at the per-run cap', async () => {
    const { llm, deps } = setup({
      scrapers: [
        new FakeScraper('SAM_GOV', [listing('SOL-001', 'Alpha'), listing('SOL-002', 'Bravo'), listing('SOL-003', 'Charlie')]),
      ],
    });
    llm.reply('match', scoreByTitle({}));

    const report = await runPipeline(testRunConfig(), deps, { maxOpportunities: 2 });

    expect(report.counts.discovered).toBe(3);
    expect(report.outcomes.map((o) => o.opportunityId)).toEqual(['SOL-001', 'SOL-002']);
    expect(report.cancelled).toBe(false);
  });

  it('finishes in-flight work and reports cancellation when aborted', async () => {
    const controller = new AbortController();
    const { llm, deps } = setup({
      scrapers: [new FakeScraper('SAM_GOV', [listing('SOL-001', 'Alpha'), listing('SOL-002', 'Bravo')])],
    });
    llm.reply('match', (request: LlmRequest<unknown>) => {
      controller.abort();
      return scoreByTitle({})(request);
    });

    const report = await runPipeline(testRunConfig({ OPPORTUNITY_CONCURRENCY: '1' }), deps, { signal: controller.signal });

    expect(report.cancelled).toBe(true);
    expect(report.outcomes.map((o) => [o.opportunityId, o.status])).toEqual([['SOL-001', 'skipped']]);
  });

  it('skips opportunities processed in an earlier run', async () => {
    const { store, llm, deps } = setup();
    await store.markOpportunitySeen(testOpportunity(), 'review', 'run-0');

    const report = await runPipeline(testRunConfig(), deps);

    expect(report.outcomes[0].status).toBe('duplicate');
    expect(report.counts.duplicates).toBe(1);
    expect(llm.calls).toEqual([]);
    expect(store.seen.get('SOL-001')?.runId).toBe('run-0');
  });

  it('keeps running when one source is unavailable', async () => {
    const failing = new FakeScraper('DIBBS', new Error('HTTP 503'));
    const { deps } = setup();
    deps.scrapers.push(failing);

    const report = await runPipeline(testRunConfig(), deps);

    expect(failing.calls).toBe(4);
    expect(report.sourceErrors).toEqual([{ source: 'DIBBS', message: 'Error: HTTP 503' }]);
    expect(report.counts.unavailableSources).toBe(1);
    expect(report.outcomes).toHaveLength(1);
  });

  it('counts incomplete listings and skipped documents', async () => {
    const { deps } = setup({
      scrapers: [new FakeScraper('SAM_GOV', [listing('SOL-001', 'Alpha'), listing('SOL-009', 'Broken', { description: '' })])],
      extractor: new FakeExtractor({ ...DOCUMENTS, 'company/logo.png': new Error('unreadable') }),
      documentPaths: [...Object.keys(DOCUMENTS), 'company/logo.png'],
    });

    const report = await runPipeline(testRunConfig(), deps);

    expect(report.counts).toMatchObject({ discovered: 1, incompleteListings: 1, skippedDocuments: 1 });
  });

  it('marks a degraded match and keeps its keyword score', async () => {
    const { llm, deps } = setup();
    llm.reply('match', new LlmError('rate_limit', 'throttled'));

    const report = await runPipeline(testRunConfig(), deps);

    expect(report.outcomes[0]).toMatchObject({ status: 'skipped', degraded: true, score: 0.333 });
    expect(report.counts.degraded).toBe(1);
  });

  it('isolates a failure to its own opportunity', async () => {
    const { store, llm, deps } = setup({
      scrapers: [new FakeScraper('SAM_GOV', [listing('SOL-001', 'Alpha'), listing('SOL-002', 'Bravo')])],
    });
    llm.reply('match', (request: LlmRequest<unknown>) => {
      if (request.user.includes('Title: Bravo\n')) throw new Error('unexpected');
      return scoreByTitle({ Alpha: 0.82 })(request);
    });

    const report = await runPipeline(testRunConfig(), deps);

    expect(report.outcomes.map((o) => o.status)).toEqual(['review', 'failed']);
    expect(report.outcomes[1].error).toBe('Error: unexpected');
    expect(report.counts.failed).toBe(1);
    expect(store.seen.has('SOL-002')).toBe(false);
  });
});
