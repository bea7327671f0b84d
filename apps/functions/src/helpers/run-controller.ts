import { v4 as uuidv4 } from 'uuid';
import {
  DECISION_REASONS,
  failedSections,
  transitionApproval,
  type CapabilityProfile,
  type Opportunity,
  type OpportunityOutcome,
  type OutcomeStatus,
  type RunConfig,
  type RunReport,
  type SubmissionRecord,
} from '@govbid/core';
import type { DocumentExtractor, ListingScraper, PortalSubmissionAdapter } from '@/types/collaborators';
import { generateApplication } from './application-generator';
import { buildCapabilityProfile, collectDocumentBlocks } from './capability-profile';
import { DailyQuota } from './daily-quota';
import { dayKey } from './date';
import { decide } from './decision-gate';
import { DuplicateSubmissionError, errorMessage } from './errors';
import type { LlmService } from './llm';
import { scoreOpportunity } from './matcher';
import { OpportunityStream, fetchListings } from './opportunity-normalizer';
import { RunReportBuilder } from './run-report';
import type { RunStore } from './run-store';
import { submitApplication } from './submission';

export type RunDeps = {
  store: RunStore;
  /** Expected to already carry the run's concurrency, timeout and retry policy (see LlmGateway). */
  llm: LlmService;
  extractor: DocumentExtractor;
  documentPaths: string[];
  scrapers: ListingScraper[];
  portal: PortalSubmissionAdapter;
  runId?: string;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type RunOptions = {
  /** Stop taking new opportunities once aborted; in-flight ones finish. */
  signal?: AbortSignal;
  maxOpportunities?: number;
  lookbackDays?: number;
};

type RunContext = {
  config: RunConfig;
  deps: RunDeps;
  profile: CapabilityProfile;
  quota: DailyQuota;
  day: string;
  clock: () => Date;
};

const AUTO_APPROVER = 'auto-submit';

const emptyOutcome = (opportunity: Opportunity): OpportunityOutcome => ({
  opportunityId: opportunity.sourceId,
  title: opportunity.title,
  source: opportunity.source,
  status: 'failed',
  score: null,
  confidence: null,
  degraded: false,
  decision: null,
  reasons: [],
  generated: false,
  failedSections: [],
  submissionStatus: null,
});

/**
 * Matcher → gate → generator → submission for one opportunity, strictly in
 * sequence. Fills `outcome` as it goes so a failure part way keeps what was
 * already known.
 */
async function processOpportunity(
  opportunity: Opportunity,
  outcome: OpportunityOutcome,
  ctx: RunContext,
): Promise<OutcomeStatus> {
  const { config, deps, profile, quota, day, clock } = ctx;

  if (await deps.store.hasSeenOpportunity(opportunity.sourceId)) {
    console.log(`[run-controller] ${opportunity.sourceId} already processed in an earlier run`);
    return 'duplicate';
  }

  const match = await scoreOpportunity(opportunity, profile, deps.llm, {
    minLeadTimeDays: config.minLeadTimeDays,
    now: clock,
  });
  outcome.score = match.score;
  outcome.confidence = match.confidence;
  outcome.degraded = match.degraded;

  const decision = quota.decide((counters) => decide(match, counters, config));
  outcome.decision = decision.kind;
  outcome.reasons = [...decision.reasons];
  console.log(`[run-controller] ${opportunity.sourceId} score=${match.score} decision=${decision.kind} (${decision.reasons.join('; ')})`);

  let slotHeld = decision.kind === 'submit';
  // The run's own quota only sees this run; the stored counter is shared with other runs and the API
  let storedSlotHeld = false;
  try {
    await deps.store.adjustDailyCounter(day, 'opportunitiesToday', 1);

    if (decision.kind === 'skip') return 'skipped';

    const { application } = await generateApplication(opportunity, profile, match, {
      llm: deps.llm,
      store: deps.store,
      now: clock,
    });
    outcome.generated = true;
    outcome.failedSections = failedSections(application);

    if (decision.kind === 'review') return 'review';

    // decision.kind === 'submit': the automated approval step
    if (outcome.failedSections.length) {
      outcome.reasons.push(DECISION_REASONS.applicationIncomplete);
      return 'review';
    }
    if (application.approvalStatus === 'rejected') {
      outcome.reasons.push(DECISION_REASONS.notApproved);
      return 'review';
    }

    storedSlotHeld = await deps.store.adjustDailyCounter(day, 'submissionsToday', 1, {
      max: config.maxApplicationsPerDay,
    });
    if (!storedSlotHeld) {
      console.log(`[run-controller] ${opportunity.sourceId} daily quota taken by another run`);
      outcome.reasons.push(DECISION_REASONS.quotaReached);
      return 'review';
    }

    let approved = application;
    if (application.approvalStatus === 'pending') {
      approved = transitionApproval(application, 'approved', AUTO_APPROVER, clock().toISOString());
      await deps.store.saveApprovalTransition(approved);
    }

    let record: SubmissionRecord;
    try {
      record = await submitApplication(approved, decision, opportunity, {
        portal: deps.portal,
        store: deps.store,
        company: { name: profile.name, signatory: profile.signatory },
        maxRetries: config.submissionMaxRetries,
        baseDelayMs: config.retryBaseDelayMs,
        timeoutMs: config.ioTimeoutMs,
        now: clock,
        sleep: deps.sleep,
      });
    } catch (err) {
      if (!(err instanceof DuplicateSubmissionError)) throw err;
      console.log(`[run-controller] ${opportunity.sourceId} ${err.message}`);
      outcome.reasons.push(DECISION_REASONS.alreadySubmitted);
      return 'duplicate';
    }
    outcome.submissionStatus = record.status;

    if (record.status === 'expired') return 'expired';
    if (record.status === 'failed') {
      outcome.error = record.error;
      return 'submission_failed';
    }

    slotHeld = false;
    storedSlotHeld = false;
    quota.confirm();
    return 'submitted';
  } finally {
    if (slotHeld) quota.release();
    if (storedSlotHeld) await deps.store.adjustDailyCounter(day, 'submissionsToday', -1);
  }
}

/**
 * One full pass: profile once, then a bounded pool of workers pulling from the
 * normalized opportunity stream. Fatal setup errors (empty profile) are thrown
 * before any opportunity is touched; anything failing inside one opportunity
 * only marks that outcome.
 */
export async function runPipeline(config: RunConfig, deps: RunDeps, options: RunOptions = {}): Promise<RunReport> {
  const clock = deps.now ?? (() => new Date());
  const runId = deps.runId ?? uuidv4();
  const report = new RunReportBuilder(runId, clock().toISOString());
  const retryPolicy = {
    timeoutMs: config.ioTimeoutMs,
    maxRetries: config.llmMaxRetries,
    baseDelayMs: config.retryBaseDelayMs,
    sleep: deps.sleep,
  };

  console.log(`[run-controller] run ${runId} starting`);

  const { blocks, skipped } = await collectDocumentBlocks(deps.extractor, deps.documentPaths, retryPolicy);
  const profile = buildCapabilityProfile(blocks, config.company);
  console.log(
    `[run-controller] profile ${profile.version.slice(0, 12)}: ${profile.capabilityStatements.length} statements, ${profile.certifications.length} certifications, NAICS ${profile.naicsCodes.join(',')}`,
  );

  const { listings, failures } = await fetchListings(deps.scrapers, options.lookbackDays ?? config.lookbackDays, retryPolicy);
  const stream = new OpportunityStream(listings);
  report.recordInputs(
    {
      discovered: stream.size,
      incompleteListings: stream.warnings.length,
      unavailableSources: failures.length,
      skippedDocuments: skipped.length,
    },
    failures,
  );

  const day = dayKey(clock());
  const ctx: RunContext = {
    config,
    deps,
    profile,
    quota: new DailyQuota(await deps.store.getDailyCounters(day)),
    day,
    clock,
  };

  const maxOpportunities = options.maxOpportunities ?? config.maxOpportunities;
  const iterator = stream[Symbol.iterator]();
  let accepted = 0;
  let cancelled = false;

  // Synchronous, so two workers never take the same opportunity or overshoot the cap
  const take = (): { index: number; opportunity: Opportunity } | undefined => {
    if (accepted >= maxOpportunities) return undefined;
    if (options.signal?.aborted) {
      cancelled = accepted < stream.size;
      return undefined;
    }
    const next = iterator.next();
    if (next.done) return undefined;
    return { index: accepted++, opportunity: next.value };
  };

  const worker = async () => {
    for (let item = take(); item; item = take()) {
      const { index, opportunity } = item;
      const outcome = emptyOutcome(opportunity);
      try {
        outcome.status = await processOpportunity(opportunity, outcome, ctx);
      } catch (err) {
        console.error(`[run-controller] ${opportunity.sourceId} failed: ${errorMessage(err)}`);
        outcome.status = 'failed';
        outcome.error = errorMessage(err);
      }

      // Failed ones stay unseen so the next run picks them up again
      if (outcome.status !== 'duplicate' && outcome.status !== 'failed') {
        try {
          await deps.store.markOpportunitySeen(opportunity, outcome.status, runId);
        } catch (err) {
          console.error(`[run-controller] ${opportunity.sourceId} could not be marked as seen: ${errorMessage(err)}`);
          outcome.error = errorMessage(err);
        }
      }
      report.setOutcome(index, outcome);
    }
  };

  await Promise.all(Array.from({ length: config.opportunityConcurrency }, worker));

  const result = report.build(clock().toISOString(), cancelled);
  await deps.store.saveRunReport(result);

  console.log(`[run-controller] run ${runId} finished`, JSON.stringify(result.counts));
  return result;
}
