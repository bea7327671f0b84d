import type { OpportunityOutcome, RunCounts, RunReport } from '@govbid/core';
import { TOP_OPPORTUNITIES_IN_REPORT } from '@/constants/pipeline';
import type { SourceFailure } from './opportunity-normalizer';

type InputCounts = Pick<RunCounts, 'discovered' | 'incompleteListings' | 'unavailableSources' | 'skippedDocuments'>;

/**
 * Collects per-opportunity outcomes in acceptance order (workers finish out of
 * order) and derives the aggregate counts from them at the end.
 */
export class RunReportBuilder {
  private readonly outcomes: Array<OpportunityOutcome | undefined> = [];
  private inputs: InputCounts = { discovered: 0, incompleteListings: 0, unavailableSources: 0, skippedDocuments: 0 };
  private sourceErrors: SourceFailure[] = [];

  constructor(
    private readonly runId: string,
    private readonly startedAt: string,
  ) {}

  recordInputs(inputs: Partial<InputCounts>, sourceErrors: SourceFailure[] = []): void {
    this.inputs = { ...this.inputs, ...inputs };
    this.sourceErrors.push(...sourceErrors);
  }

  setOutcome(index: number, outcome: OpportunityOutcome): void {
    this.outcomes[index] = outcome;
  }

  build(finishedAt: string, cancelled: boolean): RunReport {
    const outcomes = this.outcomes.filter((o): o is OpportunityOutcome => o !== undefined);
    const count = (predicate: (o: OpportunityOutcome) => boolean) => outcomes.filter(predicate).length;

    const scored = outcomes.filter((o) => o.score !== null);
    const topOpportunities = [...scored]
      .sort((a, b) => (b.score ?? 0) - (a.score ?? 0))
      .slice(0, TOP_OPPORTUNITIES_IN_REPORT)
      .map((o) => ({ opportunityId: o.opportunityId, title: o.title, score: o.score ?? 0, decision: o.decision }));

    return {
      runId: this.runId,
      startedAt: this.startedAt,
      finishedAt,
      cancelled,
      counts: {
        ...this.inputs,
        scored: scored.length,
        generated: count((o) => o.generated),
        submitted: count((o) => o.status === 'submitted'),
        skipped: count((o) => o.status === 'skipped' || o.status === 'expired'),
        failed: count((o) => o.status === 'failed' || o.status === 'submission_failed'),
        review: count((o) => o.status === 'review'),
        degraded: count((o) => o.degraded),
        duplicates: count((o) => o.status === 'duplicate'),
      },
      confidence: {
        High: count((o) => o.confidence === 'High'),
        Medium: count((o) => o.confidence === 'Medium'),
        Low: count((o) => o.confidence === 'Low'),
      },
      outcomes,
      topOpportunities,
      sourceErrors: this.sourceErrors,
    };
  }
}
