import { DeleteCommand, GetCommand, PutCommand, UpdateCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import {
  ApplicationSchema,
  ApprovalTransitionError,
  DailyCountersSchema,
  OpportunitySchema,
  type Application,
  type DailyCounters,
  type Opportunity,
  type OutcomeStatus,
  type RunReport,
  type SubmissionRecord,
} from '@govbid/core';
import { PK_NAME, SK_NAME } from '@/constants/common';
import {
  APPLICATION_PK,
  DAILY_COUNTER_PK,
  RUN_REPORT_PK,
  SEEN_OPPORTUNITY_PK,
  SUBMISSION_CLAIM_PK,
  SUBMISSION_PK,
} from '@/constants/pipeline';
import { createDocClient, isConditionalCheckFailed, withThrottleRetry } from './db';
import { requireEnv } from './env';
import { nowIso } from './date';

export type DailyCounterField = 'submissionsToday' | 'opportunitiesToday';

/** Everything the pipeline persists between runs. */
export interface RunStore {
  hasSeenOpportunity(sourceId: string): Promise<boolean>;
  markOpportunitySeen(opportunity: Opportunity, outcome: OutcomeStatus, runId: string): Promise<void>;
  getOpportunity(sourceId: string): Promise<Opportunity | null>;

  getApplication(opportunityId: string): Promise<Application | null>;
  /** Fails with ApprovalTransitionError if a decided application is already stored. */
  saveApplication(application: Application): Promise<void>;
  /** Persists an approval transition; fails if the stored application is no longer pending. */
  saveApprovalTransition(application: Application): Promise<void>;

  /** One claim per opportunity; returns false when someone already holds it. */
  claimSubmission(opportunityId: string, claimedBy: string): Promise<boolean>;
  /** Only for submissions that did not go through, so they can be tried again. */
  releaseSubmissionClaim(opportunityId: string): Promise<void>;
  /** Append-only. */
  appendSubmission(record: SubmissionRecord): Promise<void>;

  getDailyCounters(day: string): Promise<DailyCounters>;
  /** Adds delta atomically. With `max`, only applies while the value stays at or below it; returns false otherwise. */
  adjustDailyCounter(day: string, field: DailyCounterField, delta: number, options?: { max?: number }): Promise<boolean>;

  saveRunReport(report: RunReport): Promise<void>;
}

export class DynamoRunStore implements RunStore {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tableName: string,
  ) {}

  private key(pk: string, sk: string) {
    return { [PK_NAME]: pk, [SK_NAME]: sk };
  }

  private async getItem(pk: string, sk: string): Promise<Record<string, unknown> | undefined> {
    const res = await withThrottleRetry(() =>
      this.client.send(new GetCommand({ TableName: this.tableName, Key: this.key(pk, sk) })),
    );
    return res.Item;
  }

  // ─── Opportunities ──────────────────────────────────────────────────────────

  async hasSeenOpportunity(sourceId: string): Promise<boolean> {
    return Boolean(await this.getItem(SEEN_OPPORTUNITY_PK, sourceId));
  }

  async markOpportunitySeen(opportunity: Opportunity, outcome: OutcomeStatus, runId: string): Promise<void> {
    await withThrottleRetry(() =>
      this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...this.key(SEEN_OPPORTUNITY_PK, opportunity.sourceId),
            opportunity,
            outcome,
            runId,
            seenAt: nowIso(),
          },
        }),
      ),
    );
  }

  async getOpportunity(sourceId: string): Promise<Opportunity | null> {
    const item = await this.getItem(SEEN_OPPORTUNITY_PK, sourceId);
    return item ? OpportunitySchema.parse(item.opportunity) : null;
  }

  // ─── Applications ───────────────────────────────────────────────────────────

  async getApplication(opportunityId: string): Promise<Application | null> {
    const item = await this.getItem(APPLICATION_PK, opportunityId);
    return item ? ApplicationSchema.parse(item) : null;
  }

  async saveApplication(application: Application): Promise<void> {
    try {
      await withThrottleRetry(() =>
        this.client.send(
          new PutCommand({
            TableName: this.tableName,
            Item: { ...this.key(APPLICATION_PK, application.opportunityId), ...application, updatedAt: nowIso() },
            ConditionExpression: 'attribute_not_exists(#pk) OR #approvalStatus = :pending',
            ExpressionAttributeNames: { '#pk': PK_NAME, '#approvalStatus': 'approvalStatus' },
            ExpressionAttributeValues: { ':pending': 'pending' },
          }),
        ),
      );
    } catch (err) {
      if (isConditionalCheckFailed(err)) {
        throw new ApprovalTransitionError(`Application ${application.opportunityId} is already decided`);
      }
      throw err;
    }
  }

  async saveApprovalTransition(application: Application): Promise<void> {
    try {
      await withThrottleRetry(() =>
        this.client.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: this.key(APPLICATION_PK, application.opportunityId),
            UpdateExpression:
              'SET #approvalStatus = :status, #approvedBy = :by, #approvedAt = :at, #updatedAt = :now',
            ConditionExpression: '#approvalStatus = :pending',
            ExpressionAttributeNames: {
              '#approvalStatus': 'approvalStatus',
              '#approvedBy': 'approvedBy',
              '#approvedAt': 'approvedAt',
              '#updatedAt': 'updatedAt',
            },
            ExpressionAttributeValues: {
              ':status': application.approvalStatus,
              ':by': application.approvedBy,
              ':at': application.approvedAt,
              ':now': nowIso(),
              ':pending': 'pending',
            },
          }),
        ),
      );
    } catch (err) {
      if (isConditionalCheckFailed(err)) {
        throw new ApprovalTransitionError(`Application ${application.opportunityId} is no longer pending`);
      }
      throw err;
    }
  }

  // ─── Submissions ────────────────────────────────────────────────────────────

  async claimSubmission(opportunityId: string, claimedBy: string): Promise<boolean> {
    try {
      await withThrottleRetry(() =>
        this.client.send(
          new PutCommand({
            TableName: this.tableName,
            Item: { ...this.key(SUBMISSION_CLAIM_PK, opportunityId), claimedBy, claimedAt: nowIso() },
            ConditionExpression: 'attribute_not_exists(#pk)',
            ExpressionAttributeNames: { '#pk': PK_NAME },
          }),
        ),
      );
      return true;
    } catch (err) {
      if (isConditionalCheckFailed(err)) return false;
      throw err;
    }
  }

  async releaseSubmissionClaim(opportunityId: string): Promise<void> {
    await withThrottleRetry(() =>
      this.client.send(
        new DeleteCommand({ TableName: this.tableName, Key: this.key(SUBMISSION_CLAIM_PK, opportunityId) }),
      ),
    );
  }

  async appendSubmission(record: SubmissionRecord): Promise<void> {
    await withThrottleRetry(() =>
      this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...this.key(SUBMISSION_PK, `${record.opportunityId}#${record.submittedAt}`), ...record },
          ConditionExpression: 'attribute_not_exists(#pk)',
          ExpressionAttributeNames: { '#pk': PK_NAME },
        }),
      ),
    );
  }

  // ─── Daily counters ─────────────────────────────────────────────────────────

  async getDailyCounters(day: string): Promise<DailyCounters> {
    const item = await this.getItem(DAILY_COUNTER_PK, day);
    return DailyCountersSchema.parse({
      day,
      submissionsToday: item?.submissionsToday ?? 0,
      opportunitiesToday: item?.opportunitiesToday ?? 0,
    });
  }

  async adjustDailyCounter(
    day: string,
    field: DailyCounterField,
    delta: number,
    options?: { max?: number },
  ): Promise<boolean> {
    const max = options?.max;
    try {
      await withThrottleRetry(() =>
        this.client.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: this.key(DAILY_COUNTER_PK, day),
            UpdateExpression: 'ADD #field :delta SET #updatedAt = :now',
            ...(max !== undefined && {
              ConditionExpression: 'attribute_not_exists(#field) OR #field <= :limit',
            }),
            ExpressionAttributeNames: { '#field': field, '#updatedAt': 'updatedAt' },
            ExpressionAttributeValues: {
              ':delta': delta,
              ':now': nowIso(),
              ...(max !== undefined && { ':limit': max - delta }),
            },
          }),
        ),
      );
      return true;
    } catch (err) {
      if (max !== undefined && isConditionalCheckFailed(err)) return false;
      throw err;
    }
  }

  // ─── Run reports ────────────────────────────────────────────────────────────

  async saveRunReport(report: RunReport): Promise<void> {
    await withThrottleRetry(() =>
      this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...this.key(RUN_REPORT_PK, report.runId), ...report },
        }),
      ),
    );
  }
}

export const createDynamoRunStore = (): DynamoRunStore =>
  new DynamoRunStore(createDocClient(requireEnv('REGION', 'us-east-1')), requireEnv('DB_TABLE_NAME'));
