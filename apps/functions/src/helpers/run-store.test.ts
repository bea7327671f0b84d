process.env.DB_TABLE_NAME = 'test-table';
process.env.REGION = 'us-east-1';

const mockSend = jest.fn();

jest.mock('@aws-sdk/client-dynamodb', () => ({
  DynamoDBClient: jest.fn(() => ({})),
}));

jest.mock('@aws-sdk/lib-dynamodb', () => ({
  DynamoDBDocumentClient: { from: jest.fn(() => ({ send: mockSend })) },
  GetCommand: jest.fn((params: unknown) => ({ type: 'Get', params })),
  PutCommand: jest.fn((params: unknown) => ({ type: 'Put', params })),
  UpdateCommand: jest.fn((params: unknown) => ({ type: 'Update', params })),
  DeleteCommand: jest.fn((params: unknown) => ({ type: 'Delete', params })),
}));

import { ApprovalTransitionError } from '@govbid/core';
import { createDynamoRunStore } from './run-store';
import { testApplication, testOpportunity } from '@/test/fakes';

const conditionalFailure = () =>
  Object.assign(new Error('The conditional request failed'), { name: 'ConditionalCheckFailedException' });

describe('DynamoRunStore', () => {
  const store = createDynamoRunStore();

  beforeEach(() => {
    mockSend.mockReset();
  });

  it('reads seen opportunities from the SEEN_OPPORTUNITY partition', async () => {
    mockSend.mockResolvedValueOnce({ Item: { partition_key: 'SEEN_OPPORTUNITY', sort_key: 'SOL-001' } });
    mockSend.mockResolvedValueOnce({});

    expect(await store.hasSeenOpportunity('SOL-001')).toBe(true);
    expect(await store.hasSeenOpportunity('SOL-002')).toBe(false);
    expect(mockSend.mock.calls[0][0]).toEqual({
      type: 'Get',
      params: { TableName: 'test-table', Key: { partition_key: 'SEEN_OPPORTUNITY', sort_key: 'SOL-001' } },
    });
  });

  it('stores the opportunity with its outcome so it can be read back', async () => {
    const opportunity = testOpportunity();
    mockSend.mockResolvedValueOnce({});
    await store.markOpportunitySeen(opportunity, 'review', 'run-1');

    const put = mockSend.mock.calls[0][0];
    expect(put.type).toBe('Put');
    expect(put.params.Item).toMatchObject({
      partition_key: 'SEEN_OPPORTUNITY',
      sort_key: 'SOL-001',
      outcome: 'review',
      runId: 'run-1',
    });

    mockSend.mockResolvedValueOnce({ Item: put.params.Item });
    expect(await store.getOpportunity('SOL-001')).toEqual(opportunity);
  });

  it('defaults missing daily counters to zero', async () => {
    mockSend.mockResolvedValueOnce({});
    expect(await store.getDailyCounters('2025-03-03')).toEqual({
      day: '2025-03-03',
      submissionsToday: 0,
      opportunitiesToday: 0,
    });
  });

  it('conditions a capped counter increment on the remaining headroom', async () => {
    mockSend.mockResolvedValueOnce({});
    expect(await store.adjustDailyCounter('2025-03-03', 'submissionsToday', 1, { max: 5 })).toBe(true);

    const update = mockSend.mock.calls[0][0];
    expect(update.params.Key).toEqual({ partition_key: 'DAILY_COUNTER', sort_key: '2025-03-03' });
    expect(update.params.ConditionExpression).toBe('attribute_not_exists(#field) OR #field <= :limit');
    expect(update.params.ExpressionAttributeValues[':limit']).toBe(4);
    expect(update.params.ExpressionAttributeValues[':delta']).toBe(1);
  });

  it('reports a full counter as false instead of throwing', async () => {
    mockSend.mockRejectedValueOnce(conditionalFailure());
    expect(await store.adjustDailyCounter('2025-03-03', 'submissionsToday', 1, { max: 5 })).toBe(false);
  });

  it('applies an uncapped adjustment without a condition', async () => {
    mockSend.mockResolvedValueOnce({});
    expect(await store.adjustDailyCounter('2025-03-03', 'submissionsToday', -1)).toBe(true);

    const update = mockSend.mock.calls[0][0];
    expect(update.params.ConditionExpression).toBeUndefined();
    expect(update.params.ExpressionAttributeValues[':limit']).toBeUndefined();
  });

  it('turns a lost approval race into ApprovalTransitionError', async () => {
    mockSend.mockRejectedValueOnce(conditionalFailure());
    const approved = testApplication({ approvalStatus: 'approved', approvedBy: 'reviewer' });

    await expect(store.saveApprovalTransition(approved)).rejects.toBeInstanceOf(ApprovalTransitionError);
  });

  it('rethrows other DynamoDB failures unchanged', async () => {
    const boom = Object.assign(new Error('access denied'), { name: 'AccessDeniedException' });
    mockSend.mockRejectedValueOnce(boom);

    await expect(store.saveApprovalTransition(testApplication())).rejects.toBe(boom);
  });

  it('only overwrites an application that is still pending', async () => {
    mockSend.mockResolvedValueOnce({});
    await store.saveApplication(testApplication({ approvalStatus: 'pending' }));

    const put = mockSend.mock.calls[0][0];
    expect(put.params.ConditionExpression).toBe('attribute_not_exists(#pk) OR #approvalStatus = :pending');
    expect(put.params.ExpressionAttributeValues).toEqual({ ':pending': 'pending' });
  });

  it('refuses to overwrite a decided application', async () => {
    mockSend.mockRejectedValueOnce(conditionalFailure());

    await expect(store.saveApplication(testApplication({ approvalStatus: 'pending' }))).rejects.toThrow(
      'Application SOL-001 is already decided',
    );
  });

  it('claims an opportunity for submission once', async () => {
    mockSend.mockResolvedValueOnce({});
    mockSend.mockRejectedValueOnce(conditionalFailure());

    expect(await store.claimSubmission('SOL-001', 'reviewer')).toBe(true);
    expect(await store.claimSubmission('SOL-001', 'pipeline')).toBe(false);

    const put = mockSend.mock.calls[0][0];
    expect(put.params.Item).toMatchObject({
      partition_key: 'SUBMISSION_CLAIM',
      sort_key: 'SOL-001',
      claimedBy: 'reviewer',
    });
    expect(put.params.ConditionExpression).toBe('attribute_not_exists(#pk)');
  });

  it('deletes the claim when it is released', async () => {
    mockSend.mockResolvedValueOnce({});
    await store.releaseSubmissionClaim('SOL-001');

    expect(mockSend.mock.calls[0][0]).toEqual({
      type: 'Delete',
      params: { TableName: 'test-table', Key: { partition_key: 'SUBMISSION_CLAIM', sort_key: 'SOL-001' } },
    });
  });

  it('never overwrites an existing submission record', async () => {
    mockSend.mockResolvedValueOnce({});
    await store.appendSubmission({
      opportunityId: 'SOL-001',
      submittedAt: '2025-03-03T12:00:00.000Z',
      status: 'submitted',
      portalStatus: 'sent',
      confirmationId: 'CONF-1',
      retryCount: 0,
    });

    const put = mockSend.mock.calls[0][0];
    expect(put.params.Item.sort_key).toBe('SOL-001#2025-03-03T12:00:00.000Z');
    expect(put.params.ConditionExpression).toBe('attribute_not_exists(#pk)');
  });
});
