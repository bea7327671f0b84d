import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { withRetry } from './retry';

const THROTTLE_ERRORS = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
]);

export const createDocClient = (region: string): DynamoDBDocumentClient =>
  DynamoDBDocumentClient.from(new DynamoDBClient({ region }), {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });

export const isThrottleError = (err: unknown): boolean => err instanceof Error && THROTTLE_ERRORS.has(err.name);

export const isConditionalCheckFailed = (err: unknown): boolean =>
  err instanceof Error && err.name === 'ConditionalCheckFailedException';

/** Retries throttled DynamoDB calls: 100ms, 200ms, ... capped at 3s. */
export const withThrottleRetry = <T>(fn: () => Promise<T>, sleep?: (ms: number) => Promise<void>): Promise<T> =>
  withRetry(fn, {
    maxRetries: 5,
    baseDelayMs: 100,
    maxDelayMs: 3000,
    sleep,
    shouldRetry: isThrottleError,
    onRetry: (err, attempt, delayMs) =>
      console.warn(`[db] throttled (${err instanceof Error ? err.name : 'error'}), retry ${attempt} in ${delayMs}ms`),
  });
