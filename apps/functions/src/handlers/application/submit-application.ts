import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import middy from '@middy/core';
import { z } from 'zod';
import type { RunConfig } from '@govbid/core';

import { withSentryLambda } from '../../sentry-lambda';
import { SesPortalAdapter } from '@/adapters/ses-portal-adapter';
import { apiResponse, parseJsonBody } from '@/helpers/api';
import { dayKey } from '@/helpers/date';
import { DuplicateSubmissionError } from '@/helpers/errors';
import { authorizeApprovedSubmission } from '@/helpers/decision-gate';
import { requireEnv } from '@/helpers/env';
import { resolveRunConfig } from '@/helpers/run-config';
import { createDynamoRunStore, type RunStore } from '@/helpers/run-store';
import { submitApplication } from '@/helpers/submission';
import { httpErrorMiddleware } from '@/middleware/http-error-middleware';
import type { PortalSubmissionAdapter } from '@/types/collaborators';

const SubmitApplicationRequestSchema = z.object({
  opportunityId: z.string().min(1),
});

export type SubmitApplicationDeps = {
  store: RunStore;
  portal: PortalSubmissionAdapter;
  config: RunConfig;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Human path to submission. The daily slot is reserved with a conditional
 * counter update before the portal is called, and given back when the
 * submission does not go through. An opportunity is only ever sent once.
 */
export const submitApprovedApplication = async (
  event: Pick<APIGatewayProxyEventV2, 'body' | 'isBase64Encoded'>,
  deps: SubmitApplicationDeps,
): Promise<APIGatewayProxyResultV2> => {
  const { success, data, error } = SubmitApplicationRequestSchema.safeParse(parseJsonBody(event));
  if (!success) {
    return apiResponse(400, { message: 'Invalid request body', issues: error.issues });
  }

  const { store, portal, config } = deps;
  const clock = deps.now ?? (() => new Date());
  const { opportunityId } = data;

  const [application, opportunity] = await Promise.all([
    store.getApplication(opportunityId),
    store.getOpportunity(opportunityId),
  ]);
  if (!application || !opportunity) {
    return apiResponse(404, { message: `Application not found: ${opportunityId}` });
  }

  const day = dayKey(clock());
  const decision = authorizeApprovedSubmission(application, await store.getDailyCounters(day), config);
  if (decision.kind !== 'submit') {
    return apiResponse(409, { message: decision.reasons.join('; '), decision });
  }

  const reserved = await store.adjustDailyCounter(day, 'submissionsToday', 1, { max: config.maxApplicationsPerDay });
  if (!reserved) {
    return apiResponse(409, { message: 'daily quota reached' });
  }

  let submitted = false;
  try {
    const record = await submitApplication(application, decision, opportunity, {
      portal,
      store,
      company: config.company,
      maxRetries: config.submissionMaxRetries,
      baseDelayMs: config.retryBaseDelayMs,
      timeoutMs: config.ioTimeoutMs,
      now: clock,
      sleep: deps.sleep,
    });
    submitted = record.status === 'submitted';
    console.log(`[submit-application] ${opportunityId} ${record.status}`);
    return apiResponse(submitted ? 200 : 502, { submission: record });
  } catch (err) {
    if (err instanceof DuplicateSubmissionError) return apiResponse(409, { message: err.message });
    throw err;
  } finally {
    if (!submitted) await store.adjustDailyCounter(day, 'submissionsToday', -1);
  }
};

let deps: SubmitApplicationDeps | undefined;
const getDeps = (): SubmitApplicationDeps =>
  (deps ??= {
    store: createDynamoRunStore(),
    portal: new SesPortalAdapter({
      from: requireEnv('SUBMISSION_EMAIL_FROM'),
      to: requireEnv('SUBMISSION_EMAIL_TO'),
    }),
    config: resolveRunConfig(),
  });

export const baseHandler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> =>
  submitApprovedApplication(event, getDeps());

export const handler = withSentryLambda(middy(baseHandler).use(httpErrorMiddleware()));
