import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import middy from '@middy/core';
import { ApprovalRequestSchema, transitionApproval } from '@govbid/core';

import { withSentryLambda } from '../../sentry-lambda';
import { apiResponse, parseJsonBody } from '@/helpers/api';
import { nowIso } from '@/helpers/date';
import { createDynamoRunStore, type RunStore } from '@/helpers/run-store';
import { httpErrorMiddleware } from '@/middleware/http-error-middleware';

let store: RunStore | undefined;
const getStore = (): RunStore => (store ??= createDynamoRunStore());

/**
 * Records a reviewer's decision on a pending application. Transition errors
 * (already decided, failed sections) surface as 409 through the error middleware.
 */
export const approveApplication = async (
  event: Pick<APIGatewayProxyEventV2, 'body' | 'isBase64Encoded'>,
  runStore: RunStore,
): Promise<APIGatewayProxyResultV2> => {
  const { success, data, error } = ApprovalRequestSchema.safeParse(parseJsonBody(event));
  if (!success) {
    return apiResponse(400, { message: 'Invalid request body', issues: error.issues });
  }

  const application = await runStore.getApplication(data.opportunityId);
  if (!application) {
    return apiResponse(404, { message: `Application not found: ${data.opportunityId}` });
  }

  const next = transitionApproval(application, data.decision, data.actor, nowIso());
  await runStore.saveApprovalTransition(next);

  console.log(`[approve-application] ${data.opportunityId} ${data.decision} by ${data.actor}`);
  return apiResponse(200, { application: next });
};

export const baseHandler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> =>
  approveApplication(event, getStore());

export const handler = withSentryLambda(middy(baseHandler).use(httpErrorMiddleware()));
