import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import middy from '@middy/core';
import { failedSections } from '@govbid/core';

import { withSentryLambda } from '../../sentry-lambda';
import { apiResponse } from '@/helpers/api';
import { createDynamoRunStore, type RunStore } from '@/helpers/run-store';
import { httpErrorMiddleware } from '@/middleware/http-error-middleware';

let store: RunStore | undefined;
const getStore = (): RunStore => (store ??= createDynamoRunStore());

export const getApplication = async (
  event: Pick<APIGatewayProxyEventV2, 'queryStringParameters'>,
  runStore: RunStore,
): Promise<APIGatewayProxyResultV2> => {
  const opportunityId = event.queryStringParameters?.opportunityId;
  if (!opportunityId) {
    return apiResponse(400, { message: 'opportunityId is required' });
  }

  const application = await runStore.getApplication(opportunityId);
  if (!application) {
    return apiResponse(404, { message: `Application not found: ${opportunityId}` });
  }

  return apiResponse(200, { application, failedSections: failedSections(application) });
};

export const baseHandler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> =>
  getApplication(event, getStore());

export const handler = withSentryLambda(middy(baseHandler).use(httpErrorMiddleware()));
