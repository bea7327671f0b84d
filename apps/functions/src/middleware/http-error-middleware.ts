import type { MiddlewareObj } from '@middy/core';
import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { ApprovalTransitionError } from '@govbid/core';
import { apiResponse, HttpError } from '@/helpers/api';
import { PipelineError } from '@/helpers/errors';

export const errorResponse = (err: unknown): APIGatewayProxyResultV2 => {
  if (err instanceof HttpError) return apiResponse(err.statusCode, { message: err.message });
  if (err instanceof ApprovalTransitionError) return apiResponse(409, { message: err.message });
  if (err instanceof PipelineError && err.category === 'policy') return apiResponse(409, { message: err.message });

  const message = err instanceof Error ? err.message : 'Internal Server Error';
  return apiResponse(500, { message: 'Internal Server Error', error: message });
};

export function httpErrorMiddleware(): MiddlewareObj<APIGatewayProxyEventV2, APIGatewayProxyResultV2> {
  return {
    onError: async (request) => {
      const err = request.error;
      console.error('httpErrorMiddleware caught error:', {
        name: err?.name,
        message: err?.message,
        stack: err?.stack,
      });
      request.response = errorResponse(err);
    },
  };
}
