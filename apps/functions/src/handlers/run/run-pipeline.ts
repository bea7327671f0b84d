import type { Context, EventBridgeEvent } from 'aws-lambda';
import middy from '@middy/core';
import { z } from 'zod';
import type { RunConfig, RunReport } from '@govbid/core';

import { reportFatalError, withSentryLambda } from '../../sentry-lambda';
import { STOP_BEFORE_TIMEOUT_MS } from '@/constants/pipeline';
import { ConfigurationError, errorMessage, isFatal } from '@/helpers/errors';
import { runPipeline, type RunDeps } from '@/helpers/run-controller';
import { resolveRunConfig } from '@/helpers/run-config';
import { createRunDeps } from '@/helpers/run-deps';

const RunPipelineDetailSchema = z
  .object({
    maxOpportunities: z.number().int().positive().optional(),
    lookbackDays: z.number().int().positive().optional(),
  })
  .default({});

export type RunPipelineEvent = EventBridgeEvent<string, unknown>;

/**
 * EventBridge-triggered run. `detail` may override the lookback window and the
 * opportunity cap for this run only.
 */
export const runPipelineHandler = async (
  event: RunPipelineEvent,
  context: Pick<Context, 'getRemainingTimeInMillis'> | undefined,
  depsFactory: (config: RunConfig) => Promise<RunDeps> = createRunDeps,
): Promise<RunReport> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  try {
    const detail = RunPipelineDetailSchema.safeParse(event.detail);
    if (!detail.success) {
      throw new ConfigurationError(`Invalid run event detail: ${detail.error.issues.map((i) => i.message).join('; ')}`);
    }

    const config = resolveRunConfig();
    const deps = await depsFactory(config);

    const remainingMs = context?.getRemainingTimeInMillis();
    if (remainingMs !== undefined) {
      timer = setTimeout(() => {
        console.warn('[run-pipeline] approaching Lambda timeout, no new opportunities will be started');
        controller.abort();
      }, Math.max(0, remainingMs - STOP_BEFORE_TIMEOUT_MS));
    }

    return await runPipeline(config, deps, { ...detail.data, signal: controller.signal });
  } catch (err) {
    console.error(`[run-pipeline] run aborted: ${errorMessage(err)}`);
    if (isFatal(err)) reportFatalError(err, { detail: event.detail });
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const baseHandler = async (event: RunPipelineEvent, context: Context): Promise<RunReport> =>
  runPipelineHandler(event, context);

export const handler = withSentryLambda(middy(baseHandler));
