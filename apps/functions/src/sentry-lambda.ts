import * as Sentry from '@sentry/serverless';

Sentry.AWSLambda.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.SENTRY_ENVIRONMENT || process.env.STAGE || 'dev',
  tracesSampleRate: 1.0,
});

Sentry.setTag('service', 'bid-pipeline');

export const withSentryLambda = Sentry.AWSLambda.wrapHandler;

/** For run-aborting errors. Per-opportunity failures belong in the run report, not here. */
export const reportFatalError = (err: unknown, extras: Record<string, unknown> = {}): void => {
  Sentry.withScope((scope) => {
    scope.setTag('fatal', 'true');
    scope.setExtras(extras);
    Sentry.captureException(err);
  });
};
