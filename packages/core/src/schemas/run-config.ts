import { z } from 'zod';
import { NaicsCodeSchema } from './capability-profile';
import { ListingSourceSchema } from './opportunity';

/**
 * run-config.ts
 *
 * Everything the pipeline reads from the environment. Parsed once at run start
 * and frozen; nothing re-reads process.env mid-run.
 */

export const DEFAULT_COMPANY_NAICS_CODES = ['541511', '541512', '541519', '541690'];

const blankAsUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const flag = (defaultValue: boolean) =>
  z.preprocess(
    (v) => {
      const value = blankAsUndefined(v);
      return typeof value === 'string' ? value.trim().toLowerCase() : value;
    },
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .optional()
      .transform((v) => (v === undefined ? defaultValue : v === 'true' || v === '1' || v === 'yes')),
  );

const num = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankAsUndefined, schema);

const list = <T extends z.ZodTypeAny>(item: T, defaultValue: string[]) =>
  z.preprocess(
    (v) => {
      const value = blankAsUndefined(v);
      if (typeof value !== 'string') return defaultValue;
      return value.split(',').map((s) => s.trim()).filter(Boolean);
    },
    z.array(item).min(1),
  );

export const RunConfigEnvSchema = z.object({
  MIN_SCORE: num(z.coerce.number().min(0).max(1).default(0.6)),
  REVIEW_MODE: flag(true),
  AUTO_SUBMIT: flag(false),
  MAX_APPLICATIONS_PER_DAY: num(z.coerce.number().int().nonnegative().default(10)),
  LOOKBACK_DAYS: num(z.coerce.number().int().positive().default(7)),
  MAX_OPPORTUNITIES: num(z.coerce.number().int().positive().default(50)),
  MIN_LEAD_TIME_DAYS: num(z.coerce.number().int().nonnegative().default(14)),
  COMPANY_NAME: z.string({ required_error: 'COMPANY_NAME is required' }).trim().min(1, 'COMPANY_NAME is required'),
  COMPANY_DUNS: z.string().trim().default(''),
  COMPANY_NAICS_CODES: list(NaicsCodeSchema, DEFAULT_COMPANY_NAICS_CODES),
  COMPANY_SIGNATORY: z.string().trim().optional(),
  OPPORTUNITY_CONCURRENCY: num(z.coerce.number().int().positive().default(2)),
  LLM_CONCURRENCY: num(z.coerce.number().int().positive().default(5)),
  LLM_MAX_RETRIES: num(z.coerce.number().int().nonnegative().default(3)),
  LLM_TIMEOUT_MS: num(z.coerce.number().int().positive().default(45_000)),
  IO_TIMEOUT_MS: num(z.coerce.number().int().positive().default(30_000)),
  RETRY_BASE_DELAY_MS: num(z.coerce.number().int().nonnegative().default(500)),
  SUBMISSION_MAX_RETRIES: num(z.coerce.number().int().nonnegative().default(2)),
  LISTING_SOURCES: list(ListingSourceSchema, ['SAM_GOV']),
});

export const RunConfigSchema = RunConfigEnvSchema.transform((env) => ({
  minScore: env.MIN_SCORE,
  reviewMode: env.REVIEW_MODE,
  autoSubmit: env.AUTO_SUBMIT,
  maxApplicationsPerDay: env.MAX_APPLICATIONS_PER_DAY,
  lookbackDays: env.LOOKBACK_DAYS,
  maxOpportunities: env.MAX_OPPORTUNITIES,
  minLeadTimeDays: env.MIN_LEAD_TIME_DAYS,
  company: {
    name: env.COMPANY_NAME,
    duns: env.COMPANY_DUNS,
    naicsCodes: env.COMPANY_NAICS_CODES,
    signatory: env.COMPANY_SIGNATORY || undefined,
  },
  opportunityConcurrency: env.OPPORTUNITY_CONCURRENCY,
  llmConcurrency: env.LLM_CONCURRENCY,
  llmMaxRetries: env.LLM_MAX_RETRIES,
  llmTimeoutMs: env.LLM_TIMEOUT_MS,
  ioTimeoutMs: env.IO_TIMEOUT_MS,
  retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
  submissionMaxRetries: env.SUBMISSION_MAX_RETRIES,
  listingSources: env.LISTING_SOURCES,
}));

export type RunConfig = z.output<typeof RunConfigSchema>;

/** The subset the decision gate looks at. */
export type GateConfig = Pick<RunConfig, 'minScore' | 'reviewMode' | 'autoSubmit' | 'maxApplicationsPerDay'>;
