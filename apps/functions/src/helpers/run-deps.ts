import type { ListingSource, RunConfig } from '@govbid/core';
import { DibbsScraper } from '@/adapters/dibbs-scraper';
import { S3DocumentExtractor } from '@/adapters/s3-document-extractor';
import { SamGovScraper } from '@/adapters/sam-gov-scraper';
import { SesPortalAdapter } from '@/adapters/ses-portal-adapter';
import type { ListingScraper } from '@/types/collaborators';
import { BedrockLlmService } from './bedrock';
import { requireEnv } from './env';
import { LlmGateway } from './llm';
import type { RunDeps } from './run-controller';
import { createDynamoRunStore } from './run-store';
import { listObjectKeys } from './s3';

const DEFAULT_MODEL_ID = 'anthropic.claude-3-haiku-20240307-v1:0';

export const createScraper = (source: ListingSource, config: Pick<RunConfig, 'company'>): ListingScraper => {
  const naicsCodes = config.company.naicsCodes;
  switch (source) {
    case 'SAM_GOV':
      return new SamGovScraper({
        baseUrl: requireEnv('SAM_OPPS_BASE_URL', 'https://api.sam.gov'),
        apiKey: requireEnv('SAM_GOV_API_KEY'),
        naicsCodes,
      });
    case 'DIBBS':
      return new DibbsScraper({
        baseUrl: requireEnv('DIBBS_BASE_URL'),
        apiKey: requireEnv('DIBBS_API_KEY'),
        naicsCodes,
      });
  }
};

/** Production collaborators, wired from environment variables. */
export async function createRunDeps(config: RunConfig): Promise<RunDeps> {
  const bucket = requireEnv('DOCUMENTS_BUCKET');
  const prefix = requireEnv('COMPANY_DOCUMENTS_PREFIX', 'company/');

  const llm = new LlmGateway(new BedrockLlmService(requireEnv('BEDROCK_MODEL_ID', DEFAULT_MODEL_ID)), {
    concurrency: config.llmConcurrency,
    timeoutMs: config.llmTimeoutMs,
    maxRetries: config.llmMaxRetries,
    baseDelayMs: config.retryBaseDelayMs,
  });

  return {
    store: createDynamoRunStore(),
    llm,
    extractor: new S3DocumentExtractor(bucket),
    documentPaths: await listObjectKeys(bucket, prefix),
    scrapers: config.listingSources.map((source) => createScraper(source, config)),
    portal: new SesPortalAdapter({
      from: requireEnv('SUBMISSION_EMAIL_FROM'),
      to: requireEnv('SUBMISSION_EMAIL_TO'),
    }),
  };
}
