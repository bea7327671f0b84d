import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { LlmError } from './errors';
import { parseModelJson } from './json';
import type { LlmRequest, LlmService } from './llm';

const RATE_LIMIT_ERRORS = new Set(['ThrottlingException', 'TooManyRequestsException', 'ServiceQuotaExceededException']);
const TIMEOUT_ERRORS = new Set(['AbortError', 'TimeoutError', 'ModelTimeoutException', 'RequestTimeout']);

type BedrockResponse = {
  content?: Array<{ text?: string }>;
  output_text?: string;
  completion?: string;
};

const isBedrockResponse = (value: unknown): value is BedrockResponse =>
  typeof value === 'object' && value !== null;

export const extractModelText = (raw: string): string => {
  try {
    const json: unknown = JSON.parse(raw);
    if (!isBedrockResponse(json)) return raw;
    const contentText = Array.isArray(json.content)
      ? json.content.map((c) => c?.text).filter(Boolean).join('\n')
      : '';
    return contentText || json.output_text || json.completion || raw;
  } catch {
    return raw;
  }
};

export const classifyBedrockError = (err: unknown): LlmError => {
  if (err instanceof LlmError) return err;
  const name = err instanceof Error ? err.name : '';
  const message = err instanceof Error ? err.message : String(err);
  if (RATE_LIMIT_ERRORS.has(name)) return new LlmError('rate_limit', message, { cause: err });
  if (TIMEOUT_ERRORS.has(name)) return new LlmError('timeout', message, { cause: err });
  return new LlmError('unavailable', `${name || 'Error'}: ${message}`, { cause: err });
};

/** Claude on Amazon Bedrock, Anthropic messages format. */
export class BedrockLlmService implements LlmService {
  constructor(
    private readonly modelId: string,
    private readonly client: BedrockRuntimeClient = new BedrockRuntimeClient({}),
  ) {}

  async completeJson<T>(request: LlmRequest<T>): Promise<T> {
    const { system, user, schema, maxTokens = 2000, temperature = 0.2, signal } = request;

    const body = {
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: maxTokens,
      temperature,
      system,
      messages: [{ role: 'user', content: [{ type: 'text', text: user }] }],
    };

    let responseBody: Uint8Array;
    try {
      const res = await this.client.send(
        new InvokeModelCommand({
          modelId: this.modelId,
          contentType: 'application/json',
          accept: 'application/json',
          body: JSON.stringify(body),
        }),
        { abortSignal: signal },
      );
      responseBody = res.body;
    } catch (err) {
      throw classifyBedrockError(err);
    }

    const text = extractModelText(new TextDecoder('utf-8').decode(responseBody));
    try {
      return parseModelJson(text, schema);
    } catch (err) {
      console.error(`[bedrock] ${request.purpose} raw output:`, text);
      throw err;
    }
  }
}
