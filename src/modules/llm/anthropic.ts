import { HttpClient } from '../../utils/http';
import { HttpRequestError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { isTransientHttpError, withRetry } from '../../utils/retry';
import { anthropicMessagesResponseSchema } from './types';
import type { AnthropicMessagesRequest, TextGenerator, TextGeneratorOptions } from './types';

const log = createLogger('LLM:ANTHROPIC');

const ANTHROPIC_VERSION = '2023-06-01';
const MAX_TOKENS = 4096;

/** Anthropic Messages API. */
export class AnthropicGenerator implements TextGenerator {
  readonly provider = 'anthropic';
  readonly model: string;

  private readonly http: HttpClient;
  private readonly url: string;

  constructor(private readonly options: TextGeneratorOptions) {
    this.model = options.model;
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/v1/messages`;
    this.http = new HttpClient({ timeoutMs: options.timeoutMs, dispatcher: options.dispatcher });
  }

  async generate(prompt: string, systemPrompt?: string): Promise<string> {
    const requestBody: AnthropicMessagesRequest = {
      model: this.model,
      max_tokens: MAX_TOKENS,
      messages: [{ role: 'user', content: prompt }],
      temperature: this.options.temperature ?? 0,
    };
    if (systemPrompt) {
      requestBody.system = systemPrompt;
    }

    log.info(`messages request, model: ${this.model}`);
    const startTime = Date.now();

    const data = await withRetry(
      () =>
        this.http.postJson(this.url, requestBody, {
          'x-api-key': this.options.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        }),
      {
        maxAttempts: this.options.maxAttempts,
        backoffMs: this.options.retryBackoffMs ?? 1000,
        isRetryable: isTransientHttpError,
        label: 'messages',
      }
    );

    const parsed = anthropicMessagesResponseSchema.safeParse(data);
    if (!parsed.success) {
      log.error('Unexpected messages response shape', { issues: parsed.error.issues.length });
      throw new HttpRequestError('Messages response is missing content', 'invalid_response', this.url);
    }

    const content = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text || '')
      .join('');
    log.info(`messages completed in ${Date.now() - startTime}ms, response length: ${content.length}`);
    return content;
  }

  async close(): Promise<void> {
    await this.http.close();
  }
}
