import { HttpClient } from '../../utils/http';
import { HttpRequestError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { isTransientHttpError, withRetry } from '../../utils/retry';
import { chatCompletionResponseSchema } from './types';
import type { ChatCompletionRequest, ChatCompletionResponse, Message, TextGenerator, TextGeneratorOptions } from './types';

const log = createLogger('LLM:CHAT');

export function extractContent(response: ChatCompletionResponse): string {
  return response.choices[0]?.message.content || '';
}

/** OpenAI-compatible `/v1/chat/completions` endpoint, e.g. a LiteLLM gateway. */
export class ChatCompletionsGenerator implements TextGenerator {
  readonly provider = 'openai';
  readonly model: string;

  private readonly http: HttpClient;
  private readonly url: string;

  constructor(private readonly options: TextGeneratorOptions) {
    this.model = options.model;
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/v1/chat/completions`;
    this.http = new HttpClient({ timeoutMs: options.timeoutMs, dispatcher: options.dispatcher });
  }

  async generate(prompt: string, systemPrompt?: string): Promise<string> {
    const messages: Message[] = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const requestBody: ChatCompletionRequest = {
      model: this.model,
      messages,
      temperature: this.options.temperature ?? 0,
    };

    log.info(`chatCompletion request, model: ${this.model}`);
    const startTime = Date.now();

    const data = await withRetry(
      () => this.http.postJson(this.url, requestBody, { Authorization: `Bearer ${this.options.apiKey}` }),
      {
        maxAttempts: this.options.maxAttempts,
        backoffMs: this.options.retryBackoffMs ?? 1000,
        isRetryable: isTransientHttpError,
        label: 'chatCompletion',
      }
    );

    const parsed = chatCompletionResponseSchema.safeParse(data);
    if (!parsed.success) {
      log.error('Unexpected chat completion response shape', { issues: parsed.error.issues.length });
      throw new HttpRequestError('Chat completion response is missing choices', 'invalid_response', this.url);
    }

    const content = extractContent(parsed.data);
    log.info(`chatCompletion completed in ${Date.now() - startTime}ms, response length: ${content.length}`);
    return content;
  }

  async close(): Promise<void> {
    await this.http.close();
  }
}
