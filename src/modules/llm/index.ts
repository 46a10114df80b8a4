import type { Dispatcher } from 'undici';
import type { Config } from '../../config/index';
import { AnthropicGenerator } from './anthropic';
import { ChatCompletionsGenerator } from './chat-completions';
import type { TextGenerator } from './types';

export * from './types';
export { ChatCompletionsGenerator, extractContent } from './chat-completions';
export { AnthropicGenerator } from './anthropic';

type LlmConfig = Pick<
  Config,
  'LLM_PROVIDER' | 'LLM_MODEL' | 'LLM_BASE_URL' | 'LLM_API_KEY' | 'LLM_TIMEOUT_MS' | 'LLM_MAX_ATTEMPTS'
>;

export function createTextGenerator(config: LlmConfig, dispatcher?: Dispatcher): TextGenerator {
  const options = {
    baseUrl: config.LLM_BASE_URL,
    apiKey: config.LLM_API_KEY,
    model: config.LLM_MODEL,
    timeoutMs: config.LLM_TIMEOUT_MS,
    maxAttempts: config.LLM_MAX_ATTEMPTS,
    dispatcher,
  };

  switch (config.LLM_PROVIDER) {
    case 'anthropic':
      return new AnthropicGenerator(options);
    case 'openai':
      return new ChatCompletionsGenerator(options);
  }
}
