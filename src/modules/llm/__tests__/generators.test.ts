import { MockAgent } from 'undici';
import { AnthropicGenerator } from '../anthropic';
import { ChatCompletionsGenerator } from '../chat-completions';
import { createTextGenerator } from '../index';
import { HttpRequestError } from '../../../utils/errors';

const ORIGIN = 'https://llm.test';

function bodyOf(body: unknown): Record<string, unknown> {
  return typeof body === 'string' ? JSON.parse(body) : {};
}

describe('ChatCompletionsGenerator', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  function createGenerator(maxAttempts = 1): ChatCompletionsGenerator {
    return new ChatCompletionsGenerator({
      baseUrl: `${ORIGIN}/`,
      apiKey: 'test-secret',
      model: 'test-model',
      timeoutMs: 1000,
      maxAttempts,
      retryBackoffMs: 0,
      dispatcher: mockAgent,
    });
  }

  test('posts the prompt and returns the first choice', async () => {
    let sent: Record<string, unknown> = {};
    mockAgent
      .get(ORIGIN)
      .intercept({
        path: '/v1/chat/completions',
        method: 'POST',
        headers: { authorization: 'Bearer test-secret' },
        body: (body) => {
          sent = bodyOf(body);
          return true;
        },
      })
      .reply(200, {
        id: 'cmpl-1',
        choices: [{ index: 0, message: { role: 'assistant', content: '{"conditions": []}' }, finish_reason: 'stop' }],
      });

    const content = await createGenerator().generate('Extract this', 'You are a clinician');

    expect(content).toBe('{"conditions": []}');
    expect(sent.model).toBe('test-model');
    expect(sent.messages).toEqual([
      { role: 'system', content: 'You are a clinician' },
      { role: 'user', content: 'Extract this' },
    ]);
  });

  test('retries a 503 and succeeds on the next attempt', async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: '/v1/chat/completions', method: 'POST' }).reply(503, 'overloaded');
    pool
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(200, { choices: [{ message: { content: 'second time lucky' } }] });

    const content = await createGenerator(3).generate('hello');

    expect(content).toBe('second time lucky');
  });

  test('does not retry a 401', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(401, 'bad key');

    await expect(createGenerator(3).generate('hello')).rejects.toMatchObject({
      kind: 'http_status',
      status: 401,
    });
  });

  test('rejects a response without choices', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(200, { choices: [] });

    await expect(createGenerator().generate('hello')).rejects.toBeInstanceOf(HttpRequestError);
  });
});

describe('AnthropicGenerator', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  test('sends the api key and joins text blocks', async () => {
    let sent: Record<string, unknown> = {};
    mockAgent
      .get(ORIGIN)
      .intercept({
        path: '/v1/messages',
        method: 'POST',
        headers: { 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' },
        body: (body) => {
          sent = bodyOf(body);
          return true;
        },
      })
      .reply(200, {
        content: [
          { type: 'text', text: '{"patient_name": ' },
          { type: 'text', text: '"Jane Doe"}' },
        ],
        stop_reason: 'end_turn',
      });

    const generator = new AnthropicGenerator({
      baseUrl: ORIGIN,
      apiKey: 'test-secret',
      model: 'test-model',
      timeoutMs: 1000,
      maxAttempts: 1,
      dispatcher: mockAgent,
    });
    const content = await generator.generate('Extract this');

    expect(content).toBe('{"patient_name": "Jane Doe"}');
    expect(sent.max_tokens).toBe(4096);
    expect(sent.messages).toEqual([{ role: 'user', content: 'Extract this' }]);
    expect(sent.system).toBeUndefined();
  });
});

describe('createTextGenerator', () => {
  const base = {
    LLM_MODEL: 'test-model',
    LLM_BASE_URL: ORIGIN,
    LLM_API_KEY: 'test-secret',
    LLM_TIMEOUT_MS: 1000,
    LLM_MAX_ATTEMPTS: 1,
  };

  test('selects the provider from config', () => {
    expect(createTextGenerator({ ...base, LLM_PROVIDER: 'openai' })).toBeInstanceOf(ChatCompletionsGenerator);
    expect(createTextGenerator({ ...base, LLM_PROVIDER: 'anthropic' })).toBeInstanceOf(AnthropicGenerator);
  });

  test('exposes provider and model', () => {
    const generator = createTextGenerator({ ...base, LLM_PROVIDER: 'anthropic' });

    expect(generator.provider).toBe('anthropic');
    expect(generator.model).toBe('test-model');
  });
});
