import { MockAgent } from 'undici';
import { HttpRequestError } from '../errors';
import { HttpClient } from '../http';

const ORIGIN = 'https://service.test';

describe('HttpClient', () => {
  let mockAgent: MockAgent;
  let client: HttpClient;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    client = new HttpClient({ timeoutMs: 1000, dispatcher: mockAgent });
  });

  afterEach(async () => {
    await client.close();
    await mockAgent.close();
  });

  test('parses JSON bodies', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/items?id=1', method: 'GET' }).reply(200, { id: 1 });

    await expect(client.getJson(`${ORIGIN}/items?id=1`)).resolves.toEqual({ id: 1 });
  });

  test('posts a JSON body with a content type', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({
        path: '/items',
        method: 'POST',
        headers: { 'content-type': 'application/json', 'x-api-key': 'test-secret' },
        body: JSON.stringify({ name: 'widget' }),
      })
      .reply(201, { created: true });

    await expect(client.postJson(`${ORIGIN}/items`, { name: 'widget' }, { 'x-api-key': 'test-secret' })).resolves.toEqual({
      created: true,
    });
  });

  test('reports a non-2xx status with the start of the body', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/items', method: 'GET' }).reply(404, 'not here');

    await expect(client.getJson(`${ORIGIN}/items`)).rejects.toMatchObject({
      kind: 'http_status',
      status: 404,
      message: 'HTTP 404: not here',
    });
  });

  test('reports a body that is not JSON', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/items', method: 'GET' }).reply(200, '<html>');

    const error = await client.getJson(`${ORIGIN}/items`).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpRequestError);
    expect(error).toMatchObject({ kind: 'invalid_response', url: `${ORIGIN}/items` });
  });

  test('reports connection failures as network errors', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/items', method: 'GET' }).replyWithError(new Error('connection reset'));

    await expect(client.getJson(`${ORIGIN}/items`)).rejects.toMatchObject({
      kind: 'network',
      message: 'Request failed: connection reset',
    });
  });

  test('cuts off a slow response at the call timeout', async () => {
    const slow = new HttpClient({ timeoutMs: 30, dispatcher: mockAgent });
    mockAgent.get(ORIGIN).intercept({ path: '/slow', method: 'GET' }).reply(200, { ok: true }).delay(300);

    const error = await slow.getJson(`${ORIGIN}/slow`).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpRequestError);
    expect(error).toMatchObject({ kind: 'timeout', message: 'Request timed out after 30ms', url: `${ORIGIN}/slow` });
  });
});
