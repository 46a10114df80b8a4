import { Agent, request } from 'undici';
import type { Dispatcher } from 'undici';
import { classifyRequestError, errorMessage, HttpRequestError } from './errors';
import { createLogger } from './logger';

const log = createLogger('HTTP');

export interface HttpClientOptions {
  timeoutMs: number;
  maxConnections?: number;
  /** Externally owned dispatcher (e.g. a MockAgent); never closed by the client. */
  dispatcher?: Dispatcher;
}

/**
 * JSON-over-HTTP transport with one owned connection pool.
 * The pool is created on first use and re-created after `close()`.
 */
export class HttpClient {
  private ownedAgent: Agent | null = null;

  constructor(private readonly options: HttpClientOptions) {}

  private getDispatcher(): Dispatcher {
    if (this.options.dispatcher) {
      return this.options.dispatcher;
    }
    if (!this.ownedAgent) {
      this.ownedAgent = new Agent({
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
        connections: this.options.maxConnections || 10,
        pipelining: 1,
      });
      log.debug('HTTP agent initialized', { maxConnections: this.options.maxConnections || 10 });
    }
    return this.ownedAgent;
  }

  async getJson(url: string, headers: Record<string, string> = {}): Promise<unknown> {
    return this.send(url, 'GET', undefined, headers);
  }

  async postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<unknown> {
    return this.send(url, 'POST', JSON.stringify(body), { 'content-type': 'application/json', ...headers });
  }

  private async send(
    url: string,
    method: 'GET' | 'POST',
    body: string | undefined,
    headers: Record<string, string>
  ): Promise<unknown> {
    const { timeoutMs } = this.options;
    let rawBody: string;
    let statusCode: number;

    try {
      const response = await request(url, {
        method,
        body,
        headers: { accept: 'application/json', ...headers },
        dispatcher: this.getDispatcher(),
        signal: AbortSignal.timeout(timeoutMs),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });
      statusCode = response.statusCode;
      rawBody = await response.body.text();
    } catch (error) {
      const kind = classifyRequestError(error);
      const message = kind === 'timeout'
        ? `Request timed out after ${timeoutMs}ms`
        : `Request failed: ${errorMessage(error)}`;
      log.warn(message, { url, method });
      throw new HttpRequestError(message, kind, url);
    }

    if (statusCode < 200 || statusCode >= 300) {
      log.warn(`Unexpected status ${statusCode}`, { url, method, body: rawBody.slice(0, 200) });
      throw new HttpRequestError(
        `HTTP ${statusCode}: ${rawBody.slice(0, 200)}`,
        'http_status',
        url,
        statusCode
      );
    }

    try {
      return JSON.parse(rawBody);
    } catch (parseError) {
      log.warn('Response body is not valid JSON', { url, error: errorMessage(parseError) });
      throw new HttpRequestError(`Invalid JSON response: ${errorMessage(parseError)}`, 'invalid_response', url, statusCode);
    }
  }

  async close(): Promise<void> {
    if (this.ownedAgent) {
      const agent = this.ownedAgent;
      this.ownedAgent = null;
      log.debug('Closing HTTP agent');
      await agent.close();
    }
  }
}
