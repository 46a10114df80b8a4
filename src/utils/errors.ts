export type HttpErrorKind = 'timeout' | 'http_status' | 'network' | 'invalid_response';

export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: HttpErrorKind,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

export class RunDeadlineError extends Error {
  constructor(public readonly deadlineMs: number) {
    super(`Run deadline of ${deadlineMs}ms exceeded`);
    this.name = 'RunDeadlineError';
  }
}

const TIMEOUT_ERROR_NAMES = new Set(['TimeoutError', 'AbortError']);
const TIMEOUT_ERROR_CODES = new Set([
  'UND_ERR_ABORTED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Maps anything thrown by a network call onto one of the reported failure kinds.
 * Requests are only ever aborted by their own timeout signal, so aborts count as timeouts.
 */
export function classifyRequestError(error: unknown): HttpErrorKind {
  if (error instanceof HttpRequestError) {
    return error.kind;
  }
  if (typeof error === 'object' && error !== null) {
    const name = 'name' in error ? String(error.name) : '';
    const code = 'code' in error ? String(error.code) : '';
    if (TIMEOUT_ERROR_NAMES.has(name) || TIMEOUT_ERROR_CODES.has(code)) {
      return 'timeout';
    }
  }
  return 'network';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
