import { classifyRequestError, errorMessage, HttpRequestError, RunDeadlineError } from '../errors';

function codedError(name: string, code: string): Error {
  return Object.assign(new Error('boom'), { name, code });
}

describe('classifyRequestError', () => {
  test('keeps the kind of an HttpRequestError', () => {
    expect(classifyRequestError(new HttpRequestError('HTTP 500', 'http_status', 'https://api.test', 500))).toBe(
      'http_status'
    );
  });

  test('treats aborts and undici timeouts as timeouts', () => {
    expect(classifyRequestError(codedError('TimeoutError', ''))).toBe('timeout');
    expect(classifyRequestError(codedError('AbortError', ''))).toBe('timeout');
    expect(classifyRequestError(codedError('HeadersTimeoutError', 'UND_ERR_HEADERS_TIMEOUT'))).toBe('timeout');
    expect(classifyRequestError(codedError('ConnectTimeoutError', 'UND_ERR_CONNECT_TIMEOUT'))).toBe('timeout');
  });

  test('treats everything else as a network failure', () => {
    expect(classifyRequestError(codedError('Error', 'ECONNREFUSED'))).toBe('network');
    expect(classifyRequestError('socket hang up')).toBe('network');
    expect(classifyRequestError(null)).toBe('network');
  });
});

describe('errorMessage', () => {
  test('reads messages from errors and stringifies anything else', () => {
    expect(errorMessage(new RunDeadlineError(250))).toBe('Run deadline of 250ms exceeded');
    expect(errorMessage(42)).toBe('42');
  });
});
