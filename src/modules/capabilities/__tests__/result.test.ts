import { fail, succeed } from '../result';

describe('Capability results', () => {
  test('succeed carries the payload and a timestamp', () => {
    const result = succeed({ code: 'I10' }, { matchType: 'exact' });

    expect(result.success).toBe(true);
    expect(result.payload).toEqual({ code: 'I10' });
    expect(result.error).toBeNull();
    expect(result.metadata.matchType).toBe('exact');
    expect(typeof result.metadata.timestamp).toBe('string');
    expect(Number.isNaN(Date.parse(result.metadata.timestamp))).toBe(false);
  });

  test('fail carries the error and no payload', () => {
    const result = fail('No ICD-10 code found for: xyz', { searchTerm: 'xyz' });

    expect(result.success).toBe(false);
    expect(result.payload).toBeNull();
    expect(result.error).toBe('No ICD-10 code found for: xyz');
    expect(result.metadata.searchTerm).toBe('xyz');
  });

  test('caller metadata cannot override the timestamp', () => {
    const result = fail('boom', { timestamp: 'yesterday' });

    expect(result.metadata.timestamp).not.toBe('yesterday');
  });

  test('results and their metadata are frozen', () => {
    const result = succeed(1, { extra: true });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.metadata)).toBe(true);
  });
});
