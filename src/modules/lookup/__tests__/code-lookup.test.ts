import { CodeLookupCapability } from '../code-lookup';
import { normalizeMedicationName } from '../rxnorm';
import type { ApproximateMatches, ReferenceCandidate, ReferenceCodeClient } from '../types';
import { HttpRequestError } from '../../../utils/errors';

class FakeClient implements ReferenceCodeClient {
  readonly system = 'http://example.org/codes';
  readonly endpoint = 'http://codes.test/search';

  exactMatch = jest.fn(async (_term: string): Promise<ReferenceCandidate | null> => null);
  approximateMatch = jest.fn(
    async (_term: string, _max: number): Promise<ApproximateMatches> => ({ candidates: [], total: 0 })
  );
  close = jest.fn(async () => undefined);
}

function createLookup(client: FakeClient, normalize?: (term: string) => string): CodeLookupCapability {
  return new CodeLookupCapability({
    kind: 'medication-lookup',
    name: 'test_lookup',
    description: 'test lookup',
    label: 'TEST',
    subject: 'medication',
    client,
    maxCandidates: 3,
    maxConcurrency: 2,
    normalize,
  });
}

describe('CodeLookupCapability', () => {
  test('fails on a blank term without calling the client', async () => {
    const client = new FakeClient();
    const lookup = createLookup(client);

    const result = await lookup.execute('   ');

    expect(result.success).toBe(false);
    expect(result.error).toBe('Empty medication name provided');
    expect(client.exactMatch).not.toHaveBeenCalled();
    expect(client.approximateMatch).not.toHaveBeenCalled();
  });

  test('returns an exact match without an approximate search', async () => {
    const client = new FakeClient();
    client.exactMatch.mockResolvedValue({ code: '29046', display: 'Lisinopril', score: 1 });
    const lookup = createLookup(client);

    const result = await lookup.execute('Lisinopril');

    expect(result.success).toBe(true);
    expect(result.payload).toEqual({
      code: '29046',
      system: 'http://example.org/codes',
      display: 'Lisinopril',
      matchType: 'exact',
      matchScore: 1,
    });
    expect(result.metadata.searchTerm).toBe('Lisinopril');
    expect(client.approximateMatch).not.toHaveBeenCalled();
  });

  test('falls back to the top approximate candidate for the normalized term', async () => {
    const client = new FakeClient();
    client.approximateMatch.mockResolvedValue({
      candidates: [
        { code: '29046', display: 'lisinopril', score: 8.5 },
        { code: '203644', display: 'lisinopril 10 MG', score: 6 },
      ],
      total: 2,
    });
    const lookup = createLookup(client, normalizeMedicationName);

    const result = await lookup.execute('Lisinopril 10mg tablet');

    expect(client.exactMatch).toHaveBeenCalledWith('Lisinopril');
    expect(client.approximateMatch).toHaveBeenCalledWith('Lisinopril', 3);
    expect(result.success).toBe(true);
    expect(result.payload?.code).toBe('29046');
    expect(result.payload?.matchType).toBe('approximate');
    expect(result.metadata.normalizedTerm).toBe('Lisinopril');
    expect(result.metadata.totalMatches).toBe(2);
  });

  test('retries with the original term when normalization changed it', async () => {
    const client = new FakeClient();
    client.approximateMatch.mockImplementation(async (term: string) =>
      term === 'Zestoretic 20mg'
        ? { candidates: [{ code: '213482', display: 'Zestoretic' }], total: 1 }
        : { candidates: [], total: 0 }
    );
    const lookup = createLookup(client, normalizeMedicationName);

    const result = await lookup.execute('Zestoretic 20mg');

    expect(client.approximateMatch.mock.calls.map((call) => call[0])).toEqual(['Zestoretic', 'Zestoretic 20mg']);
    expect(result.success).toBe(true);
    expect(result.payload?.matchType).toBe('original');
    expect(result.payload?.matchScore).toBeUndefined();
  });

  test('does not repeat the approximate search when the term was already normal', async () => {
    const client = new FakeClient();
    const lookup = createLookup(client, normalizeMedicationName);

    const result = await lookup.execute('unobtainium');

    expect(client.approximateMatch).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    expect(result.error).toBe('No TEST code found for: unobtainium');
    expect(result.metadata.normalizedTerm).toBe('unobtainium');
  });

  test('keeps the original term when normalization leaves nothing', async () => {
    const client = new FakeClient();
    const lookup = createLookup(client, normalizeMedicationName);

    await lookup.execute('10mg tablet');

    expect(client.exactMatch).toHaveBeenCalledWith('10mg tablet');
  });

  test.each([
    [new HttpRequestError('Request timed out after 10ms', 'timeout', 'http://codes.test'), 'API timeout looking up: aspirin', 'timeout'],
    [new HttpRequestError('HTTP 503: down', 'http_status', 'http://codes.test', 503), 'API error (503): HTTP 503: down', 'http_status'],
    [new HttpRequestError('Request failed: ECONNRESET', 'network', 'http://codes.test'), 'TEST lookup failed: Request failed: ECONNRESET', 'network'],
    [new HttpRequestError('Invalid JSON response: x', 'invalid_response', 'http://codes.test'), 'TEST lookup failed: Invalid JSON response: x', 'invalid_response'],
  ])('reports %s as a distinct failure', async (error, message, kind) => {
    const client = new FakeClient();
    client.exactMatch.mockRejectedValue(error);
    const lookup = createLookup(client);

    const result = await lookup.execute('aspirin');

    expect(result.success).toBe(false);
    expect(result.error).toBe(message);
    expect(result.metadata.errorKind).toBe(kind);
  });

  test('executeBatch keeps order and isolates failures', async () => {
    const client = new FakeClient();
    client.exactMatch.mockImplementation(async (term: string) => {
      if (term === 'metformin') {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return { code: '6809', display: 'metformin' };
      }
      if (term === 'broken') {
        throw new HttpRequestError('Request timed out after 10ms', 'timeout', 'http://codes.test');
      }
      return { code: '1191', display: 'aspirin' };
    });
    const lookup = createLookup(client);

    const results = await lookup.executeBatch(['metformin', 'broken', 'aspirin']);

    expect(results).toHaveLength(3);
    expect(results[0].payload?.code).toBe('6809');
    expect(results[1].success).toBe(false);
    expect(results[1].error).toBe('API timeout looking up: broken');
    expect(results[2].payload?.code).toBe('1191');
  });

  test('executeBatch of nothing makes no calls', async () => {
    const client = new FakeClient();
    const lookup = createLookup(client);

    expect(await lookup.executeBatch([])).toEqual([]);
    expect(client.exactMatch).not.toHaveBeenCalled();
  });

  test('lookupCode returns the code or null', async () => {
    const client = new FakeClient();
    client.exactMatch.mockImplementation(async (term: string) =>
      term === 'aspirin' ? { code: '1191', display: 'aspirin' } : null
    );
    const lookup = createLookup(client);

    expect((await lookup.lookupCode('aspirin'))?.code).toBe('1191');
    expect(await lookup.lookupCode('nothing')).toBeNull();
  });

  test('close closes the client', async () => {
    const client = new FakeClient();
    const lookup = createLookup(client);

    await lookup.close();

    expect(client.close).toHaveBeenCalledTimes(1);
  });
});

describe('normalizeMedicationName', () => {
  test.each([
    ['Lisinopril 10mg', 'Lisinopril'],
    ['Amoxicillin 500 mg capsules', 'Amoxicillin'],
    ['amoxicillin 250mg/5ml oral suspension', 'amoxicillin'],
    ['Insulin glargine 10 units', 'Insulin glargine'],
    ['Timolol ophthalmic solution', 'Timolol'],
    ['metformin', 'metformin'],
  ])('%s -> %s', (input, expected) => {
    expect(normalizeMedicationName(input)).toBe(expected);
  });
});
