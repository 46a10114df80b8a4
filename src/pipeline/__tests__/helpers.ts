import { fail, succeed } from '../../modules/capabilities/result';
import type { CapabilityResult } from '../../modules/capabilities/types';
import { emptyRawExtraction } from '../../modules/extraction/types';
import type { RawExtraction } from '../../modules/extraction/types';
import type { LookupKind, ReferenceCode } from '../../modules/lookup/types';

export function rawExtraction(overrides: Partial<RawExtraction> = {}): RawExtraction {
  return { ...emptyRawExtraction(), ...overrides };
}

export function createFakeExtractor(reply: () => Promise<CapabilityResult<RawExtraction>>) {
  return {
    kind: 'extraction' as const,
    name: 'entity_extraction',
    description: 'fake extractor',
    execute: jest.fn(async (_text: string) => reply()),
    close: jest.fn(async () => undefined),
  };
}

export function extractorReturning(raw: RawExtraction) {
  return createFakeExtractor(async () => succeed(raw));
}

export function createFakeLookup(kind: LookupKind, system: string, codes: Record<string, string>) {
  const execute = jest.fn(async (term: string) => {
    const code = codes[term];
    if (!code) {
      return fail(`No code found for: ${term}`);
    }
    const payload: ReferenceCode = { code, system, display: term, matchType: 'exact' };
    return succeed(payload);
  });

  return {
    kind,
    name: `${kind}-fake`,
    description: 'fake lookup',
    execute,
    executeBatch: jest.fn(async (terms: readonly string[]) => Promise.all(terms.map((term) => execute(term)))),
    lookupCode: jest.fn(async (term: string) => {
      const result = await execute(term);
      return result.success ? result.payload : null;
    }),
    close: jest.fn(async () => undefined),
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
