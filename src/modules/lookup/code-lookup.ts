import { settleInOrder } from '../capabilities/batch';
import { fail, succeed } from '../capabilities/result';
import type { CapabilityResult } from '../capabilities/types';
import { classifyRequestError, errorMessage, HttpRequestError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import type { Logger } from '../../utils/logger';
import type { CodeLookup, LookupKind, MatchType, ReferenceCandidate, ReferenceCode, ReferenceCodeClient } from './types';

export interface CodeLookupOptions {
  kind: LookupKind;
  name: string;
  description: string;
  /** Human label used in failure messages, e.g. "ICD-10". */
  label: string;
  /** Noun used for the blank-input failure, e.g. "condition". */
  subject: string;
  client: ReferenceCodeClient;
  maxCandidates: number;
  maxConcurrency: number;
  normalize?: (term: string) => string;
}

/**
 * Term-to-code lookup with a three-stage fallback: exact match, approximate
 * match on the normalized term, then approximate match on the term as written.
 */
export class CodeLookupCapability implements CodeLookup {
  readonly kind: LookupKind;
  readonly name: string;
  readonly description: string;

  private readonly log: Logger;

  constructor(private readonly options: CodeLookupOptions) {
    this.kind = options.kind;
    this.name = options.name;
    this.description = options.description;
    this.log = createLogger(`LOOKUP:${options.label}`);
  }

  async execute(term: string): Promise<CapabilityResult<ReferenceCode>> {
    const { label, subject, client } = this.options;
    const searchTerm = term.trim();

    if (!searchTerm) {
      return fail(`Empty ${subject} name provided`);
    }

    const normalizedTerm = this.normalize(searchTerm);

    try {
      const exact = await client.exactMatch(normalizedTerm);
      if (exact) {
        return this.matched(exact, 'exact', searchTerm, { totalMatches: 1 });
      }

      const approximate = await client.approximateMatch(normalizedTerm, this.options.maxCandidates);
      if (approximate.candidates.length > 0) {
        return this.matched(approximate.candidates[0], 'approximate', searchTerm, {
          normalizedTerm,
          totalMatches: approximate.total,
        });
      }

      if (normalizedTerm !== searchTerm) {
        const fallback = await client.approximateMatch(searchTerm, this.options.maxCandidates);
        if (fallback.candidates.length > 0) {
          return this.matched(fallback.candidates[0], 'original', searchTerm, {
            normalizedTerm,
            totalMatches: fallback.total,
          });
        }
      }

      this.log.debug(`No code found for: ${searchTerm}`, { normalizedTerm });
      return fail(`No ${label} code found for: ${searchTerm}`, { searchTerm, normalizedTerm });
    } catch (error) {
      return this.failure(error, searchTerm);
    }
  }

  async executeBatch(terms: readonly string[]): Promise<CapabilityResult<ReferenceCode>[]> {
    if (terms.length === 0) {
      return [];
    }

    this.log.info(`Batch lookup of ${terms.length} term(s)`);
    return settleInOrder(terms, (term) => this.execute(term), {
      concurrency: this.options.maxConcurrency,
      onError: (error, index) =>
        fail(`Batch lookup failed: ${errorMessage(error)}`, { searchTerm: terms[index] }),
    });
  }

  async lookupCode(term: string): Promise<ReferenceCode | null> {
    const result = await this.execute(term);
    return result.success ? result.payload : null;
  }

  async close(): Promise<void> {
    await this.options.client.close();
  }

  private normalize(term: string): string {
    if (!this.options.normalize) {
      return term;
    }
    return this.options.normalize(term) || term;
  }

  private matched(
    candidate: ReferenceCandidate,
    matchType: MatchType,
    searchTerm: string,
    extra: Record<string, unknown>
  ): CapabilityResult<ReferenceCode> {
    const code: ReferenceCode = {
      code: candidate.code,
      system: this.options.client.system,
      display: candidate.display,
      matchType,
    };
    if (candidate.score !== undefined) {
      code.matchScore = candidate.score;
    }

    this.log.debug(`Matched ${searchTerm} -> ${code.code}`, { matchType });
    return succeed(code, {
      ...extra,
      searchTerm,
      matchType,
      matchScore: candidate.score ?? null,
      apiEndpoint: this.options.client.endpoint,
    });
  }

  private failure(error: unknown, searchTerm: string): CapabilityResult<ReferenceCode> {
    const errorKind = classifyRequestError(error);
    this.log.warn(`Lookup failed for: ${searchTerm}`, { errorKind, error: errorMessage(error) });

    if (errorKind === 'timeout') {
      return fail(`API timeout looking up: ${searchTerm}`, { searchTerm, errorKind });
    }
    if (errorKind === 'http_status' && error instanceof HttpRequestError) {
      return fail(`API error (${error.status}): ${error.message}`, { searchTerm, errorKind, status: error.status });
    }
    return fail(`${this.options.label} lookup failed: ${errorMessage(error)}`, { searchTerm, errorKind });
  }
}
