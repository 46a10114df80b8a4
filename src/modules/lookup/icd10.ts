import { HttpClient } from '../../utils/http';
import type { HttpClientOptions } from '../../utils/http';
import { HttpRequestError } from '../../utils/errors';
import { readArray, readNumber, readString } from '../../utils/json';
import { createLogger } from '../../utils/logger';
import { ICD10_SYSTEM } from './types';
import type { ApproximateMatches, ReferenceCandidate, ReferenceCodeClient } from './types';

const log = createLogger('ICD10');

export const DEFAULT_ICD10_BASE_URL = 'https://clinicaltables.nlm.nih.gov';
const SEARCH_PATH = '/api/icd10cm/v3/search';

/**
 * NIH ClinicalTables ICD-10-CM search.
 * Response shape: [totalCount, [codes], extra, [[code, name], ...]]
 */
export class ClinicalTablesIcd10Client implements ReferenceCodeClient {
  readonly system = ICD10_SYSTEM;
  readonly endpoint: string;

  private readonly http: HttpClient;

  constructor(baseUrl: string, httpOptions: HttpClientOptions) {
    this.endpoint = `${baseUrl.replace(/\/+$/, '')}${SEARCH_PATH}`;
    this.http = new HttpClient(httpOptions);
  }

  async exactMatch(term: string): Promise<ReferenceCandidate | null> {
    const { candidates } = await this.search(term, 5);
    const wanted = term.toLowerCase();
    const match = candidates.find(
      (c) => c.display.toLowerCase() === wanted || c.code.toLowerCase() === wanted
    );
    return match ? { code: match.code, display: match.display, score: 1.0 } : null;
  }

  async approximateMatch(term: string, maxCandidates: number): Promise<ApproximateMatches> {
    const { candidates, total } = await this.search(term, maxCandidates);
    // Ambiguous searches rank lower than a unique hit.
    const score = total === 1 ? 1.0 : 0.9;
    return {
      candidates: candidates.map((c) => ({ ...c, score })),
      total,
    };
  }

  async close(): Promise<void> {
    await this.http.close();
  }

  private async search(term: string, maxList: number): Promise<ApproximateMatches> {
    const params = new URLSearchParams({ terms: term, maxList: String(maxList), sf: 'code,name' });
    const url = `${this.endpoint}?${params.toString()}`;
    const data = await this.http.getJson(url);

    if (!Array.isArray(data)) {
      throw new HttpRequestError('Unexpected ICD-10 response shape', 'invalid_response', url);
    }
    if (data.length < 4) {
      return { candidates: [], total: 0 };
    }

    const total = readNumber(data[0]) ?? 0;
    const codes = readArray(data[1]);
    const rows = readArray(data[3]);

    const candidates: ReferenceCandidate[] = [];
    codes.forEach((rawCode, i) => {
      const code = readString(rawCode);
      if (!code) return;
      const row = readArray(rows[i]);
      const display = readString(row[1]) ?? readString(row[0]) ?? code;
      candidates.push({ code, display });
    });

    log.debug(`Search "${term}" returned ${candidates.length} of ${total}`);
    return { candidates, total };
  }
}
