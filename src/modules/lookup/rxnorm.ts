import { HttpClient } from '../../utils/http';
import type { HttpClientOptions } from '../../utils/http';
import { isRecord, readArray, readNumber, readString } from '../../utils/json';
import { createLogger } from '../../utils/logger';
import { RXNORM_SYSTEM } from './types';
import type { ApproximateMatches, ReferenceCandidate, ReferenceCodeClient } from './types';

const log = createLogger('RXNORM');

export const DEFAULT_RXNORM_BASE_URL = 'https://rxnav.nlm.nih.gov';

const DOSAGE_PATTERN = /\s*\d+\.?\d*\s*(mg|mcg|g|ml|meq|units?|iu)\b\/?(\d*\s*(mg|mcg|g|ml))?/gi;
const FORM_WORDS = [
  'tablet', 'tab', 'capsule', 'cap', 'solution', 'suspension',
  'injection', 'inj', 'cream', 'ointment', 'patch', 'spray',
  'oral', 'iv', 'im', 'po', 'nasal', 'topical', 'ophthalmic',
];
const FORM_PATTERN = new RegExp(`\\b(${FORM_WORDS.join('|')})s?\\b`, 'gi');

/**
 * Strips strength, dose form and route tokens so "Lisinopril 10mg oral tablet"
 * searches as "Lisinopril".
 */
export function normalizeMedicationName(name: string): string {
  return name
    .trim()
    .replace(DOSAGE_PATTERN, '')
    .replace(FORM_PATTERN, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

/** NIH RxNav REST API: rxcui lookup by name and approximate term search. */
export class RxNavClient implements ReferenceCodeClient {
  readonly system = RXNORM_SYSTEM;
  readonly endpoint: string;

  private readonly baseUrl: string;
  private readonly http: HttpClient;

  constructor(baseUrl: string, httpOptions: HttpClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.endpoint = `${this.baseUrl}/REST`;
    this.http = new HttpClient(httpOptions);
  }

  async exactMatch(term: string): Promise<ReferenceCandidate | null> {
    const params = new URLSearchParams({ name: term });
    const data = await this.http.getJson(`${this.baseUrl}/REST/rxcui.json?${params.toString()}`);

    const idGroup = isRecord(data) && isRecord(data.idGroup) ? data.idGroup : {};
    const rxcui = readString(readArray(idGroup.rxnormId)[0]);
    if (!rxcui) {
      log.debug(`No exact match for: ${term}`);
      return null;
    }
    return { code: rxcui, display: term, score: 1.0 };
  }

  async approximateMatch(term: string, maxCandidates: number): Promise<ApproximateMatches> {
    const params = new URLSearchParams({ term, maxEntries: String(maxCandidates) });
    const data = await this.http.getJson(`${this.baseUrl}/REST/approximateTerm.json?${params.toString()}`);

    const group = isRecord(data) && isRecord(data.approximateGroup) ? data.approximateGroup : {};
    const candidates: ReferenceCandidate[] = [];
    for (const entry of readArray(group.candidate)) {
      if (!isRecord(entry)) continue;
      const rxcui = readString(entry.rxcui);
      if (!rxcui) continue;
      const candidate: ReferenceCandidate = { code: rxcui, display: readString(entry.name) ?? term };
      const score = readNumber(entry.score);
      if (score !== null) {
        candidate.score = score;
      }
      candidates.push(candidate);
    }

    log.debug(`Approximate search "${term}" returned ${candidates.length} candidate(s)`);
    return { candidates, total: candidates.length };
  }

  async close(): Promise<void> {
    await this.http.close();
  }
}
