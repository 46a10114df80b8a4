import type { BatchCapability, CapabilityKind, Closeable } from '../capabilities/types';

export const ICD10_SYSTEM = 'http://hl7.org/fhir/sid/icd-10-cm';
export const RXNORM_SYSTEM = 'http://www.nlm.nih.gov/research/umls/rxnorm';

export type MatchType = 'exact' | 'approximate' | 'original';

export interface ReferenceCode {
  code: string;
  system: string;
  display: string;
  matchType: MatchType;
  matchScore?: number;
}

export interface ReferenceCandidate {
  code: string;
  display: string;
  score?: number;
}

export interface ApproximateMatches {
  candidates: ReferenceCandidate[];
  total: number;
}

/** Network adapter for one coding service. */
export interface ReferenceCodeClient extends Closeable {
  readonly system: string;
  readonly endpoint: string;
  exactMatch(term: string): Promise<ReferenceCandidate | null>;
  approximateMatch(term: string, maxCandidates: number): Promise<ApproximateMatches>;
}

export type LookupKind = Extract<CapabilityKind, 'diagnosis-lookup' | 'medication-lookup'>;

export interface CodeLookup extends BatchCapability<string, ReferenceCode>, Closeable {
  readonly kind: LookupKind;
  lookupCode(term: string): Promise<ReferenceCode | null>;
}
