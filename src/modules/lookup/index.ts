import type { Dispatcher } from 'undici';
import type { Config } from '../../config/index';
import { CodeLookupCapability } from './code-lookup';
import { ClinicalTablesIcd10Client } from './icd10';
import { normalizeMedicationName, RxNavClient } from './rxnorm';
import type { CodeLookup } from './types';

export * from './types';
export { CodeLookupCapability } from './code-lookup';
export type { CodeLookupOptions } from './code-lookup';
export { ClinicalTablesIcd10Client, DEFAULT_ICD10_BASE_URL } from './icd10';
export { RxNavClient, DEFAULT_RXNORM_BASE_URL, normalizeMedicationName } from './rxnorm';

type LookupConfig = Pick<
  Config,
  'ICD10_BASE_URL' | 'RXNORM_BASE_URL' | 'LOOKUP_TIMEOUT_MS' | 'LOOKUP_MAX_CANDIDATES' | 'LOOKUP_MAX_CONCURRENCY'
>;

export function createDiagnosisLookup(config: LookupConfig, dispatcher?: Dispatcher): CodeLookup {
  return new CodeLookupCapability({
    kind: 'diagnosis-lookup',
    name: 'icd10_lookup',
    description:
      'Looks up ICD-10-CM diagnosis codes from the NIH ClinicalTables API. ' +
      'Input a condition/diagnosis name and receive the corresponding code.',
    label: 'ICD-10',
    subject: 'condition',
    client: new ClinicalTablesIcd10Client(config.ICD10_BASE_URL, {
      timeoutMs: config.LOOKUP_TIMEOUT_MS,
      maxConnections: config.LOOKUP_MAX_CONCURRENCY,
      dispatcher,
    }),
    maxCandidates: config.LOOKUP_MAX_CANDIDATES,
    maxConcurrency: config.LOOKUP_MAX_CONCURRENCY,
  });
}

export function createMedicationLookup(config: LookupConfig, dispatcher?: Dispatcher): CodeLookup {
  return new CodeLookupCapability({
    kind: 'medication-lookup',
    name: 'rxnorm_lookup',
    description:
      'Looks up RxNorm concept identifiers from the NIH RxNav API. ' +
      'Input a medication name and receive the corresponding RxCUI.',
    label: 'RxNorm',
    subject: 'medication',
    client: new RxNavClient(config.RXNORM_BASE_URL, {
      timeoutMs: config.LOOKUP_TIMEOUT_MS,
      maxConnections: config.LOOKUP_MAX_CONCURRENCY,
      dispatcher,
    }),
    maxCandidates: config.LOOKUP_MAX_CANDIDATES,
    maxConcurrency: config.LOOKUP_MAX_CONCURRENCY,
    normalize: normalizeMedicationName,
  });
}
