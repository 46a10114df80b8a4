import type { Dispatcher } from 'undici';
import type { Config } from '../config/index';
import { EntityExtractionCapability } from '../modules/extraction/extractor';
import { createTextGenerator } from '../modules/llm/index';
import { createDiagnosisLookup, createMedicationLookup } from '../modules/lookup/index';
import { ValidationCapability } from '../modules/validation/validator';
import { ExtractionOrchestrator } from './orchestrator';
import type { OrchestratorCapabilities, OrchestratorOptions } from './types';

export { ExtractionOrchestrator, STEPS } from './orchestrator';
export * from './types';
export * from './transform';

export interface CreateOrchestratorOptions extends OrchestratorOptions {
  /** Replace any of the default capabilities, e.g. with fakes. */
  capabilities?: Partial<OrchestratorCapabilities>;
  /** Route every HTTP call through this dispatcher (e.g. an undici MockAgent). */
  dispatcher?: Dispatcher;
}

export function createExtractionOrchestrator(
  config: Config,
  options: CreateOrchestratorOptions = {}
): ExtractionOrchestrator {
  const { capabilities = {}, dispatcher, ...orchestratorOptions } = options;

  return new ExtractionOrchestrator(
    {
      extractor: capabilities.extractor || new EntityExtractionCapability(createTextGenerator(config, dispatcher)),
      diagnosisLookup: capabilities.diagnosisLookup || createDiagnosisLookup(config, dispatcher),
      medicationLookup: capabilities.medicationLookup || createMedicationLookup(config, dispatcher),
      validator: capabilities.validator || new ValidationCapability(),
    },
    {
      parallelEnrichment: config.PIPELINE_PARALLEL_ENRICHMENT,
      runDeadlineMs: config.PIPELINE_RUN_DEADLINE_MS,
      ...orchestratorOptions,
    }
  );
}
