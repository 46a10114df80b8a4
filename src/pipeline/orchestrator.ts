import type { CapabilityResult } from '../modules/capabilities/types';
import type { CodeLookup } from '../modules/lookup/types';
import { entityCounts, totalEntities } from '../modules/note/index';
import type { Condition, Medication, StructuredNote, StructuredNoteDraft } from '../modules/note/schema';
import type { RawCondition, RawExtraction, RawMedication } from '../modules/extraction/types';
import { TrajectoryRecorder } from '../modules/trajectory/recorder';
import { errorMessage, RunDeadlineError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { buildCondition, buildMedication, buildNoteDraft } from './transform';
import type { LookupOutcome, NoteTransformer } from './transform';
import type { ExtractionResult, OrchestratorCapabilities, OrchestratorOptions, StepDefinition } from './types';

const log = createLogger('PIPELINE');

export const STEPS = {
  extract: { name: 'Extract Entities', tool: 'entity_extraction' },
  enrichConditions: { name: 'Enrich Conditions (ICD-10)', tool: 'icd10_lookup' },
  enrichMedications: { name: 'Enrich Medications (RxNorm)', tool: 'rxnorm_lookup' },
  transform: { name: 'Transform Entities', tool: 'transformer' },
  validate: { name: 'Validate Output', tool: 'validator' },
} as const;

const DEFAULT_AGENT_NAME = 'ExtractionAgent';
const NOTE_PREVIEW_LENGTH = 100;

interface RunControl {
  expired: boolean;
}

interface EnrichmentPlan<R, T> {
  step: StepDefinition;
  items: R[];
  term: (item: R) => string;
  lookup: CodeLookup;
  noun: string;
  codeLabel: string;
  build: (item: R, outcome: LookupOutcome) => T;
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

function readWarnings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Runs one clinical note through Extract -> Enrich Conditions -> Enrich
 * Medications -> Transform -> Validate and records every step.
 *
 * Enrichment never fails a run: a lookup that errors leaves the entity with
 * a display-only concept. Extraction, transformation and validation failures
 * are terminal.
 */
export class ExtractionOrchestrator {
  private readonly agentName: string;
  private readonly now: () => Date;
  private readonly transform: NoteTransformer;

  constructor(
    private readonly capabilities: OrchestratorCapabilities,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.agentName = options.agentName || DEFAULT_AGENT_NAME;
    this.now = options.now || (() => new Date());
    this.transform = options.transform || buildNoteDraft;
  }

  async run(text: string): Promise<ExtractionResult> {
    const preview = text.length > NOTE_PREVIEW_LENGTH ? `${text.slice(0, NOTE_PREVIEW_LENGTH)}...` : text;
    const recorder = new TrajectoryRecorder(this.agentName, {
      inputSummary: `Clinical note (${text.length} chars): ${preview}`,
      now: this.now,
    });
    const control: RunControl = { expired: false };
    const startTime = Date.now();

    log.info('========== START EXTRACTION ==========');
    log.info(`Run ID: ${recorder.runId}`);

    try {
      const work = this.execute(text, recorder, control);
      const deadlineMs = this.options.runDeadlineMs;
      return deadlineMs ? await this.withDeadline(work, deadlineMs, control, recorder.runId) : await work;
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Run aborted: ${message}`, { runId: recorder.runId, errorType: errorName(error) });
      recorder.failRunning(message, errorName(error));
      recorder.finish(false, { error: message });
      return this.result(recorder, { success: false, note: null, error: message, warnings: [] });
    } finally {
      const cleanup = this.cleanup(recorder.runId);
      // Abandoned calls may still hold connections; closing waits for them, the caller should not.
      if (!control.expired) {
        await cleanup;
      }
      log.info(`========== END EXTRACTION (${Date.now() - startTime}ms) ==========`);
    }
  }

  private async execute(text: string, recorder: TrajectoryRecorder, control: RunControl): Promise<ExtractionResult> {
    log.info('Phase: EXTRACT');
    const extraction = await this.extract(text, recorder);
    if (!extraction.success) {
      const error = `Entity extraction failed: ${extraction.error}`;
      recorder.finish(false, { error });
      return this.result(recorder, { success: false, note: null, error, warnings: [] });
    }
    const raw = extraction.payload;
    this.checkpoint(control);

    const conditionPlan: EnrichmentPlan<RawCondition, Condition> = {
      step: STEPS.enrichConditions,
      items: raw.conditions,
      term: (condition) => condition.name,
      lookup: this.capabilities.diagnosisLookup,
      noun: 'condition',
      codeLabel: 'ICD-10',
      build: buildCondition,
    };
    const medicationPlan: EnrichmentPlan<RawMedication, Medication> = {
      step: STEPS.enrichMedications,
      items: raw.medications,
      term: (medication) => medication.name,
      lookup: this.capabilities.medicationLookup,
      noun: 'medication',
      codeLabel: 'RxNorm',
      build: buildMedication,
    };

    let conditions: Condition[];
    let medications: Medication[];
    if (this.options.parallelEnrichment) {
      log.info('Phase: ENRICH (parallel)');
      [conditions, medications] = await Promise.all([
        this.enrich(conditionPlan, recorder),
        this.enrich(medicationPlan, recorder),
      ]);
    } else {
      log.info('Phase: ENRICH_CONDITIONS');
      conditions = await this.enrich(conditionPlan, recorder);
      this.checkpoint(control);
      log.info('Phase: ENRICH_MEDICATIONS');
      medications = await this.enrich(medicationPlan, recorder);
    }
    this.checkpoint(control);

    log.info('Phase: TRANSFORM');
    const draft = this.transformEntities(raw, conditions, medications, text, recorder);
    this.checkpoint(control);

    log.info('Phase: VALIDATE');
    const step = recorder.start(STEPS.validate.name, STEPS.validate.tool, 'Validating structured note');
    const validation = await this.capabilities.validator.execute(draft);
    if (!validation.success) {
      recorder.fail(step, validation.error, 'ValidationError');
      recorder.finish(false, { error: validation.error });
      return this.result(recorder, { success: false, note: null, error: validation.error, warnings: [] });
    }

    const warnings = readWarnings(validation.metadata.warnings);
    recorder.complete(
      step,
      warnings.length > 0 ? `Validation passed with ${warnings.length} warning(s)` : 'Validation passed'
    );

    const total = totalEntities(entityCounts(validation.payload));
    recorder.finish(true, { outputSummary: `Extracted ${total} entities` });
    log.info(`Extraction succeeded with ${total} entities`, { runId: recorder.runId, warnings: warnings.length });

    return this.result(recorder, { success: true, note: validation.payload, error: null, warnings });
  }

  private async extract(text: string, recorder: TrajectoryRecorder): Promise<CapabilityResult<RawExtraction>> {
    const step = recorder.start(STEPS.extract.name, STEPS.extract.tool, `Clinical note (${text.length} chars)`);
    const result = await this.capabilities.extractor.execute(text);

    if (!result.success) {
      recorder.fail(step, result.error, 'ExtractionError');
      return result;
    }

    const raw = result.payload;
    recorder.complete(
      step,
      `Extracted: ${raw.conditions.length} conditions, ${raw.medications.length} medications, ` +
        `${raw.vitalSigns.length} vitals, ${raw.labResults.length} labs, ` +
        `${raw.procedures.length} procedures, ${raw.carePlan.length} care plan items`
    );
    return result;
  }

  private async enrich<R, T>(plan: EnrichmentPlan<R, T>, recorder: TrajectoryRecorder): Promise<T[]> {
    const { step: definition, items, lookup, noun, codeLabel } = plan;

    if (items.length === 0) {
      recorder.skip(definition.name, definition.tool, `No ${noun}s to enrich`);
      return [];
    }

    const step = recorder.start(definition.name, definition.tool, `${items.length} ${noun}(s) to look up`);
    const terms = items.map(plan.term);

    let outcomes: LookupOutcome[];
    let unavailable: string | null = null;
    try {
      const results = await lookup.executeBatch(terms);
      outcomes = terms.map((_, i) => results[i] ?? null);
    } catch (error) {
      unavailable = errorMessage(error);
      log.warn(`${codeLabel} lookup unavailable, keeping extracted names`, { runId: recorder.runId, error: unavailable });
      outcomes = terms.map(() => null);
    }

    const enriched = items.map((item, i) => plan.build(item, outcomes[i]));
    const matched = outcomes.filter((outcome) => outcome !== null && outcome.success).length;
    const summary = `Enriched ${matched}/${items.length} with ${codeLabel} codes`;
    recorder.complete(step, unavailable ? `${summary} (lookup unavailable: ${unavailable})` : summary);

    return enriched;
  }

  private transformEntities(
    raw: RawExtraction,
    conditions: Condition[],
    medications: Medication[],
    sourceText: string,
    recorder: TrajectoryRecorder
  ): StructuredNoteDraft {
    const step = recorder.start(STEPS.transform.name, STEPS.transform.tool, 'Building structured models');
    try {
      const draft = this.transform({ raw, conditions, medications, sourceText, extractedAt: this.now() });
      recorder.complete(step, 'Transformed all entity types');
      return draft;
    } catch (error) {
      recorder.fail(step, errorMessage(error), errorName(error));
      throw error;
    }
  }

  private checkpoint(control: RunControl): void {
    if (control.expired && this.options.runDeadlineMs) {
      throw new RunDeadlineError(this.options.runDeadlineMs);
    }
  }

  private async withDeadline(
    work: Promise<ExtractionResult>,
    deadlineMs: number,
    control: RunControl,
    runId: string
  ): Promise<ExtractionResult> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        control.expired = true;
        reject(new RunDeadlineError(deadlineMs));
      }, deadlineMs);
    });

    work.catch((error: unknown) => {
      if (control.expired) {
        log.debug('Abandoned run settled after its deadline', { runId, error: errorMessage(error) });
      }
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async cleanup(runId: string): Promise<void> {
    const { extractor, diagnosisLookup, medicationLookup } = this.capabilities;
    const results = await Promise.allSettled([extractor.close(), diagnosisLookup.close(), medicationLookup.close()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn('Failed to release a client', { runId, error: errorMessage(result.reason) });
      }
    }
  }

  private result(
    recorder: TrajectoryRecorder,
    outcome: { success: boolean; note: StructuredNote | null; error: string | null; warnings: string[] }
  ): ExtractionResult {
    return { ...outcome, runId: recorder.runId, trajectory: recorder.snapshot() };
  }
}
