import type { z } from 'zod';
import { fail, succeed } from '../capabilities/result';
import type { Capability, CapabilityResult } from '../capabilities/types';
import { deepFreeze, entityCounts } from '../note/index';
import {
  conditionSchema,
  medicationSchema,
  patientSchema,
  structuredNoteSchema,
} from '../note/schema';
import type { Condition, Medication, PatientInfo, StructuredNote, StructuredNoteDraft } from '../note/schema';
import { createLogger } from '../../utils/logger';

const log = createLogger('VALIDATION');

export interface FieldError {
  field: string;
  message: string;
}

export type PartialModel = PatientInfo | Condition | Medication | StructuredNote;

const PARTIAL_SCHEMAS = new Map<string, z.ZodType<PartialModel, z.ZodTypeDef, unknown>>([
  ['patient', patientSchema],
  ['condition', conditionSchema],
  ['medication', medicationSchema],
  ['structured_note', structuredNoteSchema],
]);

function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/** Advisory findings on a schema-valid note; they never fail validation. */
export function checkBusinessRules(note: StructuredNote): string[] {
  const warnings: string[] = [];

  if (!note.patient || (!note.patient.name && !note.patient.identifier)) {
    warnings.push('Patient identification is incomplete');
  }
  for (const condition of note.conditions) {
    if (!condition.code.code) {
      warnings.push(`Condition '${condition.code.display}' has no ICD-10 code`);
    }
  }
  for (const medication of note.medications) {
    if (!medication.code.code) {
      warnings.push(`Medication '${medication.code.display}' has no RxNorm code`);
    }
  }
  for (const medication of note.medications) {
    if (!medication.dosage || !medication.dosage.text) {
      warnings.push(`Medication '${medication.code.display}' has no dosage information`);
    }
  }

  return warnings;
}

/**
 * Checks a note draft against the StructuredNote schema and returns the
 * deep-frozen note. Re-validating a returned note yields an equal note.
 */
export class ValidationCapability implements Capability<StructuredNoteDraft, StructuredNote> {
  readonly kind = 'validation';
  readonly name = 'validator';
  readonly description =
    'Validates extracted medical data against FHIR-aligned schemas. ' +
    'Ensures data quality and schema compliance before output.';

  async execute(draft: StructuredNoteDraft): Promise<CapabilityResult<StructuredNote>> {
    const parsed = structuredNoteSchema.safeParse(draft);

    if (!parsed.success) {
      const validationErrors = toFieldErrors(parsed.error);
      const details = validationErrors.map((e) => `${e.field}: ${e.message}`).join('; ');
      log.warn(`Validation failed with ${validationErrors.length} error(s)`, { details });
      return fail(`Validation failed with ${validationErrors.length} error(s): ${details}`, { validationErrors });
    }

    const note = deepFreeze(parsed.data);
    const warnings = checkBusinessRules(note);
    const counts = entityCounts(note);
    log.info(`Validation passed with ${warnings.length} warning(s)`, { ...counts });

    return succeed(note, { entityCounts: counts, warnings });
  }

  async validatePartial(data: unknown, modelName: string): Promise<CapabilityResult<PartialModel>> {
    const schema = PARTIAL_SCHEMAS.get(modelName.toLowerCase());
    if (!schema) {
      return fail(`Unknown model: ${modelName}`);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      return fail(`Validation failed for ${modelName}`, { validationErrors: toFieldErrors(parsed.error) });
    }
    return succeed(deepFreeze(parsed.data));
  }
}
