import { isValid, parse } from 'date-fns';
import { z } from 'zod';
import {
  CARE_PLAN_STATUSES,
  CLINICAL_STATUSES,
  GENDERS,
  MEDICATION_STATUSES,
  PROCEDURE_STATUSES,
  VERIFICATION_STATUSES,
} from './vocabulary';

const nullableText = z.string().nullable().default(null);

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => isValid(parse(value, 'yyyy-MM-dd', new Date(2000, 0, 1))), 'Not a calendar date');

const nullableDate = isoDate.nullable().default(null);
const nullableTimestamp = z.string().datetime({ offset: true }).nullable().default(null);

export const codeableConceptSchema = z
  .object({
    code: z.string().min(1).nullable().default(null),
    system: z.string().min(1).nullable().default(null),
    display: z.string().trim().min(1, 'Display text must not be empty'),
  })
  .strict()
  .refine((concept) => (concept.code === null) === (concept.system === null), {
    message: 'Code and system must be provided together',
    path: ['system'],
  });

export const patientSchema = z
  .object({
    identifier: nullableText,
    name: nullableText,
    birthDate: nullableDate,
    gender: z.enum(GENDERS).nullable().default(null),
  })
  .strict();

export const encounterSchema = z
  .object({
    encounterDate: nullableDate,
    encounterType: nullableText,
    reason: nullableText,
  })
  .strict();

export const providerSchema = z
  .object({
    name: nullableText,
    specialty: nullableText,
    credentials: nullableText,
  })
  .strict();

export const conditionSchema = z
  .object({
    code: codeableConceptSchema,
    clinicalStatus: z.enum(CLINICAL_STATUSES).default('active'),
    verificationStatus: z.enum(VERIFICATION_STATUSES).default('confirmed'),
    onsetDate: nullableDate,
    note: nullableText,
  })
  .strict();

export const dosageSchema = z
  .object({
    text: nullableText,
    doseValue: z.number().nonnegative().nullable().default(null),
    doseUnit: nullableText,
    route: nullableText,
    frequency: nullableText,
  })
  .strict();

export const medicationSchema = z
  .object({
    code: codeableConceptSchema,
    status: z.enum(MEDICATION_STATUSES).default('active'),
    dosage: dosageSchema.nullable().default(null),
    dispenseQuantity: z.number().int().nonnegative().nullable().default(null),
    refills: z.number().int().nonnegative().nullable().default(null),
    asNeeded: z.boolean().default(false),
    reason: nullableText,
  })
  .strict();

export const vitalSignSchema = z
  .object({
    code: codeableConceptSchema,
    value: z.number(),
    unit: z.string().default(''),
    valueString: nullableText,
    effectiveDateTime: nullableTimestamp,
    interpretation: nullableText,
  })
  .strict();

export const labResultSchema = z
  .object({
    code: codeableConceptSchema,
    value: z.number().nullable().default(null),
    valueString: nullableText,
    unit: nullableText,
    referenceRange: nullableText,
    interpretation: nullableText,
    effectiveDateTime: nullableTimestamp,
  })
  .strict();

export const procedureSchema = z
  .object({
    code: codeableConceptSchema,
    status: z.enum(PROCEDURE_STATUSES).default('completed'),
    performedDate: nullableDate,
    bodySite: nullableText,
    note: nullableText,
  })
  .strict();

export const carePlanActivitySchema = z
  .object({
    description: z.string().trim().min(1, 'Description must not be empty'),
    status: z.enum(CARE_PLAN_STATUSES).default('scheduled'),
    category: nullableText,
    scheduledDate: nullableDate,
    scheduledString: nullableText,
    note: nullableText,
  })
  .strict();

export const structuredNoteSchema = z
  .object({
    patient: patientSchema.nullable().default(null),
    encounter: encounterSchema.nullable().default(null),
    provider: providerSchema.nullable().default(null),
    conditions: z.array(conditionSchema).default([]),
    medications: z.array(medicationSchema).default([]),
    vitalSigns: z.array(vitalSignSchema).default([]),
    labResults: z.array(labResultSchema).default([]),
    procedures: z.array(procedureSchema).default([]),
    carePlan: z.array(carePlanActivitySchema).default([]),
    sourceText: nullableText,
    extractionTimestamp: nullableTimestamp,
  })
  .strict();

export type CodeableConcept = z.infer<typeof codeableConceptSchema>;
export type PatientInfo = z.infer<typeof patientSchema>;
export type Encounter = z.infer<typeof encounterSchema>;
export type Provider = z.infer<typeof providerSchema>;
export type Condition = z.infer<typeof conditionSchema>;
export type Dosage = z.infer<typeof dosageSchema>;
export type Medication = z.infer<typeof medicationSchema>;
export type VitalSign = z.infer<typeof vitalSignSchema>;
export type LabResult = z.infer<typeof labResultSchema>;
export type Procedure = z.infer<typeof procedureSchema>;
export type CarePlanActivity = z.infer<typeof carePlanActivitySchema>;
export type StructuredNote = z.infer<typeof structuredNoteSchema>;

/** Input accepted by validation: defaults may be omitted. */
export type StructuredNoteDraft = z.input<typeof structuredNoteSchema>;
