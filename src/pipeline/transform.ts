import type { CapabilityResult } from '../modules/capabilities/types';
import type {
  RawCarePlanItem,
  RawCondition,
  RawExtraction,
  RawLabResult,
  RawMedication,
  RawProcedure,
  RawVitalSign,
} from '../modules/extraction/types';
import type { ReferenceCode } from '../modules/lookup/types';
import type {
  CarePlanActivity,
  CodeableConcept,
  Condition,
  Dosage,
  Encounter,
  LabResult,
  Medication,
  PatientInfo,
  Procedure,
  Provider,
  StructuredNoteDraft,
  VitalSign,
} from '../modules/note/schema';
import {
  mapCarePlanStatus,
  mapClinicalStatus,
  mapGender,
  mapProcedureStatus,
  parseDate,
  parseDoseUnit,
  parseDoseValue,
} from '../modules/note/vocabulary';

export type LookupOutcome = CapabilityResult<ReferenceCode> | null;

/** Coded concept from a successful lookup, otherwise display-only with the extracted name. */
export function toConcept(name: string, lookup: LookupOutcome): CodeableConcept {
  if (lookup && lookup.success) {
    return { code: lookup.payload.code, system: lookup.payload.system, display: lookup.payload.display };
  }
  return { code: null, system: null, display: name };
}

export function buildCondition(raw: RawCondition, lookup: LookupOutcome): Condition {
  return {
    code: toConcept(raw.name, lookup),
    clinicalStatus: mapClinicalStatus(raw.clinicalStatus),
    verificationStatus: 'confirmed',
    onsetDate: null,
    note: raw.note,
  };
}

export function buildDosage(raw: RawMedication): Dosage | null {
  if (!raw.dose && !raw.route && !raw.frequency) {
    return null;
  }
  const text = [raw.dose, raw.route, raw.frequency].filter(Boolean).join(' ');
  return {
    text,
    doseValue: parseDoseValue(raw.dose),
    doseUnit: parseDoseUnit(raw.dose),
    route: raw.route,
    frequency: raw.frequency,
  };
}

// Models occasionally report negative counts; treat them as not stated.
function countOrNull(value: number | null): number | null {
  return value !== null && value >= 0 ? value : null;
}

export function buildMedication(raw: RawMedication, lookup: LookupOutcome): Medication {
  return {
    code: toConcept(raw.name, lookup),
    status: 'active',
    dosage: buildDosage(raw),
    dispenseQuantity: countOrNull(raw.quantity),
    refills: countOrNull(raw.refills),
    asNeeded: raw.asNeeded,
    reason: raw.reason,
  };
}

export function transformVital(raw: RawVitalSign): VitalSign {
  let value = raw.value;
  if (value === null) {
    // Blood pressure and similar readings arrive only as text; take the first number.
    const match = raw.valueString ? raw.valueString.match(/(\d+\.?\d*)/) : null;
    value = match ? parseFloat(match[1]) : 0;
  }
  return {
    code: toConcept(raw.name, null),
    value,
    unit: raw.unit ?? '',
    valueString: raw.valueString,
    effectiveDateTime: null,
    interpretation: raw.interpretation,
  };
}

export function transformLab(raw: RawLabResult): LabResult {
  return {
    code: toConcept(raw.name, null),
    value: raw.value,
    valueString: raw.valueString,
    unit: raw.unit,
    referenceRange: raw.referenceRange,
    interpretation: raw.interpretation,
    effectiveDateTime: null,
  };
}

export function transformProcedure(raw: RawProcedure): Procedure {
  return {
    code: toConcept(raw.name, null),
    status: mapProcedureStatus(raw.status),
    performedDate: parseDate(raw.date),
    bodySite: raw.bodySite,
    note: raw.note,
  };
}

export function transformCarePlan(raw: RawCarePlanItem): CarePlanActivity {
  return {
    description: raw.description,
    status: mapCarePlanStatus(raw.status),
    category: raw.category,
    scheduledDate: parseDate(raw.scheduledDate),
    scheduledString: raw.scheduledString,
    note: raw.note,
  };
}

function buildPatient(raw: RawExtraction): PatientInfo | null {
  if (!raw.patientId && !raw.patientName && !raw.patientBirthDate) {
    return null;
  }
  return {
    identifier: raw.patientId,
    name: raw.patientName,
    birthDate: parseDate(raw.patientBirthDate),
    gender: mapGender(raw.patientGender),
  };
}

function buildEncounter(raw: RawExtraction): Encounter | null {
  if (!raw.encounterDate && !raw.encounterType) {
    return null;
  }
  return {
    encounterDate: parseDate(raw.encounterDate),
    encounterType: raw.encounterType,
    reason: raw.encounterReason,
  };
}

function buildProvider(raw: RawExtraction): Provider | null {
  if (!raw.providerName) {
    return null;
  }
  return { name: raw.providerName, specialty: raw.providerSpecialty, credentials: null };
}

export interface NoteDraftInput {
  raw: RawExtraction;
  conditions: Condition[];
  medications: Medication[];
  sourceText: string;
  extractedAt: Date;
}

export type NoteTransformer = (input: NoteDraftInput) => StructuredNoteDraft;

/** Assembles the unvalidated note from enriched entities and the remaining raw fields. */
export const buildNoteDraft: NoteTransformer = ({ raw, conditions, medications, sourceText, extractedAt }) => ({
  patient: buildPatient(raw),
  encounter: buildEncounter(raw),
  provider: buildProvider(raw),
  conditions,
  medications,
  vitalSigns: raw.vitalSigns.map(transformVital),
  labResults: raw.labResults.map(transformLab),
  procedures: raw.procedures.map(transformProcedure),
  carePlan: raw.carePlan.map(transformCarePlan),
  sourceText,
  extractionTimestamp: extractedAt.toISOString(),
});
