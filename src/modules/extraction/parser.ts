import { isRecord, readArray, readBoolean, readInteger, readNumber, readString } from '../../utils/json';
import type {
  RawCarePlanItem,
  RawCondition,
  RawExtraction,
  RawLabResult,
  RawMedication,
  RawProcedure,
  RawVitalSign,
} from './types';

export class ResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

/** Returns the body of the first fenced code block, or the trimmed text if there is none. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }

  const lines = trimmed.split('\n');
  const body: string[] = [];
  for (const line of lines.slice(1)) {
    if (line.startsWith('```')) break;
    body.push(line);
  }
  return body.join('\n');
}

// Index just past the brace that closes the object opening at `start`, or -1.
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/**
 * Finds the first balanced `{...}` span that parses as a JSON object.
 * Prose around the object, and braces inside string values, are tolerated.
 */
export function findJsonObject(text: string): Record<string, unknown> {
  const cleaned = stripCodeFence(text);
  let lastError = 'no JSON object found';

  for (let start = cleaned.indexOf('{'); start !== -1; start = cleaned.indexOf('{', start + 1)) {
    const end = findClosingBrace(cleaned, start);
    if (end === -1) continue;
    try {
      const parsed: unknown = JSON.parse(cleaned.slice(start, end));
      if (isRecord(parsed)) return parsed;
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
    }
  }

  throw new ResponseParseError(lastError);
}

function entries(value: unknown): Record<string, unknown>[] {
  return readArray(value).filter(isRecord);
}

function buildCondition(entry: Record<string, unknown>): RawCondition | null {
  const name = readString(entry.name);
  if (!name) return null;
  return {
    name,
    clinicalStatus: readString(entry.clinical_status),
    note: readString(entry.note),
  };
}

function buildMedication(entry: Record<string, unknown>): RawMedication | null {
  const name = readString(entry.name);
  if (!name) return null;
  return {
    name,
    dose: readString(entry.dose),
    route: readString(entry.route),
    frequency: readString(entry.frequency),
    quantity: readInteger(entry.quantity),
    refills: readInteger(entry.refills),
    asNeeded: readBoolean(entry.as_needed),
    reason: readString(entry.reason),
  };
}

function buildProcedure(entry: Record<string, unknown>): RawProcedure | null {
  const name = readString(entry.name);
  if (!name) return null;
  return {
    name,
    bodySite: readString(entry.body_site),
    date: readString(entry.date),
    status: readString(entry.status),
    note: readString(entry.note),
  };
}

function buildVitalSign(entry: Record<string, unknown>): RawVitalSign | null {
  const name = readString(entry.name);
  if (!name) return null;
  return {
    name,
    value: readNumber(entry.value),
    unit: readString(entry.unit),
    valueString: readString(entry.value_string),
    interpretation: readString(entry.interpretation),
  };
}

function buildLabResult(entry: Record<string, unknown>): RawLabResult | null {
  const name = readString(entry.name);
  if (!name) return null;
  return {
    name,
    value: readNumber(entry.value),
    valueString: readString(entry.value_string),
    unit: readString(entry.unit),
    referenceRange: readString(entry.reference_range),
    interpretation: readString(entry.interpretation),
  };
}

function buildCarePlanItem(entry: Record<string, unknown>): RawCarePlanItem | null {
  const description = readString(entry.description);
  if (!description) return null;
  return {
    description,
    category: readString(entry.category),
    scheduledDate: readString(entry.scheduled_date),
    scheduledString: readString(entry.scheduled_string),
    status: readString(entry.status),
    note: readString(entry.note),
  };
}

function collect<T>(value: unknown, build: (entry: Record<string, unknown>) => T | null): T[] {
  const items: T[] = [];
  for (const entry of entries(value)) {
    const item = build(entry);
    if (item) items.push(item);
  }
  return items;
}

/** Maps the model's snake_case JSON onto RawExtraction, dropping unnamed entries. */
export function buildRawExtraction(data: Record<string, unknown>): RawExtraction {
  return {
    patientId: readString(data.patient_id),
    patientName: readString(data.patient_name),
    patientBirthDate: readString(data.patient_dob),
    patientGender: readString(data.patient_gender),
    encounterDate: readString(data.encounter_date),
    encounterType: readString(data.encounter_type),
    encounterReason: readString(data.encounter_reason),
    providerName: readString(data.provider_name),
    providerSpecialty: readString(data.provider_specialty),
    conditions: collect(data.conditions, buildCondition),
    medications: collect(data.medications, buildMedication),
    procedures: collect(data.procedures, buildProcedure),
    vitalSigns: collect(data.vital_signs, buildVitalSign),
    labResults: collect(data.lab_results, buildLabResult),
    carePlan: collect(data.care_plan, buildCarePlanItem),
  };
}
