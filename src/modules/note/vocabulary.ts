import { format, isValid, parse } from 'date-fns';

export const GENDERS = ['male', 'female', 'other', 'unknown'] as const;
export type Gender = (typeof GENDERS)[number];

export const CLINICAL_STATUSES = ['active', 'recurrence', 'relapse', 'inactive', 'remission', 'resolved'] as const;
export type ClinicalStatus = (typeof CLINICAL_STATUSES)[number];

export const VERIFICATION_STATUSES = [
  'unconfirmed',
  'provisional',
  'differential',
  'confirmed',
  'refuted',
  'entered-in-error',
] as const;
export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

export const MEDICATION_STATUSES = ['active', 'on-hold', 'cancelled', 'completed', 'stopped', 'draft', 'unknown'] as const;
export type MedicationStatus = (typeof MEDICATION_STATUSES)[number];

export const CARE_PLAN_STATUSES = [
  'not-started',
  'scheduled',
  'in-progress',
  'on-hold',
  'completed',
  'cancelled',
  'stopped',
  'unknown',
] as const;
export type CarePlanStatus = (typeof CARE_PLAN_STATUSES)[number];

export const PROCEDURE_STATUSES = [
  'preparation',
  'in-progress',
  'not-done',
  'on-hold',
  'stopped',
  'completed',
  'entered-in-error',
  'unknown',
] as const;
export type ProcedureStatus = (typeof PROCEDURE_STATUSES)[number];

const GENDER_MAP: Record<string, Gender> = {
  male: 'male',
  m: 'male',
  female: 'female',
  f: 'female',
  other: 'other',
  unknown: 'unknown',
};

const CLINICAL_STATUS_MAP: Record<string, ClinicalStatus> = {
  active: 'active',
  resolved: 'resolved',
  inactive: 'inactive',
  remission: 'remission',
  recurrence: 'recurrence',
  relapse: 'relapse',
};

const CARE_PLAN_STATUS_MAP: Record<string, CarePlanStatus> = {
  scheduled: 'scheduled',
  'not-started': 'not-started',
  'not started': 'not-started',
  'in-progress': 'in-progress',
  'in progress': 'in-progress',
  completed: 'completed',
  cancelled: 'cancelled',
  canceled: 'cancelled',
  'on-hold': 'on-hold',
  'on hold': 'on-hold',
};

const PROCEDURE_STATUS_MAP: Record<string, ProcedureStatus> = {
  completed: 'completed',
  'in-progress': 'in-progress',
  'in progress': 'in-progress',
  scheduled: 'preparation',
  preparation: 'preparation',
  'not-done': 'not-done',
  'not done': 'not-done',
  stopped: 'stopped',
};

function lookup<T>(map: Record<string, T>, value: string | null, fallback: T): T {
  if (!value) return fallback;
  const key = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : fallback;
}

/** Absent gender stays null; anything unrecognized is "unknown". */
export function mapGender(value: string | null): Gender | null {
  if (!value) return null;
  return lookup(GENDER_MAP, value, 'unknown');
}

export function mapClinicalStatus(value: string | null): ClinicalStatus {
  return lookup(CLINICAL_STATUS_MAP, value, 'active');
}

export function mapCarePlanStatus(value: string | null): CarePlanStatus {
  return lookup(CARE_PLAN_STATUS_MAP, value, 'scheduled');
}

export function mapProcedureStatus(value: string | null): ProcedureStatus {
  return lookup(PROCEDURE_STATUS_MAP, value, 'completed');
}

// Tried in order; month-first wins for ambiguous slash dates. The shape check
// requires a four-digit year, which date-fns' `yyyy` alone does not.
const DATE_FORMATS: ReadonlyArray<{ pattern: string; shape: RegExp }> = [
  { pattern: 'yyyy-MM-dd', shape: /^\d{4}-\d{1,2}-\d{1,2}$/ },
  { pattern: 'MM/dd/yyyy', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: 'dd/MM/yyyy', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: 'yyyy/MM/dd', shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/ },
];

/** Normalizes a free-text date to `YYYY-MM-DD`, or null when no known format fits. */
export function parseDate(value: string | null): string | null {
  if (!value) return null;
  const text = value.trim();
  const reference = new Date(2000, 0, 1);

  for (const { pattern, shape } of DATE_FORMATS) {
    if (!shape.test(text)) continue;
    const parsed = parse(text, pattern, reference);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

export function parseDoseValue(dose: string | null): number | null {
  if (!dose) return null;
  const match = dose.match(/(\d+\.?\d*)/);
  return match ? parseFloat(match[1]) : null;
}

export function parseDoseUnit(dose: string | null): string | null {
  if (!dose) return null;
  const match = dose.match(/\d+\.?\d*\s*(mg|mcg|g|ml|meq|units?|iu|%)/i);
  return match ? match[1].toLowerCase() : null;
}
