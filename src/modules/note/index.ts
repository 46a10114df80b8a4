import type { StructuredNote } from './schema';

export * from './schema';
export * from './vocabulary';

export interface EntityCounts {
  patient: number;
  encounter: number;
  provider: number;
  conditions: number;
  medications: number;
  vitalSigns: number;
  labResults: number;
  procedures: number;
  carePlan: number;
}

export function entityCounts(note: StructuredNote): EntityCounts {
  return {
    patient: note.patient ? 1 : 0,
    encounter: note.encounter ? 1 : 0,
    provider: note.provider ? 1 : 0,
    conditions: note.conditions.length,
    medications: note.medications.length,
    vitalSigns: note.vitalSigns.length,
    labResults: note.labResults.length,
    procedures: note.procedures.length,
    carePlan: note.carePlan.length,
  };
}

export function totalEntities(counts: EntityCounts): number {
  return Object.values(counts).reduce((sum, count) => sum + count, 0);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child: unknown) => deepFreeze(child));
  }
  return value;
}
