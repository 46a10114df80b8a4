export interface RawCondition {
  name: string;
  clinicalStatus: string | null;
  note: string | null;
}

export interface RawMedication {
  name: string;
  dose: string | null;
  route: string | null;
  frequency: string | null;
  quantity: number | null;
  refills: number | null;
  asNeeded: boolean;
  reason: string | null;
}

export interface RawProcedure {
  name: string;
  bodySite: string | null;
  date: string | null;
  status: string | null;
  note: string | null;
}

export interface RawVitalSign {
  name: string;
  value: number | null;
  unit: string | null;
  valueString: string | null;
  interpretation: string | null;
}

export interface RawLabResult {
  name: string;
  value: number | null;
  valueString: string | null;
  unit: string | null;
  referenceRange: string | null;
  interpretation: string | null;
}

export interface RawCarePlanItem {
  description: string;
  category: string | null;
  scheduledDate: string | null;
  scheduledString: string | null;
  status: string | null;
  note: string | null;
}

/** Entities as the model reported them, before coding and vocabulary mapping. */
export interface RawExtraction {
  patientId: string | null;
  patientName: string | null;
  patientBirthDate: string | null;
  patientGender: string | null;
  encounterDate: string | null;
  encounterType: string | null;
  encounterReason: string | null;
  providerName: string | null;
  providerSpecialty: string | null;
  conditions: RawCondition[];
  medications: RawMedication[];
  procedures: RawProcedure[];
  vitalSigns: RawVitalSign[];
  labResults: RawLabResult[];
  carePlan: RawCarePlanItem[];
}

export function emptyRawExtraction(): RawExtraction {
  return {
    patientId: null,
    patientName: null,
    patientBirthDate: null,
    patientGender: null,
    encounterDate: null,
    encounterType: null,
    encounterReason: null,
    providerName: null,
    providerSpecialty: null,
    conditions: [],
    medications: [],
    procedures: [],
    vitalSigns: [],
    labResults: [],
    carePlan: [],
  };
}
