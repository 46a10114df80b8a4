import type { Capability, Closeable } from '../modules/capabilities/types';
import type { RawExtraction } from '../modules/extraction/types';
import type { CodeLookup } from '../modules/lookup/types';
import type { StructuredNote, StructuredNoteDraft } from '../modules/note/schema';
import type { Trajectory } from '../modules/trajectory/types';
import type { NoteTransformer } from './transform';

export interface ExtractionResult {
  success: boolean;
  runId: string;
  note: StructuredNote | null;
  error: string | null;
  warnings: string[];
  trajectory: Trajectory;
}

export interface OrchestratorCapabilities {
  extractor: Capability<string, RawExtraction> & Closeable;
  diagnosisLookup: CodeLookup;
  medicationLookup: CodeLookup;
  validator: Capability<StructuredNoteDraft, StructuredNote>;
}

export interface OrchestratorOptions {
  agentName?: string;
  /** Run both enrichment steps concurrently instead of one after the other. */
  parallelEnrichment?: boolean;
  /** Whole-run budget; null or undefined means no deadline. */
  runDeadlineMs?: number | null;
  now?: () => Date;
  transform?: NoteTransformer;
}

export interface StepDefinition {
  name: string;
  tool: string;
}
