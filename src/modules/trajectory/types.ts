export type StepStatus = 'pending' | 'running' | 'success' | 'failed' | 'skipped';

export const TERMINAL_STATUSES: ReadonlySet<StepStatus> = new Set<StepStatus>(['success', 'failed', 'skipped']);

export interface TrajectoryStep {
  /** 1-based position in the run. */
  index: number;
  name: string;
  tool: string;
  status: StepStatus;
  startedAt: Date | null;
  completedAt: Date | null;
  durationMs: number | null;
  inputSummary: string | null;
  outputSummary: string | null;
  error: string | null;
  errorType: string | null;
  metadata: Record<string, unknown>;
  inputData?: unknown;
  outputData?: unknown;
}

export interface StepHandle {
  readonly index: number;
  readonly name: string;
}

export interface Trajectory {
  agentName: string;
  runId: string;
  startedAt: Date;
  completedAt: Date | null;
  steps: TrajectoryStep[];
  /** null while the run is still in progress. */
  success: boolean | null;
  finalError: string | null;
  inputSummary: string | null;
  outputSummary: string | null;
}

export interface TrajectoryStatistics {
  totalSteps: number;
  successfulSteps: number;
  failedSteps: number;
  skippedSteps: number;
  totalDurationMs: number | null;
  avgStepDurationMs: number | null;
  slowestStep: string | null;
}
