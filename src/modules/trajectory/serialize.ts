import { isRecord } from '../../utils/json';
import { computeStatistics } from './statistics';
import type { StepStatus, Trajectory, TrajectoryStatistics, TrajectoryStep } from './types';

export interface SerializeOptions {
  includeFullData?: boolean;
}

export interface SerializedStep {
  index: number;
  name: string;
  tool: string;
  status: StepStatus;
  startedAt: string | null;
  completedAt: string | null;
  durationMs: number | null;
  inputSummary: string | null;
  outputSummary: string | null;
  error?: string;
  errorType?: string | null;
  metadata?: Record<string, unknown>;
  inputData?: unknown;
  outputData?: unknown;
}

export interface SerializedTrajectory {
  agentName: string;
  runId: string;
  startedAt: string;
  completedAt: string | null;
  success: boolean | null;
  finalError: string | null;
  inputSummary: string | null;
  outputSummary: string | null;
  statistics: TrajectoryStatistics;
  steps: SerializedStep[];
}

/**
 * Converts arbitrary payloads into JSON-friendly values: dates become ISO
 * strings, maps become objects, sets become arrays, functions and undefined
 * are dropped, and repeated references are cut at the cycle.
 */
export function toPlain(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value === null) return null;
  if (value === undefined) return undefined;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'function' || typeof value === 'symbol') return undefined;
  if (typeof value !== 'object') return value;

  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  let plain: unknown;
  if (Array.isArray(value)) {
    plain = value.map((item) => toPlain(item, seen) ?? null);
  } else if (value instanceof Set) {
    plain = Array.from(value, (item) => toPlain(item, seen) ?? null);
  } else if (value instanceof Map) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of value) {
      const converted = toPlain(item, seen);
      if (converted !== undefined) out[String(key)] = converted;
    }
    plain = out;
  } else {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toPlain(item, seen);
      if (converted !== undefined) out[key] = converted;
    }
    plain = out;
  }

  seen.delete(value);
  return plain;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function serializeStep(step: TrajectoryStep, includeFullData: boolean): SerializedStep {
  const out: SerializedStep = {
    index: step.index,
    name: step.name,
    tool: step.tool,
    status: step.status,
    startedAt: iso(step.startedAt),
    completedAt: iso(step.completedAt),
    durationMs: step.durationMs,
    inputSummary: step.inputSummary,
    outputSummary: step.outputSummary,
  };

  if (step.error) {
    out.error = step.error;
    out.errorType = step.errorType;
  }
  if (Object.keys(step.metadata).length > 0) {
    const metadata = toPlain(step.metadata);
    out.metadata = isRecord(metadata) ? metadata : {};
  }
  if (includeFullData) {
    out.inputData = toPlain(step.inputData) ?? null;
    out.outputData = toPlain(step.outputData) ?? null;
  }
  return out;
}

export function serializeTrajectory(trajectory: Trajectory, options: SerializeOptions = {}): SerializedTrajectory {
  const includeFullData = options.includeFullData ?? false;
  return {
    agentName: trajectory.agentName,
    runId: trajectory.runId,
    startedAt: trajectory.startedAt.toISOString(),
    completedAt: iso(trajectory.completedAt),
    success: trajectory.success,
    finalError: trajectory.finalError,
    inputSummary: trajectory.inputSummary,
    outputSummary: trajectory.outputSummary,
    statistics: computeStatistics(trajectory),
    steps: trajectory.steps.map((step) => serializeStep(step, includeFullData)),
  };
}

export function trajectoryToJson(trajectory: Trajectory, options: SerializeOptions = {}, indent = 2): string {
  return JSON.stringify(serializeTrajectory(trajectory, options), null, indent);
}
