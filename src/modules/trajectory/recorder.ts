import { generateRunId } from '../../utils/id';
import { createLogger } from '../../utils/logger';
import { computeStatistics } from './statistics';
import { TERMINAL_STATUSES } from './types';
import type { StepHandle, Trajectory, TrajectoryStatistics, TrajectoryStep } from './types';

const log = createLogger('TRAJECTORY');

export interface RecorderOptions {
  runId?: string;
  inputSummary?: string;
  now?: () => Date;
}

export interface FinishOptions {
  error?: string;
  outputSummary?: string;
}

/**
 * Append-only audit trail for one run. Steps move pending -> running -> a
 * terminal state exactly once; `finish` seals the recorder and any later
 * transition is logged and ignored.
 */
export class TrajectoryRecorder {
  private readonly steps: TrajectoryStep[] = [];
  private readonly now: () => Date;
  private readonly startedAt: Date;
  private readonly runIdValue: string;
  private readonly inputSummary: string | null;

  private completedAt: Date | null = null;
  private success: boolean | null = null;
  private finalError: string | null = null;
  private outputSummary: string | null = null;
  private sealed = false;

  constructor(
    private readonly agentName: string,
    options: RecorderOptions = {}
  ) {
    this.now = options.now || (() => new Date());
    this.startedAt = this.now();
    this.runIdValue = options.runId || generateRunId();
    this.inputSummary = options.inputSummary ?? null;
  }

  get runId(): string {
    return this.runIdValue;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  start(name: string, tool: string, inputSummary?: string, inputData?: unknown): StepHandle {
    const step = this.append(name, tool, inputSummary, inputData);
    if (!step) {
      return { index: 0, name };
    }
    step.status = 'running';
    step.startedAt = this.now();
    log.debug(`Step ${step.index} started: ${name}`, { runId: this.runIdValue, tool });
    return { index: step.index, name };
  }

  complete(handle: StepHandle, outputSummary?: string, outputData?: unknown): void {
    const step = this.running(handle, 'complete');
    if (!step) return;

    step.status = 'success';
    step.outputSummary = outputSummary ?? null;
    if (outputData !== undefined) {
      step.outputData = outputData;
    }
    this.close(step);
    log.debug(`Step ${step.index} succeeded: ${step.name}`, { runId: this.runIdValue, durationMs: step.durationMs });
  }

  fail(handle: StepHandle, error: string, errorType?: string): void {
    const step = this.running(handle, 'fail');
    if (!step) return;

    step.status = 'failed';
    step.error = error;
    step.errorType = errorType ?? null;
    this.close(step);
    log.warn(`Step ${step.index} failed: ${step.name}`, { runId: this.runIdValue, error, errorType });
  }

  /** Records a step that never ran. */
  skip(name: string, tool: string, reason: string): StepHandle {
    const step = this.append(name, tool);
    if (!step) {
      return { index: 0, name };
    }
    step.status = 'skipped';
    step.completedAt = this.now();
    step.metadata.skipReason = reason;
    log.debug(`Step ${step.index} skipped: ${name}`, { runId: this.runIdValue, reason });
    return { index: step.index, name };
  }

  /** Fails every step still running, e.g. when a run is aborted from outside the step. */
  failRunning(error: string, errorType?: string): void {
    for (const step of this.steps) {
      if (step.status === 'running') {
        this.fail({ index: step.index, name: step.name }, error, errorType);
      }
    }
  }

  finish(success: boolean, options: FinishOptions = {}): void {
    if (this.sealed) {
      log.warn('finish called on a sealed trajectory, ignoring', { runId: this.runIdValue });
      return;
    }
    this.sealed = true;
    this.completedAt = this.now();
    this.success = success;
    this.finalError = options.error ?? null;
    this.outputSummary = options.outputSummary ?? null;
    log.info(`Run ${success ? 'succeeded' : 'failed'}`, {
      runId: this.runIdValue,
      agentName: this.agentName,
      steps: this.steps.length,
      error: this.finalError,
    });
  }

  statistics(): TrajectoryStatistics {
    return computeStatistics(this.snapshot());
  }

  /** A copy of the trajectory as recorded so far; later transitions do not affect it. */
  snapshot(): Trajectory {
    return {
      agentName: this.agentName,
      runId: this.runIdValue,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      steps: this.steps.map((step) => ({ ...step, metadata: { ...step.metadata } })),
      success: this.success,
      finalError: this.finalError,
      inputSummary: this.inputSummary,
      outputSummary: this.outputSummary,
    };
  }

  private append(name: string, tool: string, inputSummary?: string, inputData?: unknown): TrajectoryStep | null {
    if (this.sealed) {
      log.warn(`Ignoring step "${name}" on a sealed trajectory`, { runId: this.runIdValue });
      return null;
    }
    const step: TrajectoryStep = {
      index: this.steps.length + 1,
      name,
      tool,
      status: 'pending',
      startedAt: null,
      completedAt: null,
      durationMs: null,
      inputSummary: inputSummary ?? null,
      outputSummary: null,
      error: null,
      errorType: null,
      metadata: {},
    };
    if (inputData !== undefined) {
      step.inputData = inputData;
    }
    this.steps.push(step);
    return step;
  }

  private running(handle: StepHandle, action: string): TrajectoryStep | null {
    if (this.sealed) {
      log.warn(`Ignoring ${action} of "${handle.name}" on a sealed trajectory`, { runId: this.runIdValue });
      return null;
    }
    const step = this.steps[handle.index - 1];
    if (!step || step.name !== handle.name) {
      log.warn(`Ignoring ${action} of unknown step "${handle.name}"`, { runId: this.runIdValue });
      return null;
    }
    if (TERMINAL_STATUSES.has(step.status)) {
      log.warn(`Ignoring ${action} of "${step.name}": already ${step.status}`, { runId: this.runIdValue });
      return null;
    }
    return step;
  }

  private close(step: TrajectoryStep): void {
    const completedAt = this.now();
    step.completedAt = completedAt;
    step.durationMs = step.startedAt ? completedAt.getTime() - step.startedAt.getTime() : null;
  }
}
