import type { Trajectory, TrajectoryStatistics } from './types';

export function computeStatistics(trajectory: Trajectory): TrajectoryStatistics {
  const { steps } = trajectory;
  const timed = steps.filter((step) => step.durationMs !== null);

  let slowestStep: string | null = null;
  let slowestMs = -1;
  let totalStepMs = 0;
  for (const step of timed) {
    const ms = step.durationMs ?? 0;
    totalStepMs += ms;
    if (ms > slowestMs) {
      slowestMs = ms;
      slowestStep = step.name;
    }
  }

  return {
    totalSteps: steps.length,
    successfulSteps: steps.filter((step) => step.status === 'success').length,
    failedSteps: steps.filter((step) => step.status === 'failed').length,
    skippedSteps: steps.filter((step) => step.status === 'skipped').length,
    totalDurationMs: trajectory.completedAt
      ? trajectory.completedAt.getTime() - trajectory.startedAt.getTime()
      : null,
    avgStepDurationMs: timed.length > 0 ? totalStepMs / timed.length : null,
    slowestStep,
  };
}
