export * from './types';
export { TrajectoryRecorder } from './recorder';
export type { RecorderOptions, FinishOptions } from './recorder';
export { computeStatistics } from './statistics';
export { serializeTrajectory, trajectoryToJson, toPlain } from './serialize';
export type { SerializedStep, SerializedTrajectory, SerializeOptions } from './serialize';
