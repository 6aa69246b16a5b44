export * from './types';
export * from './lib/errors';
export { systemClock, consoleLogger, sleep } from './lib/runtime';
export type { Sleep } from './lib/runtime';

export { iou, iouDistance, assign, linearAssignment } from './lib/tracking/matching';
export type { Assignment, AssignmentResult } from './lib/tracking/matching';
export { KalmanFilter } from './lib/tracking/kalman-filter';
export { Track } from './lib/tracking/track';
export { Tracker, DEFAULT_TRACK_PARAMS } from './lib/tracking/tracker';
export { TrackState } from './lib/tracking/types';
export type { TrackParams } from './lib/tracking/types';

export { DetectionSchema, validateDetections } from './lib/detection/validation';

export {
  CrossingCounter,
  DEFAULT_COUNTER_PARAMS,
  crossesLine,
  directionOf,
  resolveLinePosition,
  roundTlbr
} from './lib/counting/crossing-counter';
export type { CounterOptions, CounterParams, CountDirection } from './lib/counting/crossing-counter';
export { ConsoleSink, SinkDispatcher } from './lib/counting/sinks';
export type { CrossingSink } from './lib/counting/sinks';

export type { CaptureHandle, CaptureSource } from './lib/capture/types';
export { ReplayCapture } from './lib/capture/replay';

export { AcquisitionScheduler, SchedulerState, DEFAULT_SCHEDULER_PARAMS } from './lib/scheduler/acquisition-scheduler';
export type { SchedulerParams, SchedulerOptions } from './lib/scheduler/acquisition-scheduler';
export { backoffDelayMs, retryWithBackoff } from './lib/scheduler/backoff';
export type { BackoffParams } from './lib/scheduler/backoff';
export { createSunDaylightPredicate, alwaysDaytime, localDateKey, sunWindow } from './lib/scheduler/daylight';
export type { SunWindow, DaylightOptions } from './lib/scheduler/daylight';

export { loadConfig, parseConfig, PipelineConfigSchema } from './lib/config';
export type { PipelineConfig, PipelineConfigInput } from './lib/config';

export { CountingPipeline } from './lib/pipeline/counting-pipeline';
export type { Detector, PipelineOptions, PipelineSummary } from './lib/pipeline/counting-pipeline';
export { createPipeline } from './lib/pipeline/create-pipeline';
export type { PipelineDependencies } from './lib/pipeline/create-pipeline';
