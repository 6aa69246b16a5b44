import { Clock, DaylightPredicate, Logger } from '../../types';
import { CaptureSource } from '../capture/types';
import { PipelineConfig } from '../config';
import { CrossingCounter, resolveLinePosition } from '../counting/crossing-counter';
import { ConsoleSink, CrossingSink } from '../counting/sinks';
import { CaptureExhaustedError } from '../errors';
import { Sleep, consoleLogger, systemClock } from '../runtime';
import { AcquisitionScheduler, SchedulerState } from '../scheduler/acquisition-scheduler';
import { alwaysDaytime, createSunDaylightPredicate } from '../scheduler/daylight';
import { Tracker } from '../tracking/tracker';
import { CountingPipeline, Detector } from './counting-pipeline';

export interface PipelineDependencies<TFrame> {
  capture: CaptureSource<TFrame>;
  detector: Detector<TFrame>;
  /** Defaults to a single console sink. */
  sinks?: readonly CrossingSink[];
  /** Overrides the sun-based predicate built from `config.location`. */
  isDaytime?: DaylightPredicate;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
  onStateChange?: (state: SchedulerState, at: Date) => void;
  onAcquisitionFailure?: (error: CaptureExhaustedError) => void;
}

/**
 * Build the tracker, counter, scheduler and pipeline described by a
 * validated configuration.
 */
export function createPipeline<TFrame>(
  config: PipelineConfig,
  deps: PipelineDependencies<TFrame>
): CountingPipeline<TFrame> {
  const logger = deps.logger ?? consoleLogger;
  const clock = deps.clock ?? systemClock;

  const tracker = new Tracker(config.tracker, logger);

  const { lineRatio, linePosition, ...counterParams } = config.counter;
  const counter = new CrossingCounter(
    {
      ...counterParams,
      linePosition: resolveLinePosition(
        { axis: counterParams.axis, position: linePosition, ratio: lineRatio },
        config.frameWidth,
        config.frameHeight
      )
    },
    { clock, logger }
  );

  const isDaytime =
    deps.isDaytime ??
    (config.location
      ? createSunDaylightPredicate(config.location, { useTwilight: config.location.useTwilight, logger })
      : alwaysDaytime);

  const scheduler = new AcquisitionScheduler(deps.capture, isDaytime, {
    params: config.scheduler,
    clock,
    sleep: deps.sleep,
    logger,
    onStateChange: deps.onStateChange,
    onAcquisitionFailure: deps.onAcquisitionFailure
  });

  return new CountingPipeline({
    scheduler,
    detector: deps.detector,
    tracker,
    counter,
    sinks: deps.sinks ?? [new ConsoleSink(logger)],
    classFilter: config.classFilter,
    confidenceThreshold: config.confidenceThreshold,
    logger
  });
}
