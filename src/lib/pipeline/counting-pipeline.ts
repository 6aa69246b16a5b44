import { CrossingEvent, Detection, Logger } from '../../types';
import { CrossingCounter } from '../counting/crossing-counter';
import { CrossingSink, SinkDispatcher } from '../counting/sinks';
import { errorMessage } from '../errors';
import { consoleLogger } from '../runtime';
import { AcquisitionScheduler } from '../scheduler/acquisition-scheduler';
import { Tracker } from '../tracking/tracker';

export interface Detector<TFrame> {
  detect(frame: TFrame): Detection[] | Promise<Detection[]>;
}

export interface PipelineOptions<TFrame> {
  scheduler: AcquisitionScheduler<TFrame>;
  detector: Detector<TFrame>;
  tracker: Tracker;
  counter: CrossingCounter;
  sinks?: readonly CrossingSink[];
  classFilter?: string;
  confidenceThreshold?: number;
  logger?: Logger;
}

export interface PipelineSummary {
  frames: number;
  events: number;
  total: number;
  sinkFailures: number;
}

/**
 * acquire -> detect -> track -> count -> sink, one frame at a time and in
 * arrival order.
 */
export class CountingPipeline<TFrame> {
  private frameIndex: number = 0;
  private readonly dispatcher: SinkDispatcher;
  private readonly logger: Logger;

  constructor(private readonly options: PipelineOptions<TFrame>) {
    this.logger = options.logger ?? consoleLogger;
    this.dispatcher = new SinkDispatcher(options.sinks ?? [], this.logger);
  }

  /**
   * Run one frame through detection, tracking and counting. Events are handed
   * to the sinks before this resolves, but not awaited.
   */
  async processFrame(frame: TFrame): Promise<CrossingEvent[]> {
    const index = this.frameIndex++;
    const { detector, tracker, counter } = this.options;

    let detections: Detection[];
    try {
      detections = await detector.detect(frame);
    } catch (error) {
      // An unusable frame is treated as an empty one so tracks still age
      this.logger.error(`[Pipeline] frame ${index}: detector failed: ${errorMessage(error)}`);
      detections = [];
    }

    const tracked = tracker.update(detections.filter(det => this.accepts(det)));
    counter.forget(tracker.removedTrackIds);

    const events = counter.observe(
      tracked.map(t => ({ trackId: t.trackId, center: t.center, bbox: t.bbox })),
      index
    );
    for (const event of events) {
      this.dispatcher.dispatch(event);
    }
    return events;
  }

  /**
   * Pull frames from the scheduler until cancelled or the stream ends.
   */
  async run(signal?: AbortSignal): Promise<PipelineSummary> {
    const { scheduler, counter } = this.options;
    let frames = 0;
    let events = 0;

    try {
      while (!signal?.aborted) {
        const frame = await scheduler.nextFrame(signal);
        if (frame === null) {
          break;
        }
        const index = this.frameIndex;
        try {
          events += (await this.processFrame(frame)).length;
        } catch (error) {
          this.logger.error(`[Pipeline] frame ${index} failed: ${errorMessage(error)}`);
        }
        frames++;
      }
    } finally {
      await scheduler.stop();
      await this.dispatcher.drain();
    }

    this.logger.info(`[Pipeline] stopped after ${frames} frames, total count ${counter.total}`);
    return { frames, events, total: counter.total, sinkFailures: this.dispatcher.failures };
  }

  /**
   * Detections without a class label are assumed to be pre-filtered.
   */
  private accepts(det: Detection): boolean {
    const { classFilter, confidenceThreshold } = this.options;
    if (classFilter !== undefined && det.class !== undefined && det.class !== classFilter) {
      return false;
    }
    return confidenceThreshold === undefined || det.score >= confidenceThreshold;
  }
}
