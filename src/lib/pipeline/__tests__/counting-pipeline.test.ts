import { CountingPipeline, Detector } from '../counting-pipeline';
import { createPipeline } from '../create-pipeline';
import { ReplayCapture } from '../../capture/replay';
import { parseConfig } from '../../config';
import { CrossingCounter } from '../../counting/crossing-counter';
import { CrossingSink } from '../../counting/sinks';
import { AcquisitionScheduler } from '../../scheduler/acquisition-scheduler';
import { Tracker } from '../../tracking/tracker';
import { FakeClock, MockLogger, createFakeSleep, createLogger, detectionAt } from '../../../test-utils';
import { CrossingEvent, Detection } from '../../../types';

const FRAME_COUNT = 10;

/** One boat moving left to right across x = 150, 100ms per frame. */
function movingBoat(clock: FakeClock): Detector<number> {
  return {
    detect: (i: number) => {
      clock.advance(100);
      return [detectionAt(40 + (220 * i) / 9, 180)];
    }
  };
}

function frames(): number[] {
  return Array.from({ length: FRAME_COUNT }, (_, i) => i);
}

describe('createPipeline', () => {
  let clock: FakeClock;
  let logger: MockLogger;

  beforeEach(() => {
    clock = new FakeClock();
    logger = createLogger();
  });

  it('should count a single crossing once', async () => {
    const received: CrossingEvent[] = [];
    const pipeline = createPipeline(parseConfig({ counter: { linePosition: 150 } }), {
      capture: new ReplayCapture(frames()),
      detector: movingBoat(clock),
      sinks: [{ name: 'memory', handle: event => void received.push(event) }],
      isDaytime: () => true,
      clock,
      sleep: createFakeSleep().sleep,
      logger
    });

    const summary = await pipeline.run();

    expect(summary).toEqual({ frames: 10, events: 1, total: 1, sinkFailures: 0 });
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      sequenceNumber: 1,
      trackId: 1,
      direction: 'left-to-right',
      timestamp: new Date('2025-06-21T18:00:00.600Z'),
      frameRef: { frameIndex: 5 }
    });
    expect(Object.isFrozen(received[0])).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('[Counter] Object #1 (track ID 1) counted going left-to-right');
    expect(logger.info).toHaveBeenCalledWith('[Pipeline] stopped after 10 frames, total count 1');
  });

  it('should keep the count when a sink fails', async () => {
    const failing: CrossingSink = {
      name: 'sheet',
      handle: async () => {
        throw new Error('quota exceeded');
      }
    };
    const pipeline = createPipeline(parseConfig({ counter: { linePosition: 150 } }), {
      capture: new ReplayCapture(frames()),
      detector: movingBoat(clock),
      sinks: [failing],
      isDaytime: () => true,
      clock,
      sleep: createFakeSleep().sleep,
      logger
    });

    const summary = await pipeline.run();

    expect(summary).toEqual({ frames: 10, events: 1, total: 1, sinkFailures: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      '[Sinks] Sink "sheet" failed for track 1 (event #1 at 2025-06-21T18:00:00.600Z): quota exceeded'
    );
  });

  it('should place the line by ratio when no position is given', async () => {
    const received: CrossingEvent[] = [];
    const pipeline = createPipeline(parseConfig({ frameWidth: 300, counter: { lineRatio: 0.5 } }), {
      capture: new ReplayCapture(frames()),
      detector: movingBoat(clock),
      sinks: [{ name: 'memory', handle: event => void received.push(event) }],
      isDaytime: () => true,
      clock,
      sleep: createFakeSleep().sleep,
      logger
    });

    await pipeline.run();

    expect(received.map(event => event.frameRef.frameIndex)).toEqual([5]);
  });

  it('should run under the midnight sun with the sun-based daylight check', async () => {
    const config = parseConfig({
      counter: { linePosition: 150 },
      location: { latitude: 64.15, longitude: -21.94, timeZone: 'Atlantic/Reykjavik' }
    });
    const pipeline = createPipeline(config, {
      capture: new ReplayCapture(frames()),
      detector: movingBoat(clock),
      sinks: [],
      clock,
      sleep: createFakeSleep().sleep,
      logger
    });

    expect(await pipeline.run()).toEqual({ frames: 10, events: 1, total: 1, sinkFailures: 0 });
  });

  it('should stop without frames when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const capture = new ReplayCapture(frames());
    const pipeline = createPipeline(parseConfig({}), {
      capture,
      detector: movingBoat(clock),
      isDaytime: () => true,
      clock,
      sleep: createFakeSleep().sleep,
      logger
    });

    expect(await pipeline.run(controller.signal)).toEqual({ frames: 0, events: 0, total: 0, sinkFailures: 0 });
    expect(capture.isOpen).toBe(false);
  });
});

describe('CountingPipeline', () => {
  function build(detector: Detector<string>, logger: MockLogger) {
    const clock = new FakeClock();
    const tracker = new Tracker({ minHits: 1 }, logger);
    const pipeline = new CountingPipeline<string>({
      scheduler: new AcquisitionScheduler(new ReplayCapture<string>([]), () => true, { clock, logger }),
      detector,
      tracker,
      counter: new CrossingCounter({ linePosition: 150 }, { clock, logger }),
      classFilter: 'boat',
      confidenceThreshold: 0.35,
      logger
    });
    return { pipeline, tracker };
  }

  it('should drop detections of other classes or low confidence', async () => {
    const detections: Detection[] = [
      detectionAt(100, 180),
      detectionAt(300, 180, 0.9, 'car'),
      { bbox: [470, 150, 530, 210], score: 0.9 },
      detectionAt(200, 80, 0.2)
    ];
    const { pipeline, tracker } = build({ detect: () => detections }, createLogger());

    await pipeline.processFrame('frame');

    expect(tracker.getTracks().map(track => track.class)).toEqual(['boat', undefined]);
  });

  it('should treat a failed detection as an empty frame', async () => {
    const logger = createLogger();
    const { pipeline, tracker } = build(
      {
        detect: () => {
          throw new Error('model crashed');
        }
      },
      logger
    );

    expect(await pipeline.processFrame('frame')).toEqual([]);
    expect(tracker.frameCount).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('[Pipeline] frame 0: detector failed: model crashed');
  });
});
