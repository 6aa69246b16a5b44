import {
  Clock,
  CrossingDirection,
  CrossingEvent,
  FrameReference,
  LineAxis,
  Logger,
  Point,
  Tlbr,
  TrackObservation
} from '../../types';
import { consoleLogger, systemClock } from '../runtime';

export type CountDirection = CrossingDirection | 'both';

export interface CounterParams {
  axis: LineAxis;
  linePosition: number;   // Pixel coordinate of the line along `axis`
  minDistance: number;    // Net displacement a window must exceed (default 15)
  cooldownMs: number;     // Per-identifier re-count suppression (default 5000)
  historySize: number;    // Centers kept per identifier (default 15)
  countDirection: CountDirection;
}

export const DEFAULT_COUNTER_PARAMS: Omit<CounterParams, 'linePosition'> = {
  axis: 'x',
  minDistance: 15,
  cooldownMs: 5000,
  historySize: 15,
  countDirection: 'both'
};

export interface CounterOptions {
  clock?: Clock;
  logger?: Logger;
  /** Most recent events kept in `eventLog` (default 1000). Sinks see all of them. */
  eventLogSize?: number;
}

const DEFAULT_EVENT_LOG_SIZE = 1000;

/**
 * Turns per-frame confirmed track centers into line-crossing events.
 */
export class CrossingCounter {
  private readonly params: CounterParams;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly eventLogSize: number;

  private histories = new Map<number, Point[]>();
  private lastCounted = new Map<number, number>();
  private events: CrossingEvent[] = [];
  private sequence: number = 0;

  constructor(params: Partial<CounterParams> & Pick<CounterParams, 'linePosition'>, options: CounterOptions = {}) {
    this.params = { ...DEFAULT_COUNTER_PARAMS, ...params };
    if (this.params.historySize < 2) {
      throw new RangeError(`historySize must be at least 2, got ${this.params.historySize}`);
    }
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? consoleLogger;
    this.eventLogSize = options.eventLogSize ?? DEFAULT_EVENT_LOG_SIZE;
  }

  /**
   * Record one frame of observations and return the events it produced.
   */
  observe(observations: readonly TrackObservation[], frameIndex: number): CrossingEvent[] {
    const produced: CrossingEvent[] = [];

    for (const { trackId, center, bbox } of observations) {
      const history = this.histories.get(trackId) ?? [];
      history.push({ x: center.x, y: center.y });
      if (history.length > this.params.historySize) {
        history.splice(0, history.length - this.params.historySize);
      }
      this.histories.set(trackId, history);

      const event = this.evaluate(trackId, history, frameIndex, bbox);
      if (event) {
        produced.push(event);
      }
    }

    return produced;
  }

  private evaluate(trackId: number, history: Point[], frameIndex: number, bbox?: Tlbr): CrossingEvent | null {
    if (history.length < 2) {
      return null;
    }

    const { axis, linePosition, minDistance, cooldownMs, countDirection } = this.params;
    const values = history.map(p => p[axis]);

    if (!crossesLine(values, linePosition)) {
      return null;
    }

    const displacement = values[values.length - 1] - values[0];
    if (Math.abs(displacement) <= minDistance) {
      return null;
    }

    const direction = directionOf(axis, displacement);
    if (countDirection !== 'both' && direction !== countDirection) {
      return null;
    }

    const now = this.clock.now();
    const previous = this.lastCounted.get(trackId);
    if (previous !== undefined && now - previous <= cooldownMs) {
      this.logger.debug(`[Counter] track ${trackId} crossing suppressed, counted ${Math.round(now - previous)}ms ago`);
      return null;
    }

    this.sequence++;
    const frameRef: FrameReference = Object.freeze(
      bbox ? { frameIndex, bbox: Object.freeze(roundTlbr(bbox)) } : { frameIndex }
    );
    const event: CrossingEvent = Object.freeze({
      sequenceNumber: this.sequence,
      trackId,
      timestamp: this.clock.wallClock(),
      direction,
      frameRef
    });

    this.events.push(event);
    if (this.events.length > this.eventLogSize) {
      this.events.splice(0, this.events.length - this.eventLogSize);
    }
    this.lastCounted.set(trackId, now);
    // Only the latest point survives, so this crossing cannot be scanned again
    history.splice(0, history.length - 1);

    this.logger.info(`[Counter] Object #${event.sequenceNumber} (track ID ${trackId}) counted going ${direction}`);
    return event;
  }

  /**
   * Drop position histories of tracks the tracker deleted. Cooldown entries
   * are kept.
   */
  forget(trackIds: Iterable<number>): void {
    for (const id of trackIds) {
      this.histories.delete(id);
    }
  }

  history(trackId: number): readonly Point[] {
    return this.histories.get(trackId) ?? [];
  }

  lastCountedAt(trackId: number): number | undefined {
    return this.lastCounted.get(trackId);
  }

  get total(): number {
    return this.sequence;
  }

  /**
   * The latest `eventLogSize` events, oldest first.
   */
  get eventLog(): readonly CrossingEvent[] {
    return this.events;
  }

  get line(): { axis: LineAxis; position: number } {
    return { axis: this.params.axis, position: this.params.linePosition };
  }
}

/**
 * True when some consecutive pair of values lies on opposite sides of the
 * line. Points exactly on the line count as past it.
 */
export function crossesLine(values: readonly number[], line: number): boolean {
  for (let i = 1; i < values.length; i++) {
    if ((values[i - 1] < line) !== (values[i] < line)) {
      return true;
    }
  }
  return false;
}

export function directionOf(axis: LineAxis, displacement: number): CrossingDirection {
  if (axis === 'x') {
    return displacement > 0 ? 'left-to-right' : 'right-to-left';
  }
  return displacement > 0 ? 'top-to-bottom' : 'bottom-to-top';
}

/**
 * Absolute line position, or `ratio` of the frame extent along the axis.
 */
export function resolveLinePosition(
  line: { axis: LineAxis; position?: number; ratio: number },
  frameWidth: number,
  frameHeight: number
): number {
  if (line.position !== undefined) {
    return line.position;
  }
  const extent = line.axis === 'x' ? frameWidth : frameHeight;
  return Math.round(extent * line.ratio);
}

export function roundTlbr([x1, y1, x2, y2]: Tlbr): Tlbr {
  return [Math.round(x1), Math.round(y1), Math.round(x2), Math.round(y2)];
}
