import { CrossingEvent, Logger } from '../../types';
import { SinkError, errorMessage } from '../errors';
import { consoleLogger } from '../runtime';

export interface CrossingSink {
  readonly name: string;
  handle(event: CrossingEvent): void | Promise<void>;
}

export class ConsoleSink implements CrossingSink {
  readonly name = 'console';

  constructor(private readonly logger: Logger = consoleLogger) {}

  handle(event: CrossingEvent): void {
    const box = event.frameRef.bbox ? ` box=[${event.frameRef.bbox.join(', ')}]` : '';
    this.logger.info(
      `Object #${event.sequenceNumber} (track ID ${event.trackId}) counted going ${event.direction} ` +
        `at ${event.timestamp.toISOString()} frame=${event.frameRef.frameIndex}${box}`
    );
  }
}

/**
 * Fans events out to every sink without letting one sink's failure reach the
 * others or the caller. Deliveries run in the background; `drain()` waits
 * for the outstanding ones.
 */
export class SinkDispatcher {
  private pending = new Set<Promise<void>>();
  private failureCount: number = 0;

  constructor(
    private readonly sinks: readonly CrossingSink[],
    private readonly logger: Logger = consoleLogger
  ) {}

  dispatch(event: CrossingEvent): void {
    for (const sink of this.sinks) {
      const delivery = this.deliver(sink, event);
      this.pending.add(delivery);
      void delivery.finally(() => this.pending.delete(delivery));
    }
  }

  private async deliver(sink: CrossingSink, event: CrossingEvent): Promise<void> {
    try {
      await sink.handle(event);
    } catch (cause) {
      this.failureCount++;
      const error = new SinkError(sink.name, event.trackId, { cause });
      this.logger.error(
        `[${error.component}] ${error.message} (event #${event.sequenceNumber} at ${event.timestamp.toISOString()}): ${errorMessage(cause)}`
      );
    }
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  get failures(): number {
    return this.failureCount;
  }
}
