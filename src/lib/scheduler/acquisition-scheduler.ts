import { Clock, DaylightPredicate, Logger } from '../../types';
import { CaptureHandle, CaptureSource } from '../capture/types';
import { CaptureExhaustedError, errorMessage } from '../errors';
import { Sleep, consoleLogger, sleep as defaultSleep, systemClock } from '../runtime';
import { BackoffParams, retryWithBackoff } from './backoff';

export enum SchedulerState {
  Active = 'ACTIVE',
  Sleeping = 'SLEEPING'
}

export interface SchedulerParams extends BackoffParams {
  suspendMs: number;        // Nighttime sleep between daylight checks (default 300000)
  pollIntervalMs: number;   // Wait before the next acquisition cycle after exhaustion (default 30000)
  readRetryMs: number;      // Pause after a failed frame read (default 100)
  maxReadFailures: number;  // Consecutive read failures before reopening the capture (default 10)
}

export const DEFAULT_SCHEDULER_PARAMS: SchedulerParams = {
  suspendMs: 300_000,
  pollIntervalMs: 30_000,
  readRetryMs: 100,
  maxReadFailures: 10,
  maxRetries: 5,
  backoffBase: 2,
  maxBackoffMs: 60_000
};

export interface SchedulerOptions {
  params?: Partial<SchedulerParams>;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
  onStateChange?: (state: SchedulerState, at: Date) => void;
  onAcquisitionFailure?: (error: CaptureExhaustedError) => void;
}

/**
 * Decides when frames are pulled: active in daylight, asleep at night, and
 * reopening the capture with exponential backoff when it fails.
 */
export class AcquisitionScheduler<TFrame> {
  private _state: SchedulerState | null = null;
  private handle: CaptureHandle<TFrame> | null = null;
  private readFailures: number = 0;

  private readonly params: SchedulerParams;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly onStateChange?: (state: SchedulerState, at: Date) => void;
  private readonly onAcquisitionFailure?: (error: CaptureExhaustedError) => void;

  constructor(
    private readonly capture: CaptureSource<TFrame>,
    private readonly isDaytime: DaylightPredicate,
    options: SchedulerOptions = {}
  ) {
    this.params = { ...DEFAULT_SCHEDULER_PARAMS, ...options.params };
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? consoleLogger;
    this.onStateChange = options.onStateChange;
    this.onAcquisitionFailure = options.onAcquisitionFailure;
  }

  /**
   * Current state; computed from the daylight predicate on first access.
   */
  get state(): SchedulerState {
    if (this._state === null) {
      const now = this.clock.wallClock();
      this._state = this.isDaytime(now) ? SchedulerState.Active : SchedulerState.Sleeping;
      this.logger.info(`[Scheduler] starting ${this._state} at ${now.toISOString()}`);
    }
    return this._state;
  }

  get hasHandle(): boolean {
    return this.handle !== null;
  }

  /**
   * Per-frame daylight check. An active scheduler that finds it is night goes
   * to sleep and releases the capture.
   */
  async checkDaylight(): Promise<SchedulerState> {
    if (this.state === SchedulerState.Active) {
      const now = this.clock.wallClock();
      if (!this.isDaytime(now)) {
        this.logger.info(`[Scheduler] nighttime at ${now.toISOString()}, sleeping ${Math.round(this.params.suspendMs / 1000)}s`);
        await this.releaseHandle();
        this.transition(SchedulerState.Sleeping, now);
      }
    }
    return this.state;
  }

  /**
   * One suspend period, then a fresh daylight check. Wakes up and reopens the
   * capture if it is day. Returns the resulting state.
   */
  async sleepCycle(signal?: AbortSignal): Promise<SchedulerState> {
    await this.sleep(this.params.suspendMs, signal);
    if (signal?.aborted) {
      return this.state;
    }

    const now = this.clock.wallClock();
    if (this.isDaytime(now)) {
      this.transition(SchedulerState.Active, now);
      await this.ensureHandle(signal);
    } else {
      this.logger.debug(`[Scheduler] still night at ${now.toISOString()}`);
    }
    return this.state;
  }

  /**
   * Open the capture with exponential backoff. Throws
   * `CaptureExhaustedError` when every attempt failed; resolves `null` if
   * aborted.
   */
  async acquire(signal?: AbortSignal): Promise<CaptureHandle<TFrame> | null> {
    const { maxRetries } = this.params;
    const handle = await retryWithBackoff(() => this.capture.open(), this.params, {
      sleep: this.sleep,
      signal,
      onFailure: (attempt, error, delayMs) => {
        this.logger.error(
          `[Scheduler] ${this.capture.name} open error [${attempt}/${maxRetries}]: ${errorMessage(error)}; retrying in ${delayMs}ms`
        );
      }
    });
    if (handle) {
      this.logger.info(`[Scheduler] ${this.capture.name} opened`);
    }
    return handle;
  }

  /**
   * Pull the next frame, sleeping through the night and retrying the capture
   * as needed. Resolves `null` on cancellation or end of stream, releasing
   * the capture first.
   */
  async nextFrame(signal?: AbortSignal): Promise<TFrame | null> {
    while (!signal?.aborted) {
      if ((await this.checkDaylight()) === SchedulerState.Sleeping) {
        await this.sleepCycle(signal);
        continue;
      }

      const handle = await this.ensureHandle(signal);
      if (!handle) {
        continue;
      }

      let frame: TFrame | null;
      try {
        frame = await handle.read();
      } catch (error) {
        await this.onReadFailure(error, signal);
        continue;
      }
      this.readFailures = 0;

      if (frame === null) {
        this.logger.info(`[Scheduler] ${this.capture.name} reached end of stream`);
        await this.stop();
        return null;
      }
      return frame;
    }

    await this.stop();
    return null;
  }

  async stop(): Promise<void> {
    await this.releaseHandle();
  }

  private async ensureHandle(signal?: AbortSignal): Promise<CaptureHandle<TFrame> | null> {
    if (this.handle) {
      return this.handle;
    }
    try {
      this.handle = await this.acquire(signal);
    } catch (error) {
      if (!(error instanceof CaptureExhaustedError)) {
        throw error;
      }
      this.logger.error(
        `[Scheduler] ${error.message} (waited ${error.totalDelayMs}ms) at ${this.clock.wallClock().toISOString()}; next attempt in ${this.params.pollIntervalMs}ms`
      );
      this.onAcquisitionFailure?.(error);
      await this.sleep(this.params.pollIntervalMs, signal);
      return null;
    }
    return this.handle;
  }

  private async onReadFailure(error: unknown, signal?: AbortSignal): Promise<void> {
    this.readFailures++;
    this.logger.warn(
      `[Scheduler] frame grab failed [${this.readFailures}/${this.params.maxReadFailures}]: ${errorMessage(error)}`
    );
    if (this.readFailures >= this.params.maxReadFailures) {
      this.logger.warn(`[Scheduler] reopening ${this.capture.name}`);
      this.readFailures = 0;
      await this.releaseHandle();
    }
    await this.sleep(this.params.readRetryMs, signal);
  }

  private async releaseHandle(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    await handle.release();
    this.logger.info(`[Scheduler] ${this.capture.name} released`);
  }

  private transition(next: SchedulerState, at: Date): void {
    if (this._state === next) {
      return;
    }
    this._state = next;
    this.onStateChange?.(next, at);
  }
}
