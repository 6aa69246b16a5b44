export class CounterError extends Error {
  readonly component: string;

  constructor(component: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.component = component;
  }
}

export class DetectionValidationError extends CounterError {
  readonly index: number;

  constructor(index: number, message: string) {
    super('Detection', `Detection ${index} rejected: ${message}`);
    this.index = index;
  }
}

export class CaptureError extends CounterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('Capture', message, options);
  }
}

/**
 * Raised when every acquisition attempt of one cycle failed. The scheduler
 * reports it and tries again on its next tick.
 */
export class CaptureExhaustedError extends CounterError {
  readonly attempts: number;
  readonly totalDelayMs: number;

  constructor(attempts: number, totalDelayMs: number, options?: { cause?: unknown }) {
    super('Scheduler', `Capture could not be opened after ${attempts} attempts`, options);
    this.attempts = attempts;
    this.totalDelayMs = totalDelayMs;
  }
}

export class ConfigurationError extends CounterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('Config', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class SinkError extends CounterError {
  readonly sink: string;
  readonly trackId: number;

  constructor(sink: string, trackId: number, options?: { cause?: unknown }) {
    super('Sinks', `Sink "${sink}" failed for track ${trackId}`, options);
    this.sink = sink;
    this.trackId = trackId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
