export type Tlbr = [x1: number, y1: number, x2: number, y2: number];

export interface Point {
  x: number;
  y: number;
}

export interface Detection {
  bbox: Tlbr; // [x1, y1, x2, y2] in pixels
  score: number;
  class?: string;
}

export interface TrackedObject {
  trackId: number;
  bbox: Tlbr; // sub-pixel Kalman estimate
  center: Point;
  score: number;
  class?: string;
}

export type LineAxis = 'x' | 'y';

export type CrossingDirection =
  | 'left-to-right'
  | 'right-to-left'
  | 'top-to-bottom'
  | 'bottom-to-top';

export interface TrackObservation {
  trackId: number;
  center: Point;
  bbox?: Tlbr;
}

export interface FrameReference {
  readonly frameIndex: number;
  readonly bbox?: Readonly<Tlbr>; // rounded crop of the counted object
}

export interface CrossingEvent {
  readonly sequenceNumber: number;
  readonly trackId: number;
  readonly timestamp: Date;
  readonly direction: CrossingDirection;
  readonly frameRef: FrameReference;
}

export interface Clock {
  /** Monotonic milliseconds, used for cooldown math. */
  now(): number;
  wallClock(): Date;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export type DaylightPredicate = (timestamp: Date) => boolean;

export interface GeoLocation {
  latitude: number;
  longitude: number;
  timeZone: string;
}
