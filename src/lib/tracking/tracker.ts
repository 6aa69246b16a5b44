import { Detection, Logger, TrackedObject } from '../../types';
import { reportRejections, validateDetections } from '../detection/validation';
import { consoleLogger } from '../runtime';
import { KalmanFilter } from './kalman-filter';
import { iouDistance, linearAssignment } from './matching';
import { Track } from './track';
import { TrackParams, TrackState } from './types';

export const DEFAULT_TRACK_PARAMS: TrackParams = {
  minHits: 3,
  maxAge: 30,
  iouThreshold: 0.3
};

/**
 * SORT-style multi-object tracker: Kalman prediction, IoU Hungarian
 * association, and hit/age based track lifecycle.
 */
export class Tracker {
  private tracks: Track[] = [];
  private removed: number[] = [];
  private frameId: number = 0;
  private nextTrackId: number = 1;
  private readonly params: TrackParams;
  private readonly kalmanFilter = new KalmanFilter();
  private readonly logger: Logger;

  constructor(params: Partial<TrackParams> = {}, logger: Logger = consoleLogger) {
    this.params = {
      minHits: params.minHits ?? DEFAULT_TRACK_PARAMS.minHits,
      maxAge: params.maxAge ?? DEFAULT_TRACK_PARAMS.maxAge,
      iouThreshold: params.iouThreshold ?? DEFAULT_TRACK_PARAMS.iouThreshold
    };
    this.logger = logger;

    this.logger.debug('[Tracker] initialized with params:', this.params);
  }

  /**
   * Advance every track's motion model one frame.
   */
  predict(): void {
    for (const track of this.tracks) {
      track.predict();
    }
  }

  /**
   * Feed one frame of detections. Returns the confirmed tracks matched in
   * this frame; tentative and lost tracks stay internal.
   */
  update(detections: readonly Detection[]): TrackedObject[] {
    this.frameId++;
    this.removed = [];

    const { valid, rejected } = validateDetections(detections);
    reportRejections(rejected, this.logger, `frame ${this.frameId}`);

    /** Step 1: Predict */
    this.predict();

    /** Step 2: Associate */
    const costs = iouDistance(this.tracks.map(t => t.tlbr), valid.map(d => d.bbox));
    const { matches, unmatchedRows, unmatchedCols } = linearAssignment(
      costs,
      valid.length,
      1 - this.params.iouThreshold
    );

    /** Steps 3 and 5: Correct matched tracks, confirming those with enough hits */
    for (const [itrack, idet] of matches) {
      this.tracks[itrack].update(valid[idet], this.params.minHits);
    }

    for (const itrack of unmatchedRows) {
      this.tracks[itrack].markMissed();
    }

    /** Step 4: Spawn tentative tracks */
    for (const idet of unmatchedCols) {
      const track = new Track(this.nextTrackId++, valid[idet], this.kalmanFilter, this.params.minHits);
      this.tracks.push(track);
    }

    /** Step 6: Age out */
    const survivors: Track[] = [];
    for (const track of this.tracks) {
      if (track.timeSinceUpdate > this.params.maxAge) {
        track.markDeleted();
        this.removed.push(track.trackId);
      } else {
        survivors.push(track);
      }
    }
    this.tracks = survivors;

    if (this.removed.length > 0) {
      this.logger.debug(`[Tracker] frame ${this.frameId}: removed tracks ${this.removed.join(', ')}`);
    }

    /** Step 7: Output */
    return this.tracks.filter(t => t.state === TrackState.Confirmed).map(toTrackedObject);
  }

  /**
   * Identifiers deleted during the last update.
   */
  get removedTrackIds(): readonly number[] {
    return this.removed;
  }

  /**
   * All live tracks, including tentative and lost ones.
   */
  getTracks(): readonly Track[] {
    return this.tracks;
  }

  get frameCount(): number {
    return this.frameId;
  }

  /**
   * Drop all tracks. Identifiers keep increasing so none is ever handed out
   * twice.
   */
  reset(): void {
    this.removed = this.tracks.map(t => t.trackId);
    this.tracks = [];
    this.frameId = 0;
  }
}

function toTrackedObject(track: Track): TrackedObject {
  const tracked: TrackedObject = {
    trackId: track.trackId,
    bbox: track.tlbr,
    center: track.center,
    score: track.score
  };
  if (track.class !== undefined) {
    tracked.class = track.class;
  }
  return tracked;
}
