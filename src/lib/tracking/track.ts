import { Detection, Point, Tlbr } from '../../types';
import { KalmanFilter, Matrix, Vector } from './kalman-filter';
import { TrackState } from './types';

export class Track {
  readonly trackId: number;
  state: TrackState;
  score: number;
  class?: string;

  hits: number;
  hitStreak: number;
  age: number;
  timeSinceUpdate: number;

  private kalmanFilter: KalmanFilter;
  private mean: Vector;
  private covariance: Matrix;

  constructor(trackId: number, det: Detection, kalmanFilter: KalmanFilter, minHits: number) {
    this.trackId = trackId;
    this.kalmanFilter = kalmanFilter;
    [this.mean, this.covariance] = kalmanFilter.initiate(det.bbox);

    this.state = minHits <= 1 ? TrackState.Confirmed : TrackState.Tentative;
    this.score = det.score;
    this.class = det.class;

    // The spawning detection is the first hit
    this.hits = 1;
    this.hitStreak = 1;
    this.age = 0;
    this.timeSinceUpdate = 0;
  }

  /**
   * Advance the motion model one frame.
   */
  predict(): void {
    // Keep the height from collapsing through zero
    if (this.mean[3] + this.mean[7] <= 0) {
      this.mean[7] = 0;
    }

    [this.mean, this.covariance] = this.kalmanFilter.predict(this.mean, this.covariance);

    this.age++;
    if (this.timeSinceUpdate > 0) {
      this.hitStreak = 0;
    }
    this.timeSinceUpdate++;
  }

  /**
   * Correct the motion model with a matched detection.
   */
  update(det: Detection, minHits: number): void {
    [this.mean, this.covariance] = this.kalmanFilter.update(this.mean, this.covariance, det.bbox);

    this.timeSinceUpdate = 0;
    this.hits++;
    this.hitStreak++;
    this.score = det.score;
    if (det.class !== undefined) {
      this.class = det.class;
    }

    if (this.state === TrackState.Lost || this.hitStreak >= minHits) {
      this.state = TrackState.Confirmed;
    }
  }

  markMissed(): void {
    if (this.state === TrackState.Confirmed) {
      this.state = TrackState.Lost;
    }
  }

  markDeleted(): void {
    this.state = TrackState.Deleted;
  }

  get tlbr(): Tlbr {
    return this.kalmanFilter.stateToBbox(this.mean);
  }

  get center(): Point {
    return { x: this.mean[0], y: this.mean[1] };
  }

  /**
   * Velocity of the box center in pixels per frame.
   */
  get velocity(): Point {
    return { x: this.mean[4], y: this.mean[5] };
  }

  get isConfirmed(): boolean {
    return this.state === TrackState.Confirmed;
  }
}
