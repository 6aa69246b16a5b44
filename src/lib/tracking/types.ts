export enum TrackState {
  Tentative = 1,
  Confirmed = 2,
  Lost = 3,
  Deleted = 4
}

export interface TrackParams {
  minHits: number;      // Consecutive matches before a track is confirmed (default 3)
  maxAge: number;       // Frames a track may go unmatched before deletion (default 30)
  iouThreshold: number; // Minimum IoU for an assignment to stand (default 0.3)
}
