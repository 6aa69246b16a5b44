import { CaptureError } from '../errors';
import { CaptureHandle, CaptureSource } from './types';

/**
 * Serves a fixed list of frames in order, like a recorded video file.
 * Each `open()` rewinds to the first frame unless `resume` is set.
 */
export class ReplayCapture<TFrame> implements CaptureSource<TFrame> {
  readonly name: string;
  private position: number = 0;
  private openHandles: number = 0;
  private readonly resume: boolean;

  constructor(
    private readonly frames: readonly TFrame[],
    options: { name?: string; resume?: boolean } = {}
  ) {
    this.name = options.name ?? 'replay';
    this.resume = options.resume ?? false;
  }

  async open(): Promise<CaptureHandle<TFrame>> {
    if (this.openHandles > 0) {
      throw new CaptureError(`${this.name} is already open`);
    }
    if (!this.resume) {
      this.position = 0;
    }
    this.openHandles++;

    let released = false;
    return {
      read: async () => {
        if (released) {
          throw new CaptureError(`${this.name} read after release`);
        }
        if (this.position >= this.frames.length) {
          return null;
        }
        return this.frames[this.position++];
      },
      release: () => {
        if (!released) {
          released = true;
          this.openHandles--;
        }
      }
    };
  }

  get isOpen(): boolean {
    return this.openHandles > 0;
  }
}
