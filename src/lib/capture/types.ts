export interface CaptureHandle<TFrame> {
  /**
   * Next frame, or `null` at end of stream. Throws on a failed read.
   */
  read(): Promise<TFrame | null>;
  release(): void | Promise<void>;
}

export interface CaptureSource<TFrame> {
  readonly name: string;
  /** Throws when the device cannot be opened. */
  open(): Promise<CaptureHandle<TFrame>>;
}
