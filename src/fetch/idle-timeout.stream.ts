import { Transform, type TransformCallback } from "stream";

/**
 * Pass-through that fails with `onIdle()` when no chunk arrives for `idleMs`.
 * The clock only runs while the consumer is asking for data, so a paused
 * consumer never counts against the source.
 */
export class IdleTimeoutStream extends Transform {
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly idleMs: number,
    private readonly onIdle: () => Error
  ) {
    super();
  }

  override _read(size: number): void {
    this.arm();
    super._read(size);
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.disarm();
    callback(null, chunk);
  }

  override _flush(callback: TransformCallback): void {
    this.disarm();
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.disarm();
    callback(error);
  }

  private arm(): void {
    this.disarm();
    this.timer = setTimeout(() => this.destroy(this.onIdle()), this.idleMs);
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
