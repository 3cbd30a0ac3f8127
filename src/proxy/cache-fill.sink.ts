import { Writable } from "stream";
import type { CacheEntry, CacheKey, StagedWrite } from "@/common/types/cache";
import type { FillOutcome } from "@/common/types/fetch";
import { CacheWriteError, UpstreamError } from "@/common/errors/proxy.errors";
import { asError } from "@/common/utils/error.utils";

export interface CacheFillSinkOptions {
  key: CacheKey;
  url: string;
  /** Undefined when the temp file could not be created; the body is then only relayed */
  staged?: StagedWrite;
  writeError?: CacheWriteError;
  expectedLength?: number;
  fallbackBufferMaxBytes: number;
  /** The leading client's response, fed as bytes arrive */
  live?: Writable;
  /** How long the leading client may hold back the fill before it is cut off */
  relayDrainTimeoutMs: number;
}

/**
 * Destination of an upstream body. Each chunk goes to the staged cache file, to the
 * leading client (with backpressure, until it disconnects or stops reading for longer
 * than `relayDrainTimeoutMs`, when its response is destroyed) and to a bounded in-memory
 * copy for waiters in case the file cannot be installed. The entry is committed only
 * after the whole body arrived; a destroyed sink discards the temp file.
 */
export class CacheFillSink extends Writable {
  private staged?: StagedWrite;
  private writeError?: CacheWriteError;
  private live?: Writable;
  private buffered: Buffer[] = [];
  private bufferedBytes = 0;
  private overflowed = false;
  private received = 0;
  private entry?: CacheEntry;
  private detached = false;

  constructor(private readonly options: CacheFillSinkOptions) {
    super();
    this.staged = options.staged;
    this.writeError = options.writeError;
    this.live = options.live;
  }

  get bytesReceived(): number {
    return this.received;
  }

  /**
   * True when the leading client was cut off for not draining its response
   */
  get relayDetached(): boolean {
    return this.detached;
  }

  /**
   * Valid once the sink finished without error
   */
  outcome(): FillOutcome {
    if (this.entry) {
      return { status: "stored", entry: this.entry };
    }
    return {
      status: "unstored",
      key: this.options.key,
      sizeBytes: this.received,
      body: this.overflowed ? undefined : Buffer.concat(this.buffered, this.bufferedBytes),
      writeError: this.writeError,
    };
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.accept(chunk).then(
      () => callback(),
      (error: unknown) => callback(asError(error))
    );
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.finish().then(
      () => callback(),
      (error: unknown) => callback(asError(error))
    );
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    const staged = this.staged;
    if (!staged || this.entry) {
      callback(error);
      return;
    }
    this.staged = undefined;
    staged.discard().then(
      () => callback(error),
      (discardError: unknown) => callback(error ?? asError(discardError))
    );
  }

  private async accept(chunk: Buffer): Promise<void> {
    this.received += chunk.length;
    this.keepForFallback(chunk);
    await Promise.all([this.persist(chunk), this.relay(chunk)]);
  }

  private keepForFallback(chunk: Buffer): void {
    if (this.overflowed) {
      return;
    }
    if (this.bufferedBytes + chunk.length > this.options.fallbackBufferMaxBytes) {
      this.overflowed = true;
      this.buffered = [];
      this.bufferedBytes = 0;
      return;
    }
    this.buffered.push(chunk);
    this.bufferedBytes += chunk.length;
  }

  private async persist(chunk: Buffer): Promise<void> {
    if (!this.staged) {
      return;
    }
    try {
      await this.staged.write(chunk);
    } catch (error) {
      await this.abandonPersistence(error);
    }
  }

  /**
   * Continues as a relay only. The store has already logged and counted the failure.
   */
  private async abandonPersistence(cause: unknown): Promise<void> {
    const staged = this.staged;
    this.staged = undefined;
    this.writeError =
      cause instanceof CacheWriteError ? cause : new CacheWriteError(this.options.key, staged?.tempPath ?? "", cause);
    if (!staged) {
      return;
    }
    try {
      await staged.discard();
    } catch (discardError) {
      this.writeError =
        discardError instanceof CacheWriteError
          ? discardError
          : new CacheWriteError(this.options.key, staged.tempPath, discardError);
    }
  }

  private async relay(chunk: Buffer): Promise<void> {
    const live = this.live;
    if (!live || live.destroyed || live.writableEnded) {
      this.live = undefined;
      return;
    }
    if (live.write(chunk)) {
      return;
    }
    const drained = await new Promise<boolean>(resolve => {
      const release = (): void => {
        clearTimeout(deadline);
        live.off("drain", release);
        live.off("close", release);
        resolve(true);
      };
      const deadline = setTimeout(() => {
        live.off("drain", release);
        live.off("close", release);
        resolve(false);
      }, this.options.relayDrainTimeoutMs);
      live.on("drain", release);
      live.on("close", release);
    });
    if (!drained) {
      this.detached = true;
      this.live = undefined;
      live.destroy();
    }
  }

  private async finish(): Promise<void> {
    const { expectedLength, url } = this.options;
    if (expectedLength !== undefined && this.received !== expectedLength) {
      throw new UpstreamError(
        `Origin sent ${this.received} of ${expectedLength} declared bytes`,
        "truncated",
        url
      );
    }

    const staged = this.staged;
    if (!staged) {
      return;
    }
    try {
      this.entry = await staged.commit();
    } catch (error) {
      this.staged = undefined;
      this.writeError =
        error instanceof CacheWriteError ? error : new CacheWriteError(this.options.key, staged.tempPath, error);
    }
    if (this.entry) {
      this.buffered = [];
      this.bufferedBytes = 0;
    }
  }
}
