import * as fs from "fs/promises";
import type { FileHandle } from "fs/promises";
import type { CacheEntry, CacheKey, ResourceKind, StagedWrite } from "@/common/types/cache";
import { CacheWriteError, errnoCode } from "@/common/errors/proxy.errors";

type StageState = "open" | "committed" | "discarded";

/**
 * A body streamed into a uniquely named temp file beside its final location,
 * published by rename so readers see either the old entry or the complete new one.
 */
export class FileStagedWrite implements StagedWrite {
  private state: StageState = "open";
  private written = 0;
  private handleClosed = false;

  constructor(
    readonly key: CacheKey,
    private readonly kind: ResourceKind,
    private readonly finalPath: string,
    readonly tempPath: string,
    private readonly handle: FileHandle,
    private readonly now: () => number,
    private readonly onFailure: (error: CacheWriteError) => void = () => undefined
  ) {}

  get bytesWritten(): number {
    return this.written;
  }

  async write(chunk: Buffer): Promise<void> {
    this.assertOpen("write");
    try {
      let offset = 0;
      while (offset < chunk.length) {
        const { bytesWritten } = await this.handle.write(chunk, offset, chunk.length - offset);
        offset += bytesWritten;
      }
      this.written += chunk.length;
    } catch (error) {
      throw this.fail(this.tempPath, error);
    }
  }

  async commit(): Promise<CacheEntry> {
    this.assertOpen("commit");
    const storedAt = this.now();
    try {
      await this.closeHandle();
      const stamp = new Date(storedAt);
      await fs.utimes(this.tempPath, stamp, stamp);
      await fs.rename(this.tempPath, this.finalPath);
    } catch (error) {
      await this.discard();
      throw this.fail(this.finalPath, error);
    }
    this.state = "committed";

    return {
      key: this.key,
      kind: this.kind,
      filePath: this.finalPath,
      storedAt,
      sizeBytes: this.written,
    };
  }

  async discard(): Promise<void> {
    if (this.state !== "open") {
      return;
    }
    this.state = "discarded";

    let closeError: unknown;
    try {
      await this.closeHandle();
    } catch (error) {
      closeError = error;
    }

    try {
      await fs.unlink(this.tempPath);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw this.fail(this.tempPath, error);
      }
    }

    if (closeError !== undefined) {
      throw this.fail(this.tempPath, closeError);
    }
  }

  private fail(filePath: string, cause: unknown): CacheWriteError {
    const error = new CacheWriteError(this.key, filePath, cause);
    this.onFailure(error);
    return error;
  }

  private async closeHandle(): Promise<void> {
    if (this.handleClosed) {
      return;
    }
    this.handleClosed = true;
    await this.handle.close();
  }

  private assertOpen(operation: string): void {
    if (this.state !== "open") {
      throw new Error(`Cannot ${operation} staged write for ${this.key}: already ${this.state}`);
    }
  }
}
