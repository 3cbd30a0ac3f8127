import { PassThrough, Readable, Writable } from "stream";
import { pipeline } from "stream/promises";
import { CacheFillSink, type CacheFillSinkOptions } from "../cache-fill.sink";
import { CacheWriteError, UpstreamError } from "@/common/errors/proxy.errors";
import type { CacheEntry, StagedWrite } from "@/common/types/cache";

class MemoryStagedWrite implements StagedWrite {
  readonly key = "/a.bin";
  readonly tempPath = "/cache/a.bin.tmp";
  readonly chunks: Buffer[] = [];
  committed = false;
  discarded = 0;

  constructor(private readonly failOnWrite = false) {}

  get bytesWritten(): number {
    return Buffer.concat(this.chunks).length;
  }

  async write(chunk: Buffer): Promise<void> {
    if (this.failOnWrite) {
      throw new CacheWriteError(this.key, this.tempPath, new Error("ENOSPC: no space left on device"));
    }
    this.chunks.push(chunk);
  }

  async commit(): Promise<CacheEntry> {
    this.committed = true;
    return { key: this.key, kind: "file", filePath: "/cache/a.bin", storedAt: 1_000, sizeBytes: this.bytesWritten };
  }

  async discard(): Promise<void> {
    this.discarded++;
  }
}

function collect(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString();
}

function createSink(overrides: Partial<CacheFillSinkOptions>): CacheFillSink {
  return new CacheFillSink({
    key: "/a.bin",
    url: "http://origin.test/a.bin",
    fallbackBufferMaxBytes: 1024,
    relayDrainTimeoutMs: 1_000,
    ...overrides,
  });
}

describe("CacheFillSink", () => {
  it("should persist, relay and commit a complete body", async () => {
    const staged = new MemoryStagedWrite();
    const live = new PassThrough();
    const received = collect(live);
    const sink = createSink({ staged, live, expectedLength: 11 });

    await pipeline(Readable.from([Buffer.from("hello "), Buffer.from("world")]), sink);

    expect(received()).toBe("hello world");
    expect(Buffer.concat(staged.chunks).toString()).toBe("hello world");
    expect(sink.outcome()).toEqual({
      status: "stored",
      entry: { key: "/a.bin", kind: "file", filePath: "/cache/a.bin", storedAt: 1_000, sizeBytes: 11 },
    });
  });

  it("should reject a body shorter than declared and discard the staged file", async () => {
    const staged = new MemoryStagedWrite();
    const sink = createSink({ staged, expectedLength: 100 });

    const failure = await pipeline(Readable.from([Buffer.from("short")]), sink).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(UpstreamError);
    expect(failure).toMatchObject({ kind: "truncated", message: "Origin sent 5 of 100 declared bytes" });
    expect(staged.committed).toBe(false);
    expect(staged.discarded).toBe(1);
  });

  it("should discard the staged file when the source fails", async () => {
    const staged = new MemoryStagedWrite();
    const sink = createSink({ staged });
    const source = new Readable({
      read() {
        this.push(Buffer.from("part"));
        this.destroy(new Error("socket hang up"));
      },
    });

    await expect(pipeline(source, sink)).rejects.toThrow("socket hang up");
    expect(staged.discarded).toBe(1);
  });

  it("should keep relaying and buffer the body when persistence fails", async () => {
    const staged = new MemoryStagedWrite(true);
    const live = new PassThrough();
    const received = collect(live);
    const sink = createSink({ staged, live });

    await pipeline(Readable.from([Buffer.from("abc"), Buffer.from("def")]), sink);

    const outcome = sink.outcome();
    expect(received()).toBe("abcdef");
    expect(staged.discarded).toBe(1);
    expect(outcome.status).toBe("unstored");
    if (outcome.status !== "unstored") return;
    expect(outcome.body?.toString()).toBe("abcdef");
    expect(outcome.sizeBytes).toBe(6);
    expect(outcome.writeError).toBeInstanceOf(CacheWriteError);
  });

  it("should drop the in-memory copy once it outgrows its limit", async () => {
    const sink = createSink({ fallbackBufferMaxBytes: 4 });

    await pipeline(Readable.from([Buffer.from("abc"), Buffer.from("def")]), sink);

    expect(sink.outcome()).toEqual({ status: "unstored", key: "/a.bin", sizeBytes: 6, body: undefined, writeError: undefined });
  });

  it("should finish the fill after the leading client disconnects", async () => {
    const staged = new MemoryStagedWrite();
    const live = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    live.destroy();
    const sink = createSink({ staged, live });

    await pipeline(Readable.from([Buffer.from("abc")]), sink);

    expect(staged.committed).toBe(true);
    expect(sink.outcome().status).toBe("stored");
  });

  it("should wait for a slow client to drain", async () => {
    const live = new PassThrough({ highWaterMark: 2 });
    const sink = createSink({ staged: new MemoryStagedWrite(), live });

    const done = pipeline(Readable.from([Buffer.from("abcd"), Buffer.from("efgh")]), sink);
    await new Promise(resolve => setImmediate(resolve));
    expect(sink.bytesReceived).toBe(4);

    const received = collect(live);
    await done;
    expect(received()).toBe("abcdefgh");
  });

  it("should cut off a client that stops reading and still commit the entry", async () => {
    const staged = new MemoryStagedWrite();
    const live = new PassThrough({ highWaterMark: 2 });
    const sink = createSink({ staged, live, relayDrainTimeoutMs: 20 });

    await pipeline(Readable.from([Buffer.from("abcd"), Buffer.from("efgh")]), sink);

    expect(sink.relayDetached).toBe(true);
    expect(live.destroyed).toBe(true);
    expect(Buffer.concat(staged.chunks).toString()).toBe("abcdefgh");
    expect(sink.outcome().status).toBe("stored");
  });

  it("should not cut off a client that drains in time", async () => {
    const live = new PassThrough({ highWaterMark: 2 });
    const received = collect(live);
    const sink = createSink({ staged: new MemoryStagedWrite(), live, relayDrainTimeoutMs: 20 });

    await pipeline(Readable.from([Buffer.from("abcd"), Buffer.from("efgh")]), sink);

    expect(sink.relayDetached).toBe(false);
    expect(received()).toBe("abcdefgh");
  });
});
