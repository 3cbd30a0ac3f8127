import { pipeline } from "stream/promises";
import { HttpException, HttpStatus, Inject, Injectable, ServiceUnavailableException } from "@nestjs/common";
import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { StandardService } from "@/common/base";
import { CacheWriteError, UpstreamError, errnoCode } from "@/common/errors/proxy.errors";
import type { CacheKey, OpenedEntry, ResourceKind, StagedWrite } from "@/common/types/cache";
import { ErrorCode } from "@/common/types/error-handling";
import type { FillOutcome } from "@/common/types/fetch";
import type { RoutingDecision } from "@/common/types/routing";
import { asError } from "@/common/utils/error.utils";
import { PROXY_CONFIG, type ProxyConfig } from "@/config/proxy-config";
import { backendUrlFor, resourceKindOf } from "@/cache/cache-key";
import { DiskCacheStoreService } from "@/cache/disk-cache-store.service";
import { FillCoordinatorService } from "@/fetch/fill-coordinator.service";
import { UpstreamClientService } from "@/fetch/upstream-client.service";
import { RedirectPolicyService } from "@/routing/redirect-policy.service";
import { CacheFillSink } from "./cache-fill.sink";

export type CacheStatus = "HIT" | "MISS" | "JOINED";

type ProxyMethod = "GET" | "HEAD";

interface ResponseMeta {
  kind: ResourceKind;
  cacheStatus: CacheStatus;
  contentLength?: number;
  storedAt?: number;
}

const WAIT_ELAPSED = Symbol("wait-elapsed");

/**
 * Serves a routed request: fresh entries straight from disk, everything else through a
 * coalesced upstream fill. The caller that starts a fill receives the body as it arrives;
 * callers that join it are served once the fill settled, from the installed entry or,
 * when installing failed, from the fill's in-memory copy.
 */
@Injectable()
export class ProxyService extends StandardService {
  constructor(
    private readonly router: RedirectPolicyService,
    private readonly store: DiskCacheStoreService,
    private readonly coordinator: FillCoordinatorService,
    private readonly upstream: UpstreamClientService,
    @Inject(PROXY_CONFIG) private readonly proxyConfig: ProxyConfig
  ) {
    super({ useEnhancedLogging: true });
  }

  async handle(req: Request, res: Response): Promise<void> {
    const decision = this.router.decide({ method: req.method, host: req.headers.host, rawPath: req.originalUrl });

    switch (decision.action) {
      case "redirect":
        this.sendRedirect(res, decision);
        return;
      case "reject":
        res.setHeader("Allow", decision.allow.join(", "));
        throw new HttpException(
          { code: ErrorCode.METHOD_NOT_ALLOWED, message: `Method ${req.method} is not allowed` },
          HttpStatus.METHOD_NOT_ALLOWED
        );
      case "proxy":
        await this.serve(req, res, decision.key, decision.kind, decision.method);
        return;
    }
  }

  private sendRedirect(res: Response, decision: Extract<RoutingDecision, { action: "redirect" }>): void {
    res.status(decision.status);
    for (const [name, value] of Object.entries(decision.headers)) {
      res.setHeader(name, value);
    }
    res.setHeader("Location", decision.location);
    res.end();
  }

  private async serve(
    req: Request,
    res: Response,
    key: CacheKey,
    kind: ResourceKind,
    method: ProxyMethod
  ): Promise<void> {
    const lookup = await this.store.lookup(key);
    if (lookup.found) {
      if (this.store.isFresh(lookup.entry)) {
        const opened = await this.store.openBody(lookup.entry);
        if (opened && this.store.isFresh(opened.entry)) {
          this.incrementCounter("hits");
          this.logCacheEvent("hit", key);
          await this.sendEntry(res, opened, "HIT", method);
          return;
        }
        opened?.body.destroy();
      } else {
        this.incrementCounter("stale");
      }
    }

    this.incrementCounter("misses");
    const handle = this.coordinator.join(key, () => this.fill(key, kind, res, method));
    if (handle.role === "leader") {
      await handle.result;
      return;
    }

    this.incrementCounter("joins");
    this.logCacheEvent("joined", key);
    const outcome = await this.waitForFill(handle.result);
    if (outcome === WAIT_ELAPSED) {
      this.incrementCounter("wait_redirects");
      res.status(HttpStatus.TEMPORARY_REDIRECT);
      res.setHeader("Location", req.originalUrl);
      res.setHeader("Cache-Control", "no-store");
      res.end();
      return;
    }
    await this.sendOutcome(res, outcome, method);
  }

  /**
   * With a wait limit configured, resolves WAIT_ELAPSED once a waiter has waited that long
   */
  private async waitForFill(result: Promise<FillOutcome>): Promise<FillOutcome | typeof WAIT_ELAPSED> {
    const limit = this.proxyConfig.waitRedirectMs;
    if (limit === 0) {
      return result;
    }

    let timer: NodeJS.Timeout | undefined;
    const elapsed = new Promise<typeof WAIT_ELAPSED>(resolve => {
      timer = this.createTimeout(() => resolve(WAIT_ELAPSED), limit);
    });
    try {
      return await Promise.race([result, elapsed]);
    } finally {
      if (timer) {
        this.clearTimer(timer);
      }
    }
  }

  /**
   * Runs once per coalesced fetch, on behalf of the caller that started it
   */
  private async fill(key: CacheKey, kind: ResourceKind, res: Response, method: ProxyMethod): Promise<FillOutcome> {
    const url = backendUrlFor(this.proxyConfig.backendPrefix, key, kind);
    const operationId = `fill_${uuidv4()}`;
    this.startPerformanceTimer(operationId, "cache_fill", { key, url });

    try {
      const upstream = await this.upstream.fetch(url);
      const { staged, writeError } = await this.stageEntry(key);

      this.writeHead(res, { kind, cacheStatus: "MISS", contentLength: upstream.contentLength });
      const live = method === "GET" ? res : undefined;
      if (!live) {
        res.end();
      }

      const sink = new CacheFillSink({
        key,
        url,
        staged,
        writeError,
        expectedLength: upstream.contentLength,
        fallbackBufferMaxBytes: this.proxyConfig.fallbackBufferMaxBytes,
        live,
        relayDrainTimeoutMs: this.proxyConfig.upstreamReadTimeoutMs,
      });
      try {
        await pipeline(upstream.body, sink);
      } catch (error) {
        throw error instanceof UpstreamError
          ? error
          : new UpstreamError(`Transfer from origin failed: ${asError(error).message}`, "connection", url, undefined, {
              cause: error,
            });
      }

      if (sink.relayDetached) {
        this.incrementCounter("detached_clients");
        this.logWarning(`Client stopped reading ${key}; fill continued without it`, "fill", { key });
      } else if (live && !live.writableEnded && !live.destroyed) {
        live.end();
      }

      const outcome = sink.outcome();
      this.recordOutcome(outcome);
      this.endPerformanceTimer(operationId, true, { bytes: sink.bytesReceived, stored: outcome.status === "stored" });
      return outcome;
    } catch (error) {
      this.incrementCounter("upstream_failures");
      this.endPerformanceTimer(operationId, false);
      throw error;
    }
  }

  private async stageEntry(key: CacheKey): Promise<{ staged?: StagedWrite; writeError?: CacheWriteError }> {
    try {
      return { staged: await this.store.stage(key) };
    } catch (error) {
      if (error instanceof CacheWriteError) {
        return { writeError: error };
      }
      throw error;
    }
  }

  private recordOutcome(outcome: FillOutcome): void {
    if (outcome.status === "stored") {
      this.incrementCounter("fills");
      this.store.recordStored(outcome.entry);
      return;
    }
    this.incrementCounter("unstored_fills");
    this.logCacheEvent("unstored", outcome.key, {
      sizeBytes: outcome.sizeBytes,
      relayable: outcome.body !== undefined,
      reason: outcome.writeError?.message,
    });
  }

  private async sendOutcome(res: Response, outcome: FillOutcome, method: ProxyMethod): Promise<void> {
    if (outcome.status === "stored") {
      const opened = await this.store.openBody(outcome.entry);
      if (!opened) {
        throw new ServiceUnavailableException("Cache entry disappeared before it could be served");
      }
      await this.sendEntry(res, opened, "JOINED", method);
      return;
    }

    if (!outcome.body) {
      throw new ServiceUnavailableException("Response was not cached and is too large to relay");
    }
    this.writeHead(res, {
      kind: resourceKindOf(outcome.key),
      cacheStatus: "JOINED",
      contentLength: outcome.body.length,
    });
    res.end(method === "HEAD" ? undefined : outcome.body);
  }

  private async sendEntry(
    res: Response,
    opened: OpenedEntry,
    cacheStatus: CacheStatus,
    method: ProxyMethod
  ): Promise<void> {
    const { entry, body } = opened;
    this.writeHead(res, { kind: entry.kind, cacheStatus, contentLength: entry.sizeBytes, storedAt: entry.storedAt });

    if (method === "HEAD") {
      body.destroy();
      res.end();
      return;
    }

    try {
      await pipeline(body, res);
    } catch (error) {
      if (errnoCode(error) !== "ERR_STREAM_PREMATURE_CLOSE") {
        throw error;
      }
      this.logDebug(`Client left while ${entry.key} was being sent: ${asError(error).message}`, "sendEntry");
    }
  }

  private writeHead(res: Response, meta: ResponseMeta): void {
    res.status(HttpStatus.OK);
    res.setHeader("Content-Type", meta.kind === "index" ? "application/json" : "application/octet-stream");
    if (meta.contentLength !== undefined) {
      res.setHeader("Content-Length", meta.contentLength);
    }
    if (meta.storedAt !== undefined) {
      res.setHeader("Last-Modified", new Date(meta.storedAt).toUTCString());
    }
    res.setHeader("X-Cache", meta.cacheStatus);
  }
}
