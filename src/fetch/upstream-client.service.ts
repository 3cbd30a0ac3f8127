import type { Readable } from "stream";
import { Inject, Injectable } from "@nestjs/common";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { StandardService } from "@/common/base";
import { UpstreamError, errnoCode } from "@/common/errors/proxy.errors";
import type { UpstreamClient, UpstreamResponse } from "@/common/types/fetch";
import { asError } from "@/common/utils/error.utils";
import { PROXY_CONFIG, type ProxyConfig } from "@/config/proxy-config";
import { IdleTimeoutStream } from "./idle-timeout.stream";

const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "EHOSTUNREACH", "EPIPE"]);

/**
 * Streams GET responses from the origin. The connect timeout covers everything up to the
 * response headers; after that the read timeout applies to the gap between body chunks.
 */
@Injectable()
export class UpstreamClientService extends StandardService implements UpstreamClient {
  private readonly http: AxiosInstance;

  constructor(@Inject(PROXY_CONFIG) private readonly proxyConfig: ProxyConfig) {
    super({ useEnhancedLogging: true });
    this.http = axios.create({
      responseType: "stream",
      decompress: false,
      maxRedirects: 0,
      proxy: false,
      validateStatus: () => true,
      headers: { "Accept-Encoding": "identity" },
    });
  }

  async fetch(url: string): Promise<UpstreamResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const connectTimer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.proxyConfig.upstreamConnectTimeoutMs);

    let response: AxiosResponse<Readable>;
    try {
      response = await this.http.get<Readable>(url, { signal: controller.signal });
    } catch (error) {
      const failure = timedOut
        ? new UpstreamError(
            `Origin did not respond within ${this.proxyConfig.upstreamConnectTimeoutMs}ms`,
            "timeout",
            url,
            undefined,
            { cause: error }
          )
        : this.classifyFailure(error, url);
      this.logUpstreamFetch(url, "failed", { code: failure.code, reason: failure.message });
      throw failure;
    } finally {
      clearTimeout(connectTimer);
    }

    const { status } = response;
    if (status < 200 || status >= 300) {
      response.data.destroy();
      const failure = new UpstreamError(`Origin answered ${status}`, "status", url, status);
      this.logUpstreamFetch(url, "failed", { code: failure.code, upstreamStatus: status });
      throw failure;
    }

    const contentLength = parseContentLength(response.headers["content-length"]);
    this.logUpstreamFetch(url, "ok", { status, contentLength });

    return {
      url,
      status,
      contentLength,
      body: this.withReadTimeout(response.data, url),
    };
  }

  private withReadTimeout(source: Readable, url: string): Readable {
    const readTimeoutMs = this.proxyConfig.upstreamReadTimeoutMs;
    const guarded = new IdleTimeoutStream(
      readTimeoutMs,
      () => new UpstreamError(`Origin stalled for ${readTimeoutMs}ms mid-body`, "timeout", url)
    );

    source.on("error", error => {
      guarded.destroy(this.classifyFailure(error, url));
    });
    guarded.on("close", () => {
      if (!source.destroyed) {
        source.destroy();
      }
    });
    return source.pipe(guarded);
  }

  private classifyFailure(error: unknown, url: string): UpstreamError {
    if (error instanceof UpstreamError) {
      return error;
    }
    const code = axios.isAxiosError(error) ? (error.code ?? errnoCode(error.cause)) : errnoCode(error);
    const message = asError(error).message;
    if (code === "ETIMEDOUT" || code === "ECONNABORTED") {
      return new UpstreamError(`Origin timed out: ${message}`, "timeout", url, undefined, { cause: error });
    }
    const reason = code && CONNECTION_ERROR_CODES.has(code) ? `${code} ${message}` : message;
    return new UpstreamError(`Origin unreachable: ${reason}`, "connection", url, undefined, { cause: error });
  }
}

function parseContentLength(value: unknown): number | undefined {
  if (typeof value !== "string" && typeof value !== "number") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : undefined;
}
