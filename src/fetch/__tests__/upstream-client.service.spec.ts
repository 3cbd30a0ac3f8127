import type { Readable } from "stream";
import { UpstreamClientService } from "../upstream-client.service";
import { UpstreamError } from "@/common/errors/proxy.errors";
import { buildTestConfig } from "@/__tests__/utils/proxy.fixtures";
import { TestOrigin } from "@/__tests__/utils/test-origin";

async function readAll(body: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString();
}

describe("UpstreamClientService", () => {
  let origin: TestOrigin;
  let baseUrl: string;

  function createClient(timeouts: { connect?: number; read?: number } = {}): UpstreamClientService {
    return new UpstreamClientService(
      buildTestConfig({
        cacheRoot: "/unused",
        backendPrefix: baseUrl,
        upstreamConnectTimeoutMs: timeouts.connect ?? 2_000,
        upstreamReadTimeoutMs: timeouts.read ?? 2_000,
      })
    );
  }

  beforeEach(async () => {
    origin = new TestOrigin();
    baseUrl = await origin.start();
  });

  afterEach(async () => {
    await origin.stop();
  });

  it("should stream a successful response with its declared length", async () => {
    origin.serve("artifact-bytes");

    const response = await createClient().fetch(`${baseUrl}/software/v1.tar.gz`);

    expect(response.status).toBe(200);
    expect(response.contentLength).toBe(14);
    expect(await readAll(response.body)).toBe("artifact-bytes");
    expect(origin.requests).toEqual(["/software/v1.tar.gz"]);
  });

  it("should ask the origin for an uncompressed body", async () => {
    let acceptEncoding: string | undefined;
    origin.respondWith((req, res) => {
      acceptEncoding = req.headers["accept-encoding"];
      res.end("ok");
    });

    const response = await createClient().fetch(`${baseUrl}/a.txt`);
    await readAll(response.body);

    expect(acceptEncoding).toBe("identity");
  });

  it("should reject non-success statuses without following redirects", async () => {
    origin.respondWith((_req, res) => {
      res.writeHead(301, { Location: "/elsewhere" });
      res.end();
    });

    const failure = await createClient()
      .fetch(`${baseUrl}/moved.bin`)
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(UpstreamError);
    expect(failure).toMatchObject({ kind: "status", upstreamStatus: 301 });
    expect(origin.requests).toEqual(["/moved.bin"]);
  });

  it("should report a 404 as a status failure", async () => {
    origin.serve("missing", 404);

    await expect(createClient().fetch(`${baseUrl}/none.bin`)).rejects.toMatchObject({
      kind: "status",
      upstreamStatus: 404,
      message: "Origin answered 404",
    });
  });

  it("should report a refused connection", async () => {
    const client = createClient();
    await origin.stop();

    await expect(client.fetch(`${baseUrl}/a.bin`)).rejects.toMatchObject({ kind: "connection" });
    origin = new TestOrigin();
    await origin.start();
  });

  it("should time out when the origin sends no headers", async () => {
    origin.respondWith(() => undefined);

    const failure = await createClient({ connect: 100 })
      .fetch(`${baseUrl}/slow.bin`)
      .catch((error: unknown) => error);

    if (!(failure instanceof UpstreamError)) {
      throw new Error("expected an UpstreamError");
    }
    expect(failure.kind).toBe("timeout");
    expect(failure.timedOut).toBe(true);
  });

  it("should fail the body when the origin stalls mid-transfer", async () => {
    origin.respondWith((_req, res) => {
      res.writeHead(200, { "Content-Length": 10 });
      res.write("half");
    });

    const response = await createClient({ read: 100 }).fetch(`${baseUrl}/stalled.bin`);

    await expect(readAll(response.body)).rejects.toMatchObject({ kind: "timeout" });
  });
});
