import { Test } from "@nestjs/testing";
import type { INestApplication } from "@nestjs/common";
import type { Server } from "http";
import { AppModule } from "@/app.module";
import { CLOCK, PROXY_CONFIG, type ProxyConfig } from "@/config/proxy-config";
import { FakeClock, buildTestConfig, createTempDir, removeDir } from "./proxy.fixtures";
import { TestOrigin } from "./test-origin";

export interface ProxyTestApp {
  app: INestApplication;
  server: Server;
  origin: TestOrigin;
  clock: FakeClock;
  cacheRoot: string;
  config: ProxyConfig;
  close(): Promise<void>;
}

/**
 * The full application wired against a temp cache root, a fake clock and an in-process origin.
 * The HTTP server listens on an ephemeral port so concurrent supertest requests share it.
 */
export async function createProxyTestApp(overrides: Partial<ProxyConfig> = {}): Promise<ProxyTestApp> {
  const origin = new TestOrigin();
  const backendPrefix = `${await origin.start()}/mirror`;
  const cacheRoot = await createTempDir();
  const clock = new FakeClock();
  const config = buildTestConfig({ cacheRoot, backendPrefix, ...overrides });

  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(PROXY_CONFIG)
    .useValue(config)
    .overrideProvider(CLOCK)
    .useValue(clock)
    .compile();

  const app = moduleRef.createNestApplication({ bodyParser: false });
  await app.listen(0, "127.0.0.1");

  return {
    app,
    server: app.getHttpServer(),
    origin,
    clock,
    cacheRoot,
    config,
    async close() {
      await app.close();
      await origin.stop();
      await removeDir(cacheRoot);
    },
  };
}
