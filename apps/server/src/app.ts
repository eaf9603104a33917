import Fastify, { type FastifyInstance } from "fastify";

import type { ThresholdConfigV1 } from "@nipt-console/contracts";

import { registerErrorHandler } from "./errors";
import { registerRegistryRoutes } from "./routes/registry";
import { registerResultRoutes } from "./routes/results";
import { registerScreeningConfigRoutes } from "./routes/screening_config";
import { registerScreeningRoutes } from "./routes/screening";
import { ScreeningRuntime } from "./runtime";
import { ScreeningSqliteStore } from "./store/sqlite_store";

export type BuildAppOptions = {
  dbPath: string;
  ssotConfig: ThresholdConfigV1;
  logger: boolean | { level: string };
};

export function buildApp(opts: BuildAppOptions): { app: FastifyInstance; runtime: ScreeningRuntime } {
  const app = Fastify({ logger: opts.logger });

  const store = new ScreeningSqliteStore({ filePath: opts.dbPath });
  app.addHook("onClose", async () => {
    store.close();
  });

  const runtime = new ScreeningRuntime({ store, log: app.log, ssotConfig: opts.ssotConfig });

  registerErrorHandler(app);
  registerScreeningRoutes(app, runtime);
  registerResultRoutes(app, runtime);
  registerScreeningConfigRoutes(app, runtime);
  registerRegistryRoutes(app, runtime);

  return { app, runtime };
}
