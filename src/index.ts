import Fastify from "fastify";
import cors from "@fastify/cors";

import { loadConfig } from "./config";
import { createLogger, resolveLogLevel } from "./logger";
import { clientRoutes } from "./routes/clients";
import { healthRoutes } from "./routes/healthz";
import { remoteDeviceRoutes } from "./routes/remote_devices";
import { tabRoutes } from "./routes/tabs";
import { SqliteRemoteDevicesRegistry } from "./store/remote_devices";
import { SqliteRemoteClientsAndTabsStore } from "./store/sqlite_remote_tabs_store";
import { SqliteTransactionExecutor } from "./store/sqlite_transaction_executor";

const app = Fastify({ logger: { level: resolveLogLevel() } });

async function main() {
  const config = loadConfig();
  const log = createLogger();
  const executor = new SqliteTransactionExecutor(config.dbPath, log);
  const store = new SqliteRemoteClientsAndTabsStore(executor, {
    log,
    decodeErrorPolicy: config.decodeErrorPolicy,
  });
  const registry = new SqliteRemoteDevicesRegistry(executor, log);

  app.addHook("onClose", async () => {
    executor.close();
  });

  // CORS (dev): permissive.
  app.register(cors, {
    origin: true,
  });

  // Routes
  app.register(healthRoutes);
  app.register(clientRoutes, { prefix: "/v1", store, apiKey: config.apiKey });
  app.register(tabRoutes, { prefix: "/v1", store, apiKey: config.apiKey });
  app.register(remoteDeviceRoutes, { prefix: "/v1", registry, apiKey: config.apiKey });

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
