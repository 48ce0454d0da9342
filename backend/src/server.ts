import { sql } from "drizzle-orm";

import { createDb, schema } from "@benzaiten/db";

import { buildApp } from "./app";
import { loadBackendConfig } from "./config/env";
import { loadEnvironmentFiles } from "./config/load-env";
import { createDrizzleKeyRecordStore } from "./services/api-keys/key-record-store";
import { createDrizzleMetricSink } from "./services/metrics/metric-sink";

loadEnvironmentFiles();

const config = loadBackendConfig();
const db = createDb(config.databaseUrl);

const app = buildApp(config, {
  keyRecordStore: createDrizzleKeyRecordStore(db, schema.createApiKeyRecordsTable(config.keyStore.tableName)),
  metricSink: createDrizzleMetricSink({
    db,
    table: schema.createMetricQueueTable(config.metricQueue.tableName),
    queueName: config.metricQueue.queueName,
  }),
  checkReadiness: async () => {
    await db.execute(sql`select 1`);
  },
});

app.addHook("onClose", async () => {
  await db.$client.end();
});

const shutdown = async (signal: string) => {
  app.log.info({ signal }, "Shutting down metrics gateway");
  await app.close();
  process.exit(0);
};

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

try {
  await app.listen({
    host: config.host,
    port: config.port,
  });

  app.log.info({ host: config.host, port: config.port }, "Metrics gateway started");
} catch (error) {
  app.log.error({ err: error }, "Failed to start metrics gateway");
  process.exit(1);
}
