import helmet from "@fastify/helmet";
import Fastify from "fastify";

import type { BackendConfig } from "./config/env";
import { HttpError } from "./lib/http-error";
import { OUTCOMES, outcomeForStatus } from "./lib/responses";
import { healthRoutes } from "./routes/health";
import { metricsIngestRoutes } from "./routes/metrics-ingest";
import type { KeyRecordStore } from "./services/api-keys/key-record-store";
import type { MetricSink } from "./services/metrics/metric-sink";

export type AppDependencies = {
  keyRecordStore: KeyRecordStore;
  metricSink: MetricSink;
  checkReadiness: () => Promise<void>;
  now?: () => Date;
};

const readStatusCode = (error: unknown): number =>
  typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number"
    ? error.statusCode
    : 500;

export const buildApp = (config: BackendConfig, deps: AppDependencies) => {
  const app = Fastify({
    trustProxy: config.trustProxy,
    bodyLimit: config.ingest.maxBodyBytes,
    logger: {
      level: config.logLevel,
    },
  });

  app.register(helmet, {
    global: true,
  });

  app.register(healthRoutes, {
    checkReadiness: deps.checkReadiness,
  });

  app.register(metricsIngestRoutes, {
    keyRecordStore: deps.keyRecordStore,
    metricSink: deps.metricSink,
    resourceName: config.ingest.resourceName,
    maxBodyBytes: config.ingest.maxBodyBytes,
    now: deps.now,
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "Request failed");

    if (error instanceof HttpError) {
      return reply.status(error.statusCode).send({
        code: error.code,
        message: error.message,
        details: error.details,
      });
    }

    // Framework rejections (body too large, unsupported media type) keep their status with the canonical body.
    const statusCode = readStatusCode(error);
    const outcome = statusCode < 500 ? outcomeForStatus(statusCode) : null;
    if (outcome) {
      return reply.status(statusCode).type("text/plain; charset=utf-8").send(OUTCOMES[outcome].body);
    }

    return reply.status(500).send({
      code: "INTERNAL_SERVER_ERROR",
      message: "Unexpected error",
    });
  });

  return app;
};
