import type { IncomingHttpHeaders } from "node:http";

import type { FastifyPluginAsync } from "fastify";

import { createAccessAuthorizer } from "../services/api-keys/authorizer";
import type { KeyRecordStore } from "../services/api-keys/key-record-store";
import type { MetricsEvent } from "../services/metrics/event-parser";
import { handleMetricsEvent } from "../services/metrics/ingest-handler";
import type { MetricSink } from "../services/metrics/metric-sink";

export type MetricsIngestRoutesOptions = {
  keyRecordStore: KeyRecordStore;
  metricSink: MetricSink;
  resourceName: string;
  maxBodyBytes: number;
  now?: () => Date;
};

const toEventHeaders = (headers: IncomingHttpHeaders): Record<string, string> => {
  const flattened: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      flattened[name] = value;
    } else if (Array.isArray(value)) {
      flattened[name] = value.join(", ");
    }
  }

  return flattened;
};

const toQueryParameters = (query: unknown): Record<string, string> | null => {
  if (typeof query !== "object" || query === null) {
    return null;
  }

  const entries = Object.entries(query).map(([name, value]): [string, string] => [
    name,
    Array.isArray(value) ? value.join(",") : String(value),
  ]);

  return entries.length > 0 ? Object.fromEntries(entries) : null;
};

export const metricsIngestRoutes: FastifyPluginAsync<MetricsIngestRoutesOptions> = async (app, options) => {
  // The signature covers the exact body bytes, so the body must reach the handler unparsed.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "string", bodyLimit: options.maxBodyBytes }, (_request, body, done) => {
    done(null, body);
  });

  app.route<{ Params: { resource: string } }>({
    method: ["GET", "PUT", "POST", "PATCH", "DELETE"],
    url: "/:resource",
    handler: async (request, reply) => {
      const event: MetricsEvent = {
        resource: request.params.resource,
        httpMethod: request.method,
        body: typeof request.body === "string" ? request.body : null,
        isBase64Encoded: false,
        queryStringParameters: toQueryParameters(request.query),
        headers: toEventHeaders(request.headers),
      };

      const response = await handleMetricsEvent(event, {
        authorizer: createAccessAuthorizer({
          store: options.keyRecordStore,
          logger: request.log,
          now: options.now,
        }),
        sink: options.metricSink,
        logger: request.log,
        resourceName: options.resourceName,
        maxBodyBytes: options.maxBodyBytes,
      });

      return reply
        .status(response.statusCode)
        .headers(response.headers)
        .send(response.isBase64Encoded ? Buffer.from(response.body, "base64") : response.body);
    },
  });
};
