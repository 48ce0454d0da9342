import type { AppLogger } from "../../lib/logger";
import {
  buildJsonResponse,
  buildResponse,
  isOkResponse,
  toEventResponse,
  type EventResponse,
} from "../../lib/responses";
import { toDecisionResponse, type AccessAuthorizer } from "../api-keys/authorizer";
import { API_KEY_HEADER, EventValidationError, parseMetricsEvent, type MetricsEvent } from "./event-parser";
import type { IngestRequest } from "./ingest-request";
import type { MetricSink } from "./metric-sink";

export type MetricsEventHandlerDeps = {
  authorizer: AccessAuthorizer;
  sink: MetricSink;
  logger: AppLogger;
  resourceName: string;
  maxBodyBytes: number;
};

const parseOrResponse = (
  event: MetricsEvent,
  deps: MetricsEventHandlerDeps
): { request: IngestRequest } | { response: EventResponse } => {
  try {
    return {
      request: parseMetricsEvent(event, {
        resourceName: deps.resourceName,
        maxBodyBytes: deps.maxBodyBytes,
      }),
    };
  } catch (error) {
    if (error instanceof EventValidationError) {
      deps.logger.warn({ code: error.code, details: error.details }, `Rejected metrics event: ${error.message}`);
      return { response: toEventResponse(error.response) };
    }

    deps.logger.error({ err: error }, "Unexpected failure while parsing metrics event");
    return { response: toEventResponse(buildResponse("InternalServerError")) };
  }
};

/** Validate, authorize, then hand every metric to the sink. Always resolves to a response. */
export const handleMetricsEvent = async (event: MetricsEvent, deps: MetricsEventHandlerDeps): Promise<EventResponse> => {
  deps.logger.debug("Parsing metrics event");
  const parsed = parseOrResponse(event, deps);
  if ("response" in parsed) {
    return parsed.response;
  }

  const { request } = parsed;
  const decision = await deps.authorizer.decide({
    keyId: request.apiKey,
    message: request.message,
    signature: request.signature,
    location: request.location,
    method: request.method,
  });

  if (!isOkResponse(decision)) {
    deps.logger.warn({ keyId: request.apiKey, statusCode: decision.statusCode }, `Access denied: ${decision.body}`);
    return toEventResponse(toDecisionResponse(decision));
  }

  const metrics = request.metrics;
  deps.logger.info({ keyId: request.apiKey, count: metrics.length }, "Sending metrics");

  try {
    for (const metric of metrics) {
      await deps.sink.publish(metric);
    }
  } catch (error) {
    deps.logger.error({ err: error, keyId: request.apiKey }, "Failed to hand metrics to the queue");
    return toEventResponse(buildResponse("InternalServerError"));
  }

  return toEventResponse(
    buildJsonResponse(
      "Created",
      {
        status: "success",
        processed: metrics.length,
      },
      { [API_KEY_HEADER]: request.apiKey }
    )
  );
};
