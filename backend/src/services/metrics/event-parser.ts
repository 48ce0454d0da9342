import { decodeBase64Strict } from "../../lib/base64";
import { HttpError } from "../../lib/http-error";
import { buildResponse, OUTCOMES, type ApiResponse, type Outcome } from "../../lib/responses";
import { DuplicateMetricError, IngestRequest } from "./ingest-request";
import { MetricDateTypeError, MetricDateValueError, MetricFieldError, metricFromEntry } from "./metric";

export const DEFAULT_MAX_BODY_BYTES = 20 * 1024 * 1024;

export const SIGNATURE_HEADER = "X-Bztn-Sign";
export const API_KEY_HEADER = "X-Bztn-Key";

/** Inbound request as handed over by the transport layer. Every field is untrusted. */
export type MetricsEvent = {
  resource?: string | null;
  httpMethod?: string | null;
  body?: string | null;
  isBase64Encoded?: boolean | null;
  queryStringParameters?: Record<string, string | undefined> | null;
  headers?: Record<string, string | undefined> | null;
};

export type ParseMetricsEventOptions = {
  resourceName: string;
  maxBodyBytes?: number;
};

const ERROR_CODES: Partial<Record<Outcome, string>> = {
  BadMapping: "BAD_MAPPING",
  MethodNotAllowed: "METHOD_NOT_ALLOWED",
  RequestTooLarge: "REQUEST_TOO_LARGE",
  BadRequest: "BAD_REQUEST",
};

export class EventValidationError extends HttpError {
  readonly response: ApiResponse;

  constructor(outcome: Outcome, message: string, details?: unknown) {
    super(OUTCOMES[outcome].statusCode, ERROR_CODES[outcome] ?? "INVALID_EVENT", message, details);
    this.name = "EventValidationError";
    this.response = buildResponse(outcome, { body: message });
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeHeaders = (headers: MetricsEvent["headers"]): Record<string, string> => {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (typeof value === "string") {
      normalized[name] = value;
    }
  }

  return normalized;
};

const findHeader = (headers: Record<string, string>, name: string): string | null => {
  const wanted = name.toLowerCase();
  const match = Object.entries(headers).find(([headerName]) => headerName.toLowerCase() === wanted);
  return match ? match[1] : null;
};

const countQueryParameters = (parameters: MetricsEvent["queryStringParameters"]): number =>
  Object.values(parameters ?? {}).filter((value) => value !== undefined).length;

/**
 * Validates an inbound metrics event and builds the deduplicated IngestRequest.
 * The first violation throws EventValidationError carrying the response to return.
 */
export const parseMetricsEvent = (event: MetricsEvent, options: ParseMetricsEventOptions): IngestRequest => {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  if (event.resource !== options.resourceName) {
    throw new EventValidationError("BadMapping", `Bad resource: ${String(event.resource)}`);
  }

  const method = event.httpMethod ?? "";
  if (method !== "PUT") {
    throw new EventValidationError("MethodNotAllowed", `Method ${method} not allowed`);
  }

  const rawBody = event.body ?? "";
  const bodyBytes = Buffer.byteLength(rawBody, "utf8");
  if (bodyBytes >= maxBodyBytes) {
    throw new EventValidationError("RequestTooLarge", "Message too big for being processed", {
      bodyBytes,
      maxBodyBytes,
    });
  }

  const parameterCount = countQueryParameters(event.queryStringParameters);
  if (parameterCount > 0) {
    throw new EventValidationError("BadRequest", `0 parameters expected, got ${parameterCount}`);
  }

  let message: Buffer;
  if (event.isBase64Encoded) {
    const decoded = decodeBase64Strict(rawBody);
    if (!decoded) {
      throw new EventValidationError("BadRequest", "Invalid base64 body");
    }

    message = decoded;
  } else {
    message = Buffer.from(rawBody, "utf8");
  }

  let document: unknown;
  try {
    document = JSON.parse(message.toString("utf8"));
  } catch {
    throw new EventValidationError("BadRequest", "Invalid JSON object");
  }

  if (!isRecord(document)) {
    throw new EventValidationError("BadRequest", "Invalid JSON object");
  }

  const headers = normalizeHeaders(event.headers);
  const location = document.location_name;
  const signature = findHeader(headers, SIGNATURE_HEADER);
  const apiKey = findHeader(headers, API_KEY_HEADER);

  if (typeof location !== "string" || signature === null || apiKey === null) {
    throw new EventValidationError("BadRequest", "Bad request", {
      locationName: typeof location === "string",
      signature: signature !== null,
      apiKey: apiKey !== null,
    });
  }

  const entries = document.metrics;
  if (!Array.isArray(entries)) {
    throw new EventValidationError("BadRequest", "Metrics list is missing or not iterable");
  }

  const request = new IngestRequest({
    apiKey,
    signature,
    location,
    message,
    headers,
    method,
    host: findHeader(headers, "Host"),
  });

  for (const entry of entries) {
    try {
      request.add(metricFromEntry(entry, location));
    } catch (error) {
      if (error instanceof DuplicateMetricError) {
        throw new EventValidationError("BadRequest", error.message, { metricSystemKey: error.metricSystemKey });
      }

      if (
        error instanceof MetricFieldError ||
        error instanceof MetricDateTypeError ||
        error instanceof MetricDateValueError
      ) {
        throw new EventValidationError("BadRequest", `Invalid metric: ${JSON.stringify(entry)}`, {
          reason: error.message,
        });
      }

      throw error;
    }
  }

  return request;
};
