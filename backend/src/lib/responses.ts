import { isCanonicalBase64 } from "./base64";

export const OUTCOMES = {
  AccessGranted: { statusCode: 200, body: "Access Granted" },
  Created: { statusCode: 201, body: "Created" },
  BadRequest: { statusCode: 400, body: "Bad Request" },
  Unauthorized: { statusCode: 401, body: "Unauthorized" },
  Forbidden: { statusCode: 403, body: "Forbidden" },
  ExpiredKey: { statusCode: 403, body: "Expired API Key" },
  InvalidKey: { statusCode: 403, body: "Invalid API Key" },
  MethodNotAllowed: { statusCode: 405, body: "Method Not Allowed" },
  RequestTooLarge: { statusCode: 413, body: "Request Entry Too Large" },
  Teapot: { statusCode: 418, body: "I'm a teapot" },
  BadMapping: { statusCode: 421, body: "Bad Mapping" },
  InternalServerError: { statusCode: 500, body: "Internal Server Error" },
  ServiceUnavailable: { statusCode: 503, body: "Service Unavailable" },
  NetworkAuthRequired: { statusCode: 511, body: "Network Authentication Required" },
} as const satisfies Record<string, { statusCode: number; body: string }>;

export type Outcome = keyof typeof OUTCOMES;

export type ResponseHeaders = Record<string, string>;

export type ApiResponse = {
  outcome: Outcome;
  statusCode: number;
  headers: ResponseHeaders;
  body: string | Buffer;
};

/** Shape handed back to the transport layer. */
export type EventResponse = {
  isBase64Encoded: boolean;
  statusCode: number;
  headers: ResponseHeaders;
  body: string;
};

export const buildResponse = (
  outcome: Outcome,
  options: { body?: string | Buffer; headers?: ResponseHeaders } = {}
): ApiResponse => ({
  outcome,
  statusCode: OUTCOMES[outcome].statusCode,
  headers: { ...(options.headers ?? {}) },
  body: options.body ?? OUTCOMES[outcome].body,
});

export const buildJsonResponse = (outcome: Outcome, payload: unknown, headers: ResponseHeaders = {}): ApiResponse =>
  buildResponse(outcome, {
    body: JSON.stringify(payload),
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  });

export const isOkResponse = (response: Pick<ApiResponse, "statusCode">): boolean =>
  Math.floor(response.statusCode / 100) === 2;

const isOutcome = (value: string): value is Outcome => value in OUTCOMES;

export const outcomeForStatus = (statusCode: number): Outcome | null => {
  const match = Object.keys(OUTCOMES)
    .filter(isOutcome)
    .find((outcome) => OUTCOMES[outcome].statusCode === statusCode);
  return match ?? null;
};

export const toEventResponse = (response: ApiResponse, options: { encodeBase64?: boolean } = {}): EventResponse => {
  if (options.encodeBase64) {
    const raw = typeof response.body === "string" ? Buffer.from(response.body, "utf8") : response.body;
    return {
      isBase64Encoded: true,
      statusCode: response.statusCode,
      headers: { ...response.headers },
      body: raw.toString("base64"),
    };
  }

  if (typeof response.body === "string") {
    return {
      isBase64Encoded: false,
      statusCode: response.statusCode,
      headers: { ...response.headers },
      body: response.body,
    };
  }

  // Byte bodies are passed through as text; already-encoded payloads are flagged so the caller decodes them.
  return {
    isBase64Encoded: isCanonicalBase64(response.body),
    statusCode: response.statusCode,
    headers: { ...response.headers },
    body: response.body.toString("utf8"),
  };
};
