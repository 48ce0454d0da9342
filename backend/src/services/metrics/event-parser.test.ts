import assert from "node:assert/strict";
import test from "node:test";

import { EventValidationError, parseMetricsEvent, type MetricsEvent } from "./event-parser";

const OPTIONS = { resourceName: "metric", maxBodyBytes: 1024 * 1024 };

const metricEntry = {
  metric_name: "temperature",
  time_span: "1h",
  metric_date: "2024-05-01 12:00:00",
  metric_value: 21.5,
  metric_source: "sensor-a",
};

const bodyText = (document: unknown): string => JSON.stringify(document);

const defaultBody = bodyText({ location_name: "loc1", metrics: [metricEntry] });

const buildEvent = (overrides: Partial<MetricsEvent> = {}): MetricsEvent => ({
  resource: "metric",
  httpMethod: "PUT",
  body: defaultBody,
  isBase64Encoded: false,
  queryStringParameters: null,
  headers: {
    Host: "ingest.example.test",
    "X-Bztn-Key": "key-1",
    "X-Bztn-Sign": "c2lnbmF0dXJl",
  },
  ...overrides,
});

const assertRejected = (event: MetricsEvent, statusCode: number, body: string, options = OPTIONS): void => {
  assert.throws(
    () => parseMetricsEvent(event, options),
    (error: unknown) => {
      assert.ok(error instanceof EventValidationError);
      assert.equal(error.statusCode, statusCode);
      assert.equal(error.response.statusCode, statusCode);
      assert.equal(error.response.body, body);
      return true;
    }
  );
};

test("parses a well-formed event", () => {
  const request = parseMetricsEvent(buildEvent(), OPTIONS);

  assert.equal(request.apiKey, "key-1");
  assert.equal(request.signature, "c2lnbmF0dXJl");
  assert.equal(request.location, "loc1");
  assert.equal(request.method, "PUT");
  assert.equal(request.host, "ingest.example.test");
  assert.deepEqual(request.message, Buffer.from(defaultBody, "utf8"));
  assert.equal(request.size, 1);
  assert.deepEqual(request.metrics, [
    {
      metricName: "temperature",
      timeSpan: "1h",
      locationName: "loc1",
      metricDate: new Date(Date.UTC(2024, 4, 1, 12, 0, 0)),
      metricValue: 21.5,
      metricSource: "sensor-a",
    },
  ]);
});

test("rejects an unexpected resource before anything else", () => {
  assertRejected(buildEvent({ resource: "metrics", httpMethod: "GET" }), 421, "Bad resource: metrics");
});

test("rejects methods other than PUT", () => {
  assertRejected(buildEvent({ httpMethod: "POST" }), 405, "Method POST not allowed");
  assertRejected(buildEvent({ httpMethod: "GET" }), 405, "Method GET not allowed");
});

test("rejects bodies at or above the size ceiling", () => {
  const size = Buffer.byteLength(defaultBody);

  assertRejected(buildEvent(), 413, "Message too big for being processed", { ...OPTIONS, maxBodyBytes: size });
  assert.equal(parseMetricsEvent(buildEvent(), { ...OPTIONS, maxBodyBytes: size + 1 }).size, 1);
});

test("rejects any query-string parameter", () => {
  assertRejected(buildEvent({ queryStringParameters: { x: "y" } }), 400, "0 parameters expected, got 1");
  assert.equal(parseMetricsEvent(buildEvent({ queryStringParameters: {} }), OPTIONS).size, 1);
});

test("decodes base64 bodies and keeps the decoded bytes as the message", () => {
  const request = parseMetricsEvent(
    buildEvent({ body: Buffer.from(defaultBody, "utf8").toString("base64"), isBase64Encoded: true }),
    OPTIONS
  );

  assert.deepEqual(request.message, Buffer.from(defaultBody, "utf8"));
  assert.equal(request.size, 1);

  assertRejected(buildEvent({ body: "not base64!", isBase64Encoded: true }), 400, "Invalid base64 body");
});

test("rejects bodies that are not a JSON object", () => {
  assertRejected(buildEvent({ body: "{not json" }), 400, "Invalid JSON object");
  assertRejected(buildEvent({ body: "[1,2]" }), 400, "Invalid JSON object");
  assertRejected(buildEvent({ body: null }), 400, "Invalid JSON object");
});

test("requires location_name and both signing headers", () => {
  assertRejected(buildEvent({ body: bodyText({ metrics: [metricEntry] }) }), 400, "Bad request");
  assertRejected(buildEvent({ headers: { "X-Bztn-Key": "key-1" } }), 400, "Bad request");
  assertRejected(buildEvent({ headers: { "X-Bztn-Sign": "c2lnbmF0dXJl" } }), 400, "Bad request");
});

test("matches signing headers case-insensitively", () => {
  const request = parseMetricsEvent(
    buildEvent({ headers: { host: "ingest.example.test", "x-bztn-key": "key-2", "x-bztn-sign": "c2lnbg==" } }),
    OPTIONS
  );

  assert.equal(request.apiKey, "key-2");
  assert.equal(request.signature, "c2lnbg==");
  assert.equal(request.host, "ingest.example.test");
});

test("requires an iterable metrics list but accepts an empty one", () => {
  assertRejected(buildEvent({ body: bodyText({ location_name: "loc1" }) }), 400, "Metrics list is missing or not iterable");
  assertRejected(
    buildEvent({ body: bodyText({ location_name: "loc1", metrics: 5 }) }),
    400,
    "Metrics list is missing or not iterable"
  );
  assert.equal(parseMetricsEvent(buildEvent({ body: bodyText({ location_name: "loc1", metrics: [] }) }), OPTIONS).size, 0);
});

test("names the offending entry when a metric is malformed", () => {
  const wrongType = { ...metricEntry, metric_date: 1714564800 };
  const wrongValue = { ...metricEntry, metric_date: "2024-31-05 12:00:00" };
  const { metric_source: _source, ...missingField } = metricEntry;

  for (const entry of [wrongType, wrongValue, missingField]) {
    assertRejected(
      buildEvent({ body: bodyText({ location_name: "loc1", metrics: [metricEntry, entry] }) }),
      400,
      `Invalid metric: ${JSON.stringify(entry)}`
    );
  }
});

test("rejects an integral value too large to forward exactly", () => {
  const body =
    '{"location_name":"loc1","metrics":[{"metric_name":"temperature","time_span":"1h",' +
    '"metric_date":"2024-05-01 12:00:00","metric_value":9007199254740993,"metric_source":"sensor-a"}]}';

  assertRejected(
    buildEvent({ body }),
    400,
    `Invalid metric: ${JSON.stringify({ ...metricEntry, metric_value: 2 ** 53 })}`
  );
});

test("overwrites metric locations with the request location", () => {
  const request = parseMetricsEvent(
    buildEvent({ body: bodyText({ location_name: "loc1", metrics: [{ ...metricEntry, location_name: "loc9" }] }) }),
    OPTIONS
  );

  assert.equal(request.metrics[0]?.locationName, "loc1");
});

test("rejects a batch that repeats a sample identity", () => {
  const correction = { ...metricEntry, metric_value: 23, metric_source: "manual" };

  assertRejected(
    buildEvent({ body: bodyText({ location_name: "loc1", metrics: [metricEntry, correction] }) }),
    400,
    "Metric temperature@loc1#1h already exists"
  );
});
