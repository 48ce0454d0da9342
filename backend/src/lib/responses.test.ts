import assert from "node:assert/strict";
import test from "node:test";

import {
  buildJsonResponse,
  buildResponse,
  isOkResponse,
  outcomeForStatus,
  toEventResponse,
} from "./responses";

test("buildResponse uses the canonical status and body", () => {
  assert.deepEqual(buildResponse("Teapot"), {
    outcome: "Teapot",
    statusCode: 418,
    headers: {},
    body: "I'm a teapot",
  });

  const detailed = buildResponse("BadMapping", { body: "Bad resource: metrics", headers: { "X-Trace": "abc" } });
  assert.equal(detailed.statusCode, 421);
  assert.equal(detailed.body, "Bad resource: metrics");
  assert.deepEqual(detailed.headers, { "X-Trace": "abc" });
});

test("isOkResponse accepts only 2xx statuses", () => {
  for (const statusCode of [200, 201, 202]) {
    assert.equal(isOkResponse({ statusCode }), true, `status ${statusCode}`);
  }

  for (const statusCode of [101, 300, 307, 400, 409, 500]) {
    assert.equal(isOkResponse({ statusCode }), false, `status ${statusCode}`);
  }
});

test("outcomeForStatus returns the first outcome registered for a status", () => {
  assert.equal(outcomeForStatus(413), "RequestTooLarge");
  assert.equal(outcomeForStatus(403), "Forbidden");
  assert.equal(outcomeForStatus(404), null);
});

test("buildJsonResponse serialises the payload and sets the content type", () => {
  const response = buildJsonResponse("Created", { test: "me", float: 1.23 }, { "X-Bztn-Key": "key-1" });

  assert.equal(response.statusCode, 201);
  assert.equal(response.body, '{"test":"me","float":1.23}');
  assert.deepEqual(response.headers, {
    "Content-Type": "application/json",
    "X-Bztn-Key": "key-1",
  });
});

test("toEventResponse renders text bodies as-is", () => {
  const response = buildResponse("AccessGranted", { body: "teststring", headers: { test_h: "test_v" } });

  assert.deepEqual(toEventResponse(response), {
    isBase64Encoded: false,
    statusCode: 200,
    headers: { test_h: "test_v" },
    body: "teststring",
  });
});

test("toEventResponse encodes the body when asked", () => {
  const response = buildResponse("AccessGranted", { body: "teststring" });

  assert.deepEqual(toEventResponse(response, { encodeBase64: true }), {
    isBase64Encoded: true,
    statusCode: 200,
    headers: {},
    body: "dGVzdHN0cmluZw==",
  });
});

test("toEventResponse flags byte bodies that are already base64", () => {
  const plain = toEventResponse(buildResponse("AccessGranted", { body: Buffer.from("not_encoded") }));
  assert.equal(plain.isBase64Encoded, false);
  assert.equal(plain.body, "not_encoded");

  const encoded = toEventResponse(buildResponse("AccessGranted", { body: Buffer.from("ZW5jb2RlZA==") }));
  assert.equal(encoded.isBase64Encoded, true);
  assert.equal(encoded.body, "ZW5jb2RlZA==");
});
