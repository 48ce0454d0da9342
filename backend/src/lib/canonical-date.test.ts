import assert from "node:assert/strict";
import test from "node:test";

import { formatCanonicalDate, parseCanonicalDate, truncateToSeconds } from "./canonical-date";

test("parses the canonical format as UTC", () => {
  const parsed = parseCanonicalDate("2023-03-14 15:09:26");

  assert.equal(parsed?.getTime(), Date.UTC(2023, 2, 14, 15, 9, 26));
});

test("keeps years below 100 in the first century", () => {
  const parsed = parseCanonicalDate("0050-01-01 00:00:00");

  assert.equal(parsed?.getUTCFullYear(), 50);
  assert.equal(parsed?.getUTCMonth(), 0);
  assert.equal(parsed?.getUTCDate(), 1);
  assert.equal(parsed ? formatCanonicalDate(parsed) : null, "0050-01-01 00:00:00");
});

test("rejects values outside the canonical format or calendar", () => {
  for (const value of [
    "",
    "2023-03-14T15:09:26",
    "2023-3-14 15:09:26",
    "2023-14-03 10:00:00",
    "2023-02-30 00:00:00",
    "2023-03-14 24:00:00",
    "2023-03-14 15:09:26Z",
  ]) {
    assert.equal(parseCanonicalDate(value), null, value);
  }
});

test("formats with zero padding", () => {
  assert.equal(formatCanonicalDate(new Date(Date.UTC(2024, 0, 5, 3, 4, 5))), "2024-01-05 03:04:05");
});

test("truncates to whole seconds", () => {
  const truncated = truncateToSeconds(new Date(Date.UTC(2024, 0, 5, 3, 4, 5, 987)));

  assert.equal(truncated.getTime(), Date.UTC(2024, 0, 5, 3, 4, 5));
});
