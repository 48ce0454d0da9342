import { z } from "zod";

import { formatCanonicalDate, parseCanonicalDate, truncateToSeconds } from "../../lib/canonical-date";

export type Metric = Readonly<{
  metricName: string;
  timeSpan: string;
  locationName: string;
  metricDate: Date;
  metricValue: number;
  metricSource: string;
}>;

export class MetricFieldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetricFieldError";
  }
}

export class MetricDateTypeError extends Error {
  constructor(received: string) {
    super(`metric_date should be a "YYYY-MM-DD HH:MM:SS" string or a Date, got ${received}`);
    this.name = "MetricDateTypeError";
  }
}

export class MetricDateValueError extends Error {
  constructor(value: string) {
    super(`metric_date "${value}" does not match "YYYY-MM-DD HH:MM:SS"`);
    this.name = "MetricDateValueError";
  }
}

// Integral values past 2^53 have already been rounded by JSON.parse and cannot be forwarded as sent.
const metricValueSchema = z
  .number()
  .finite()
  .refine((value) => !Number.isInteger(value) || Number.isSafeInteger(value), {
    message: "Integral metric_value exceeds the exactly representable range",
  })
  .transform((value) => (Object.is(value, -0) ? 0 : value));

const metricEntrySchema = z.object({
  metric_name: z.string(),
  time_span: z.string(),
  location_name: z.string().optional(),
  metric_date: z.unknown(),
  metric_value: metricValueSchema,
  metric_source: z.string(),
});

const queueMessageSchema = z.object({
  metric_name: z.string(),
  time_span: z.string(),
  location_name: z.string(),
  metric_date: z.string(),
  metric_value: z.number().finite(),
  metric_source: z.string(),
  msg_send_date_utc: z.string(),
});

const describeType = (value: unknown): string => {
  if (value === null) {
    return "null";
  }

  if (Array.isArray(value)) {
    return "array";
  }

  return typeof value;
};

/** `metric_name@location_name#time_span`, the series key shared by every sample of one metric. */
export const metricSystemKey = (metric: Pick<Metric, "metricName" | "locationName" | "timeSpan">): string =>
  `${metric.metricName}@${metric.locationName}#${metric.timeSpan}`;

/**
 * Identity of a sample within a batch. Value and source are left out on purpose so that two samples of the same
 * series at the same second collide even when one corrects the other.
 */
export const metricIdentity = (metric: Metric): string =>
  JSON.stringify([metric.metricName, metric.locationName, metric.timeSpan, metric.metricDate.getTime()]);

export const metricsShareIdentity = (left: Metric, right: Metric): boolean =>
  metricIdentity(left) === metricIdentity(right);

const toMetricDate = (value: unknown): Date => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MetricDateValueError(String(value));
    }

    return truncateToSeconds(value);
  }

  if (typeof value !== "string") {
    throw new MetricDateTypeError(describeType(value));
  }

  const parsed = parseCanonicalDate(value);
  if (!parsed) {
    throw new MetricDateValueError(value);
  }

  return parsed;
};

/**
 * Converts an untrusted metric entry into a Metric.
 * When `locationName` is given it replaces whatever location the entry carries.
 */
export const metricFromEntry = (entry: unknown, locationName?: string): Metric => {
  if (typeof entry !== "object" || entry === null || Array.isArray(entry)) {
    throw new MetricFieldError(`Metric entry should be an object, got ${describeType(entry)}`);
  }

  if (!("metric_date" in entry)) {
    throw new MetricFieldError("Missing metric field: metric_date");
  }

  const parsed = metricEntrySchema.safeParse(entry);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new MetricFieldError(`Invalid metric fields: ${fields}`);
  }

  const resolvedLocation = locationName || parsed.data.location_name;
  if (resolvedLocation === undefined) {
    throw new MetricFieldError("Missing metric field: location_name");
  }

  return {
    metricName: parsed.data.metric_name,
    timeSpan: parsed.data.time_span,
    locationName: resolvedLocation,
    metricDate: toMetricDate(parsed.data.metric_date),
    metricValue: parsed.data.metric_value,
    metricSource: parsed.data.metric_source,
  };
};

export const toQueueMessage = (metric: Metric, sentAt: Date = new Date()): string =>
  JSON.stringify({
    metric_name: metric.metricName,
    time_span: metric.timeSpan,
    location_name: metric.locationName,
    metric_date: formatCanonicalDate(metric.metricDate),
    metric_value: metric.metricValue,
    metric_source: metric.metricSource,
    msg_send_date_utc: formatCanonicalDate(sentAt),
  });

export const parseQueueMessage = (message: string): { metric: Metric; sentAt: Date } => {
  const payload = queueMessageSchema.parse(JSON.parse(message));
  const metric = metricFromEntry(payload);
  const sentAt = parseCanonicalDate(payload.msg_send_date_utc);
  if (!sentAt) {
    throw new MetricDateValueError(payload.msg_send_date_utc);
  }

  return { metric, sentAt };
};
