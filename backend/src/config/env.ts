import { z } from "zod";

import { DEFAULT_MAX_BODY_BYTES } from "../services/metrics/event-parser";

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return fallback;
};

const tableName = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, "must be a lower-case SQL identifier")
  .max(63);

const envSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DATABASE_URL: z.string().min(1),
  TRUST_PROXY: z.string().optional(),
  METRICS_RESOURCE: z.string().min(1).default("metric"),
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
  API_KEYS_TABLE: tableName.default("benzaiten_api_keys"),
  METRIC_QUEUE_TABLE: tableName.default("benzaiten_metric_queue"),
  METRIC_QUEUE_NAME: z.string().min(1).max(80).default("metrics"),
});

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type BackendConfig = {
  host: string;
  port: number;
  logLevel: LogLevel;
  databaseUrl: string;
  trustProxy: boolean;
  ingest: {
    resourceName: string;
    maxBodyBytes: number;
  };
  keyStore: {
    tableName: string;
  };
  metricQueue: {
    tableName: string;
    queueName: string;
  };
};

/** Built once at start-up and passed down; nothing below reads process.env. */
export const loadBackendConfig = (source: Record<string, string | undefined> = process.env): BackendConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid backend environment: ${issues}`);
  }

  return {
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    databaseUrl: parsed.data.DATABASE_URL,
    trustProxy: parseBoolean(parsed.data.TRUST_PROXY, false),
    ingest: {
      resourceName: parsed.data.METRICS_RESOURCE,
      maxBodyBytes: parsed.data.MAX_BODY_BYTES,
    },
    keyStore: {
      tableName: parsed.data.API_KEYS_TABLE,
    },
    metricQueue: {
      tableName: parsed.data.METRIC_QUEUE_TABLE,
      queueName: parsed.data.METRIC_QUEUE_NAME,
    },
  };
};
