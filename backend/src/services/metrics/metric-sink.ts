import { randomUUID } from "node:crypto";

import type { Database, MetricQueueTable } from "@benzaiten/db";

import { toQueueMessage, type Metric } from "./metric";

export class MetricSinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MetricSinkError";
  }
}

export type MetricSink = {
  publish(metric: Metric): Promise<void>;
};

/** Queue rows are drained by the downstream metrics consumer; delivery may repeat, messages are content-idempotent. */
export const createDrizzleMetricSink = (input: {
  db: Database;
  table: MetricQueueTable;
  queueName: string;
  now?: () => Date;
}): MetricSink => {
  const now = input.now ?? (() => new Date());

  return {
    async publish(metric) {
      const sentAt = now();

      try {
        await input.db.insert(input.table).values({
          id: randomUUID(),
          queue: input.queueName,
          body: toQueueMessage(metric, sentAt),
          createdAt: sentAt,
        });
      } catch (error) {
        throw new MetricSinkError(`Failed to enqueue metric on ${input.queueName}`, { cause: error });
      }
    },
  };
};
