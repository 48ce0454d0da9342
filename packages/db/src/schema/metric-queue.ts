import { index, pgTable, text, timestamp, varchar } from "drizzle-orm/pg-core";

export const createMetricQueueTable = (tableName: string) =>
  pgTable(
    tableName,
    {
      id: text("id").primaryKey(),
      queue: varchar("queue", { length: 80 }).notNull(),
      body: text("body").notNull(),
      createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => ({
      queueCreatedIdx: index(`${tableName}_queue_created_idx`).on(table.queue, table.createdAt),
    })
  );

export const metricQueue = createMetricQueueTable("benzaiten_metric_queue");

export type MetricQueueTable = typeof metricQueue;
