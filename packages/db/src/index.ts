import * as schema from "./schema";

export { createDb, type Database } from "./client";
export { schema };
export type { ApiKeyRecordsTable, LocationGrant, MetricQueueTable } from "./schema";
