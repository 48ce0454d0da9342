export * from "./api-keys";
export * from "./metric-queue";
