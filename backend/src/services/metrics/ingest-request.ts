import { metricIdentity, metricSystemKey, type Metric } from "./metric";

export class DuplicateMetricError extends Error {
  readonly metricSystemKey: string;

  constructor(metric: Metric) {
    const key = metricSystemKey(metric);
    super(`Metric ${key} already exists`);
    this.name = "DuplicateMetricError";
    this.metricSystemKey = key;
  }
}

export type IngestRequestInit = {
  apiKey: string;
  signature: string;
  location: string;
  message: Buffer;
  headers: Record<string, string>;
  method: string;
  host: string | null;
};

export class IngestRequest {
  readonly apiKey: string;
  readonly signature: string;
  readonly location: string;
  readonly message: Buffer;
  readonly headers: Readonly<Record<string, string>>;
  readonly method: string;
  readonly host: string | null;

  private readonly metricsByIdentity = new Map<string, Metric>();

  constructor(init: IngestRequestInit) {
    this.apiKey = init.apiKey;
    this.signature = init.signature;
    this.location = init.location;
    this.message = init.message;
    this.headers = { ...init.headers };
    this.method = init.method;
    this.host = init.host;
  }

  get size(): number {
    return this.metricsByIdentity.size;
  }

  /** Insertion order is preserved. */
  get metrics(): Metric[] {
    return [...this.metricsByIdentity.values()];
  }

  has(metric: Metric): boolean {
    return this.metricsByIdentity.has(metricIdentity(metric));
  }

  add(metric: Metric): void {
    const identity = metricIdentity(metric);
    if (this.metricsByIdentity.has(identity)) {
      throw new DuplicateMetricError(metric);
    }

    this.metricsByIdentity.set(identity, metric);
  }
}
