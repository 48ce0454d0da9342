import { eq } from "drizzle-orm";

import type { ApiKeyRecordsTable, Database } from "@benzaiten/db";

export type LocationAttribute = "location_get" | "location_put";

/**
 * Projection of one key record. `locations` holds whichever location attribute was requested and is left
 * untyped: the record is external data and its shape is checked by the caller.
 */
export type KeyRecord = {
  publicKey: Buffer | null;
  locations: unknown;
  expirationDateUtc: string | null;
};

export type KeyRecordStoreErrorCode =
  | "ProvisionedThroughputExceededException"
  | "RequestLimitExceeded"
  | "UnauthorizedOperation"
  | "ResourceNotFoundException"
  | "InternalServerError";

export class KeyRecordStoreError extends Error {
  readonly code: KeyRecordStoreErrorCode;

  constructor(code: KeyRecordStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KeyRecordStoreError";
    this.code = code;
  }
}

export type KeyRecordStore = {
  get(keyId: string, attribute: LocationAttribute): Promise<KeyRecord | null>;
};

const SQLSTATE_CODES: Record<string, KeyRecordStoreErrorCode> = {
  "53300": "RequestLimitExceeded",
  "53400": "RequestLimitExceeded",
  "57P03": "RequestLimitExceeded",
  "55P03": "ProvisionedThroughputExceededException",
  "40001": "ProvisionedThroughputExceededException",
  "40P01": "ProvisionedThroughputExceededException",
  "28000": "UnauthorizedOperation",
  "28P01": "UnauthorizedOperation",
  "42501": "UnauthorizedOperation",
  "42P01": "ResourceNotFoundException",
};

const readErrorCode = (error: unknown): string | null => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return null;
  }

  return typeof error.code === "string" ? error.code : null;
};

export const toKeyRecordStoreError = (error: unknown): KeyRecordStoreError => {
  if (error instanceof KeyRecordStoreError) {
    return error;
  }

  // drizzle wraps driver failures, so the SQLSTATE may sit on the cause.
  const cause = typeof error === "object" && error !== null && "cause" in error ? error.cause : null;
  const sqlState = readErrorCode(error) ?? readErrorCode(cause);
  const code = (sqlState ? SQLSTATE_CODES[sqlState] : undefined) ?? "InternalServerError";
  const message = error instanceof Error ? error.message : "Key record lookup failed";

  return new KeyRecordStoreError(code, message, { cause: error });
};

export const createDrizzleKeyRecordStore = (db: Database, table: ApiKeyRecordsTable): KeyRecordStore => ({
  async get(keyId, attribute) {
    const locationColumn = attribute === "location_get" ? table.locationGet : table.locationPut;

    try {
      const [row] = await db
        .select({
          publicKey: table.pubKey,
          locations: locationColumn,
          expirationDateUtc: table.expirationDateUtc,
        })
        .from(table)
        .where(eq(table.apiKey, keyId))
        .limit(1);

      if (!row) {
        return null;
      }

      return {
        publicKey: row.publicKey,
        locations: row.locations,
        expirationDateUtc: row.expirationDateUtc,
      };
    } catch (error) {
      throw toKeyRecordStoreError(error);
    }
  },
});
