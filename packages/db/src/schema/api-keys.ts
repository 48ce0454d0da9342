import { customType, jsonb, pgTable, text } from "drizzle-orm/pg-core";

const bytea = customType<{ data: Buffer; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
});

/**
 * Location grant stored per method: the wildcard `"*"`, a single location, or a set of locations.
 * Rows are written by the key provisioning tooling; the gateway only reads them.
 */
export type LocationGrant = string | string[];

export const createApiKeyRecordsTable = (tableName: string) =>
  pgTable(tableName, {
    apiKey: text("api_key").primaryKey(),
    pubKey: bytea("pub_key"),
    locationGet: jsonb("location_get").$type<LocationGrant>(),
    locationPut: jsonb("location_put").$type<LocationGrant>(),
    // Canonical "YYYY-MM-DD HH:MM:SS" UTC text, kept verbatim so malformed values surface at read time.
    expirationDateUtc: text("expiration_date_utc"),
  });

export const apiKeyRecords = createApiKeyRecordsTable("benzaiten_api_keys");

export type ApiKeyRecordsTable = typeof apiKeyRecords;
