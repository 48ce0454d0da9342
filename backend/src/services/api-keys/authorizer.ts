import { parseCanonicalDate } from "../../lib/canonical-date";
import type { AppLogger } from "../../lib/logger";
import { buildResponse, OUTCOMES, type ApiResponse, type Outcome } from "../../lib/responses";
import { KeyRecordStoreError, type KeyRecord, type KeyRecordStore, type LocationAttribute } from "./key-record-store";
import { verifyMessageSignature } from "./signature";

export const TEAPOT_SIGNATURE = "earlgrey";

const THROTTLING_CODES = new Set(["ProvisionedThroughputExceededException", "RequestLimitExceeded"]);

export type AccessMethod = "GET" | "PUT";

export type AuthorizationQuery = {
  keyId: string;
  message: Buffer;
  signature: string;
  location: string;
  method: string;
};

export type AuthorizationDecision = Readonly<{
  outcome: Outcome;
  statusCode: number;
  body: string;
  granted: boolean;
}>;

export type AccessAuthorizer = {
  decide(query: AuthorizationQuery): Promise<AuthorizationDecision>;
};

type LocationCheck = "allowed" | "denied" | "malformed";

const LOCATION_ATTRIBUTES: Record<AccessMethod, LocationAttribute> = {
  GET: "location_get",
  PUT: "location_put",
};

const isAccessMethod = (method: string): method is AccessMethod => method === "GET" || method === "PUT";

const decision = (outcome: Outcome): AuthorizationDecision =>
  Object.freeze({
    outcome,
    statusCode: OUTCOMES[outcome].statusCode,
    body: OUTCOMES[outcome].body,
    granted: outcome === "AccessGranted",
  });

/**
 * `*` opens every location, any other single string opens none, and a set opens exactly its members.
 * Anything else is a malformed record.
 */
export const checkLocationGrant = (grant: unknown, location: string): LocationCheck => {
  if (typeof grant === "string") {
    return grant === "*" ? "allowed" : "denied";
  }

  if (Array.isArray(grant) && grant.every((entry) => typeof entry === "string")) {
    return grant.includes(location) ? "allowed" : "denied";
  }

  return "malformed";
};

export const toDecisionResponse = (value: AuthorizationDecision): ApiResponse =>
  buildResponse(value.outcome, { body: value.body });

export const createAccessAuthorizer = (deps: {
  store: KeyRecordStore;
  logger: AppLogger;
  now?: () => Date;
}): AccessAuthorizer => {
  const now = deps.now ?? (() => new Date());
  const { logger, store } = deps;

  return {
    async decide(query) {
      if (!isAccessMethod(query.method)) {
        logger.warn({ method: query.method }, "Rejected access check for unsupported method");
        return decision("MethodNotAllowed");
      }

      if (query.signature === TEAPOT_SIGNATURE) {
        logger.info({ keyId: query.keyId }, "Teapot signature received");
        return decision("Teapot");
      }

      const attribute = LOCATION_ATTRIBUTES[query.method];

      let record: KeyRecord | null;
      try {
        record = await store.get(query.keyId, attribute);
      } catch (error) {
        const code = error instanceof KeyRecordStoreError ? error.code : null;
        logger.error({ err: error, keyId: query.keyId, code }, "Key record lookup failed");

        if (code && THROTTLING_CODES.has(code)) {
          return decision("ServiceUnavailable");
        }

        if (code === "UnauthorizedOperation") {
          return decision("NetworkAuthRequired");
        }

        return decision("InternalServerError");
      }

      if (!record) {
        logger.info({ keyId: query.keyId }, "API key not found");
        return decision("InvalidKey");
      }

      if (record.expirationDateUtc !== null) {
        const expiresAt = parseCanonicalDate(record.expirationDateUtc);
        if (!expiresAt) {
          logger.error({ keyId: query.keyId }, "Key record has an unparsable expiration date");
          return decision("InternalServerError");
        }

        if (expiresAt.getTime() < now().getTime()) {
          logger.info({ keyId: query.keyId }, "API key expired");
          return decision("ExpiredKey");
        }
      }

      if (record.locations === null || record.locations === undefined) {
        logger.error({ keyId: query.keyId, attribute }, "Key record is missing its location grant");
        return decision("InternalServerError");
      }

      const locationCheck = checkLocationGrant(record.locations, query.location);
      if (locationCheck === "malformed") {
        logger.error({ keyId: query.keyId, attribute }, "Key record has a malformed location grant");
        return decision("InternalServerError");
      }

      if (locationCheck === "denied") {
        logger.info({ keyId: query.keyId, location: query.location }, "Location not granted to API key");
        return decision("Forbidden");
      }

      if (!record.publicKey) {
        logger.error({ keyId: query.keyId }, "Key record is missing its public key");
        return decision("InternalServerError");
      }

      const verified = verifyMessageSignature({
        publicKey: record.publicKey,
        message: query.message,
        signature: query.signature,
      });

      if (!verified) {
        logger.info({ keyId: query.keyId }, "Signature check failed");
        return decision("Unauthorized");
      }

      return decision("AccessGranted");
    },
  };
};
