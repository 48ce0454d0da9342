import { constants, createPublicKey, verify, type KeyObject } from "node:crypto";

import { decodeBase64Strict } from "../../lib/base64";

const PEM_PREFIX = "-----BEGIN";

/** Accepts PEM text, DER SubjectPublicKeyInfo or DER PKCS#1 bytes. Returns null when none of them load. */
const loadRsaPublicKey = (keyBytes: Buffer): KeyObject | null => {
  const candidates = keyBytes.subarray(0, PEM_PREFIX.length).toString("latin1") === PEM_PREFIX
    ? [() => createPublicKey({ key: keyBytes.toString("utf8"), format: "pem" })]
    : [
        () => createPublicKey({ key: keyBytes, format: "der", type: "spki" }),
        () => createPublicKey({ key: keyBytes, format: "der", type: "pkcs1" }),
      ];

  for (const load of candidates) {
    try {
      const key = load();
      return key.asymmetricKeyType === "rsa" ? key : null;
    } catch {
      continue;
    }
  }

  return null;
};

/**
 * Verifies an RSASSA-PKCS1-v1_5 signature over the SHA-512 digest of `message`.
 * Malformed keys, malformed base64 and mismatching signatures all read as `false`.
 */
export const verifyMessageSignature = (input: {
  publicKey: Buffer;
  message: Buffer;
  signature: string;
}): boolean => {
  const signatureBytes = decodeBase64Strict(input.signature);
  if (!signatureBytes || signatureBytes.length === 0) {
    return false;
  }

  const key = loadRsaPublicKey(input.publicKey);
  if (!key) {
    return false;
  }

  try {
    return verify("sha512", input.message, { key, padding: constants.RSA_PKCS1_PADDING }, signatureBytes);
  } catch {
    return false;
  }
};
