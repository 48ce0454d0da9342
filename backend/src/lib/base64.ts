const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Strict base64 decoding; Buffer.from silently skips invalid characters, so the shape is checked first. */
export const decodeBase64Strict = (value: string): Buffer | null => {
  if (!BASE64_PATTERN.test(value)) {
    return null;
  }

  return Buffer.from(value, "base64");
};

export const isCanonicalBase64 = (value: Buffer): boolean => {
  const text = value.toString("latin1");
  return text.length > 0 && BASE64_PATTERN.test(text);
};
