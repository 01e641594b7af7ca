const BASE64_REGEX = /^[A-Za-z0-9+/]+={0,2}$/u;
const BASE64_PAD_MOD = 4;

const padBase64 = (value: string) => {
  const normalized = value.trim();
  if (normalized.length === 0) {
    return null;
  }

  if (/[^A-Za-z0-9+/=]/u.test(normalized)) {
    return null;
  }

  const remainder = normalized.length % BASE64_PAD_MOD;
  if (remainder === 1) {
    return null;
  }

  if (remainder === 0) {
    return normalized;
  }

  return `${normalized}${'='.repeat(BASE64_PAD_MOD - remainder)}`;
};

/**
 * Strict base64 decoding of KME key payloads.
 *
 * Returns `null` for empty input, foreign characters, impossible lengths and
 * non-canonical encodings.
 */
export const decodeBase64 = (value: string): Buffer | null => {
  const padded = padBase64(value);
  if (!padded || !BASE64_REGEX.test(padded)) {
    return null;
  }

  const decoded = Buffer.from(padded, 'base64');
  if (decoded.length === 0 || decoded.toString('base64') !== padded) {
    decoded.fill(0);
    return null;
  }

  return decoded;
};
