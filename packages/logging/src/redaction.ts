const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'secret',
  'token',
  'password',
  'passphrase',
  'authorization',
  'privatekey',
  'private_key',
  'key_material'
] as const;

// Matched whole: `key` alone carries key bytes in KME payloads, while `key_id` or `key_size` do not.
const DEFAULT_SENSITIVE_KEYS = ['key', 'keys', 'keybytes', 'key_bytes'] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = ({
  key,
  sensitiveKeys
}: {
  key: string;
  sensitiveKeys: Set<string>;
}) => {
  const normalized = normalizeKey(key);
  if (sensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const hasToJson = (value: object): value is {toJSON: () => unknown} =>
  'toJSON' in value && typeof value.toJSON === 'function';

const sanitizeErrorForLog = (error: Error) => ({
  name: error.name,
  message: error.message,
  ...(error.stack ? {stack: error.stack} : {})
});

const sanitizeInternal = ({
  value,
  depth,
  seen,
  sensitiveKeys
}: {
  value: unknown;
  depth: number;
  seen: WeakSet<object>;
  sensitiveKeys: Set<string>;
}): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'bigint' || typeof value === 'symbol') {
    return value.toString();
  }

  if (typeof value === 'function') {
    return '[FUNCTION]';
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
  }

  if (value instanceof Error) {
    return sanitizeErrorForLog(value);
  }

  // Raw bytes are never written out, whatever the key they sit under.
  if (value instanceof Uint8Array) {
    return `[BYTES:${value.byteLength}]`;
  }

  if (Array.isArray(value)) {
    return value.map(item =>
      sanitizeInternal({
        value: item,
        depth: depth + 1,
        seen,
        sensitiveKeys
      })
    );
  }

  if (typeof value === 'object') {
    if (seen.has(value)) {
      return '[CIRCULAR]';
    }

    seen.add(value);

    if (hasToJson(value)) {
      return sanitizeInternal({value: value.toJSON(), depth: depth + 1, seen, sensitiveKeys});
    }

    const nextEntries = Object.entries(value).map(([key, entryValue]: [string, unknown]) => {
      if (isSensitiveKey({key, sensitiveKeys})) {
        return [key, REDACTED_VALUE] as const;
      }

      return [
        key,
        sanitizeInternal({
          value: entryValue,
          depth: depth + 1,
          seen,
          sensitiveKeys
        })
      ] as const;
    });

    return Object.fromEntries(nextEntries);
  }

  return Object.prototype.toString.call(value);
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => {
  const sensitiveKeys = new Set(
    [...DEFAULT_SENSITIVE_KEYS, ...extraSensitiveKeys].map(item => normalizeKey(item)).filter(item => item.length > 0)
  );

  return sanitizeInternal({
    value,
    depth: 0,
    seen: new WeakSet<object>(),
    sensitiveKeys
  });
};
