/**
 * Mutual-TLS transport to a KME.
 *
 * A channel binds a KME base URL to a loaded credential bundle. Requests go
 * out with the client certificate, the pinned CA and a hard timeout, and
 * every failure comes back as a {@link KmeResult} instead of a rejection.
 */

import * as fs from 'node:fs';
import * as https from 'node:https';

import type {z} from 'zod';

import {KmeErrorResponseSchema} from './contracts.js';
import type {CredentialBundle} from './credentials.js';
import {describeError, err, ok, type KmeErrorCode, type KmeFailure, type KmeResult} from './errors.js';

/** Responses larger than this are cut off; a key container is a few KiB at most. */
const MAX_RESPONSE_BYTES = 1024 * 1024;

const TLS_ERROR_CODES = new Set([
  'EPROTO',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_SIGNATURE_FAILURE',
  'CERT_REJECTED',
  'CERT_UNTRUSTED',
  'HOSTNAME_MISMATCH'
]);

const TLS_ERROR_PREFIXES = ['ERR_TLS_', 'ERR_SSL_', 'ERR_OSSL_'];

export interface KmeHttpResponse {
  status: number;
  body: string;
}

export interface KmeRequestOptions {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  cert: Buffer;
  key: Buffer;
  ca: Buffer;
  timeoutMs: number;
}

export type KmeRequestImpl = (url: string, options: KmeRequestOptions) => Promise<KmeHttpResponse>;

export type CredentialFileReader = (filePath: string) => Buffer;

/**
 * Raised by the transport itself; `code` selects the error taxonomy entry.
 */
export class KmeTransportError extends Error {
  constructor(
    public readonly code: KmeErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'KmeTransportError';
  }
}

/**
 * Issue one HTTPS request with client certificate authentication.
 */
export async function rawKmeRequest(url: string, options: KmeRequestOptions): Promise<KmeHttpResponse> {
  return new Promise((resolve, reject) => {
    const parsedUrl = new URL(url);
    if (parsedUrl.protocol !== 'https:') {
      reject(new KmeTransportError('invalid_address', `Unsupported KME scheme: ${parsedUrl.protocol}`));
      return;
    }

    const headers = {...options.headers};
    if (options.body !== undefined) {
      headers['Content-Length'] = String(Buffer.byteLength(options.body));
    }

    const requestOptions: https.RequestOptions = {
      hostname: parsedUrl.hostname,
      port: parsedUrl.port || 443,
      path: parsedUrl.pathname + parsedUrl.search,
      method: options.method,
      headers,
      cert: options.cert,
      key: options.key,
      ca: options.ca,
      rejectUnauthorized: true,
      minVersion: 'TLSv1.2'
    };

    let deadline: ReturnType<typeof setTimeout> | undefined;
    const settle = () => {
      if (deadline) {
        clearTimeout(deadline);
        deadline = undefined;
      }
    };

    const req = https.request(requestOptions, res => {
      const chunks: Buffer[] = [];
      let received = 0;
      let oversized: KmeTransportError | undefined;
      res.on('data', (chunk: Buffer) => {
        received += chunk.length;
        if (oversized) {
          return;
        }
        if (received > MAX_RESPONSE_BYTES) {
          oversized = new KmeTransportError('protocol_decode_error', 'KME response exceeds size limit');
          chunks.length = 0;
          req.destroy(oversized);
          return;
        }
        chunks.push(chunk);
      });
      res.on('end', () => {
        settle();
        if (oversized) {
          reject(oversized);
          return;
        }
        resolve({status: res.statusCode ?? 0, body: Buffer.concat(chunks).toString('utf8')});
      });
    });

    deadline = setTimeout(() => {
      req.destroy(new KmeTransportError('network_unreachable', `KME did not answer within ${options.timeoutMs}ms`));
    }, options.timeoutMs);
    req.on('error', error => {
      settle();
      reject(error);
    });

    if (options.body !== undefined) {
      req.write(options.body);
    }
    req.end();
  });
}

/**
 * Bound a vendor or transport promise by a timeout.
 *
 * The bounded operation keeps running after the deadline. When it still
 * resolves, `onLate` receives the value nobody will collect, so owned
 * resources (stream handles, key buffers) can be released.
 */
export const withDeadline = <T>(
  operation: Promise<T>,
  timeoutMs: number,
  what: string,
  onLate?: (value: T) => void
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      reject(new KmeTransportError('network_unreachable', `${what} did not complete within ${timeoutMs}ms`));
    }, timeoutMs);
    operation.then(
      value => {
        clearTimeout(timer);
        if (expired) {
          onLate?.(value);
          return;
        }
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });

const errorCodeOf = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
};

/**
 * Map a transport rejection onto the error taxonomy.
 */
export const classifyTransportError = (error: unknown): KmeFailure => {
  if (error instanceof KmeTransportError) {
    return err(error.code, error.message);
  }

  const code = errorCodeOf(error);
  const message = describeError(error);
  if (code && (TLS_ERROR_CODES.has(code) || TLS_ERROR_PREFIXES.some(prefix => code.startsWith(prefix)))) {
    return err('tls_handshake_failure', `TLS handshake with KME failed: ${message}`);
  }

  return err('network_unreachable', `KME unreachable: ${message}`);
};

/**
 * Parse a KME address. Bare `host[:port]` values are taken as HTTPS; an
 * explicit scheme other than https is refused.
 */
export const parseKmeHost = (host: string | undefined | null): KmeResult<URL> => {
  const trimmed = host?.trim() ?? '';
  if (trimmed.length === 0) {
    return err('configuration_missing', 'KME host is not configured');
  }

  const candidate = /^[a-z][a-z0-9+.-]*:\/\//iu.test(trimmed) ? trimmed : `https://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    return err('invalid_address', `KME host is not a valid URL: ${trimmed}`);
  }

  if (parsed.protocol !== 'https:') {
    return err('invalid_address', `Unsupported KME scheme: ${parsed.protocol}`);
  }
  if (parsed.username || parsed.password || parsed.search || parsed.hash) {
    return err('invalid_address', `KME host must not carry credentials, query or fragment: ${trimmed}`);
  }

  return ok(parsed);
};

/**
 * Turn a non-2xx KME answer into a failure. Authentication rejections are
 * certificate problems; 5xx means the KME is not serving.
 */
export const httpFailure = (response: KmeHttpResponse, fallback: KmeErrorCode): KmeFailure => {
  let detail = `HTTP ${response.status}`;
  try {
    const parsed = KmeErrorResponseSchema.safeParse(JSON.parse(response.body));
    if (parsed.success) {
      detail = `${detail} - ${parsed.data.message}`;
    }
  } catch {
    // body is not JSON; the status alone describes the failure
  }

  if (response.status === 401 || response.status === 403) {
    return err('tls_handshake_failure', `KME rejected client credentials: ${detail}`);
  }
  if (response.status >= 500 || response.status === 0) {
    return err('network_unreachable', `KME unavailable: ${detail}`);
  }
  return err(fallback, `KME request failed: ${detail}`);
};

/**
 * Decode a JSON body against a payload schema.
 */
export const decodeJson = <T>(body: string, schema: z.ZodType<T>, what: string): KmeResult<T> => {
  let parsedBody: unknown;
  try {
    parsedBody = JSON.parse(body);
  } catch {
    return err('protocol_decode_error', `KME returned invalid JSON for ${what}`);
  }

  const parsed = schema.safeParse(parsedBody);
  if (!parsed.success) {
    return err('protocol_decode_error', `KME ${what} failed schema validation: ${parsed.error.message}`);
  }
  return ok(parsed.data);
};

export interface KmeChannelRequest {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string | number | undefined>;
  json?: unknown;
}

/**
 * An established mTLS binding to one KME.
 */
export interface KmeChannel {
  readonly baseUrl: string;
  request(input: KmeChannelRequest): Promise<KmeResult<KmeHttpResponse>>;
  /** Wipes the loaded client key; later requests fail. */
  close(): void;
}

export interface OpenKmeChannelOptions {
  hostUri: string | undefined | null;
  credentials: CredentialBundle | null;
  timeoutMs: number;
  requestImpl?: KmeRequestImpl;
  readFile?: CredentialFileReader;
}

const isCompleteBundle = (bundle: CredentialBundle | null): bundle is CredentialBundle =>
  Boolean(bundle && bundle.caCertPath && bundle.clientCertPath && bundle.clientKeyPath);

// eslint-disable-next-line security/detect-non-literal-fs-filename
const readCredentialFile: CredentialFileReader = filePath => fs.readFileSync(filePath);

export const openKmeChannel = ({
  hostUri,
  credentials,
  timeoutMs,
  requestImpl = rawKmeRequest,
  readFile = readCredentialFile
}: OpenKmeChannelOptions): KmeResult<KmeChannel> => {
  const base = parseKmeHost(hostUri);
  if (!base.ok) {
    return base;
  }
  if (!isCompleteBundle(credentials)) {
    return err('configuration_missing', 'Credential bundle is incomplete');
  }
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    return err('configuration_missing', 'KME timeout must be a positive integer');
  }

  let material: {cert: Buffer; key: Buffer; ca: Buffer};
  try {
    material = {
      ca: readFile(credentials.caCertPath),
      cert: readFile(credentials.clientCertPath),
      key: readFile(credentials.clientKeyPath)
    };
  } catch (error) {
    return err('configuration_missing', `Failed to load mTLS credentials: ${describeError(error)}`);
  }

  const baseUrl = base.value.toString().replace(/\/+$/u, '');
  let closed = false;

  const request = async ({method, path, query, json}: KmeChannelRequest): Promise<KmeResult<KmeHttpResponse>> => {
    if (closed) {
      return err('session_state_error', 'KME channel is closed');
    }

    const url = new URL(`${baseUrl}${path}`);
    for (const [name, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(name, String(value));
      }
    }

    const headers: Record<string, string> = {Accept: 'application/json'};
    const body = json === undefined ? undefined : JSON.stringify(json);
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await requestImpl(url.toString(), {
        method,
        headers,
        ...(body !== undefined ? {body} : {}),
        cert: material.cert,
        key: material.key,
        ca: material.ca,
        timeoutMs
      });
      return ok(response);
    } catch (error) {
      return classifyTransportError(error);
    }
  };

  return ok({
    baseUrl,
    request,
    close: () => {
      if (closed) {
        return;
      }
      closed = true;
      material.key.fill(0);
    }
  });
};
