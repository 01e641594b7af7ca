import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import {createStructuredLogger} from '@qkd-link/logging';
import {vi} from 'vitest';

import type {KmeHttpResponse, KmeRequestImpl, KmeRequestOptions} from '../transport.js';
import type {KeyPoolStatus, KeyStreamApi, KeyStreamHandle, OpenStreamRequest, RoleSettings, StreamKey} from '../types.js';

export const STATUS_BODY = JSON.stringify({
  stored_key_count: 10,
  max_key_count: 100,
  key_size: 256
});

export const KEY_BODY = JSON.stringify({
  keys: [
    {
      key_ID: 'test-key-id-1',
      key: 'SGVsbG8gV29ybGQ='
    }
  ]
});

export const MASTER_HOST = 'https://localhost:8080';
export const SLAVE_HOST = 'https://localhost:8081';

export type MtlsFiles = {
  dir: string;
  caCertPath: string;
  clientCertPath: string;
  clientKeyPath: string;
  cleanup: () => void;
};

export function createMtlsFiles(): MtlsFiles {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kme-client-test-'));
  const caCertPath = path.join(dir, 'ca.crt');
  const clientCertPath = path.join(dir, 'client.crt');
  const clientKeyPath = path.join(dir, 'client.key');
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  fs.writeFileSync(caCertPath, 'ca');
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  fs.writeFileSync(clientCertPath, 'cert');
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  fs.writeFileSync(clientKeyPath, 'key');
  return {
    dir,
    caCertPath,
    clientCertPath,
    clientKeyPath,
    cleanup: () => {
      fs.rmSync(dir, {recursive: true, force: true});
    }
  };
}

export const initiatorSettings = (files: MtlsFiles, overrides: Partial<RoleSettings> = {}): RoleSettings => ({
  kmeHost: MASTER_HOST,
  saeId: 'sae-1',
  peerSaeId: 'sae-2',
  caCertPath: files.caCertPath,
  clientCertPath: files.clientCertPath,
  clientKeyPath: files.clientKeyPath,
  ...overrides
});

export const responderSettings = (files: MtlsFiles, overrides: Partial<RoleSettings> = {}): RoleSettings => ({
  kmeHost: SLAVE_HOST,
  saeId: 'sae-2',
  peerSaeId: 'sae-1',
  caCertPath: files.caCertPath,
  clientCertPath: files.clientCertPath,
  clientKeyPath: files.clientKeyPath,
  ...overrides
});

export type RecordedRequest = {url: string; options: KmeRequestOptions};

/**
 * In-process KME: answers by the last path segment of the request URL.
 */
export function createKmeStub(routes: Partial<Record<'status' | 'enc_keys' | 'dec_keys', KmeHttpResponse | Error>>) {
  const calls: RecordedRequest[] = [];
  const requestImpl = vi.fn<KmeRequestImpl>(async (url, options) => {
    calls.push({url, options});
    const endpoint = new URL(url).pathname.split('/').pop();
    const route = endpoint === 'status' || endpoint === 'enc_keys' || endpoint === 'dec_keys' ? routes[endpoint] : undefined;
    if (route === undefined) {
      return {status: 404, body: JSON.stringify({message: 'not found'})};
    }
    if (route instanceof Error) {
      throw route;
    }
    return route;
  });
  return {requestImpl, calls};
}

export function createLogBuffer() {
  const lines: Array<Record<string, unknown>> = [];
  const sink = {
    write: (line: string) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null) {
        lines.push(Object.fromEntries(Object.entries(parsed)));
      }
      return true;
    }
  };
  const logger = createStructuredLogger({
    service: 'kme-client-test',
    env: 'test',
    level: 'debug',
    writer: {stdout: sink, stderr: sink}
  });
  return {logger, lines};
}

type StreamState = {source: string; destination: string; open: boolean};

/**
 * In-memory stand-in for a vendor key-stream library. Both ends of a link
 * opened against the same instance draw the same keys by identifier.
 */
export function createInMemoryKeyStreamApi(options: {keys?: Array<{keyId: string; key: Uint8Array}>; withStatus?: boolean} = {}) {
  const pool = [...(options.keys ?? [{keyId: 'stream-key-1', key: Buffer.from('Hello World')}])];
  const streams = new Map<string, StreamState>();
  const opened: OpenStreamRequest[] = [];
  let nextStream = 1;
  let nextKey = 0;

  const lookup = (handle: KeyStreamHandle) => {
    const stream = streams.get(handle.keyStreamId);
    if (!stream || !stream.open) {
      throw Object.assign(new Error(`Unknown key stream ${handle.keyStreamId}`), {code: 'QKD_STREAM_CLOSED'});
    }
    return stream;
  };

  const api: KeyStreamApi = {
    open: vi.fn(async (request: OpenStreamRequest) => {
      opened.push(request);
      const keyStreamId = `stream-${nextStream}`;
      nextStream += 1;
      streams.set(keyStreamId, {source: request.source, destination: request.destination, open: true});
      return {keyStreamId};
    }),
    close: vi.fn(async (handle: KeyStreamHandle) => {
      lookup(handle).open = false;
    }),
    getKey: vi.fn(async (handle: KeyStreamHandle, keyId?: string): Promise<StreamKey> => {
      lookup(handle);
      const entry = keyId === undefined ? pool[nextKey] : pool.find(candidate => candidate.keyId === keyId);
      if (!entry) {
        throw new Error(keyId === undefined ? 'Key pool exhausted' : `Unknown key ${keyId}`);
      }
      if (keyId === undefined) {
        nextKey += 1;
      }
      return {keyId: entry.keyId, key: Buffer.from(entry.key)};
    })
  };

  if (options.withStatus) {
    api.status = vi.fn(
      async (handle: KeyStreamHandle): Promise<KeyPoolStatus> => {
        lookup(handle);
        return {storedKeyCount: pool.length - nextKey, maxKeyCount: 100, keySize: 256};
      }
    );
  }

  return {api, streams, opened};
}
