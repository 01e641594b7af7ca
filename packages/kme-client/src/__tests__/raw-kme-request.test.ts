import * as fs from 'node:fs';
import type {RequestListener} from 'node:http';
import * as https from 'node:https';
import {TLSSocket} from 'node:tls';
import {fileURLToPath} from 'node:url';

import {afterEach, describe, expect, it} from 'vitest';

import {classifyTransportError, KmeTransportError, rawKmeRequest, type KmeRequestOptions} from '../transport.js';
import {STATUS_BODY} from './fixtures.js';

// Test-only PKI: a CA, a server certificate for localhost/127.0.0.1 and a
// client certificate for sae-1, all issued by it, plus an unrelated CA.
const tlsFile = (name: string) =>
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  fs.readFileSync(fileURLToPath(new URL(`./fixtures/tls/${name}`, import.meta.url)));

const clientOptions = (overrides: Partial<KmeRequestOptions> = {}): KmeRequestOptions => ({
  method: 'GET',
  headers: {Accept: 'application/json'},
  cert: tlsFile('client.crt'),
  key: tlsFile('client.key'),
  ca: tlsFile('ca.crt'),
  timeoutMs: 5000,
  ...overrides
});

describe('rawKmeRequest against an in-process KME', () => {
  let server: https.Server | undefined;

  const startKme = async (handler: RequestListener) => {
    const instance = https.createServer(
      {
        cert: tlsFile('server.crt'),
        key: tlsFile('server.key'),
        ca: tlsFile('ca.crt'),
        requestCert: true,
        rejectUnauthorized: true
      },
      handler
    );
    server = instance;
    await new Promise<void>(resolve => {
      instance.listen(0, '127.0.0.1', () => resolve());
    });
    const address = instance.address();
    if (address === null || typeof address === 'string') {
      throw new Error('KME test server has no port');
    }
    return `https://127.0.0.1:${address.port}`;
  };

  afterEach(async () => {
    const instance = server;
    server = undefined;
    if (instance) {
      instance.closeAllConnections();
      await new Promise<void>(resolve => {
        instance.close(() => resolve());
      });
    }
  });

  it('authenticates with the client certificate and returns the body', async () => {
    const seen: Array<{method?: string; url?: string; peer?: string}> = [];
    const base = await startKme((req, res) => {
      seen.push({
        method: req.method,
        url: req.url,
        peer: req.socket instanceof TLSSocket ? req.socket.getPeerCertificate().subject.CN : undefined
      });
      res.writeHead(200, {'Content-Type': 'application/json'});
      res.end(STATUS_BODY);
    });

    const response = await rawKmeRequest(`${base}/api/v1/keys/sae-2/status`, clientOptions());

    expect(response).toEqual({status: 200, body: STATUS_BODY});
    expect(seen).toEqual([{method: 'GET', url: '/api/v1/keys/sae-2/status', peer: 'sae-1'}]);
  });

  it('sends a JSON body with its length', async () => {
    const base = await startKme((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        res.writeHead(200, {'Content-Type': 'application/json'});
        res.end(JSON.stringify({length: req.headers['content-length'], received: Buffer.concat(chunks).toString('utf8')}));
      });
    });
    const body = '{"key_IDs":[{"key_ID":"test-key-id-1"}]}';

    const response = await rawKmeRequest(
      `${base}/api/v1/keys/sae-1/dec_keys`,
      clientOptions({method: 'POST', headers: {'Content-Type': 'application/json'}, body})
    );

    expect(JSON.parse(response.body)).toEqual({length: String(body.length), received: body});
  });

  it('gives up on a KME that stalls after the headers', async () => {
    const base = await startKme((_req, res) => {
      res.writeHead(200, {'Content-Type': 'application/json'});
      res.write('{"keys":');
    });

    const request = rawKmeRequest(`${base}/api/v1/keys/sae-2/enc_keys`, clientOptions({timeoutMs: 100}));

    await expect(request).rejects.toBeInstanceOf(KmeTransportError);
    await expect(request).rejects.toMatchObject({
      code: 'network_unreachable',
      message: 'KME did not answer within 100ms'
    });
  });

  it('cuts off a response larger than 1 MiB', async () => {
    const base = await startKme((_req, res) => {
      res.writeHead(200, {'Content-Type': 'application/json'});
      res.write(Buffer.alloc(1024 * 1024 + 4096, 0x61));
    });

    const request = rawKmeRequest(`${base}/api/v1/keys/sae-2/enc_keys`, clientOptions());

    await expect(request).rejects.toMatchObject({
      code: 'protocol_decode_error',
      message: 'KME response exceeds size limit'
    });
  });

  it('reports a server certificate from an untrusted CA as a handshake failure', async () => {
    const base = await startKme((_req, res) => {
      res.end(STATUS_BODY);
    });

    const failure = await rawKmeRequest(`${base}/api/v1/keys/sae-2/status`, clientOptions({ca: tlsFile('other-ca.crt')})).then(
      () => undefined,
      (error: unknown) => error
    );

    expect(classifyTransportError(failure).error.code).toBe('tls_handshake_failure');
  });
});
