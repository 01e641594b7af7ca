/**
 * Key acquisition.
 *
 * Two modes share one result shape:
 * - next key: the KME picks a fresh key and returns it with its identifier
 *   (`enc_keys` in ETSI GS QKD 014).
 * - key by identifier: the peer announced an identifier out of band and the
 *   KME must return exactly that key (`dec_keys`).
 *
 * Only the first entry of a key container is consumed. An empty container is
 * a failure even when the KME answered 200.
 */

import {decodeBase64} from './base64.js';
import {openContextChannel, requireOpenStream, runContextOperation, type QkdContext} from './context.js';
import {KeyContainerSchema, keysPath, type KeyContainer, type KeyIdsRequest} from './contracts.js';
import {err, ok, type KmeResult} from './errors.js';
import {SecretKey} from './secret-key.js';
import {classifyTransportError, decodeJson, httpFailure, withDeadline, type KmeChannel} from './transport.js';
import type {StreamKey} from './types.js';

export interface RetrievedKey {
  keyId: string;
  key: SecretKey;
}

const takeFirstKey = (container: KeyContainer, expectedKeyId?: string): KmeResult<RetrievedKey> => {
  const [first] = container.keys;
  if (!first) {
    return err('key_not_found', 'KME returned an empty key container');
  }
  if (expectedKeyId !== undefined && first.key_ID !== expectedKeyId) {
    return err('key_not_found', `KME returned key ${first.key_ID} instead of ${expectedKeyId}`);
  }

  const bytes = decodeBase64(first.key);
  if (!bytes) {
    return err('protocol_decode_error', `Key ${first.key_ID} is not valid base64`);
  }
  return ok({keyId: first.key_ID, key: SecretKey.adopt(bytes)});
};

const readKeyContainer = async (
  channel: KmeChannel,
  request: Parameters<KmeChannel['request']>[0],
  expectedKeyId?: string
): Promise<KmeResult<RetrievedKey>> => {
  const response = await channel.request(request);
  if (!response.ok) {
    return response;
  }
  if (response.value.status !== 200) {
    // ETSI 014 answers 400 for unknown key identifiers and exhausted pools.
    return httpFailure(response.value, 'key_not_found');
  }

  const container = decodeJson(response.value.body, KeyContainerSchema, 'key container');
  if (!container.ok) {
    return container;
  }
  return takeFirstKey(container.value, expectedKeyId);
};

/**
 * `GET /api/v1/keys/{peer}/enc_keys?number=1[&size=N]`.
 */
export const fetchNextKey = (
  channel: KmeChannel,
  peerSaeId: string,
  options: {keySizeBits?: number} = {}
): Promise<KmeResult<RetrievedKey>> =>
  readKeyContainer(channel, {
    method: 'GET',
    path: keysPath(peerSaeId, 'enc_keys'),
    query: {number: 1, size: options.keySizeBits}
  });

/**
 * `POST /api/v1/keys/{peer}/dec_keys` for a single identifier.
 */
export const fetchKeyById = (channel: KmeChannel, peerSaeId: string, keyId: string): Promise<KmeResult<RetrievedKey>> => {
  const body: KeyIdsRequest = {key_IDs: [{key_ID: keyId}]};
  return readKeyContainer(channel, {method: 'POST', path: keysPath(peerSaeId, 'dec_keys'), json: body}, keyId);
};

const acceptStreamKey = (streamKey: StreamKey, expectedKeyId?: string): KmeResult<RetrievedKey> => {
  if (streamKey.keyId.length === 0) {
    return err('protocol_decode_error', 'Key stream returned a key without identifier');
  }
  if (expectedKeyId !== undefined && streamKey.keyId !== expectedKeyId) {
    return err('key_not_found', `Key stream returned key ${streamKey.keyId} instead of ${expectedKeyId}`);
  }
  if (streamKey.key.byteLength === 0) {
    return err('key_not_found', 'Key stream returned empty key material');
  }
  const key = SecretKey.fromBytes(streamKey.key);
  // The context becomes the only holder of the key material.
  streamKey.key.fill(0);
  return ok({keyId: streamKey.keyId, key});
};

const fetchStreamKey = async (context: QkdContext, keyId?: string): Promise<KmeResult<RetrievedKey>> => {
  const stream = requireOpenStream(context);
  if (!stream.ok) {
    return stream;
  }
  const {api, handle} = stream.value;

  let streamKey: StreamKey;
  try {
    streamKey = await withDeadline(api.getKey(handle, keyId), context.timeoutMs, 'Key stream get-key', late => {
      late.key.fill(0);
    });
  } catch (error) {
    return classifyTransportError(error);
  }
  return acceptStreamKey(streamKey, keyId);
};

const acquire = async (context: QkdContext, keyId?: string): Promise<KmeResult<RetrievedKey>> => {
  if (context.protocol.kind === 'connection_oriented') {
    return fetchStreamKey(context, keyId);
  }

  const opened = openContextChannel(context);
  if (!opened.ok) {
    return opened;
  }
  const {channel, peerSaeId} = opened.value;
  try {
    return keyId === undefined
      ? await fetchNextKey(channel, peerSaeId, context.keySizeBits !== undefined ? {keySizeBits: context.keySizeBits} : {})
      : await fetchKeyById(channel, peerSaeId, keyId);
  } finally {
    channel.close();
  }
};

const install = (context: QkdContext, retrieved: KmeResult<RetrievedKey>): KmeResult<{keyId: string}> => {
  if (!retrieved.ok) {
    return retrieved;
  }
  context.commitKey(retrieved.value.keyId, retrieved.value.key);
  context.logger.debug({
    event: 'kme.key.installed',
    component: 'kme.keys',
    metadata: {key_id: retrieved.value.keyId, key_length: retrieved.value.key.byteLength}
  });
  return ok({keyId: retrieved.value.keyId});
};

/**
 * Acquire the next available key from the context's KME and hold it in
 * `context.key`, with its identifier in `context.lastKeyId`. The initiator
 * announces that identifier to its peer.
 */
export const getKey = (context: QkdContext | null | undefined): Promise<boolean> =>
  runContextOperation(context, 'get_key', async live => install(live, await acquire(live)));

/**
 * Acquire the key matching `keyId`, as announced by the peer. The KME must
 * return that exact identifier.
 */
export const getKeyWithId = (context: QkdContext | null | undefined, keyId: string): Promise<boolean> =>
  runContextOperation(context, 'get_key_with_id', async live => {
    if (keyId.trim().length === 0) {
      return err('key_not_found', 'Key identifier must not be empty');
    }
    return install(live, await acquire(live, keyId));
  });
