import {openContextChannel, requireOpenStream, runContextOperation, type QkdContext} from './context.js';
import {KmeStatusResponseSchema, keysPath, type KmeStatusResponse} from './contracts.js';
import {err, ok, type KmeResult} from './errors.js';
import {classifyTransportError, decodeJson, httpFailure, withDeadline, type KmeChannel} from './transport.js';
import type {KeyPoolStatus} from './types.js';

const toKeyPoolStatus = (payload: KmeStatusResponse): KeyPoolStatus => ({
  storedKeyCount: payload.stored_key_count,
  maxKeyCount: payload.max_key_count,
  keySize: payload.key_size,
  ...(payload.source_KME_ID !== undefined ? {sourceKmeId: payload.source_KME_ID} : {}),
  ...(payload.target_KME_ID !== undefined ? {targetKmeId: payload.target_KME_ID} : {}),
  ...(payload.master_SAE_ID !== undefined ? {masterSaeId: payload.master_SAE_ID} : {}),
  ...(payload.slave_SAE_ID !== undefined ? {slaveSaeId: payload.slave_SAE_ID} : {}),
  ...(payload.max_key_per_request !== undefined ? {maxKeyPerRequest: payload.max_key_per_request} : {}),
  ...(payload.max_key_size !== undefined ? {maxKeySize: payload.max_key_size} : {}),
  ...(payload.min_key_size !== undefined ? {minKeySize: payload.min_key_size} : {}),
  ...(payload.max_SAE_ID_count !== undefined ? {maxSaeIdCount: payload.max_SAE_ID_count} : {})
});

/**
 * `GET /api/v1/keys/{peer}/status` on an open channel.
 */
export const fetchKeyPoolStatus = async (channel: KmeChannel, peerSaeId: string): Promise<KmeResult<KeyPoolStatus>> => {
  const response = await channel.request({method: 'GET', path: keysPath(peerSaeId, 'status')});
  if (!response.ok) {
    return response;
  }
  if (response.value.status !== 200) {
    return httpFailure(response.value, 'protocol_decode_error');
  }

  const payload = decodeJson(response.value.body, KmeStatusResponseSchema, 'status response');
  if (!payload.ok) {
    return payload;
  }
  return ok(toKeyPoolStatus(payload.value));
};

const fetchStreamStatus = async (context: QkdContext): Promise<KmeResult<KeyPoolStatus>> => {
  const stream = requireOpenStream(context);
  if (!stream.ok) {
    return stream;
  }
  const {api, handle} = stream.value;
  if (!api.status) {
    return err('session_state_error', 'Key stream API does not report pool status');
  }

  try {
    return ok(await withDeadline(api.status(handle), context.timeoutMs, 'Key stream status'));
  } catch (error) {
    return classifyTransportError(error);
  }
};

/**
 * Refresh `context.status` from the context's KME. The previous status is
 * kept when the query fails.
 */
export const getStatus = (context: QkdContext | null | undefined): Promise<boolean> =>
  runContextOperation(context, 'get_status', async live => {
    let status: KmeResult<KeyPoolStatus>;
    if (live.protocol.kind === 'connection_oriented') {
      status = await fetchStreamStatus(live);
    } else {
      const opened = openContextChannel(live);
      if (!opened.ok) {
        return opened;
      }
      const {channel, peerSaeId} = opened.value;
      try {
        status = await fetchKeyPoolStatus(channel, peerSaeId);
      } finally {
        channel.close();
      }
    }

    if (status.ok) {
      live.commitStatus(status.value);
    }
    return status;
  });
