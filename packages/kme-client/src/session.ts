/**
 * Session lifecycle for the connection-oriented protocol variant.
 *
 * A context moves Closed -> Open through {@link openSession} and back through
 * {@link closeSession}. Closing a closed session is a successful no-op so
 * teardown paths can call it unconditionally.
 */

import {requireOpenStream, runContextOperation, type QkdContext} from './context.js';
import {describeError, err, ok, type KmeResult} from './errors.js';
import {classifyTransportError, withDeadline} from './transport.js';
import type {KeyStreamApi, KeyStreamHandle, KeyStreamQos} from './types.js';

const DEFAULT_KEY_CHUNK_BYTES = 32;

const resolveQos = (context: QkdContext, requested: Partial<KeyStreamQos> | undefined): KeyStreamQos => ({
  keyChunkSize:
    requested?.keyChunkSize ??
    (context.keySizeBits !== undefined ? Math.ceil(context.keySizeBits / 8) : DEFAULT_KEY_CHUNK_BYTES),
  timeoutMs: requested?.timeoutMs ?? context.timeoutMs
});

/**
 * Close a stream no context owns: one that opened after its deadline, or
 * while the context was being destroyed.
 */
const closeOrphanedStream = (context: QkdContext, api: KeyStreamApi, handle: KeyStreamHandle): Promise<void> =>
  withDeadline(api.close(handle), context.timeoutMs, 'Key stream close').then(
    () => {
      context.logger.info({
        event: 'kme.session.orphan_closed',
        component: 'kme.session',
        role: context.role,
        metadata: {key_stream_id: handle.keyStreamId}
      });
    },
    (error: unknown) => {
      context.logger.warn({
        event: 'kme.session.orphan_close_failed',
        component: 'kme.session',
        role: context.role,
        reason_code: classifyTransportError(error).error.code,
        message: describeError(error),
        metadata: {key_stream_id: handle.keyStreamId}
      });
    }
  );

const openStream = async (context: QkdContext): Promise<KmeResult<KeyStreamHandle>> => {
  if (context.protocol.kind !== 'connection_oriented') {
    return err('session_state_error', 'Sessions exist only for the connection-oriented protocol');
  }
  if (context.isConnected) {
    return err('session_state_error', 'Key stream is already open');
  }
  if (!context.credentials) {
    return err('configuration_missing', 'Credentials are not provisioned');
  }
  if (!context.sourceUri || !context.destUri) {
    return err('configuration_missing', 'Source and destination SAE identifiers are required');
  }

  const {api, qos} = context.protocol;
  try {
    const handle = await withDeadline(
      api.open({
        credentials: context.credentials,
        source: context.sourceUri,
        destination: context.destUri,
        qos: resolveQos(context, qos)
      }),
      context.timeoutMs,
      'Key stream open',
      late => {
        void closeOrphanedStream(context, api, late);
      }
    );
    return ok(handle);
  } catch (error) {
    return classifyTransportError(error);
  }
};

/**
 * Open a key stream; on success `context.isConnected` becomes true.
 */
export const openSession = (context: QkdContext | null | undefined): Promise<boolean> =>
  runContextOperation(context, 'open_session', async live => {
    const handle = await openStream(live);
    if (!handle.ok) {
      return handle;
    }
    if (live.commitStream(handle.value)) {
      return handle;
    }
    if (live.protocol.kind === 'connection_oriented') {
      await closeOrphanedStream(live, live.protocol.api, handle.value);
    }
    return err('session_state_error', 'Context was destroyed while the key stream was opening');
  });

/**
 * Close the key stream. A failed vendor close abandons the session: the
 * handle is dropped and `isConnected` still turns false, but the call fails.
 */
export const closeSession = (context: QkdContext | null | undefined): Promise<boolean> =>
  runContextOperation(context, 'close_session', async live => {
    if (live.protocol.kind !== 'connection_oriented') {
      return err('session_state_error', 'Sessions exist only for the connection-oriented protocol');
    }

    const stream = requireOpenStream(live);
    if (!stream.ok) {
      return ok('already_closed');
    }

    const {api, handle} = stream.value;
    live.commitStream(null);
    try {
      await withDeadline(api.close(handle), live.timeoutMs, 'Key stream close');
    } catch (error) {
      return classifyTransportError(error);
    }
    return ok('closed');
  });

/**
 * Run `operation` inside a session. Connection-oriented contexts are opened
 * first and always closed afterwards; stateless contexts run it directly.
 * Resolves to `null` when the session cannot be opened.
 */
export const withQkdSession = async <T>(
  context: QkdContext | null | undefined,
  operation: (context: QkdContext) => Promise<T>
): Promise<T | null> => {
  if (!context || context.isDestroyed) {
    return null;
  }
  if (context.protocol.kind === 'stateless') {
    return operation(context);
  }
  if (!(await openSession(context))) {
    return null;
  }

  try {
    return await operation(context);
  } finally {
    await closeSession(context);
  }
};
