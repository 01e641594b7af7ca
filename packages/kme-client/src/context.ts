import {randomUUID} from 'node:crypto';

import {createNoopLogger, runWithLogContext, type StructuredLogger} from '@qkd-link/logging';

import {DEFAULT_KME_TIMEOUT_MS, kmeTimeoutSchema, MAX_KME_TIMEOUT_MS, settingsForRole, type QkdLinkConfig} from './config.js';
import type {CredentialBundle, CredentialFileCheck} from './credentials.js';
import {describeError, err, ok, type KmeResult} from './errors.js';
import type {SecretKey} from './secret-key.js';
import {
  openKmeChannel,
  withDeadline,
  type CredentialFileReader,
  type KmeChannel,
  type KmeRequestImpl
} from './transport.js';
import type {KeyPoolStatus, KeyStreamApi, KeyStreamHandle, QkdProtocol, QkdRole, RoleSettings} from './types.js';

export interface QkdContextOptions {
  role: QkdRole;
  settings: RoleSettings;
  /** Defaults to the stateless REST variant. */
  protocol?: QkdProtocol;
  /** 1..120000 ms; the constructor throws a `RangeError` outside that range. */
  timeoutMs?: number;
  /** Key size requested from the KME, in bits. The KME default applies when unset. */
  keySizeBits?: number;
  logger?: StructuredLogger;
  requestImpl?: KmeRequestImpl;
  readFile?: CredentialFileReader;
  /** `null` disables the credential file existence check. */
  fileCheck?: CredentialFileCheck | null;
}

/**
 * State of one QKD link endpoint.
 *
 * Fields are read-only to callers; the certificate provisioner, status query,
 * key acquisition and session lifecycle update them, and only on success.
 * A context is owned by a single caller and torn down once with {@link destroy}.
 */
export class QkdContext {
  readonly role: QkdRole;
  readonly protocol: QkdProtocol;
  readonly timeoutMs: number;
  readonly keySizeBits: number | undefined;
  readonly logger: StructuredLogger;
  readonly requestImpl: KmeRequestImpl | undefined;
  readonly readFile: CredentialFileReader | undefined;
  readonly fileCheck: CredentialFileCheck | null | undefined;

  /** KME addresses; seeded from the role's settings and assignable by the caller. */
  masterKmeHost: string | null;
  slaveKmeHost: string | null;

  private settings: RoleSettings;
  private source: string | null;
  private destination: string | null;
  private bundle: CredentialBundle | null = null;
  private poolStatus: KeyPoolStatus | null = null;
  private heldKey: SecretKey | null = null;
  private heldKeyId: string | null = null;
  private stream: KeyStreamHandle | null = null;
  private destroyed = false;

  constructor(options: QkdContextOptions) {
    this.role = options.role;
    this.protocol = options.protocol ?? {kind: 'stateless'};
    const timeoutMs = kmeTimeoutSchema.safeParse(options.timeoutMs ?? DEFAULT_KME_TIMEOUT_MS);
    if (!timeoutMs.success) {
      throw new RangeError(`timeoutMs must be an integer between 1 and ${MAX_KME_TIMEOUT_MS}: ${String(options.timeoutMs)}`);
    }
    this.timeoutMs = timeoutMs.data;
    this.keySizeBits = options.keySizeBits;
    this.logger = options.logger ?? createNoopLogger();
    this.requestImpl = options.requestImpl;
    this.readFile = options.readFile;
    this.fileCheck = options.fileCheck;

    this.settings = {...options.settings};
    this.source = options.settings.saeId ?? null;
    this.destination = options.settings.peerSaeId ?? null;
    this.masterKmeHost = options.role === 'initiator' ? (options.settings.kmeHost ?? null) : null;
    this.slaveKmeHost = options.role === 'responder' ? (options.settings.kmeHost ?? null) : null;
  }

  /** This endpoint's SAE identifier. */
  get sourceUri(): string | null {
    return this.source;
  }

  /** The peer endpoint's SAE identifier. */
  get destUri(): string | null {
    return this.destination;
  }

  get roleSettings(): Readonly<RoleSettings> {
    return this.settings;
  }

  get credentials(): CredentialBundle | null {
    return this.bundle;
  }

  get status(): KeyPoolStatus | null {
    return this.poolStatus;
  }

  get key(): SecretKey | null {
    return this.heldKey;
  }

  get lastKeyId(): string | null {
    return this.heldKeyId;
  }

  get isConnected(): boolean {
    return this.stream !== null;
  }

  get streamHandle(): KeyStreamHandle | null {
    return this.stream;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** KME host this endpoint talks to: master for the initiator, slave for the responder. */
  get kmeHost(): string | null {
    return this.role === 'initiator' ? this.masterKmeHost : this.slaveKmeHost;
  }

  /** @internal */
  commitCredentials(bundle: CredentialBundle): void {
    this.bundle = bundle;
  }

  /** @internal */
  commitStatus(status: KeyPoolStatus): void {
    this.poolStatus = status;
  }

  /**
   * Install a freshly retrieved key. The previous key is wiped only after
   * the new one is in place.
   *
   * @internal
   */
  commitKey(keyId: string, key: SecretKey): void {
    if (this.destroyed) {
      key.release();
      return;
    }
    const previous = this.heldKey;
    this.heldKey = key;
    this.heldKeyId = keyId;
    if (previous && previous !== key) {
      previous.release();
    }
  }

  /**
   * Record the open stream, or clear it. A destroyed context accepts no new
   * stream; the caller must close the handle it holds.
   *
   * @internal
   */
  commitStream(handle: KeyStreamHandle | null): boolean {
    if (handle && this.destroyed) {
      return false;
    }
    this.stream = handle;
    return true;
  }

  /**
   * Tear the context down: close an open key stream, wipe the key and drop
   * every owned value. Returns `false` when the context was already destroyed.
   */
  async destroy(): Promise<boolean> {
    if (this.destroyed) {
      return false;
    }
    this.destroyed = true;

    const stream = this.stream;
    this.stream = null;
    if (stream && this.protocol.kind === 'connection_oriented') {
      try {
        await withDeadline(this.protocol.api.close(stream), this.timeoutMs, 'Key stream close');
      } catch (error) {
        this.logger.warn({
          event: 'kme.session.abandoned',
          component: 'kme.context',
          role: this.role,
          reason_code: 'session_state_error',
          message: `Key stream close failed during teardown: ${describeError(error)}`
        });
      }
    }

    this.heldKey?.release();
    this.heldKey = null;
    this.heldKeyId = null;
    this.bundle = null;
    this.poolStatus = null;
    this.source = null;
    this.destination = null;
    this.masterKmeHost = null;
    this.slaveKmeHost = null;
    this.settings = {};
    return true;
  }
}

export const createQkdContext = (options: QkdContextOptions): QkdContext => new QkdContext(options);

/**
 * Build a context for `role` from loaded link configuration. Only the role's
 * own settings block reaches the context.
 */
export const createQkdContextFromConfig = (
  config: QkdLinkConfig,
  role: QkdRole,
  options: Omit<QkdContextOptions, 'role' | 'settings'> = {}
): QkdContext =>
  new QkdContext({
    timeoutMs: config.timeoutMs,
    ...(config.keySizeBits !== undefined ? {keySizeBits: config.keySizeBits} : {}),
    ...options,
    role,
    settings: settingsForRole(config, role)
  });

/**
 * Open an mTLS channel to the context's own KME for a stateless request.
 * The caller closes the channel.
 */
export const openContextChannel = (context: QkdContext): KmeResult<{channel: KmeChannel; peerSaeId: string}> => {
  if (!context.credentials) {
    return err('configuration_missing', 'Credentials are not provisioned');
  }
  const host = context.kmeHost;
  if (!host) {
    return err('configuration_missing', `No ${context.role === 'initiator' ? 'master' : 'slave'} KME host configured`);
  }
  const peerSaeId = context.destUri;
  if (!peerSaeId) {
    return err('configuration_missing', 'Peer SAE identifier is not configured');
  }

  const channel = openKmeChannel({
    hostUri: host,
    credentials: context.credentials,
    timeoutMs: context.timeoutMs,
    ...(context.requestImpl ? {requestImpl: context.requestImpl} : {}),
    ...(context.readFile ? {readFile: context.readFile} : {})
  });
  if (!channel.ok) {
    return channel;
  }
  return ok({channel: channel.value, peerSaeId});
};

/**
 * The open key stream of a connection-oriented context.
 */
export const requireOpenStream = (context: QkdContext): KmeResult<{api: KeyStreamApi; handle: KeyStreamHandle}> => {
  if (context.protocol.kind !== 'connection_oriented') {
    return err('session_state_error', 'Context does not use the connection-oriented protocol');
  }
  const handle = context.streamHandle;
  if (!handle) {
    return err('session_state_error', 'Key stream is not open');
  }
  return ok({api: context.protocol.api, handle});
};

const isLive = (context: QkdContext | null | undefined): context is QkdContext =>
  context instanceof QkdContext && !context.isDestroyed;

const logContextFor = (context: QkdContext, operation: string) => ({
  correlation_id: randomUUID(),
  role: context.role,
  operation,
  ...(context.sourceUri ? {sae_id: context.sourceUri} : {}),
  ...(context.kmeHost ? {kme_host: context.kmeHost} : {})
});

const reportOutcome = (context: QkdContext, operation: string, result: KmeResult<unknown>, startedAt: number) => {
  const durationMs = Math.max(0, Math.round(Date.now() - startedAt));
  if (result.ok) {
    context.logger.info({
      event: `kme.${operation}.succeeded`,
      component: 'kme.context',
      duration_ms: durationMs
    });
    return true;
  }

  context.logger.warn({
    event: `kme.${operation}.failed`,
    component: 'kme.context',
    reason_code: result.error.code,
    duration_ms: durationMs,
    message: result.error.message
  });
  return false;
};

const reportCrash = (context: QkdContext, operation: string, error: unknown) => {
  context.logger.error({
    event: `kme.${operation}.failed`,
    component: 'kme.context',
    reason_code: 'internal_error',
    message: describeError(error)
  });
  return false;
};

/**
 * Run a context operation: reject an absent or destroyed context, scope the
 * log context, and reduce the outcome to a boolean. Nothing escapes as a throw.
 */
export const runContextOperation = async (
  context: QkdContext | null | undefined,
  operation: string,
  body: (context: QkdContext) => Promise<KmeResult<unknown>>
): Promise<boolean> => {
  if (!isLive(context)) {
    return false;
  }

  return runWithLogContext(logContextFor(context, operation), async () => {
    const startedAt = Date.now();
    try {
      return reportOutcome(context, operation, await body(context), startedAt);
    } catch (error) {
      return reportCrash(context, operation, error);
    }
  });
};

export const runContextOperationSync = (
  context: QkdContext | null | undefined,
  operation: string,
  body: (context: QkdContext) => KmeResult<unknown>
): boolean => {
  if (!isLive(context)) {
    return false;
  }

  return runWithLogContext(logContextFor(context, operation), () => {
    const startedAt = Date.now();
    try {
      return reportOutcome(context, operation, body(context), startedAt);
    } catch (error) {
      return reportCrash(context, operation, error);
    }
  });
};
