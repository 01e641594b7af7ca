export {decodeBase64} from './base64.js';
export {
  DEFAULT_KME_TIMEOUT_MS,
  kmeTimeoutSchema,
  loadQkdConfig,
  MAX_KME_TIMEOUT_MS,
  settingsForRole,
  type QkdLinkConfig
} from './config.js';
export {
  createQkdContext,
  createQkdContextFromConfig,
  QkdContext,
  type QkdContextOptions
} from './context.js';
export {
  KeyContainerSchema,
  KeyIdsRequestSchema,
  KmeErrorResponseSchema,
  KmeStatusResponseSchema,
  keysPath,
  type KeyContainer,
  type KeyIdsRequest,
  type KmeStatusResponse
} from './contracts.js';
export {
  initCertificates,
  isRegularFile,
  provisionCredentials,
  type CredentialBundle,
  type CredentialFileCheck
} from './credentials.js';
export {err, kmeErrorCodeSchema, ok, type KmeError, type KmeErrorCode, type KmeResult} from './errors.js';
export {fetchKeyById, fetchNextKey, getKey, getKeyWithId, type RetrievedKey} from './keys.js';
export {SecretKey, SecretKeyReleasedError} from './secret-key.js';
export {closeSession, openSession, withQkdSession} from './session.js';
export {fetchKeyPoolStatus, getStatus} from './status.js';
export {
  classifyTransportError,
  KmeTransportError,
  openKmeChannel,
  parseKmeHost,
  rawKmeRequest,
  type CredentialFileReader,
  type KmeChannel,
  type KmeHttpResponse,
  type KmeRequestImpl,
  type KmeRequestOptions,
  type OpenKmeChannelOptions
} from './transport.js';
export type {
  KeyPoolStatus,
  KeyStreamApi,
  KeyStreamHandle,
  KeyStreamQos,
  OpenStreamRequest,
  QkdProtocol,
  QkdRole,
  RoleSettings,
  StreamKey
} from './types.js';
