/**
 * Shared types for the KME client.
 *
 * The stateless variant speaks the ETSI GS QKD 014 REST interface; the
 * connection-oriented variant drives a vendor key-stream API in the manner
 * of ETSI GS QKD 004.
 */

import type {CredentialBundle} from './credentials.js';

export type QkdRole = 'initiator' | 'responder';

/**
 * Settings of one link endpoint. Loaded per role so that an initiator never
 * sees the responder's host or credential paths, and the reverse.
 */
export interface RoleSettings {
  /** KME address for this role, e.g. https://kme-1.example:443 */
  kmeHost?: string;
  /** This endpoint's SAE identifier */
  saeId?: string;
  /** The peer endpoint's SAE identifier */
  peerSaeId?: string;
  caCertPath?: string;
  clientCertPath?: string;
  clientKeyPath?: string;
}

/**
 * Key pool status as reported by a KME.
 */
export interface KeyPoolStatus {
  storedKeyCount: number;
  maxKeyCount: number;
  /** Default key size in bits */
  keySize: number;
  sourceKmeId?: string;
  targetKmeId?: string;
  masterSaeId?: string;
  slaveSaeId?: string;
  maxKeyPerRequest?: number;
  maxKeySize?: number;
  minKeySize?: number;
  maxSaeIdCount?: number;
}

/**
 * Opaque handle of an open key stream, owned by the vendor API.
 */
export interface KeyStreamHandle {
  readonly keyStreamId: string;
}

export interface KeyStreamQos {
  /** Key chunk size in bytes */
  keyChunkSize: number;
  /** Upper bound on a single get-key call, in milliseconds */
  timeoutMs: number;
}

export interface StreamKey {
  keyId: string;
  key: Uint8Array;
}

export interface OpenStreamRequest {
  credentials: CredentialBundle;
  source: string;
  destination: string;
  qos: KeyStreamQos;
}

/**
 * Vendor QKD library primitives for the connection-oriented variant.
 * Implementations reject on failure.
 */
export interface KeyStreamApi {
  open(request: OpenStreamRequest): Promise<KeyStreamHandle>;
  close(handle: KeyStreamHandle): Promise<void>;
  getKey(handle: KeyStreamHandle, keyId?: string): Promise<StreamKey>;
  /** Optional: not every vendor library reports pool status. */
  status?(handle: KeyStreamHandle): Promise<KeyPoolStatus>;
}

export type QkdProtocol =
  | {kind: 'stateless'}
  | {kind: 'connection_oriented'; api: KeyStreamApi; qos?: Partial<KeyStreamQos>};
