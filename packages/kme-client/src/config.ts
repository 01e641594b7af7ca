import {LogLevelSchema, type LogLevel} from '@qkd-link/logging';
import {z} from 'zod';

import type {QkdRole, RoleSettings} from './types.js';

export const DEFAULT_KME_TIMEOUT_MS = 10_000;
export const MAX_KME_TIMEOUT_MS = 120_000;

/** Bound on every KME request and vendor call, in milliseconds. */
export const kmeTimeoutSchema = z.number().int().gte(1).lte(MAX_KME_TIMEOUT_MS);

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  return /^\d+$/u.test(trimmed) ? Number.parseInt(trimmed, 10) : value;
}, z.number().int().positive().optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  QKD_LOG_LEVEL: LogLevelSchema.default('info'),
  QKD_KME_TIMEOUT_MS: numberFromEnv.pipe(kmeTimeoutSchema.optional()),
  QKD_KEY_SIZE_BITS: numberFromEnv,
  QKD_CA_CERT_PATH: optionalString,
  QKD_MASTER_KME_HOSTNAME: optionalString,
  QKD_MASTER_SAE: optionalString,
  QKD_MASTER_CA_CERT_PATH: optionalString,
  QKD_MASTER_CERT_PATH: optionalString,
  QKD_MASTER_KEY_PATH: optionalString,
  QKD_SLAVE_KME_HOSTNAME: optionalString,
  QKD_SLAVE_SAE: optionalString,
  QKD_SLAVE_CA_CERT_PATH: optionalString,
  QKD_SLAVE_CERT_PATH: optionalString,
  QKD_SLAVE_KEY_PATH: optionalString
});

export interface QkdLinkConfig {
  env: 'development' | 'test' | 'production';
  logLevel: LogLevel;
  timeoutMs: number;
  keySizeBits?: number;
  initiator: RoleSettings;
  responder: RoleSettings;
}

/**
 * Parse link configuration from environment variables.
 *
 * Missing hosts or credential paths are not an error here; the certificate
 * provisioner rejects an incomplete role when it runs.
 */
export const loadQkdConfig = (env: NodeJS.ProcessEnv = process.env): QkdLinkConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new Error(`Invalid QKD configuration: ${fields}`);
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    logLevel: values.QKD_LOG_LEVEL,
    timeoutMs: values.QKD_KME_TIMEOUT_MS ?? DEFAULT_KME_TIMEOUT_MS,
    ...(values.QKD_KEY_SIZE_BITS !== undefined ? {keySizeBits: values.QKD_KEY_SIZE_BITS} : {}),
    initiator: {
      kmeHost: values.QKD_MASTER_KME_HOSTNAME,
      saeId: values.QKD_MASTER_SAE,
      peerSaeId: values.QKD_SLAVE_SAE,
      caCertPath: values.QKD_MASTER_CA_CERT_PATH ?? values.QKD_CA_CERT_PATH,
      clientCertPath: values.QKD_MASTER_CERT_PATH,
      clientKeyPath: values.QKD_MASTER_KEY_PATH
    },
    responder: {
      kmeHost: values.QKD_SLAVE_KME_HOSTNAME,
      saeId: values.QKD_SLAVE_SAE,
      peerSaeId: values.QKD_MASTER_SAE,
      caCertPath: values.QKD_SLAVE_CA_CERT_PATH ?? values.QKD_CA_CERT_PATH,
      clientCertPath: values.QKD_SLAVE_CERT_PATH,
      clientKeyPath: values.QKD_SLAVE_KEY_PATH
    }
  };
};

export const settingsForRole = (config: QkdLinkConfig, role: QkdRole): RoleSettings =>
  role === 'initiator' ? {...config.initiator} : {...config.responder};
