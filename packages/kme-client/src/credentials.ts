/**
 * Certificate provisioning for mutual TLS against a KME.
 *
 * Resolves the CA, client certificate and client key paths of one role and
 * yields them as a single bundle, or nothing at all.
 */

import * as fs from 'node:fs';
import * as nodePath from 'node:path';

import {runContextOperationSync, type QkdContext} from './context.js';
import {err, ok, type KmeResult} from './errors.js';
import type {RoleSettings} from './types.js';

export interface CredentialBundle {
  readonly caCertPath: string;
  readonly clientCertPath: string;
  readonly clientKeyPath: string;
}

/** Reports whether a credential file exists and can be read. */
export type CredentialFileCheck = (filePath: string) => boolean;

export const isRegularFile: CredentialFileCheck = filePath => {
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
};

const CREDENTIAL_FIELDS = [
  ['caCertPath', 'CA certificate'],
  ['clientCertPath', 'client certificate'],
  ['clientKeyPath', 'client key']
] as const;

const validateCredentialPath = (
  filePath: string | undefined,
  description: string,
  fileCheck: CredentialFileCheck | null
): KmeResult<string> => {
  const trimmed = filePath?.trim() ?? '';
  if (trimmed.length === 0) {
    return err('configuration_missing', `${description} path is not configured`);
  }
  if (!nodePath.isAbsolute(trimmed)) {
    return err('configuration_missing', `${description} path must be absolute: ${trimmed}`);
  }
  if (trimmed.split(/[\\/]/u).includes('..')) {
    return err('configuration_missing', `${description} path contains traversal: ${trimmed}`);
  }
  const normalized = nodePath.normalize(trimmed);
  if (fileCheck && !fileCheck(normalized)) {
    return err('configuration_missing', `${description} file not found: ${normalized}`);
  }
  return ok(normalized);
};

/**
 * Resolve the credential bundle for a role. A `null` check skips the
 * existence check for paths that are only known to exist later.
 */
export const provisionCredentials = (
  settings: RoleSettings,
  fileCheck: CredentialFileCheck | null = isRegularFile
): KmeResult<CredentialBundle> => {
  const resolved: Record<(typeof CREDENTIAL_FIELDS)[number][0], string> = {
    caCertPath: '',
    clientCertPath: '',
    clientKeyPath: ''
  };

  for (const [field, description] of CREDENTIAL_FIELDS) {
    const result = validateCredentialPath(settings[field], description, fileCheck);
    if (!result.ok) {
      return result;
    }
    resolved[field] = result.value;
  }

  return ok(Object.freeze(resolved));
};

/**
 * Populate the context's credential bundle from its role settings.
 * On failure the bundle is left exactly as it was.
 */
export const initCertificates = (context: QkdContext | null | undefined): boolean =>
  runContextOperationSync(context, 'init_certificates', live => {
    const fileCheck = live.fileCheck === undefined ? isRegularFile : live.fileCheck;
    const bundle = provisionCredentials(live.roleSettings, fileCheck);
    if (bundle.ok) {
      live.commitCredentials(bundle.value);
    }
    return bundle;
  });
