import {z} from 'zod';

export const kmeErrorCodeSchema = z.enum([
  'configuration_missing',
  'invalid_address',
  'tls_handshake_failure',
  'network_unreachable',
  'protocol_decode_error',
  'key_not_found',
  'session_state_error'
]);

export type KmeErrorCode = z.infer<typeof kmeErrorCodeSchema>;

export type KmeError = {
  code: KmeErrorCode;
  message: string;
};

export type KmeSuccess<T> = {
  ok: true;
  value: T;
};

export type KmeFailure = {
  ok: false;
  error: KmeError;
};

export type KmeResult<T> = KmeSuccess<T> | KmeFailure;

export const ok = <T>(value: T): KmeSuccess<T> => ({ok: true, value});

export const err = (code: KmeErrorCode, message: string): KmeFailure => ({
  ok: false,
  error: {code, message}
});

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
