import {z} from 'zod';

const count = z.number().int().gte(0);

/** ETSI GS QKD 014 `Status` object. */
export const KmeStatusResponseSchema = z
  .object({
    source_KME_ID: z.string().optional(),
    target_KME_ID: z.string().optional(),
    master_SAE_ID: z.string().optional(),
    slave_SAE_ID: z.string().optional(),
    key_size: count,
    stored_key_count: count,
    max_key_count: count,
    max_key_per_request: count.optional(),
    max_key_size: count.optional(),
    min_key_size: count.optional(),
    max_SAE_ID_count: count.optional()
  })
  .loose();

export type KmeStatusResponse = z.infer<typeof KmeStatusResponseSchema>;

/** ETSI GS QKD 014 `Key container`. */
export const KeyContainerSchema = z
  .object({
    keys: z.array(
      z
        .object({
          key_ID: z.string().min(1),
          key: z.string()
        })
        .loose()
    )
  })
  .loose();

export type KeyContainer = z.infer<typeof KeyContainerSchema>;

/** ETSI GS QKD 014 `Key IDs` request body for dec_keys. */
export const KeyIdsRequestSchema = z.object({
  key_IDs: z
    .array(
      z.object({
        key_ID: z.string().min(1),
        master_SAE_ID: z.string().min(1).optional()
      })
    )
    .min(1)
});

export type KeyIdsRequest = z.infer<typeof KeyIdsRequestSchema>;

/** ETSI GS QKD 014 `Error` object. */
export const KmeErrorResponseSchema = z
  .object({
    message: z.string(),
    details: z.array(z.record(z.string(), z.unknown())).optional()
  })
  .loose();

export const keysPath = (peerSaeId: string, endpoint: 'status' | 'enc_keys' | 'dec_keys') =>
  `/api/v1/keys/${encodeURIComponent(peerSaeId)}/${endpoint}`;
