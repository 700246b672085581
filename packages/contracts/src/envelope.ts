import { z } from 'zod';

// Success response envelope
export const successEnvelopeSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    ok: z.literal(true),
    data: dataSchema,
  });

// Error response envelope
export const errorEnvelopeSchema = z.object({
  ok: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.array(z.unknown()).optional(),
  }),
});

// Token pair returned by social login and refresh
export const tokenPairSchema = z.object({
  access_token: z.string(),
  access_token_expires_at: z.string(),
  refresh_token: z.string(),
  refresh_token_expires_at: z.string(),
});

// TypeScript types
export type SuccessEnvelope<T> = { ok: true; data: T };
export type ErrorEnvelope = {
  ok: false;
  error: { code: string; message: string; details?: unknown[] };
};
export type TokenPair = z.infer<typeof tokenPairSchema>;
