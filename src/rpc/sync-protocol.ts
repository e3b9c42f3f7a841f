// This module defines the messages exchanged with the blocking-exchange runner process.

import { z } from 'zod';

export const syncExchangeRequestSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  // Base64 of the framed request bytes.
  payload: z.string(),
  timeoutMs: z.number().int().positive().optional()
});

export const syncExchangeOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    // Base64 of the raw reply bytes.
    bytes: z.string()
  }),
  z.object({
    ok: z.literal(false),
    code: z.enum(['connection_error', 'response_error']),
    message: z.string(),
    details: z.unknown().optional()
  })
]);

export type SyncExchangeRequest = z.infer<typeof syncExchangeRequestSchema>;
export type SyncExchangeOutcome = z.infer<typeof syncExchangeOutcomeSchema>;
