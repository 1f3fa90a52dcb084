import { z } from 'zod';

/** Commands the relay carries; the rest of the command set needs a direct chat connection. */
export const relayActionSchema = z.enum(['kill', 'status', 'ping']);

export type RelayAction = z.infer<typeof relayActionSchema>;

export const queuedActionSchema = z.object({
  action: relayActionSchema,
  queued_at: z.number(),
});

export type QueuedAction = z.infer<typeof queuedActionSchema>;

export const eventBodySchema = z.object({
  user_id: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  color: z.string().optional(),
});

export type EventBody = z.infer<typeof eventBodySchema>;

export const pollResponseSchema = z.object({
  commands: z.array(z.object({ action: z.string() })),
});

export const statusReportSchema = z.object({
  title: z.string().default('CLIENT STATUS'),
  description: z.string(),
  reported_at: z.number().optional(),
});

export type StatusReport = z.infer<typeof statusReportSchema>;

export const killBodySchema = z.object({
  auth_token: z.string().min(1),
});

export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1] ?? null;
}
