/**
 * Messages between the contention test and its forked contenders
 */

import { z } from 'zod';

export const ContenderTaskSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('open'), dataDir: z.string() }),
  z.object({ mode: z.literal('issue'), dataDir: z.string(), identityToken: z.string() }),
  z.object({
    mode: z.literal('cast'),
    dataDir: z.string(),
    ballotToken: z.string(),
    encryptedChoice: z.string(),
  }),
]);

export type ContenderTask = z.infer<typeof ContenderTaskSchema>;

export const ContenderMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready') }),
  z.object({ type: z.literal('done'), ok: z.boolean(), code: z.string().nullable() }),
]);

export type ContenderMessage = z.infer<typeof ContenderMessageSchema>;

/** Sent by the test once every contender is ready */
export const GO = 'go';
